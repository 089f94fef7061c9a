import type { Job } from "../job.js";

export function makeJob(overrides: Partial<Job> = {}): Job {
  return {
    job_id: "1000",
    stop_number: "",
    status: "Manifested",
    state: "AZ",
    carrier: "ACME",
    market: "Phoenix",
    city: "",
    customer_name: "",
    delivery_address: "",
    client_order_number: "",
    prior_job_id: "",
    product_description: "",
    product_serial: "",
    assigned_driver: "",
    is_routed: false,
    confirmation_status: "Unknown",
    notification_detail: "",
    signed_by: "",
    driver_notes: "",
    job_type: "Delivery",
    white_glove: false,
    piece_count: 1,
    product_weight_lbs: 0,
    crew_required: 1,
    miles_oneway: 0,
    planned_date: null,
    actual_date: null,
    arrival_time: null,
    date_received: null,
    job_created_at: null,
    delay_days: null,
    dwell_minutes: null,
    lead_time_days: null,
    scan_events: [],
    scan_count: 0,
    last_scan_user: "",
    last_scan_time: null,
    delivery_scan_events: [],
    delivery_scan_count: 0,
    ...overrides
  };
}
