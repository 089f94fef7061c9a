export type ScanEvent = {
  serial_number: string;
  username: string;
  timestamp: string;
  manual: boolean;
  latitude: string;
  longitude: string;
};

/**
 * Canonical delivery job. Every field is populated; absent source columns
 * fall back to the defaults applied by the normalizer.
 *
 * Calendar dates are `YYYY-MM-DD`; timestamps are zone-less
 * `YYYY-MM-DDTHH:mm:ss` wall-clock values as exported.
 */
export type Job = {
  job_id: string;
  stop_number: string;
  status: string;
  state: string;
  carrier: string;
  market: string;
  city: string;
  customer_name: string;
  delivery_address: string;
  client_order_number: string;
  prior_job_id: string;
  product_description: string;
  product_serial: string;
  assigned_driver: string;
  is_routed: boolean;
  confirmation_status: string;
  notification_detail: string;
  signed_by: string;
  driver_notes: string;
  job_type: string;
  white_glove: boolean;
  piece_count: number;
  product_weight_lbs: number;
  crew_required: number;
  miles_oneway: number;
  planned_date: string | null;
  actual_date: string | null;
  arrival_time: string | null;
  date_received: string | null;
  job_created_at: string | null;
  delay_days: number | null;
  dwell_minutes: number | null;
  lead_time_days: number | null;
  scan_events: ScanEvent[];
  scan_count: number;
  last_scan_user: string;
  last_scan_time: string | null;
  delivery_scan_events: ScanEvent[];
  delivery_scan_count: number;
};

/**
 * One row of a previously persisted snapshot. Columns may be missing when the
 * store schema predates them, so everything except the id is optional.
 */
export type SnapshotJob = {
  job_id: string;
  status?: string | null;
  carrier?: string | null;
  market?: string | null;
  planned_date?: string | null;
  actual_date?: string | null;
  snapshot_date?: string | null;
};

const COMPLETED_STATUSES = new Set(["delivered", "complete", "completed"]);
const RESCHEDULE_MARKER = "resched";

/** Lowercases and drops everything but letters: "Re-scheduled" -> "rescheduled". */
export function normalizeStatus(status: string | null | undefined): string {
  if (!status) return "";
  return status.toLowerCase().replace(/[^a-z]/g, "");
}

export function isCompletedStatus(status: string | null | undefined): boolean {
  return COMPLETED_STATUSES.has(normalizeStatus(status));
}

export function isRescheduledStatus(status: string | null | undefined): boolean {
  return normalizeStatus(status).includes(RESCHEDULE_MARKER);
}

export function hasSerial(job: Pick<Job, "product_serial">): boolean {
  return job.product_serial.trim().length > 0;
}
