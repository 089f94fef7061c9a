/**
 * Source column per canonical field. Callers with a differently shaped export
 * pass a partial override to `normalizeRecords`.
 */
export type FieldMap = {
  jobId: string;
  stopNumber: string;
  status: string;
  state: string;
  carrier: string;
  market: string;
  city: string;
  customerName: string;
  deliveryAddress: string;
  clientOrderNumber: string;
  priorJobId: string;
  productDescription: string;
  productSerial: string;
  assignedDriver: string;
  confirmationStatus: string;
  notificationDetail: string;
  signedBy: string;
  driverNotes: string;
  jobType: string;
  whiteGlove: string;
  pieceCount: string;
  productWeight: string;
  crewRequired: string;
  miles: string;
  jobDate: string;
  completionTime: string;
  arrivalTime: string;
  dateReceived: string;
  createdAt: string;
  receivedScans: string;
  deliveredScans: string;
};

export const DEFAULT_FIELD_MAP: Readonly<FieldMap> = Object.freeze({
  jobId: "_kp_job_id",
  stopNumber: "order_C1",
  status: "job_status",
  state: "_kf_state_id",
  carrier: "_kf_client_code_id",
  market: "_kf_market_id",
  city: "_kf_city_id",
  customerName: "Customer_C1",
  deliveryAddress: "address_C1",
  clientOrderNumber: "client_order_number",
  priorJobId: "job_reference_prior",
  productDescription: "description_product",
  productSerial: "product_serial_number",
  assignedDriver: "_kf_lead_id",
  confirmationStatus: "_kf_notification_id",
  notificationDetail: "notification_detail",
  signedBy: "signed_by",
  driverNotes: "notes_driver",
  jobType: "job_type",
  whiteGlove: "white_glove",
  pieceCount: "piece_total",
  productWeight: "_kf_product_weight_id",
  crewRequired: "people_required",
  miles: "_kf_miles_oneway_id",
  jobDate: "job_date",
  completionTime: "time_complete",
  arrivalTime: "time_arival",
  dateReceived: "date_received",
  createdAt: "timestamp_create",
  receivedScans: "box_serial_numbers_scanned_received_json",
  deliveredScans: "box_serial_numbers_scanned_delivered_json"
});

export function resolveFieldMap(overrides: Partial<FieldMap> = {}): FieldMap {
  return { ...DEFAULT_FIELD_MAP, ...overrides };
}
