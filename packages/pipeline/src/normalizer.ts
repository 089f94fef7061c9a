import type { Job } from "./job.js";
import { resolveFieldMap, type FieldMap } from "./field-map.js";
import {
  combineDateAndTime,
  daysBetween,
  minutesBetween,
  parseCalendarDate,
  parseTimestamp
} from "./dates.js";
import { parseScanLog, summarizeScans } from "./scan-log.js";
import { round1, toFlag, toIdentifier, toInteger, toNumber, toText } from "./values.js";

export type RawRecord = Readonly<Record<string, unknown>>;

export type NormalizeOptions = {
  fieldMap?: Partial<FieldMap>;
};

const UNKNOWN = "Unknown";

/** True when a driver is assigned: non-empty and not the "unknown" placeholder. */
export function isRoutedDriver(driver: string): boolean {
  const trimmed = driver.trim();
  return trimmed.length > 0 && trimmed.toLowerCase() !== "unknown";
}

function nonNegative(value: number | null): number | null {
  return value !== null && value >= 0 ? value : null;
}

function arrivalTimings(actualDate: string | null, plannedDate: string | null, arrivalTime: string | null) {
  const dwell = actualDate && arrivalTime ? nonNegative(minutesBetween(actualDate, arrivalTime)) : null;
  return {
    delayDays: actualDate && plannedDate ? daysBetween(actualDate, plannedDate) : null,
    dwellMinutes: dwell === null ? null : round1(dwell)
  };
}

/** Sets a confirmed arrival on a job and recomputes the measures that depend on it. */
export function withActualDate(job: Job, actualDate: string): Job {
  const { delayDays, dwellMinutes } = arrivalTimings(actualDate, job.planned_date, job.arrival_time);
  return { ...job, actual_date: actualDate, delay_days: delayDays, dwell_minutes: dwellMinutes };
}

export function normalizeRecord(record: RawRecord, fields: FieldMap): Job {
  const read = (column: string): unknown => record[column];

  const jobDate = read(fields.jobDate);
  const plannedDate = parseCalendarDate(jobDate);
  const actualDate = combineDateAndTime(jobDate, read(fields.completionTime));
  const arrivalTime = combineDateAndTime(jobDate, read(fields.arrivalTime));
  const dateReceived = parseCalendarDate(read(fields.dateReceived));

  const { delayDays, dwellMinutes } = arrivalTimings(actualDate, plannedDate, arrivalTime);
  const leadTime = plannedDate && dateReceived ? nonNegative(daysBetween(plannedDate, dateReceived)) : null;

  const received = summarizeScans(parseScanLog(read(fields.receivedScans)));
  const delivered = parseScanLog(read(fields.deliveredScans));
  const assignedDriver = toText(read(fields.assignedDriver));

  return {
    job_id: toIdentifier(read(fields.jobId)),
    stop_number: toText(read(fields.stopNumber)),
    status: toText(read(fields.status), UNKNOWN),
    state: toText(read(fields.state), UNKNOWN),
    carrier: toText(read(fields.carrier), UNKNOWN),
    market: toText(read(fields.market), UNKNOWN),
    city: toText(read(fields.city)),
    customer_name: toText(read(fields.customerName)),
    delivery_address: toText(read(fields.deliveryAddress)),
    client_order_number: toText(read(fields.clientOrderNumber)),
    prior_job_id: toIdentifier(read(fields.priorJobId)),
    product_description: toText(read(fields.productDescription)),
    product_serial: toText(read(fields.productSerial)),
    assigned_driver: assignedDriver,
    is_routed: isRoutedDriver(assignedDriver),
    confirmation_status: toText(read(fields.confirmationStatus), UNKNOWN),
    notification_detail: toText(read(fields.notificationDetail)),
    signed_by: toText(read(fields.signedBy)),
    driver_notes: toText(read(fields.driverNotes)),
    job_type: toText(read(fields.jobType), "Delivery"),
    white_glove: toFlag(read(fields.whiteGlove)),
    piece_count: toInteger(read(fields.pieceCount), 0),
    product_weight_lbs: toInteger(read(fields.productWeight), 0),
    crew_required: toInteger(read(fields.crewRequired), 1),
    miles_oneway: round1(toNumber(read(fields.miles), 0)),
    planned_date: plannedDate,
    actual_date: actualDate,
    arrival_time: arrivalTime,
    date_received: dateReceived,
    job_created_at: parseTimestamp(read(fields.createdAt)),
    delay_days: delayDays,
    dwell_minutes: dwellMinutes,
    lead_time_days: leadTime,
    scan_events: received.events,
    scan_count: received.count,
    last_scan_user: received.lastUser,
    last_scan_time: received.lastTime,
    delivery_scan_events: delivered,
    delivery_scan_count: delivered.length
  };
}

/** Maps raw export rows to canonical jobs, one per record, in input order. */
export function normalizeRecords(records: readonly RawRecord[], options: NormalizeOptions = {}): Job[] {
  const fields = resolveFieldMap(options.fieldMap);
  return records.map((record) => normalizeRecord(record, fields));
}
