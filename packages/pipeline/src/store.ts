import type { SupabaseClient } from "@supabase/supabase-js";
import type { Database, TablesInsert } from "@dockline/types/supabase";
import type { Job } from "./job.js";

export type StoreClient = SupabaseClient<Database>;

export type StoreFailure = { message: string; code?: string };

export type StoreResult<T> = { data: T | null; error: StoreFailure | null };

export const DEFAULT_PAGE_SIZE = 1000;

export class StoreError extends Error {
  readonly operation: string;
  readonly table: string;
  readonly code?: string;

  constructor(operation: string, table: string, cause: StoreFailure) {
    super(`${operation} on ${table} failed: ${cause.message}`);
    this.name = "StoreError";
    this.operation = operation;
    this.table = table;
    this.code = cause.code;
  }
}

/**
 * Reads a table in fixed windows until a short page comes back.
 * `fetchPage` receives inclusive row bounds, as `range()` takes them.
 */
export async function fetchAllPages<T>(
  table: string,
  fetchPage: (from: number, to: number) => PromiseLike<StoreResult<T[]>>,
  pageSize: number = DEFAULT_PAGE_SIZE
): Promise<T[]> {
  if (!Number.isInteger(pageSize) || pageSize <= 0) {
    throw new RangeError(`pageSize must be a positive integer, received ${pageSize}`);
  }

  const rows: T[] = [];
  for (let from = 0; ; from += pageSize) {
    const { data, error } = await fetchPage(from, from + pageSize - 1);
    if (error) {
      throw new StoreError("select", table, error);
    }
    const page = data ?? [];
    rows.push(...page);
    if (page.length < pageSize) {
      return rows;
    }
  }
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    chunks.push(items.slice(index, index + size));
  }
  return chunks;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toJobColumns(job: Job) {
  return {
    job_id: job.job_id,
    stop_number: job.stop_number,
    status: job.status,
    state: job.state,
    carrier: job.carrier,
    market: job.market,
    city: job.city,
    customer_name: job.customer_name,
    delivery_address: job.delivery_address,
    client_order_number: job.client_order_number,
    prior_job_id: job.prior_job_id,
    product_description: job.product_description,
    product_serial: job.product_serial,
    assigned_driver: job.assigned_driver,
    is_routed: job.is_routed,
    confirmation_status: job.confirmation_status,
    notification_detail: job.notification_detail,
    signed_by: job.signed_by,
    driver_notes: job.driver_notes,
    job_type: job.job_type,
    white_glove: job.white_glove,
    piece_count: job.piece_count,
    product_weight_lbs: job.product_weight_lbs,
    crew_required: job.crew_required,
    miles_oneway: job.miles_oneway,
    planned_date: job.planned_date,
    actual_date: job.actual_date,
    arrival_time: job.arrival_time,
    date_received: job.date_received,
    job_created_at: job.job_created_at,
    delay_days: job.delay_days,
    dwell_minutes: job.dwell_minutes,
    lead_time_days: job.lead_time_days,
    scan_events: job.scan_events,
    scan_count: job.scan_count,
    last_scan_user: job.last_scan_user,
    last_scan_time: job.last_scan_time,
    delivery_scan_count: job.delivery_scan_count
  };
}

export function toActiveRow(job: Job, snapshotDate: string): TablesInsert<"active_jobs"> {
  return { ...toJobColumns(job), snapshot_date: snapshotDate };
}

export function toArchiveRow(job: Job, completedAt: string): TablesInsert<"job_archive"> {
  return { ...toJobColumns(job), completed_at: completedAt };
}
