import { isCompletedStatus, type Job, type SnapshotJob } from "./job.js";
import { calendarDateOf, parseTimestamp, todayIsoDate } from "./dates.js";
import { withActualDate } from "./normalizer.js";

export type NewJobSummary = { job_id: string; carrier: string; market: string; status: string };
export type ArrivalSummary = { job_id: string; carrier: string; actual_date: string; delay_days: number | null };
export type DeliverySummary = { job_id: string; carrier: string; status: string };
export type OverdueSummary = { job_id: string; carrier: string; planned_date: string };

export type DeltaSet = {
  new_jobs: NewJobSummary[];
  new_arrivals: ArrivalSummary[];
  new_deliveries: DeliverySummary[];
  new_overdue: OverdueSummary[];
};

export type CompareOptions = {
  /** Calendar date of this import, `YYYY-MM-DD`. Defaults to the local date. */
  today?: string;
  /** Date the previous snapshot was taken, used when its rows carry none. */
  previousSnapshotDate?: string | null;
};

export function emptyDeltaSet(): DeltaSet {
  return { new_jobs: [], new_arrivals: [], new_deliveries: [], new_overdue: [] };
}

export function countDeltas(deltas: DeltaSet): number {
  return (
    deltas.new_jobs.length + deltas.new_arrivals.length + deltas.new_deliveries.length + deltas.new_overdue.length
  );
}

function wasOverdue(previous: SnapshotJob, fallbackSnapshotDate: string | null): boolean {
  if (previous.actual_date) return false;
  const planned = calendarDateOf(previous.planned_date);
  const takenOn = calendarDateOf(previous.snapshot_date) ?? calendarDateOf(fallbackSnapshotDate);
  if (!planned || !takenOn) return false;
  return planned < takenOn;
}

/**
 * An arrival, once stored, is never un-set: a current job without an
 * `actual_date` takes the one its previous row recorded.
 */
export function carryForwardArrivals(current: readonly Job[], previous: readonly SnapshotJob[]): Job[] {
  const arrivals = new Map<string, string>();
  for (const row of previous) {
    const actual = parseTimestamp(row.actual_date);
    if (actual) arrivals.set(String(row.job_id), actual);
  }

  let carried = 0;
  const jobs = current.map((job) => {
    const actual = job.actual_date ? undefined : arrivals.get(job.job_id);
    if (!actual) return job;
    carried++;
    return withActualDate(job, actual);
  });
  if (carried > 0) {
    console.info(`[comparator] kept ${carried} stored arrival(s) missing from the batch`);
  }
  return jobs;
}

/**
 * Classifies the changes between the previous stored snapshot and the current
 * batch. A job counts as newly overdue on the first import that sees it
 * overdue, however many days passed since the previous one.
 */
export function compareSnapshots(
  current: readonly Job[],
  previous: readonly SnapshotJob[] | null,
  options: CompareOptions = {}
): DeltaSet {
  const deltas = emptyDeltaSet();
  if (!previous || previous.length === 0) {
    return deltas;
  }

  const today = options.today ?? todayIsoDate();
  const fallbackSnapshotDate = options.previousSnapshotDate ?? null;
  const previousById = new Map(previous.map((row) => [String(row.job_id), row]));

  for (const job of current) {
    const before = previousById.get(job.job_id);

    if (!before) {
      // A completed job never seen active is an archive entry, not new work.
      if (!isCompletedStatus(job.status)) {
        deltas.new_jobs.push({ job_id: job.job_id, carrier: job.carrier, market: job.market, status: job.status });
      }
      continue;
    }

    if (job.actual_date && !before.actual_date) {
      deltas.new_arrivals.push({
        job_id: job.job_id,
        carrier: job.carrier,
        actual_date: job.actual_date,
        delay_days: job.delay_days
      });
    }

    if (isCompletedStatus(job.status) && !isCompletedStatus(before.status)) {
      deltas.new_deliveries.push({ job_id: job.job_id, carrier: job.carrier, status: job.status });
    }

    if (!job.actual_date && job.planned_date && job.planned_date < today && !wasOverdue(before, fallbackSnapshotDate)) {
      deltas.new_overdue.push({ job_id: job.job_id, carrier: job.carrier, planned_date: job.planned_date });
    }
  }

  return deltas;
}
