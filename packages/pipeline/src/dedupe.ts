import { hasSerial, type Job } from "./job.js";

export type DedupeResult = {
  jobs: Job[];
  removed: number;
};

type OrderingField = "job_created_at" | "planned_date";

function isNewer(candidate: Job, current: Job, field: OrderingField): boolean {
  const a = candidate[field];
  const b = current[field];
  if (a !== b) {
    if (a === null) return false;
    if (b === null) return true;
    return a > b;
  }
  return candidate.job_id > current.job_id;
}

/**
 * Keeps one job per product serial: the latest by creation time when the group
 * carries creation times, otherwise by planned date. Jobs without a serial are
 * always kept. Survivors stay in input order.
 */
export function deduplicateJobs(jobs: readonly Job[]): DedupeResult {
  const groups = new Map<string, Job[]>();
  for (const job of jobs) {
    if (!hasSerial(job)) continue;
    const key = job.product_serial.trim();
    const group = groups.get(key);
    if (group) {
      group.push(job);
    } else {
      groups.set(key, [job]);
    }
  }

  const winners = new Set<Job>();
  for (const group of groups.values()) {
    const field: OrderingField = group.some((job) => job.job_created_at !== null) ? "job_created_at" : "planned_date";
    let best = group[0];
    for (const job of group.slice(1)) {
      if (isNewer(job, best, field)) {
        best = job;
      }
    }
    winners.add(best);
  }

  const kept = jobs.filter((job) => !hasSerial(job) || winners.has(job));
  const removed = jobs.length - kept.length;
  if (removed > 0) {
    console.info(`[dedupe] Removed ${removed} redundant job records sharing a product serial`);
  }
  return { jobs: kept, removed };
}
