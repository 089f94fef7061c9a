import { isCompletedStatus, type Job, type SnapshotJob } from "./job.js";
import {
  chunk,
  DEFAULT_PAGE_SIZE,
  describeError,
  fetchAllPages,
  toActiveRow,
  toArchiveRow,
  type StoreClient
} from "./store.js";

const DELETE_CHUNK_SIZE = 50;
const INSERT_CHUNK_SIZE = 500;

export type SyncOptions = {
  snapshotDate: string;
  pageSize?: number;
};

export type SyncResult = {
  existing: number;
  deleted: number;
  inserted: number;
  errors: number;
};

export type ArchiveOptions = {
  completedAt?: string;
};

export type ArchiveResult = {
  archived: number;
  errors: number;
};

export type SnapshotReadOptions = {
  pageSize?: number;
};

export function splitByCompletion(jobs: readonly Job[]): { active: Job[]; completed: Job[] } {
  const active: Job[] = [];
  const completed: Job[] = [];
  for (const job of jobs) {
    (isCompletedStatus(job.status) ? completed : active).push(job);
  }
  return { active, completed };
}

/** One job per id, the last occurrence winning. Jobs without an id are dropped. */
function uniqueByJobId(jobs: readonly Job[], scope: string): Job[] {
  const byId = new Map<string, Job>();
  let skipped = 0;
  for (const job of jobs) {
    if (!job.job_id) {
      skipped++;
      continue;
    }
    byId.set(job.job_id, job);
  }
  if (skipped > 0) {
    console.warn(`[${scope}] Skipped ${skipped} jobs without a job_id`);
  }
  return [...byId.values()];
}

async function loadActiveJobIds(client: StoreClient, pageSize: number): Promise<string[]> {
  const rows = await fetchAllPages(
    "active_jobs",
    (from, to) => client.from("active_jobs").select("job_id").order("job_id").range(from, to),
    pageSize
  );
  return rows.map((row) => row.job_id);
}

/**
 * Replaces the active snapshot with `jobs`: every stored row is deleted (rows
 * in the batch are refreshed, rows missing from it are stale) and the batch is
 * inserted fresh. Failures are counted and the remaining chunks still run.
 */
export async function syncActiveJobs(
  client: StoreClient,
  jobs: readonly Job[],
  options: SyncOptions
): Promise<SyncResult> {
  const batch = uniqueByJobId(jobs, "sync");
  const result: SyncResult = { existing: 0, deleted: 0, inserted: 0, errors: 0 };

  let staleIds: string[];
  try {
    staleIds = await loadActiveJobIds(client, options.pageSize ?? DEFAULT_PAGE_SIZE);
    result.existing = staleIds.length;
  } catch (error) {
    result.errors++;
    console.warn("[sync] Unable to read existing active job ids, refreshing batch ids only", error);
    staleIds = batch.map((job) => job.job_id);
  }

  for (const ids of chunk(staleIds, DELETE_CHUNK_SIZE)) {
    const { error, count } = await client.from("active_jobs").delete({ count: "exact" }).in("job_id", ids);
    if (error) {
      result.errors++;
      console.warn(`[sync] Failed to delete ${ids.length} active jobs`, error);
      continue;
    }
    result.deleted += count ?? 0;
  }

  const rows = batch.map((job) => toActiveRow(job, options.snapshotDate));
  for (const slice of chunk(rows, INSERT_CHUNK_SIZE)) {
    const { error } = await client.from("active_jobs").insert(slice);
    if (error) {
      result.errors++;
      console.warn(`[sync] Failed to insert ${slice.length} active jobs`, error);
      continue;
    }
    result.inserted += slice.length;
  }

  console.info(
    `[sync] Active snapshot ${options.snapshotDate}: ${result.existing} existing, ${result.deleted} deleted, ${result.inserted} inserted`
  );
  return result;
}

/** Upserts completed jobs into the archive, keyed by job_id. */
export async function archiveCompletedJobs(
  client: StoreClient,
  jobs: readonly Job[],
  options: ArchiveOptions = {}
): Promise<ArchiveResult> {
  const completedAt = options.completedAt ?? new Date().toISOString();
  const rows = uniqueByJobId(jobs, "archive").map((job) => toArchiveRow(job, completedAt));
  const result: ArchiveResult = { archived: 0, errors: 0 };

  for (const slice of chunk(rows, INSERT_CHUNK_SIZE)) {
    const { error } = await client.from("job_archive").upsert(slice, { onConflict: "job_id" });
    if (error) {
      result.errors++;
      console.warn(`[archive] Failed to archive ${slice.length} completed jobs`, error);
      continue;
    }
    result.archived += slice.length;
  }

  return result;
}

/**
 * Reads the stored active snapshot. Returns null when the store cannot be
 * read, in which case deltas and transitions for this run are unavailable.
 */
export async function loadActiveSnapshot(
  client: StoreClient,
  options: SnapshotReadOptions = {}
): Promise<SnapshotJob[] | null> {
  try {
    return await fetchAllPages(
      "active_jobs",
      (from, to) =>
        client
          .from("active_jobs")
          .select("job_id, status, carrier, market, planned_date, actual_date, snapshot_date")
          .order("job_id")
          .range(from, to),
      options.pageSize ?? DEFAULT_PAGE_SIZE
    );
  } catch (error) {
    console.warn(`[sync] Unable to load previous snapshot, deltas unavailable: ${describeError(error)}`, error);
    return null;
  }
}
