import type { Tables, TablesInsert } from "@dockline/types/supabase";
import type { Job, SnapshotJob } from "./job.js";
import { hoursBetween } from "./dates.js";
import { chunk, DEFAULT_PAGE_SIZE, fetchAllPages, StoreError, type StoreClient } from "./store.js";
import { round1 } from "./values.js";

export type StageTransition = {
  job_id: string;
  from_status: string | null;
  to_status: string;
  transitioned_at: string;
};

export type StageDwell = {
  stage: string;
  avg_hours: number;
  min_hours: number;
  max_hours: number;
  sample_size: number;
};

export type TransitionOptions = {
  now?: string;
};

const UPSERT_CHUNK_SIZE = 500;

/**
 * Emits a transition for every job whose status changed since the previous
 * snapshot, and an initial one (`from_status` null) for jobs it lacks.
 * Status comparison ignores case and surrounding whitespace.
 */
export function detectTransitions(
  current: readonly Job[],
  previous: readonly SnapshotJob[] | null,
  options: TransitionOptions = {}
): StageTransition[] {
  const transitionedAt = options.now ?? new Date().toISOString();
  const previousStatus = new Map<string, string>();
  for (const row of previous ?? []) {
    previousStatus.set(String(row.job_id), (row.status ?? "").trim());
  }

  const transitions: StageTransition[] = [];
  for (const job of current) {
    const status = job.status.trim();
    if (!job.job_id || !status) continue;

    const before = previousStatus.get(job.job_id);
    if (before === undefined) {
      transitions.push({ job_id: job.job_id, from_status: null, to_status: status, transitioned_at: transitionedAt });
    } else if (before.toLowerCase() !== status.toLowerCase()) {
      transitions.push({ job_id: job.job_id, from_status: before, to_status: status, transitioned_at: transitionedAt });
    }
  }
  return transitions;
}

/**
 * Stores transitions, ignoring any (job_id, to_status) already recorded so the
 * first time a job reached a stage is kept. Returns the number of new rows.
 */
export async function persistTransitions(client: StoreClient, transitions: readonly StageTransition[]): Promise<number> {
  let recorded = 0;
  const rows: readonly TablesInsert<"stage_transitions">[] = transitions;

  for (const slice of chunk(rows, UPSERT_CHUNK_SIZE)) {
    const { data, error } = await client
      .from("stage_transitions")
      .upsert(slice, { onConflict: "job_id,to_status", ignoreDuplicates: true })
      .select("id");
    if (error) {
      throw new StoreError("upsert", "stage_transitions", error);
    }
    recorded += data?.length ?? 0;
  }
  return recorded;
}

export async function loadTransitions(
  client: StoreClient,
  options: { pageSize?: number } = {}
): Promise<Tables<"stage_transitions">[]> {
  return fetchAllPages(
    "stage_transitions",
    (from, to) => client.from("stage_transitions").select("*").order("id").range(from, to),
    options.pageSize ?? DEFAULT_PAGE_SIZE
  );
}

/**
 * Hours spent in each stage: the gap between a job entering a stage and its
 * next later transition. Stages a job is still in contribute nothing.
 */
export function computeStageDwellTimes(transitions: readonly StageTransition[]): StageDwell[] {
  const byJob = new Map<string, StageTransition[]>();
  for (const transition of transitions) {
    const list = byJob.get(transition.job_id);
    if (list) {
      list.push(transition);
    } else {
      byJob.set(transition.job_id, [transition]);
    }
  }

  const samples = new Map<string, number[]>();
  for (const list of byJob.values()) {
    const ordered = [...list].sort((a, b) => a.transitioned_at.localeCompare(b.transitioned_at));
    for (let index = 0; index < ordered.length - 1; index++) {
      const entered = ordered[index];
      const left = ordered.slice(index + 1).find((next) => next.transitioned_at > entered.transitioned_at);
      if (!left) continue;
      const hours = hoursBetween(left.transitioned_at, entered.transitioned_at);
      if (hours === null) continue;
      const stageSamples = samples.get(entered.to_status) ?? [];
      stageSamples.push(hours);
      samples.set(entered.to_status, stageSamples);
    }
  }

  const dwell: StageDwell[] = [];
  for (const [stage, hours] of samples) {
    dwell.push({
      stage,
      avg_hours: round1(hours.reduce((total, value) => total + value, 0) / hours.length),
      min_hours: round1(Math.min(...hours)),
      max_hours: round1(Math.max(...hours)),
      sample_size: hours.length
    });
  }
  return dwell.sort((a, b) => b.avg_hours - a.avg_hours);
}
