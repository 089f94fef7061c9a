import type { TChainAlertSeverity } from "@dockline/types";
import type { Tables, TablesInsert } from "@dockline/types/supabase";
import { hasSerial, isCompletedStatus, isRescheduledStatus, type Job } from "./job.js";
import { calendarDateOf, daysBetween, todayIsoDate } from "./dates.js";
import { DEFAULT_PAGE_SIZE, fetchAllPages, StoreError, type StoreClient } from "./store.js";

export type ChainRow = Tables<"chains">;

/** The slice of a job a chain needs, whether it comes from the batch or from stored members. */
export type ChainEntry = Pick<Job, "job_id" | "status" | "planned_date" | "actual_date" | "delay_days">;

export type ChainMetrics = {
  total_jobs: number;
  reschedule_count: number;
  first_planned_date: string | null;
  final_planned_date: string | null;
  total_delay_days: number;
  current_status: string | null;
  current_job_id: string | null;
};

export type ChainProcessingResult = {
  chainsProcessed: number;
  newChainsCreated: number;
  jobsLinked: number;
  errors: number;
};

export type ChainProcessingOptions = {
  today?: string;
  /** Run timestamp stamped on new chains, member links and chain updates. */
  now?: string;
};

export type ChainAlert = {
  chain_id: string;
  product_serial: string;
  carrier: string | null;
  reschedule_count: number;
  total_delay_days: number;
  current_status: string | null;
  current_job_id: string | null;
  severity: TChainAlertSeverity;
  message: string;
};

export type ChainGrade = { severity: TChainAlertSeverity; message: string };

const CRITICAL_RESCHEDULES = 3;
const WARNING_RESCHEDULES = 2;
const WARNING_DELAY_DAYS = 14;

/** Planned date ascending, undated entries last, job_id breaking ties. */
export function compareChainEntries(a: ChainEntry, b: ChainEntry): number {
  if (a.planned_date !== b.planned_date) {
    if (a.planned_date === null) return 1;
    if (b.planned_date === null) return -1;
    return a.planned_date < b.planned_date ? -1 : 1;
  }
  if (a.job_id === b.job_id) return 0;
  return a.job_id < b.job_id ? -1 : 1;
}

/** Groups jobs by product serial, keeping serials seen on two or more jobs. */
export function detectChains(jobs: readonly Job[]): Map<string, Job[]> {
  const groups = new Map<string, Job[]>();
  for (const job of jobs) {
    if (!hasSerial(job)) continue;
    const serial = job.product_serial.trim();
    const group = groups.get(serial);
    if (group) {
      group.push(job);
    } else {
      groups.set(serial, [job]);
    }
  }

  const chains = new Map<string, Job[]>();
  for (const [serial, group] of groups) {
    if (group.length > 1) {
      chains.set(serial, [...group].sort(compareChainEntries));
    }
  }
  return chains;
}

export function calculateChainMetrics(entries: readonly ChainEntry[], today: string = todayIsoDate()): ChainMetrics {
  const ordered = [...entries].sort(compareChainEntries);
  const planned = ordered.flatMap((entry) => (entry.planned_date ? [entry.planned_date] : []));
  const first = planned.at(0) ?? null;
  const final = planned.at(-1) ?? null;
  const current = ordered.filter((entry) => entry.planned_date !== null).at(-1) ?? ordered.at(-1);

  const elapsed = first ? daysBetween(today, calendarDateOf(first) ?? first) : null;

  return {
    total_jobs: ordered.length,
    reschedule_count: ordered.filter((entry) => isRescheduledStatus(entry.status)).length,
    first_planned_date: first,
    final_planned_date: final,
    total_delay_days: Math.max(0, elapsed ?? 0),
    current_status: current ? current.status : null,
    current_job_id: current ? current.job_id : null
  };
}

async function findOrCreateChain(
  client: StoreClient,
  serial: string,
  carrier: string,
  now: string
): Promise<{ chainId: string; created: boolean }> {
  const existing = await client.from("chains").select("chain_id").eq("product_serial", serial).maybeSingle();
  if (existing.error) {
    throw new StoreError("select", "chains", existing.error);
  }
  if (existing.data) {
    return { chainId: existing.data.chain_id, created: false };
  }

  const inserted = await client
    .from("chains")
    .insert({ product_serial: serial, carrier, total_jobs: 0, reschedule_count: 0, created_at: now, updated_at: now })
    .select("chain_id")
    .single();
  if (inserted.error) {
    throw new StoreError("insert", "chains", inserted.error);
  }
  return { chainId: inserted.data.chain_id, created: true };
}

async function loadMembers(client: StoreClient, chainId: string): Promise<ChainEntry[]> {
  const { data, error } = await client
    .from("chain_members")
    .select("job_id, status, planned_date, actual_date, delay_days")
    .eq("chain_id", chainId);
  if (error) {
    throw new StoreError("select", "chain_members", error);
  }
  return (data ?? []).map((row) => ({
    job_id: row.job_id,
    status: row.status ?? "",
    planned_date: row.planned_date,
    actual_date: row.actual_date,
    delay_days: row.delay_days
  }));
}

function toMemberRows(chainId: string, entries: readonly ChainEntry[], now: string): TablesInsert<"chain_members">[] {
  return entries.map((entry, index) => ({
    chain_id: chainId,
    job_id: entry.job_id,
    sequence_order: index + 1,
    status: entry.status || null,
    planned_date: entry.planned_date,
    actual_date: entry.actual_date,
    delay_days: entry.delay_days,
    reschedule_reason: null,
    linked_at: now
  }));
}

async function processChain(
  client: StoreClient,
  serial: string,
  group: readonly Job[],
  today: string,
  now: string
): Promise<{ created: boolean; linked: number }> {
  const { chainId, created } = await findOrCreateChain(client, serial, group[0]?.carrier ?? "Unknown", now);

  // Members linked on earlier imports stay in the chain; this batch's data wins per job.
  const merged = new Map<string, ChainEntry>();
  for (const entry of await loadMembers(client, chainId)) {
    merged.set(entry.job_id, entry);
  }
  for (const job of group) {
    merged.set(job.job_id, job);
  }
  const members = [...merged.values()].sort(compareChainEntries);

  const linked = await client
    .from("chain_members")
    .upsert(toMemberRows(chainId, members, now), { onConflict: "chain_id,job_id" });
  if (linked.error) {
    throw new StoreError("upsert", "chain_members", linked.error);
  }

  const metrics = calculateChainMetrics(members, today);
  const updated = await client
    .from("chains")
    .update({ ...metrics, updated_at: now })
    .eq("chain_id", chainId);
  if (updated.error) {
    throw new StoreError("update", "chains", updated.error);
  }

  return { created, linked: group.length };
}

/**
 * Links jobs sharing a product serial into persisted chains and refreshes each
 * chain's aggregates. A failing serial is logged and counted; the rest proceed.
 */
export async function processJobChains(
  client: StoreClient,
  jobs: readonly Job[],
  options: ChainProcessingOptions = {}
): Promise<ChainProcessingResult> {
  const today = options.today ?? todayIsoDate();
  const now = options.now ?? new Date().toISOString();
  const result: ChainProcessingResult = { chainsProcessed: 0, newChainsCreated: 0, jobsLinked: 0, errors: 0 };

  for (const [serial, group] of detectChains(jobs)) {
    try {
      const { created, linked } = await processChain(client, serial, group, today, now);
      if (created) result.newChainsCreated++;
      result.jobsLinked += linked;
      result.chainsProcessed++;
    } catch (error) {
      result.errors++;
      console.warn(`[chains] Failed to process chain for serial ${serial}`, error);
    }
  }

  console.info(
    `[chains] Processed ${result.chainsProcessed} chains, ${result.jobsLinked} jobs linked, ${result.newChainsCreated} new`
  );
  return result;
}

export function gradeChain(chain: Pick<ChainRow, "reschedule_count" | "total_delay_days">): ChainGrade | null {
  const { reschedule_count: reschedules, total_delay_days: delay } = chain;
  if (reschedules >= CRITICAL_RESCHEDULES) {
    return { severity: "critical", message: `Product rescheduled ${reschedules} times - investigate carrier` };
  }
  if (reschedules >= WARNING_RESCHEDULES) {
    return { severity: "warning", message: `Product rescheduled ${reschedules} times` };
  }
  if (delay >= WARNING_DELAY_DAYS) {
    return { severity: "warning", message: `Product delayed ${delay} days from original planned date` };
  }
  return null;
}

/** Alerts for open chains, most rescheduled first. */
export async function getChainAlerts(
  client: StoreClient,
  options: { pageSize?: number } = {}
): Promise<ChainAlert[]> {
  const chains = await fetchAllPages(
    "chains",
    (from, to) => client.from("chains").select("*").order("chain_id").range(from, to),
    options.pageSize ?? DEFAULT_PAGE_SIZE
  );

  const alerts: ChainAlert[] = [];
  for (const chain of chains) {
    if (isCompletedStatus(chain.current_status)) continue;
    const grade = gradeChain(chain);
    if (!grade) continue;
    alerts.push({
      chain_id: chain.chain_id,
      product_serial: chain.product_serial,
      carrier: chain.carrier,
      reschedule_count: chain.reschedule_count,
      total_delay_days: chain.total_delay_days,
      current_status: chain.current_status,
      current_job_id: chain.current_job_id,
      ...grade
    });
  }

  return alerts.sort(
    (a, b) => b.reschedule_count - a.reschedule_count || b.total_delay_days - a.total_delay_days
  );
}
