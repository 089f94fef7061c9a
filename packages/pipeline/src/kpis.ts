import type { TTrendDirection } from "@dockline/types";
import type { Tables, TablesInsert } from "@dockline/types/supabase";
import type { Job } from "./job.js";
import { addDaysIso, todayIsoDate } from "./dates.js";
import { StoreError, type StoreClient } from "./store.js";
import { mean, round1 } from "./values.js";

export type KpiSummary = {
  total_jobs: number;
  arrived_count: number;
  on_time_pct: number;
  avg_delay_days: number;
  overdue_count: number;
  ready_for_routing: number;
  avg_scans_per_job: number;
  jobs_with_scans: number;
};

export type CarrierKpi = {
  carrier: string;
  total_jobs: number;
  on_time_pct: number;
  avg_delay_days: number;
  overdue_count: number;
  ready_for_routing: number;
  avg_dwell_minutes: number | null;
  avg_lead_time_days: number | null;
};

export type DriverKpi = {
  driver: string;
  total_jobs: number;
  on_time_pct: number;
  avg_delay_days: number;
  overdue_count: number;
  avg_dwell_minutes: number | null;
  signature_rate_pct: number;
  markets: string[];
};

export type ArchivedDelivery = Pick<Tables<"job_archive">, "carrier" | "delay_days">;

export type CarrierHistory = { count: number; avg_delay: number; on_time_pct: number };

export type HistoricalKpis = {
  total_completed: number;
  avg_delivery_time_days: number;
  on_time_delivery_pct: number;
  carrier_breakdown: Record<string, CarrierHistory>;
};

export type KpiSnapshotRow = Tables<"kpi_snapshots">;

export type TrendMetric = "on_time_pct" | "avg_delay_days" | "overdue_count";

export type KpiTrend = {
  current: number;
  previous: number | null;
  direction: TTrendDirection;
};

export type KpiComparison = {
  previousReportDate: string | null;
  trends: Record<TrendMetric, KpiTrend>;
};

const PLACEHOLDER_NAMES = new Set(["", "unknown", "nan", "none"]);
const LOWER_IS_BETTER: ReadonlySet<TrendMetric> = new Set<TrendMetric>(["avg_delay_days", "overdue_count"]);

function isPlaceholder(name: string | null | undefined): boolean {
  return PLACEHOLDER_NAMES.has((name ?? "").trim().toLowerCase());
}

function percent(part: number, whole: number): number {
  return whole > 0 ? round1((part / whole) * 100) : 0;
}

function roundedMean(values: number[]): number | null {
  const value = mean(values);
  return value === null ? null : round1(value);
}

function groupBy<T>(items: readonly T[], keyOf: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return new Map([...groups].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

function isOverdue(job: Job, today: string): boolean {
  return !job.actual_date && job.planned_date !== null && job.planned_date < today;
}

function deliveryMeasures(jobs: readonly Job[], today: string) {
  const arrived = jobs.filter((job) => job.actual_date !== null);
  const delays = arrived.flatMap((job) => (job.delay_days === null ? [] : [job.delay_days]));
  const onTime = delays.filter((delay) => delay <= 0).length;
  const late = delays.filter((delay) => delay > 0);

  return {
    total_jobs: jobs.length,
    arrived_count: arrived.length,
    on_time_pct: percent(onTime, arrived.length),
    avg_delay_days: roundedMean(late) ?? 0,
    overdue_count: jobs.filter((job) => isOverdue(job, today)).length,
    ready_for_routing: arrived.filter((job) => !job.is_routed).length
  };
}

function nonNull(values: readonly (number | null)[]): number[] {
  return values.flatMap((value) => (value === null ? [] : [value]));
}

export function calculateKpis(jobs: readonly Job[], today: string = todayIsoDate()): KpiSummary {
  const measures = deliveryMeasures(jobs, today);
  return {
    ...measures,
    avg_scans_per_job: roundedMean(jobs.map((job) => job.scan_count)) ?? 0,
    jobs_with_scans: jobs.filter((job) => job.scan_count > 0).length
  };
}

/** Per-carrier measures; jobs with a placeholder carrier are left out. */
export function calculateCarrierKpis(jobs: readonly Job[], today: string = todayIsoDate()): CarrierKpi[] {
  const result: CarrierKpi[] = [];
  for (const [carrier, group] of groupBy(jobs, (job) => job.carrier.trim())) {
    if (isPlaceholder(carrier)) continue;
    const measures = deliveryMeasures(group, today);
    result.push({
      carrier,
      total_jobs: measures.total_jobs,
      on_time_pct: measures.on_time_pct,
      avg_delay_days: measures.avg_delay_days,
      overdue_count: measures.overdue_count,
      ready_for_routing: measures.ready_for_routing,
      avg_dwell_minutes: roundedMean(nonNull(group.map((job) => job.dwell_minutes))),
      avg_lead_time_days: roundedMean(nonNull(group.map((job) => job.lead_time_days)))
    });
  }
  return result;
}

export function calculateDriverKpis(jobs: readonly Job[], today: string = todayIsoDate()): DriverKpi[] {
  const result: DriverKpi[] = [];
  for (const [driver, group] of groupBy(jobs, (job) => job.assigned_driver.trim())) {
    if (isPlaceholder(driver)) continue;
    const measures = deliveryMeasures(group, today);
    const markets = [...new Set(group.map((job) => job.market.trim()))].filter((market) => !isPlaceholder(market));
    result.push({
      driver,
      total_jobs: measures.total_jobs,
      on_time_pct: measures.on_time_pct,
      avg_delay_days: measures.avg_delay_days,
      overdue_count: measures.overdue_count,
      avg_dwell_minutes: roundedMean(nonNull(group.map((job) => job.dwell_minutes))),
      signature_rate_pct: percent(group.filter((job) => job.signed_by.trim() !== "").length, group.length),
      markets
    });
  }
  return result.sort((a, b) => b.total_jobs - a.total_jobs);
}

/** Delivery performance over archived (completed) jobs. */
export function calculateHistoricalKpis(rows: readonly ArchivedDelivery[]): HistoricalKpis {
  const delays = nonNull(rows.map((row) => row.delay_days));
  const breakdown: Record<string, CarrierHistory> = {};

  for (const [carrier, group] of groupBy(rows, (row) => (row.carrier ?? "").trim())) {
    if (isPlaceholder(carrier)) continue;
    const carrierDelays = nonNull(group.map((row) => row.delay_days));
    breakdown[carrier] = {
      count: group.length,
      avg_delay: roundedMean(carrierDelays) ?? 0,
      on_time_pct: percent(carrierDelays.filter((delay) => delay <= 0).length, carrierDelays.length)
    };
  }

  return {
    total_completed: rows.length,
    avg_delivery_time_days: roundedMean(delays) ?? 0,
    on_time_delivery_pct: percent(delays.filter((delay) => delay <= 0).length, delays.length),
    carrier_breakdown: breakdown
  };
}

export async function persistKpis(client: StoreClient, reportDate: string, kpis: KpiSummary): Promise<void> {
  const row: TablesInsert<"kpi_snapshots"> = { report_date: reportDate, ...kpis };
  const { error } = await client.from("kpi_snapshots").upsert(row, { onConflict: "report_date" });
  if (error) {
    throw new StoreError("upsert", "kpi_snapshots", error);
  }
}

export async function persistCarrierKpis(
  client: StoreClient,
  reportDate: string,
  kpis: readonly CarrierKpi[]
): Promise<number> {
  if (kpis.length === 0) return 0;
  const rows: TablesInsert<"carrier_kpis">[] = kpis.map((kpi) => ({ report_date: reportDate, ...kpi }));
  const { error } = await client.from("carrier_kpis").upsert(rows, { onConflict: "report_date,carrier" });
  if (error) {
    throw new StoreError("upsert", "carrier_kpis", error);
  }
  return rows.length;
}

/** Stored daily KPI rows from `days` before `today` onwards, oldest first. */
export async function loadKpiHistory(
  client: StoreClient,
  options: { days?: number; today?: string } = {}
): Promise<KpiSnapshotRow[]> {
  const cutoff = addDaysIso(options.today ?? todayIsoDate(), -(options.days ?? 30));
  const { data, error } = await client
    .from("kpi_snapshots")
    .select("*")
    .gte("report_date", cutoff)
    .order("report_date", { ascending: true });
  if (error) {
    throw new StoreError("select", "kpi_snapshots", error);
  }
  return data ?? [];
}

function directionOf(metric: TrendMetric, current: number, previous: number): TTrendDirection {
  if (current === previous) return "stable";
  const rose = current > previous;
  return rose !== LOWER_IS_BETTER.has(metric) ? "improved" : "worsened";
}

/**
 * Trend of the headline KPIs against the latest stored report before
 * `reportDate`. Without one every trend is stable.
 */
export function compareWithHistory(
  current: KpiSummary,
  history: readonly Pick<KpiSnapshotRow, "report_date" | TrendMetric>[],
  reportDate: string
): KpiComparison {
  const previous = history
    .filter((row) => row.report_date < reportDate)
    .reduce<Pick<KpiSnapshotRow, "report_date" | TrendMetric> | null>(
      (latest, row) => (latest === null || row.report_date > latest.report_date ? row : latest),
      null
    );

  const trendOf = (metric: TrendMetric): KpiTrend => {
    const before = previous ? previous[metric] : null;
    return {
      current: current[metric],
      previous: before,
      direction: before === null ? "stable" : directionOf(metric, current[metric], before)
    };
  };
  const trends: Record<TrendMetric, KpiTrend> = {
    on_time_pct: trendOf("on_time_pct"),
    avg_delay_days: trendOf("avg_delay_days"),
    overdue_count: trendOf("overdue_count")
  };

  return { previousReportDate: previous ? previous.report_date : null, trends };
}
