import { readFileSync } from "node:fs";
import { ZodError } from "zod";
import { RawRecordBatch, type TRawRecord } from "@dockline/types";
import type { DocklineConfig } from "@dockline/utils/config";
import { getServiceSupabaseClient, SupabaseServiceConfigurationError } from "@dockline/utils/supabase-service";
import type { ChainAlert, KpiComparison, StageDwell, StoreClient, TrendMetric } from "@dockline/pipeline";

export class RecordFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RecordFileError";
  }
}

/** Parses a JSON array of flat export records. */
export function parseRecordFile(text: string, source: string): TRawRecord[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new RecordFileError(`${source} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  try {
    return RawRecordBatch.parse(parsed);
  } catch (error) {
    if (error instanceof ZodError) {
      const first = error.issues[0];
      const where = first ? first.path.join(".") || "(root)" : "(root)";
      throw new RecordFileError(`${source} must be an array of flat records (${where}: ${first?.message ?? "invalid"})`);
    }
    throw error;
  }
}

export function loadRecordFile(path: string): TRawRecord[] {
  return parseRecordFile(readFileSync(path, "utf8"), path);
}

/**
 * Store client for the loaded config. When the store is optional and not
 * configured the caller runs without one.
 */
export function resolveStoreClient(config: DocklineConfig, options: { required: boolean }): StoreClient | null {
  try {
    return getServiceSupabaseClient(config);
  } catch (error) {
    if (!options.required && error instanceof SupabaseServiceConfigurationError) {
      console.warn(`[cli] ${error.message} Continuing without the store.`);
      return null;
    }
    throw error;
  }
}

export function formatAlerts(alerts: readonly ChainAlert[]): string {
  if (alerts.length === 0) {
    return "No chain alerts.";
  }
  return alerts
    .map(
      (alert) =>
        `[${alert.severity.toUpperCase()}] ${alert.product_serial} (${alert.carrier ?? "Unknown"}): ${alert.message}` +
        ` - current job ${alert.current_job_id ?? "n/a"} ${alert.current_status ?? ""}`.trimEnd()
    )
    .join("\n");
}

export function formatDwell(stages: readonly StageDwell[]): string {
  if (stages.length === 0) {
    return "No completed stage transitions yet.";
  }
  return stages
    .map(
      (stage) =>
        `${stage.stage}: avg ${stage.avg_hours}h (min ${stage.min_hours}h, max ${stage.max_hours}h, n=${stage.sample_size})`
    )
    .join("\n");
}

const TREND_LABELS: ReadonlyArray<[TrendMetric, string]> = [
  ["on_time_pct", "On-time %"],
  ["avg_delay_days", "Avg delay (days)"],
  ["overdue_count", "Overdue"]
];

export function formatTrends(reportDate: string, comparison: KpiComparison): string {
  const header = comparison.previousReportDate
    ? `KPI trends for ${reportDate} vs ${comparison.previousReportDate}`
    : `KPI trends for ${reportDate} (no earlier report)`;
  const lines = TREND_LABELS.map(([metric, label]) => {
    const trend = comparison.trends[metric];
    const previous = trend.previous === null ? "-" : String(trend.previous);
    return `  ${label}: ${trend.current} (was ${previous}) ${trend.direction}`;
  });
  return [header, ...lines].join("\n");
}
