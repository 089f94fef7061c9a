import { randomUUID } from "node:crypto";
import { annotateSuccess, withSpan } from "@dockline/utils/telemetry";
import type { FieldMap } from "./field-map.js";
import type { SnapshotJob } from "./job.js";
import { normalizeRecords, type RawRecord } from "./normalizer.js";
import { deduplicateJobs } from "./dedupe.js";
import { archiveCompletedJobs, loadActiveSnapshot, splitByCompletion, syncActiveJobs, type SyncResult } from "./sync.js";
import { carryForwardArrivals, compareSnapshots, countDeltas, type DeltaSet } from "./comparator.js";
import { detectChains, getChainAlerts, processJobChains, type ChainProcessingResult } from "./chains.js";
import { detectTransitions, persistTransitions, type StageTransition } from "./transitions.js";
import {
  calculateCarrierKpis,
  calculateKpis,
  persistCarrierKpis,
  persistKpis,
  type CarrierKpi,
  type KpiSummary
} from "./kpis.js";
import { todayIsoDate } from "./dates.js";
import type { StoreClient } from "./store.js";

export class EmptyImportError extends Error {
  constructor() {
    super("No records to import; nothing was written.");
    this.name = "EmptyImportError";
  }
}

export type ImportOptions = {
  /** Store to reconcile against. Without one only in-memory results are produced. */
  client?: StoreClient | null;
  /** Reads the store but writes nothing. */
  dryRun?: boolean;
  today?: string;
  now?: string;
  pageSize?: number;
  fieldMap?: Partial<FieldMap>;
  importId?: string;
};

export type AlertCounts = { critical: number; warning: number };

export type ImportSummary = {
  importId: string;
  reportDate: string;
  dryRun: boolean;
  storeConnected: boolean;
  processed: number;
  duplicatesRemoved: number;
  active: number;
  completed: number;
  archived: number;
  chainsDetected: number;
  sync: SyncResult | null;
  deltas: DeltaSet | null;
  chains: ChainProcessingResult | null;
  alerts: AlertCounts | null;
  transitionsDetected: number | null;
  transitionsRecorded: number | null;
  kpis: KpiSummary;
  carrierKpis: CarrierKpi[];
  errors: number;
};

type StepRunner = <T>(stage: string, step: () => Promise<T>) => Promise<T | null>;

function createStepRunner(importId: string, onFailure: () => void): StepRunner {
  return async (stage, step) => {
    try {
      return await withSpan(`dockline.import.${stage}`, { importId, stage }, () => step());
    } catch (error) {
      onFailure();
      console.error(`[import] ${stage} failed`, error);
      return null;
    }
  };
}

/**
 * Runs one import: normalize, dedupe, then reconcile with the store. Store
 * steps are isolated from each other; a failed step is counted in `errors`
 * and the run carries on.
 */
export async function runImport(records: readonly RawRecord[], options: ImportOptions = {}): Promise<ImportSummary> {
  if (records.length === 0) {
    throw new EmptyImportError();
  }

  const importId = options.importId ?? randomUUID();
  const reportDate = options.today ?? todayIsoDate();
  const now = options.now ?? new Date().toISOString();
  const dryRun = options.dryRun ?? false;
  const client = options.client ?? null;

  return withSpan("dockline.import", { importId, reportDate, dryRun }, async (span) => {
    let failedSteps = 0;
    const step = createStepRunner(importId, () => failedSteps++);

    let previous: SnapshotJob[] | null = null;
    if (client) {
      previous = await step("load-previous", async () => {
        const snapshot = await loadActiveSnapshot(client, { pageSize: options.pageSize });
        if (snapshot === null) {
          throw new Error("previous snapshot unavailable");
        }
        return snapshot;
      });
    }

    const normalized = normalizeRecords(records, { fieldMap: options.fieldMap });
    const batch = previous ? carryForwardArrivals(normalized, previous) : normalized;
    const { jobs, removed } = deduplicateJobs(batch);
    const { active, completed } = splitByCompletion(jobs);
    const kpis = calculateKpis(jobs, reportDate);

    const summary: ImportSummary = {
      importId,
      reportDate,
      dryRun,
      storeConnected: client !== null,
      processed: batch.length,
      duplicatesRemoved: removed,
      active: active.length,
      completed: completed.length,
      archived: 0,
      chainsDetected: detectChains(batch).size,
      sync: null,
      deltas: null,
      chains: null,
      alerts: null,
      transitionsDetected: null,
      transitionsRecorded: null,
      kpis,
      carrierKpis: calculateCarrierKpis(jobs, reportDate),
      errors: 0
    };

    if (client) {
      let transitions: StageTransition[] = [];
      if (previous) {
        summary.deltas = compareSnapshots(jobs, previous, { today: reportDate });
        transitions = detectTransitions(jobs, previous, { now });
        summary.transitionsDetected = transitions.length;
      }

      if (!dryRun) {
        summary.sync = await step("sync", () => syncActiveJobs(client, active, { snapshotDate: reportDate, pageSize: options.pageSize }));
        summary.errors += summary.sync?.errors ?? 0;

        const archive = await step("archive", () => archiveCompletedJobs(client, completed, { completedAt: now }));
        summary.archived = archive?.archived ?? 0;
        summary.errors += archive?.errors ?? 0;

        // Chains see the batch before dedupe; dedupe keeps one job per serial.
        summary.chains = await step("chains", () => processJobChains(client, batch, { today: reportDate, now }));
        summary.errors += summary.chains?.errors ?? 0;

        if (previous) {
          summary.transitionsRecorded = await step("transitions", () => persistTransitions(client, transitions));
        }

        await step("kpis", async () => {
          await persistKpis(client, reportDate, kpis);
          await persistCarrierKpis(client, reportDate, summary.carrierKpis);
        });
      }

      const alerts = await step("alerts", () => getChainAlerts(client, { pageSize: options.pageSize }));
      if (alerts) {
        summary.alerts = {
          critical: alerts.filter((alert) => alert.severity === "critical").length,
          warning: alerts.filter((alert) => alert.severity === "warning").length
        };
      }
    }
    summary.errors += failedSteps;

    annotateSuccess(span, {
      processed: summary.processed,
      active: summary.active,
      completed: summary.completed,
      errors: summary.errors
    });
    console.info(
      `[import] ${importId} processed ${summary.processed} records (${summary.active} active, ${summary.completed} completed, ${summary.errors} errors)`
    );
    return summary;
  });
}

function unavailable<T>(value: T | null, render: (value: T) => string): string {
  return value === null ? "unavailable" : render(value);
}

export function formatImportSummary(summary: ImportSummary): string {
  const lines = [
    `Import ${summary.importId} for ${summary.reportDate}${summary.dryRun ? " (dry run)" : ""}`,
    `  Records processed:   ${summary.processed}`,
    `  Duplicates removed:  ${summary.duplicatesRemoved}`,
    `  Active jobs:         ${summary.active}`,
    `  Completed jobs:      ${summary.completed} (${summary.archived} archived)`,
    `  Sync:                ${unavailable(summary.sync, (sync) => `${sync.deleted} deleted, ${sync.inserted} inserted`)}`,
    `  Deltas:              ${unavailable(
      summary.deltas,
      (deltas) =>
        `${countDeltas(deltas)} (${deltas.new_jobs.length} new, ${deltas.new_arrivals.length} arrived, ` +
        `${deltas.new_deliveries.length} delivered, ${deltas.new_overdue.length} overdue)`
    )}`,
    `  Chains:              ${unavailable(
      summary.chains,
      (chains) => `${chains.chainsProcessed} processed, ${chains.newChainsCreated} new, ${chains.jobsLinked} jobs linked`
    )} [${summary.chainsDetected} detected]`,
    `  Alerts:              ${unavailable(summary.alerts, (alerts) => `${alerts.critical} critical, ${alerts.warning} warning`)}`,
    `  Transitions:         ${unavailable(summary.transitionsDetected, String)} detected, ${unavailable(
      summary.transitionsRecorded,
      String
    )} recorded`,
    `  On-time:             ${summary.kpis.on_time_pct}% of ${summary.kpis.arrived_count} arrived`,
    `  Overdue:             ${summary.kpis.overdue_count}`,
    `  Errors:              ${summary.errors}`
  ];
  return lines.join("\n");
}
