#!/usr/bin/env tsx
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { IsoDate } from "@dockline/types";
import {
  compareWithHistory,
  computeStageDwellTimes,
  formatImportSummary,
  getChainAlerts,
  loadKpiHistory,
  loadTransitions,
  runImport
} from "@dockline/pipeline";
import { loadConfig } from "@dockline/utils/config";
import { configureTelemetry } from "@dockline/utils/telemetry";
import { formatAlerts, formatDwell, formatTrends, loadRecordFile, resolveStoreClient } from "./commands.js";

async function main() {
  const config = loadConfig();
  configureTelemetry(config);
  const { pageSize } = config;

  await yargs(hideBin(process.argv))
    .scriptName("dockline")
    .command(
      "import",
      "Import a JSON export of delivery jobs",
      (y) =>
        y
          .option("file", { type: "string", demandOption: true, describe: "JSON array of flat export records" })
          .option("dry-run", { type: "boolean", default: false, describe: "Read the store but write nothing" })
          .option("today", { type: "string", describe: "Report date (YYYY-MM-DD)", coerce: (value: string) => IsoDate.parse(value) }),
      async (argv) => {
        const records = loadRecordFile(argv.file);
        const client = resolveStoreClient(config, { required: false });
        const summary = await runImport(records, { client, dryRun: argv["dry-run"], today: argv.today, pageSize });
        console.log(formatImportSummary(summary));
      }
    )
    .command("alerts", "List reschedule chain alerts", {}, async () => {
      const client = resolveStoreClient(config, { required: true });
      if (!client) return;
      console.log(formatAlerts(await getChainAlerts(client, { pageSize })));
    })
    .command("dwell", "Average hours jobs spend in each stage", {}, async () => {
      const client = resolveStoreClient(config, { required: true });
      if (!client) return;
      console.log(formatDwell(computeStageDwellTimes(await loadTransitions(client, { pageSize }))));
    })
    .command(
      "trends",
      "Compare the latest KPI report with the one before it",
      (y) => y.option("days", { type: "number", default: 7, describe: "How many days of history to read" }),
      async (argv) => {
        const client = resolveStoreClient(config, { required: true });
        if (!client) return;
        const history = await loadKpiHistory(client, { days: argv.days });
        const latest = history.at(-1);
        if (!latest) {
          console.log(`No KPI history in the last ${argv.days} days.`);
          return;
        }
        console.log(formatTrends(latest.report_date, compareWithHistory(latest, history, latest.report_date)));
      }
    )
    .demandCommand(1)
    .strict()
    .fail((message, error) => {
      throw error ?? new Error(message);
    })
    .help()
    .parseAsync();
}

main().catch((error: unknown) => {
  console.error("[cli]", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
