import { z } from "zod";

const FlatValue = z.union([z.string(), z.number(), z.boolean(), z.null(), z.date()]);

export const RawRecord = z.record(FlatValue.optional());
export const RawRecordBatch = z.array(RawRecord);

export const IsoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

export const ChainAlertSeverity = z.enum(["critical", "warning"]);
export const TrendDirection = z.enum(["improved", "worsened", "stable"]);

export const EnvConfig = z.object({
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),
  DOCKLINE_PAGE_SIZE: z.coerce.number().int().min(1).max(10_000).default(1000),
  DOCKLINE_STORE_TIMEOUT_MS: z.coerce.number().int().min(1).default(30_000),
  OTEL_SERVICE_NAME: z.string().min(1).default("dockline")
});

export type TRawRecord = z.infer<typeof RawRecord>;
export type TChainAlertSeverity = z.infer<typeof ChainAlertSeverity>;
export type TTrendDirection = z.infer<typeof TrendDirection>;
export type TEnvConfig = z.infer<typeof EnvConfig>;

export type { Database, Tables, TablesInsert, TablesUpdate, Json } from "./supabase.js";
