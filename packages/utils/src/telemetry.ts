import { context, SpanStatusCode, trace, type Attributes, type Span } from "@opentelemetry/api";
import { loadConfig, type DocklineConfig } from "./config.js";

const ATTRIBUTE_PREFIX = "dockline";

export type ImportRunMetadata = {
  importId?: string;
  reportDate?: string;
  dryRun?: boolean;
  stage?: string;
};

let tracerName: string | null = null;

/** Names the tracer after the configured service. Read from the environment on first use otherwise. */
export function configureTelemetry(config: Pick<DocklineConfig, "serviceName">) {
  tracerName = config.serviceName;
}

export function getTracer() {
  tracerName ??= loadConfig().serviceName;
  return trace.getTracer(tracerName);
}

export function buildRunAttributes(metadata: ImportRunMetadata = {}): Attributes {
  const attributes: Attributes = {};
  if (metadata.importId) {
    attributes[`${ATTRIBUTE_PREFIX}.importId`] = metadata.importId;
  }
  if (metadata.reportDate) {
    attributes[`${ATTRIBUTE_PREFIX}.reportDate`] = metadata.reportDate;
  }
  if (metadata.dryRun !== undefined) {
    attributes[`${ATTRIBUTE_PREFIX}.dryRun`] = metadata.dryRun;
  }
  if (metadata.stage) {
    attributes[`${ATTRIBUTE_PREFIX}.stage`] = metadata.stage;
  }
  return attributes;
}

export function recordSpanError(span: Span, error: unknown) {
  const exception = error instanceof Error ? error : new Error(String(error));
  span.recordException(exception);
  span.setStatus({ code: SpanStatusCode.ERROR, message: exception.message });
}

/** Runs `fn` inside a span tagged with the import run; a thrown error marks the span failed and is rethrown. */
export async function withSpan<T>(
  name: string,
  run: ImportRunMetadata,
  fn: (span: Span) => Promise<T> | T
): Promise<T> {
  const span = getTracer().startSpan(name, { attributes: buildRunAttributes(run) });
  try {
    return await context.with(trace.setSpan(context.active(), span), () => fn(span));
  } catch (error) {
    recordSpanError(span, error);
    throw error;
  } finally {
    span.end();
  }
}

/** Records the run's final counts as `dockline.<name>` attributes and marks the span OK. */
export function annotateSuccess(span: Span, counts: Readonly<Record<string, number>>) {
  for (const [name, value] of Object.entries(counts)) {
    span.setAttribute(`${ATTRIBUTE_PREFIX}.${name}`, value);
  }
  span.setStatus({ code: SpanStatusCode.OK });
}
