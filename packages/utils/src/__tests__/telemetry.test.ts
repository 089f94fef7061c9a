import { afterEach, describe, expect, it, vi } from "vitest";
import { INVALID_SPAN_CONTEXT, SpanStatusCode, trace } from "@opentelemetry/api";
import { annotateSuccess, buildRunAttributes, configureTelemetry, recordSpanError, withSpan } from "../telemetry.js";

afterEach(() => {
  vi.restoreAllMocks();
});

function recordingSpan() {
  const span = trace.wrapSpanContext(INVALID_SPAN_CONTEXT);
  return {
    span,
    setAttribute: vi.spyOn(span, "setAttribute"),
    setStatus: vi.spyOn(span, "setStatus"),
    recordException: vi.spyOn(span, "recordException")
  };
}

describe("buildRunAttributes", () => {
  it("prefixes the run metadata that is set", () => {
    expect(buildRunAttributes({ importId: "imp-1", dryRun: false, stage: "sync" })).toEqual({
      "dockline.importId": "imp-1",
      "dockline.dryRun": false,
      "dockline.stage": "sync"
    });
    expect(buildRunAttributes()).toEqual({});
  });
});

describe("configureTelemetry", () => {
  it("names the tracer after the configured service", async () => {
    const getTracer = vi.spyOn(trace, "getTracer");
    configureTelemetry({ serviceName: "dockline-test" });

    await withSpan("test.span", {}, () => undefined);

    expect(getTracer).toHaveBeenCalledWith("dockline-test");
  });
});

describe("withSpan", () => {
  it("returns the callback result", async () => {
    await expect(withSpan("test.span", { importId: "imp-1" }, async () => 42)).resolves.toBe(42);
  });

  it("rethrows callback errors", async () => {
    await expect(
      withSpan("test.span", {}, () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
  });
});

describe("span annotations", () => {
  it("prefixes the run counts and marks the span OK", () => {
    const { span, setAttribute, setStatus } = recordingSpan();

    annotateSuccess(span, { processed: 3, errors: 0 });

    expect(setAttribute.mock.calls).toEqual([
      ["dockline.processed", 3],
      ["dockline.errors", 0]
    ]);
    expect(setStatus).toHaveBeenCalledWith({ code: SpanStatusCode.OK });
  });

  it("records thrown values that are not errors as errors", () => {
    const { span, recordException, setStatus } = recordingSpan();

    recordSpanError(span, "store offline");

    expect(recordException).toHaveBeenCalledWith(new Error("store offline"));
    expect(setStatus).toHaveBeenCalledWith({ code: SpanStatusCode.ERROR, message: "store offline" });
  });
});
