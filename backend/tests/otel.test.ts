import { describe, it, expect, vi } from "vitest";
import { isUntracedRequest, pickInstrumentations, withSpan } from "../src/config/otel";

describe("tracing setup", () => {
  it("keeps only the http, fastify and mysql2 instrumentations", () => {
    const all = [
      { instrumentationName: "@opentelemetry/instrumentation-fs" },
      { instrumentationName: "@opentelemetry/instrumentation-http" },
      { instrumentationName: "@opentelemetry/instrumentation-pg" },
      { instrumentationName: "@opentelemetry/instrumentation-mysql2" },
      { instrumentationName: "@opentelemetry/instrumentation-fastify" }
    ];

    expect(pickInstrumentations(all).map((i) => i.instrumentationName)).toEqual([
      "@opentelemetry/instrumentation-http",
      "@opentelemetry/instrumentation-mysql2",
      "@opentelemetry/instrumentation-fastify"
    ]);
  });

  it("leaves scrapes and health probes untraced", () => {
    expect(isUntracedRequest("/metrics")).toBe(true);
    expect(isUntracedRequest("/api/health")).toBe(true);
    expect(isUntracedRequest("/api/agents/view-generator")).toBe(false);
    expect(isUntracedRequest(undefined)).toBe(false);
  });
});

describe("withSpan", () => {
  it("returns the stage result and describes it", async () => {
    const describeResult = vi.fn((n: number) => ({ "schema.tables": n }));

    await expect(withSpan("views.inspectSchema", async () => 4, { describe: describeResult })).resolves.toBe(4);
    expect(describeResult).toHaveBeenCalledWith(4);
  });

  it("propagates stage failures", async () => {
    await expect(
      withSpan("views.connect", async () => {
        throw new Error("connect ECONNREFUSED");
      })
    ).rejects.toThrow("connect ECONNREFUSED");
  });
});
