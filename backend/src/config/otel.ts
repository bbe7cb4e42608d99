// Observability: tracing for the view generator
import { context, trace, type Attributes } from "@opentelemetry/api";

import { NodeSDK } from "@opentelemetry/sdk-node";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { Resource } from "@opentelemetry/resources";
import { SemanticResourceAttributes } from "@opentelemetry/semantic-conventions";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import type { IncomingMessage } from "node:http";
import { AGENT_NAME } from "./constants";

const SERVICE_NAME = "heatwave-view-generator";

// Instrumentations kept from the auto-instrumentation bundle.
export const TRACED_INSTRUMENTATIONS = new Set([
  "@opentelemetry/instrumentation-http",
  "@opentelemetry/instrumentation-fastify",
  "@opentelemetry/instrumentation-mysql2"
]);

export function pickInstrumentations<T extends { instrumentationName: string }>(all: T[]): T[] {
  return all.filter((i) => TRACED_INSTRUMENTATIONS.has(i.instrumentationName));
}

// Scrapes and health probes would otherwise produce a trace every few seconds.
export function isUntracedRequest(url: string | undefined): boolean {
  return url === "/metrics" || url === "/api/health";
}

/**
 * Enabled with ENABLE_OTEL=true. OTEL_SERVICE_NAME and
 * OTEL_EXPORTER_OTLP_ENDPOINT override the defaults.
 */
if (process.env.ENABLE_OTEL === "true") {
  const serviceName = process.env.OTEL_SERVICE_NAME || SERVICE_NAME;

  const sdk = new NodeSDK({
    resource: new Resource({
      [SemanticResourceAttributes.SERVICE_NAME]: serviceName,
      "agent.name": AGENT_NAME
    }),
    traceExporter: new OTLPTraceExporter({
      url: process.env.OTEL_EXPORTER_OTLP_ENDPOINT || "http://localhost:4318/v1/traces"
    }),
    instrumentations: pickInstrumentations(
      getNodeAutoInstrumentations({
        "@opentelemetry/instrumentation-http": {
          ignoreIncomingRequestHook: (req: IncomingMessage) => isUntracedRequest(req.url)
        }
      })
    )
  });

  try {
    sdk.start();
    console.log(`[otel] tracing ${[...TRACED_INSTRUMENTATIONS].join(", ")} for ${serviceName}`);
  } catch (err) {
    console.error("[otel] NodeSDK start failed", err);
  }

  process.once("SIGTERM", () => {
    sdk.shutdown().catch((err: unknown) => console.error("[otel] NodeSDK shutdown error", err));
  });
}

export const tracer = trace.getTracer(SERVICE_NAME);

export interface StageSpanOptions<T> {
  attrs?: Attributes;
  /** Attributes derived from the stage's result, set before the span ends. */
  describe?: (result: T) => Attributes;
}

/**
 * Runs one agent stage inside a span tagged with the agent and stage names.
 * The stage name is everything after the `views.` prefix.
 */
export async function withSpan<T>(
  name: string,
  fn: () => Promise<T> | T,
  options: StageSpanOptions<T> = {}
): Promise<T> {
  return await tracer.startActiveSpan(name, async (span) => {
    span.setAttributes({
      "agent.name": AGENT_NAME,
      "agent.stage": name.replace(/^views\./, ""),
      ...options.attrs
    });
    try {
      const result = await fn();
      if (options.describe) span.setAttributes(options.describe(result));
      return result;
    } catch (e) {
      span.recordException(e instanceof Error ? e : String(e));
      span.setAttribute("error", true);
      throw e;
    } finally {
      span.end();
    }
  });
}

export function addEvent(name: string, attrs?: Attributes) {
  trace.getSpan(context.active())?.addEvent(name, attrs);
}
