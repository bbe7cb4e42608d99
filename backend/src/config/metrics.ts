import { register, Counter, Histogram } from "prom-client";

// General Metrics
export const requestCounter = new Counter({
  name: "view_generator_requests_total",
  help: "Total view generator HTTP requests",
  labelNames: ["route", "status_code"],
});

// Agent Metrics
export const agentRunsCounter = new Counter({
  name: "view_generator_runs_total",
  help: "Total view generator agent runs.",
  labelNames: ["status"],
});

export const agentRunDurationHistogram = new Histogram({
  name: "view_generator_run_duration_seconds",
  help: "View generator agent run latency",
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30],
});

// View Lifecycle Metrics
export const viewsCreatedCounter = new Counter({
  name: "analytics_views_created_total",
  help: "Total number of analytical views created.",
});

export const viewCreationFailuresCounter = new Counter({
  name: "analytics_view_creation_failures_total",
  help: "Total number of failed analytical view creations.",
});

export const accelerationFailuresCounter = new Counter({
  name: "heatwave_acceleration_failures_total",
  help: "Total number of views that could not be loaded into the secondary engine.",
});

export const viewOptimizationsCounter = new Counter({
  name: "analytics_view_optimizations_total",
  help: "Total number of existing-view optimization attempts.",
  labelNames: ["outcome"],
});

export const viewBenchmarkHistogram = new Histogram({
  name: "analytics_view_benchmark_seconds",
  help: "Latency of the COUNT(*) benchmark per view.",
  labelNames: ["rating"],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
});

// Expose metrics endpoint
export async function getMetrics() {
  return await register.metrics();
}

export function getContentType() {
  return register.contentType;
}
