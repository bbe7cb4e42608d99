// View Registry: per-invocation record of metric → view state
import type { SqlSession } from "../../db/client";
import { VIEW_PREFIX } from "../../config/constants";
import { errorMessage } from "../../utils/errors";
import type { BenchmarkResult, ViewCreationResult, ViewRegistryEntry } from "./view.types";

export function deriveViewName(metricName: string): string {
  return `${VIEW_PREFIX}${metricName}`;
}

export function metricFromViewName(viewName: string): string | null {
  return viewName.startsWith(VIEW_PREFIX) ? viewName.slice(VIEW_PREFIX.length) : null;
}

/**
 * Created empty for each agent run and handed by reference through gap
 * resolution, materialization and optimization. Never shared across runs.
 */
export class ViewRegistry {
  private entries = new Map<string, ViewRegistryEntry>();

  has(metricName: string): boolean {
    return this.entries.has(metricName);
  }

  get(metricName: string): ViewRegistryEntry | undefined {
    return this.entries.get(metricName);
  }

  markExisting(metricName: string) {
    this.entries.set(metricName, {
      metric_name: metricName,
      view_name: deriveViewName(metricName),
      status: "existing",
      heatwave_enabled: null,
      performance: null
    });
  }

  recordCreation(result: ViewCreationResult) {
    if (result.success) {
      this.entries.set(result.metric_name, {
        metric_name: result.metric_name,
        view_name: result.view_name,
        status: "created",
        heatwave_enabled: result.heatwave_enabled,
        performance: result.performance,
        created_at: result.created_at
      });
      return;
    }
    this.entries.set(result.metric_name, {
      metric_name: result.metric_name,
      view_name: deriveViewName(result.metric_name),
      status: "failed",
      heatwave_enabled: false,
      performance: null,
      created_at: result.created_at,
      error: result.error
    });
  }

  recordBenchmark(metricName: string, performance: BenchmarkResult) {
    const entry = this.entries.get(metricName);
    if (!entry) return;
    entry.performance = performance;
    if (entry.heatwave_enabled === null && performance.performance_rating !== "error") {
      entry.heatwave_enabled = performance.heatwave_accelerated;
    }
  }

  markAccelerated(metricName: string) {
    const entry = this.entries.get(metricName);
    if (entry) entry.heatwave_enabled = true;
  }

  existing(): ViewRegistryEntry[] {
    return [...this.entries.values()].filter((entry) => entry.status === "existing");
  }

  toJSON(): Record<string, ViewRegistryEntry> {
    return Object.fromEntries(this.entries);
  }
}

/**
 * Registers every `analytics_*` relation already in the database as an
 * existing view. A failed lookup leaves the registry as it was.
 */
export async function loadExistingViews(session: SqlSession, registry: ViewRegistry) {
  try {
    const rows = await session.query("SHOW TABLES");
    for (const row of rows) {
      const [relation] = Object.values(row);
      if (typeof relation !== "string") continue;
      const metricName = metricFromViewName(relation);
      if (metricName) registry.markExisting(metricName);
    }
  } catch (error) {
    console.warn(`Could not check existing views: ${errorMessage(error)}`);
  }
}
