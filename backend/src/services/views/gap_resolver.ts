// Gap Resolver: which required metrics still need a view
import { PRIORITY_WEIGHT, type MetricCatalog } from "./metric_catalog";
import type { ViewRegistry } from "./registry";
import type { MetricDefinition } from "./view.types";

export interface GapResolution {
  missing: MetricDefinition[];
  unknown: string[];
}

/**
 * Returns catalog metrics that have no registered view, highest priority
 * first with ties in catalog order. Names the catalog does not know are
 * reported in `unknown` and never synthesized.
 */
export function resolveGaps(
  requiredMetrics: readonly string[],
  registry: ViewRegistry,
  catalog: MetricCatalog,
  sourceTables: readonly string[]
): GapResolution {
  const unknown: string[] = [];
  if (requiredMetrics.length === 0 || sourceTables.length === 0) {
    return { missing: [], unknown };
  }

  const seen = new Set<string>();
  const missing: Array<{ metric: MetricDefinition; order: number }> = [];
  for (const name of requiredMetrics) {
    if (seen.has(name)) continue;
    seen.add(name);
    if (registry.has(name)) continue;

    const order = catalog.findIndex((metric) => metric.name === name);
    if (order === -1) {
      unknown.push(name);
      continue;
    }
    missing.push({ metric: catalog[order], order });
  }

  missing.sort(
    (a, b) => PRIORITY_WEIGHT[b.metric.priority] - PRIORITY_WEIGHT[a.metric.priority] || a.order - b.order
  );
  return { missing: missing.map((m) => m.metric), unknown };
}
