import { EXCELLENT_LATENCY_S, MIN_RECOMMENDED_TABLES } from "../../config/constants";
import type { OptimizationResult, SchemaAnalysis, ViewCreated } from "./view.types";

export function buildViewInsights(
  createdViews: ViewCreated[],
  optimizationResults: Record<string, OptimizationResult>
): string[] {
  const insights: string[] = [];

  if (createdViews.length > 0) {
    insights.push(`Successfully created ${createdViews.length} new analytical views on HeatWave OLAP engine`);
  }

  const accelerated = createdViews.filter((v) => v.heatwave_enabled);
  if (accelerated.length > 0) {
    insights.push(`Enabled HeatWave acceleration for ${accelerated.length} views`);
  }

  const optimized = Object.values(optimizationResults).filter((r) => r.optimized);
  if (optimized.length > 0) {
    insights.push(`Optimized ${optimized.length} existing views for better analytical performance`);
  }

  const fast = createdViews.filter(
    (v) => (v.performance.execution_time_seconds ?? 1) < EXCELLENT_LATENCY_S
  );
  if (fast.length > 0) {
    insights.push(`Generated ${fast.length} ultra-fast views with sub-100ms query response times`);
  }

  return insights;
}

export function buildViewRecommendations(analysis: SchemaAnalysis): string[] {
  const recommendations: string[] = [];

  if (analysis.total_tables < MIN_RECOMMENDED_TABLES) {
    recommendations.push("Consider adding more data sources to enable richer analytical views");
  }
  if (!Object.hasOwn(analysis.schema_info, "financial_transactions_oltp")) {
    recommendations.push("Implement transactional financial data structure for real-time cash flow analytics");
  }
  if (!Object.hasOwn(analysis.schema_info, "customers_oltp")) {
    recommendations.push("Add customer master data table to enable customer intelligence views");
  }

  recommendations.push("Schedule regular view optimization to maintain peak HeatWave performance");
  recommendations.push("Monitor view usage patterns to optimize the most frequently accessed metrics");
  return recommendations;
}
