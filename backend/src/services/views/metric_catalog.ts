// Metric Catalog: the closed set of metrics the generator knows how to build
import type { MetricDefinition, Priority } from "./view.types";

export type MetricCatalog = readonly MetricDefinition[];

export const PRIORITY_WEIGHT: Record<Priority, number> = {
  high: 3,
  medium: 2,
  low: 1
};

export const DEFAULT_METRIC_CATALOG: MetricCatalog = [
  {
    name: "revenue_trend",
    category: "financial-kpi",
    variant: "revenue",
    lookbackMonths: 24,
    tables: ["financial_transactions_oltp", "projects_oltp"],
    priority: "high",
    description: "Monthly revenue trends with profit margins and project activity"
  },
  {
    name: "cash_flow_analysis",
    category: "financial-kpi",
    variant: "cash-flow",
    lookbackMonths: 18,
    tables: ["financial_transactions_oltp"],
    priority: "high",
    description: "Cash flow analysis with AR and collection efficiency metrics"
  },
  {
    name: "project_efficiency",
    category: "operational-metric",
    variant: "project-efficiency",
    lookbackMonths: 24,
    tables: ["projects_oltp"],
    priority: "medium",
    description: "Project efficiency and resource utilization metrics"
  },
  {
    name: "customer_health_score",
    category: "customer-insight",
    variant: "health-score",
    recencyGraceDays: 90,
    tables: ["customers_oltp", "projects_oltp"],
    priority: "high",
    description: "Customer health scores with risk assessment and engagement metrics"
  },
  {
    name: "business_trends",
    category: "trend-analysis",
    lookbackMonths: 12,
    tables: ["financial_metrics", "projects"],
    priority: "medium",
    description: "Business trend analysis with growth rates and seasonality patterns"
  }
];

