export type Priority = "high" | "medium" | "low";

export interface ColumnInfo {
  name: string;
  type: string;
  nullable: boolean;
  key: string; // PRI | UNI | MUL | ""
  extra: string;
}

export interface TableSchema {
  columns: ColumnInfo[];
  primary_keys: string[];
  foreign_keys: string[];
}

export interface SchemaAnalysis {
  schema_info: Record<string, TableSchema>;
  data_statistics: Record<string, { row_count: number }>;
  analysis_timestamp: string;
  total_tables: number;
  total_columns: number;
  error?: string;
}

interface MetricBase {
  name: string;
  priority: Priority;
  /** Tables the metric reads in the current schema generation, most important first. */
  tables: string[];
  description: string;
}

export interface FinancialKpiMetric extends MetricBase {
  category: "financial-kpi";
  variant: "revenue" | "cash-flow";
  lookbackMonths: number;
}

export interface OperationalMetric extends MetricBase {
  category: "operational-metric";
  variant: "project-efficiency";
  lookbackMonths: number;
}

export interface CustomerInsightMetric extends MetricBase {
  category: "customer-insight";
  variant: "health-score";
  recencyGraceDays: number;
}

export interface TrendAnalysisMetric extends MetricBase {
  category: "trend-analysis";
  lookbackMonths: number;
}

export interface GenericMetric extends MetricBase {
  category: "generic";
  timestampColumn: string;
  lookbackDays: number;
}

export type MetricDefinition =
  | FinancialKpiMetric
  | OperationalMetric
  | CustomerInsightMetric
  | TrendAnalysisMetric
  | GenericMetric;

export type PerformanceRating = "excellent" | "good" | "needs-optimization" | "error";

export interface BenchmarkResult {
  execution_time_seconds: number | null;
  row_count: number;
  performance_rating: PerformanceRating;
  heatwave_accelerated: boolean;
  error?: string;
}

export type ViewStatus = "existing" | "created" | "failed";

export interface ViewRegistryEntry {
  metric_name: string;
  view_name: string;
  status: ViewStatus;
  /** null until a benchmark has been taken for a view that predates this run. */
  heatwave_enabled: boolean | null;
  performance: BenchmarkResult | null;
  created_at?: string;
  error?: string;
}

export interface ViewCreated {
  success: true;
  metric_name: string;
  view_name: string;
  view_sql: string;
  heatwave_enabled: boolean;
  performance: BenchmarkResult;
  created_at: string;
}

export interface ViewCreationFailed {
  success: false;
  metric_name: string;
  error: string;
  created_at: string;
}

export type ViewCreationResult = ViewCreated | ViewCreationFailed;

export type OptimizationResult =
  | { optimized: true; before_performance: BenchmarkResult; after_performance: BenchmarkResult }
  | { optimized: false; reason: string; current_performance: BenchmarkResult }
  | { optimized: false; error: string; before_performance?: BenchmarkResult };

export interface ViewGeneratorData {
  created_views: ViewCreated[];
  failed_views: ViewCreationFailed[];
  skipped_metrics: string[];
  unknown_metrics: string[];
  optimization_results: Record<string, OptimizationResult>;
  data_analysis: SchemaAnalysis;
  view_registry: Record<string, ViewRegistryEntry>;
  required_metrics: string[];
  missing_metrics: string[];
}

export interface ViewGeneratorError {
  error: string;
}
