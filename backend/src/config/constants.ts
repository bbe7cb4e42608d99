import { env } from "./env";

export const AGENT_NAME = "view_generator";

export const MYSQL_HOST = env.MYSQL_HOST;
export const MYSQL_CONNECT_TIMEOUT_MS = env.MYSQL_CONNECTION_TIMEOUT * 1000;
export const MYSQL_CONNECT_RETRIES = Math.max(0, env.MYSQL_CONNECT_RETRIES);
export const HEATWAVE_COST_THRESHOLD = env.HEATWAVE_COST_THRESHOLD;

export const AUTO_VIEW_OPTIMIZATION = env.AUTO_VIEW_OPTIMIZATION;
export const VIEW_PERFORMANCE_MONITORING = env.VIEW_PERFORMANCE_MONITORING;

// View naming
export const VIEW_PREFIX = "analytics_";

export const DEFAULT_REQUIRED_METRICS = [
  "revenue_trend",
  "cash_flow_analysis",
  "project_efficiency",
  "customer_health_score"
];

// Benchmark rating thresholds (seconds)
export const EXCELLENT_LATENCY_S = 0.1;
export const GOOD_LATENCY_S = 1.0;
export const ACCELERATED_LATENCY_S = 0.5;

export const SUCCESS_CONFIDENCE = 0.95;
export const MIN_RECOMMENDED_TABLES = 5;
