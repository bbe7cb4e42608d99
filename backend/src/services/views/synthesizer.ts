// View Synthesizer: metric definition + live schema → view SQL
import { quoteIdentifier } from "../../db/client";
import type {
  CustomerInsightMetric,
  FinancialKpiMetric,
  GenericMetric,
  MetricDefinition,
  OperationalMetric,
  SchemaAnalysis,
  TrendAnalysisMetric
} from "./view.types";

/** Candidate physical names for one logical table, current generation first. */
type TableFamily = readonly string[];

type ResolvedTables = Record<string, string>;

interface TableBinding {
  label: string;
  tables: Record<string, TableFamily>;
  render: (t: ResolvedTables) => string;
}

const PROJECTS: TableFamily = ["projects_oltp", "projects"];
const CUSTOMERS: TableFamily = ["customers_oltp", "customer_analytics"];
const FINANCIAL_TRANSACTIONS: TableFamily = ["financial_transactions_oltp"];
const FINANCIAL_METRICS: TableFamily = ["financial_metrics"];

/**
 * Resolves every alias of a binding against the available tables. A binding
 * matches only when each alias finds one of its candidates.
 */
export function resolveBinding(
  binding: Pick<TableBinding, "tables">,
  available: ReadonlySet<string>
): ResolvedTables | null {
  const resolved: ResolvedTables = {};
  for (const [alias, family] of Object.entries(binding.tables)) {
    const match = family.find((table) => available.has(table));
    if (!match) return null;
    resolved[alias] = quoteIdentifier(match);
  }
  return resolved;
}

function firstMatch(bindings: readonly TableBinding[], schema: SchemaAnalysis): string {
  const available = new Set(Object.keys(schema.schema_info));
  for (const binding of bindings) {
    const tables = resolveBinding(binding, available);
    if (tables) {
      console.log(`Using ${binding.label} tables: ${Object.values(tables).join(", ")}`);
      return binding.render(tables);
    }
  }
  return "";
}

function financialBindings(metric: FinancialKpiMetric): TableBinding[] {
  const months = metric.lookbackMonths;
  switch (metric.variant) {
    case "revenue":
      return [
        {
          label: "transactional",
          tables: { ft: FINANCIAL_TRANSACTIONS, p: PROJECTS },
          render: (t) => `
    SELECT
      DATE_FORMAT(ft.transaction_date, '%Y-%m') AS period,
      SUM(CASE WHEN ft.transaction_type = 'INVOICE' THEN ft.amount ELSE 0 END) AS revenue,
      SUM(CASE WHEN ft.transaction_type = 'COST' THEN ft.amount ELSE 0 END) AS costs,
      (SUM(CASE WHEN ft.transaction_type = 'INVOICE' THEN ft.amount ELSE 0 END) -
       SUM(CASE WHEN ft.transaction_type = 'COST' THEN ft.amount ELSE 0 END)) AS net_profit,
      COUNT(DISTINCT ft.project_id) AS active_projects,
      COUNT(DISTINCT p.customer_id) AS active_customers
    FROM ${t.ft} ft
    LEFT JOIN ${t.p} p ON ft.project_id = p.project_id
    WHERE ft.transaction_date >= DATE_SUB(CURDATE(), INTERVAL ${months} MONTH)
      AND ft.status = 'COMPLETED'
    GROUP BY DATE_FORMAT(ft.transaction_date, '%Y-%m')
    ORDER BY period DESC
  `
        },
        {
          label: "legacy",
          tables: { fm: FINANCIAL_METRICS },
          render: (t) => `
    SELECT
      DATE_FORMAT(fm.metric_date, '%Y-%m') AS period,
      SUM(CASE WHEN fm.metric_type = 'REVENUE' THEN fm.metric_value ELSE 0 END) AS revenue,
      SUM(CASE WHEN fm.metric_type = 'COST' THEN fm.metric_value ELSE 0 END) AS costs,
      (SUM(CASE WHEN fm.metric_type = 'REVENUE' THEN fm.metric_value ELSE 0 END) -
       SUM(CASE WHEN fm.metric_type = 'COST' THEN fm.metric_value ELSE 0 END)) AS net_profit,
      COUNT(DISTINCT fm.project_id) AS active_projects
    FROM ${t.fm} fm
    WHERE fm.metric_date >= DATE_SUB(CURDATE(), INTERVAL ${months} MONTH)
    GROUP BY DATE_FORMAT(fm.metric_date, '%Y-%m')
    ORDER BY period DESC
  `
        }
      ];
    case "cash-flow":
      // The legacy metrics table carries no payment events.
      return [
        {
          label: "transactional",
          tables: { ft: FINANCIAL_TRANSACTIONS },
          render: (t) => `
    SELECT
      DATE_FORMAT(ft.transaction_date, '%Y-%m') AS period,
      SUM(CASE WHEN ft.transaction_type = 'INVOICE' THEN ft.amount ELSE 0 END) AS invoiced,
      SUM(CASE WHEN ft.transaction_type = 'PAYMENT' THEN ft.amount ELSE 0 END) AS collected,
      (SUM(CASE WHEN ft.transaction_type = 'INVOICE' THEN ft.amount ELSE 0 END) -
       SUM(CASE WHEN ft.transaction_type = 'PAYMENT' THEN ft.amount ELSE 0 END)) AS outstanding_ar,
      CASE WHEN SUM(CASE WHEN ft.transaction_type = 'INVOICE' THEN ft.amount ELSE 0 END) > 0
           THEN (SUM(CASE WHEN ft.transaction_type = 'PAYMENT' THEN ft.amount ELSE 0 END) /
                 SUM(CASE WHEN ft.transaction_type = 'INVOICE' THEN ft.amount ELSE 0 END) * 100)
           ELSE 0 END AS collection_rate,
      AVG(DATEDIFF(CURDATE(), ft.transaction_date)) AS avg_days_outstanding
    FROM ${t.ft} ft
    WHERE ft.transaction_date >= DATE_SUB(CURDATE(), INTERVAL ${months} MONTH)
      AND ft.status = 'COMPLETED'
      AND ft.transaction_type IN ('INVOICE', 'PAYMENT')
    GROUP BY DATE_FORMAT(ft.transaction_date, '%Y-%m')
    ORDER BY period DESC
  `
        }
      ];
  }
}

function operationalBindings(metric: OperationalMetric): TableBinding[] {
  return [
    {
      label: "project",
      tables: { p: PROJECTS },
      render: (t) => `
    SELECT
      p.project_type,
      p.status,
      COUNT(*) AS project_count,
      AVG(CASE WHEN p.end_date IS NOT NULL
               THEN DATEDIFF(p.end_date, p.start_date)
               ELSE DATEDIFF(CURDATE(), p.start_date) END) AS avg_duration_days,
      AVG(CASE WHEN p.budget_amount > 0
               THEN (p.actual_cost / p.budget_amount * 100) END) AS avg_budget_utilization_pct,
      SUM(p.budget_amount) AS total_planned_value,
      SUM(p.actual_cost) AS total_actual_cost,
      CASE WHEN SUM(p.budget_amount) > 0
           THEN ((SUM(p.budget_amount) - SUM(p.actual_cost)) / SUM(p.budget_amount) * 100)
           ELSE 0 END AS cost_savings_pct
    FROM ${t.p} p
    WHERE p.start_date >= DATE_SUB(CURDATE(), INTERVAL ${metric.lookbackMonths} MONTH)
    GROUP BY p.project_type, p.status
    ORDER BY project_count DESC
  `
    }
  ];
}

function customerBindings(metric: CustomerInsightMetric): TableBinding[] {
  const grace = metric.recencyGraceDays;
  return [
    {
      label: "customer",
      tables: { c: CUSTOMERS, p: PROJECTS },
      render: (t) => `
    SELECT
      c.customer_id,
      c.customer_name,
      c.industry,
      COALESCE(c.annual_revenue, 0) AS annual_revenue,
      COALESCE(c.credit_rating, 'UNKNOWN') AS credit_rating,
      COUNT(p.project_id) AS total_projects,
      COALESCE(SUM(p.budget_amount), 0) AS total_project_value,
      AVG(CASE WHEN p.budget_amount > 0
               THEN (p.actual_cost / p.budget_amount) END) AS avg_cost_efficiency,
      MAX(p.start_date) AS last_project_date,
      COALESCE(DATEDIFF(CURDATE(), MAX(p.start_date)), 9999) AS days_since_last_project,
      CASE
        WHEN COUNT(p.project_id) >= 3 AND DATEDIFF(CURDATE(), MAX(p.start_date)) <= 90 THEN 'EXCELLENT'
        WHEN COUNT(p.project_id) >= 2 AND DATEDIFF(CURDATE(), MAX(p.start_date)) <= 180 THEN 'GOOD'
        WHEN COUNT(p.project_id) >= 1 AND DATEDIFF(CURDATE(), MAX(p.start_date)) <= 365 THEN 'FAIR'
        ELSE 'POOR'
      END AS health_category,
      GREATEST(0, LEAST(100,
        100 -
        (GREATEST(0, COALESCE(DATEDIFF(CURDATE(), MAX(p.start_date)), 0) - ${grace}) * 0.1) -
        (CASE WHEN COUNT(p.project_id) = 0 THEN 50 ELSE 0 END)
      )) AS health_score_numeric
    FROM ${t.c} c
    LEFT JOIN ${t.p} p ON c.customer_id = p.customer_id
    WHERE c.status = 'ACTIVE' OR c.status IS NULL
    GROUP BY c.customer_id, c.customer_name, c.industry, c.annual_revenue, c.credit_rating
    ORDER BY health_score_numeric DESC
  `
    }
  ];
}

function trendBindings(metric: TrendAnalysisMetric): TableBinding[] {
  return [
    {
      label: "legacy",
      tables: { fm: FINANCIAL_METRICS },
      render: (t) => `
    SELECT
      DATE_FORMAT(fm.metric_date, '%Y-%m') AS period,
      COUNT(DISTINCT fm.project_id) AS active_projects,
      SUM(fm.metric_value) AS total_value,
      AVG(fm.metric_value) AS avg_value
    FROM ${t.fm} fm
    WHERE fm.metric_date >= DATE_SUB(CURDATE(), INTERVAL ${metric.lookbackMonths} MONTH)
    GROUP BY DATE_FORMAT(fm.metric_date, '%Y-%m')
    ORDER BY period DESC
  `
    }
  ];
}

/**
 * Last resort: daily record counts over whichever table the schema lists
 * first. Nothing ties that table to the metric.
 */
function genericViewSql(metric: GenericMetric, schema: SchemaAnalysis): string {
  const [firstTable] = Object.keys(schema.schema_info);
  if (!firstTable) return "";
  const ts = quoteIdentifier(metric.timestampColumn);
  return `
    SELECT
      COUNT(*) AS total_records,
      DATE(${ts}) AS date_created
    FROM ${quoteIdentifier(firstTable)}
    WHERE ${ts} >= DATE_SUB(CURDATE(), INTERVAL ${metric.lookbackDays} DAY)
    GROUP BY DATE(${ts})
    ORDER BY date_created DESC
  `;
}

/**
 * Builds the SELECT behind a metric's view. An empty string means no table
 * family for the metric exists in this schema and the metric is skipped.
 */
export function synthesizeViewSql(metric: MetricDefinition, schema: SchemaAnalysis): string {
  console.log(
    `Generating SQL for ${metric.name} of type ${metric.category} over ${Object.keys(schema.schema_info).length} tables`
  );
  switch (metric.category) {
    case "financial-kpi":
      return firstMatch(financialBindings(metric), schema);
    case "operational-metric":
      return firstMatch(operationalBindings(metric), schema);
    case "customer-insight":
      return firstMatch(customerBindings(metric), schema);
    case "trend-analysis":
      return firstMatch(trendBindings(metric), schema);
    case "generic":
      return genericViewSql(metric, schema);
  }
}
