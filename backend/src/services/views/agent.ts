// View Generator Agent: inspect → resolve gaps → synthesize → materialize → optimize
import type { AgentResult } from "../../../../shared/types";
import {
  AGENT_NAME,
  AUTO_VIEW_OPTIMIZATION,
  DEFAULT_REQUIRED_METRICS,
  SUCCESS_CONFIDENCE,
  VIEW_PERFORMANCE_MONITORING
} from "../../config/constants";
import { agentRunDurationHistogram, agentRunsCounter } from "../../config/metrics";
import { addEvent, withSpan } from "../../config/otel";
import {
  heatWaveConfigFromEnv,
  openHeatWaveSession,
  type HeatWaveConfig,
  type SessionFactory,
  type SqlSession
} from "../../db/client";
import { errorMessage } from "../../utils/errors";
import { resolveGaps } from "./gap_resolver";
import { buildViewInsights, buildViewRecommendations } from "./insights";
import { materializeView, optimizeExistingViews, type Clock } from "./materializer";
import { DEFAULT_METRIC_CATALOG, type MetricCatalog } from "./metric_catalog";
import { ViewRegistry, loadExistingViews } from "./registry";
import { inspectSchema } from "./schema_inspector";
import { synthesizeViewSql } from "./synthesizer";
import type {
  OptimizationResult,
  ViewCreated,
  ViewCreationFailed,
  ViewGeneratorData,
  ViewGeneratorError
} from "./view.types";

export interface ViewGeneratorInput {
  required_metrics?: string[];
}

export interface ViewGeneratorOptions {
  heatwave?: HeatWaveConfig;
  connect?: SessionFactory;
  catalog?: MetricCatalog;
  autoOptimization?: boolean;
  performanceMonitoring?: boolean;
  /** Benchmark clock in milliseconds. */
  clock?: Clock;
}

export type ViewGeneratorResult = AgentResult<ViewGeneratorData | ViewGeneratorError>;

function taskId(): string {
  return `${AGENT_NAME}_${Math.floor(Date.now() / 1000)}`;
}

/**
 * Runs one view-generation pass on a single connection, opened here and
 * closed before returning. Only a failed connection yields status "error";
 * every later failure is reported inside `data`.
 */
export async function runViewGenerator(
  input: ViewGeneratorInput = {},
  options: ViewGeneratorOptions = {}
): Promise<ViewGeneratorResult> {
  const started = Date.now();
  const connect = options.connect ?? openHeatWaveSession;
  const heatwave = options.heatwave ?? heatWaveConfigFromEnv();
  const autoOptimization = options.autoOptimization ?? AUTO_VIEW_OPTIMIZATION;
  const materializeOptions = {
    clock: options.clock,
    performanceMonitoring: options.performanceMonitoring ?? VIEW_PERFORMANCE_MONITORING
  };

  console.log(`Starting HeatWave ${AGENT_NAME} agent execution`);
  let session: SqlSession | null = null;
  try {
    session = await withSpan("views.connect", () => connect(heatwave), {
      attrs: { "db.system": "mysql", "server.address": heatwave.host, "db.name": heatwave.database }
    });
    const db = session;

    const dataAnalysis = await withSpan("views.inspectSchema", () => inspectSchema(db), {
      describe: (analysis) => ({
        "schema.tables": analysis.total_tables,
        "schema.columns": analysis.total_columns
      })
    });

    const requiredMetrics = input.required_metrics ?? [...DEFAULT_REQUIRED_METRICS];
    const registry = new ViewRegistry();
    await withSpan("views.loadExisting", () => loadExistingViews(db, registry));
    const { missing, unknown } = resolveGaps(
      requiredMetrics,
      registry,
      options.catalog ?? DEFAULT_METRIC_CATALOG,
      Object.keys(dataAnalysis.schema_info)
    );

    const createdViews: ViewCreated[] = [];
    const failedViews: ViewCreationFailed[] = [];
    const skippedMetrics: string[] = [];
    for (const metric of missing) {
      const metricAttrs = { "metric.name": metric.name, "metric.category": metric.category };
      const viewSql = await withSpan(
        "views.synthesize",
        () => {
          const sql = synthesizeViewSql(metric, dataAnalysis);
          if (!sql) addEvent("views.skipped", { reason: "no matching tables" });
          return sql;
        },
        { attrs: metricAttrs }
      );
      if (!viewSql) {
        console.warn(`Could not generate SQL for metric ${metric.name}`);
        skippedMetrics.push(metric.name);
        continue;
      }
      const result = await withSpan(
        "views.materialize",
        () => materializeView(db, metric.name, viewSql, materializeOptions),
        {
          attrs: metricAttrs,
          describe: (created) =>
            created.success
              ? {
                  "view.created": true,
                  "view.heatwave_enabled": created.heatwave_enabled,
                  "view.rating": created.performance.performance_rating
                }
              : { "view.created": false }
        }
      );
      registry.recordCreation(result);
      if (result.success) createdViews.push(result);
      else failedViews.push(result);
    }

    const optimizationResults: Record<string, OptimizationResult> = autoOptimization
      ? await withSpan(
          "views.optimizeExisting",
          () => optimizeExistingViews(db, registry, materializeOptions),
          {
            describe: (results) => ({
              "views.reloaded": Object.values(results).filter((r) => r.optimized).length
            })
          }
        )
      : {};

    const executionTime = (Date.now() - started) / 1000;
    agentRunsCounter.labels("success").inc();
    agentRunDurationHistogram.observe(executionTime);
    console.log(`View generator agent completed successfully in ${executionTime.toFixed(2)}s`);

    return {
      agent_name: AGENT_NAME,
      task_id: taskId(),
      status: "success",
      data: {
        created_views: createdViews,
        failed_views: failedViews,
        skipped_metrics: skippedMetrics,
        unknown_metrics: unknown,
        optimization_results: optimizationResults,
        data_analysis: dataAnalysis,
        view_registry: registry.toJSON(),
        required_metrics: requiredMetrics,
        missing_metrics: missing.map((m) => m.name)
      },
      insights: buildViewInsights(createdViews, optimizationResults),
      recommendations: buildViewRecommendations(dataAnalysis),
      timestamp: new Date().toISOString(),
      execution_time: executionTime,
      confidence_score: SUCCESS_CONFIDENCE
    };
  } catch (error) {
    const executionTime = (Date.now() - started) / 1000;
    agentRunsCounter.labels("error").inc();
    agentRunDurationHistogram.observe(executionTime);
    console.error(`View generator agent failed: ${errorMessage(error)}`);

    return {
      agent_name: AGENT_NAME,
      task_id: taskId(),
      status: "error",
      data: { error: errorMessage(error) },
      insights: [],
      recommendations: [],
      timestamp: new Date().toISOString(),
      execution_time: executionTime,
      confidence_score: 0
    };
  } finally {
    if (session) {
      await session.close().catch((err: unknown) => {
        console.warn(`Failed to close HeatWave session: ${errorMessage(err)}`);
      });
    }
  }
}
