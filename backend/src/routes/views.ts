// View generator function handler
import { FastifyInstance } from "fastify";
import { z } from "zod";
import type { AgentFailure, ViewGeneratorRequest } from "../../../shared/types";
import { AGENT_NAME } from "../config/constants";
import { requestCounter } from "../config/metrics";
import { heatWaveConfigFromEnv } from "../db/client";
import { runViewGenerator } from "../services/views/agent";
import { errorMessage } from "../utils/errors";

export const viewGeneratorRequestSchema: z.ZodType<ViewGeneratorRequest> = z.object({
  required_metrics: z.array(z.string().regex(/^[A-Za-z0-9_]+$/)).optional(),
  heatwave: z.object({ host: z.string().min(1).optional() }).optional(),
  config: z
    .object({
      auto_optimization: z.boolean().optional(),
      performance_monitoring: z.boolean().optional()
    })
    .optional()
});

export async function viewRoutes(app: FastifyInstance) {
  app.post("/api/agents/view-generator", async (req, reply) => {
    const parsed = viewGeneratorRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      requestCounter.labels("view-generator", "400").inc();
      reply.code(400).send({ error: "invalid_request", issues: parsed.error.issues });
      return;
    }
    const body = parsed.data;
    app.log.info("HeatWave View Generator agent function invoked");

    try {
      const result = await runViewGenerator(
        { required_metrics: body.required_metrics },
        {
          heatwave: heatWaveConfigFromEnv(body.heatwave?.host),
          autoOptimization: body.config?.auto_optimization,
          performanceMonitoring: body.config?.performance_monitoring
        }
      );
      requestCounter.labels("view-generator", "200").inc();
      reply.send(result);
    } catch (error) {
      app.log.error(`HeatWave view generator agent function failed: ${errorMessage(error)}`);
      requestCounter.labels("view-generator", "500").inc();
      const failure: AgentFailure = {
        agent_name: AGENT_NAME,
        status: "error",
        error: errorMessage(error),
        timestamp: new Date().toISOString()
      };
      reply.code(500).send(failure);
    }
  });
}
