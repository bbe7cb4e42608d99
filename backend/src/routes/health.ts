// Health & metrics routes
import { FastifyInstance } from "fastify";
import type { HealthReport } from "../../../shared/types";
import { getContentType, getMetrics } from "../config/metrics";
import { heatWaveConfigFromEnv, openHeatWaveSession, type SessionFactory } from "../db/client";
import { errorMessage } from "../utils/errors";

export async function healthRoutes(app: FastifyInstance, connect: SessionFactory = openHeatWaveSession) {
  /**
   * Connectivity check against the HeatWave database
   * GET /api/health
   */
  app.get("/api/health", async (_req, reply) => {
    const config = heatWaveConfigFromEnv();
    const report: HealthReport = {
      status: "healthy",
      timestamp: new Date().toISOString(),
      heatwave: { connected: true, host: config.host, database: config.database }
    };

    try {
      const session = await connect(config);
      try {
        await session.query("SELECT 1");
      } finally {
        await session.close();
      }
      reply.send(report);
    } catch (error) {
      report.status = "unhealthy";
      report.heatwave.connected = false;
      report.heatwave.error = errorMessage(error);
      reply.code(503).send(report);
    }
  });

  app.get("/metrics", async (_req, reply) => {
    reply.header("Content-Type", getContentType());
    reply.send(await getMetrics());
  });
}
