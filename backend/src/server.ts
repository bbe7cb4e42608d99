/* Backend Server Entry Point */
import "./config/otel"; // Bootstrap OpenTelemetry before loading instrumented modules
import Fastify from "fastify";
import cors from "@fastify/cors";
import { env } from "./config/env";
import { healthRoutes } from "./routes/health";
import { viewRoutes } from "./routes/views";
import type { SessionFactory } from "./db/client";

export interface BuildOptions {
  logger?: boolean;
  /** Session factory for the health check; defaults to a live MySQL connection. */
  connect?: SessionFactory;
}

export async function build(options: BuildOptions = {}) {
  const app = Fastify({ logger: options.logger ?? true });

  await app.register(cors, { origin: env.CORS_ORIGIN, credentials: true });

  // Health and metrics routes (no auth required)
  await healthRoutes(app, options.connect);
  await viewRoutes(app);

  return app;
}

async function start() {
  const app = await build();
  await app.listen({ port: env.PORT, host: "0.0.0.0" });
  app.log.info(`Backend listening on http://localhost:${env.PORT}`);
}

function shutdown() {
  process.exit(0);
}

// Start server if run directly (not imported)
if (import.meta.url === `file://${process.argv[1]}`) {
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
  start().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
