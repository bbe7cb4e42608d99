import { describe, it, expect, vi, beforeEach } from "vitest";
import { build } from "../src/server";
import * as agent from "../src/services/views/agent";
import type { ViewGeneratorResult } from "../src/services/views/agent";
import { FakeHeatWave } from "./helpers/fakeHeatWave";

vi.mock("../src/services/views/agent");

const agentResult: ViewGeneratorResult = {
  agent_name: "view_generator",
  task_id: "view_generator_1767225600",
  status: "error",
  data: { error: "connect ECONNREFUSED 10.0.0.5:3306" },
  insights: [],
  recommendations: [],
  timestamp: "2026-01-01T00:00:00.000Z",
  execution_time: 0.2,
  confidence_score: 0
};

describe("view generator routes", () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it("passes requested metrics and flags to the agent", async () => {
    vi.mocked(agent.runViewGenerator).mockResolvedValue(agentResult);
    const app = await build({ logger: false });

    const res = await app.inject({
      method: "POST",
      url: "/api/agents/view-generator",
      payload: {
        required_metrics: ["revenue_trend"],
        heatwave: { host: "10.0.0.7" },
        config: { auto_optimization: false, performance_monitoring: false }
      }
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual(agentResult);
    expect(agent.runViewGenerator).toHaveBeenCalledWith(
      { required_metrics: ["revenue_trend"] },
      {
        heatwave: expect.objectContaining({ host: "10.0.0.7", database: "decisioning_heatwave" }),
        autoOptimization: false,
        performanceMonitoring: false
      }
    );
    await app.close();
  });

  it("rejects malformed metric names", async () => {
    const app = await build({ logger: false });

    const res = await app.inject({
      method: "POST",
      url: "/api/agents/view-generator",
      payload: { required_metrics: ["revenue; DROP TABLE projects"] }
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("invalid_request");
    expect(agent.runViewGenerator).not.toHaveBeenCalled();
    await app.close();
  });

  it("answers 500 when the agent throws", async () => {
    vi.mocked(agent.runViewGenerator).mockRejectedValue(new Error("registry exploded"));
    const app = await build({ logger: false });

    const res = await app.inject({ method: "POST", url: "/api/agents/view-generator", payload: {} });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toMatchObject({
      agent_name: "view_generator",
      status: "error",
      error: "registry exploded"
    });
    await app.close();
  });
});

describe("health routes", () => {
  it("reports healthy when SELECT 1 succeeds", async () => {
    const session = new FakeHeatWave();
    const app = await build({ logger: false, connect: async () => session });

    const res = await app.inject({ method: "GET", url: "/api/health" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: "healthy", heatwave: { connected: true } });
    expect(session.statements).toEqual(["SELECT 1"]);
    expect(session.closed).toBe(true);
    await app.close();
  });

  it("reports unhealthy when the database is unreachable", async () => {
    const app = await build({
      logger: false,
      connect: async () => {
        throw new Error("connect ETIMEDOUT");
      }
    });

    const res = await app.inject({ method: "GET", url: "/api/health" });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toMatchObject({
      status: "unhealthy",
      heatwave: { connected: false, error: "connect ETIMEDOUT" }
    });
    await app.close();
  });

  it("exposes prometheus metrics", async () => {
    const app = await build({ logger: false });

    const res = await app.inject({ method: "GET", url: "/metrics" });

    expect(res.statusCode).toBe(200);
    expect(res.body).toContain("view_generator_runs_total");
    await app.close();
  });
});
