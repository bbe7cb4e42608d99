// MySQL HeatWave session
import * as mysql from "mysql2/promise";
import type { RowDataPacket } from "mysql2";
import { env } from "../config/env";
import {
  HEATWAVE_COST_THRESHOLD,
  MYSQL_CONNECT_RETRIES,
  MYSQL_CONNECT_TIMEOUT_MS,
  MYSQL_HOST
} from "../config/constants";
import { connectWithRetry } from "../utils/retry";
import { errorMessage } from "../utils/errors";

export type SqlRow = Record<string, unknown>;

/**
 * The single connection one agent invocation runs on. Statements execute
 * sequentially under implicit autocommit; DDL results come back as an empty
 * row list.
 */
export interface SqlSession {
  query(sql: string): Promise<SqlRow[]>;
  close(): Promise<void>;
}

export function quoteIdentifier(name: string): string {
  return "`" + name.replace(/`/g, "``") + "`";
}

export interface HeatWaveConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  connectTimeoutMs: number;
}

export type SessionFactory = (config: HeatWaveConfig) => Promise<SqlSession>;

export function heatWaveConfigFromEnv(hostOverride?: string): HeatWaveConfig {
  return {
    host: MYSQL_HOST || hostOverride || "localhost",
    port: env.MYSQL_PORT,
    user: env.MYSQL_USER,
    password: env.MYSQL_PASSWORD,
    database: env.MYSQL_DATABASE,
    connectTimeoutMs: MYSQL_CONNECT_TIMEOUT_MS
  };
}

class MysqlSession implements SqlSession {
  constructor(private connection: mysql.Connection) {}

  async query(sql: string): Promise<SqlRow[]> {
    const [rows] = await this.connection.query<RowDataPacket[]>(sql);
    return Array.isArray(rows) ? rows : [];
  }

  async close(): Promise<void> {
    await this.connection.end();
  }
}

/** Turns on secondary-engine offload for the session. Failure is logged, not raised. */
export async function enableSecondaryEngine(session: SqlSession, costThreshold = HEATWAVE_COST_THRESHOLD) {
  try {
    await session.query("SET SESSION use_secondary_engine = ON");
    await session.query(`SET SESSION secondary_engine_cost_threshold = ${Math.trunc(costThreshold)}`);
    console.log("HeatWave secondary engine enabled for view generation");
  } catch (error) {
    console.warn(`Could not enable HeatWave engine: ${errorMessage(error)}`);
  }
}

export const openHeatWaveSession: SessionFactory = async (config) => {
  const connection = await connectWithRetry(
    () =>
      mysql.createConnection({
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database: config.database,
        charset: "utf8mb4",
        connectTimeout: config.connectTimeoutMs,
        multipleStatements: false
      }),
    { retries: MYSQL_CONNECT_RETRIES }
  );
  const session = new MysqlSession(connection);
  await enableSecondaryEngine(session);
  return session;
};
