import type { SqlRow, SqlSession } from "../../src/db/client";

export interface FakeColumn {
  name: string;
  type?: string;
  nullable?: boolean;
  key?: string;
}

export interface FakeTable {
  columns: FakeColumn[];
  rows: number;
  /** Make COUNT(*) on this table throw. */
  failCount?: boolean;
}

export interface FakeHeatWaveOptions {
  tables?: Record<string, FakeTable>;
  views?: Record<string, number>;
  failMetadata?: boolean;
  failShowTables?: boolean;
  failCreate?: boolean;
  failSecondaryLoad?: boolean;
  failViewCount?: boolean;
}

const unquote = (name: string) => name.replace(/`/g, "");

/**
 * In-process stand-in for a HeatWave connection. Understands the handful of
 * statements the view generator issues and records every one of them.
 */
export class FakeHeatWave implements SqlSession {
  readonly statements: string[] = [];
  readonly views = new Map<string, number>();
  readonly loaded = new Set<string>();
  closed = false;

  constructor(private options: FakeHeatWaveOptions = {}) {
    for (const [name, rows] of Object.entries(options.views ?? {})) {
      this.views.set(name, rows);
    }
  }

  async query(sql: string): Promise<SqlRow[]> {
    const statement = sql.trim().replace(/\s+/g, " ");
    this.statements.push(statement);
    const tables = this.options.tables ?? {};

    if (statement.startsWith("SET SESSION")) return [];

    if (statement.includes("INFORMATION_SCHEMA.COLUMNS")) {
      if (this.options.failMetadata) throw new Error("Access denied to INFORMATION_SCHEMA");
      const rows: SqlRow[] = [];
      for (const [table, def] of Object.entries(tables)) {
        for (const column of def.columns) {
          rows.push({
            table_name: table,
            column_name: column.name,
            data_type: column.type ?? "varchar",
            is_nullable: column.nullable === false ? "NO" : "YES",
            column_key: column.key ?? "",
            extra: ""
          });
        }
      }
      return rows;
    }

    if (statement === "SHOW TABLES") {
      if (this.options.failShowTables) throw new Error("SHOW TABLES denied");
      return [...Object.keys(tables), ...this.views.keys()].map((name) => ({
        Tables_in_decisioning_heatwave: name
      }));
    }

    let match = /^SELECT COUNT\(\*\) AS row_count FROM (\S+)$/.exec(statement);
    if (match) {
      const name = unquote(match[1]);
      if (this.views.has(name)) {
        if (this.options.failViewCount) throw new Error(`View ${name} is invalid`);
        return [{ row_count: this.views.get(name) }];
      }
      const table = tables[name];
      if (!table) throw new Error(`Table '${name}' doesn't exist`);
      if (table.failCount) throw new Error(`Lock wait timeout on ${name}`);
      return [{ row_count: table.rows }];
    }

    match = /^DROP VIEW IF EXISTS (\S+)$/.exec(statement);
    if (match) {
      const name = unquote(match[1]);
      this.views.delete(name);
      this.loaded.delete(name);
      return [];
    }

    match = /^CREATE VIEW (\S+) AS /.exec(statement);
    if (match) {
      const name = unquote(match[1]);
      if (this.options.failCreate) throw new Error("Unknown column 'p.project_type' in 'field list'");
      if (this.views.has(name)) throw new Error(`Table '${name}' already exists`);
      this.views.set(name, 3);
      return [];
    }

    match = /^ALTER VIEW (\S+) (SECONDARY_ENGINE=RAPID|SECONDARY_LOAD|SECONDARY_UNLOAD)$/.exec(statement);
    if (match) {
      const name = unquote(match[1]);
      if (this.options.failSecondaryLoad) throw new Error("Secondary engine RAPID is not available");
      if (match[2] === "SECONDARY_LOAD") this.loaded.add(name);
      if (match[2] === "SECONDARY_UNLOAD") this.loaded.delete(name);
      return [];
    }

    if (statement === "SELECT 1") return [{ 1: 1 }];

    throw new Error(`FakeHeatWave cannot run: ${statement}`);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** Clock that advances by the given step (ms) on every second read, i.e. per timed query. */
export function steppingClock(...elapsedMs: number[]) {
  let now = 0;
  let reads = 0;
  let step = 0;
  return () => {
    reads += 1;
    if (reads % 2 === 0) {
      now += elapsedMs[Math.min(step, elapsedMs.length - 1)];
      step += 1;
    }
    return now;
  };
}
