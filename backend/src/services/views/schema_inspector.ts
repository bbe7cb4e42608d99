// Schema Inspector: live OLTP catalog snapshot
import { quoteIdentifier, type SqlRow, type SqlSession } from "../../db/client";
import { errorMessage } from "../../utils/errors";
import type { SchemaAnalysis, TableSchema } from "./view.types";

const COLUMNS_SQL = `
    SELECT
      TABLE_NAME AS table_name,
      COLUMN_NAME AS column_name,
      DATA_TYPE AS data_type,
      IS_NULLABLE AS is_nullable,
      COLUMN_KEY AS column_key,
      EXTRA AS extra
    FROM INFORMATION_SCHEMA.COLUMNS
    WHERE TABLE_SCHEMA = DATABASE()
    ORDER BY TABLE_NAME, ORDINAL_POSITION
  `;

function text(row: SqlRow, key: string): string {
  const value = row[key];
  return value === null || value === undefined ? "" : String(value);
}

export async function inspectSchema(session: SqlSession): Promise<SchemaAnalysis> {
  let rows: SqlRow[];
  try {
    rows = await session.query(COLUMNS_SQL);
  } catch (error) {
    console.error(`Schema analysis failed: ${errorMessage(error)}`);
    return {
      schema_info: {},
      data_statistics: {},
      analysis_timestamp: new Date().toISOString(),
      total_tables: 0,
      total_columns: 0,
      error: errorMessage(error)
    };
  }

  // Keyed by arbitrary table names, so no plain-object lookups here.
  const tables = new Map<string, TableSchema>();
  for (const row of rows) {
    const tableName = text(row, "table_name");
    if (!tableName) continue;
    let table = tables.get(tableName);
    if (!table) {
      table = { columns: [], primary_keys: [], foreign_keys: [] };
      tables.set(tableName, table);
    }
    const column = {
      name: text(row, "column_name"),
      type: text(row, "data_type"),
      nullable: text(row, "is_nullable") === "YES",
      key: text(row, "column_key"),
      extra: text(row, "extra")
    };
    table.columns.push(column);
    if (column.key === "PRI") {
      table.primary_keys.push(column.name);
    }
  }

  const rowCounts: Array<[string, { row_count: number }]> = [];
  for (const tableName of tables.keys()) {
    rowCounts.push([tableName, { row_count: await countRows(session, tableName) }]);
  }

  return {
    schema_info: Object.fromEntries(tables),
    data_statistics: Object.fromEntries(rowCounts),
    analysis_timestamp: new Date().toISOString(),
    total_tables: tables.size,
    total_columns: [...tables.values()].reduce((sum, t) => sum + t.columns.length, 0)
  };
}

async function countRows(session: SqlSession, tableName: string): Promise<number> {
  try {
    const rows = await session.query(`SELECT COUNT(*) AS row_count FROM ${quoteIdentifier(tableName)}`);
    const count = Number(rows[0]?.row_count ?? 0);
    return Number.isFinite(count) ? count : 0;
  } catch (error) {
    console.warn(`Row count failed for ${tableName}: ${errorMessage(error)}`);
    return 0;
  }
}
