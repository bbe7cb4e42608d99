import { describe, expect, it } from "vitest";
import { inspectSchema } from "../src/services/views/schema_inspector";
import { FakeHeatWave } from "./helpers/fakeHeatWave";

describe("schema inspector", () => {
  it("groups columns per table in ordinal order and flags primary keys", async () => {
    const session = new FakeHeatWave({
      tables: {
        customers_oltp: {
          rows: 4,
          columns: [
            { name: "customer_id", type: "int", nullable: false, key: "PRI" },
            { name: "customer_name", type: "varchar" },
            { name: "status", type: "varchar" }
          ]
        },
        projects_oltp: {
          rows: 3,
          columns: [
            { name: "project_id", type: "int", nullable: false, key: "PRI" },
            { name: "customer_id", type: "int", key: "MUL" }
          ]
        }
      }
    });

    const analysis = await inspectSchema(session);

    expect(Object.keys(analysis.schema_info)).toEqual(["customers_oltp", "projects_oltp"]);
    expect(analysis.schema_info.customers_oltp.columns.map((c) => c.name)).toEqual([
      "customer_id",
      "customer_name",
      "status"
    ]);
    expect(analysis.schema_info.customers_oltp.columns[0]).toEqual({
      name: "customer_id",
      type: "int",
      nullable: false,
      key: "PRI",
      extra: ""
    });
    expect(analysis.schema_info.projects_oltp.primary_keys).toEqual(["project_id"]);
    expect(analysis.data_statistics).toEqual({
      customers_oltp: { row_count: 4 },
      projects_oltp: { row_count: 3 }
    });
    expect(analysis.total_tables).toBe(2);
    expect(analysis.total_columns).toBe(5);
    expect(analysis.error).toBeUndefined();
  });

  it("records zero rows for a table whose count fails and keeps going", async () => {
    const session = new FakeHeatWave({
      tables: {
        audit_log: { rows: 10, failCount: true, columns: [{ name: "id", key: "PRI" }] },
        projects: { rows: 7, columns: [{ name: "project_id", key: "PRI" }] }
      }
    });

    const analysis = await inspectSchema(session);

    expect(analysis.data_statistics.audit_log).toEqual({ row_count: 0 });
    expect(analysis.data_statistics.projects).toEqual({ row_count: 7 });
  });

  it("returns an error-tagged empty model when metadata cannot be read", async () => {
    const session = new FakeHeatWave({
      failMetadata: true,
      tables: { projects: { rows: 1, columns: [{ name: "project_id" }] } }
    });

    const analysis = await inspectSchema(session);

    expect(analysis.schema_info).toEqual({});
    expect(analysis.data_statistics).toEqual({});
    expect(analysis.total_tables).toBe(0);
    expect(analysis.error).toBe("Access denied to INFORMATION_SCHEMA");
  });

  it("handles tables named like Object prototype members", async () => {
    const session = new FakeHeatWave({
      tables: {
        constructor: { rows: 2, columns: [{ name: "id", key: "PRI" }, { name: "label" }] },
        toString: { rows: 5, columns: [{ name: "id", key: "PRI" }] }
      }
    });

    const analysis = await inspectSchema(session);

    expect(analysis.error).toBeUndefined();
    expect(Object.keys(analysis.schema_info)).toEqual(["constructor", "toString"]);
    const tables = new Map(Object.entries(analysis.schema_info));
    expect(tables.get("constructor")?.columns.map((c) => c.name)).toEqual(["id", "label"]);
    expect(tables.get("constructor")?.primary_keys).toEqual(["id"]);
    expect(Object.entries(analysis.data_statistics)).toEqual([
      ["constructor", { row_count: 2 }],
      ["toString", { row_count: 5 }]
    ]);
    expect(analysis.total_tables).toBe(2);
    expect(analysis.total_columns).toBe(3);
  });

  it("issues only read statements", async () => {
    const session = new FakeHeatWave({
      tables: { projects: { rows: 2, columns: [{ name: "project_id" }] } }
    });

    await inspectSchema(session);

    expect(session.statements).toHaveLength(2);
    expect(session.statements.every((s) => s.startsWith("SELECT"))).toBe(true);
    expect(session.statements[1]).toBe("SELECT COUNT(*) AS row_count FROM `projects`");
  });
});
