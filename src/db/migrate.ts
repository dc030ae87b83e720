import { sql, type Kysely } from "kysely";

import { SchemaError, toPipelineError } from "../errors.js";
import { dbLogger } from "../logger.js";

import type { Database } from "./schema.js";
import type { StepOutcome } from "../types/index.js";

// ============================================================================
// Table Definitions
// ============================================================================

type TableDefinition = {
  name: keyof Database & string;
  build: (db: Kysely<Database>) => { execute(): Promise<void> };
};

const TABLES: TableDefinition[] = [
  {
    name: "data",
    build: (db) =>
      db.schema
        .createTable("data")
        .ifNotExists()
        .addColumn("id", "integer", (col) =>
          col.primaryKey().modifyEnd(sql`on conflict ignore`)
        )
        .addColumn("series_id", "text")
        .addColumn("prefix", "text")
        .addColumn("seasonal", "text")
        .addColumn("periodicity", "text")
        .addColumn("area_code", "text")
        .addColumn("item_code", "text")
        .addColumn("year", "integer")
        .addColumn("period", "text")
        .addColumn("value", "real")
        .addColumn("footnote_codes", "text")
        .addForeignKeyConstraint(
          "data_area_code_fk",
          ["area_code"],
          "areas",
          ["area_code"]
        )
        .addForeignKeyConstraint(
          "data_item_code_fk",
          ["item_code"],
          "items",
          ["item_code"]
        )
        .addForeignKeyConstraint("data_period_fk", ["period"], "periods", [
          "period",
        ])
        .addUniqueConstraint("data_series_year_period_unique", [
          "series_id",
          "year",
          "period",
        ]),
  },
  {
    name: "items",
    build: (db) =>
      db.schema
        .createTable("items")
        .ifNotExists()
        .addColumn("item_code", "text", (col) => col.notNull().primaryKey())
        .addColumn("item_name", "text")
        .addColumn("display_level", "integer")
        .addColumn("selectable", "text")
        .addColumn("sort_sequence", "integer"),
  },
  {
    name: "periods",
    build: (db) =>
      db.schema
        .createTable("periods")
        .ifNotExists()
        .addColumn("period", "text", (col) => col.notNull().primaryKey())
        .addColumn("period_abbr", "text")
        .addColumn("period_name", "text"),
  },
  {
    name: "areas",
    build: (db) =>
      db.schema
        .createTable("areas")
        .ifNotExists()
        .addColumn("area_code", "text", (col) => col.notNull().primaryKey())
        .addColumn("area_name", "text")
        .addColumn("display_level", "integer")
        .addColumn("selectable", "text")
        .addColumn("sort_sequence", "integer"),
  },
];

// ============================================================================
// Migration Functions
// ============================================================================

/**
 * Create the four tables if they do not exist yet.
 *
 * Each statement runs on its own: a failing one is logged and the rest are
 * still attempted. The outcome carries the first failure, if any.
 */
export async function ensureSchema(db: Kysely<Database>): Promise<StepOutcome> {
  const failures: SchemaError[] = [];

  for (const table of TABLES) {
    try {
      await table.build(db).execute();
      dbLogger.info({ table: table.name }, "Table ensured");
    } catch (error) {
      const mapped = toPipelineError(error, table.name);
      const schemaError =
        mapped instanceof SchemaError
          ? mapped
          : new SchemaError(mapped.message, table.name);
      dbLogger.error(
        { table: table.name, error: schemaError.message },
        "Failed to create table"
      );
      failures.push(schemaError);
    }
  }

  const [firstFailure] = failures;
  if (firstFailure !== undefined) {
    return { step: "schema", ok: false, error: firstFailure };
  }

  return { step: "schema", ok: true, rows: TABLES.length };
}

interface TableStat {
  table_name: string;
  row_count: number;
}

/**
 * Row counts for the tables this loader owns. Missing tables are skipped.
 */
export async function getTableStats(
  db: Kysely<Database>
): Promise<TableStat[]> {
  const existing = await sql<{ name: string }>`
    SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name
  `.execute(db);
  const names = new Set(existing.rows.map((row) => row.name));

  const stats: TableStat[] = [];
  for (const table of TABLES) {
    if (!names.has(table.name)) {
      continue;
    }
    const result = await sql<{ count: number }>`
      SELECT COUNT(*) AS count FROM ${sql.table(table.name)}
    `.execute(db);
    stats.push({
      table_name: table.name,
      row_count: result.rows[0]?.count ?? 0,
    });
  }

  return stats.sort((a, b) => a.table_name.localeCompare(b.table_name));
}
