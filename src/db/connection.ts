import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import SQLite from "better-sqlite3";
import { Kysely, SqliteDialect } from "kysely";

import { SchemaError, err, ok, type Result } from "../errors.js";
import { dbLogger } from "../logger.js";

import type { Database } from "./schema.js";

const MEMORY_PATH = ":memory:";

// Kysely only closes the handle once it has run a query, so keep our own
const handles = new WeakMap<Kysely<Database>, SQLite.Database>();

// ============================================================================
// Connection Management
// ============================================================================

/**
 * Open the single SQLite connection a run holds for its whole duration.
 *
 * Foreign keys are switched off: the fact table may reference dimension
 * rows that have not been loaded yet. Use checkReferences() to audit them.
 */
export function openDatabase(
  path: string
): Result<Kysely<Database>, SchemaError> {
  let sqlite: SQLite.Database;

  try {
    if (path !== MEMORY_PATH) {
      const dataDir = dirname(path);
      if (dataDir !== "." && !existsSync(dataDir)) {
        mkdirSync(dataDir, { recursive: true });
      }
    }

    sqlite = new SQLite(path);
    sqlite.pragma("foreign_keys = OFF");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    dbLogger.error({ path, error: message }, "Unable to open database");
    return err(
      new SchemaError(`Unable to open database ${path}: ${message}`, path)
    );
  }

  dbLogger.info({ path }, "Opened database");

  const db = new Kysely<Database>({
    dialect: new SqliteDialect({ database: sqlite }),
  });
  handles.set(db, sqlite);
  return ok(db);
}

/**
 * Close the connection opened by openDatabase()
 */
export async function closeDatabase(db: Kysely<Database>): Promise<void> {
  try {
    await db.destroy();
    const sqlite = handles.get(db);
    if (sqlite?.open === true) {
      sqlite.close();
    }
    handles.delete(db);
    dbLogger.info("Database connection closed");
  } catch (error) {
    dbLogger.error({ error }, "Error closing database connection");
    throw error;
  }
}
