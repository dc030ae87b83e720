import chalk from "chalk";
import ora from "ora";

import { closeDatabase, openDatabase } from "../../db/connection.js";
import { ensureSchema, getTableStats } from "../../db/migrate.js";
import { checkReferences } from "../../services/consistency.js";
import { displayOrphans, displayTableStats } from "../utils/display.js";

import type { Command } from "commander";

const DEFAULT_DATABASE_PATH = "cpi-u.db";

function resolvePath(path: string | undefined): string {
  if (path !== undefined && path !== "") {
    return path;
  }
  const fromEnv = process.env.DATABASE_URL;
  return fromEnv !== undefined && fromEnv !== ""
    ? fromEnv
    : DEFAULT_DATABASE_PATH;
}

// ============================================================================
// Database Commands
// ============================================================================

export function registerDbCommands(program: Command): void {
  // init
  program
    .command("init")
    .description("Create the areas, items, periods and data tables if missing")
    .argument(
      "[path]",
      `SQLite file (defaults to DATABASE_URL, then ${DEFAULT_DATABASE_PATH})`
    )
    .action(async (path: string | undefined) => {
      const target = resolvePath(path);
      const spinner = ora(`Creating schema in ${target}...`).start();
      const opened = openDatabase(target);
      if (!opened.ok) {
        spinner.fail(opened.error.message);
        process.exitCode = 1;
        return;
      }
      const db = opened.value;

      try {
        const outcome = await ensureSchema(db);
        if (outcome.ok) {
          spinner.succeed(`Schema ready (${String(outcome.rows)} tables)`);
        } else {
          // Best effort: report and exit cleanly
          spinner.warn(`Schema incomplete: ${outcome.error.message}`);
        }
      } finally {
        await closeDatabase(db);
      }
    });

  // status
  program
    .command("status")
    .description("Show row counts and unknown dimension codes")
    .argument("[path]", "SQLite file (defaults to DATABASE_URL)")
    .action(async (path: string | undefined) => {
      const target = resolvePath(path);
      const opened = openDatabase(target);
      if (!opened.ok) {
        console.error(chalk.red(`Error: ${opened.error.message}`));
        process.exitCode = 1;
        return;
      }
      const db = opened.value;

      try {
        const stats = await getTableStats(db);
        if (stats.length === 0) {
          console.log(
            chalk.yellow(`No tables in ${target} (run 'init' first)`)
          );
          return;
        }

        console.log(chalk.bold(`\nDatabase: ${target}\n`));
        displayTableStats(stats);

        if (stats.some((row) => row.table_name === "data")) {
          displayOrphans(await checkReferences(db));
        }
      } finally {
        await closeDatabase(db);
      }
    });
}
