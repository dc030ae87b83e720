import ora from "ora";

import { loadConfig, type AppConfig } from "../../config.js";
import { closeDatabase, openDatabase } from "../../db/connection.js";
import { ConfigurationError } from "../../errors.js";
import { runUpdate } from "../../services/pipeline.js";
import { displayRunSummary } from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// Update Command
// ============================================================================

export function registerUpdateCommand(program: Command): void {
  program
    .command("update")
    .description(
      "Fetch the CPI-U files, load them and rebuild data_view (needs DATABASE_URL)"
    )
    .action(async () => {
      let config: AppConfig;
      try {
        config = loadConfig();
      } catch (error) {
        if (error instanceof ConfigurationError) {
          console.error(`Error: ${error.message}`);
          process.exitCode = 1;
          return;
        }
        throw error;
      }

      const spinner = ora("Updating CPI-U tables...").start();
      const opened = openDatabase(config.databasePath);
      if (!opened.ok) {
        spinner.fail(opened.error.message);
        process.exitCode = 1;
        return;
      }
      const db = opened.value;

      try {
        const summary = await runUpdate(db, config, undefined, (progress) => {
          spinner.text = `Updating ${progress.step}: ${String(progress.current)}/${String(progress.total)}`;
        });

        // Step failures are reported, not turned into a non-zero exit
        if (summary.failed > 0) {
          spinner.warn(
            `Update finished with ${String(summary.failed)} failed step(s)`
          );
        } else {
          spinner.succeed("Update completed");
        }
        displayRunSummary(summary);
      } finally {
        await closeDatabase(db);
      }
    });
}
