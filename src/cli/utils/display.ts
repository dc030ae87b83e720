/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { OrphanReport, RunSummary } from "../../types/index.js";

/**
 * Display the per-step outcome of an update run
 */
export function displayRunSummary(summary: RunSummary): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Step"),
      chalk.cyan("Status"),
      chalk.cyan("Rows"),
      chalk.cyan("Detail"),
    ],
    colWidths: [10, 10, 12, 60],
    wordWrap: true,
  });

  for (const outcome of summary.steps) {
    if (outcome.ok) {
      const detail =
        outcome.skipped !== undefined && outcome.skipped > 0
          ? chalk.gray(`${String(outcome.skipped)} already present`)
          : "";
      table.push([
        outcome.step,
        chalk.green("ok"),
        String(outcome.rows),
        detail,
      ]);
    } else {
      table.push([
        outcome.step,
        chalk.red("failed"),
        chalk.gray("-"),
        `${outcome.error.name}: ${outcome.error.message}`,
      ]);
    }
  }

  console.log(table.toString());
  console.log(
    chalk.gray(
      `Finished in ${(summary.durationMs / 1000).toFixed(1)}s (started ${summary.startedAt.toISOString()})`
    )
  );

  if (summary.orphans !== null) {
    displayOrphans(summary.orphans);
  }
}

/**
 * Display advisory orphan counts, if any
 */
export function displayOrphans(orphans: OrphanReport): void {
  const dimensions = (["areas", "items", "periods"] as const).filter(
    (dimension) => orphans[dimension] > 0
  );
  if (dimensions.length === 0) {
    return;
  }

  console.log(chalk.yellow("\nObservations with unknown codes:"));
  for (const dimension of dimensions) {
    console.log(
      `  ${dimension.padEnd(8)} ${chalk.yellow(String(orphans[dimension]))}`
    );
  }
}

/**
 * Display row counts per table
 */
export function displayTableStats(
  stats: { table_name: string; row_count: number }[]
): void {
  const table = new CliTable3({
    head: [chalk.cyan("Table"), chalk.cyan("Rows")],
    colWidths: [12, 14],
  });

  for (const row of stats) {
    table.push([chalk.green(row.table_name), String(row.row_count)]);
  }

  console.log(table.toString());
}
