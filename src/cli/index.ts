#!/usr/bin/env node

/**
 * CPI-U Loader CLI
 *
 * Loads the BLS CPI-U flat files into SQLite and maintains data_view.
 */

import { Command } from "commander";

import { registerDbCommands } from "./commands/db.js";
import { registerUpdateCommand } from "./commands/update.js";

const program = new Command();

program
  .name("cpi-u")
  .description("BLS CPI-U time series loader")
  .version("0.1.0");

registerDbCommands(program);
registerUpdateCommand(program);

program.action(() => {
  program.outputHelp();
});

await program.parseAsync();
