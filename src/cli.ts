#!/usr/bin/env node

import { Command } from "commander";
import { registerAnalyzeCommand } from "./commands/analyze";
import { registerGenerateCommand } from "./commands/generate";
import { registerLibraryCommands } from "./commands/library";
import { registerSaveCommand } from "./commands/save";
import { registerSearchCommand } from "./commands/search";
import { isTunesmithError } from "./lib/errors";
import { setVerbose } from "./lib/logger";

const program = new Command();

program
  .name("tunesmith")
  .description("Library-grounded playlist generation for Plex")
  .version("1.0.0")
  .option("--verbose", "Print debug output to stderr")
  .hook("preAction", (command) => {
    if (command.opts().verbose) setVerbose(true);
  });

registerGenerateCommand(program);
registerAnalyzeCommand(program);
registerSearchCommand(program);
registerLibraryCommands(program);
registerSaveCommand(program);

program.parseAsync(process.argv).catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  const code = isTunesmithError(error) ? ` [${error.code}]` : "";
  console.error(`Error${code}: ${message}`);
  process.exitCode = 1;
});
