#!/usr/bin/env node

import { Command } from "commander";
import { ConfigError } from "./lib/config.js";
import { CLI_NAME, VERSION } from "./lib/branding.js";

const program = new Command();

// Global config option
let globalConfigPath: string | undefined;

program
  .name(CLI_NAME)
  .description("Delivers motion-triggered camera clips to durable storage")
  .version(VERSION)
  .option("-c, --config <path>", "Path to configuration file")
  .hook("preAction", (thisCommand) => {
    const opts: { config?: string } = thisCommand.opts();
    globalConfigPath = opts.config;
  });

program
  .command("run", { isDefault: true })
  .description("Fetch, deliver and clean up clips for today or a date range")
  .option("--start <date>", "First day to process (YYYY-MM-DD), requires --end")
  .option("--end <date>", "Last day to process (YYYY-MM-DD), requires --start")
  .action(async (options: { start?: string; end?: string }) => {
    try {
      const { runCommand } = await import("./commands/run.js");
      await runCommand({
        configPath: globalConfigPath,
        start: options.start,
        end: options.end,
        handleSignals: true,
        exit: (code) => process.exit(code),
      });
    } catch (error) {
      console.error(`Fatal error during run:`, error);
      process.exit(1);
    }
  });

program
  .command("status")
  .description(`Show the ${CLI_NAME} lock, log and ledger state`)
  .option("--json", "Output in JSON format")
  .action(async (options: { json?: boolean }) => {
    try {
      const { statusCommand } = await import("./commands/status.js");
      await statusCommand({ configPath: globalConfigPath, json: options.json });
    } catch (error) {
      if (error instanceof ConfigError) {
        console.error(`Configuration error: ${error.message}`);
        process.exit(1);
      }
      console.error(`Failed to read status: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
