import { Command, InvalidArgumentError } from "commander";

import type { ReaperConfigInput } from "../core/config.js";
import { loadReaperConfig } from "../core/config-loader.js";
import { createPathsContext } from "../core/paths.js";

import { cacheCommand } from "./cache.js";
import { runCommand } from "./run.js";

// =============================================================================
// TYPES
// =============================================================================

type CliOptions = {
  config?: string;
  kittens?: string;
  inventory?: string;
  filter?: string;
  filterbase?: string;
  class?: string;
  workers?: number;
  dryrun?: boolean;
  force?: boolean;
  username?: string;
  password?: string;
  cachefile?: string;
  logpath?: string;
  debug?: boolean;
};

// =============================================================================
// PARSERS
// =============================================================================

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export function toConfigOverrides(opts: CliOptions): ReaperConfigInput {
  return {
    kittens: opts.kittens,
    inventory_url: opts.inventory,
    filter: opts.filter,
    filterbase: opts.filterbase,
    class: opts.class,
    workers: opts.workers,
    dryrun: opts.dryrun,
    force: opts.force,
    username: opts.username,
    password: opts.password,
    cachefile: opts.cachefile,
    logpath: opts.logpath,
    debug: opts.debug,
  };
}

// =============================================================================
// PROGRAM
// =============================================================================

export function buildCli(): Command {
  const program = new Command();

  program
    .name("reaper")
    .description("Reboot build-farm hosts that need it, a bounded number at a time")
    .version("0.1.0")
    .option("-c, --config <path>", "YAML config file (flags override its values)")
    .option("-k, --kittens <source>", "URL or file listing hosts that need a reboot")
    .option("--inventory <source>", "Inventory API base URL or JSON file")
    .option("-f, --filter <regex>", "Only process hosts matching this expression")
    .option("--filterbase <template>", "Template the filter is inserted into (default: ^%s)")
    .option("--class <prefix>", "Only process hosts whose name starts with this prefix")
    .option("-w, --workers <n>", "How many hosts to process in parallel", parsePositiveInt)
    .option("--dryrun", "List what would be done without touching any host")
    .option("--force", "Process hosts even if they were handled within the last hour")
    .option("-u, --username <name>", "SSH username")
    .option("-p, --password <password>", "SSH password (uses sshpass)")
    .option("--cachefile <path>", "Seen-cache file (default: ~/.reaper/reaper_seen.dat)")
    .option("-l, --logpath <path>", "Also append JSONL events to this file")
    .option("-d, --debug", "Log every remote command")
    .option("--no-debug", "Disable debug logging")
    .action(async () => {
      const opts = program.opts<CliOptions>();
      await runCommand({
        configPath: opts.config,
        overrides: toConfigOverrides(opts),
      });
    });

  program
    .command("cache")
    .description("Show hosts still inside the seen-cache window")
    .action(async () => {
      const opts = program.opts<CliOptions>();
      const config = loadReaperConfig({
        configPath: opts.config,
        overrides: toConfigOverrides(opts),
        paths: createPathsContext(),
      });
      await cacheCommand(config.cachefile);
    });

  return program;
}
