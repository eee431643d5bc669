import type { ReaperConfigInput, ResolvedReaperConfig } from "../core/config.js";
import { loadReaperConfig } from "../core/config-loader.js";
import { formatErrorMessage } from "../core/error-format.js";
import {
  CacheError,
  ConfigError,
  SourceError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
  type UserFacingErrorCode,
} from "../core/errors.js";
import { createRunLogger, type ReaperLogger } from "../core/logger.js";
import { createPathsContext, type PathsContext } from "../core/paths.js";
import { defaultRunId, sleep } from "../core/utils.js";
import type { Clock, ReaperPorts } from "../reaper/ports.js";
import { runReaper, type RunSummary } from "../reaper/run-reaper.js";
import { SshRemoteControl } from "../remote/ssh-remote-control.js";
import { createCandidateSource } from "../sources/candidate-source.js";
import { createInventorySource } from "../sources/inventory-source.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunCommandOptions = {
  configPath?: string;
  overrides: ReaperConfigInput;
  paths?: PathsContext;
  runId?: string;
};

// =============================================================================
// COMMAND
// =============================================================================

export async function runCommand(opts: RunCommandOptions): Promise<RunSummary> {
  try {
    const paths = opts.paths ?? createPathsContext();
    const config = loadReaperConfig({
      configPath: opts.configPath,
      overrides: opts.overrides,
      paths,
    });

    const logger = createRunLogger({
      runId: opts.runId ?? defaultRunId(),
      logPath: config.logpath,
      debug: config.debug,
    });

    try {
      const summary = await runReaper(config, buildPorts(config, logger));
      console.error(formatRunSummary(summary));
      return summary;
    } finally {
      logger.close?.();
    }
  } catch (error) {
    throw normalizeRunCommandError(error);
  }
}

export function buildPorts(config: ResolvedReaperConfig, logger: ReaperLogger): ReaperPorts {
  const clock: Clock = { now: () => new Date(), sleep };

  return {
    candidates: createCandidateSource(config.kittens),
    inventory: createInventorySource(config.inventory_url),
    remote: new SshRemoteControl({ remote: config.remote, clock, logger }),
    clock,
    logger,
  };
}

export function formatRunSummary(summary: RunSummary): string {
  const outcomes = Object.entries(summary.outcomes)
    .map(([outcome, count]) => `${outcome}=${count}`)
    .join(", ");
  const outcomeSuffix = outcomes.length > 0 ? ` (${outcomes})` : "";

  return `Processed ${summary.completed} of ${summary.candidates} candidate(s)${outcomeSuffix}.`;
}

// =============================================================================
// ERROR NORMALIZATION
// =============================================================================

const RUN_COMMAND_FAILURE_TITLE = "Reaper run failed.";
const RUN_COMMAND_SOURCE_HINT =
  "Check --kittens and --inventory; both must be reachable URLs or existing files.";
const RUN_COMMAND_SOURCE_NEXT = "Rerun with --dryrun to confirm both sources load.";
const RUN_COMMAND_CACHE_HINT =
  "Fix or delete the seen-cache file (--cachefile); it is rebuilt on the next run.";
const RUN_COMMAND_CACHE_NEXT = "Run `reaper cache` to check the file loads.";

function normalizeRunCommandError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) {
    return error;
  }

  return new UserFacingError({
    code: resolveCommandErrorCode(error),
    title: RUN_COMMAND_FAILURE_TITLE,
    message: formatErrorMessage(error),
    hint: resolveRunCommandHint(error),
    next: resolveRunCommandNext(error),
    cause: error,
  });
}

function resolveCommandErrorCode(error: unknown): UserFacingErrorCode {
  if (error instanceof ConfigError) return USER_FACING_ERROR_CODES.config;
  if (error instanceof SourceError) return USER_FACING_ERROR_CODES.source;
  if (error instanceof CacheError) return USER_FACING_ERROR_CODES.cache;
  return USER_FACING_ERROR_CODES.unknown;
}

function resolveRunCommandHint(error: unknown): string | undefined {
  if (error instanceof SourceError) return RUN_COMMAND_SOURCE_HINT;
  if (error instanceof CacheError) return RUN_COMMAND_CACHE_HINT;
  return undefined;
}

function resolveRunCommandNext(error: unknown): string | undefined {
  if (error instanceof SourceError) return RUN_COMMAND_SOURCE_NEXT;
  if (error instanceof CacheError) return RUN_COMMAND_CACHE_NEXT;
  return undefined;
}
