/**
 * One reaper run: fetch, filter, dispatch, persist.
 * Purpose: tie the seen cache, candidate filter, reboot procedure and worker pool together.
 * Assumptions: sources and the cache load fail fast, before anything is dispatched or written.
 * Usage: await runReaper(config, ports) from the CLI or tests with fake ports.
 */

import type { ResolvedReaperConfig } from "../core/config.js";
import type { JsonObject } from "../core/logger.js";

import { compileFilterPattern, filterCandidates } from "./candidates.js";
import { dispatchHosts, type DispatchSummary } from "./dispatcher.js";
import type { ReaperPorts } from "./ports.js";
import { checkHost, type RebootMachineDeps } from "./reboot-machine.js";
import { loadSeenCache, saveSeenCache, type SeenCache } from "./seen-cache.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunReaperConfig = Pick<
  ResolvedReaperConfig,
  | "filter"
  | "filterbase"
  | "class"
  | "workers"
  | "dryrun"
  | "force"
  | "username"
  | "password"
  | "cachefile"
> & {
  remote: Pick<
    ResolvedReaperConfig["remote"],
    "tegra_token" | "shutdown_poll_seconds" | "shutdown_poll_attempts"
  >;
};

export type RunSummary = DispatchSummary & {
  candidates: number;
  accepted: string[];
  seenCache: SeenCache;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runReaper(config: RunReaperConfig, ports: ReaperPorts): Promise<RunSummary> {
  const { logger, clock } = ports;
  const filterPattern = config.filter
    ? compileFilterPattern(config.filter, config.filterbase)
    : undefined;

  logger.log({
    type: "run.start",
    payload: { workers: config.workers, dry_run: config.dryrun, force: config.force },
  });

  const inventory = await ports.inventory.fetchInventory();
  const candidates = await ports.candidates.fetchCandidates();
  const seenCache = await loadSeenCache(config.cachefile, clock.now());

  logger.log({
    type: "run.sources",
    payload: { inventory: inventory.size, candidates: candidates.length, seen: seenCache.size },
  });

  const accepted = filterCandidates(candidates, {
    inventory,
    seenCache,
    force: config.force,
    filterPattern,
    hostClass: config.class,
    logger,
  });
  logger.log({ type: "run.accepted", payload: { hosts: accepted } });

  const machineDeps: RebootMachineDeps = {
    remote: ports.remote,
    credentials: { username: config.username, password: config.password },
    clock,
    logger,
    settings: {
      dryRun: config.dryrun,
      tegraToken: config.remote.tegra_token,
      pollIntervalMs: config.remote.shutdown_poll_seconds * 1000,
      pollAttempts: config.remote.shutdown_poll_attempts,
    },
  };

  const summary = await dispatchHosts(accepted, {
    workers: config.workers,
    processHost: (host) => checkHost(host, machineDeps),
    seenCache,
    clock,
    logger,
  });

  await saveSeenCache(config.cachefile, seenCache);
  logger.log({
    type: "run.complete",
    payload: { completed: summary.completed, outcomes: outcomeCounts(summary) },
  });

  return { ...summary, candidates: candidates.length, accepted, seenCache };
}

// =============================================================================
// INTERNALS
// =============================================================================

function outcomeCounts(summary: DispatchSummary): JsonObject {
  const counts: JsonObject = {};
  for (const [outcome, count] of Object.entries(summary.outcomes)) {
    if (count !== undefined) counts[outcome] = count;
  }
  return counts;
}
