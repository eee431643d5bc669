/**
 * Worker pool for the reboot procedure.
 * Purpose: fan hosts out to N concurrent workers and collect exactly one result per host.
 * Assumptions: the seen cache is only touched here, never by workers.
 * Usage: const summary = await dispatchHosts(hosts, { workers: 4, processHost, ... });
 */

import { ReaperError } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import { logError, type ReaperLogger } from "../core/logger.js";

import { AsyncChannel } from "./channel.js";
import type { Clock } from "./ports.js";
import type { HostOutcome, HostResult } from "./reboot-machine.js";
import { markSeen, type SeenCache } from "./seen-cache.js";

// =============================================================================
// TYPES
// =============================================================================

export type ProcessHost = (host: string) => Promise<HostResult>;

export type DispatchOptions = {
  workers: number;
  processHost: ProcessHost;
  seenCache: SeenCache;
  clock: Pick<Clock, "now">;
  logger: ReaperLogger;
};

export type DispatchSummary = {
  dispatched: number;
  completed: number;
  outcomes: Partial<Record<HostOutcome, number>>;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function dispatchHosts(
  hosts: string[],
  options: DispatchOptions,
): Promise<DispatchSummary> {
  assertWorkerCount(options.workers);

  const work = new AsyncChannel<string>();
  const results = new AsyncChannel<HostResult>();

  for (const host of hosts) work.send(host);
  work.close();

  const outstanding = new Map<string, number>();
  for (const host of hosts) outstanding.set(host, (outstanding.get(host) ?? 0) + 1);

  options.logger.log({
    type: "dispatch.start",
    payload: { hosts: hosts.length, workers: options.workers },
  });

  const workers = Array.from({ length: options.workers }, (_, index) =>
    runWorker(index + 1, work, results, options),
  );
  const workersDone = Promise.all(workers).then(() => results.close());

  const summary: DispatchSummary = { dispatched: hosts.length, completed: 0, outcomes: {} };
  let remaining = hosts.length;

  while (remaining > 0) {
    const result = await results.receive();
    if (result === undefined) {
      throw new ReaperError(`Workers exited with ${remaining} host(s) unaccounted for.`);
    }

    const pending = outstanding.get(result.host) ?? 0;
    if (pending === 0) continue;

    outstanding.set(result.host, pending - 1);
    remaining -= 1;
    markSeen(options.seenCache, result.host, options.clock.now());

    summary.completed += 1;
    summary.outcomes[result.outcome] = (summary.outcomes[result.outcome] ?? 0) + 1;
  }

  await workersDone;
  options.logger.log({ type: "dispatch.complete", payload: { completed: summary.completed } });

  return summary;
}

// =============================================================================
// INTERNALS
// =============================================================================

async function runWorker(
  workerId: number,
  work: AsyncChannel<string>,
  results: AsyncChannel<HostResult>,
  options: DispatchOptions,
): Promise<void> {
  for await (const host of work) {
    results.send(await processSafely(workerId, host, options));
  }
}

async function processSafely(
  workerId: number,
  host: string,
  options: DispatchOptions,
): Promise<HostResult> {
  try {
    return await options.processHost(host);
  } catch (err) {
    logError(options.logger, "worker.error", err, host);
    return { host, outcome: "error", detail: `worker ${workerId}: ${formatErrorMessage(err)}` };
  }
}

function assertWorkerCount(workers: number): void {
  if (!Number.isInteger(workers) || workers < 1) {
    throw new Error(`workers must be a positive integer (received ${workers})`);
  }
}
