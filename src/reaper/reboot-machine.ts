/**
 * Per-host reboot procedure.
 * Purpose: inspect a host over the remote channel and walk it through shutdown and reboot.
 * Assumptions: one host per call, no state shared across hosts; every path ends in an outcome.
 * Usage: const result = await checkHost("talos-r4-snow-078", deps);
 */

import { logError, logHostEvent, type JsonObject, type ReaperLogger } from "../core/logger.js";

import type { Clock, RemoteControl, RemoteCredentials, RemoteSession } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type HostOutcome =
  | "rebooted"
  | "dry-run"
  | "unreachable"
  | "disabled-by-bug"
  | "no-marker"
  | "shutdown-refused"
  | "timeout"
  | "error";

export type HostResult = {
  host: string;
  outcome: HostOutcome;
  detail?: string;
};

export type RebootMachineSettings = {
  dryRun: boolean;
  tegraToken: string;
  pollIntervalMs: number;
  pollAttempts: number;
};

export type RebootMachineDeps = {
  remote: RemoteControl;
  credentials: RemoteCredentials;
  clock: Pick<Clock, "sleep">;
  logger: ReaperLogger;
  settings: RebootMachineSettings;
};

export const ACTIVE_MARKER_FILE = "buildbot.tac";
export const DISABLED_MARKER_PATTERN = /^buildbot\.tac\.bug(\d+)$/;

export const DISCONNECTED_LOG_MARKER = "Stopping factory";
export const SHUTDOWN_LOG_MARKERS = ["Main loop terminated", "ProcessExitedAlready"] as const;

const INITIAL_TAIL_LINES = 10;
const POLL_TAIL_LINES = 5;
const DIAGNOSTIC_TAIL_LINES = 10;

export const DEFAULT_REBOOT_SETTINGS: RebootMachineSettings = {
  dryRun: false,
  tegraToken: "tegra",
  pollIntervalMs: 5_000,
  pollAttempts: 30,
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function checkHost(host: string, deps: RebootMachineDeps): Promise<HostResult> {
  logHostEvent(deps.logger, "host.check", host, { dry_run: deps.settings.dryRun });

  if (deps.settings.dryRun) {
    return finish(deps.logger, { host, outcome: "dry-run" });
  }

  let session: RemoteSession | null;
  try {
    session = await deps.remote.connect(host, deps.credentials);
  } catch (err) {
    logError(deps.logger, "host.connect.error", err, host);
    return finish(deps.logger, { host, outcome: "unreachable", detail: "connect failed" });
  }

  if (!session) {
    return finish(deps.logger, { host, outcome: "unreachable" });
  }

  try {
    return finish(deps.logger, await runMachine(session, deps));
  } catch (err) {
    logError(deps.logger, "host.error", err, host);
    return finish(deps.logger, { host, outcome: "error" });
  } finally {
    await closeSession(session, deps);
  }
}

export function isTegraHost(host: string, tegraToken: string): boolean {
  return host.includes(tegraToken);
}

export function findDisabledByBug(markers: Iterable<string>): string | null {
  for (const marker of markers) {
    const match = DISABLED_MARKER_PATTERN.exec(marker);
    if (match) return match[1];
  }
  return null;
}

export function hasShutDown(logTail: string): boolean {
  if (logTail.trim().length === 0) return true;
  return SHUTDOWN_LOG_MARKERS.some((marker) => logTail.includes(marker));
}

// =============================================================================
// STATES
// =============================================================================

async function runMachine(session: RemoteSession, deps: RebootMachineDeps): Promise<HostResult> {
  const { remote, logger, settings } = deps;
  const host = session.host;

  if (isTegraHost(host, settings.tegraToken)) {
    return reboot(session, deps, "tegra");
  }

  await remote.waitUntilIdle(session);

  const markers = await remote.listMarkerFiles(session);
  if (!markers.has(ACTIVE_MARKER_FILE)) {
    logHostEvent(logger, "host.markers", host, { found: [...markers] });

    const bug = findDisabledByBug(markers);
    if (bug) {
      return { host, outcome: "disabled-by-bug", detail: `bug ${bug}` };
    }
    return { host, outcome: "no-marker", detail: `${ACTIVE_MARKER_FILE} not found` };
  }

  const tail = await remote.tailLog(session, INITIAL_TAIL_LINES);
  if (tail.includes(DISCONNECTED_LOG_MARKER)) {
    return reboot(session, deps, "disconnected");
  }

  if (!(await remote.requestGracefulShutdown(session))) {
    return { host, outcome: "shutdown-refused" };
  }

  logHostEvent(logger, "host.shutdown.wait", host);
  return pollShutdown(session, deps);
}

async function pollShutdown(session: RemoteSession, deps: RebootMachineDeps): Promise<HostResult> {
  const { remote, logger, settings, clock } = deps;
  let iteration = 0;

  while (true) {
    iteration += 1;
    if (iteration >= settings.pollAttempts) {
      const lastLines = await remote.tailLog(session, DIAGNOSTIC_TAIL_LINES);
      if (lastLines.length > 0) {
        logHostEvent(logger, "host.shutdown.log", session.host, { tail: lastLines });
      }
      return { host: session.host, outcome: "timeout", detail: `${iteration} polls` };
    }

    const tail = await remote.tailLog(session, POLL_TAIL_LINES);
    if (hasShutDown(tail)) {
      return reboot(session, deps, "shutdown-complete");
    }

    await clock.sleep(settings.pollIntervalMs);
  }
}

async function reboot(
  session: RemoteSession,
  deps: RebootMachineDeps,
  reason: string,
): Promise<HostResult> {
  logHostEvent(deps.logger, "host.reboot", session.host, { reason });
  await deps.remote.reboot(session);
  return { host: session.host, outcome: "rebooted", detail: reason };
}

// =============================================================================
// INTERNALS
// =============================================================================

async function closeSession(session: RemoteSession, deps: RebootMachineDeps): Promise<void> {
  try {
    await deps.remote.disconnect(session);
  } catch (err) {
    logError(deps.logger, "host.disconnect.error", err, session.host);
  }
}

function finish(logger: ReaperLogger, result: HostResult): HostResult {
  const payload: JsonObject = { outcome: result.outcome };
  if (result.detail) payload.detail = result.detail;
  logHostEvent(logger, "host.done", result.host, payload);
  return result;
}
