/**
 * Reaper ports define the boundary between the run logic and its adapters.
 * Purpose: keep sources, the remote channel and time replaceable for tests.
 * Assumptions: ports stay small and map to stable runtime capabilities.
 * Usage: build real adapters in `cli/run.ts` or fakes in tests, then call runReaper.
 */

import type { ReaperLogger } from "../core/logger.js";

// =============================================================================
// INVENTORY
// =============================================================================

export type HostRecord = {
  name: string;
  enabled: boolean;
  notes: string;
};

export type Inventory = Map<string, HostRecord>;

export interface InventorySource {
  fetchInventory(): Promise<Inventory>;
}

export interface CandidateSource {
  fetchCandidates(): Promise<string[]>;
}

// =============================================================================
// REMOTE CONTROL
// =============================================================================

export type RemoteCredentials = {
  username: string;
  password?: string;
};

export type RemoteSession = {
  host: string;
};

export interface RemoteControl {
  /** Returns null when the host cannot be reached. */
  connect(host: string, credentials: RemoteCredentials): Promise<RemoteSession | null>;
  disconnect(session: RemoteSession): Promise<void>;
  reboot(session: RemoteSession): Promise<void>;
  waitUntilIdle(session: RemoteSession): Promise<void>;
  listMarkerFiles(session: RemoteSession): Promise<Set<string>>;
  /** Last `lines` lines of the service log; empty when the log is missing. */
  tailLog(session: RemoteSession, lines: number): Promise<string>;
  requestGracefulShutdown(session: RemoteSession): Promise<boolean>;
}

// =============================================================================
// RUNTIME
// =============================================================================

export interface Clock {
  now(): Date;
  sleep(ms: number): Promise<void>;
}

export type ReaperPorts = {
  candidates: CandidateSource;
  inventory: InventorySource;
  remote: RemoteControl;
  clock: Clock;
  logger: ReaperLogger;
};
