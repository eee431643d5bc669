/**
 * Reaper test fakes.
 * Purpose: deterministic remote, clock, logger and source adapters for unit tests.
 * Assumptions: fakes are in-memory and intentionally minimal.
 * Usage: build ReaperPorts from these in *.test.ts files.
 */

import type { LogEventInput, ReaperLogger } from "../../core/logger.js";
import type {
  CandidateSource,
  Clock,
  HostRecord,
  Inventory,
  InventorySource,
  RemoteControl,
  RemoteCredentials,
  RemoteSession,
} from "../ports.js";

// =============================================================================
// LOGGER
// =============================================================================

export class MemoryLogger implements ReaperLogger {
  readonly events: LogEventInput[] = [];

  log(event: LogEventInput): void {
    this.events.push(event);
  }

  ofType(type: string): LogEventInput[] {
    return this.events.filter((event) => event.type === type);
  }
}

// =============================================================================
// CLOCK
// =============================================================================

export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private current: Date = new Date(2024, 2, 1, 12, 0, 0)) {}

  now(): Date {
    return new Date(this.current.getTime());
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current = new Date(this.current.getTime() + ms);
  }
}

// =============================================================================
// REMOTE CONTROL
// =============================================================================

export type HostScript = {
  reachable?: boolean;
  markers?: string[];
  initialTail?: string;
  shutdownAccepted?: boolean;
  /** Tails returned by successive 5-line polls; the last one repeats. */
  pollTails?: string[];
  diagnosticTail?: string;
  failOn?: RemoteOperation;
  /** Resolves waitUntilIdle only after this promise settles. */
  idleGate?: Promise<void>;
};

export type RemoteOperation =
  | "connect"
  | "disconnect"
  | "reboot"
  | "waitUntilIdle"
  | "listMarkerFiles"
  | "tailLog"
  | "requestGracefulShutdown";

export type RemoteCall = {
  op: RemoteOperation;
  host: string;
  lines?: number;
};

const DEFAULT_SCRIPT: Required<Omit<HostScript, "failOn" | "idleGate">> = {
  reachable: true,
  markers: ["buildbot.tac"],
  initialTail: "2024-03-01 11:58:01 [Broker] message from master: ping",
  shutdownAccepted: true,
  pollTails: [""],
  diagnosticTail: "",
};

export class FakeRemoteControl implements RemoteControl {
  readonly calls: RemoteCall[] = [];
  readonly credentialsSeen: RemoteCredentials[] = [];
  private readonly scripts = new Map<string, HostScript>();
  private readonly pollIndex = new Map<string, number>();
  private readonly initialTailServed = new Set<string>();

  script(host: string, script: HostScript): this {
    this.scripts.set(host, script);
    return this;
  }

  callsFor(host: string): RemoteOperation[] {
    return this.calls.filter((call) => call.host === host).map((call) => call.op);
  }

  async connect(host: string, credentials: RemoteCredentials): Promise<RemoteSession | null> {
    this.record("connect", host);
    this.credentialsSeen.push(credentials);
    return this.resolve(host).reachable ? { host } : null;
  }

  async disconnect(session: RemoteSession): Promise<void> {
    this.record("disconnect", session.host);
  }

  async reboot(session: RemoteSession): Promise<void> {
    this.record("reboot", session.host);
  }

  async waitUntilIdle(session: RemoteSession): Promise<void> {
    this.record("waitUntilIdle", session.host);
    await this.scripts.get(session.host)?.idleGate;
  }

  async listMarkerFiles(session: RemoteSession): Promise<Set<string>> {
    this.record("listMarkerFiles", session.host);
    return new Set(this.resolve(session.host).markers);
  }

  async tailLog(session: RemoteSession, lines: number): Promise<string> {
    this.record("tailLog", session.host, lines);
    const script = this.resolve(session.host);

    if (lines === 5) {
      const index = this.pollIndex.get(session.host) ?? 0;
      this.pollIndex.set(session.host, index + 1);
      return script.pollTails[Math.min(index, script.pollTails.length - 1)];
    }

    if (!this.initialTailServed.has(session.host)) {
      this.initialTailServed.add(session.host);
      return script.initialTail;
    }
    return script.diagnosticTail;
  }

  async requestGracefulShutdown(session: RemoteSession): Promise<boolean> {
    this.record("requestGracefulShutdown", session.host);
    return this.resolve(session.host).shutdownAccepted;
  }

  private record(op: RemoteOperation, host: string, lines?: number): void {
    this.calls.push(lines === undefined ? { op, host } : { op, host, lines });
    if (this.scripts.get(host)?.failOn === op) {
      throw new Error(`${op} exploded on ${host}`);
    }
  }

  private resolve(host: string): Required<Omit<HostScript, "failOn" | "idleGate">> {
    return { ...DEFAULT_SCRIPT, ...this.scripts.get(host) };
  }
}

// =============================================================================
// SOURCES
// =============================================================================

export class StaticCandidateSource implements CandidateSource {
  constructor(private readonly lines: string[]) {}

  async fetchCandidates(): Promise<string[]> {
    return [...this.lines];
  }
}

export class StaticInventorySource implements InventorySource {
  constructor(private readonly records: HostRecord[]) {}

  async fetchInventory(): Promise<Inventory> {
    return buildInventory(this.records);
  }
}

export function buildInventory(records: HostRecord[]): Inventory {
  return new Map(records.map((record) => [record.name, record]));
}

export function host(name: string, overrides: Partial<HostRecord> = {}): HostRecord {
  return { name, enabled: true, notes: "", ...overrides };
}
