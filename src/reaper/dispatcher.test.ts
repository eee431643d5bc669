import { describe, expect, it } from "vitest";

import { FakeClock, MemoryLogger } from "./__tests__/fakes.js";
import { dispatchHosts, type DispatchOptions, type ProcessHost } from "./dispatcher.js";
import type { HostResult } from "./reboot-machine.js";
import type { SeenCache } from "./seen-cache.js";

function buildOptions(
  processHost: ProcessHost,
  overrides: Partial<DispatchOptions> = {},
): DispatchOptions {
  return {
    workers: 3,
    processHost,
    seenCache: new Map(),
    clock: new FakeClock(),
    logger: new MemoryLogger(),
    ...overrides,
  };
}

function rebooted(host: string): HostResult {
  return { host, outcome: "rebooted" };
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("dispatchHosts", () => {
  it("processes every host exactly once and marks it seen", async () => {
    const processed: string[] = [];
    const seenCache: SeenCache = new Map();
    const clock = new FakeClock(new Date(2024, 2, 1, 12, 0, 0));

    const summary = await dispatchHosts(
      ["talos-r4-snow-001", "talos-r4-snow-002", "tegra-050", "tegra-051"],
      buildOptions(
        async (host) => {
          processed.push(host);
          return rebooted(host);
        },
        { seenCache, clock },
      ),
    );

    expect(processed.sort()).toEqual([
      "talos-r4-snow-001",
      "talos-r4-snow-002",
      "tegra-050",
      "tegra-051",
    ]);
    expect(summary).toEqual({ dispatched: 4, completed: 4, outcomes: { rebooted: 4 } });
    expect([...seenCache.keys()].sort()).toEqual(processed);
    expect(seenCache.get("tegra-050")).toEqual(new Date(2024, 2, 1, 12, 0, 0));
  });

  it("never runs more hosts at once than there are workers", async () => {
    const gates = new Map<string, () => void>();
    let active = 0;
    let peak = 0;
    const hosts = ["h1", "h2", "h3", "h4", "h5"];

    const run = dispatchHosts(
      hosts,
      buildOptions(
        async (host) => {
          active += 1;
          peak = Math.max(peak, active);
          const gate = deferred();
          gates.set(host, gate.resolve);
          await gate.promise;
          active -= 1;
          return rebooted(host);
        },
        { workers: 2 },
      ),
    );

    // Release hosts one at a time as they get picked up.
    for (let released = 0; released < hosts.length; ) {
      await new Promise((resolve) => setImmediate(resolve));
      for (const [host, release] of gates) {
        gates.delete(host);
        release();
        released += 1;
      }
    }

    const summary = await run;
    expect(summary.completed).toBe(5);
    expect(peak).toBe(2);
  });

  it("lets other hosts finish while one host is stuck", async () => {
    const stuck = deferred();
    const finished: string[] = [];

    const run = dispatchHosts(
      ["stuck-01", "quick-01", "quick-02"],
      buildOptions(
        async (host) => {
          if (host === "stuck-01") await stuck.promise;
          finished.push(host);
          return rebooted(host);
        },
        { workers: 2 },
      ),
    );

    for (let i = 0; i < 5; i += 1) {
      await new Promise((resolve) => setImmediate(resolve));
    }
    expect(finished).toEqual(["quick-01", "quick-02"]);

    stuck.resolve();
    const summary = await run;
    expect(finished).toEqual(["quick-01", "quick-02", "stuck-01"]);
    expect(summary.completed).toBe(3);
  });

  it("reports hosts whose processing throws as errors", async () => {
    const seenCache: SeenCache = new Map();
    const logger = new MemoryLogger();

    const summary = await dispatchHosts(
      ["talos-r4-snow-001", "talos-r4-snow-002"],
      buildOptions(
        async (host) => {
          if (host === "talos-r4-snow-002") throw new Error("ssh blew up");
          return rebooted(host);
        },
        { seenCache, logger },
      ),
    );

    expect(summary.outcomes).toEqual({ rebooted: 1, error: 1 });
    expect(seenCache.has("talos-r4-snow-002")).toBe(true);
    expect(logger.ofType("worker.error")[0]?.payload).toEqual({ error: "ssh blew up" });
  });

  it("accounts for duplicate hosts once per occurrence", async () => {
    let calls = 0;

    const summary = await dispatchHosts(
      ["tegra-050", "tegra-050"],
      buildOptions(async (host) => {
        calls += 1;
        return rebooted(host);
      }),
    );

    expect(calls).toBe(2);
    expect(summary.completed).toBe(2);
  });

  it("finishes immediately when there is nothing to do", async () => {
    const summary = await dispatchHosts([], buildOptions(async (host) => rebooted(host)));

    expect(summary).toEqual({ dispatched: 0, completed: 0, outcomes: {} });
  });

  it("rejects a non-positive worker count", async () => {
    await expect(
      dispatchHosts(["h1"], buildOptions(async (host) => rebooted(host), { workers: 0 })),
    ).rejects.toThrow("workers must be a positive integer (received 0)");
  });
});
