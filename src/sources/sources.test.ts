import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { SourceError } from "../core/errors.js";

import {
  FileCandidateSource,
  UrlCandidateSource,
  createCandidateSource,
} from "./candidate-source.js";
import { fetchText, isHttpLocation } from "./http.js";
import {
  FileInventorySource,
  HttpInventorySource,
  createInventorySource,
  parseInventory,
} from "./inventory-source.js";

const INVENTORY_JSON = JSON.stringify([
  { name: "talos-r4-snow-001", enabled: true, notes: "", datacenter: "scl1" },
  { name: "talos-r4-snow-002", enabled: 0, notes: null },
  { name: "tegra-050", enabled: 1 },
]);

function respondWith(body: string, status = 200) {
  return vi.fn(async (_url: string) => new Response(body, { status }));
}

describe("isHttpLocation", () => {
  it("accepts http and https URLs only", () => {
    expect(isHttpLocation("http://example.test/list.txt")).toBe(true);
    expect(isHttpLocation("HTTPS://example.test/list.txt")).toBe(true);
    expect(isHttpLocation("./list.txt")).toBe(false);
    expect(isHttpLocation("ftp://example.test/list.txt")).toBe(false);
  });
});

describe("fetchText", () => {
  it("wraps non-OK responses in a source error", async () => {
    const fetchImpl = respondWith("nope", 503);

    await expect(fetchText("http://example.test/list.txt", fetchImpl)).rejects.toThrow(
      /^Failed to fetch http:\/\/example\.test\/list\.txt: HTTP 503/,
    );
  });

  it("wraps network failures in a source error", async () => {
    const fetchImpl = vi.fn(async (_url: string): Promise<Response> => {
      throw new Error("getaddrinfo ENOTFOUND example.test");
    });

    await expect(fetchText("http://example.test/list.txt", fetchImpl)).rejects.toThrow(
      new SourceError(
        "Failed to fetch http://example.test/list.txt: getaddrinfo ENOTFOUND example.test",
      ),
    );
  });
});

describe("candidate sources", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "candidates-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("splits a fetched list into lines", async () => {
    const fetchImpl = respondWith("tegra-050,Yes\r\ntalos-r4-snow-001,No\n");
    const source = new UrlCandidateSource("http://example.test/list.txt", fetchImpl);

    expect(await source.fetchCandidates()).toEqual(["tegra-050,Yes", "talos-r4-snow-001,No", ""]);
    expect(fetchImpl).toHaveBeenCalledWith("http://example.test/list.txt");
  });

  it("reads a local candidate file", async () => {
    const listPath = path.join(tmpDir, "list.txt");
    await fs.writeFile(listPath, "tegra-050\ntegra-051");

    const source = createCandidateSource(listPath);

    expect(source).toBeInstanceOf(FileCandidateSource);
    expect(await source.fetchCandidates()).toEqual(["tegra-050", "tegra-051"]);
  });

  it("fails when the local candidate file is missing", async () => {
    const source = new FileCandidateSource(path.join(tmpDir, "absent.txt"));

    await expect(source.fetchCandidates()).rejects.toBeInstanceOf(SourceError);
  });
});

describe("parseInventory", () => {
  it("normalizes enabled flags and notes", () => {
    const inventory = parseInventory(INVENTORY_JSON, "fixture");

    expect([...inventory.values()]).toEqual([
      { name: "talos-r4-snow-001", enabled: true, notes: "" },
      { name: "talos-r4-snow-002", enabled: false, notes: "" },
      { name: "tegra-050", enabled: true, notes: "" },
    ]);
  });

  it("rejects invalid JSON", () => {
    expect(() => parseInventory("{not json", "fixture")).toThrow(
      "Inventory from fixture is not valid JSON",
    );
  });

  it("reports the first schema problem with its location", () => {
    const raw = JSON.stringify([{ name: "tegra-050", enabled: true }, { enabled: true }]);

    expect(() => parseInventory(raw, "fixture")).toThrow(
      "Inventory from fixture is invalid at 1.name: Required",
    );
  });
});

describe("inventory sources", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "inventory-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("fetches the slaves listing beneath the API base", async () => {
    const fetchImpl = respondWith(INVENTORY_JSON);
    const source = createInventorySource("http://allocator.example.test/api/", fetchImpl);

    const inventory = await source.fetchInventory();

    expect(source).toBeInstanceOf(HttpInventorySource);
    expect(fetchImpl).toHaveBeenCalledWith("http://allocator.example.test/api/slaves");
    expect(inventory.get("tegra-050")?.enabled).toBe(true);
  });

  it("reads an inventory file", async () => {
    const inventoryPath = path.join(tmpDir, "slaves.json");
    await fs.writeFile(inventoryPath, INVENTORY_JSON);

    const inventory = await new FileInventorySource(inventoryPath).fetchInventory();

    expect(inventory.size).toBe(3);
  });

  it("fails when the inventory file is missing", async () => {
    const source = createInventorySource(path.join(tmpDir, "absent.json"));

    await expect(source.fetchInventory()).rejects.toThrow(/^Inventory file not found at /);
  });
});
