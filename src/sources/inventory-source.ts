import path from "node:path";

import { z } from "zod";

import { SourceError } from "../core/errors.js";
import { pathExists, readTextFile } from "../core/utils.js";
import type { HostRecord, Inventory, InventorySource } from "../reaper/ports.js";

import { fetchText, isHttpLocation, type FetchLike } from "./http.js";

// =============================================================================
// SCHEMA
// =============================================================================

const InventoryEntrySchema = z
  .object({
    name: z.string().min(1),
    enabled: z.union([z.boolean(), z.number().int()]).transform((value) => Boolean(value)),
    notes: z
      .string()
      .nullish()
      .transform((value) => value ?? ""),
  })
  .passthrough();

const InventorySchema = z.array(InventoryEntrySchema);

// =============================================================================
// PARSING
// =============================================================================

export function parseInventory(raw: string, origin: string): Inventory {
  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (err) {
    throw new SourceError(`Inventory from ${origin} is not valid JSON`, err);
  }

  const parsed = InventorySchema.safeParse(doc);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const location = first && first.path.length > 0 ? first.path.join(".") : "<root>";
    throw new SourceError(
      `Inventory from ${origin} is invalid at ${location}: ${first?.message ?? "unknown issue"}`,
      parsed.error,
    );
  }

  const inventory: Inventory = new Map();
  for (const entry of parsed.data) {
    const record: HostRecord = { name: entry.name, enabled: entry.enabled, notes: entry.notes };
    inventory.set(record.name, record);
  }
  return inventory;
}

// =============================================================================
// SOURCES
// =============================================================================

// Reads `<base>/slaves` from the allocator API.
export class HttpInventorySource implements InventorySource {
  constructor(
    private readonly baseUrl: string,
    private readonly fetchImpl: FetchLike = fetch,
  ) {}

  async fetchInventory(): Promise<Inventory> {
    const url = `${this.baseUrl.replace(/\/+$/, "")}/slaves`;
    return parseInventory(await fetchText(url, this.fetchImpl), url);
  }
}

export class FileInventorySource implements InventorySource {
  constructor(private readonly filePath: string) {}

  async fetchInventory(): Promise<Inventory> {
    const absolutePath = path.resolve(this.filePath);
    if (!(await pathExists(absolutePath))) {
      throw new SourceError(`Inventory file not found at ${absolutePath}`);
    }
    return parseInventory(await readTextFile(absolutePath), absolutePath);
  }
}

export function createInventorySource(location: string, fetchImpl?: FetchLike): InventorySource {
  return isHttpLocation(location)
    ? new HttpInventorySource(location, fetchImpl)
    : new FileInventorySource(location);
}
