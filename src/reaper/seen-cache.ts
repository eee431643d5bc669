/*
Time-windowed record of recently processed hosts.
The file holds one "<identifier> <YYYY-MM-DDTHH:MM:SS>" line per host in local time.
Entries older than the retention window are dropped on load and never written back.
*/

import { CacheError } from "../core/errors.js";
import { pathExists, readTextFile, splitLines, writeTextFile } from "../core/utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type SeenCache = Map<string, Date>;

export const SEEN_CACHE_RETENTION_SECONDS = 3600;

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/;

// =============================================================================
// TIMESTAMPS
// =============================================================================

export function formatCacheTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function parseCacheTimestamp(value: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) return null;

  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  const date = new Date(year, month - 1, day, hour, minute, second);

  // Reject overflowed components such as month 13 or hour 25.
  if (formatCacheTimestamp(date) !== value) return null;
  return date;
}

export function elapsedSeconds(since: Date, now: Date): number {
  return Math.floor((now.getTime() - since.getTime()) / 1000);
}

// =============================================================================
// CACHE OPERATIONS
// =============================================================================

export async function loadSeenCache(filePath: string, now: Date = new Date()): Promise<SeenCache> {
  const cache: SeenCache = new Map();
  if (!(await pathExists(filePath))) {
    return cache;
  }

  const raw = await readTextFile(filePath);
  splitLines(raw).forEach((line, index) => {
    if (line.trim().length === 0) return;

    const { identifier, lastSeen } = parseCacheLine(line, filePath, index + 1);
    if (elapsedSeconds(lastSeen, now) <= SEEN_CACHE_RETENTION_SECONDS) {
      cache.set(identifier, lastSeen);
    }
  });

  return cache;
}

export function isRecentlySeen(cache: SeenCache, identifier: string): boolean {
  return cache.has(identifier);
}

export function markSeen(cache: SeenCache, identifier: string, now: Date): void {
  cache.set(identifier, now);
}

export async function saveSeenCache(filePath: string, cache: SeenCache): Promise<void> {
  const lines = [...cache.entries()].map(
    ([identifier, lastSeen]) => `${identifier} ${formatCacheTimestamp(lastSeen)}\n`,
  );
  await writeTextFile(filePath, lines.join(""));
}

// =============================================================================
// INTERNALS
// =============================================================================

function parseCacheLine(
  line: string,
  filePath: string,
  lineNumber: number,
): { identifier: string; lastSeen: Date } {
  const fields = line.trim().split(" ");
  if (fields.length !== 2) {
    throw new CacheError(
      `Malformed seen-cache entry at ${filePath}:${lineNumber}: expected "<host> <timestamp>", got "${line}"`,
    );
  }

  const [identifier, stamp] = fields;
  const lastSeen = parseCacheTimestamp(stamp);
  if (!lastSeen) {
    throw new CacheError(
      `Malformed seen-cache timestamp at ${filePath}:${lineNumber}: "${stamp}"`,
    );
  }

  return { identifier, lastSeen };
}
