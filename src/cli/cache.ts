import { elapsedSeconds, formatCacheTimestamp, loadSeenCache } from "../reaper/seen-cache.js";

export async function cacheCommand(cachefile: string, now: Date = new Date()): Promise<void> {
  const cache = await loadSeenCache(cachefile, now);
  if (cache.size === 0) {
    console.log(`No hosts in ${cachefile} within the last hour.`);
    return;
  }

  const rows = [...cache.entries()].sort(([a], [b]) => a.localeCompare(b));
  for (const [host, lastSeen] of rows) {
    console.log(`${host} ${formatCacheTimestamp(lastSeen)} (${elapsedSeconds(lastSeen, now)}s ago)`);
  }
}
