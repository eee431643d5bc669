import { ConfigError } from "../core/errors.js";
import { logHostEvent, type ReaperLogger } from "../core/logger.js";

import type { Inventory } from "./ports.js";
import { isRecentlySeen, type SeenCache } from "./seen-cache.js";

// =============================================================================
// TYPES
// =============================================================================

export type CandidateParseResult =
  | { kind: "host"; identifier: string }
  | { kind: "blank" }
  | { kind: "invalid"; reason: string };

export type CandidateFilterOptions = {
  inventory: Inventory;
  seenCache: SeenCache;
  force: boolean;
  filterPattern?: RegExp;
  hostClass?: string;
  logger: ReaperLogger;
};

export type CandidateSkipReason =
  | "class-mismatch"
  | "filter-mismatch"
  | "unknown-host"
  | "disabled"
  | "has-notes"
  | "recently-seen";

export const FILTER_TEMPLATE_PLACEHOLDER = "%s";

// =============================================================================
// PARSING
// =============================================================================

// Lines look like "talos-r4-snow-078,Yes" or just "tegra-050".
export function parseCandidateLine(line: string): CandidateParseResult {
  const commaIndex = line.indexOf(",");
  const identifier = (commaIndex === -1 ? line : line.slice(0, commaIndex)).trim();

  if (identifier.length === 0) {
    return commaIndex === -1 && line.trim().length === 0
      ? { kind: "blank" }
      : { kind: "invalid", reason: "missing host name" };
  }
  if (/\s/.test(identifier)) {
    return { kind: "invalid", reason: "host name contains whitespace" };
  }

  return { kind: "host", identifier };
}

export function compileFilterPattern(filter: string, template: string): RegExp {
  if (!template.includes(FILTER_TEMPLATE_PLACEHOLDER)) {
    throw new ConfigError(
      `Filter template "${template}" must contain ${FILTER_TEMPLATE_PLACEHOLDER}.`,
    );
  }

  const source = template.replace(FILTER_TEMPLATE_PLACEHOLDER, () => filter);
  try {
    return new RegExp(source);
  } catch (err) {
    throw new ConfigError(`Invalid host filter pattern "${source}"`, err);
  }
}

// =============================================================================
// FILTERING
// =============================================================================

export function filterCandidates(lines: string[], options: CandidateFilterOptions): string[] {
  const accepted: string[] = [];

  for (const line of lines) {
    const parsed = parseCandidateLine(line);
    if (parsed.kind === "blank") continue;
    if (parsed.kind === "invalid") {
      options.logger.log({
        type: "candidate.invalid",
        level: "warn",
        payload: { line, reason: parsed.reason },
      });
      continue;
    }

    const skipReason = resolveSkipReason(parsed.identifier, options);
    if (skipReason) {
      const level = skipReason === "unknown-host" ? "warn" : "info";
      logHostEvent(options.logger, "candidate.skip", parsed.identifier, { reason: skipReason }, level);
      continue;
    }

    if (isRecentlySeen(options.seenCache, parsed.identifier)) {
      logHostEvent(options.logger, "candidate.forced", parsed.identifier, {
        reason: "recently-seen",
      });
    }
    accepted.push(parsed.identifier);
  }

  return accepted;
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveSkipReason(
  identifier: string,
  options: CandidateFilterOptions,
): CandidateSkipReason | null {
  if (options.hostClass && !identifier.startsWith(options.hostClass)) {
    return "class-mismatch";
  }
  if (options.filterPattern && !options.filterPattern.test(identifier)) {
    return "filter-mismatch";
  }

  const host = options.inventory.get(identifier);
  if (!host) return "unknown-host";
  if (!host.enabled) return "disabled";
  if (host.notes.length > 0) return "has-notes";

  if (isRecentlySeen(options.seenCache, identifier) && !options.force) {
    return "recently-seen";
  }

  return null;
}
