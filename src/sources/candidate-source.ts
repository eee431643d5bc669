import path from "node:path";

import { SourceError } from "../core/errors.js";
import { pathExists, readTextFile, splitLines } from "../core/utils.js";
import type { CandidateSource } from "../reaper/ports.js";

import { fetchText, isHttpLocation, type FetchLike } from "./http.js";

// =============================================================================
// SOURCES
// =============================================================================

export class UrlCandidateSource implements CandidateSource {
  constructor(
    private readonly url: string,
    private readonly fetchImpl: FetchLike = fetch,
  ) {}

  async fetchCandidates(): Promise<string[]> {
    return splitLines(await fetchText(this.url, this.fetchImpl));
  }
}

export class FileCandidateSource implements CandidateSource {
  constructor(private readonly filePath: string) {}

  async fetchCandidates(): Promise<string[]> {
    const absolutePath = path.resolve(this.filePath);
    if (!(await pathExists(absolutePath))) {
      throw new SourceError(`Candidate list not found at ${absolutePath}`);
    }
    return splitLines(await readTextFile(absolutePath));
  }
}

// A location is either an http(s) URL or a local path.
export function createCandidateSource(location: string, fetchImpl?: FetchLike): CandidateSource {
  return isHttpLocation(location)
    ? new UrlCandidateSource(location, fetchImpl)
    : new FileCandidateSource(location);
}
