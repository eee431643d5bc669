import os from "node:os";
import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type PathsContext = {
  reaperHome: string;
};

export type ResolveReaperHomeOptions = {
  reaperHome?: string;
  env?: NodeJS.ProcessEnv;
};

// =============================================================================
// CONTEXT
// =============================================================================

export function resolveReaperHome(opts: ResolveReaperHomeOptions = {}): string {
  if (opts.reaperHome) {
    return path.resolve(opts.reaperHome);
  }

  const env = opts.env ?? process.env;
  if (env.REAPER_HOME) {
    return path.resolve(env.REAPER_HOME);
  }

  return path.join(os.homedir(), ".reaper");
}

export function createPathsContext(opts: ResolveReaperHomeOptions = {}): PathsContext {
  return { reaperHome: resolveReaperHome(opts) };
}

// =============================================================================
// PATH HELPERS
// =============================================================================

export function defaultSeenCachePath(paths: PathsContext): string {
  return path.join(paths.reaperHome, "reaper_seen.dat");
}

export function defaultConfigPath(paths: PathsContext): string {
  return path.join(paths.reaperHome, "config.yaml");
}
