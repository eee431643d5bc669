import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import {
  ReaperConfigSchema,
  type ReaperConfigInput,
  type ResolvedReaperConfig,
} from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { defaultConfigPath, defaultSeenCachePath, type PathsContext } from "./paths.js";

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
  env: NodeJS.ProcessEnv;
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = ctx.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_CONFIG_HINT = "Check the --config path or omit it to use built-in defaults.";
const INVALID_CONFIG_HINT = "Fix the config file or the flags and rerun.";

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function createMissingConfigError(configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Reaper config missing.",
    message: `Config file not found at ${configPath}.`,
    hint: MISSING_CONFIG_HINT,
  });
}

function createInvalidConfigError(source: string, cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Reaper config invalid.",
    message: `Configuration from ${source} is invalid.`,
    hint: INVALID_CONFIG_HINT,
    cause,
  });
}

// =============================================================================
// PUBLIC API
// =============================================================================

export type LoadReaperConfigOptions = {
  configPath?: string;
  overrides?: ReaperConfigInput;
  paths: PathsContext;
  env?: NodeJS.ProcessEnv;
};

export function readConfigDocument(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw createMissingConfigError(absolutePath);
  }

  let raw: string;
  try {
    raw = fs.readFileSync(absolutePath, "utf8");
  } catch (err) {
    throw new ConfigError(`Failed to read config at ${absolutePath}`, err);
  }

  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse YAML config at ${absolutePath}: ${detail}`, err);
  }

  if (doc === undefined || doc === null) {
    return {};
  }
  if (typeof doc !== "object" || Array.isArray(doc)) {
    throw new ConfigError(`Config at ${absolutePath} must be a mapping of keys to values.`);
  }

  const expanded = expandEnv(doc, { file: absolutePath, trail: [], env });
  return isRecord(expanded) ? expanded : {};
}

// An explicit path wins; otherwise `<reaper home>/config.yaml` is used when present.
export function discoverConfigPath(
  configPath: string | undefined,
  paths: PathsContext,
): string | undefined {
  if (configPath) return configPath;

  const candidate = defaultConfigPath(paths);
  return fs.existsSync(candidate) ? candidate : undefined;
}

export function loadReaperConfig(options: LoadReaperConfigOptions): ResolvedReaperConfig {
  const configPath = discoverConfigPath(options.configPath, options.paths);
  const source = configPath ? path.resolve(configPath) : "command-line flags";

  try {
    const fileDoc = configPath ? readConfigDocument(configPath, options.env) : {};
    const merged = mergeOverrides(fileDoc, options.overrides ?? {});

    const parsed = ReaperConfigSchema.safeParse(merged);
    if (!parsed.success) {
      const details = formatIssues(parsed.error.issues);
      throw new ConfigError(`Invalid config from ${source}:\n${details}`, parsed.error);
    }

    const cfg = parsed.data;
    return {
      ...cfg,
      cachefile: path.resolve(cfg.cachefile ?? defaultSeenCachePath(options.paths)),
      logpath: cfg.logpath ? path.resolve(cfg.logpath) : undefined,
    };
  } catch (err) {
    if (err instanceof ConfigError) {
      throw createInvalidConfigError(source, err);
    }
    throw err;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Flags win over file values; `remote` is merged one level deep.
function mergeOverrides(
  fileDoc: Record<string, unknown>,
  overrides: ReaperConfigInput,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...fileDoc };

  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue;

    const existing = merged[key];
    if (key === "remote" && isRecord(existing) && isRecord(value)) {
      merged[key] = { ...existing, ...value };
    } else {
      merged[key] = value;
    }
  }

  return merged;
}
