import path from "path";
import type { LogLevel, ResolverRuntimeOptions } from "./types";

export const LOG_LEVEL_VALUES: ReadonlySet<string> = new Set<LogLevel>([
  "silent",
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
]);

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVEL_VALUES.has(value);
}

function parseString(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/** Splits a `PATH`-style list on the platform delimiter. */
export function parsePathList(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }

  return value
    .split(path.delimiter)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function parsePositiveInteger(
  value: string | undefined,
): number | undefined {
  const trimmed = parseString(value);
  if (trimmed === undefined || !/^\d+$/.test(trimmed)) {
    return undefined;
  }

  const parsed = Number.parseInt(trimmed, 10);
  return parsed > 0 ? parsed : undefined;
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = parseString(value)?.toLowerCase();
  if (normalized === undefined || !isLogLevel(normalized)) {
    return undefined;
  }
  return normalized;
}

export function resolveRuntimeOptionsFromEnv(
  env: NodeJS.ProcessEnv,
): ResolverRuntimeOptions {
  const options: ResolverRuntimeOptions = {};

  const searchPaths = parsePathList(env.STRATA_SEARCH_PATH);
  if (searchPaths !== undefined) {
    options.searchPaths = searchPaths;
  }

  const presetsDir = parseString(env.STRATA_PRESETS_DIR);
  if (presetsDir !== undefined) {
    options.presetsDir = presetsDir;
  }

  const maxDepth = parsePositiveInteger(env.STRATA_MAX_DEPTH);
  if (maxDepth !== undefined) {
    options.maxDepth = maxDepth;
  }

  const logLevel = parseLogLevel(env.STRATA_LOG_LEVEL);
  if (logLevel !== undefined) {
    options.logLevel = logLevel;
  }

  const logFile = parseString(env.STRATA_LOG_FILE);
  if (logFile !== undefined) {
    options.logFile = logFile;
  }

  return options;
}

/** Environment settings overlaid with explicitly passed options. */
export function resolveRuntimeOptions(
  moduleOptions?: ResolverRuntimeOptions,
  env: NodeJS.ProcessEnv = process.env,
): ResolverRuntimeOptions {
  const envOptions = resolveRuntimeOptionsFromEnv(env);
  return {
    ...envOptions,
    ...(moduleOptions ?? {}),
  } satisfies ResolverRuntimeOptions;
}
