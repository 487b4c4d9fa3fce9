import { isLogLevel, parsePathList, parsePositiveInteger } from "./runtime-env";
import type { ResolverRuntimeOptions } from "./types";

type StringOptionKey = "presetsDir" | "logFile";
type ValueOptionKey = StringOptionKey | "searchPaths" | "maxDepth" | "logLevel";

const VALUE_OPTIONS = new Map<string, ValueOptionKey>([
  ["--search-path", "searchPaths"],
  ["-I", "searchPaths"],
  ["--presets-dir", "presetsDir"],
  ["--max-depth", "maxDepth"],
  ["--log-level", "logLevel"],
  ["--log-file", "logFile"],
]);

/** Flags that take a value; the CLI parser needs these to skip the value. */
export const RUNTIME_VALUE_FLAGS: ReadonlySet<string> = new Set(
  VALUE_OPTIONS.keys(),
);

function mergeUniqueList(
  existing: readonly string[] | undefined,
  additions: readonly string[],
): string[] {
  const result = existing ? [...existing] : [];
  for (const value of additions) {
    if (!result.includes(value)) {
      result.push(value);
    }
  }
  return result;
}

export function cloneRuntimeOptions(
  options: ResolverRuntimeOptions,
): ResolverRuntimeOptions {
  const { searchPaths, ...rest } = options;
  return searchPaths === undefined
    ? { ...rest }
    : { ...rest, searchPaths: [...searchPaths] };
}

/**
 * Picks the resolver's own flags out of an argument vector. Unknown tokens
 * are ignored; malformed values leave the option unset.
 */
export function parseRuntimeOptionsFromArgv(
  argv: readonly string[],
): ResolverRuntimeOptions {
  const accumulator: ResolverRuntimeOptions = {};

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token === undefined || token === "--") {
      break;
    }

    const optionKey = VALUE_OPTIONS.get(token);
    if (!optionKey) {
      continue;
    }

    const next = argv[i + 1];
    if (next === undefined || next.startsWith("-")) {
      continue;
    }

    i += 1;

    switch (optionKey) {
      case "searchPaths": {
        const list = parsePathList(next) ?? [];
        if (list.length > 0) {
          accumulator.searchPaths = mergeUniqueList(
            accumulator.searchPaths,
            list,
          );
        }
        break;
      }
      case "maxDepth": {
        const depth = parsePositiveInteger(next);
        if (depth !== undefined) {
          accumulator.maxDepth = depth;
        }
        break;
      }
      case "logLevel":
        if (isLogLevel(next)) {
          accumulator.logLevel = next;
        }
        break;
      default:
        accumulator[optionKey] = next;
    }
  }

  return cloneRuntimeOptions(accumulator);
}

/** Overlays defined values of `overrides` onto `base`. */
export function mergeRuntimeOptions(
  base: ResolverRuntimeOptions,
  overrides: ResolverRuntimeOptions,
): ResolverRuntimeOptions {
  const merged = cloneRuntimeOptions(base);

  if (overrides.searchPaths !== undefined) {
    merged.searchPaths = [...overrides.searchPaths];
  }
  if (overrides.presetsDir !== undefined) {
    merged.presetsDir = overrides.presetsDir;
  }
  if (overrides.maxDepth !== undefined) {
    merged.maxDepth = overrides.maxDepth;
  }
  if (overrides.logLevel !== undefined) {
    merged.logLevel = overrides.logLevel;
  }
  if (overrides.logFile !== undefined) {
    merged.logFile = overrides.logFile;
  }

  return merged;
}
