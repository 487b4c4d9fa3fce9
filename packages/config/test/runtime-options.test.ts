import path from "path";
import { describe, expect, it } from "vitest";
import {
  mergeRuntimeOptions,
  parseRuntimeOptionsFromArgv,
} from "../src/runtime-cli";
import {
  resolveRuntimeOptions,
  resolveRuntimeOptionsFromEnv,
} from "../src/runtime-env";

describe("resolveRuntimeOptionsFromEnv", () => {
  it("maps STRATA_ variables onto runtime options", () => {
    const options = resolveRuntimeOptionsFromEnv({
      STRATA_SEARCH_PATH: ["/configs", "", " /more "].join(path.delimiter),
      STRATA_PRESETS_DIR: " /presets ",
      STRATA_MAX_DEPTH: "8",
      STRATA_LOG_LEVEL: "DEBUG",
      STRATA_LOG_FILE: "/tmp/strata.log",
    });

    expect(options).toEqual({
      searchPaths: ["/configs", "/more"],
      presetsDir: "/presets",
      maxDepth: 8,
      logLevel: "debug",
      logFile: "/tmp/strata.log",
    });
  });

  it("ignores values it cannot use", () => {
    expect(
      resolveRuntimeOptionsFromEnv({
        STRATA_PRESETS_DIR: "   ",
        STRATA_MAX_DEPTH: "0",
        STRATA_LOG_LEVEL: "loud",
      }),
    ).toEqual({});
    expect(resolveRuntimeOptionsFromEnv({ STRATA_MAX_DEPTH: "2.5" })).toEqual({});
  });

  it("lets explicit options win over the environment", () => {
    expect(
      resolveRuntimeOptions(
        { maxDepth: 3 },
        { STRATA_MAX_DEPTH: "8", STRATA_LOG_LEVEL: "info" },
      ),
    ).toEqual({ maxDepth: 3, logLevel: "info" });
  });
});

describe("parseRuntimeOptionsFromArgv", () => {
  it("collects resolver flags and skips everything else", () => {
    const options = parseRuntimeOptionsFromArgv([
      "resolve",
      "rbc-options",
      "--search-path",
      "/a",
      "-I",
      "/b",
      "--format",
      "json",
      "--max-depth",
      "4",
      "--log-level",
      "trace",
      "--log-file",
      "out.log",
      "--presets-dir",
      "/presets",
    ]);

    expect(options).toEqual({
      searchPaths: ["/a", "/b"],
      maxDepth: 4,
      logLevel: "trace",
      logFile: "out.log",
      presetsDir: "/presets",
    });
  });

  it("drops malformed values and stops at the terminator", () => {
    expect(
      parseRuntimeOptionsFromArgv([
        "--max-depth",
        "deep",
        "--log-level",
        "chatty",
        "--log-file",
        "--",
        "--presets-dir",
        "/ignored",
      ]),
    ).toEqual({});
  });
});

describe("mergeRuntimeOptions", () => {
  it("overlays defined values and copies lists", () => {
    const base = { searchPaths: ["/env"], logLevel: "info" as const };
    const overrides = { searchPaths: ["/cli"], maxDepth: 5 };

    const merged = mergeRuntimeOptions(base, overrides);

    expect(merged).toEqual({ searchPaths: ["/cli"], logLevel: "info", maxDepth: 5 });
    expect(merged.searchPaths).not.toBe(overrides.searchPaths);
    expect(base.searchPaths).toEqual(["/env"]);
  });
});
