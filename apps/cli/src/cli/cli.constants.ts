export const CLI_COMMANDS = Symbol("STRATA_CLI_COMMANDS");

export interface CliOptionDefinition {
  readonly key: string;
  readonly flags: readonly string[];
  readonly description: string;
}

/** Flags that take a value. */
export const CLI_VALUE_OPTIONS: readonly CliOptionDefinition[] = [
  {
    key: "searchPaths",
    flags: ["--search-path", "-I"],
    description: "Directory searched for configuration files (repeatable).",
  },
  {
    key: "presetsDir",
    flags: ["--presets-dir"],
    description: "Directory holding the built-in presets.",
  },
  {
    key: "maxDepth",
    flags: ["--max-depth"],
    description: "Maximum inheritance chain length.",
  },
  {
    key: "logLevel",
    flags: ["--log-level"],
    description: "silent, fatal, error, warn, info, debug or trace.",
  },
  {
    key: "logFile",
    flags: ["--log-file"],
    description: "Write logs to this file instead of stderr.",
  },
  {
    key: "format",
    flags: ["--format", "-f"],
    description: "Output format: yaml (default) or json.",
  },
  {
    key: "output",
    flags: ["--output", "-o"],
    description: "Write the result to a file instead of stdout.",
  },
];

/** Flags that take no value. */
export const CLI_BOOLEAN_OPTIONS: readonly CliOptionDefinition[] = [
  {
    key: "noValidate",
    flags: ["--no-validate"],
    description: "Skip validation of the resolved tree.",
  },
];

const indexByFlag = (
  definitions: readonly CliOptionDefinition[],
): ReadonlyMap<string, CliOptionDefinition> =>
  new Map(
    definitions.flatMap((definition) =>
      definition.flags.map((flag): [string, CliOptionDefinition] => [
        flag,
        definition,
      ]),
    ),
  );

export const CLI_VALUE_OPTIONS_BY_FLAG = indexByFlag(CLI_VALUE_OPTIONS);
export const CLI_BOOLEAN_OPTIONS_BY_FLAG = indexByFlag(CLI_BOOLEAN_OPTIONS);
