import {
  isConfigResolutionError,
  type ConfigErrorKind,
} from "@strata/config";
import { CliParseError } from "./cli-parser.service";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const EXIT_CODES_BY_KIND: Readonly<Record<ConfigErrorKind, number>> = {
  NotFound: 3,
  UnknownBase: 3,
  ParseError: 4,
  CycleDetected: 5,
  ChainTooDeep: 5,
  NoMigrationPath: 6,
  ValidationFailed: 7,
};

export function exitCodeFor(error: unknown): number {
  if (error instanceof CliParseError) {
    return EXIT_USAGE;
  }
  if (isConfigResolutionError(error)) {
    return EXIT_CODES_BY_KIND[error.kind];
  }
  return EXIT_FAILURE;
}

/** `<kind>: <message>` followed by one indented line per offending item. */
export function renderError(error: unknown): string[] {
  if (isConfigResolutionError(error)) {
    return [
      `${error.kind}: ${error.message}`,
      ...error.details.map((detail) => `  - ${detail}`),
    ];
  }
  if (error instanceof CliParseError) {
    return [`UsageError: ${error.message}`];
  }
  return [error instanceof Error ? error.message : String(error)];
}
