import type { SemanticVersion } from "./types";

export type ConfigErrorKind =
  | "NotFound"
  | "UnknownBase"
  | "ParseError"
  | "CycleDetected"
  | "ChainTooDeep"
  | "NoMigrationPath"
  | "ValidationFailed";

export interface SourceLocation {
  line: number;
  column: number;
}

export interface ConfigValidationIssue {
  path: string;
  reason: string;
  code: ConfigValidationIssueCode;
}

export type ConfigValidationIssueCode =
  | "unknown_key"
  | "invalid_type"
  | "missing_key"
  | "exclusive_options"
  | "duplicate_identifier"
  | "invalid_value";

/**
 * Base class for every failure the resolver reports. `kind` is the stable
 * discriminant the CLI maps to exit codes.
 */
export abstract class ConfigResolutionError extends Error {
  abstract readonly kind: ConfigErrorKind;

  /** Offending document names or tree paths, one per rendered line. */
  get details(): string[] {
    return [];
  }
}

export class DocumentNotFoundError extends ConfigResolutionError {
  readonly kind = "NotFound";

  constructor(
    readonly documentName: string,
    readonly candidates: string[] = [],
  ) {
    super(
      candidates.length > 1
        ? `Configuration "${documentName}" is ambiguous.`
        : `Configuration "${documentName}" was not found.`,
    );
    this.name = "DocumentNotFoundError";
  }

  override get details(): string[] {
    return this.candidates;
  }
}

export class UnknownBaseError extends ConfigResolutionError {
  readonly kind = "UnknownBase";

  constructor(
    readonly baseName: string,
    readonly referencedBy: string,
    readonly candidates: string[] = [],
  ) {
    super(
      candidates.length > 1
        ? `Base configuration "${baseName}" referenced by "${referencedBy}" is ambiguous.`
        : `Base configuration "${baseName}" referenced by "${referencedBy}" does not resolve.`,
    );
    this.name = "UnknownBaseError";
  }

  override get details(): string[] {
    return this.candidates;
  }
}

export class ConfigParseError extends ConfigResolutionError {
  readonly kind = "ParseError";

  constructor(
    readonly documentName: string,
    readonly reason: string,
    readonly location?: SourceLocation,
  ) {
    super(
      location
        ? `Unable to parse "${documentName}" at line ${location.line}, column ${location.column}: ${reason}`
        : `Unable to parse "${documentName}": ${reason}`,
    );
    this.name = "ConfigParseError";
  }
}

export class CycleDetectedError extends ConfigResolutionError {
  readonly kind = "CycleDetected";

  constructor(readonly cycle: string[]) {
    super(`Inheritance cycle detected: ${[...cycle, cycle[0]].join(" -> ")}`);
    this.name = "CycleDetectedError";
  }

  override get details(): string[] {
    return this.cycle;
  }
}

export class ChainTooDeepError extends ConfigResolutionError {
  readonly kind = "ChainTooDeep";

  constructor(
    readonly chain: string[],
    readonly maxDepth: number,
  ) {
    super(
      `Inheritance chain of "${chain[0] ?? "<unknown>"}" exceeds the maximum depth of ${maxDepth}.`,
    );
    this.name = "ChainTooDeepError";
  }

  override get details(): string[] {
    return this.chain;
  }
}

export class NoMigrationPathError extends ConfigResolutionError {
  readonly kind = "NoMigrationPath";

  constructor(
    readonly fromVersion: SemanticVersion,
    readonly stuckAt: SemanticVersion,
    readonly targetVersion: SemanticVersion,
    reason?: string,
  ) {
    super(
      reason ??
        `No migration available from schema version ${stuckAt} (declared ${fromVersion}) to ${targetVersion}.`,
    );
    this.name = "NoMigrationPathError";
  }
}

export class ConfigValidationError extends ConfigResolutionError {
  readonly kind = "ValidationFailed";
  readonly summary: string;
  readonly issues: ConfigValidationIssue[];

  constructor(summary: string, issues: ConfigValidationIssue[]) {
    super(summary);
    this.name = "ConfigValidationError";
    this.summary = summary;
    this.issues = issues;
  }

  override get details(): string[] {
    return this.issues.map((issue) => `${issue.path}: ${issue.reason}`);
  }
}

export function isConfigResolutionError(
  value: unknown,
): value is ConfigResolutionError {
  return value instanceof ConfigResolutionError;
}
