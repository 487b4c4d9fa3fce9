export type ConfigScalar = string | number | boolean | null;

export interface ConfigMapping {
  readonly kind: "mapping";
  readonly entries: ReadonlyMap<string, ConfigNode>;
}

export interface ConfigSequence {
  readonly kind: "sequence";
  readonly items: readonly ConfigNode[];
}

export interface ConfigScalarNode {
  readonly kind: "scalar";
  readonly value: ConfigScalar;
}

export type ConfigNode = ConfigMapping | ConfigSequence | ConfigScalarNode;

export type ConfigNodeKind = ConfigNode["kind"];

/**
 * Structural location inside a tree. Mapping keys contribute their key and
 * sequence elements contribute {@link SEQUENCE_SEGMENT}.
 */
export type KeyPath = readonly string[];

export const SEQUENCE_SEGMENT = "[]";

/** A `semver`-valid version string such as `1.8.3`. */
export type SemanticVersion = string;

export type SourceKind = "preset" | "file";

export interface SourceHandle {
  /** Canonical identity: the preset name or the absolute file path. */
  readonly id: string;
  /** The name as requested by the caller or written after `FROM`. */
  readonly name: string;
  readonly kind: SourceKind;
  readonly location: string;
  read(): Promise<string>;
}

export interface ConfigDocument {
  readonly name: string;
  readonly id: string;
  readonly location: string;
  readonly schemaVersion: SemanticVersion;
  readonly base?: string;
  readonly tree: ConfigMapping;
}

export interface KeyedListPolicy {
  readonly path: string;
  readonly identifier: string;
}

export interface MergePolicy {
  readonly keyedLists: readonly KeyedListPolicy[];
  readonly removablePaths: readonly string[];
}

export interface MigrationContext {
  /** True when the tree is an override fragment of a derived document. */
  readonly partial: boolean;
}

export interface MigrationStep {
  readonly id: string;
  readonly from: SemanticVersion;
  readonly to: SemanticVersion;
  readonly description: string;
  transform(tree: ConfigMapping, context: MigrationContext): ConfigMapping;
}

export interface MigrationOutcome {
  readonly tree: ConfigMapping;
  readonly initialVersion: SemanticVersion;
  readonly finalVersion: SemanticVersion;
  readonly appliedMigrations: string[];
  readonly warnings: string[];
}

export interface ResolutionStep {
  readonly name: string;
  readonly id: string;
  readonly location: string;
  readonly schemaVersion: SemanticVersion;
}

export interface UnvalidatedResolution {
  readonly name: string;
  readonly tree: ConfigMapping;
  /** Documents of the inheritance chain, root base first. */
  readonly chain: ResolutionStep[];
  readonly appliedMigrations: string[];
  readonly warnings: string[];
}

export interface ResolvedConfig extends UnvalidatedResolution {
  readonly schemaVersion: SemanticVersion;
}

export type LogLevel =
  | "silent"
  | "fatal"
  | "error"
  | "warn"
  | "info"
  | "debug"
  | "trace";

export interface LoggingDestination {
  type: "stdout" | "stderr" | "file";
  path?: string;
  pretty?: boolean;
  colorize?: boolean;
}

export interface LoggingConfig {
  level?: LogLevel;
  destination?: LoggingDestination;
  enableTimestamps?: boolean;
}

/**
 * Settings for the resolver itself, gathered from the environment and CLI
 * flags. None of these reach a resolved pipeline tree.
 */
export interface ResolverRuntimeOptions {
  searchPaths?: string[];
  presetsDir?: string;
  maxDepth?: number;
  logLevel?: LogLevel;
  logFile?: string;
}
