import { Inject, Injectable, Optional } from "@nestjs/common";
import semver from "semver";
import { MIGRATION_STEPS_TOKEN } from "../config.const";
import { NoMigrationPathError } from "../errors";
import type {
  ConfigMapping,
  MigrationContext,
  MigrationOutcome,
  MigrationStep,
  SemanticVersion,
} from "../types";
import { migrate170To180 } from "./migrate-1.7-to-1.8";
import { migrate180To183 } from "./migrate-1.8-to-1.8.3";

export const CURRENT_SCHEMA_VERSION: SemanticVersion = "1.8.3";

export const CONFIG_MIGRATIONS: readonly MigrationStep[] = Object.freeze([
  migrate170To180,
  migrate180To183,
]);

/**
 * Accepts strict semver and short forms such as `1.8` (which YAML reads as a
 * number). Returns `undefined` for anything else.
 */
export function normalizeSchemaVersion(
  raw: string,
): SemanticVersion | undefined {
  const trimmed = raw.trim();
  const strict = semver.valid(trimmed);
  if (strict) {
    return strict;
  }
  if (!/^\d+(\.\d+){0,2}$/.test(trimmed)) {
    return undefined;
  }
  return semver.coerce(trimmed)?.version;
}

/**
 * Walks the migration chain from the declared version to the current one.
 * Versions are states and steps are the only transitions between them.
 */
export function runSchemaMigrations(
  tree: ConfigMapping,
  fromVersion: SemanticVersion,
  steps: readonly MigrationStep[] = CONFIG_MIGRATIONS,
  context: MigrationContext = { partial: false },
  targetVersion: SemanticVersion = CURRENT_SCHEMA_VERSION,
): MigrationOutcome {
  const initialVersion = normalizeSchemaVersion(fromVersion);
  if (!initialVersion) {
    throw new NoMigrationPathError(
      fromVersion,
      fromVersion,
      targetVersion,
      `Schema version "${fromVersion}" is not a valid semantic version.`,
    );
  }

  if (semver.gt(initialVersion, targetVersion)) {
    throw new NoMigrationPathError(
      initialVersion,
      initialVersion,
      targetVersion,
      `This configuration declares newer schema version ${initialVersion} than supported version ${targetVersion}.`,
    );
  }

  const stepsBySource = new Map<SemanticVersion, MigrationStep>(
    steps.map((step) => [step.from, step]),
  );

  let currentVersion = initialVersion;
  let workingTree = tree;
  const appliedMigrations: string[] = [];
  const warnings: string[] = [];

  while (semver.lt(currentVersion, targetVersion)) {
    const step = stepsBySource.get(currentVersion);
    if (!step || !semver.gt(step.to, currentVersion)) {
      throw new NoMigrationPathError(
        initialVersion,
        currentVersion,
        targetVersion,
      );
    }

    workingTree = step.transform(workingTree, context);
    currentVersion = step.to;
    appliedMigrations.push(step.id);
    warnings.push(
      `Schema version ${step.from} was automatically migrated to ${step.to} (${step.id}).`,
    );
  }

  return {
    tree: workingTree,
    initialVersion,
    finalVersion: currentVersion,
    appliedMigrations,
    warnings,
  };
}

@Injectable()
export class SchemaMigrator {
  private readonly steps: readonly MigrationStep[];

  constructor(
    @Optional()
    @Inject(MIGRATION_STEPS_TOKEN)
    steps?: readonly MigrationStep[],
  ) {
    this.steps = steps ?? CONFIG_MIGRATIONS;
  }

  get currentVersion(): SemanticVersion {
    return CURRENT_SCHEMA_VERSION;
  }

  migrate(
    tree: ConfigMapping,
    fromVersion: SemanticVersion,
    context: MigrationContext = { partial: false },
  ): MigrationOutcome {
    return runSchemaMigrations(tree, fromVersion, this.steps, context);
  }
}
