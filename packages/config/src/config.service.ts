import { Inject, Injectable, Optional } from "@nestjs/common";
import { stringify } from "yaml";
import { mapping, scalar, toNative, toYamlValue } from "./config-node";
import {
  FROM_KEY,
  RESOLVER_LOGGER_TOKEN,
  SCHEMA_VERSION_KEY,
} from "./config.const";
import { DocumentLoader } from "./loader/document-loader";
import { SchemaMigrator } from "./migrations";
import { BaseRegistry } from "./registry/base-registry";
import { InheritanceResolver } from "./resolver/inheritance-resolver";
import { noopLogger } from "./resolver-logger";
import type { ResolverLogger } from "./resolver-logger";
import { ConfigValidator } from "./validation/config-validator";
import type {
  ConfigDocument,
  ConfigMapping,
  MigrationOutcome,
  ResolvedConfig,
  SemanticVersion,
  UnvalidatedResolution,
} from "./types";

export type ConfigOutputFormat = "yaml" | "json";

export const CONFIG_OUTPUT_FORMATS: readonly ConfigOutputFormat[] = [
  "yaml",
  "json",
];

export interface MigratedDocument {
  readonly document: ConfigDocument;
  readonly outcome: MigrationOutcome;
  /** The migrated tree with `FROM` and `schema_version` restored at the top. */
  readonly tree: ConfigMapping;
}

export function stampSchemaVersion(
  tree: ConfigMapping,
  version: SemanticVersion,
  base?: string,
): ConfigMapping {
  return mapping([
    ...(base === undefined ? [] : [[FROM_KEY, scalar(base)] as const]),
    [SCHEMA_VERSION_KEY, scalar(version)],
    ...tree.entries,
  ]);
}

export function formatConfigTree(
  tree: ConfigMapping,
  format: ConfigOutputFormat = "yaml",
): string {
  if (format === "json") {
    return `${JSON.stringify(toNative(tree), null, 2)}\n`;
  }
  return stringify(toYamlValue(tree), { version: "1.1" });
}

/**
 * Entry point for callers: resolves a named configuration through its whole
 * inheritance chain and checks the result.
 */
@Injectable()
export class ConfigService {
  private readonly logger: ResolverLogger;

  constructor(
    @Inject(InheritanceResolver)
    private readonly resolver: InheritanceResolver,
    @Inject(ConfigValidator)
    private readonly validator: ConfigValidator,
    @Inject(DocumentLoader)
    private readonly loader: DocumentLoader,
    @Inject(SchemaMigrator)
    private readonly migrator: SchemaMigrator,
    @Inject(BaseRegistry)
    private readonly registry: BaseRegistry,
    @Optional()
    @Inject(RESOLVER_LOGGER_TOKEN)
    logger?: ResolverLogger,
  ) {
    this.logger = logger ?? noopLogger;
  }

  async resolve(name: string): Promise<ResolvedConfig> {
    const resolution = await this.resolver.resolveTree(name);
    this.validator.validate(resolution.tree);
    return this.finalize(resolution);
  }

  /** Resolves without validation. */
  async inspect(name: string): Promise<ResolvedConfig> {
    return this.finalize(await this.resolver.resolveTree(name));
  }

  /** Migrates a single document to the current schema without following `FROM`. */
  async migrateDocument(name: string): Promise<MigratedDocument> {
    const document = await this.loader.load(name);
    const outcome = this.migrator.migrate(
      document.tree,
      document.schemaVersion,
      { partial: document.base !== undefined },
    );
    outcome.warnings.forEach((warning) => {
      this.logger.warn({ document: document.name }, warning);
    });

    return {
      document,
      outcome,
      tree: stampSchemaVersion(outcome.tree, outcome.finalVersion, document.base),
    };
  }

  listPresets(): string[] {
    return this.registry.listPresets();
  }

  private finalize(resolution: UnvalidatedResolution): ResolvedConfig {
    const schemaVersion = this.migrator.currentVersion;
    this.logger.debug(
      {
        document: resolution.name,
        chain: resolution.chain.map((step) => step.name),
        migrations: resolution.appliedMigrations.length,
      },
      "Resolved configuration",
    );
    return {
      ...resolution,
      tree: stampSchemaVersion(resolution.tree, schemaVersion),
      schemaVersion,
    };
  }
}
