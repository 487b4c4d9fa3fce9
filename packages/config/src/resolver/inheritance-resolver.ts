import { Inject, Injectable, Optional } from "@nestjs/common";
import {
  DEFAULT_MAX_DEPTH,
  MERGE_POLICY_TOKEN,
  RUNTIME_OPTIONS_TOKEN,
  RESOLVER_LOGGER_TOKEN,
} from "../config.const";
import { ChainTooDeepError, CycleDetectedError } from "../errors";
import { DocumentLoader } from "../loader/document-loader";
import { compileMergePolicy, mergeConfigTrees } from "../merge/merge-engine";
import {
  PIPELINE_MERGE_POLICY,
  type CompiledMergePolicy,
} from "../merge/merge-policy";
import { SchemaMigrator } from "../migrations";
import type { ReferenceOrigin } from "../registry/base-registry";
import { noopLogger } from "../resolver-logger";
import type { ResolverLogger } from "../resolver-logger";
import type {
  ConfigDocument,
  MergePolicy,
  ResolutionStep,
  ResolverRuntimeOptions,
  SourceHandle,
  UnvalidatedResolution,
} from "../types";

interface VisitedDocument {
  readonly id: string;
  readonly name: string;
}

/**
 * Follows `FROM` references from a derived document down to a document with
 * no base, then folds the chain back up, merging each document over the
 * resolved tree of its base.
 */
@Injectable()
export class InheritanceResolver {
  private readonly maxDepth: number;
  private readonly policy: CompiledMergePolicy;
  private readonly logger: ResolverLogger;

  constructor(
    @Inject(DocumentLoader)
    private readonly loader: DocumentLoader,
    @Inject(SchemaMigrator)
    private readonly migrator: SchemaMigrator,
    @Optional()
    @Inject(MERGE_POLICY_TOKEN)
    policy?: MergePolicy,
    @Optional()
    @Inject(RUNTIME_OPTIONS_TOKEN)
    options?: ResolverRuntimeOptions,
    @Optional()
    @Inject(RESOLVER_LOGGER_TOKEN)
    logger?: ResolverLogger,
  ) {
    this.policy = compileMergePolicy(policy ?? PIPELINE_MERGE_POLICY);
    this.maxDepth = options?.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.logger = logger ?? noopLogger;

    if (!Number.isInteger(this.maxDepth) || this.maxDepth < 1) {
      throw new Error("maxDepth must be a positive integer.");
    }
  }

  async resolveTree(name: string): Promise<UnvalidatedResolution> {
    return this.resolveDocument(name, undefined, []);
  }

  private async resolveDocument(
    name: string,
    origin: ReferenceOrigin | undefined,
    visiting: readonly VisitedDocument[],
  ): Promise<UnvalidatedResolution> {
    const handle = await this.loader.locate(name, origin);
    this.ensureAcyclic(handle, visiting);

    const document = await this.loader.read(handle);
    const path = [...visiting, { id: document.id, name: document.name }];
    const step = this.toStep(document);

    const own = this.migrator.migrate(document.tree, document.schemaVersion, {
      partial: document.base !== undefined,
    });
    own.warnings.forEach((warning) => {
      this.logger.warn({ document: document.name }, warning);
    });
    const appliedMigrations = own.appliedMigrations.map(
      (id) => `${document.name}:${id}`,
    );

    if (document.base === undefined) {
      this.logger.debug(
        { document: document.name, location: document.location },
        "Resolved base document",
      );
      return {
        name: document.name,
        tree: own.tree,
        chain: [step],
        appliedMigrations,
        warnings: own.warnings,
      };
    }

    if (path.length >= this.maxDepth) {
      throw new ChainTooDeepError(
        [...path.map((entry) => entry.name), document.base],
        this.maxDepth,
      );
    }

    const base = await this.resolveDocument(
      document.base,
      {
        name: document.name,
        kind: handle.kind,
        location: document.location,
      },
      path,
    );

    // The resolved base is already current, so this leaves it untouched.
    const currentBase = this.migrator.migrate(
      base.tree,
      this.migrator.currentVersion,
    );

    this.logger.debug(
      { document: document.name, base: base.name },
      "Merging document over its base",
    );

    return {
      name: document.name,
      tree: mergeConfigTrees(currentBase.tree, own.tree, {
        policy: this.policy,
        logger: this.logger,
      }),
      chain: [...base.chain, step],
      appliedMigrations: [...base.appliedMigrations, ...appliedMigrations],
      warnings: [...base.warnings, ...own.warnings],
    };
  }

  private ensureAcyclic(
    handle: SourceHandle,
    visiting: readonly VisitedDocument[],
  ): void {
    const start = visiting.findIndex((entry) => entry.id === handle.id);
    if (start >= 0) {
      throw new CycleDetectedError(
        visiting.slice(start).map((entry) => entry.name),
      );
    }
  }

  private toStep(document: ConfigDocument): ResolutionStep {
    return {
      name: document.name,
      id: document.id,
      location: document.location,
      schemaVersion: document.schemaVersion,
    };
  }
}
