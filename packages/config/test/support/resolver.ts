import { DocumentLoader } from "../../src/loader/document-loader";
import { SchemaMigrator } from "../../src/migrations";
import { createInMemoryCatalog } from "../../src/presets";
import { BaseRegistry } from "../../src/registry/base-registry";
import { InheritanceResolver } from "../../src/resolver/inheritance-resolver";
import type { ResolverLogger } from "../../src/resolver-logger";
import type {
  MergePolicy,
  MigrationStep,
  ResolverRuntimeOptions,
} from "../../src/types";

export interface ResolverFixtureOptions {
  policy?: MergePolicy;
  runtime?: ResolverRuntimeOptions;
  steps?: readonly MigrationStep[];
  logger?: ResolverLogger;
}

/** Wires the resolution services by hand over an in-memory preset catalog. */
export function createResolverFixture(
  sources: Record<string, string>,
  options: ResolverFixtureOptions = {},
) {
  const registry = new BaseRegistry(
    createInMemoryCatalog(sources),
    options.runtime,
  );
  const loader = new DocumentLoader(registry);
  const migrator = new SchemaMigrator(options.steps);
  const resolver = new InheritanceResolver(
    loader,
    migrator,
    options.policy,
    options.runtime,
    options.logger,
  );
  return { registry, loader, migrator, resolver };
}
