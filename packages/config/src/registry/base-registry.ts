import fs from "fs/promises";
import path from "path";
import { Inject, Injectable, Optional } from "@nestjs/common";
import { RUNTIME_OPTIONS_TOKEN, PRESET_CATALOG_TOKEN } from "../config.const";
import { DocumentNotFoundError, UnknownBaseError } from "../errors";
import { createFileHandle } from "../presets";
import type { PresetCatalog } from "../presets";
import type { ResolverRuntimeOptions, SourceHandle } from "../types";

/** The document that wrote a `FROM` reference. */
export interface ReferenceOrigin {
  readonly name: string;
  readonly kind: SourceHandle["kind"];
  readonly location: string;
}

const YAML_EXTENSION_PATTERN = /\.ya?ml$/i;

function looksLikePath(name: string): boolean {
  return (
    name.includes("/") ||
    name.includes(path.sep) ||
    YAML_EXTENSION_PATTERN.test(name)
  );
}

async function isFile(candidate: string): Promise<boolean> {
  return fs.stat(candidate).then(
    (stats) => stats.isFile(),
    () => false,
  );
}

function unique(values: (string | undefined)[]): string[] {
  const result: string[] = [];
  for (const value of values) {
    if (value && !result.includes(value)) {
      result.push(value);
    }
  }
  return result;
}

/**
 * Maps configuration names to loadable sources. Built-in presets come from
 * the injected catalog; user documents are looked up in the search paths.
 */
@Injectable()
export class BaseRegistry {
  private readonly searchPaths: string[];

  constructor(
    @Inject(PRESET_CATALOG_TOKEN)
    private readonly catalog: PresetCatalog,
    @Optional()
    @Inject(RUNTIME_OPTIONS_TOKEN)
    options?: ResolverRuntimeOptions,
  ) {
    this.searchPaths = (options?.searchPaths ?? []).map((entry) =>
      path.resolve(entry),
    );
  }

  listPresets(): string[] {
    return [...this.catalog.keys()].sort();
  }

  async resolveBaseName(
    name: string,
    origin?: ReferenceOrigin,
  ): Promise<SourceHandle> {
    const requested = name.trim();
    if (requested.length === 0) {
      throw this.notFound(name, origin);
    }

    if (looksLikePath(requested)) {
      return this.resolvePath(requested, origin);
    }

    const matches: SourceHandle[] = [];
    const preset = this.catalog.get(requested);
    if (preset) {
      matches.push(preset);
    }

    for (const directory of this.searchPaths) {
      for (const fileName of [
        `${requested}.yml`,
        `${requested}.yaml`,
        `pipeline_config_${requested}.yml`,
      ]) {
        const candidate = path.join(directory, fileName);
        if (matches.some((match) => match.location === candidate)) {
          continue;
        }
        if (await isFile(candidate)) {
          matches.push(createFileHandle(requested, candidate));
        }
      }
    }

    const [match] = matches;
    if (matches.length === 1 && match) {
      return match;
    }

    throw this.notFound(
      requested,
      origin,
      matches.map((candidate) => candidate.location),
    );
  }

  private async resolvePath(
    requested: string,
    origin: ReferenceOrigin | undefined,
  ): Promise<SourceHandle> {
    if (path.isAbsolute(requested)) {
      if (await isFile(requested)) {
        return createFileHandle(requested, requested);
      }
      throw this.notFound(requested, origin);
    }

    const originDir =
      origin && path.isAbsolute(origin.location)
        ? path.dirname(origin.location)
        : undefined;
    const baseDirs = unique([originDir, ...this.searchPaths, process.cwd()]);

    for (const baseDir of baseDirs) {
      const candidate = path.resolve(baseDir, requested);
      if (await isFile(candidate)) {
        return createFileHandle(requested, candidate);
      }
    }

    throw this.notFound(requested, origin);
  }

  private notFound(
    name: string,
    origin: ReferenceOrigin | undefined,
    candidates: string[] = [],
  ): DocumentNotFoundError | UnknownBaseError {
    return origin
      ? new UnknownBaseError(name, origin.name, candidates)
      : new DocumentNotFoundError(name, candidates);
  }
}
