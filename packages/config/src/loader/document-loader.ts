import { Inject, Injectable } from "@nestjs/common";
import { LineCounter, parseDocument } from "yaml";
import {
  fromNative,
  isMapping,
  UnsupportedValueError,
  withoutKeys,
} from "../config-node";
import { FROM_KEY, RESERVED_KEYS, SCHEMA_VERSION_KEY } from "../config.const";
import { ConfigParseError } from "../errors";
import { CURRENT_SCHEMA_VERSION, normalizeSchemaVersion } from "../migrations";
import { BaseRegistry, type ReferenceOrigin } from "../registry/base-registry";
import type { ConfigDocument, ConfigNode, SourceHandle } from "../types";

const SCHEMA_VERSION_LINE = new RegExp(
  `^${SCHEMA_VERSION_KEY}:[ \\t]*(?:"([^"\\n]*)"|'([^'\\n]*)'|([^\\s#]+))`,
  "m",
);

/**
 * Reads the top-level `schema_version` field with a line scan so the version
 * is known before the rest of the document is parsed. Comments such as the
 * `# Version 1.8.3` banner are never consulted.
 */
export function readSchemaVersion(source: string): string | undefined {
  const match = SCHEMA_VERSION_LINE.exec(source);
  if (!match) {
    return undefined;
  }
  return match[1] ?? match[2] ?? match[3];
}

function scalarText(node: ConfigNode | undefined): string | undefined {
  if (node?.kind !== "scalar" || node.value === null) {
    return undefined;
  }
  return String(node.value);
}

/** Parses YAML text into a document. Pure: the handle is only used for naming. */
export function parseConfigDocument(
  source: string,
  handle: Pick<SourceHandle, "id" | "name" | "location">,
): ConfigDocument {
  const lineCounter = new LineCounter();
  const document = parseDocument(source, {
    version: "1.1",
    lineCounter,
    prettyErrors: false,
    uniqueKeys: true,
  });

  const [firstError] = document.errors;
  if (firstError) {
    const position = lineCounter.linePos(firstError.pos[0]);
    throw new ConfigParseError(handle.name, firstError.message, {
      line: position.line,
      column: position.col,
    });
  }

  let root: ConfigNode;
  try {
    root = fromNative(document.toJS({ mapAsMap: true }) ?? new Map());
  } catch (error) {
    if (error instanceof UnsupportedValueError) {
      throw new ConfigParseError(handle.name, error.message);
    }
    throw error;
  }

  if (!isMapping(root)) {
    throw new ConfigParseError(
      handle.name,
      "The document root must be a mapping.",
    );
  }

  const fromNode = root.entries.get(FROM_KEY);
  const base = scalarText(fromNode)?.trim();
  if (fromNode !== undefined && !base) {
    throw new ConfigParseError(
      handle.name,
      `${FROM_KEY} must be a non-empty string naming a base configuration.`,
    );
  }

  const declaredVersion =
    readSchemaVersion(source) ?? scalarText(root.entries.get(SCHEMA_VERSION_KEY));
  const schemaVersion = declaredVersion
    ? normalizeSchemaVersion(declaredVersion) ?? declaredVersion
    : CURRENT_SCHEMA_VERSION;

  return {
    name: handle.name,
    id: handle.id,
    location: handle.location,
    schemaVersion,
    ...(base ? { base } : {}),
    tree: withoutKeys(root, RESERVED_KEYS),
  };
}

@Injectable()
export class DocumentLoader {
  constructor(
    @Inject(BaseRegistry)
    private readonly registry: BaseRegistry,
  ) {}

  /**
   * Loads one document by name or path. When `origin` is given the name came
   * from that document's `FROM` and a miss is reported as an unknown base.
   */
  async load(name: string, origin?: ReferenceOrigin): Promise<ConfigDocument> {
    return this.read(await this.locate(name, origin));
  }

  locate(name: string, origin?: ReferenceOrigin): Promise<SourceHandle> {
    return this.registry.resolveBaseName(name, origin);
  }

  async read(handle: SourceHandle): Promise<ConfigDocument> {
    const source = await handle.read();
    return parseConfigDocument(source, handle);
  }
}
