import { formatKeyPath, mapping, sequence } from "../config-node";
import { noopLogger, type ResolverLogger } from "../resolver-logger";
import {
  SEQUENCE_SEGMENT,
  type ConfigMapping,
  type ConfigNode,
  type ConfigSequence,
  type KeyPath,
  type MergePolicy,
} from "../types";
import { CompiledMergePolicy, EMPTY_MERGE_POLICY } from "./merge-policy";

export interface MergeOptions {
  policy?: MergePolicy | CompiledMergePolicy;
  logger?: ResolverLogger;
}

interface MergeContext {
  readonly policy: CompiledMergePolicy;
  readonly logger: ResolverLogger;
}

type Identifier = string | number | boolean;

export function compileMergePolicy(
  policy: MergePolicy | CompiledMergePolicy | undefined,
): CompiledMergePolicy {
  if (policy instanceof CompiledMergePolicy) {
    return policy;
  }
  return new CompiledMergePolicy(policy ?? EMPTY_MERGE_POLICY);
}

/**
 * Combines `base` with `override` into a new tree. Neither input is modified
 * and well-formed input never throws.
 *
 * - mappings merge key by key; base keys keep their order and override-only
 *   keys are appended in override order
 * - sequences are replaced, unless the policy keys the path, in which case
 *   elements are matched by their identifier field
 * - scalars (including `null`) and kind mismatches take the override
 * - `null` removes the key on paths the policy marks removable
 */
export function mergeConfigNodes(
  base: ConfigNode,
  override: ConfigNode,
  path: KeyPath = [],
  options: MergeOptions = {},
): ConfigNode {
  return mergeNode(base, override, path, {
    policy: compileMergePolicy(options.policy),
    logger: options.logger ?? noopLogger,
  });
}

export function mergeConfigTrees(
  base: ConfigMapping,
  override: ConfigMapping,
  options: MergeOptions = {},
): ConfigMapping {
  const context: MergeContext = {
    policy: compileMergePolicy(options.policy),
    logger: options.logger ?? noopLogger,
  };
  return mergeMappings(base, override, [], context);
}

function mergeNode(
  base: ConfigNode,
  override: ConfigNode,
  path: KeyPath,
  context: MergeContext,
): ConfigNode {
  if (base.kind !== override.kind) {
    context.logger.debug(
      { path: formatKeyPath(path), base: base.kind, override: override.kind },
      "Structural override replaces base subtree",
    );
    return override;
  }

  if (base.kind === "mapping" && override.kind === "mapping") {
    return mergeMappings(base, override, path, context);
  }

  if (base.kind === "sequence" && override.kind === "sequence") {
    const identifier = context.policy.keyedIdentifierFor(path);
    return identifier
      ? mergeKeyedSequences(base, override, identifier, path, context)
      : override;
  }

  return override;
}

function isRemoval(
  value: ConfigNode,
  path: KeyPath,
  context: MergeContext,
): boolean {
  if (value.kind !== "scalar" || value.value !== null) {
    return false;
  }
  if (!context.policy.isRemovable(path)) {
    return false;
  }
  context.logger.debug(
    { path: formatKeyPath(path) },
    "Null override removes key",
  );
  return true;
}

function mergeMappings(
  base: ConfigMapping,
  override: ConfigMapping,
  path: KeyPath,
  context: MergeContext,
): ConfigMapping {
  const entries: [string, ConfigNode][] = [];

  for (const [key, baseValue] of base.entries) {
    const overrideValue = override.entries.get(key);
    if (overrideValue === undefined) {
      entries.push([key, baseValue]);
      continue;
    }

    const childPath = [...path, key];
    if (isRemoval(overrideValue, childPath, context)) {
      continue;
    }
    entries.push([key, mergeNode(baseValue, overrideValue, childPath, context)]);
  }

  for (const [key, overrideValue] of override.entries) {
    if (base.entries.has(key)) {
      continue;
    }
    if (isRemoval(overrideValue, [...path, key], context)) {
      continue;
    }
    entries.push([key, overrideValue]);
  }

  return mapping(entries);
}

function identify(node: ConfigNode, field: string): Identifier | undefined {
  if (node.kind !== "mapping") {
    return undefined;
  }
  const candidate = node.entries.get(field);
  if (candidate?.kind !== "scalar" || candidate.value === null) {
    return undefined;
  }
  return candidate.value;
}

function mergeKeyedSequences(
  base: ConfigSequence,
  override: ConfigSequence,
  identifier: string,
  path: KeyPath,
  context: MergeContext,
): ConfigSequence {
  const items: ConfigNode[] = [...base.items];
  const indexById = new Map<Identifier, number>();
  const elementPath = [...path, SEQUENCE_SEGMENT];

  base.items.forEach((item, index) => {
    const id = identify(item, identifier);
    if (id !== undefined && !indexById.has(id)) {
      indexById.set(id, index);
    }
  });

  for (const item of override.items) {
    const id = identify(item, identifier);
    if (id === undefined) {
      context.logger.warn(
        { path: formatKeyPath(path), identifier },
        "Keyed list element has no identifier; appending it unchanged",
      );
      items.push(item);
      continue;
    }

    const index = indexById.get(id);
    const existing = index === undefined ? undefined : items[index];
    if (index === undefined || existing === undefined) {
      indexById.set(id, items.length);
      items.push(item);
      continue;
    }

    items[index] = mergeNode(existing, item, elementPath, context);
  }

  return sequence(items);
}
