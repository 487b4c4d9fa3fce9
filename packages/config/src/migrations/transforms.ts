import {
  getAtPath,
  isMapping,
  isScalar,
  isSequence,
  mapping,
  sequence,
  updateAtPath,
} from "../config-node";
import type { ConfigMapping, ConfigNode, KeyPath } from "../types";

export function wrapScalarInSequence(
  tree: ConfigMapping,
  path: KeyPath,
): ConfigMapping {
  return updateAtPath(tree, path, (current) =>
    isScalar(current) && current.value !== null
      ? sequence([current])
      : current,
  );
}

export function setDefault(
  tree: ConfigMapping,
  path: KeyPath,
  value: ConfigNode,
): ConfigMapping {
  return updateAtPath(tree, path, (current) => current ?? value);
}

/** Moves `from` to `to` unless `to` is already set; `from` is always dropped. */
export function moveKey(
  tree: ConfigMapping,
  from: KeyPath,
  to: KeyPath,
): ConfigMapping {
  const value = getAtPath(tree, from);
  if (value === undefined) {
    return tree;
  }
  const withoutSource = updateAtPath(tree, from, () => undefined);
  return updateAtPath(withoutSource, to, (current) => current ?? value);
}

export function renameKey(
  node: ConfigMapping,
  from: string,
  to: string,
): ConfigMapping {
  const value = node.entries.get(from);
  if (value === undefined || node.entries.has(to)) {
    return node;
  }
  return mapping(
    [...node.entries].map(([key, child]) => [key === from ? to : key, child]),
  );
}

export function mapSequenceMappings(
  tree: ConfigMapping,
  path: KeyPath,
  transform: (element: ConfigMapping) => ConfigMapping,
): ConfigMapping {
  return updateAtPath(tree, path, (current) => {
    if (!isSequence(current)) {
      return current;
    }
    let changed = false;
    const items = current.items.map((item) => {
      if (!isMapping(item)) {
        return item;
      }
      const next = transform(item);
      changed ||= next !== item;
      return next;
    });
    return changed ? sequence(items) : current;
  });
}
