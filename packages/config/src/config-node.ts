import {
  SEQUENCE_SEGMENT,
  type ConfigMapping,
  type ConfigNode,
  type ConfigScalar,
  type ConfigScalarNode,
  type ConfigSequence,
  type KeyPath,
} from "./types";

export const EMPTY_MAPPING: ConfigMapping = mapping([]);

export function mapping(
  entries: Iterable<readonly [string, ConfigNode]>,
): ConfigMapping {
  const map = new Map<string, ConfigNode>();
  for (const [key, value] of entries) {
    map.set(key, value);
  }
  return Object.freeze({ kind: "mapping", entries: map });
}

export function sequence(items: Iterable<ConfigNode>): ConfigSequence {
  return Object.freeze({ kind: "sequence", items: Object.freeze([...items]) });
}

export function scalar(value: ConfigScalar): ConfigScalarNode {
  return Object.freeze({ kind: "scalar", value });
}

export const isMapping = (node: ConfigNode | undefined): node is ConfigMapping =>
  node?.kind === "mapping";

export const isSequence = (
  node: ConfigNode | undefined,
): node is ConfigSequence => node?.kind === "sequence";

export const isScalar = (
  node: ConfigNode | undefined,
): node is ConfigScalarNode => node?.kind === "scalar";

export class UnsupportedValueError extends Error {
  constructor(
    readonly path: KeyPath,
    readonly valueType: string,
  ) {
    super(
      `Unsupported ${valueType} value at ${formatKeyPath(path) || "<root>"}.`,
    );
    this.name = "UnsupportedValueError";
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function describeValue(value: unknown): string {
  if (typeof value !== "object" || value === null) {
    return typeof value;
  }
  return value.constructor?.name ?? "object";
}

/**
 * Builds a node from plain data. Objects and `Map`s become mappings (keys are
 * stringified), arrays become sequences and dates become ISO strings.
 */
export function fromNative(value: unknown, path: KeyPath = []): ConfigNode {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return scalar(value);
  }

  if (typeof value === "bigint") {
    return scalar(Number(value));
  }

  if (value instanceof Date) {
    return scalar(value.toISOString());
  }

  if (Array.isArray(value)) {
    return sequence(
      value.map((item) => fromNative(item, [...path, SEQUENCE_SEGMENT])),
    );
  }

  if (value instanceof Map) {
    const entries: [string, ConfigNode][] = [];
    for (const [key, child] of value) {
      const name = String(key);
      entries.push([name, fromNative(child, [...path, name])]);
    }
    return mapping(entries);
  }

  if (isPlainObject(value)) {
    return mapping(
      Object.entries(value).map(([key, child]) => [
        key,
        fromNative(child, [...path, key]),
      ]),
    );
  }

  throw new UnsupportedValueError(path, describeValue(value));
}

export type NativeValue =
  | ConfigScalar
  | NativeValue[]
  | { [key: string]: NativeValue };

/** Converts a node into plain objects and arrays. */
export function toNative(node: ConfigNode): NativeValue {
  switch (node.kind) {
    case "scalar":
      return node.value;
    case "sequence":
      return node.items.map((item) => toNative(item));
    case "mapping": {
      const result: { [key: string]: NativeValue } = {};
      for (const [key, value] of node.entries) {
        result[key] = toNative(value);
      }
      return result;
    }
  }
}

export type YamlValue = ConfigScalar | YamlValue[] | Map<string, YamlValue>;

/**
 * Converts a node for YAML output. Mappings become `Map`s so numeric-looking
 * keys keep their position.
 */
export function toYamlValue(node: ConfigNode): YamlValue {
  switch (node.kind) {
    case "scalar":
      return node.value;
    case "sequence":
      return node.items.map((item) => toYamlValue(item));
    case "mapping":
      return new Map(
        [...node.entries].map(([key, value]) => [key, toYamlValue(value)]),
      );
  }
}

export function nodesEqual(left: ConfigNode, right: ConfigNode): boolean {
  if (left === right) {
    return true;
  }

  if (left.kind === "scalar" && right.kind === "scalar") {
    return Object.is(left.value, right.value);
  }

  if (left.kind === "sequence" && right.kind === "sequence") {
    return (
      left.items.length === right.items.length &&
      left.items.every((item, index) => {
        const other = right.items[index];
        return other !== undefined && nodesEqual(item, other);
      })
    );
  }

  if (left.kind === "mapping" && right.kind === "mapping") {
    if (left.entries.size !== right.entries.size) {
      return false;
    }
    const rightKeys = [...right.entries.keys()];
    let index = 0;
    for (const [key, value] of left.entries) {
      const other = right.entries.get(key);
      if (rightKeys[index] !== key || other === undefined) {
        return false;
      }
      if (!nodesEqual(value, other)) {
        return false;
      }
      index += 1;
    }
    return true;
  }

  return false;
}

/** Follows mapping keys from `node`; sequence segments are not supported. */
export function getAtPath(
  node: ConfigNode,
  path: KeyPath,
): ConfigNode | undefined {
  let current: ConfigNode | undefined = node;
  for (const segment of path) {
    if (!isMapping(current)) {
      return undefined;
    }
    current = current.entries.get(segment);
  }
  return current;
}

/**
 * Returns a copy of `tree` with the value at `path` replaced by `update`'s
 * result. Missing intermediate mappings are created; when `update` returns
 * `undefined` the key is removed. Returns `tree` itself when nothing changed.
 */
export function updateAtPath(
  tree: ConfigMapping,
  path: KeyPath,
  update: (current: ConfigNode | undefined) => ConfigNode | undefined,
): ConfigMapping {
  const [head, ...rest] = path;
  if (head === undefined) {
    return tree;
  }

  const current = tree.entries.get(head);
  let next: ConfigNode | undefined;
  if (rest.length === 0) {
    next = update(current);
  } else {
    const child = isMapping(current) ? current : undefined;
    if (!child && current !== undefined) {
      return tree;
    }
    const updated = updateAtPath(child ?? EMPTY_MAPPING, rest, update);
    next = updated === EMPTY_MAPPING && !child ? undefined : updated;
  }

  if (next === current) {
    return tree;
  }

  const entries = [...tree.entries].filter(
    ([key]) => next !== undefined || key !== head,
  );
  if (next === undefined) {
    return mapping(entries);
  }
  if (current === undefined) {
    return mapping([...entries, [head, next]]);
  }
  return mapping(
    entries.map(([key, value]) => [key, key === head ? next : value]),
  );
}

export function withoutKeys(
  tree: ConfigMapping,
  keys: readonly string[],
): ConfigMapping {
  if (!keys.some((key) => tree.entries.has(key))) {
    return tree;
  }
  return mapping([...tree.entries].filter(([key]) => !keys.includes(key)));
}

export function formatKeyPath(path: KeyPath): string {
  return path.reduce((rendered, segment) => {
    if (segment === SEQUENCE_SEGMENT || /^\[\d+\]$/.test(segment)) {
      return `${rendered}${segment}`;
    }
    return rendered ? `${rendered}.${segment}` : segment;
  }, "");
}
