import { SEQUENCE_SEGMENT, type KeyPath, type MergePolicy } from "../types";

const WILDCARD = "*";

type PathPattern = readonly string[];

/**
 * Splits `a.b[].c` into `["a", "b", "[]", "c"]`. `*` matches any single
 * mapping key.
 */
export function parsePathPattern(pattern: string): PathPattern {
  const segments: string[] = [];
  for (const part of pattern.split(".")) {
    let key = part;
    let elementSteps = 0;
    while (key.endsWith(SEQUENCE_SEGMENT)) {
      key = key.slice(0, -SEQUENCE_SEGMENT.length);
      elementSteps += 1;
    }
    if (key.length > 0) {
      segments.push(key);
    }
    for (let step = 0; step < elementSteps; step += 1) {
      segments.push(SEQUENCE_SEGMENT);
    }
  }
  return segments;
}

export function matchesPathPattern(pattern: PathPattern, path: KeyPath): boolean {
  if (pattern.length !== path.length) {
    return false;
  }
  return pattern.every((segment, index) => {
    const actual = path[index];
    if (segment === WILDCARD) {
      return actual !== SEQUENCE_SEGMENT;
    }
    return segment === actual;
  });
}

interface CompiledKeyedList {
  readonly pattern: PathPattern;
  readonly identifier: string;
}

/** A merge policy with its path patterns parsed once. */
export class CompiledMergePolicy {
  private readonly keyedLists: CompiledKeyedList[];
  private readonly removablePaths: PathPattern[];

  constructor(readonly source: MergePolicy) {
    this.keyedLists = source.keyedLists.map((policy) => ({
      pattern: parsePathPattern(policy.path),
      identifier: policy.identifier,
    }));
    this.removablePaths = source.removablePaths.map(parsePathPattern);
  }

  keyedIdentifierFor(path: KeyPath): string | undefined {
    return this.keyedLists.find((policy) =>
      matchesPathPattern(policy.pattern, path),
    )?.identifier;
  }

  isRemovable(path: KeyPath): boolean {
    return this.removablePaths.some((pattern) =>
      matchesPathPattern(pattern, path),
    );
  }
}

export const EMPTY_MERGE_POLICY: MergePolicy = Object.freeze({
  keyedLists: [],
  removablePaths: [],
});

export const PIPELINE_MERGE_POLICY: MergePolicy = Object.freeze({
  keyedLists: [
    {
      path: "nuisance_corrections.2-nuisance_regression.Regressors",
      identifier: "Name",
    },
  ],
  removablePaths: [
    "timeseries_extraction.tse_roi_paths.*",
    "nuisance_corrections.2-nuisance_regression.Regressors[].*",
  ],
});
