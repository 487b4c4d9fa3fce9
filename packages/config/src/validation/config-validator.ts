import { Inject, Injectable, Optional } from "@nestjs/common";
import { z } from "zod";
import { formatKeyPath, isMapping, isScalar, toNative } from "../config-node";
import { ConfigValidationError, type ConfigValidationIssue } from "../errors";
import {
  matchesPathPattern,
  parsePathPattern,
  PIPELINE_MERGE_POLICY,
} from "../merge/merge-policy";
import {
  SEQUENCE_SEGMENT,
  type ConfigMapping,
  type ConfigNode,
  type KeyPath,
  type MergePolicy,
} from "../types";
import {
  EXCLUSIVE_OPTION_RULES,
  pipelineConfigSchema,
  type ExclusiveOptionRule,
} from "./pipeline-schema";

export const VALIDATION_OPTIONS_TOKEN = Symbol("STRATA_VALIDATION_OPTIONS");

export interface ConfigValidatorOptions {
  schema?: z.ZodType;
  exclusiveRules?: readonly ExclusiveOptionRule[];
  mergePolicy?: MergePolicy;
}

type PathSegment = PropertyKey;

interface VisitedNode {
  readonly node: ConfigNode;
  /** Pattern form: sequence elements appear as `[]`. */
  readonly pattern: KeyPath;
  /** Display form: sequence elements appear as `[index]`. */
  readonly display: KeyPath;
}

function* walk(
  node: ConfigNode,
  pattern: KeyPath = [],
  display: KeyPath = [],
): Generator<VisitedNode> {
  yield { node, pattern, display };
  if (node.kind === "mapping") {
    for (const [key, child] of node.entries) {
      yield* walk(child, [...pattern, key], [...display, key]);
    }
  } else if (node.kind === "sequence") {
    for (const [index, child] of node.items.entries()) {
      yield* walk(
        child,
        [...pattern, SEQUENCE_SEGMENT],
        [...display, `[${index}]`],
      );
    }
  }
}

function isOptionSet(node: ConfigNode | undefined): boolean {
  if (node === undefined) {
    return false;
  }
  return !isScalar(node) || (node.value !== null && node.value !== false);
}

function renderIssuePath(path: readonly PathSegment[]): string {
  return formatKeyPath(
    path.map((segment) =>
      typeof segment === "number" ? `[${segment}]` : String(segment),
    ),
  );
}

function hasKey(value: unknown, path: readonly PathSegment[]): boolean {
  let current: unknown = value;
  for (const segment of path) {
    if (typeof current !== "object" || current === null) {
      return false;
    }
    if (!(segment in current)) {
      return false;
    }
    current = Reflect.get(current, segment);
  }
  return true;
}

/**
 * Checks a fully resolved tree against the pipeline schema and the
 * cross-field rules. Every problem found is collected before failing.
 */
@Injectable()
export class ConfigValidator {
  private readonly schema: z.ZodType;
  private readonly exclusiveRules: readonly ExclusiveOptionRule[];
  private readonly mergePolicy: MergePolicy;

  constructor(
    @Optional()
    @Inject(VALIDATION_OPTIONS_TOKEN)
    options?: ConfigValidatorOptions,
  ) {
    this.schema = options?.schema ?? pipelineConfigSchema;
    this.exclusiveRules = options?.exclusiveRules ?? EXCLUSIVE_OPTION_RULES;
    this.mergePolicy = options?.mergePolicy ?? PIPELINE_MERGE_POLICY;
  }

  validate(tree: ConfigMapping): void {
    const issues = this.collectIssues(tree);
    if (issues.length === 0) {
      return;
    }

    const summary =
      issues.length === 1
        ? "Configuration validation failed with 1 issue."
        : `Configuration validation failed with ${issues.length} issues.`;
    throw new ConfigValidationError(summary, issues);
  }

  collectIssues(tree: ConfigMapping): ConfigValidationIssue[] {
    return [
      ...this.schemaIssues(tree),
      ...this.exclusivityIssues(tree),
      ...this.duplicateIdentifierIssues(tree),
    ];
  }

  private schemaIssues(tree: ConfigMapping): ConfigValidationIssue[] {
    const native = toNative(tree);
    const result = this.schema.safeParse(native);
    if (result.success) {
      return [];
    }

    return result.error.issues.flatMap((issue): ConfigValidationIssue[] => {
      if (issue.code === "unrecognized_keys") {
        return issue.keys.map((key) => ({
          path: renderIssuePath([...issue.path, key]),
          reason: "is not a recognised option",
          code: "unknown_key",
        }));
      }

      const path = renderIssuePath(issue.path) || "<root>";
      if (issue.code === "invalid_type") {
        return hasKey(native, issue.path)
          ? [{ path, reason: issue.message, code: "invalid_type" }]
          : [{ path, reason: "is required", code: "missing_key" }];
      }

      return [{ path, reason: issue.message, code: "invalid_value" }];
    });
  }

  private exclusivityIssues(tree: ConfigMapping): ConfigValidationIssue[] {
    const rules = this.exclusiveRules.map((rule) => ({
      rule,
      pattern: parsePathPattern(rule.section),
    }));
    const issues: ConfigValidationIssue[] = [];

    for (const visited of walk(tree)) {
      const { node } = visited;
      if (!isMapping(node)) {
        continue;
      }
      for (const { rule, pattern } of rules) {
        if (!matchesPathPattern(pattern, visited.pattern)) {
          continue;
        }
        const set = rule.options.filter((option) =>
          isOptionSet(node.entries.get(option)),
        );
        if (set.length > 1) {
          issues.push({
            path: formatKeyPath(visited.display) || "<root>",
            reason: `only one of ${rule.options.join(", ")} may be set (found ${set.join(", ")})`,
            code: "exclusive_options",
          });
        }
      }
    }

    return issues;
  }

  private duplicateIdentifierIssues(
    tree: ConfigMapping,
  ): ConfigValidationIssue[] {
    const policies = this.mergePolicy.keyedLists.map((policy) => ({
      identifier: policy.identifier,
      pattern: parsePathPattern(policy.path),
    }));
    const issues: ConfigValidationIssue[] = [];

    for (const visited of walk(tree)) {
      const { node } = visited;
      if (node.kind !== "sequence") {
        continue;
      }
      for (const { identifier, pattern } of policies) {
        if (!matchesPathPattern(pattern, visited.pattern)) {
          continue;
        }
        const seen = new Set<string>();
        node.items.forEach((item, index) => {
          const id = isMapping(item) ? item.entries.get(identifier) : undefined;
          if (!isScalar(id) || id.value === null) {
            return;
          }
          const key = String(id.value);
          if (seen.has(key)) {
            issues.push({
              path: formatKeyPath([...visited.display, `[${index}]`, identifier]),
              reason: `duplicates ${identifier} "${key}" of an earlier element`,
              code: "duplicate_identifier",
            });
          }
          seen.add(key);
        });
      }
    }

    return issues;
  }
}
