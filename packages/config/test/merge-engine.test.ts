import { describe, expect, it, vi } from "vitest";
import { EMPTY_MAPPING, toNative } from "../src/config-node";
import { mergeConfigNodes, mergeConfigTrees } from "../src/merge/merge-engine";
import {
  matchesPathPattern,
  parsePathPattern,
  PIPELINE_MERGE_POLICY,
} from "../src/merge/merge-policy";
import type { MergePolicy } from "../src/types";
import { tree } from "./support/nodes";

const REGRESSOR_POLICY: MergePolicy = {
  keyedLists: [{ path: "nuisance.Regressors", identifier: "Name" }],
  removablePaths: ["rois.*", "nuisance.Regressors[].*"],
};

const createLogger = () => ({ debug: vi.fn(), warn: vi.fn() });

describe("path patterns", () => {
  it("splits sequence steps into their own segments", () => {
    expect(parsePathPattern("a.Regressors[].Name")).toEqual([
      "a",
      "Regressors",
      "[]",
      "Name",
    ]);
    expect(parsePathPattern("grid[][]")).toEqual(["grid", "[]", "[]"]);
  });

  it("lets a wildcard match mapping keys only", () => {
    const pattern = parsePathPattern("rois.*");

    expect(matchesPathPattern(pattern, ["rois", "/atlas.nii.gz"])).toBe(true);
    expect(matchesPathPattern(pattern, ["rois", "[]"])).toBe(false);
    expect(matchesPathPattern(pattern, ["rois"])).toBe(false);
  });
});

describe("mergeConfigTrees", () => {
  it("treats an empty override as the identity", () => {
    const base = tree({ a: 1, b: { c: [1, 2] } });

    expect(toNative(mergeConfigTrees(base, EMPTY_MAPPING))).toEqual(
      toNative(base),
    );
  });

  it("treats an empty base as the identity", () => {
    const override = tree({ a: 1, b: { c: [1, 2] } });

    expect(toNative(mergeConfigTrees(EMPTY_MAPPING, override))).toEqual(
      toNative(override),
    );
  });

  it("merges nested mappings key by key", () => {
    const base = tree({
      pipeline_setup: { pipeline_name: "base", system_config: { cores: 1 } },
    });
    const override = tree({
      pipeline_setup: { system_config: { random_seed: 77742777 } },
    });

    expect(toNative(mergeConfigTrees(base, override))).toEqual({
      pipeline_setup: {
        pipeline_name: "base",
        system_config: { cores: 1, random_seed: 77742777 },
      },
    });
  });

  it("keeps base key order and appends override-only keys", () => {
    const merged = mergeConfigTrees(
      tree({ b: 1, a: 2 }),
      tree({ c: 3, a: 4 }),
    );

    expect([...merged.entries.keys()]).toEqual(["b", "a", "c"]);
    expect(toNative(merged)).toEqual({ b: 1, a: 4, c: 3 });
  });

  it("replaces unkeyed sequences instead of appending", () => {
    const base = tree({ functional_preproc: { despiking: { run: [false] } } });
    const override = tree({ functional_preproc: { despiking: { run: [true] } } });

    expect(toNative(mergeConfigTrees(base, override))).toEqual({
      functional_preproc: { despiking: { run: [true] } },
    });
  });

  it("merges keyed list elements with the same identifier in place", () => {
    const base = tree({
      nuisance: {
        Regressors: [
          { Name: "A", Bandpass: { bottom: 0.01 } },
          { Name: "B", PolyOrt: { degree: 1 } },
        ],
      },
    });
    const override = tree({
      nuisance: { Regressors: [{ Name: "A", Bandpass: { top: 0.1 } }] },
    });

    const merged = mergeConfigTrees(base, override, { policy: REGRESSOR_POLICY });

    expect(toNative(merged)).toEqual({
      nuisance: {
        Regressors: [
          { Name: "A", Bandpass: { bottom: 0.01, top: 0.1 } },
          { Name: "B", PolyOrt: { degree: 1 } },
        ],
      },
    });
  });

  it("appends keyed list elements with new identifiers in override order", () => {
    const base = tree({ nuisance: { Regressors: [{ Name: "A" }] } });
    const override = tree({
      nuisance: { Regressors: [{ Name: "C" }, { Name: "A", x: 1 }, { Name: "B" }] },
    });

    const merged = mergeConfigTrees(base, override, { policy: REGRESSOR_POLICY });

    expect(toNative(merged)).toEqual({
      nuisance: {
        Regressors: [{ Name: "A", x: 1 }, { Name: "C" }, { Name: "B" }],
      },
    });
  });

  it("appends and warns about keyed list elements without an identifier", () => {
    const logger = createLogger();
    const base = tree({ nuisance: { Regressors: [{ Name: "A" }] } });
    const override = tree({ nuisance: { Regressors: [{ degree: 2 }] } });

    const merged = mergeConfigTrees(base, override, {
      policy: REGRESSOR_POLICY,
      logger,
    });

    expect(toNative(merged)).toEqual({
      nuisance: { Regressors: [{ Name: "A" }, { degree: 2 }] },
    });
    expect(logger.warn).toHaveBeenCalledWith(
      { path: "nuisance.Regressors", identifier: "Name" },
      "Keyed list element has no identifier; appending it unchanged",
    );
  });

  it("lets the override win on a kind mismatch", () => {
    const logger = createLogger();
    const merged = mergeConfigTrees(
      tree({ a: { nested: true } }),
      tree({ a: [1, 2] }),
      { logger },
    );

    expect(toNative(merged)).toEqual({ a: [1, 2] });
    expect(logger.debug).toHaveBeenCalledWith(
      { path: "a", base: "mapping", override: "sequence" },
      "Structural override replaces base subtree",
    );
  });

  it("removes keys set to null on removable paths", () => {
    const base = tree({ rois: { "/a.nii.gz": "Avg", "/b.nii.gz": "Avg" } });
    const override = tree({ rois: { "/a.nii.gz": null, "/c.nii.gz": null } });

    const merged = mergeConfigTrees(base, override, { policy: REGRESSOR_POLICY });

    expect(toNative(merged)).toEqual({ rois: { "/b.nii.gz": "Avg" } });
  });

  it("removes fields of matched keyed list elements", () => {
    const base = tree({
      nuisance: { Regressors: [{ Name: "A", Bandpass: { bottom: 0.01 } }] },
    });
    const override = tree({
      nuisance: { Regressors: [{ Name: "A", Bandpass: null }] },
    });

    const merged = mergeConfigTrees(base, override, { policy: REGRESSOR_POLICY });

    expect(toNative(merged)).toEqual({
      nuisance: { Regressors: [{ Name: "A" }] },
    });
  });

  it("keeps null as a value everywhere else", () => {
    const merged = mergeConfigTrees(
      tree({ system: { random_seed: 5 } }),
      tree({ system: { random_seed: null } }),
      { policy: REGRESSOR_POLICY },
    );

    expect(toNative(merged)).toEqual({ system: { random_seed: null } });
  });

  it("does not modify its inputs", () => {
    const base = tree({ a: { b: 1 }, list: [1] });
    const override = tree({ a: { c: 2 }, list: [2] });

    mergeConfigTrees(base, override);

    expect(toNative(base)).toEqual({ a: { b: 1 }, list: [1] });
    expect(toNative(override)).toEqual({ a: { c: 2 }, list: [2] });
  });

  it("merges pipeline regressors by Name under the pipeline policy", () => {
    const base = tree({
      nuisance_corrections: {
        "2-nuisance_regression": {
          Regressors: [{ Name: "Regressor-1", PolyOrt: { degree: 2 } }],
        },
      },
    });
    const override = tree({
      nuisance_corrections: {
        "2-nuisance_regression": {
          Regressors: [
            { Name: "Regressor-1", PolyOrt: { degree: 3 } },
            { Name: "Regressor-with-GSR" },
          ],
        },
      },
    });

    const merged = mergeConfigTrees(base, override, {
      policy: PIPELINE_MERGE_POLICY,
    });

    expect(toNative(merged)).toEqual({
      nuisance_corrections: {
        "2-nuisance_regression": {
          Regressors: [
            { Name: "Regressor-1", PolyOrt: { degree: 3 } },
            { Name: "Regressor-with-GSR" },
          ],
        },
      },
    });
  });
});

describe("mergeConfigNodes", () => {
  it("returns the override for scalars", () => {
    expect(toNative(mergeConfigNodes(tree({ a: 1 }), tree({ a: "x" })))).toEqual(
      { a: "x" },
    );
  });

  it("uses the given path to look up keyed lists", () => {
    const merged = mergeConfigNodes(
      tree({ Regressors: [{ Name: "A", x: 1 }] }),
      tree({ Regressors: [{ Name: "A", y: 2 }] }),
      ["nuisance"],
      { policy: REGRESSOR_POLICY },
    );

    expect(toNative(merged)).toEqual({ Regressors: [{ Name: "A", x: 1, y: 2 }] });
  });
});
