import type { MigrationStep } from "../types";
import {
  mapSequenceMappings,
  moveKey,
  renameKey,
  wrapScalarInSequence,
} from "./transforms";

const REGRESSORS_PATH = [
  "nuisance_corrections",
  "2-nuisance_regression",
  "Regressors",
];

export const migrate170To180: MigrationStep = {
  id: "0001-nest-legacy-run-switches",
  from: "1.7.0",
  to: "1.8.0",
  description:
    "Moves pipelineName under pipeline_setup, turns despiking.run into a fork list and renames Regressor name to Name.",
  transform(tree) {
    const nested = moveKey(
      tree,
      ["pipelineName"],
      ["pipeline_setup", "pipeline_name"],
    );
    const forked = wrapScalarInSequence(nested, [
      "functional_preproc",
      "despiking",
      "run",
    ]);
    return mapSequenceMappings(forked, REGRESSORS_PATH, (regressor) =>
      renameKey(regressor, "name", "Name"),
    );
  },
};
