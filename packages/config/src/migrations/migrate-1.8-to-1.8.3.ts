import { scalar } from "../config-node";
import type { MigrationStep } from "../types";
import { setDefault, wrapScalarInSequence } from "./transforms";

const CONNECTIVITY_PATH = ["timeseries_extraction", "connectivity_matrix"];

export const migrate180To183: MigrationStep = {
  id: "0002-wrap-connectivity-tools",
  from: "1.8.0",
  to: "1.8.3",
  description:
    "Turns connectivity_matrix using/measure into lists and adds the XCP quality control switch.",
  transform(tree, context) {
    const withUsing = wrapScalarInSequence(tree, [
      ...CONNECTIVITY_PATH,
      "using",
    ]);
    const withMeasure = wrapScalarInSequence(withUsing, [
      ...CONNECTIVITY_PATH,
      "measure",
    ]);

    // Override fragments must not gain values that would shadow their base.
    if (context.partial) {
      return withMeasure;
    }

    return setDefault(
      withMeasure,
      [
        "pipeline_setup",
        "output_directory",
        "quality_control",
        "generate_xcpqc_files",
      ],
      scalar(false),
    );
  },
};
