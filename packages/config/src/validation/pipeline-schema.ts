import { z } from "zod";

const MAX_RANDOM_SEED = 2147483647;

const forkSwitch = z.array(z.boolean()).min(1, "must list at least one option");

const nuisanceComponent = z.strictObject({
  include_delayed: z.boolean().optional(),
  include_delayed_squared: z.boolean().optional(),
  include_squared: z.boolean().optional(),
  summary: z.string().optional(),
  erode_mask: z.boolean().optional(),
  extraction_resolution: z.number().positive().optional(),
});

const motionComponent = z.strictObject({
  include_delayed: z.boolean().optional(),
  include_delayed_squared: z.boolean().optional(),
  include_squared: z.boolean().optional(),
});

const compCorComponent = z.strictObject({
  summary: z.strictObject({
    method: z.enum(["DetrendPC", "PC"]),
    components: z.number().int().positive(),
  }),
  tissues: z.array(z.enum(["WhiteMatter", "CerebrospinalFluid", "GreyMatter"])).optional(),
  extraction_resolution: z.number().positive().optional(),
  threshold: z.string().optional(),
});

const frequencyBand = z.strictObject({
  bottom_frequency: z.number().nonnegative(),
  top_frequency: z.number().positive(),
  method: z.enum(["default", "AFNI"]).optional(),
});

const stopBand = z.strictObject({
  lower_frequency: z.number().nonnegative(),
  upper_frequency: z.number().positive(),
});

export const regressorSchema = z.strictObject({
  Name: z.string().min(1),
  Bandpass: frequencyBand.optional(),
  Bandstop: stopBand.optional(),
  CerebrospinalFluid: nuisanceComponent.optional(),
  GlobalSignal: nuisanceComponent.optional(),
  GreyMatter: nuisanceComponent.optional(),
  WhiteMatter: nuisanceComponent.optional(),
  Motion: motionComponent.optional(),
  PolyOrt: z.strictObject({ degree: z.number().int().nonnegative() }).optional(),
  aCompCor: compCorComponent.optional(),
  tCompCor: compCorComponent.optional(),
});

const pipelineSetupSchema = z.strictObject({
  pipeline_name: z.string().min(1),
  output_directory: z.strictObject({
    path: z.string().min(1),
    write_func_outputs: z.boolean().optional(),
    quality_control: z.strictObject({
      generate_quality_control_images: z.boolean().optional(),
      generate_xcpqc_files: z.boolean(),
    }),
  }),
  working_directory: z
    .strictObject({
      path: z.string().min(1),
      remove_working_dir: z.boolean().optional(),
    })
    .optional(),
  log_directory: z.strictObject({ path: z.string().min(1) }).optional(),
  system_config: z.strictObject({
    random_seed: z
      .union([
        z.number().int().positive().max(MAX_RANDOM_SEED),
        z.literal("random"),
      ])
      .nullable()
      .optional(),
    random_seed_file: z.string().min(1).nullable().optional(),
    max_cores_per_participant: z.number().int().positive(),
    num_participants_at_once: z.number().int().positive(),
    maximum_memory_per_participant: z.number().positive(),
  }),
});

const functionalPreprocSchema = z.strictObject({
  run: z.boolean(),
  truncation: z
    .strictObject({
      start_tr: z.number().int().nonnegative(),
      stop_tr: z.number().int().nonnegative().nullable(),
    })
    .optional(),
  despiking: z.strictObject({ run: forkSwitch }),
});

const nuisanceCorrectionsSchema = z.strictObject({
  "1-ICA-AROMA": z
    .strictObject({
      run: forkSwitch,
      denoising_type: z.enum(["aggr", "nonaggr"]).optional(),
    })
    .optional(),
  "2-nuisance_regression": z.strictObject({
    run: forkSwitch,
    Regressors: z.array(regressorSchema),
  }),
});

const timeseriesExtractionSchema = z.strictObject({
  run: z.boolean(),
  connectivity_matrix: z.strictObject({
    using: z.array(z.enum(["AFNI", "Nilearn", "ndmg"])),
    measure: z.array(z.enum(["Pearson", "Partial", "Spearman", "MGC"])),
  }),
  tse_roi_paths: z.record(z.string(), z.string().min(1)),
});

/**
 * Shape of a fully resolved pipeline configuration. Sections are closed:
 * keys not listed here are reported as unknown.
 */
export const pipelineConfigSchema = z.strictObject({
  schema_version: z.string().optional(),
  pipeline_setup: pipelineSetupSchema,
  functional_preproc: functionalPreprocSchema,
  nuisance_corrections: nuisanceCorrectionsSchema,
  timeseries_extraction: timeseriesExtractionSchema,
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;

export interface ExclusiveOptionRule {
  /** Path pattern of the mapping holding the options (`*` and `[]` allowed). */
  readonly section: string;
  readonly options: readonly [string, string, ...string[]];
}

export const EXCLUSIVE_OPTION_RULES: readonly ExclusiveOptionRule[] = [
  {
    section: "pipeline_setup.system_config",
    options: ["random_seed", "random_seed_file"],
  },
  {
    section: "nuisance_corrections.2-nuisance_regression.Regressors[]",
    options: ["Bandpass", "Bandstop"],
  },
];
