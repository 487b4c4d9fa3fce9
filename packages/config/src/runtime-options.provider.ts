import type { FactoryProvider } from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";
import {
  MODULE_OPTIONS_TOKEN,
  PRESET_CATALOG_TOKEN,
  RUNTIME_OPTIONS_TOKEN,
} from "./config.const";
import { strataConfig } from "./config.namespace";
import { loadPresetCatalog, type PresetCatalog } from "./presets";
import { mergeRuntimeOptions } from "./runtime-cli";
import type { ResolverRuntimeOptions } from "./types";

/** Environment settings overlaid with the options passed to `register`. */
export const runtimeOptionsProvider: FactoryProvider<ResolverRuntimeOptions> = {
  provide: RUNTIME_OPTIONS_TOKEN,
  inject: [
    { token: MODULE_OPTIONS_TOKEN, optional: true },
    { token: strataConfig.KEY, optional: true },
  ],
  useFactory: (
    moduleOptions?: ResolverRuntimeOptions,
    envOptions?: ConfigType<typeof strataConfig>,
  ): ResolverRuntimeOptions =>
    mergeRuntimeOptions(envOptions ?? {}, moduleOptions ?? {}),
};

export const presetCatalogProvider: FactoryProvider<Promise<PresetCatalog>> = {
  provide: PRESET_CATALOG_TOKEN,
  inject: [RUNTIME_OPTIONS_TOKEN],
  useFactory: (options: ResolverRuntimeOptions) =>
    loadPresetCatalog(options.presetsDir),
};
