import { ConfigurableModuleBuilder } from "@nestjs/common";
import type { ResolverRuntimeOptions } from "./types";

export const { ConfigurableModuleClass, MODULE_OPTIONS_TOKEN } =
  new ConfigurableModuleBuilder<ResolverRuntimeOptions>().build();

export const RUNTIME_OPTIONS_TOKEN = Symbol("STRATA_RUNTIME_OPTIONS");
export const PRESET_CATALOG_TOKEN = Symbol("STRATA_PRESET_CATALOG");
export const MERGE_POLICY_TOKEN = Symbol("STRATA_MERGE_POLICY");
export const MIGRATION_STEPS_TOKEN = Symbol("STRATA_MIGRATION_STEPS");
export const RESOLVER_LOGGER_TOKEN = Symbol("STRATA_RESOLVER_LOGGER");

export const FROM_KEY = "FROM";
export const SCHEMA_VERSION_KEY = "schema_version";
export const RESERVED_KEYS = [FROM_KEY, SCHEMA_VERSION_KEY] as const;

export const DEFAULT_MAX_DEPTH = 32;
