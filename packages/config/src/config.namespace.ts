import { registerAs } from "@nestjs/config";
import { resolveRuntimeOptionsFromEnv } from "./runtime-env";
import type { ResolverRuntimeOptions } from "./types";

export const CONFIG_NAMESPACE = "strata" as const;

export const strataConfig = registerAs(
  CONFIG_NAMESPACE,
  (): ResolverRuntimeOptions => resolveRuntimeOptionsFromEnv(process.env),
);
