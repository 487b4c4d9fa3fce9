export * from "./types";
export * from "./errors";
export * from "./config-node";
export * from "./config.const";
export * from "./config.namespace";
export * from "./config.module";
export * from "./config.service";
export * from "./resolver-logger";
export * from "./runtime-cli";
export * from "./runtime-env";
export * from "./runtime-options.provider";
export * from "./merge/merge-engine";
export * from "./merge/merge-policy";
export * from "./migrations";
export * from "./presets";
export * from "./registry/base-registry";
export * from "./loader/document-loader";
export * from "./resolver/inheritance-resolver";
export * from "./validation/config-validator";
export * from "./validation/pipeline-schema";
