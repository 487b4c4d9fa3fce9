export * from "./cli-arguments";
export * from "./cli-errors";
export * from "./cli-parser.service";
export * from "./cli-runner.service";
export * from "./cli.constants";
export * from "./cli.module";
export * from "./commands/cli-command";
export * from "./commands/migrate.command";
export * from "./commands/presets.command";
export * from "./commands/resolve.command";
export * from "./commands/validate.command";
