import { Module, type Provider } from "@nestjs/common";
import { createLoggerProvider } from "@strata/io";
import { CliParserService } from "./cli-parser.service";
import { CliRunnerService } from "./cli-runner.service";
import { CLI_COMMANDS } from "./cli.constants";
import type { CliCommand } from "./commands/cli-command";
import { MigrateCommand } from "./commands/migrate.command";
import { PresetsCommand } from "./commands/presets.command";
import { ResolveCommand } from "./commands/resolve.command";
import { ValidateCommand } from "./commands/validate.command";

const commandProviders: Provider[] = [
  ResolveCommand,
  ValidateCommand,
  PresetsCommand,
  MigrateCommand,
  {
    provide: CLI_COMMANDS,
    useFactory: (
      resolve: ResolveCommand,
      validate: ValidateCommand,
      presets: PresetsCommand,
      migrate: MigrateCommand,
    ): CliCommand[] => [resolve, validate, presets, migrate],
    inject: [ResolveCommand, ValidateCommand, PresetsCommand, MigrateCommand],
  },
];

/**
 * CliModule bundles the CLI surface. It expects `ConfigModule` and `IoModule`
 * to be registered globally by the application module.
 */
@Module({
  providers: [
    createLoggerProvider("cli"),
    createLoggerProvider("cli:migrate"),
    CliParserService,
    CliRunnerService,
    ...commandProviders,
  ],
  exports: [CliRunnerService],
})
export class CliModule {}
