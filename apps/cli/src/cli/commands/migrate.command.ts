import { Inject, Injectable } from "@nestjs/common";
import type { Logger } from "pino";
import { ConfigService, formatConfigTree } from "@strata/config";
import { InjectLogger } from "@strata/io";
import type { CliArguments } from "../cli-arguments";
import type { CliCommand, CliCommandMetadata } from "./cli-command";
import {
  readFormatOption,
  readStringOption,
  requireTarget,
  writeOutput,
} from "./command-options";

@Injectable()
export class MigrateCommand implements CliCommand {
  readonly metadata: CliCommandMetadata = {
    name: "migrate",
    description:
      "Print one document upgraded to the current schema, keeping its FROM.",
  };

  constructor(
    @Inject(ConfigService)
    private readonly configService: ConfigService,
    @InjectLogger("cli:migrate")
    private readonly logger: Logger,
  ) {}

  async execute(args: CliArguments): Promise<void> {
    const target = requireTarget(args);
    const format = readFormatOption(args);
    const migrated = await this.configService.migrateDocument(target);

    this.logger.info(
      {
        document: migrated.document.name,
        from: migrated.outcome.initialVersion,
        to: migrated.outcome.finalVersion,
        migrations: migrated.outcome.appliedMigrations,
      },
      "Migrated document",
    );

    await writeOutput(
      formatConfigTree(migrated.tree, format),
      readStringOption(args, "output"),
    );
  }
}
