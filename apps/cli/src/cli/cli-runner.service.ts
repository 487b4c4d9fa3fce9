import { Inject, Injectable } from "@nestjs/common";
import type { Logger } from "pino";
import { InjectLogger } from "@strata/io";
import { CLI_COMMANDS, CLI_VALUE_OPTIONS, CLI_BOOLEAN_OPTIONS } from "./cli.constants";
import type { CliCommand } from "./commands/cli-command";
import { CliParserService, CliParseError } from "./cli-parser.service";

@Injectable()
export class CliRunnerService {
  constructor(
    @Inject(CliParserService)
    private readonly parser: CliParserService,
    @Inject(CLI_COMMANDS)
    private readonly commands: CliCommand[],
    @InjectLogger("cli")
    private readonly logger: Logger,
  ) {}

  async run(argv: readonly string[]): Promise<void> {
    const normalizedArgs = argv[0] === "--" ? argv.slice(1) : argv;
    const [first] = normalizedArgs;

    if (first === undefined || this.isHelpRequest(first)) {
      this.printUsage();
      if (first === undefined) {
        throw new CliParseError("No command provided.");
      }
      return;
    }

    const parsed = this.parser.parse(normalizedArgs);
    const command = this.resolveCommand(parsed.command);
    if (!command) {
      throw new CliParseError(`Unknown command: ${parsed.command}`);
    }

    this.logger.debug({ command: command.metadata.name }, "Executing command");

    await command.execute(parsed);
  }

  private resolveCommand(name: string): CliCommand | undefined {
    const normalized = name.toLowerCase();
    return this.commands.find((command) => {
      const { metadata } = command;
      if (metadata.name === normalized) {
        return true;
      }
      return metadata.aliases?.some((alias) => alias.toLowerCase() === normalized);
    });
  }

  private isHelpRequest(token: string): boolean {
    return ["help", "-h", "--help"].includes(token);
  }

  private printUsage(): void {
    const rows = this.commands.map(({ metadata }) => {
      const aliasSuffix = metadata.aliases?.length
        ? ` (aliases: ${metadata.aliases.join(", ")})`
        : "";
      return `- ${metadata.name}${aliasSuffix}: ${metadata.description}`;
    });
    const optionRows = [...CLI_VALUE_OPTIONS, ...CLI_BOOLEAN_OPTIONS].map(
      (option) => `  ${option.flags.join(", ")}: ${option.description}`,
    );

    console.log("Usage: strata <command> [options]");
    console.log("");
    console.log("Available commands:");
    for (const row of rows) {
      console.log(row);
    }
    console.log("");
    console.log("Options:");
    for (const row of optionRows) {
      console.log(row);
    }
  }
}
