import { Inject, Injectable } from "@nestjs/common";
import { ConfigService, formatConfigTree } from "@strata/config";
import type { CliArguments } from "../cli-arguments";
import type { CliCommand, CliCommandMetadata } from "./cli-command";
import {
  readFormatOption,
  readStringOption,
  requireTarget,
  writeOutput,
} from "./command-options";

@Injectable()
export class ResolveCommand implements CliCommand {
  readonly metadata: CliCommandMetadata = {
    name: "resolve",
    description: "Print a configuration with its inheritance chain applied.",
  };

  constructor(
    @Inject(ConfigService)
    private readonly configService: ConfigService,
  ) {}

  async execute(args: CliArguments): Promise<void> {
    const target = requireTarget(args);
    const format = readFormatOption(args);
    const resolved =
      args.options.noValidate === true
        ? await this.configService.inspect(target)
        : await this.configService.resolve(target);

    await writeOutput(
      formatConfigTree(resolved.tree, format),
      readStringOption(args, "output"),
    );
  }
}
