import { Inject, Injectable } from "@nestjs/common";
import { ConfigService } from "@strata/config";
import type { CliArguments } from "../cli-arguments";
import type { CliCommand, CliCommandMetadata } from "./cli-command";
import { requireTarget } from "./command-options";

@Injectable()
export class ValidateCommand implements CliCommand {
  readonly metadata: CliCommandMetadata = {
    name: "validate",
    description: "Resolve a configuration and report every validation issue.",
    aliases: ["check"],
  };

  constructor(
    @Inject(ConfigService)
    private readonly configService: ConfigService,
  ) {}

  async execute(args: CliArguments): Promise<void> {
    const target = requireTarget(args);
    const resolved = await this.configService.resolve(target);
    console.log(`OK ${resolved.name}`);
  }
}
