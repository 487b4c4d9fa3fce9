import { Inject, Injectable } from "@nestjs/common";
import { ConfigService } from "@strata/config";
import type { CliCommand, CliCommandMetadata } from "./cli-command";

@Injectable()
export class PresetsCommand implements CliCommand {
  readonly metadata: CliCommandMetadata = {
    name: "presets",
    description: "List the built-in preset configurations.",
    aliases: ["ls"],
  };

  constructor(
    @Inject(ConfigService)
    private readonly configService: ConfigService,
  ) {}

  async execute(): Promise<void> {
    const presets = this.configService.listPresets();
    if (presets.length === 0) {
      console.log("No presets are installed.");
      return;
    }
    for (const preset of presets) {
      console.log(preset);
    }
  }
}
