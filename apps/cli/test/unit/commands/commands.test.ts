import "reflect-metadata";
import fs from "fs/promises";
import os from "os";
import path from "path";
import pino from "pino";
import { Test, type TestingModule } from "@nestjs/testing";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigModule, ConfigService, ConfigValidationError } from "@strata/config";
import type { CliArguments } from "../../../src/cli/cli-arguments";
import { CliParseError } from "../../../src/cli/cli-parser.service";
import { MigrateCommand } from "../../../src/cli/commands/migrate.command";
import { PresetsCommand } from "../../../src/cli/commands/presets.command";
import { ResolveCommand } from "../../../src/cli/commands/resolve.command";
import { ValidateCommand } from "../../../src/cli/commands/validate.command";

const args = (
  command: string,
  positionals: string[],
  options: CliArguments["options"] = {},
): CliArguments => ({ command, positionals, options });

describe("CLI commands", () => {
  let moduleRef: TestingModule;
  let configService: ConfigService;
  let workspace: string;

  beforeEach(async () => {
    workspace = await fs.mkdtemp(path.join(os.tmpdir(), "strata-cli-"));
    await fs.writeFile(
      path.join(workspace, "partial.yml"),
      ["FROM: ndmg", "pipeline_setup:", "  pipeline_nmae: typo", ""].join("\n"),
    );
    moduleRef = await Test.createTestingModule({
      imports: [ConfigModule.register({ searchPaths: [workspace] })],
    }).compile();
    configService = moduleRef.get(ConfigService);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await moduleRef.close();
    await fs.rm(workspace, { recursive: true, force: true });
  });

  describe("ResolveCommand", () => {
    it("writes the resolved tree as JSON to stdout", async () => {
      const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
      const command = new ResolveCommand(configService);

      await command.execute(args("resolve", ["ndmg"], { format: "json" }));

      expect(write).toHaveBeenCalledTimes(1);
      const output = write.mock.calls[0]?.[0];
      expect(typeof output).toBe("string");
      const parsed: unknown = JSON.parse(String(output));
      expect(parsed).toMatchObject({
        schema_version: "1.8.3",
        pipeline_setup: { pipeline_name: "ndmg" },
        timeseries_extraction: {
          connectivity_matrix: { using: ["ndmg"], measure: ["Pearson"] },
        },
      });
    });

    it("writes to the output file when one is given", async () => {
      const command = new ResolveCommand(configService);
      const outputPath = path.join(workspace, "out", "resolved.yml");

      await command.execute(args("resolve", ["default"], { output: outputPath }));

      const written = await fs.readFile(outputPath, "utf-8");
      expect(written.startsWith("schema_version: 1.8.3\npipeline_setup:\n")).toBe(true);
    });

    it("skips validation with --no-validate", async () => {
      vi.spyOn(process.stdout, "write").mockImplementation(() => true);
      const command = new ResolveCommand(configService);

      await expect(command.execute(args("resolve", ["partial"]))).rejects.toBeInstanceOf(
        ConfigValidationError,
      );
      await expect(
        command.execute(args("resolve", ["partial"], { noValidate: true })),
      ).resolves.toBeUndefined();
    });

    it("rejects unsupported formats and missing targets", async () => {
      const command = new ResolveCommand(configService);

      await expect(
        command.execute(args("resolve", ["default"], { format: "toml" })),
      ).rejects.toThrowError('Unsupported format "toml". Expected one of: yaml, json.');
      await expect(command.execute(args("resolve", []))).rejects.toBeInstanceOf(
        CliParseError,
      );
      await expect(
        command.execute(args("resolve", ["a", "b"])),
      ).rejects.toThrowError("Unexpected arguments: b");
    });
  });

  describe("ValidateCommand", () => {
    it("reports success with the document name", async () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
      const command = new ValidateCommand(configService);

      await command.execute(args("validate", ["rbc-options"]));

      expect(log).toHaveBeenCalledWith("OK rbc-options");
    });

    it("propagates validation failures", async () => {
      const command = new ValidateCommand(configService);

      await expect(command.execute(args("validate", ["partial"]))).rejects.toHaveProperty(
        "details",
        ["pipeline_setup.pipeline_nmae: is not a recognised option"],
      );
    });
  });

  describe("PresetsCommand", () => {
    it("prints one preset per line", async () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
      const command = new PresetsCommand(configService);

      await command.execute();

      expect(log.mock.calls).toEqual([
        ["default"],
        ["fx-options"],
        ["ndmg"],
        ["rbc-options"],
      ]);
    });
  });

  describe("MigrateCommand", () => {
    it("prints the migrated document with its FROM kept", async () => {
      const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
      const command = new MigrateCommand(configService, pino({ level: "silent" }));

      await command.execute(args("migrate", ["ndmg"], { format: "json" }));

      expect(write).toHaveBeenCalledWith(
        `${JSON.stringify(
          {
            FROM: "default",
            schema_version: "1.8.3",
            pipeline_setup: { pipeline_name: "ndmg" },
            timeseries_extraction: {
              run: true,
              connectivity_matrix: { using: ["ndmg"], measure: ["Pearson"] },
            },
          },
          null,
          2,
        )}\n`,
      );
    });
  });
});
