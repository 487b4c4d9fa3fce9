import "reflect-metadata";
import pino from "pino";
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import type { CliArguments } from "../../src/cli/cli-arguments";
import { CliParserService, CliParseError } from "../../src/cli/cli-parser.service";
import { CliRunnerService } from "../../src/cli/cli-runner.service";
import type { CliCommand } from "../../src/cli/commands/cli-command";

interface StubCommand extends CliCommand {
  execute: ReturnType<typeof vi.fn<(args: CliArguments) => Promise<void>>>;
}

const createStubCommand = (
  name: string,
  description = "",
  aliases: string[] = [],
): StubCommand => ({
  metadata: { name, description, aliases },
  execute: vi.fn<(args: CliArguments) => Promise<void>>().mockResolvedValue(),
});

describe("CliRunnerService", () => {
  let resolve: StubCommand;
  let validate: StubCommand;
  let runner: CliRunnerService;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    resolve = createStubCommand("resolve", "Resolve a configuration.");
    validate = createStubCommand("validate", "Validate a configuration.", ["check"]);
    runner = new CliRunnerService(
      new CliParserService(),
      [resolve, validate],
      pino({ level: "silent" }),
    );
    logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  it("dispatches parsed arguments to the named command", async () => {
    await runner.run(["resolve", "--format", "json", "study"]);

    expect(resolve.execute).toHaveBeenCalledWith({
      command: "resolve",
      options: { format: "json" },
      positionals: ["study"],
    });
    expect(validate.execute).not.toHaveBeenCalled();
  });

  it("matches aliases without regard to case", async () => {
    await runner.run(["--", "CHECK", "study"]);

    expect(validate.execute).toHaveBeenCalledTimes(1);
  });

  it("prints usage for help requests", async () => {
    await runner.run(["--help"]);

    const lines = logSpy.mock.calls.map(([line]) => line);
    expect(lines.slice(0, 5)).toEqual([
      "Usage: strata <command> [options]",
      "",
      "Available commands:",
      "- resolve: Resolve a configuration.",
      "- validate (aliases: check): Validate a configuration.",
    ]);
    expect(lines).toContain("  --no-validate: Skip validation of the resolved tree.");
    expect(resolve.execute).not.toHaveBeenCalled();
  });

  it("prints usage and fails without a command", async () => {
    await expect(runner.run([])).rejects.toThrowError("No command provided.");
    expect(logSpy).toHaveBeenCalledWith("Usage: strata <command> [options]");
  });

  it("rejects unknown commands", async () => {
    const error = await runner.run(["explode"]).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CliParseError);
    expect(error).toHaveProperty("message", "Unknown command: explode");
  });
});
