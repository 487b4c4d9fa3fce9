import fs from "fs/promises";
import path from "path";
import { CONFIG_OUTPUT_FORMATS, type ConfigOutputFormat } from "@strata/config";
import type { CliArguments } from "../cli-arguments";
import { CliParseError } from "../cli-parser.service";

/** The last value given for a flag, when it was given at all. */
export function readStringOption(
  args: CliArguments,
  key: string,
): string | undefined {
  const value = args.options[key];
  if (Array.isArray(value)) {
    return value[value.length - 1];
  }
  return typeof value === "string" ? value : undefined;
}

export function readFormatOption(args: CliArguments): ConfigOutputFormat {
  const raw = readStringOption(args, "format") ?? "yaml";
  const format = CONFIG_OUTPUT_FORMATS.find((candidate) => candidate === raw);
  if (!format) {
    throw new CliParseError(
      `Unsupported format "${raw}". Expected one of: ${CONFIG_OUTPUT_FORMATS.join(", ")}.`,
    );
  }
  return format;
}

export function requireTarget(args: CliArguments): string {
  const [target, ...extra] = args.positionals;
  if (target === undefined) {
    throw new CliParseError(
      `The ${args.command} command requires a configuration name or path.`,
    );
  }
  if (extra.length > 0) {
    throw new CliParseError(`Unexpected arguments: ${extra.join(" ")}`);
  }
  return target;
}

export async function writeOutput(
  content: string,
  outputPath?: string,
): Promise<void> {
  if (!outputPath) {
    process.stdout.write(content);
    return;
  }
  const target = path.resolve(outputPath);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, content, "utf-8");
}
