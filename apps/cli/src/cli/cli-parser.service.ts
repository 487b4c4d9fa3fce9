import { Injectable } from "@nestjs/common";
import type { CliArguments, CliOptionValue } from "./cli-arguments";
import {
  CLI_BOOLEAN_OPTIONS_BY_FLAG,
  CLI_VALUE_OPTIONS_BY_FLAG,
} from "./cli.constants";

/** A malformed command line. Rendered with the usage exit code. */
export class CliParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliParseError";
  }
}

@Injectable()
export class CliParserService {
  parse(argv: readonly string[]): CliArguments {
    const [command, ...rest] = argv;
    if (command === undefined) {
      throw new CliParseError("No command provided.");
    }
    if (command.startsWith("-")) {
      throw new CliParseError(`Invalid command: ${command}`);
    }

    const options: Record<string, CliOptionValue> = {};
    const positionals: string[] = [];

    for (let i = 0; i < rest.length; i += 1) {
      const token = rest[i];
      if (token === undefined) {
        break;
      }
      if (token === "--") {
        positionals.push(...rest.slice(i + 1));
        break;
      }

      if (!token.startsWith("-")) {
        positionals.push(token);
        continue;
      }

      const booleanDefinition = CLI_BOOLEAN_OPTIONS_BY_FLAG.get(token);
      if (booleanDefinition) {
        options[booleanDefinition.key] = true;
        continue;
      }

      const optionDefinition = CLI_VALUE_OPTIONS_BY_FLAG.get(token);
      if (!optionDefinition) {
        throw new CliParseError(`Unknown option: ${token}`);
      }

      const next = rest[i + 1];
      if (next === undefined || next.startsWith("-")) {
        throw new CliParseError(`Option ${token} requires a value.`);
      }

      i += 1;
      const existing = options[optionDefinition.key];
      if (existing === undefined || typeof existing === "boolean") {
        options[optionDefinition.key] = next;
      } else if (Array.isArray(existing)) {
        options[optionDefinition.key] = [...existing, next];
      } else {
        options[optionDefinition.key] = [existing, next];
      }
    }

    return { command, options, positionals };
  }
}
