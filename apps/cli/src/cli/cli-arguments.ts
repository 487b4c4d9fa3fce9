export type CliOptionValue = string | string[] | boolean;

export interface CliArguments {
  /**
   * The name of the command to execute (e.g. `resolve`, `validate`).
   */
  readonly command: string;
  /**
   * Positional arguments that follow the command name.
   */
  readonly positionals: string[];
  /**
   * Option map keyed by camelCase names (e.g. `searchPaths`). Repeated value
   * flags collect into arrays.
   */
  readonly options: Readonly<Record<string, CliOptionValue>>;
}
