/**
 * The slice of a pino logger the resolution engine writes to. Any pino
 * `Logger` satisfies it.
 */
export interface ResolverLogger {
  debug(bindings: Record<string, unknown>, message: string): void;
  warn(bindings: Record<string, unknown>, message: string): void;
}

export const noopLogger: ResolverLogger = {
  debug: () => {},
  warn: () => {},
};
