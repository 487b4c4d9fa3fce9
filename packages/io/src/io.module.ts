import { Global, Module } from "@nestjs/common";
import type { FactoryProvider, Provider } from "@nestjs/common";
import {
  RESOLVER_LOGGER_TOKEN,
  RUNTIME_OPTIONS_TOKEN,
  type LoggingConfig,
  type ResolverLogger,
  type ResolverRuntimeOptions,
} from "@strata/config";
import { createLoggerProvider } from "./logger.decorator";
import { LoggerService } from "./logger.service";

export const RESOLVER_LOGGER_SCOPE = "resolver";

/**
 * Logs go to stderr unless a file is named, so stdout stays free for
 * resolved documents.
 */
export function toLoggingConfig(
  options: ResolverRuntimeOptions = {},
): LoggingConfig {
  return {
    level: options.logLevel ?? "warn",
    destination: options.logFile
      ? { type: "file", path: options.logFile }
      : { type: "stderr" },
  };
}

const loggerServiceProvider: FactoryProvider<LoggerService> = {
  provide: LoggerService,
  useFactory: (options?: ResolverRuntimeOptions) => {
    const service = new LoggerService();
    service.configure(toLoggingConfig(options));
    return service;
  },
  inject: [{ token: RUNTIME_OPTIONS_TOKEN, optional: true }],
};

const rootLoggerProvider = createLoggerProvider();

/** Hands the resolution engine a pino child logger scoped to `resolver`. */
export const resolverLoggerProvider: FactoryProvider<ResolverLogger> = {
  provide: RESOLVER_LOGGER_TOKEN,
  useFactory: (loggerService: LoggerService) =>
    loggerService.getLogger(RESOLVER_LOGGER_SCOPE),
  inject: [LoggerService],
};

const providers: Provider[] = [
  loggerServiceProvider,
  rootLoggerProvider,
  resolverLoggerProvider,
];

@Global()
@Module({
  providers,
  exports: [LoggerService, rootLoggerProvider, RESOLVER_LOGGER_TOKEN],
})
export class IoModule {}
