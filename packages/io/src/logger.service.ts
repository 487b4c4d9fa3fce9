import { Injectable } from "@nestjs/common";
import fs from "fs";
import { createRequire } from "module";
import path from "path";
import pino, { type Logger, type LoggerOptions } from "pino";
import type { LoggingConfig, LoggingDestination } from "@strata/config";

type LogMethod = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

const LOG_METHODS: readonly string[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
] satisfies LogMethod[];

const isLogMethod = (property: string | symbol): property is LogMethod =>
  typeof property === "string" && LOG_METHODS.includes(property);

const DEFAULT_LOG_FILE = ".strata/logs/strata.log";

export interface LoggerEvent {
  level: LogMethod;
  args: unknown[];
}

export type LoggerListener = (event: LoggerEvent) => void;

@Injectable()
export class LoggerService {
  private rootLogger: Logger | null = null;
  private rawLogger: Logger | null = null;
  private cachedSignature = "";
  private readonly listeners = new Set<LoggerListener>();
  private readonly wrapped = new WeakSet<Logger>();

  registerListener(listener: LoggerListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  configure(config?: LoggingConfig): Logger {
    const signature = this.computeSignature(config);
    if (this.rootLogger && signature === this.cachedSignature) {
      return this.rootLogger;
    }
    const rawLogger = this.buildLogger(config);
    this.rawLogger = rawLogger;
    this.rootLogger = this.wrapLogger(rawLogger);
    this.cachedSignature = signature;
    return this.rootLogger;
  }

  getLogger(scope?: string): Logger {
    if (!this.rootLogger) {
      const rawLogger = this.buildLogger();
      this.rawLogger = rawLogger;
      this.rootLogger = this.wrapLogger(rawLogger);
    }
    if (!scope) {
      return this.rootLogger;
    }
    const base = this.rawLogger ?? this.rootLogger;
    const child = base.child({ scope });
    return this.wrapLogger(child);
  }

  withBindings(bindings: Record<string, unknown>): Logger {
    return this.getLogger().child(bindings);
  }

  reset(): void {
    this.rootLogger = null;
    this.rawLogger = null;
    this.cachedSignature = "";
  }

  private computeSignature(config?: LoggingConfig): string {
    return JSON.stringify(config ?? {});
  }

  private resolvePrettyTransport(
    destination?: LoggingDestination,
  ): LoggerOptions["transport"] {
    const stream = destination?.type === "stderr" ? process.stderr : process.stdout;
    const wantsPretty =
      destination?.pretty ?? (destination?.type !== "file" && stream.isTTY);
    if (!wantsPretty) return undefined;

    try {
      createRequire(import.meta.url).resolve("pino-pretty");
      return {
        target: "pino-pretty",
        options: {
          colorize: destination?.colorize ?? true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname",
          destination: destination?.type === "stderr" ? 2 : 1,
        },
      };
    } catch {
      return undefined;
    }
  }

  private prepareDestination(destination?: LoggingDestination) {
    if (!destination) return undefined;

    switch (destination.type) {
      case "stdout":
        return pino.destination({ fd: 1 });
      case "stderr":
        return pino.destination({ fd: 2 });
      case "file": {
        const filePath = path.resolve(destination.path ?? DEFAULT_LOG_FILE);
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        return pino.destination({ dest: filePath, sync: false });
      }
      default:
        return undefined;
    }
  }

  private buildLogger(config?: LoggingConfig): Logger {
    const level = config?.level ?? "info";
    const destination = config?.destination;
    const options: LoggerOptions = {
      level,
      base: undefined,
      timestamp:
        config?.enableTimestamps === false
          ? false
          : pino.stdTimeFunctions.isoTime,
    };

    const transport = this.resolvePrettyTransport(destination);
    if (transport) {
      options.transport = transport;
    }

    const destStream = transport ? undefined : this.prepareDestination(destination);
    return destStream ? pino(options, destStream) : pino(options);
  }

  private wrapLogger(logger: Logger): Logger {
    if (this.wrapped.has(logger)) {
      return logger;
    }

    const service = this;
    const proxy = new Proxy(logger, {
      get(target, property, receiver) {
        if (property === "child") {
          return (...args: Parameters<Logger["child"]>) =>
            service.wrapLogger(target.child<never>(...args));
        }

        const original: unknown = Reflect.get(target, property, receiver);
        if (!isLogMethod(property) || typeof original !== "function") {
          return original;
        }

        return (...args: unknown[]) => {
          service.notify(property, args);
          return Reflect.apply(original, target, args);
        };
      },
    });

    this.wrapped.add(proxy);
    return proxy;
  }

  private notify(level: LogMethod, args: unknown[]): void {
    if (this.listeners.size === 0) {
      return;
    }

    const event: LoggerEvent = { level, args };
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
