/**
 * Logger Module
 * Structured logging using pino with console or file output
 */

import pino, { type Logger as PinoLogger } from "pino";
import * as fs from "node:fs";
import * as path from "node:path";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
  enableFileLogging?: boolean;
  logDir?: string;
}

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function isDevelopment(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.NODE_ENV !== "production";
}

/**
 * Get log level from environment or default.
 * Test runs stay quiet unless LOG_LEVEL asks otherwise.
 */
export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const envLevel = env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  if (env.NODE_ENV === "test" || env.VITEST) return "silent";
  return isDevelopment(env) ? "debug" : "info";
}

/**
 * The logging capability handed to cache, resolver and validation components.
 * Any pino logger satisfies it; tests can pass spies.
 */
export type Logger = Pick<PinoLogger, "trace" | "debug" | "info" | "warn" | "error" | "fatal">;

/**
 * Create a logger instance for a specific component
 *
 * @example
 * ```typescript
 * const logger = createLogger("disk-cache");
 * logger.info({ workspaceId }, "Loaded resolver cache");
 * logger.warn({ err, fileName }, "Skipping unreadable cache file");
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): PinoLogger {
  const { level = getLogLevel(), enableFileLogging = false, logDir } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  if (level === "silent") {
    return pino(baseOptions);
  }

  if (enableFileLogging && logDir) {
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    const destination = pino.destination({
      dest: path.join(logDir, `${component}.log`),
      sync: false,
    });
    return pino(baseOptions, destination);
  }

  if (isDevelopment()) {
    try {
      return pino({
        ...baseOptions,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:HH:MM:ss",
            ignore: "pid,hostname",
            destination: 2,
          },
        },
      });
    } catch {
      // pino-pretty missing; plain JSON is fine
      return pino(baseOptions, pino.destination(2));
    }
  }

  // stdout belongs to command output
  return pino(baseOptions, pino.destination(2));
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(parent: PinoLogger, bindings: Record<string, unknown>): PinoLogger {
  return parent.child(bindings);
}
