// src/cli-util.ts
import type { Command } from "commander";
import { ConfigError } from "./config.js";
import { ConsoleLogger, parseLogLevel, type LogLevel, type Logger } from "./logger.js";

export function resolveLogLevel(command: Command): LogLevel {
  const raw: unknown = command.optsWithGlobals().logLevel;
  return parseLogLevel(typeof raw === "string" ? raw : undefined, "info");
}

/**
 * Command options merged with the global ones, plus a logger at the global
 * --log-level (unless the caller injected one).
 */
export function mergeOptsWithLogger<T extends object>(
  command: Command,
  opts: T,
  logger?: Logger,
): T & { logger: Logger; logLevel: LogLevel } {
  const level = resolveLogLevel(command);
  return {
    ...opts,
    logger: logger ?? new ConsoleLogger(level),
    logLevel: level,
  };
}

/**
 * Message and exit status for an error that reached the top of a command.
 * Configuration problems get their message only; anything else its stack.
 */
export function describeFatal(
  err: unknown,
  label: string,
): { message: string; exitCode: number } {
  if (err instanceof ConfigError) {
    return { message: `${label}: ${err.message}`, exitCode: 1 };
  }
  const detail = err instanceof Error ? (err.stack ?? err.message) : String(err);
  return { message: `${label} fatal:\n${detail}`, exitCode: 1 };
}
