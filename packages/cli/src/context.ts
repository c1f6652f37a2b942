/**
 * Command context - configuration, logging and ruleset sources shared by
 * every command.
 */

import { Console } from 'node:console';
import * as path from 'node:path';

import { InvalidArgumentError } from 'commander';
import {
  ConfigLoader,
  createLogger,
  type CodeprobeConfig,
  type Logger,
  type LogLevel,
  type RegistryOptions,
} from 'codeprobe-core';

/** Exit codes: 0 = clean, 1 = violations or failures found, 2 = error */
export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_ERROR = 2;

export interface CommandContext {
  rootDir: string;
  config: CodeprobeConfig;
  logger: Logger;
}

const stderrConsole = new Console({ stdout: process.stderr, stderr: process.stderr });

/**
 * Logger writing to stderr, leaving stdout to reports
 */
export function createCliLogger(level: LogLevel): Logger {
  return createLogger({ level, sink: stderrConsole });
}

/**
 * Load `.codeprobe/config.json` from `directory` and build the logger.
 *
 * @throws the config loader's errors when the file is unreadable or invalid
 */
export async function loadContext(directory: string | undefined, debug = false): Promise<CommandContext> {
  const rootDir = path.resolve(directory ?? process.cwd());
  const { config } = await new ConfigLoader({ rootDir }).load();
  const logger = createCliLogger(debug ? 'debug' : config.logLevel);
  return { rootDir, config, logger };
}

/**
 * Ruleset sources from the command line, else from the configuration
 */
export function rulesetSources(cliSources: readonly string[] | undefined, config: CodeprobeConfig): string[] {
  return cliSources && cliSources.length > 0 ? [...cliSources] : [...config.rulesets];
}

export function registryOptions(config: CodeprobeConfig): RegistryOptions | undefined {
  return config.registry.url ? { url: config.registry.url, timeoutMs: config.registry.timeoutMs } : undefined;
}

/**
 * Commander option parser for positive integers
 */
export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  const parsed = parseInt(value, 10);
  if (parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

