import {
  ConfigLoadError,
  ConfigValidationError,
  ConfigManager,
  loggerFor,
  type LoggerOptions,
  type Settings,
} from '@chanfront/settings';
import chalk from 'chalk';

export interface Output {
  log(line: string): void;
  error(line: string): void;
  /** Where settings-layer log lines go; configured by `logging` in the file */
  logDestination?: LoggerOptions['destination'];
}

export const consoleOutput: Output = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
  // stderr, so `--json` output on stdout stays parseable
  logDestination: 2,
};

export interface ConfigOption {
  config?: string;
}

export type LoadResult =
  | { ok: true; settings: Settings; source: string | null }
  | { ok: false; error: ConfigLoadError | ConfigValidationError };

/**
 * Load settings for a command. Configuration errors come back as a value;
 * anything else propagates.
 */
export async function loadForCommand(options: ConfigOption, out: Output): Promise<LoadResult> {
  const manager = new ConfigManager({
    configPath: options.config,
    loggerFactory: (logging) => loggerFor(logging, 'chanfront', out.logDestination),
  });
  try {
    const settings = await manager.load();
    return { ok: true, settings, source: manager.source };
  } catch (error) {
    if (error instanceof ConfigLoadError || error instanceof ConfigValidationError) {
      return { ok: false, error };
    }
    throw error;
  }
}

export function describeError(error: ConfigLoadError | ConfigValidationError): string {
  if (error instanceof ConfigValidationError) {
    return `${chalk.red('Invalid setting')} ${chalk.cyan(error.field)}: ${error.message}`;
  }
  const cause = error.cause ? ` (${error.cause.message})` : '';
  return `${chalk.red('Cannot load settings')}: ${error.message}${cause}`;
}

export function errorJson(error: ConfigLoadError | ConfigValidationError): Record<string, unknown> {
  return error instanceof ConfigValidationError
    ? { name: error.name, message: error.message, field: error.field }
    : { name: error.name, message: error.message, cause: error.cause?.message };
}
