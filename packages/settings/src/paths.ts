import * as os from 'os';
import * as path from 'path';

/**
 * Resolve a configured path against the settings base directory.
 * A leading `~/` expands to the home directory.
 */
export function resolvePath(baseDir: string, value: string): string {
  if (value === '~' || value.startsWith('~/')) {
    return path.join(os.homedir(), value.slice(1));
  }
  return path.resolve(baseDir, value);
}

/**
 * Base directory for a settings file: the directory holding it, or the
 * working directory when no file was loaded.
 */
export function baseDirFor(configPath: string | null, cwd: string = process.cwd()): string {
  return configPath ? path.dirname(path.resolve(cwd, configPath)) : cwd;
}
