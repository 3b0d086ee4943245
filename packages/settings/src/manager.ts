/**
 * Settings Manager
 *
 * YAML-based settings management with:
 * - Environment variable substitution (${VAR} and ${VAR:-default})
 * - Sibling `.local` override files
 * - Structural and semantic validation
 * - Default value application and path resolution
 * - Captcha font discovery
 * - Hot-reload on SIGHUP signal
 * - CLI argument overrides
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as yaml from 'yaml';
import { DEFAULT_SETTINGS, CAPTCHA_FONT_SUBDIR } from './defaults.js';
import { ConfigLoadError, ConfigValidationError, toError } from './errors.js';
import { discoverCaptchaFonts } from './fonts.js';
import { baseDirFor, resolvePath } from './paths.js';
import { ResolvedSettingsSchema, SettingsFileSchema, type SettingsFile } from './schema.js';
import type { LogLevel, Settings } from './types.js';
import { nullLogger, type Logger } from './utils/logger.js';
import { fromZodError, validateSettings } from './validation.js';

export interface CliOverrides {
  config?: string;
  host?: string;
  port?: number;
  debug?: boolean;
  'log-level'?: LogLevel;
  'nntp-host'?: string;
  'nntp-port'?: number;
  'site-name'?: string;
}

export interface ConfigManagerOptions {
  configPath?: string;
  envPrefix?: string;
  cliArgs?: CliOverrides;
  /** Files tried in order when no configPath is given */
  searchPaths?: string[];
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  logger?: Logger;
  /**
   * Builds the logger from the `logging` section of each loaded settings
   * value. Replaces `logger` from font discovery onwards.
   */
  loggerFactory?: (logging: Settings['logging']) => Logger;
}

// Default search paths for settings files
export const DEFAULT_SEARCH_PATHS = [
  '/etc/chanfront/config.yaml',
  path.join(os.homedir(), '.chanfront', 'config.yaml'),
  './config.yaml',
];

type Mapping = Record<string, unknown>;

function isMapping(value: unknown): value is Mapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigManager {
  private config: Settings | null = null;
  private sourcePath: string | null = null;
  private reloadHandlers: Array<(settings: Settings) => void> = [];
  private hotReloadEnabled = false;
  private sighupHandler: (() => void) | null = null;
  private logger: Logger;

  constructor(private options: ConfigManagerOptions = {}) {
    this.logger = (options.logger ?? nullLogger).child({ component: 'settings' });
  }

  async load(): Promise<Settings> {
    const cwd = this.options.cwd ?? process.cwd();
    const configPath = this.options.cliArgs?.config ?? this.options.configPath;

    let source: string | null;
    if (configPath) {
      source = path.resolve(cwd, configPath);
      if (!fs.existsSync(source)) {
        throw new ConfigLoadError(`Config file not found: ${source}`);
      }
    } else {
      source = this.findConfigFile(cwd);
    }

    let raw: Mapping = {};
    if (source) {
      raw = this.readLayer(source);
      const overridePath = this.getOverridePath(source);
      if (fs.existsSync(overridePath)) {
        this.logger.debug(`Applying override file ${overridePath}`);
        raw = this.deepMerge(raw, this.readLayer(overridePath));
      }
    } else {
      this.logger.info('No settings file found, using defaults');
    }

    const parsed = SettingsFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw fromZodError(parsed.error, raw);
    }

    const settings = this.mergeWithDefaults(parsed.data, baseDirFor(source, cwd));

    if (this.options.cliArgs) {
      this.applyCliOverrides(settings, this.options.cliArgs);
    }

    if (this.options.loggerFactory) {
      this.logger = this.options.loggerFactory(settings.logging).child({ component: 'settings' });
    }

    settings.captcha.fonts = await discoverCaptchaFonts(settings.captcha.fontDir, this.logger);

    validateSettings(settings);

    this.config = settings;
    this.sourcePath = source;
    this.logger.info(source ? `Loaded settings from ${source}` : 'Loaded default settings', {
      site: settings.site.name,
      fonts: settings.captcha.fonts.length,
    });

    return this.get();
  }

  get(): Settings {
    if (!this.config) {
      throw new ConfigLoadError('Settings have not been loaded');
    }
    return structuredClone(this.config);
  }

  /** File the current settings came from, null for pure defaults */
  get source(): string | null {
    return this.sourcePath;
  }

  private findConfigFile(cwd: string): string | null {
    const searchPaths = this.options.searchPaths ?? DEFAULT_SEARCH_PATHS;
    for (const searchPath of searchPaths) {
      const candidate = path.resolve(cwd, searchPath);
      if (fs.existsSync(candidate)) {
        return candidate;
      }
    }
    return null;
  }

  private getOverridePath(basePath: string): string {
    // config.yaml -> config.local.yaml
    const ext = path.extname(basePath);
    if (ext) {
      return `${basePath.slice(0, -ext.length)}.local${ext}`;
    }
    return `${basePath}.local`;
  }

  private readLayer(filePath: string): Mapping {
    const parsed = this.parseYaml(this.loadFile(filePath), filePath);
    const substituted = this.substituteEnvVars(parsed);
    return isMapping(substituted) ? substituted : {};
  }

  private deepMerge(base: Mapping, override: Mapping): Mapping {
    const result: Mapping = { ...base };

    for (const [key, value] of Object.entries(override)) {
      const current = result[key];
      if (isMapping(value) && isMapping(current)) {
        result[key] = this.deepMerge(current, value);
      } else if (value !== undefined) {
        result[key] = value;
      }
    }

    return result;
  }

  private loadFile(filePath: string): string {
    try {
      return fs.readFileSync(filePath, 'utf8');
    } catch (e) {
      throw new ConfigLoadError(`Failed to read config file: ${filePath}`, toError(e));
    }
  }

  private parseYaml(content: string, filePath: string): Mapping {
    let parsed: unknown;
    try {
      parsed = yaml.parse(content);
    } catch (e) {
      throw new ConfigLoadError(`Invalid YAML syntax in ${filePath}`, toError(e));
    }
    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (!isMapping(parsed)) {
      throw new ConfigLoadError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  private substituteEnvVars(obj: unknown): unknown {
    if (typeof obj === 'string') {
      const env = this.options.env ?? process.env;
      // Match ${VAR} or ${VAR:-default}
      return obj.replace(
        /\$\{(\w+)(?::-([^}]*))?\}/g,
        (_: string, name: string, defaultVal: string | undefined) => {
          const envName = this.options.envPrefix ? `${this.options.envPrefix}${name}` : name;
          const value = env[envName];

          // Empty counts as unset when a default is given
          if (value === '' && defaultVal !== undefined) {
            return defaultVal;
          }

          if (value === undefined && defaultVal === undefined) {
            throw new ConfigLoadError(`Required environment variable '${envName}' not set`);
          }
          return value ?? defaultVal ?? '';
        }
      );
    }
    if (Array.isArray(obj)) {
      return obj.map((v) => this.substituteEnvVars(v));
    }
    if (isMapping(obj)) {
      return Object.fromEntries(
        Object.entries(obj).map(([k, v]) => [k, this.substituteEnvVars(v)])
      );
    }
    return obj;
  }

  private mergeWithDefaults(loaded: SettingsFile, sourceDir: string): Settings {
    const defaults = structuredClone(DEFAULT_SETTINGS);
    const baseDir = loaded.site?.baseDir ? resolvePath(sourceDir, loaded.site.baseDir) : sourceDir;
    const at = (value: string) => resolvePath(baseDir, value);
    // Bare tool names are looked up on PATH
    const tool = (value: string) => (value.includes('/') ? at(value) : value);

    const assetsRoot = at(loaded.assets?.assetsRoot ?? defaults.assets.assetsRoot);

    return {
      site: {
        name: loaded.site?.name ?? defaults.site.name,
        secretKey: loaded.site?.secretKey ?? defaults.site.secretKey,
        debug: loaded.site?.debug ?? defaults.site.debug,
        allowedHosts: loaded.site?.allowedHosts ?? defaults.site.allowedHosts,
        baseDir,
      },
      server: {
        host: loaded.server?.host ?? defaults.server.host,
        port: loaded.server?.port ?? defaults.server.port,
      },
      database: {
        engine: loaded.database?.engine ?? defaults.database.engine,
        host: loaded.database?.host === null
          ? undefined
          : loaded.database?.host ?? defaults.database.host,
        port: loaded.database?.port ?? undefined,
        name: this.databaseName(loaded, defaults.database.name, at),
        user: loaded.database?.user ?? undefined,
        password: loaded.database?.password ?? undefined,
      },
      nntp: {
        host: loaded.nntp?.host ?? defaults.nntp.host,
        port: loaded.nntp?.port ?? defaults.nntp.port,
        user: loaded.nntp?.user ?? defaults.nntp.user,
        password: loaded.nntp?.password ?? defaults.nntp.password,
      },
      assets: {
        staticUrl: loaded.assets?.staticUrl ?? defaults.assets.staticUrl,
        assetsRoot,
        mediaRoot: at(loaded.assets?.mediaRoot ?? defaults.assets.mediaRoot),
        mediaUrl: loaded.assets?.mediaUrl ?? defaults.assets.mediaUrl,
        templateDirs: (loaded.assets?.templateDirs ?? defaults.assets.templateDirs).map(at),
      },
      captcha: {
        fontDir: loaded.captcha?.fontDir
          ? at(loaded.captcha.fontDir)
          : path.join(assetsRoot, CAPTCHA_FONT_SUBDIR),
        fonts: [],
      },
      tools: {
        convertPath: tool(loaded.tools?.convertPath ?? defaults.tools.convertPath),
        ffmpegPath: tool(loaded.tools?.ffmpegPath ?? defaults.tools.ffmpegPath),
      },
      i18n: { ...defaults.i18n, ...loaded.i18n },
      apps: {
        installed: loaded.apps?.installed ?? defaults.apps.installed,
        middleware: loaded.apps?.middleware ?? defaults.apps.middleware,
      },
      logging: {
        level: loaded.logging?.level ?? defaults.logging.level,
        format: loaded.logging?.format ?? defaults.logging.format,
      },
    };
  }

  private databaseName(
    loaded: SettingsFile,
    fallback: string,
    at: (value: string) => string
  ): string {
    const name = loaded.database?.name ?? fallback;
    // sqlite names a file; ':memory:' is the in-process database
    if (loaded.database?.engine === 'sqlite' && name !== ':memory:') {
      return at(name);
    }
    return name;
  }

  private applyCliOverrides(settings: Settings, cliArgs: CliOverrides): void {
    if (cliArgs.host !== undefined) {
      settings.server.host = cliArgs.host;
    }
    if (cliArgs.port !== undefined) {
      settings.server.port = cliArgs.port;
    }
    if (cliArgs.debug !== undefined) {
      settings.site.debug = cliArgs.debug;
    }

    // Hyphenated CLI arguments
    if (cliArgs['log-level'] !== undefined) {
      settings.logging.level = cliArgs['log-level'];
    }
    if (cliArgs['nntp-host'] !== undefined) {
      settings.nntp.host = cliArgs['nntp-host'];
    }
    if (cliArgs['nntp-port'] !== undefined) {
      settings.nntp.port = cliArgs['nntp-port'];
    }
    if (cliArgs['site-name'] !== undefined) {
      settings.site.name = cliArgs['site-name'];
    }
  }

  enableHotReload(): void {
    if (this.hotReloadEnabled) return;

    this.hotReloadEnabled = true;
    this.sighupHandler = () => {
      if (this.hotReloadEnabled) {
        this.reload().catch((error: unknown) => {
          this.logger.error('Settings reload failed, keeping current settings', error);
        });
      }
    };
    process.on('SIGHUP', this.sighupHandler);
  }

  disableHotReload(): void {
    this.hotReloadEnabled = false;
    if (this.sighupHandler) {
      process.removeListener('SIGHUP', this.sighupHandler);
      this.sighupHandler = null;
    }
  }

  onReload(handler: (settings: Settings) => void): () => void {
    this.reloadHandlers.push(handler);
    return () => {
      const idx = this.reloadHandlers.indexOf(handler);
      if (idx >= 0) this.reloadHandlers.splice(idx, 1);
    };
  }

  async reload(): Promise<Settings> {
    const previousConfig = this.config;
    const previousSource = this.sourcePath;

    let next: Settings;
    try {
      next = await this.load();
    } catch (e) {
      this.config = previousConfig;
      this.sourcePath = previousSource;
      throw new ConfigLoadError('Failed to reload configuration', toError(e));
    }

    for (const handler of this.reloadHandlers) {
      try {
        handler(structuredClone(next));
      } catch (error) {
        this.logger.error('Error in settings reload handler', error);
      }
    }

    return next;
  }

  /** Structural check of a complete Settings value, then the semantic checks */
  validate(config: unknown): config is Settings {
    const parsed = ResolvedSettingsSchema.safeParse(config);
    if (!parsed.success) {
      return false;
    }
    try {
      validateSettings(parsed.data);
      return true;
    } catch (error) {
      if (error instanceof ConfigValidationError) {
        return false;
      }
      throw error;
    }
  }
}
