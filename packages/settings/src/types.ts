/**
 * Settings Types
 *
 * Type definitions for the front-end settings, as handed to consumers after
 * loading and path resolution.
 */

export const VALID_DATABASE_ENGINES = ['postgresql', 'mysql', 'sqlite'] as const;
export const VALID_LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export const VALID_LOG_FORMATS = ['json', 'text'] as const;

export const KNOWN_APPS = [
  'frontend',
  'admin',
  'auth',
  'contenttypes',
  'sessions',
  'messages',
  'staticfiles',
] as const;

export const KNOWN_MIDDLEWARE = [
  'security',
  'sessions',
  'common',
  'csrf',
  'authentication',
  'messages',
  'clickjacking',
] as const;

export type DatabaseEngine = (typeof VALID_DATABASE_ENGINES)[number];
export type LogLevel = (typeof VALID_LOG_LEVELS)[number];
export type LogFormat = (typeof VALID_LOG_FORMATS)[number];
export type AppId = (typeof KNOWN_APPS)[number];
export type MiddlewareId = (typeof KNOWN_MIDDLEWARE)[number];

export interface SiteSettings {
  /** Display name of the front-end */
  name: string;
  secretKey: string;
  debug: boolean;
  allowedHosts: string[];
  /** Root every relative path is resolved against */
  baseDir: string;
}

export interface DatabaseSettings {
  engine: DatabaseEngine;
  /** Hostname, or an absolute unix-socket directory */
  host?: string;
  port?: number;
  name: string;
  user?: string;
  password?: string;
}

export interface NntpSettings {
  host: string;
  port: number;
  user: string | null;
  password: string | null;
}

export interface AssetSettings {
  staticUrl: string;
  assetsRoot: string;
  mediaRoot: string;
  mediaUrl: string;
  templateDirs: string[];
}

export interface CaptchaSettings {
  fontDir: string;
  /** TrueType fonts found in fontDir at load time */
  fonts: string[];
}

export interface Settings {
  site: SiteSettings;
  server: {
    host: string;
    port: number;
  };
  database: DatabaseSettings;
  nntp: NntpSettings;
  assets: AssetSettings;
  captcha: CaptchaSettings;
  tools: {
    convertPath: string;
    ffmpegPath: string;
  };
  i18n: {
    languageCode: string;
    timeZone: string;
    dateFormat: string;
    useI18n: boolean;
    useL10n: boolean;
    useTz: boolean;
  };
  apps: {
    installed: AppId[];
    middleware: MiddlewareId[];
  };
  logging: {
    level: LogLevel;
    format: LogFormat;
  };
}
