/**
 * @chanfront/settings
 *
 * Typed settings for the imageboard web front-end: loading, validation and
 * the values derived from them.
 */

export type {
  Settings,
  SiteSettings,
  DatabaseSettings,
  NntpSettings,
  AssetSettings,
  CaptchaSettings,
  DatabaseEngine,
  LogLevel,
  LogFormat,
  AppId,
  MiddlewareId,
} from './types.js';

export {
  VALID_DATABASE_ENGINES,
  VALID_LOG_LEVELS,
  VALID_LOG_FORMATS,
  KNOWN_APPS,
  KNOWN_MIDDLEWARE,
} from './types.js';

export {
  DEFAULT_SETTINGS,
  DEFAULT_SECRET_KEY,
  DEFAULT_NNTP_PORT,
} from './defaults.js';
export type { DefaultSettings } from './defaults.js';

export { ConfigLoadError, ConfigValidationError } from './errors.js';

export { ConfigManager, DEFAULT_SEARCH_PATHS } from './manager.js';
export type { ConfigManagerOptions, CliOverrides } from './manager.js';

export { ResolvedSettingsSchema, SettingsFileSchema } from './schema.js';
export type { SettingsFile } from './schema.js';

export { validateSettings } from './validation.js';
export { resolvePath, baseDirFor } from './paths.js';
export { databaseDsn, isSocketHost } from './database.js';
export { nntpEndpoint, nntpCredentials } from './nntp.js';
export type { NntpEndpoint, NntpCredentials } from './nntp.js';
export { discoverCaptchaFonts, CAPTCHA_FONT_PATTERN } from './fonts.js';
export { isAllowedHost, splitHostHeader } from './hosts.js';
export { checkDeployment, findExecutable, hasErrors, MIN_SECRET_KEY_LENGTH } from './checks.js';
export type { DeploymentIssue, CheckLevel } from './checks.js';
export { redactSettings, REDACTED } from './redact.js';

export { Logger, nullLogger, loggerFor } from './utils/logger.js';
export type { LoggerOptions } from './utils/logger.js';
