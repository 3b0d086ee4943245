import * as path from 'path';
import type { ZodError } from 'zod';
import { ConfigValidationError } from './errors.js';
import type { Settings } from './types.js';

const ADMIN_DEPENDENCIES = ['auth', 'contenttypes', 'sessions', 'messages'] as const;
const SESSION_DEPENDENT_MIDDLEWARE = ['authentication', 'messages'] as const;

/**
 * Turn the first schema issue into a ConfigValidationError naming the
 * dotted field it concerns.
 */
export function fromZodError(error: ZodError, raw: unknown): ConfigValidationError {
  const issue = error.issues[0];
  const segments = issue.path.map(String);

  if (issue.code === 'unrecognized_keys') {
    const field = [...segments, issue.keys[0]].join('.');
    return new ConfigValidationError(
      `Unknown configuration key: '${field}'`,
      field,
      valueAt(raw, [...segments, issue.keys[0]])
    );
  }

  const field = segments.join('.');
  const value = valueAt(raw, segments);
  if (issue.code === 'invalid_type') {
    return new ConfigValidationError(
      `Invalid value for ${field}: expected ${issue.expected}, got '${String(value)}'`,
      field,
      value,
      issue.expected
    );
  }
  return new ConfigValidationError(`Invalid value for ${field}: ${issue.message}`, field, value);
}

function valueAt(raw: unknown, segments: string[]): unknown {
  let current = raw;
  for (const segment of segments) {
    if (typeof current !== 'object' || current === null) {
      return undefined;
    }
    current = Reflect.get(current, segment);
  }
  return current;
}

function checkPort(field: string, port: number | undefined): void {
  if (port === undefined) return;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigValidationError(`Port out of range (1-65535): ${port}`, field, port);
  }
}

function checkUnique(field: string, values: readonly string[]): void {
  const seen = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) {
      throw new ConfigValidationError(`Duplicate entry '${value}' in ${field}`, field, value);
    }
    seen.add(value);
  }
}

/**
 * Semantic checks on merged, path-resolved settings. Throws on the first
 * violation.
 */
export function validateSettings(settings: Settings): void {
  checkPort('server.port', settings.server.port);
  checkPort('nntp.port', settings.nntp.port);
  checkPort('database.port', settings.database.port);

  // NNTP login is all or nothing
  const { user, password } = settings.nntp;
  if ((user === null) !== (password === null)) {
    const field = user === null ? 'nntp.user' : 'nntp.password';
    throw new ConfigValidationError(
      'NNTP login requires both user and password, or neither',
      field,
      null
    );
  }

  const db = settings.database;
  if (!db.name) {
    throw new ConfigValidationError('Database name is required', 'database.name', db.name);
  }
  if (db.engine !== 'sqlite' && !db.host) {
    throw new ConfigValidationError(
      `Database engine '${db.engine}' requires a host`,
      'database.host',
      db.host
    );
  }

  const { assets } = settings;
  for (const field of ['staticUrl', 'mediaUrl'] as const) {
    if (!assets[field].endsWith('/')) {
      throw new ConfigValidationError(
        `assets.${field} must end with '/': ${assets[field]}`,
        `assets.${field}`,
        assets[field]
      );
    }
  }
  if (assets.staticUrl === assets.mediaUrl) {
    throw new ConfigValidationError(
      'assets.staticUrl and assets.mediaUrl must differ',
      'assets.mediaUrl',
      assets.mediaUrl
    );
  }
  if (path.resolve(assets.mediaRoot) === path.resolve(assets.assetsRoot)) {
    throw new ConfigValidationError(
      'assets.mediaRoot and assets.assetsRoot must differ',
      'assets.mediaRoot',
      assets.mediaRoot
    );
  }

  const { i18n } = settings;
  if (!/^[a-z]{2,3}(-[a-z0-9]+)*$/i.test(i18n.languageCode)) {
    throw new ConfigValidationError(
      `Invalid language code: ${i18n.languageCode}`,
      'i18n.languageCode',
      i18n.languageCode
    );
  }
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: i18n.timeZone });
  } catch {
    throw new ConfigValidationError(
      `Unknown time zone: ${i18n.timeZone}`,
      'i18n.timeZone',
      i18n.timeZone
    );
  }

  const { installed, middleware } = settings.apps;
  checkUnique('apps.installed', installed);
  checkUnique('apps.middleware', middleware);

  const sessionsAt = middleware.indexOf('sessions');
  for (const dependent of SESSION_DEPENDENT_MIDDLEWARE) {
    const at = middleware.indexOf(dependent);
    if (at >= 0 && (sessionsAt < 0 || sessionsAt > at)) {
      throw new ConfigValidationError(
        `Middleware '${dependent}' must come after 'sessions'`,
        'apps.middleware',
        middleware
      );
    }
  }

  if (installed.includes('admin')) {
    const missing = ADMIN_DEPENDENCIES.filter((app) => !installed.includes(app));
    if (missing.length > 0) {
      throw new ConfigValidationError(
        `App 'admin' requires: ${missing.join(', ')}`,
        'apps.installed',
        installed
      );
    }
  }
}
