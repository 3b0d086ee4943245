import type { Settings, SiteSettings } from './types.js';

/**
 * Settings defaults before path resolution. Relative paths here are resolved
 * against `site.baseDir` at load time; `captcha.fontDir` is derived from the
 * resolved assets root.
 */
export type DefaultSettings = Omit<Settings, 'site' | 'captcha'> & {
  site: Omit<SiteSettings, 'baseDir'>;
};

export const DEFAULT_SECRET_KEY = 'changeme';
export const DEFAULT_NNTP_PORT = 1129;
export const CAPTCHA_FONT_SUBDIR = 'fonts';

export const DEFAULT_SETTINGS: DefaultSettings = {
  site: {
    name: 'ebin.tld',
    secretKey: DEFAULT_SECRET_KEY,
    debug: true,
    allowedHosts: [],
  },
  server: { host: '127.0.0.1', port: 8000 },
  database: {
    engine: 'postgresql',
    host: '/var/run/postgresql',
    name: 'postgres',
  },
  nntp: {
    host: '127.0.0.1',
    port: DEFAULT_NNTP_PORT,
    user: null,
    password: null,
  },
  assets: {
    staticUrl: '/static/',
    assetsRoot: 'assets',
    mediaRoot: 'media',
    mediaUrl: '/media/',
    templateDirs: ['templates'],
  },
  tools: {
    convertPath: '/usr/bin/convert',
    ffmpegPath: '/usr/bin/ffmpeg',
  },
  i18n: {
    languageCode: 'en-us',
    timeZone: 'UTC',
    dateFormat: 'r',
    useI18n: true,
    useL10n: true,
    useTz: true,
  },
  apps: {
    installed: ['frontend', 'admin', 'auth', 'contenttypes', 'sessions', 'messages', 'staticfiles'],
    middleware: ['security', 'sessions', 'common', 'csrf', 'authentication', 'messages', 'clickjacking'],
  },
  logging: { level: 'info', format: 'json' },
};
