import { z } from 'zod';
import {
  KNOWN_APPS,
  KNOWN_MIDDLEWARE,
  VALID_DATABASE_ENGINES,
  VALID_LOG_FORMATS,
  VALID_LOG_LEVELS,
} from './types.js';

/**
 * Zod schemas for the settings file.
 * Every section and key is optional; unknown keys are rejected. Values that
 * came out of `${VAR}` substitution as strings are coerced where the key is
 * numeric or boolean.
 */

// =============================================================================
// Coercions
// =============================================================================

function integerString(value: unknown): unknown {
  return typeof value === 'string' && /^\d+$/.test(value) ? parseInt(value, 10) : value;
}

function booleanString(value: unknown): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

const PortSchema = z.preprocess(integerString, z.number().int());
const FlagSchema = z.preprocess(booleanString, z.boolean());
const TextSchema = z.preprocess(
  (value) => (typeof value === 'number' ? String(value) : value),
  z.string()
);
const PathListSchema = z.array(z.string().min(1));

// =============================================================================
// Sections
// =============================================================================

const SiteSchema = z
  .object({
    name: TextSchema,
    secretKey: TextSchema,
    debug: FlagSchema,
    allowedHosts: z.array(z.string()),
    baseDir: z.string().min(1),
  })
  .partial()
  .strict();

const ServerSchema = z
  .object({
    host: z.string().min(1),
    port: PortSchema,
  })
  .partial()
  .strict();

const DatabaseSchema = z
  .object({
    engine: z.enum(VALID_DATABASE_ENGINES),
    host: z.string().nullable(),
    port: PortSchema.nullable(),
    name: TextSchema,
    user: TextSchema.nullable(),
    password: TextSchema.nullable(),
  })
  .partial()
  .strict();

const NntpSchema = z
  .object({
    host: z.string().min(1),
    port: PortSchema,
    user: TextSchema.nullable(),
    password: TextSchema.nullable(),
  })
  .partial()
  .strict();

const AssetsSchema = z
  .object({
    staticUrl: z.string().min(1),
    assetsRoot: z.string().min(1),
    mediaRoot: z.string().min(1),
    mediaUrl: z.string().min(1),
    templateDirs: PathListSchema,
  })
  .partial()
  .strict();

const CaptchaSchema = z
  .object({
    fontDir: z.string().min(1),
  })
  .partial()
  .strict();

const ToolsSchema = z
  .object({
    convertPath: z.string().min(1),
    ffmpegPath: z.string().min(1),
  })
  .partial()
  .strict();

const I18nSchema = z
  .object({
    languageCode: z.string().min(1),
    timeZone: z.string().min(1),
    dateFormat: z.string().min(1),
    useI18n: FlagSchema,
    useL10n: FlagSchema,
    useTz: FlagSchema,
  })
  .partial()
  .strict();

const AppsSchema = z
  .object({
    installed: z.array(z.enum(KNOWN_APPS)),
    middleware: z.array(z.enum(KNOWN_MIDDLEWARE)),
  })
  .partial()
  .strict();

const LoggingSchema = z
  .object({
    level: z.enum(VALID_LOG_LEVELS),
    format: z.enum(VALID_LOG_FORMATS),
  })
  .partial()
  .strict();

export const SettingsFileSchema = z
  .object({
    site: SiteSchema,
    server: ServerSchema,
    database: DatabaseSchema,
    nntp: NntpSchema,
    assets: AssetsSchema,
    captcha: CaptchaSchema,
    tools: ToolsSchema,
    i18n: I18nSchema,
    apps: AppsSchema,
    logging: LoggingSchema,
  })
  .partial()
  .strict();

export type SettingsFile = z.infer<typeof SettingsFileSchema>;

// =============================================================================
// Resolved settings
// =============================================================================

/**
 * Shape of a complete `Settings` value after defaults are applied. Used to
 * check objects that did not come out of `ConfigManager.load()`.
 */
export const ResolvedSettingsSchema = z.object({
  site: z.object({
    name: z.string(),
    secretKey: z.string(),
    debug: z.boolean(),
    allowedHosts: z.array(z.string()),
    baseDir: z.string(),
  }),
  server: z.object({ host: z.string(), port: z.number() }),
  database: z.object({
    engine: z.enum(VALID_DATABASE_ENGINES),
    host: z.string().optional(),
    port: z.number().optional(),
    name: z.string(),
    user: z.string().optional(),
    password: z.string().optional(),
  }),
  nntp: z.object({
    host: z.string(),
    port: z.number(),
    user: z.string().nullable(),
    password: z.string().nullable(),
  }),
  assets: z.object({
    staticUrl: z.string(),
    assetsRoot: z.string(),
    mediaRoot: z.string(),
    mediaUrl: z.string(),
    templateDirs: z.array(z.string()),
  }),
  captcha: z.object({ fontDir: z.string(), fonts: z.array(z.string()) }),
  tools: z.object({ convertPath: z.string(), ffmpegPath: z.string() }),
  i18n: z.object({
    languageCode: z.string(),
    timeZone: z.string(),
    dateFormat: z.string(),
    useI18n: z.boolean(),
    useL10n: z.boolean(),
    useTz: z.boolean(),
  }),
  apps: z.object({
    installed: z.array(z.enum(KNOWN_APPS)),
    middleware: z.array(z.enum(KNOWN_MIDDLEWARE)),
  }),
  logging: z.object({
    level: z.enum(VALID_LOG_LEVELS),
    format: z.enum(VALID_LOG_FORMATS),
  }),
});
