import type { Settings } from './types.js';

export const REDACTED = '********';

/** Copy of the settings safe to print: secrets masked, null kept */
export function redactSettings(settings: Settings): Settings {
  const copy = structuredClone(settings);
  copy.site.secretKey = REDACTED;
  if (copy.database.password !== undefined) {
    copy.database.password = REDACTED;
  }
  if (copy.nntp.password !== null) {
    copy.nntp.password = REDACTED;
  }
  return copy;
}
