import * as fs from 'fs';
import { glob } from 'glob';
import { nullLogger, type Logger } from './utils/logger.js';

export const CAPTCHA_FONT_PATTERN = '*.ttf';

/**
 * Find the TrueType fonts available for rendering captcha challenges.
 *
 * Only the top level of `fontDir` is scanned. Paths come back absolute and
 * sorted so the result does not depend on directory order.
 */
export async function discoverCaptchaFonts(
  fontDir: string,
  logger: Logger = nullLogger
): Promise<string[]> {
  if (!fs.existsSync(fontDir)) {
    logger.warn(`Captcha font directory not found: ${fontDir}`);
    return [];
  }

  const fonts = await glob(CAPTCHA_FONT_PATTERN, {
    cwd: fontDir,
    absolute: true,
    nodir: true,
  });
  fonts.sort();

  logger.debug(`Found ${fonts.length} captcha fonts in ${fontDir}`);
  return fonts;
}
