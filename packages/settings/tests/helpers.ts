import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DEFAULT_SETTINGS, type Settings } from '../src/index.js';

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'chanfront-test-'));
}

export function writeFile(dir: string, relative: string, content: string, mode?: number): string {
  const file = path.join(dir, relative);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content);
  if (mode !== undefined) {
    fs.chmodSync(file, mode);
  }
  return file;
}

/** Fully resolved settings rooted at baseDir, as load() would produce from an empty file */
export function makeSettings(baseDir: string): Settings {
  const defaults = structuredClone(DEFAULT_SETTINGS);
  const assetsRoot = path.join(baseDir, 'assets');
  return {
    ...defaults,
    site: { ...defaults.site, baseDir },
    assets: {
      ...defaults.assets,
      assetsRoot,
      mediaRoot: path.join(baseDir, 'media'),
      templateDirs: [path.join(baseDir, 'templates')],
    },
    captcha: { fontDir: path.join(assetsRoot, 'fonts'), fonts: [] },
  };
}
