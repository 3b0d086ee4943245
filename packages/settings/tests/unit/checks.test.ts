import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import {
  checkDeployment,
  findExecutable,
  hasErrors,
  redactSettings,
  REDACTED,
  type Settings,
} from '../../src/index.js';
import { makeSettings, makeTempDir, writeFile } from '../helpers.js';

describe('deployment checks', () => {
  let tempDir: string;
  let settings: Settings;

  beforeEach(() => {
    tempDir = makeTempDir();
    settings = makeSettings(tempDir);

    const convert = writeFile(tempDir, 'bin/convert', '#!/bin/sh\n', 0o755);
    const ffmpeg = writeFile(tempDir, 'bin/ffmpeg', '#!/bin/sh\n', 0o755);
    const font = writeFile(tempDir, 'assets/fonts/sans.ttf', 'font');
    settings.tools = { convertPath: convert, ffmpegPath: ffmpeg };
    settings.captcha.fonts = [font];
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function hardened(): Settings {
    const copy = structuredClone(settings);
    copy.site.secretKey = 'k'.repeat(64);
    copy.site.debug = false;
    copy.site.allowedHosts = ['.ebin.tld'];
    copy.nntp.user = 'frontend';
    copy.nntp.password = 'test-secret';
    return copy;
  }

  it('should flag the shipped defaults', () => {
    const issues = checkDeployment(settings);

    expect(issues.map((issue) => issue.id)).toEqual([
      'security.secret_key',
      'security.debug',
      'nntp.login',
    ]);
    expect(issues[0].message).toBe('site.secretKey is still the shipped default');
    expect(hasErrors(issues)).toBe(false);
  });

  it('should report nothing for a hardened configuration', () => {
    expect(checkDeployment(hardened())).toEqual([]);
  });

  it('should warn about short secret keys', () => {
    const config = hardened();
    config.site.secretKey = 'test-secret';

    const [issue] = checkDeployment(config);

    expect(issue.id).toBe('security.secret_key');
    expect(issue.message).toBe('site.secretKey is shorter than 50 characters');
  });

  it('should fail when no host would be served', () => {
    const config = hardened();
    config.site.allowedHosts = [];

    const issues = checkDeployment(config);

    expect(issues).toEqual([
      {
        id: 'security.allowed_hosts',
        level: 'error',
        message: 'site.allowedHosts is empty while debug is off; no request would be served',
        field: 'site.allowedHosts',
      },
    ]);
    expect(hasErrors(issues)).toBe(true);
  });

  it('should fail on missing or non-executable tools', () => {
    const config = hardened();
    fs.chmodSync(config.tools.ffmpegPath, 0o644);
    config.tools.convertPath = path.join(tempDir, 'bin', 'missing');

    const issues = checkDeployment(config);

    expect(issues.map((issue) => issue.field)).toEqual(['tools.convertPath', 'tools.ffmpegPath']);
    expect(issues[0].message).toBe(
      `External tool not found or not executable: ${path.join(tempDir, 'bin', 'missing')}`
    );
  });

  it('should look bare tool names up on PATH', () => {
    const config = hardened();
    config.tools = { convertPath: 'convert', ffmpegPath: 'ffmpeg' };

    expect(checkDeployment(config, path.join(tempDir, 'bin'))).toEqual([]);
    expect(checkDeployment(config, path.join(tempDir, 'empty')).map((i) => i.id)).toEqual([
      'tools.convertPath',
      'tools.ffmpegPath',
    ]);
  });

  it('should fail without captcha fonts', () => {
    const noFonts = hardened();
    noFonts.captcha.fonts = [];
    const noDir = hardened();
    noDir.captcha.fontDir = path.join(tempDir, 'nowhere');

    expect(checkDeployment(noFonts).map((i) => i.id)).toEqual(['captcha.fonts']);
    expect(checkDeployment(noDir).map((i) => i.id)).toEqual(['captcha.font_dir']);
  });

  it('should find executables only', () => {
    const dir = path.join(tempDir, 'bin');

    expect(findExecutable('convert', dir)).toBe(path.join(dir, 'convert'));
    expect(findExecutable(dir)).toBeNull();
  });
});

describe('redactSettings', () => {
  it('should mask secrets and leave unset ones alone', () => {
    const settings = makeSettings('/srv/chan');

    const redacted = redactSettings(settings);

    expect(redacted.site.secretKey).toBe(REDACTED);
    expect(redacted.nntp.password).toBeNull();
    expect(redacted.database.password).toBeUndefined();
    expect(settings.site.secretKey).toBe('changeme');
  });

  it('should mask set passwords', () => {
    const settings = makeSettings('/srv/chan');
    settings.nntp.user = 'frontend';
    settings.nntp.password = 'test-secret';
    settings.database.password = 'test-secret';

    const redacted = redactSettings(settings);

    expect(redacted.nntp.user).toBe('frontend');
    expect(redacted.nntp.password).toBe('********');
    expect(redacted.database.password).toBe('********');
  });
});
