import * as fs from 'fs';
import * as path from 'path';
import { DEFAULT_SECRET_KEY } from './defaults.js';
import type { Settings } from './types.js';

export type CheckLevel = 'error' | 'warning';

export interface DeploymentIssue {
  id: string;
  level: CheckLevel;
  message: string;
  field: string;
}

export const MIN_SECRET_KEY_LENGTH = 50;

/**
 * Locate an external tool: a path is checked as is, a bare name is looked
 * up on PATH. Returns the executable path or null.
 */
export function findExecutable(tool: string, envPath: string = process.env.PATH ?? ''): string | null {
  const candidates = tool.includes('/')
    ? [tool]
    : envPath.split(path.delimiter).filter(Boolean).map((dir) => path.join(dir, tool));

  return candidates.find(isExecutableFile) ?? null;
}

function isExecutableFile(candidate: string): boolean {
  try {
    fs.accessSync(candidate, fs.constants.X_OK);
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
}

/**
 * Checks a loaded configuration against what a public deployment needs.
 * An empty list means nothing to report.
 */
export function checkDeployment(settings: Settings, envPath?: string): DeploymentIssue[] {
  const issues: DeploymentIssue[] = [];
  const { site } = settings;

  if (site.secretKey === DEFAULT_SECRET_KEY || site.secretKey.length < MIN_SECRET_KEY_LENGTH) {
    issues.push({
      id: 'security.secret_key',
      level: 'warning',
      message: site.secretKey === DEFAULT_SECRET_KEY
        ? 'site.secretKey is still the shipped default'
        : `site.secretKey is shorter than ${MIN_SECRET_KEY_LENGTH} characters`,
      field: 'site.secretKey',
    });
  }

  if (site.debug) {
    issues.push({
      id: 'security.debug',
      level: 'warning',
      message: 'site.debug is enabled',
      field: 'site.debug',
    });
  } else if (site.allowedHosts.length === 0) {
    issues.push({
      id: 'security.allowed_hosts',
      level: 'error',
      message: 'site.allowedHosts is empty while debug is off; no request would be served',
      field: 'site.allowedHosts',
    });
  }

  for (const field of ['convertPath', 'ffmpegPath'] as const) {
    const tool = settings.tools[field];
    if (findExecutable(tool, envPath) === null) {
      issues.push({
        id: `tools.${field}`,
        level: 'error',
        message: `External tool not found or not executable: ${tool}`,
        field: `tools.${field}`,
      });
    }
  }

  if (!fs.existsSync(settings.captcha.fontDir)) {
    issues.push({
      id: 'captcha.font_dir',
      level: 'error',
      message: `Captcha font directory not found: ${settings.captcha.fontDir}`,
      field: 'captcha.fontDir',
    });
  } else if (settings.captcha.fonts.length === 0) {
    issues.push({
      id: 'captcha.fonts',
      level: 'error',
      message: `No .ttf fonts in ${settings.captcha.fontDir}`,
      field: 'captcha.fontDir',
    });
  }

  if (settings.nntp.user === null) {
    issues.push({
      id: 'nntp.login',
      level: 'warning',
      message: 'No NNTP login configured; posting relies on the server accepting anonymous clients',
      field: 'nntp.user',
    });
  }

  return issues;
}

export function hasErrors(issues: DeploymentIssue[]): boolean {
  return issues.some((issue) => issue.level === 'error');
}
