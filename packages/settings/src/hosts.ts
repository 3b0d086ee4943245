import type { Settings } from './types.js';

const DEBUG_HOSTS = ['localhost', '127.0.0.1', '[::1]'];

/**
 * Split a Host header into its host part, lower-cased and without port.
 * Returns null for headers that are not a plausible host.
 */
export function splitHostHeader(header: string): string | null {
  const value = header.trim().toLowerCase();
  if (!value) return null;

  if (value.startsWith('[')) {
    const end = value.indexOf(']');
    if (end < 0) return null;
    const rest = value.slice(end + 1);
    if (rest && !/^:\d+$/.test(rest)) return null;
    return value.slice(0, end + 1);
  }

  const [host, port, ...extra] = value.split(':');
  if (extra.length > 0 || (port !== undefined && !/^\d+$/.test(port))) return null;
  const name = host.endsWith('.') ? host.slice(0, -1) : host;
  return /^[a-z0-9.-]+$/.test(name) ? name : null;
}

function matchesPattern(host: string, pattern: string): boolean {
  const p = pattern.toLowerCase();
  if (p === '*') return true;
  if (p.startsWith('.')) {
    return host === p.slice(1) || host.endsWith(p);
  }
  return host === p;
}

/**
 * Whether a request's Host header is served. With debug on and no hosts
 * configured, only local addresses are accepted.
 */
export function isAllowedHost(header: string, settings: Pick<Settings, 'site'>): boolean {
  const host = splitHostHeader(header);
  if (host === null) return false;

  const patterns = settings.site.allowedHosts.length === 0 && settings.site.debug
    ? DEBUG_HOSTS
    : settings.site.allowedHosts;

  return patterns.some((pattern) => matchesPattern(host, pattern));
}
