import * as path from 'path';
import type { DatabaseSettings } from './types.js';

const DEFAULT_PORTS: Record<'postgresql' | 'mysql', number> = {
  postgresql: 5432,
  mysql: 3306,
};

/** True when the database host names a unix-socket directory */
export function isSocketHost(host: string | undefined): boolean {
  return host !== undefined && path.isAbsolute(host);
}

/**
 * Build a connection URL for the configured database.
 *
 * A socket host goes into the `host` query parameter, which libpq and most
 * drivers accept in place of an authority section.
 */
export function databaseDsn(db: DatabaseSettings): string {
  if (db.engine === 'sqlite') {
    return `sqlite:${db.name}`;
  }

  const scheme = db.engine;
  const name = encodeURIComponent(db.name);
  const auth = db.user
    ? `${encodeURIComponent(db.user)}${db.password ? `:${encodeURIComponent(db.password)}` : ''}@`
    : '';

  if (!db.host || isSocketHost(db.host)) {
    const params = new URLSearchParams();
    if (db.host) params.set('host', db.host);
    if (db.port !== undefined) params.set('port', String(db.port));
    const query = params.toString();
    return `${scheme}://${auth}/${name}${query ? `?${query}` : ''}`;
  }

  const host = db.host.includes(':') && !db.host.startsWith('[') ? `[${db.host}]` : db.host;
  const port = db.port ?? DEFAULT_PORTS[db.engine];
  return `${scheme}://${auth}${host}:${port}/${name}`;
}
