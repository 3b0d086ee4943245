import type { NntpSettings } from './types.js';

export interface NntpEndpoint {
  host: string;
  port: number;
  url: string;
}

export interface NntpCredentials {
  user: string;
  password: string;
}

export function nntpEndpoint(nntp: NntpSettings): NntpEndpoint {
  const host = nntp.host.includes(':') && !nntp.host.startsWith('[') ? `[${nntp.host}]` : nntp.host;
  return {
    host: nntp.host,
    port: nntp.port,
    url: `nntp://${host}:${nntp.port}`,
  };
}

/** Login pair for AUTHINFO, or null when the front-end posts anonymously */
export function nntpCredentials(nntp: NntpSettings): NntpCredentials | null {
  if (nntp.user === null || nntp.password === null) {
    return null;
  }
  return { user: nntp.user, password: nntp.password };
}
