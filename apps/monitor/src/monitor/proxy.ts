import { request } from 'undici';

import { toErrorMessage } from '../errors';
import { isValidPort } from './targets';
import type { ProxyEndpoint } from './types';

const PROXY_SOURCE_TIMEOUT_MS = 5_000;

function fromUrl(text: string): ProxyEndpoint | null {
  let url: URL;
  try {
    url = new URL(text);
  } catch {
    return null;
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;
  if (!url.hostname) return null;

  if (url.port && !isValidPort(Number(url.port))) return null;

  return {
    url: `${url.protocol}//${url.host}`,
    username: url.username ? decodeURIComponent(url.username) : null,
    password: url.password ? decodeURIComponent(url.password) : null,
  };
}

/**
 * Accepts the encodings proxy vendors hand out:
 * `host:port`, `host:port:user:pass`, `user:pass@host:port`, or a full http(s) URL.
 */
export function parseProxyEndpoint(line: string): ProxyEndpoint | null {
  const t = line.trim();
  if (!t) return null;

  if (t.startsWith('http://') || t.startsWith('https://')) return fromUrl(t);
  if (t.includes('@')) return fromUrl(`http://${t}`);

  const parts = t.split(':');
  if (parts.length === 2) {
    const [host = '', port = ''] = parts;
    return fromUrl(`http://${host}:${port}`);
  }
  if (parts.length === 4) {
    const [host = '', port = '', user = '', pass = ''] = parts;
    const parsed = fromUrl(`http://${host}:${port}`);
    if (!parsed) return null;
    return { ...parsed, username: user || null, password: pass || null };
  }
  return null;
}

/** Fetches one proxy endpoint from the source URI. Returns null on any fetch or parse failure. */
export async function fetchProxyEndpoint(sourceUri: string): Promise<ProxyEndpoint | null> {
  const controller = new AbortController();
  const t = setTimeout(() => controller.abort(), PROXY_SOURCE_TIMEOUT_MS);
  try {
    const res = await request(sourceUri, {
      method: 'GET',
      signal: controller.signal,
      headersTimeout: PROXY_SOURCE_TIMEOUT_MS,
      bodyTimeout: PROXY_SOURCE_TIMEOUT_MS,
    });
    const text = await res.body.text();
    const firstLine = text.trim().split(/\r?\n/)[0] ?? '';
    return parseProxyEndpoint(firstLine);
  } catch (err) {
    console.error(`proxy: source fetch failed error=${toErrorMessage(err)}`);
    return null;
  } finally {
    clearTimeout(t);
  }
}
