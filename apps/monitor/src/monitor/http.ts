import { isIPv6 } from 'node:net';

import { Agent, ProxyAgent, request, type Dispatcher } from 'undici';

import { errnoCode } from '../errors';
import {
  TRANSPORT_FAILURE_CODE,
  type OriginProbeRequest,
  type ProbeErrorKind,
  type ProbeOutcome,
  type ProbeStatus,
  type ProxyEndpoint,
  type ReachabilityProbeRequest,
} from './types';

const USER_AGENT = 'reachwatch/0.1';

// Reachability follows redirects on the same dispatcher, so the proxy and TLS settings hold on every hop.
export const MAX_REDIRECTIONS = 10;

function isAbortError(err: unknown): boolean {
  if (err && typeof err === 'object' && 'name' in err) {
    return (err as { name?: unknown }).name === 'AbortError';
  }
  return false;
}

function errorText(err: unknown): string {
  const parts: string[] = [];
  let cur: unknown = err;
  // undici wraps socket errors; the interesting text is often on `cause`.
  for (let depth = 0; depth < 3 && cur; depth++) {
    if (cur instanceof Error) {
      parts.push(cur.message);
      const code = errnoCode(cur);
      if (code) parts.push(code);
      cur = cur.cause;
    } else {
      parts.push(String(cur));
      break;
    }
  }
  return parts.join(' ').toLowerCase();
}

/** Maps a transport error to a coarse kind. First matching rule wins. */
export function classifyProbeError(err: unknown): ProbeErrorKind {
  if (isAbortError(err)) return 'timeout';

  const s = errorText(err);
  if (s.includes('timed out') || s.includes('timeout') || s.includes('etimedout')) return 'timeout';
  if (s.includes('reset')) return 'reset';
  if (s.includes('ssl') || s.includes('tls') || s.includes('eof') || s.includes('certificate')) {
    return 'ssl_error';
  }
  if (s.includes('refused')) return 'refused';
  if (s.includes('proxy') && (s.includes('connect') || s.includes('tunnel'))) return 'proxy_connect';
  return 'other';
}

async function requestWithTimeout(
  url: string,
  timeoutMs: number,
  options: { dispatcher: Dispatcher; headers: Record<string, string>; maxRedirections?: number },
): Promise<{ statusCode: number }> {
  const controller = new AbortController();
  const t = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await request(url, {
      method: 'GET',
      headers: options.headers,
      dispatcher: options.dispatcher,
      signal: controller.signal,
      headersTimeout: timeoutMs,
      bodyTimeout: timeoutMs,
      maxRedirections: options.maxRedirections ?? 0,
    });
    // Drain so the elapsed time covers the whole transfer and the socket is released.
    await res.body.dump();
    return { statusCode: res.statusCode };
  } finally {
    clearTimeout(t);
  }
}

function hostForUrl(host: string): string {
  return isIPv6(host) ? `[${host}]` : host;
}

function isDefaultPort(scheme: string, port: number): boolean {
  return (scheme === 'https' && port === 443) || (scheme === 'http' && port === 80);
}

/**
 * One origin check: connects to `resolveIp:port` while presenting `domain` as Host and SNI,
 * with certificate validation off. Never throws; transport failures yield code "000".
 */
export async function probeHttpTarget(req: OriginProbeRequest): Promise<ProbeOutcome> {
  const timeoutMs = Math.round(req.timeoutSeconds * 1000);
  const url = `${req.scheme}://${hostForUrl(req.resolveIp)}:${req.port}${req.path}`;
  const hostHeader = isDefaultPort(req.scheme, req.port) ? req.domain : `${req.domain}:${req.port}`;
  const dispatcher = new Agent({
    connect: { rejectUnauthorized: false, servername: req.domain, timeout: timeoutMs },
  });

  const started = performance.now();
  try {
    const res = await requestWithTimeout(url, timeoutMs, {
      dispatcher,
      headers: { host: hostHeader, 'user-agent': USER_AGENT },
    });
    return {
      httpCode: String(res.statusCode),
      elapsedSeconds: (performance.now() - started) / 1000,
      errorDetail: '',
    };
  } catch (err) {
    return {
      httpCode: TRANSPORT_FAILURE_CODE,
      elapsedSeconds: (performance.now() - started) / 1000,
      errorDetail: classifyProbeError(err),
    };
  } finally {
    await dispatcher.destroy().catch(() => undefined);
  }
}

function proxyDispatcher(proxy: ProxyEndpoint, verifyCert: boolean, timeoutMs: number): ProxyAgent {
  const token =
    proxy.username !== null
      ? `Basic ${Buffer.from(`${proxy.username}:${proxy.password ?? ''}`).toString('base64')}`
      : undefined;
  return new ProxyAgent({
    uri: proxy.url,
    token,
    requestTls: { rejectUnauthorized: verifyCert, timeout: timeoutMs },
    proxyTls: { timeout: timeoutMs },
  });
}

/**
 * One reachability check. Redirects are followed and the final response decides:
 * 2xx/3xx is healthy, any other status anomalous, errors (a dead redirect target included) unavailable.
 */
export async function probeReachability(req: ReachabilityProbeRequest): Promise<ProbeStatus> {
  const timeoutMs = Math.round(req.timeoutSeconds * 1000);
  const dispatcher: Dispatcher = req.proxy
    ? proxyDispatcher(req.proxy, req.verifyCert, timeoutMs)
    : new Agent({ connect: { rejectUnauthorized: req.verifyCert, timeout: timeoutMs } });

  try {
    const res = await requestWithTimeout(req.url, timeoutMs, {
      dispatcher,
      headers: { 'user-agent': USER_AGENT },
      maxRedirections: MAX_REDIRECTIONS,
    });
    if (res.statusCode >= 200 && res.statusCode < 400) {
      return { kind: 'healthy', code: res.statusCode };
    }
    return { kind: 'anomalous', code: res.statusCode };
  } catch (err) {
    return { kind: 'unavailable', reason: classifyProbeError(err) };
  } finally {
    await dispatcher.destroy().catch(() => undefined);
  }
}
