import { afterEach, describe, expect, it, vi } from 'vitest';

import type { ProbeStatus, ProxyEndpoint, ReachabilityProbeRequest } from '../src/monitor/types';
import { checkDirect, checkDomain, checkViaProxy, type DomainCheckDeps } from '../src/reachability/check';

const PROXY: ProxyEndpoint = {
  url: 'http://192.0.2.10:3128',
  username: null,
  password: null,
};

const CHECKED_AT = new Date('2026-01-02T03:04:05.000Z');

function createDeps(
  probe: (req: ReachabilityProbeRequest) => Promise<ProbeStatus>,
  overrides: Partial<DomainCheckDeps> = {},
): DomainCheckDeps {
  return {
    probe: vi.fn(probe),
    fetchProxy: vi.fn(async () => PROXY),
    proxySource: 'http://proxy-source.test/get',
    maxProxyRetry: 2,
    timeoutSeconds: 8,
    now: () => CHECKED_AT,
    ...overrides,
  };
}

describe('reachability/check', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('probes HTTPS without and HTTP with certificate verification', async () => {
    const probe = vi.fn(async (_req: ReachabilityProbeRequest): Promise<ProbeStatus> => ({ kind: 'healthy', code: 200 }));

    const result = await checkDirect('foo.com', { probe, timeoutSeconds: 8 });

    expect(result).toEqual({ https: { kind: 'healthy', code: 200 }, http: { kind: 'healthy', code: 200 } });
    expect(probe.mock.calls.map(([req]) => req)).toEqual([
      { url: 'https://foo.com', timeoutSeconds: 8, verifyCert: false, proxy: null },
      { url: 'http://foo.com', timeoutSeconds: 8, verifyCert: true, proxy: null },
    ]);
  });

  it('downgrades a direct HTTP timeout to unstable', async () => {
    const probe = vi.fn(async (req: ReachabilityProbeRequest): Promise<ProbeStatus> =>
      req.url.startsWith('https:') ? { kind: 'healthy', code: 200 } : { kind: 'unavailable', reason: 'timeout' },
    );

    const result = await checkDirect('foo.com', { probe, timeoutSeconds: 8 });

    expect(result.http).toEqual({ kind: 'unstable', reason: 'timeout' });
  });

  it('keeps other direct HTTP failures as unavailable', async () => {
    const probe = vi.fn(async (): Promise<ProbeStatus> => ({ kind: 'unavailable', reason: 'reset' }));

    const result = await checkDirect('foo.com', { probe, timeoutSeconds: 8 });

    expect(result.http).toEqual({ kind: 'unavailable', reason: 'reset' });
  });

  it('skips the proxy path entirely when no source is configured', async () => {
    const deps = createDeps(async () => ({ kind: 'healthy', code: 200 }), { proxySource: null });

    const result = await checkViaProxy('foo.com', deps);

    expect(result).toEqual({
      https: { kind: 'proxy_not_configured' },
      http: { kind: 'proxy_not_configured' },
      attempts: 0,
    });
    expect(deps.fetchProxy).not.toHaveBeenCalled();
    expect(deps.probe).not.toHaveBeenCalled();
  });

  it('stops after the first attempt with a healthy result', async () => {
    const deps = createDeps(async (req) =>
      req.url.startsWith('https:') ? { kind: 'unavailable', reason: 'timeout' } : { kind: 'healthy', code: 301 },
    );

    const result = await checkViaProxy('foo.com', deps);

    expect(result).toEqual({
      https: { kind: 'unavailable', reason: 'timeout' },
      http: { kind: 'healthy', code: 301 },
      attempts: 1,
    });
    expect(deps.fetchProxy).toHaveBeenCalledTimes(1);
    expect(deps.probe).toHaveBeenCalledWith({
      url: 'https://foo.com',
      timeoutSeconds: 8,
      verifyCert: false,
      proxy: PROXY,
    });
  });

  it('never exceeds the retry limit and keeps the last attempt', async () => {
    const deps = createDeps(async () => ({ kind: 'anomalous', code: 403 }), { maxProxyRetry: 3 });

    const result = await checkViaProxy('foo.com', deps);

    expect(result.attempts).toBe(3);
    expect(result.https).toEqual({ kind: 'anomalous', code: 403 });
    expect(deps.fetchProxy).toHaveBeenCalledTimes(3);
    expect(deps.probe).toHaveBeenCalledTimes(6);
  });

  it('spends attempts on empty proxy fetches and reports no_proxy', async () => {
    const deps = createDeps(async () => ({ kind: 'healthy', code: 200 }), {
      fetchProxy: vi.fn(async () => null),
    });

    const result = await checkViaProxy('foo.com', deps);

    expect(result).toEqual({
      https: { kind: 'unavailable', reason: 'no_proxy' },
      http: { kind: 'unavailable', reason: 'no_proxy' },
      attempts: 2,
    });
    expect(deps.probe).not.toHaveBeenCalled();
  });

  it('does not try the proxy at all with a zero retry limit', async () => {
    const deps = createDeps(async () => ({ kind: 'healthy', code: 200 }), { maxProxyRetry: 0 });

    const result = await checkViaProxy('foo.com', deps);

    expect(result.attempts).toBe(0);
    expect(result.https).toEqual({ kind: 'unavailable', reason: 'no_proxy' });
    expect(deps.fetchProxy).not.toHaveBeenCalled();
  });

  it('classifies foo.com as reachable but unverified without a proxy', async () => {
    const deps = createDeps(async () => ({ kind: 'healthy', code: 200 }), { proxySource: null });

    const record = await checkDomain('foo.com', deps);

    expect(record).toEqual({
      domain: 'foo.com',
      checkedAt: '2026-01-02T03:04:05.000Z',
      directHttps: { kind: 'healthy', code: 200 },
      directHttp: { kind: 'healthy', code: 200 },
      proxyHttps: { kind: 'proxy_not_configured' },
      proxyHttp: { kind: 'proxy_not_configured' },
      finalClassification: 'reachable (unverified)',
    });
  });

  it('classifies bar.com as an exit-path discrepancy when the proxy always times out', async () => {
    const deps = createDeps(async (req) =>
      req.proxy ? { kind: 'unavailable', reason: 'timeout' } : { kind: 'healthy', code: 200 },
    );

    const record = await checkDomain('bar.com', deps);

    expect(record.proxyHttps).toEqual({ kind: 'unavailable', reason: 'timeout' });
    expect(record.finalClassification).toBe('reachable with exit-path discrepancy');
    expect(deps.fetchProxy).toHaveBeenCalledTimes(2);
  });

  it('maps a throwing probe to an unavailable status', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const deps = createDeps(async () => {
      throw new Error('socket exploded');
    }, { proxySource: null });

    const record = await checkDomain('foo.com', deps);

    expect(record.directHttps).toEqual({ kind: 'unavailable', reason: 'other' });
    expect(record.finalClassification).toBe('unreachable (unverified)');
  });
});
