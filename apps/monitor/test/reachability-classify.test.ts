import { describe, expect, it } from 'vitest';

import type { ProbeStatus } from '../src/monitor/types';
import { classifyReachability, formatProbeStatus } from '../src/reachability/classify';

const HEALTHY: ProbeStatus = { kind: 'healthy', code: 200 };
const ANOMALOUS: ProbeStatus = { kind: 'anomalous', code: 503 };
const TIMEOUT: ProbeStatus = { kind: 'unavailable', reason: 'timeout' };
const NOT_CONFIGURED: ProbeStatus = { kind: 'proxy_not_configured' };

describe('classifyReachability', () => {
  it('marks results unverified when no proxy is configured', () => {
    expect(
      classifyReachability({
        proxyConfigured: false,
        directHttps: HEALTHY,
        proxyHttps: NOT_CONFIGURED,
        proxyHttp: NOT_CONFIGURED,
      }),
    ).toBe('reachable (unverified)');
    expect(
      classifyReachability({
        proxyConfigured: false,
        directHttps: TIMEOUT,
        proxyHttps: NOT_CONFIGURED,
        proxyHttp: NOT_CONFIGURED,
      }),
    ).toBe('unreachable (unverified)');
  });

  it('agrees when both paths reach the domain', () => {
    expect(
      classifyReachability({ proxyConfigured: true, directHttps: HEALTHY, proxyHttps: HEALTHY, proxyHttp: HEALTHY }),
    ).toBe('reachable');
  });

  it('counts an anomalous proxy answer as agreement when direct is healthy', () => {
    expect(
      classifyReachability({ proxyConfigured: true, directHttps: HEALTHY, proxyHttps: ANOMALOUS, proxyHttp: TIMEOUT }),
    ).toBe('reachable');
  });

  it('flags an exit-path discrepancy when the proxy cannot connect', () => {
    expect(
      classifyReachability({ proxyConfigured: true, directHttps: HEALTHY, proxyHttps: TIMEOUT, proxyHttp: TIMEOUT }),
    ).toBe('reachable with exit-path discrepancy');
  });

  it('treats a healthy proxy with failing direct HTTPS as local blocking', () => {
    expect(
      classifyReachability({ proxyConfigured: true, directHttps: TIMEOUT, proxyHttps: HEALTHY, proxyHttp: TIMEOUT }),
    ).toBe('restricted (HTTPS blocked locally)');
    expect(
      classifyReachability({ proxyConfigured: true, directHttps: ANOMALOUS, proxyHttps: TIMEOUT, proxyHttp: HEALTHY }),
    ).toBe('restricted (HTTPS blocked locally)');
  });

  it('needs only a healthy proxy result to prove a failing domain is up', () => {
    expect(
      classifyReachability({
        proxyConfigured: true,
        directHttps: TIMEOUT,
        proxyHttps: ANOMALOUS,
        proxyHttp: ANOMALOUS,
      }),
    ).toBe('unreachable (needs external verification)');
  });
});

describe('formatProbeStatus', () => {
  it('renders each status kind', () => {
    expect(formatProbeStatus(HEALTHY)).toBe('healthy (200)');
    expect(formatProbeStatus(ANOMALOUS)).toBe('anomalous (503)');
    expect(formatProbeStatus(TIMEOUT)).toBe('unavailable (timeout)');
    expect(formatProbeStatus({ kind: 'unstable', reason: 'timeout' })).toBe('unstable (timeout)');
    expect(formatProbeStatus(NOT_CONFIGURED)).toBe('proxy not configured');
  });
});
