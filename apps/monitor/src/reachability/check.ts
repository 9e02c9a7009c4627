import { toErrorMessage } from '../errors';
import type {
  FetchProxyEndpoint,
  ProbeReachability,
  ProbeStatus,
  ProxyEndpoint,
  ReachabilityProbeRequest,
  ReachabilityRecord,
} from '../monitor/types';
import { classifyReachability, isHealthy } from './classify';

export type DomainCheckDeps = {
  probe: ProbeReachability;
  fetchProxy: FetchProxyEndpoint;
  // URI the proxy endpoints are fetched from; null disables the proxy path.
  proxySource: string | null;
  maxProxyRetry: number;
  timeoutSeconds: number;
  now: () => Date;
};

export type ProxyPathResult = {
  https: ProbeStatus;
  http: ProbeStatus;
  attempts: number;
};

const NOT_CONFIGURED: ProbeStatus = { kind: 'proxy_not_configured' };
const NO_PROXY: ProbeStatus = { kind: 'unavailable', reason: 'no_proxy' };

async function safeProbe(probe: ProbeReachability, req: ReachabilityProbeRequest): Promise<ProbeStatus> {
  try {
    return await probe(req);
  } catch (err) {
    console.error(`reachability: probe threw url=${req.url} error=${toErrorMessage(err)}`);
    return { kind: 'unavailable', reason: 'other' };
  }
}

async function safeFetchProxy(fetchProxy: FetchProxyEndpoint, source: string): Promise<ProxyEndpoint | null> {
  try {
    return await fetchProxy(source);
  } catch (err) {
    console.error(`reachability: proxy source threw error=${toErrorMessage(err)}`);
    return null;
  }
}

export async function checkDirect(
  domain: string,
  deps: Pick<DomainCheckDeps, 'probe' | 'timeoutSeconds'>,
): Promise<{ https: ProbeStatus; http: ProbeStatus }> {
  const https = await safeProbe(deps.probe, {
    url: `https://${domain}`,
    timeoutSeconds: deps.timeoutSeconds,
    verifyCert: false,
    proxy: null,
  });
  const http = await safeProbe(deps.probe, {
    url: `http://${domain}`,
    timeoutSeconds: deps.timeoutSeconds,
    verifyCert: true,
    proxy: null,
  });

  // Plain HTTP timing out under interference is inconclusive, not proof of failure.
  if (http.kind === 'unavailable' && http.reason === 'timeout') {
    return { https, http: { kind: 'unstable', reason: 'timeout' } };
  }
  return { https, http };
}

/**
 * Up to `maxProxyRetry` attempts, each with a freshly fetched proxy endpoint.
 * An attempt without an endpoint still uses up its slot. Stops at the first healthy result.
 */
export async function checkViaProxy(
  domain: string,
  deps: Omit<DomainCheckDeps, 'now'>,
): Promise<ProxyPathResult> {
  if (deps.proxySource === null) {
    return { https: NOT_CONFIGURED, http: NOT_CONFIGURED, attempts: 0 };
  }

  let https = NO_PROXY;
  let http = NO_PROXY;
  let attempts = 0;

  for (let attempt = 1; attempt <= deps.maxProxyRetry; attempt++) {
    attempts = attempt;
    const proxy = await safeFetchProxy(deps.fetchProxy, deps.proxySource);
    if (!proxy) continue;

    https = await safeProbe(deps.probe, {
      url: `https://${domain}`,
      timeoutSeconds: deps.timeoutSeconds,
      verifyCert: false,
      proxy,
    });
    http = await safeProbe(deps.probe, {
      url: `http://${domain}`,
      timeoutSeconds: deps.timeoutSeconds,
      verifyCert: true,
      proxy,
    });

    if (isHealthy(https) || isHealthy(http)) break;
  }

  return { https, http, attempts };
}

export async function checkDomain(domain: string, deps: DomainCheckDeps): Promise<ReachabilityRecord> {
  const direct = await checkDirect(domain, deps);
  const viaProxy = await checkViaProxy(domain, deps);

  return {
    domain,
    checkedAt: deps.now().toISOString(),
    directHttps: direct.https,
    directHttp: direct.http,
    proxyHttps: viaProxy.https,
    proxyHttp: viaProxy.http,
    finalClassification: classifyReachability({
      proxyConfigured: deps.proxySource !== null,
      directHttps: direct.https,
      proxyHttps: viaProxy.https,
      proxyHttp: viaProxy.http,
    }),
  };
}
