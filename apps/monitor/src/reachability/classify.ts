import type { ProbeStatus, ReachabilityClassification } from '../monitor/types';

export type ClassifierInput = {
  proxyConfigured: boolean;
  directHttps: ProbeStatus;
  proxyHttps: ProbeStatus;
  proxyHttp: ProbeStatus;
};

export function isHealthy(status: ProbeStatus): boolean {
  return status.kind === 'healthy';
}

/**
 * Final verdict for a domain.
 *
 * Note the asymmetry: with a healthy direct path, any proxy-HTTPS result other than
 * `unavailable` (including `anomalous`) counts as agreement, while with a failing direct
 * path only a `healthy` proxy result proves the domain is up elsewhere.
 */
export function classifyReachability(input: ClassifierInput): ReachabilityClassification {
  const directOk = isHealthy(input.directHttps);

  if (!input.proxyConfigured) {
    return directOk ? 'reachable (unverified)' : 'unreachable (unverified)';
  }

  if (directOk) {
    return input.proxyHttps.kind === 'unavailable'
      ? 'reachable with exit-path discrepancy'
      : 'reachable';
  }

  if (isHealthy(input.proxyHttps) || isHealthy(input.proxyHttp)) {
    return 'restricted (HTTPS blocked locally)';
  }
  return 'unreachable (needs external verification)';
}

export function formatProbeStatus(status: ProbeStatus): string {
  switch (status.kind) {
    case 'healthy':
      return `healthy (${status.code})`;
    case 'anomalous':
      return `anomalous (${status.code})`;
    case 'unavailable':
      return `unavailable (${status.reason})`;
    case 'unstable':
      return `unstable (${status.reason})`;
    case 'proxy_not_configured':
      return 'proxy not configured';
  }
}
