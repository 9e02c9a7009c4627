import type { ProbeErrorKind, ProbeStatus, ReachabilityClassification } from '@reachwatch/db';

export type { ProbeErrorKind, ProbeStatus, ReachabilityClassification };

export type OriginScheme = 'http' | 'https';

export type OriginTarget = {
  name: string;
  domain: string;
  originIp: string;
  port: number;
  path: string;
  slowThresholdSeconds: number;
  scheme: OriginScheme;
};

// "000" is the transport-failure sentinel: no HTTP response was received.
export const TRANSPORT_FAILURE_CODE = '000';

export type ProbeOutcome = {
  httpCode: string;
  elapsedSeconds: number;
  errorDetail: string;
};

export type FailureStreakState = {
  consecutiveFailures: number;
  lastAlertEpochSeconds: number;
};

export type ProxyEndpoint = {
  url: string;
  username: string | null;
  password: string | null;
};

export type ReachabilityRecord = {
  domain: string;
  checkedAt: string;
  directHttps: ProbeStatus;
  directHttp: ProbeStatus;
  proxyHttps: ProbeStatus;
  proxyHttp: ProbeStatus;
  finalClassification: ReachabilityClassification;
};

export type OriginProbeRequest = {
  scheme: OriginScheme;
  domain: string;
  port: number;
  resolveIp: string;
  path: string;
  timeoutSeconds: number;
};

export type ReachabilityProbeRequest = {
  url: string;
  timeoutSeconds: number;
  verifyCert: boolean;
  proxy: ProxyEndpoint | null;
};

export type AlertDelivery = {
  delivered: boolean;
  detail: string;
};

export type PushOutcome = {
  ok: boolean;
  detail: string;
};

export type ProbeHttpTarget = (req: OriginProbeRequest) => Promise<ProbeOutcome>;
export type ProbeReachability = (req: ReachabilityProbeRequest) => Promise<ProbeStatus>;
export type FetchProxyEndpoint = (sourceUri: string) => Promise<ProxyEndpoint | null>;
export type DispatchAlert = (message: string) => Promise<AlertDelivery>;
export type PushResultFile = (localPath: string) => Promise<PushOutcome>;
