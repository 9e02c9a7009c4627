import { formatSeconds } from '../monitor/evaluate';
import type { OriginTarget } from '../monitor/types';

export type OriginAlertPayload = {
  target: Pick<OriginTarget, 'name' | 'domain' | 'originIp'>;
  reason: string;
  elapsedSeconds: number;
  consecutiveFailures: number;
  // Already formatted local time, e.g. "2026-01-02 03:04:05".
  timestamp: string;
};

export function buildOriginAlertMessage(payload: OriginAlertPayload): string {
  return [
    '[reachwatch] origin check failing',
    `name: ${payload.target.name}`,
    `domain: ${payload.target.domain}`,
    `IP: ${payload.target.originIp}`,
    `reason: ${payload.reason}`,
    `elapsed: ${formatSeconds(payload.elapsedSeconds)}`,
    `consecutive failures: ${payload.consecutiveFailures}`,
    `time: ${payload.timestamp}`,
  ].join(' | ');
}
