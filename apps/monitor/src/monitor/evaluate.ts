import { TRANSPORT_FAILURE_CODE, type ProbeOutcome } from './types';

export function formatSeconds(seconds: number): string {
  return `${seconds.toFixed(3)}s`;
}

/**
 * Returns the failure reason for an origin probe, or null when the probe passed.
 * A wrong status code wins over slowness; slowness is only judged on the expected code.
 */
export function evaluateProbeOutcome(
  outcome: ProbeOutcome,
  slowThresholdSeconds: number,
  expectedCode: string,
): string | null {
  if (outcome.httpCode !== expectedCode) {
    if (outcome.httpCode === TRANSPORT_FAILURE_CODE) {
      return outcome.errorDetail || 'connect_fail';
    }
    return `HTTP ${outcome.httpCode}`;
  }

  if (outcome.elapsedSeconds > slowThresholdSeconds) {
    return `slow response ${formatSeconds(outcome.elapsedSeconds)}`;
  }

  return null;
}
