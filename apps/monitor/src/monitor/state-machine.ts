import type { FailureStreakState } from './types';

export type StreakAction = 'recover' | 'alert' | 'suppress' | 'none';

export type StreakTransition = {
  // null means "no persisted state": the target is healthy.
  next: FailureStreakState | null;
  action: StreakAction;
};

export type AlertPolicyConfig = {
  // Every failure up to and including this count alerts unconditionally.
  alertBurst: number;
  alertIntervalSeconds: number;
};

export const DEFAULT_ALERT_POLICY: AlertPolicyConfig = {
  alertBurst: 10,
  alertIntervalSeconds: 3600,
};

function normalizeNonNegative(raw: number | undefined, fallback: number): number {
  if (typeof raw !== 'number' || !Number.isFinite(raw)) return fallback;
  const n = Math.trunc(raw);
  return n >= 0 ? n : fallback;
}

function normalizeConfig(config?: Partial<AlertPolicyConfig>): AlertPolicyConfig {
  return {
    alertBurst: normalizeNonNegative(config?.alertBurst, DEFAULT_ALERT_POLICY.alertBurst),
    alertIntervalSeconds: normalizeNonNegative(
      config?.alertIntervalSeconds,
      DEFAULT_ALERT_POLICY.alertIntervalSeconds,
    ),
  };
}

export function shouldAlert(
  consecutiveFailures: number,
  lastAlertEpochSeconds: number,
  now: number,
  config?: Partial<AlertPolicyConfig>,
): boolean {
  const cfg = normalizeConfig(config);
  if (consecutiveFailures <= cfg.alertBurst) return true;
  return now - lastAlertEpochSeconds >= cfg.alertIntervalSeconds;
}

/**
 * Healthy -> Failing(1) -> Failing(2) ... and back to Healthy on the first passing probe.
 * Recovery clears the whole record, including the throttle timestamp.
 */
export function computeNextStreak(
  prev: FailureStreakState | null,
  failed: boolean,
  now: number,
  config?: Partial<AlertPolicyConfig>,
): StreakTransition {
  if (!failed) {
    return { next: null, action: prev ? 'recover' : 'none' };
  }

  const consecutiveFailures = (prev?.consecutiveFailures ?? 0) + 1;
  const lastAlertEpochSeconds = prev?.lastAlertEpochSeconds ?? 0;

  return {
    next: { consecutiveFailures, lastAlertEpochSeconds },
    action: shouldAlert(consecutiveFailures, lastAlertEpochSeconds, now, config) ? 'alert' : 'suppress',
  };
}
