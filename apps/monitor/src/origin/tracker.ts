import { toErrorMessage } from '../errors';
import { formatLocalTimestamp, type RunLog } from '../logger';
import { evaluateProbeOutcome, formatSeconds } from '../monitor/evaluate';
import {
  computeNextStreak,
  type AlertPolicyConfig,
  type StreakAction,
} from '../monitor/state-machine';
import { toStorageKey } from '../monitor/targets';
import type {
  AlertDelivery,
  DispatchAlert,
  FailureStreakState,
  OriginTarget,
  ProbeOutcome,
} from '../monitor/types';
import { buildOriginAlertMessage } from '../notify/template';
import type { FailureStateStore } from '../state/store';

export type OriginCycleDeps = {
  store: FailureStateStore;
  dispatchAlert: DispatchAlert;
  log: RunLog;
  policy: AlertPolicyConfig;
  expectHttpCode: string;
  now: () => Date;
};

export type OriginCycleResult = {
  target: string;
  failReason: string | null;
  consecutiveFailures: number;
  action: StreakAction;
  alert: AlertDelivery | null;
};

async function persist(what: string, key: string, write: () => Promise<void>): Promise<void> {
  try {
    await write();
  } catch (err) {
    console.error(`state: ${what} failed key=${key} error=${toErrorMessage(err)}`);
  }
}

async function deliver(dispatchAlert: DispatchAlert, message: string): Promise<AlertDelivery> {
  try {
    return await dispatchAlert(message);
  } catch (err) {
    return { delivered: false, detail: `alert_exc=${toErrorMessage(err)}` };
  }
}

/**
 * Folds one probe outcome into the target's failure streak: read state, decide,
 * alert if the policy says so, write state back, and append the log lines.
 */
export async function recordOriginCycle(
  target: OriginTarget,
  outcome: ProbeOutcome,
  deps: OriginCycleDeps,
): Promise<OriginCycleResult> {
  const key = toStorageKey(target.name);
  const nowDate = deps.now();
  const now = Math.floor(nowDate.getTime() / 1000);
  const stamp = formatLocalTimestamp(nowDate);
  const probeSummary = `code=${outcome.httpCode} time=${formatSeconds(outcome.elapsedSeconds)}`;

  const failReason = evaluateProbeOutcome(outcome, target.slowThresholdSeconds, deps.expectHttpCode);

  let prev: FailureStreakState | null = null;
  try {
    prev = await deps.store.read(key);
  } catch (err) {
    console.error(`state: read failed key=${key} error=${toErrorMessage(err)}`);
  }

  const { next, action } = computeNextStreak(prev, failReason !== null, now, deps.policy);

  if (failReason === null || next === null) {
    // Clear unconditionally: a record we could not read still has to go.
    await persist('clear', key, () => deps.store.clear(key));
    const recovered = action === 'recover' && prev ? ` | RECOVERED after=${prev.consecutiveFailures}` : '';
    await deps.log.append(`${stamp} | ${target.name} | OK | ${probeSummary}${recovered}`);
    return { target: target.name, failReason: null, consecutiveFailures: 0, action, alert: null };
  }

  await persist('save failures', key, () =>
    deps.store.saveFailures(key, next.consecutiveFailures, now),
  );

  let alert: AlertDelivery | null = null;
  if (action === 'alert') {
    const message = buildOriginAlertMessage({
      target,
      reason: failReason,
      elapsedSeconds: outcome.elapsedSeconds,
      consecutiveFailures: next.consecutiveFailures,
      timestamp: stamp,
    });
    alert = await deliver(deps.dispatchAlert, message);
    await deps.log.append(`${stamp} | ${target.name} | ALERT send=${alert.delivered} detail=${alert.detail}`);
    // A failed delivery leaves the throttle window where it was so the next cycle retries.
    if (alert.delivered) {
      await persist('save alert', key, () => deps.store.saveAlert(key, now));
    }
  }

  await deps.log.append(
    `${stamp} | ${target.name} | FAIL_REASON=${failReason} | ${probeSummary} | COUNT=${next.consecutiveFailures}`,
  );

  return {
    target: target.name,
    failReason,
    consecutiveFailures: next.consecutiveFailures,
    action,
    alert,
  };
}
