import type { AppConfig } from '../config';
import type { RunLog } from '../logger';
import { loadOriginTargets } from '../lists';
import { toStorageKey } from '../monitor/targets';
import type { DispatchAlert, ProbeHttpTarget } from '../monitor/types';
import { runPartitioned } from '../scheduler/pool';
import type { FailureStateStore } from '../state/store';
import { recordOriginCycle, type OriginCycleResult } from './tracker';

export type OriginRunDeps = {
  probe: ProbeHttpTarget;
  dispatchAlert: DispatchAlert;
  store: FailureStateStore;
  log: RunLog;
  now?: () => Date;
};

/**
 * One origin-monitor pass over every configured target.
 * Throws ConfigError before probing anything when the target list is missing or empty.
 */
export async function runOriginMonitor(
  config: AppConfig['origin'],
  deps: OriginRunDeps,
): Promise<OriginCycleResult[]> {
  const targets = await loadOriginTargets(config.targetsFile, {
    port: config.defaultPort,
    path: config.defaultPath,
    slowThresholdSeconds: config.defaultSlowSeconds,
    scheme: config.defaultScheme,
  });

  const now = deps.now ?? (() => new Date());
  const started = Date.now();

  const results = await runPartitioned(
    targets,
    (t) => toStorageKey(t.name),
    config.concurrency,
    async (target) => {
      const outcome = await deps.probe({
        scheme: target.scheme,
        domain: target.domain,
        port: target.port,
        resolveIp: target.originIp,
        path: target.path,
        timeoutSeconds: config.timeoutSeconds,
      });
      return recordOriginCycle(target, outcome, {
        store: deps.store,
        dispatchAlert: deps.dispatchAlert,
        log: deps.log,
        policy: {
          alertBurst: config.alertBurst,
          alertIntervalSeconds: config.alertIntervalSeconds,
        },
        expectHttpCode: config.expectHttpCode,
        now,
      });
    },
  );

  const failing = results.filter((r) => r.failReason !== null).length;
  const alerted = results.filter((r) => r.alert !== null).length;
  console.log(
    `origin: targets=${targets.length} failing=${failing} alerts=${alerted} duration_ms=${Date.now() - started}`,
  );

  return results;
}
