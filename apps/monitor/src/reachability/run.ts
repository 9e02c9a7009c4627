import { access, mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import {
  reachabilityResultSetSchema,
  serializeStoredJson,
  type ReachabilityRecordJson,
} from '@reachwatch/db';

import type { AppConfig } from '../config';
import { ConfigError, toErrorMessage } from '../errors';
import { loadDomains } from '../lists';
import { formatLocalTimestamp, type RunLog } from '../logger';
import type {
  FetchProxyEndpoint,
  ProbeReachability,
  PushOutcome,
  PushResultFile,
  ReachabilityRecord,
} from '../monitor/types';
import { runPartitioned } from '../scheduler/pool';
import { checkDomain } from './check';
import { formatProbeStatus } from './classify';

export type ReachabilityRunDeps = {
  probe: ProbeReachability;
  fetchProxy: FetchProxyEndpoint;
  push: PushResultFile;
  log: RunLog;
  now?: () => Date;
};

export type ReachabilityRunResult = {
  records: ReachabilityRecord[];
  resultFile: string;
  push: PushOutcome | null;
};

export function toRecordJson(record: ReachabilityRecord): ReachabilityRecordJson {
  return {
    domain: record.domain,
    checked_at: record.checkedAt,
    direct_https: record.directHttps,
    direct_http: record.directHttp,
    proxy_https: record.proxyHttps,
    proxy_http: record.proxyHttp,
    final: record.finalClassification,
  };
}

export function formatRecordBlock(record: ReachabilityRecord, stamp: string): string {
  return [
    `${stamp} | ${record.domain}`,
    `  direct HTTPS: ${formatProbeStatus(record.directHttps)}`,
    `  direct HTTP: ${formatProbeStatus(record.directHttp)}`,
    `  proxy HTTPS: ${formatProbeStatus(record.proxyHttps)}`,
    `  proxy HTTP: ${formatProbeStatus(record.proxyHttp)}`,
    `  final: ${record.finalClassification}`,
  ].join('\n');
}

export async function writeResultFile(path: string, records: ReachabilityRecord[]): Promise<void> {
  const body = serializeStoredJson(reachabilityResultSetSchema, records.map(toRecordJson), {
    field: 'result set',
    indent: 2,
  });
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${body}\n`, 'utf8');
}

async function pushAndLog(
  push: PushResultFile,
  file: string,
  log: RunLog,
  now: () => Date,
): Promise<PushOutcome> {
  let outcome: PushOutcome;
  try {
    outcome = await push(file);
  } catch (err) {
    outcome = { ok: false, detail: `push_exc=${toErrorMessage(err)}` };
  }
  await log.append(
    `${formatLocalTimestamp(now())} | push | ${outcome.ok ? 'ok' : 'fail'} | ${outcome.detail}`,
  );
  return outcome;
}

/**
 * One reachability pass: probes every domain, writes the ordered result set, and
 * optionally pushes it. `pushOverride` wins over CN_PUSH_ENABLE when given.
 */
export async function runReachabilityCheck(
  config: AppConfig['cn'],
  deps: ReachabilityRunDeps,
  pushOverride: boolean | null = null,
): Promise<ReachabilityRunResult> {
  const domains = await loadDomains(config.domainsFile);
  const now = deps.now ?? (() => new Date());

  await deps.log.append(`[${formatLocalTimestamp(now())}] reachability run started domains=${domains.length}`);

  const records = await runPartitioned(
    domains,
    (domain) => domain,
    config.concurrency,
    async (domain) => {
      const record = await checkDomain(domain, {
        probe: deps.probe,
        fetchProxy: deps.fetchProxy,
        proxySource: config.proxyApi,
        maxProxyRetry: config.maxProxyRetry,
        timeoutSeconds: config.timeoutSeconds,
        now,
      });
      const block = formatRecordBlock(record, formatLocalTimestamp(now()));
      console.log(block);
      await deps.log.append(block);
      return record;
    },
  );

  await writeResultFile(config.resultFile, records);
  await deps.log.append(`[${formatLocalTimestamp(now())}] result written to ${config.resultFile}`);

  const pushEnabled = pushOverride ?? config.push.enabled;
  const push = pushEnabled ? await pushAndLog(deps.push, config.resultFile, deps.log, now) : null;

  await deps.log.append(`[${formatLocalTimestamp(now())}] reachability run finished`);
  await deps.log.append('------------------------------------');

  return { records, resultFile: config.resultFile, push };
}

/** Pushes an already written result file. Throws ConfigError if the file does not exist. */
export async function pushExistingResult(
  file: string,
  deps: Pick<ReachabilityRunDeps, 'push' | 'log' | 'now'>,
): Promise<PushOutcome> {
  try {
    await access(file);
  } catch {
    throw new ConfigError(`result file does not exist: ${file}`);
  }
  return pushAndLog(deps.push, file, deps.log, deps.now ?? (() => new Date()));
}
