import { access, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { parseArgs } from 'node:util';

import {
  DEFAULT_CONFIG_PATH,
  formatConfigDump,
  loadRawConfig,
  resolveConfig,
  type AppConfig,
} from './config';
import { AppError, toErrorMessage } from './errors';
import { FileRunLog, formatLocalTimestamp, tailFile } from './logger';
import { probeHttpTarget, probeReachability } from './monitor/http';
import { fetchProxyEndpoint } from './monitor/proxy';
import { createAlertDispatcher } from './notify/alert';
import { runOriginMonitor } from './origin/run';
import { createScpPusher } from './push/scp';
import { pushExistingResult, runReachabilityCheck } from './reachability/run';
import { openFailureStateStoreForRun, type FailureStateStore } from './state/store';

export const USAGE = `usage: reachwatch [--config <file>] <command>

commands:
  origin run                      one origin-monitor pass
  cn run [--push|--no-push]       one reachability pass
  cn push [--file <path>]         push an existing result file
  config show                     print the effective configuration (secrets masked)
  logs <origin|cn> [--lines N]    tail a run log (default 200 lines)
  status                          file summary and persisted failure streaks`;

const DEFAULT_LOG_LINES = 200;

export const STATE_DB_FILE = 'failure_state.sqlite';

export function stateDbPath(config: AppConfig): string {
  return join(config.stateDir, STATE_DB_FILE);
}

class UsageError extends AppError {
  constructor(message: string) {
    super(2, 'USAGE', message);
    this.name = 'UsageError';
  }
}

async function exists(path: string): Promise<boolean> {
  if (!path) return false;
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function withStore<T>(
  config: AppConfig,
  fn: (store: FailureStateStore) => Promise<T>,
): Promise<T> {
  await mkdir(config.stateDir, { recursive: true });
  const { store, close } = openFailureStateStoreForRun(stateDbPath(config));
  try {
    return await fn(store);
  } finally {
    close();
  }
}

async function originRun(config: AppConfig): Promise<number> {
  await withStore(config, (store) =>
    runOriginMonitor(config.origin, {
      probe: probeHttpTarget,
      dispatchAlert: createAlertDispatcher(config.alert),
      store,
      log: new FileRunLog(config.origin.logFile),
    }),
  );
  return 0;
}

async function cnRun(config: AppConfig, pushOverride: boolean | null): Promise<number> {
  const result = await runReachabilityCheck(
    config.cn,
    {
      probe: probeReachability,
      fetchProxy: fetchProxyEndpoint,
      push: createScpPusher(config.cn.push),
      log: new FileRunLog(config.cn.logFile),
    },
    pushOverride,
  );
  console.log(`cn: domains=${result.records.length} result=${result.resultFile}`);
  if (result.push) {
    console.log(`cn: push ok=${result.push.ok} detail=${result.push.detail}`);
  }
  return 0;
}

async function cnPush(config: AppConfig, file: string | undefined): Promise<number> {
  const outcome = await pushExistingResult(file ?? config.cn.resultFile, {
    push: createScpPusher(config.cn.push),
    log: new FileRunLog(config.cn.logFile),
  });
  console.log(`cn: push ok=${outcome.ok} detail=${outcome.detail}`);
  return outcome.ok ? 0 : 1;
}

async function showLogs(config: AppConfig, which: string | undefined, linesRaw: string | undefined) {
  let path: string;
  if (which === 'origin') path = config.origin.logFile;
  else if (which === 'cn') path = config.cn.logFile;
  else throw new UsageError('logs expects "origin" or "cn"');

  let lines = DEFAULT_LOG_LINES;
  if (linesRaw !== undefined) {
    const n = Number(linesRaw);
    if (!Number.isInteger(n) || n < 1) throw new UsageError(`invalid --lines value: ${linesRaw}`);
    lines = n;
  }

  const text = await tailFile(path, lines);
  console.log(text === null ? `(missing) ${path}` : text);
  return 0;
}

async function showStatus(configPath: string, config: AppConfig): Promise<number> {
  const files: Array<[string, string]> = [
    ['config', configPath],
    ['origin targets', config.origin.targetsFile],
    ['origin log', config.origin.logFile],
    ['cn domains', config.cn.domainsFile],
    ['cn log', config.cn.logFile],
    ['cn result', config.cn.resultFile],
  ];
  for (const [label, path] of files) {
    console.log(`${label}: ${(await exists(path)) ? 'present' : 'missing'} ${path}`);
  }

  const dbPath = stateDbPath(config);
  if (!(await exists(dbPath))) {
    console.log(`failure streaks: none (${dbPath} missing)`);
    return 0;
  }

  const streaks = await withStore(config, (store) => store.list());
  if (streaks.length === 0) {
    console.log('failure streaks: none');
    return 0;
  }
  console.log(`failure streaks: ${streaks.length}`);
  for (const s of streaks) {
    const lastAlert =
      s.lastAlertEpochSeconds > 0 ? formatLocalTimestamp(new Date(s.lastAlertEpochSeconds * 1000)) : 'never';
    console.log(`  ${s.key} count=${s.consecutiveFailures} last_alert=${lastAlert}`);
  }
  return 0;
}

const CLI_OPTIONS = {
  config: { type: 'string' },
  push: { type: 'boolean' },
  'no-push': { type: 'boolean' },
  file: { type: 'string' },
  lines: { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const;

function parseCliArgs(argv: string[]) {
  try {
    return parseArgs({ args: argv, allowPositionals: true, options: CLI_OPTIONS });
  } catch (err) {
    throw new UsageError(toErrorMessage(err));
  }
}

/** Parses argv, runs one command and returns the process exit code. */
export async function runCli(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  try {
    const parsed = parseCliArgs(argv);
    const { values, positionals } = parsed;
    const [command, sub] = positionals;
    if (values.help || command === undefined) {
      console.log(USAGE);
      return values.help ? 0 : 2;
    }

    const configPath = values.config ?? env.REACHWATCH_CONFIG ?? DEFAULT_CONFIG_PATH;
    const raw = await loadRawConfig(configPath, env);
    const config = resolveConfig(raw);

    switch (`${command} ${sub ?? ''}`.trim()) {
      case 'origin run':
        return await originRun(config);
      case 'cn run': {
        if (values.push && values['no-push']) throw new UsageError('--push and --no-push are exclusive');
        const override = values.push ? true : values['no-push'] ? false : null;
        return await cnRun(config, override);
      }
      case 'cn push':
        return await cnPush(config, values.file);
      case 'config show':
        for (const line of formatConfigDump(raw)) console.log(line);
        return 0;
      case 'status':
        return await showStatus(configPath, config);
      default:
        if (command === 'logs') return await showLogs(config, sub, values.lines);
        throw new UsageError(`unknown command: ${positionals.join(' ')}`);
    }
  } catch (err) {
    if (err instanceof AppError) {
      console.error(`error: ${err.code} ${err.message}`);
      if (err instanceof UsageError) console.error(USAGE);
      return err.exitCode;
    }
    console.error(`error: ${toErrorMessage(err)}`);
    return 1;
  }
}
