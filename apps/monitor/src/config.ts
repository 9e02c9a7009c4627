// Env-file backed configuration.
//
// - Storage: `KEY=VALUE` lines, `#` comments, optional single/double quotes.
// - Non-empty process environment variables override the file.
// - Values are strings; this module parses them into typed values and falls back
//   to the default whenever a value is missing or out of range.

import { readFile } from 'node:fs/promises';

import { errnoCode } from './errors';
import type { OriginScheme } from './monitor/types';
import {
  ALERT_METHOD_ALIASES,
  alertMethodSchema,
  originSchemeSchema,
  truthyFlagSchema,
  type AlertMethod,
} from './schemas/config';

export const DEFAULT_CONFIG_PATH = '/etc/reachwatch/reachwatch.env';

export const DEFAULTS = {
  STATE_DIR: '/var/lib/reachwatch',

  ORIGIN_TARGETS_FILE: '/etc/reachwatch/origin_targets.conf',
  ORIGIN_LOG_FILE: '/var/log/reachwatch/origin_monitor.log',
  ORIGIN_TIMEOUT: '5',
  ORIGIN_ALERT_INTERVAL: '3600',
  ORIGIN_ALERT_BURST: '10',
  ORIGIN_ALERT_METHOD: 'none',
  ORIGIN_SSH_KEY: '/root/.ssh/id_rsa',
  ORIGIN_ALERT_HOST: '',
  ORIGIN_ALERT_CMD: '/opt/telegram_send.sh',
  ORIGIN_SSH_OPTS: '-o BatchMode=yes -o ConnectTimeout=5',
  ORIGIN_EXPECT_HTTP_CODE: '200',
  ORIGIN_DEFAULT_PORT: '443',
  ORIGIN_DEFAULT_PATH: '/',
  ORIGIN_DEFAULT_SLOW_TIME: '5',
  ORIGIN_DEFAULT_SCHEME: 'https',
  ORIGIN_CONCURRENCY: '1',

  CN_DOMAINS_FILE: '/etc/reachwatch/domains.txt',
  CN_LOG_FILE: '/var/log/reachwatch/cn_check.log',
  CN_RESULT_FILE: '/var/lib/reachwatch/result_cn.json',
  CN_TIMEOUT: '8',
  CN_MAX_PROXY_RETRY: '2',
  CN_PROXY_API: '',
  CN_CONCURRENCY: '1',

  CN_PUSH_ENABLE: '0',
  CN_PUSH_USER: 'root',
  CN_PUSH_HOST: '',
  CN_PUSH_DIR: '/opt/reachwatch',
  CN_PUSH_SSH_KEY: '',
  CN_PUSH_SCP_OPTS: '-o BatchMode=yes -o ConnectTimeout=5',

  TELEGRAM_BOT_TOKEN: '',
  TELEGRAM_CHAT_ID: '',
} as const satisfies Record<string, string>;

export type ConfigKey = keyof typeof DEFAULTS;
export type RawConfig = Record<string, string>;

export type AppConfig = {
  stateDir: string;
  origin: {
    targetsFile: string;
    logFile: string;
    timeoutSeconds: number;
    alertIntervalSeconds: number;
    alertBurst: number;
    expectHttpCode: string;
    defaultPort: number;
    defaultPath: string;
    defaultSlowSeconds: number;
    defaultScheme: OriginScheme;
    concurrency: number;
  };
  alert: {
    // null when ORIGIN_ALERT_METHOD holds something we do not recognise; see `methodRaw`.
    method: AlertMethod | null;
    methodRaw: string;
    ssh: {
      host: string;
      command: string;
      keyFile: string;
      options: string;
    };
    telegram: {
      botToken: string;
      chatId: string;
    };
  };
  cn: {
    domainsFile: string;
    logFile: string;
    resultFile: string;
    timeoutSeconds: number;
    maxProxyRetry: number;
    proxyApi: string | null;
    concurrency: number;
    push: {
      enabled: boolean;
      user: string;
      host: string;
      dir: string;
      keyFile: string;
      scpOptions: string;
    };
  };
};

const SENSITIVE_KEYWORDS = ['TOKEN', 'PASSWORD', 'PASS', 'SECRET', 'SIGN', 'PROXY_API'] as const;

function unquote(v: string): string {
  if (v.length >= 2) {
    const first = v[0];
    const last = v[v.length - 1];
    if ((first === '"' && last === '"') || (first === "'" && last === "'")) {
      return v.slice(1, -1);
    }
  }
  return v;
}

export function parseEnvFile(text: string): RawConfig {
  const out: RawConfig = {};
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith('#')) continue;

    const eq = line.indexOf('=');
    if (eq === -1) continue;

    const key = line.slice(0, eq).trim();
    if (!key) continue;
    out[key] = unquote(line.slice(eq + 1).trim());
  }
  return out;
}

export async function loadRawConfig(
  path: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<RawConfig> {
  const cfg: RawConfig = { ...DEFAULTS };

  let text: string | null = null;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    // A missing file just means "all defaults"; anything else is worth surfacing.
    if (errnoCode(err) !== 'ENOENT') throw err;
  }
  if (text !== null) {
    Object.assign(cfg, parseEnvFile(text));
  }

  for (const key of Object.keys(cfg)) {
    const override = env[key];
    if (override !== undefined && override.trim() !== '') {
      cfg[key] = override.trim();
    }
  }

  return cfg;
}

function parseIntSetting(
  raw: string | undefined,
  opts: { min: number; max: number },
): number | null {
  if (raw === undefined) return null;
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) return null;
  const n = Number.parseInt(trimmed, 10);
  if (!Number.isFinite(n)) return null;
  if (n < opts.min || n > opts.max) return null;
  return n;
}

function parseFloatSetting(
  raw: string | undefined,
  opts: { min: number; max: number },
): number | null {
  if (raw === undefined || raw.trim() === '') return null;
  const n = Number(raw.trim());
  if (!Number.isFinite(n)) return null;
  if (n < opts.min || n > opts.max) return null;
  return n;
}

function parseStringSetting(raw: string | undefined, fallback: string): string {
  const s = raw?.trim() ?? '';
  return s.length > 0 ? s : fallback;
}

function intOr(raw: string | undefined, fallback: string, opts: { min: number; max: number }) {
  return parseIntSetting(raw, opts) ?? Number.parseInt(fallback, 10);
}

export function normalizeAlertMethod(raw: string): AlertMethod | null {
  const lower = raw.trim().toLowerCase();
  const aliased = ALERT_METHOD_ALIASES[lower] ?? lower;
  const r = alertMethodSchema.safeParse(aliased);
  return r.success ? r.data : null;
}

export function resolveConfig(raw: RawConfig): AppConfig {
  const get = (key: ConfigKey): string | undefined => raw[key];

  const scheme = originSchemeSchema.safeParse(get('ORIGIN_DEFAULT_SCHEME')?.trim().toLowerCase());
  const proxyApi = get('CN_PROXY_API')?.trim() ?? '';
  const methodRaw = get('ORIGIN_ALERT_METHOD')?.trim() ?? DEFAULTS.ORIGIN_ALERT_METHOD;

  return {
    stateDir: parseStringSetting(get('STATE_DIR'), DEFAULTS.STATE_DIR),
    origin: {
      targetsFile: get('ORIGIN_TARGETS_FILE')?.trim() ?? '',
      logFile: parseStringSetting(get('ORIGIN_LOG_FILE'), DEFAULTS.ORIGIN_LOG_FILE),
      timeoutSeconds: intOr(get('ORIGIN_TIMEOUT'), DEFAULTS.ORIGIN_TIMEOUT, { min: 1, max: 300 }),
      alertIntervalSeconds: intOr(get('ORIGIN_ALERT_INTERVAL'), DEFAULTS.ORIGIN_ALERT_INTERVAL, {
        min: 0,
        max: 7 * 86400,
      }),
      alertBurst: intOr(get('ORIGIN_ALERT_BURST'), DEFAULTS.ORIGIN_ALERT_BURST, { min: 0, max: 1000 }),
      expectHttpCode: parseStringSetting(get('ORIGIN_EXPECT_HTTP_CODE'), DEFAULTS.ORIGIN_EXPECT_HTTP_CODE),
      defaultPort: intOr(get('ORIGIN_DEFAULT_PORT'), DEFAULTS.ORIGIN_DEFAULT_PORT, { min: 1, max: 65535 }),
      defaultPath: parseStringSetting(get('ORIGIN_DEFAULT_PATH'), DEFAULTS.ORIGIN_DEFAULT_PATH),
      defaultSlowSeconds:
        parseFloatSetting(get('ORIGIN_DEFAULT_SLOW_TIME'), { min: 0, max: 3600 }) ??
        Number(DEFAULTS.ORIGIN_DEFAULT_SLOW_TIME),
      defaultScheme: scheme.success ? scheme.data : 'https',
      concurrency: intOr(get('ORIGIN_CONCURRENCY'), DEFAULTS.ORIGIN_CONCURRENCY, { min: 1, max: 64 }),
    },
    alert: {
      method: normalizeAlertMethod(methodRaw),
      methodRaw,
      ssh: {
        host: get('ORIGIN_ALERT_HOST')?.trim() ?? '',
        command: get('ORIGIN_ALERT_CMD')?.trim() ?? '',
        keyFile: get('ORIGIN_SSH_KEY')?.trim() ?? '',
        options: get('ORIGIN_SSH_OPTS')?.trim() ?? '',
      },
      telegram: {
        botToken: get('TELEGRAM_BOT_TOKEN')?.trim() ?? '',
        chatId: get('TELEGRAM_CHAT_ID')?.trim() ?? '',
      },
    },
    cn: {
      domainsFile: get('CN_DOMAINS_FILE')?.trim() ?? '',
      logFile: parseStringSetting(get('CN_LOG_FILE'), DEFAULTS.CN_LOG_FILE),
      resultFile: parseStringSetting(get('CN_RESULT_FILE'), DEFAULTS.CN_RESULT_FILE),
      timeoutSeconds: intOr(get('CN_TIMEOUT'), DEFAULTS.CN_TIMEOUT, { min: 1, max: 300 }),
      maxProxyRetry: intOr(get('CN_MAX_PROXY_RETRY'), DEFAULTS.CN_MAX_PROXY_RETRY, { min: 0, max: 20 }),
      proxyApi: proxyApi.length > 0 ? proxyApi : null,
      concurrency: intOr(get('CN_CONCURRENCY'), DEFAULTS.CN_CONCURRENCY, { min: 1, max: 64 }),
      push: {
        enabled: truthyFlagSchema.parse(get('CN_PUSH_ENABLE') ?? DEFAULTS.CN_PUSH_ENABLE),
        user: get('CN_PUSH_USER')?.trim() ?? '',
        host: get('CN_PUSH_HOST')?.trim() ?? '',
        dir: get('CN_PUSH_DIR')?.trim() ?? '',
        keyFile: get('CN_PUSH_SSH_KEY')?.trim() ?? '',
        scpOptions: get('CN_PUSH_SCP_OPTS')?.trim() ?? '',
      },
    },
  };
}

export function isSensitiveKey(key: string): boolean {
  const upper = key.toUpperCase();
  return SENSITIVE_KEYWORDS.some((k) => upper.includes(k));
}

export function maskValue(value: string): string {
  const v = value.trim();
  if (!v) return '';
  if (v.length <= 8) return '****';
  return `${v.slice(0, 4)}****${v.slice(-4)}`;
}

export function formatConfigDump(raw: RawConfig): string[] {
  return Object.keys(raw)
    .sort()
    .map((key) => {
      const value = raw[key] ?? '';
      return `${key}=${isSensitiveKey(key) ? maskValue(value) : value}`;
    });
}
