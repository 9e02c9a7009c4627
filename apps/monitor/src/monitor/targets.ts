import { originSchemeSchema } from '../schemas/config';
import type { OriginScheme, OriginTarget } from './types';

export type OriginTargetDefaults = {
  port: number;
  path: string;
  slowThresholdSeconds: number;
  scheme: OriginScheme;
};

export function isValidPort(n: number): boolean {
  return Number.isInteger(n) && n >= 1 && n <= 65535;
}

function normalizePath(path: string): string {
  return path.startsWith('/') ? path : `/${path}`;
}

function parsePortField(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  if (!/^\d+$/.test(raw)) return fallback;
  const n = Number(raw);
  return isValidPort(n) ? n : fallback;
}

function parseSlowField(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
}

function parseSchemeField(raw: string | undefined, fallback: OriginScheme): OriginScheme {
  if (!raw) return fallback;
  const r = originSchemeSchema.safeParse(raw.toLowerCase());
  return r.success ? r.data : fallback;
}

function meaningfulLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((raw) => raw.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

/**
 * Parses `name|domain|originIP[|port[|path[|slowTime[|scheme]]]]` lines.
 * Lines with fewer than three fields are skipped; bad optional fields fall back to defaults.
 */
export function parseOriginTargets(text: string, defaults: OriginTargetDefaults): OriginTarget[] {
  const targets: OriginTarget[] = [];

  for (const line of meaningfulLines(text)) {
    const parts = line.split('|').map((p) => p.trim());
    if (parts.length < 3) continue;

    const [name = '', domain = '', originIp = '', port, path, slow, scheme] = parts;
    if (!name || !domain || !originIp) continue;

    targets.push({
      name,
      domain,
      originIp,
      port: parsePortField(port, defaults.port),
      path: normalizePath(path || defaults.path),
      slowThresholdSeconds: parseSlowField(slow, defaults.slowThresholdSeconds),
      scheme: parseSchemeField(scheme, defaults.scheme),
    });
  }

  return targets;
}

export function parseDomainList(text: string): string[] {
  return meaningfulLines(text);
}

// Keeps letters, digits, '.', '-' and '_'; everything else becomes '_'.
export function toStorageKey(name: string): string {
  return Array.from(name, (ch) => (/[\p{L}\p{N}._-]/u.test(ch) ? ch : '_')).join('');
}
