import { readFile } from 'node:fs/promises';

import { ConfigError, errnoCode } from './errors';
import { parseDomainList, parseOriginTargets, type OriginTargetDefaults } from './monitor/targets';
import type { OriginTarget } from './monitor/types';

async function readListFile(path: string, label: string): Promise<string> {
  if (!path) {
    throw new ConfigError(`${label} file is not configured`);
  }
  try {
    return await readFile(path, 'utf8');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      throw new ConfigError(`${label} file does not exist: ${path}`);
    }
    throw new ConfigError(`${label} file is not readable: ${path}`);
  }
}

export async function loadOriginTargets(
  path: string,
  defaults: OriginTargetDefaults,
): Promise<OriginTarget[]> {
  const targets = parseOriginTargets(await readListFile(path, 'targets'), defaults);
  if (targets.length === 0) {
    throw new ConfigError(`targets file is empty or has no valid lines: ${path}`);
  }
  return targets;
}

export async function loadDomains(path: string): Promise<string[]> {
  const domains = parseDomainList(await readListFile(path, 'domains'));
  if (domains.length === 0) {
    throw new ConfigError(`domains file is empty: ${path}`);
  }
  return domains;
}
