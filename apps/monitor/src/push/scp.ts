import type { AppConfig } from '../config';
import type { PushOutcome, PushResultFile } from '../monitor/types';
import { runProcess, splitArgs } from '../process';

const SCP_TIMEOUT_MS = 60_000;

export type PushConfig = AppConfig['cn']['push'];

export function pushDestination(config: PushConfig): string | null {
  if (!config.user || !config.host || !config.dir) return null;
  return `${config.user}@${config.host}:${config.dir.replace(/\/+$/, '')}/`;
}

/** Copies a file to `user@host:dir/` with scp. A missing destination is a failure, not a no-op. */
export function createScpPusher(config: PushConfig): PushResultFile {
  return async (localPath: string): Promise<PushOutcome> => {
    const destination = pushDestination(config);
    if (!destination) {
      return { ok: false, detail: 'missing CN_PUSH_USER/CN_PUSH_HOST/CN_PUSH_DIR' };
    }

    const argv = splitArgs(config.scpOptions);
    if (config.keyFile) argv.push('-i', config.keyFile);
    argv.push(localPath, destination);

    const r = await runProcess('scp', argv, SCP_TIMEOUT_MS);
    if (r.error !== null) {
      return { ok: false, detail: r.timedOut ? 'scp_timeout' : `scp_exc=${r.error}` };
    }
    if (r.code === 0) {
      return { ok: true, detail: `${localPath} -> ${destination}` };
    }
    return { ok: false, detail: `fail rc=${r.code} stderr=${r.stderr.trim().slice(0, 200)}` };
  };
}
