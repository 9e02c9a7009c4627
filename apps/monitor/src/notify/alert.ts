import { request } from 'undici';

import type { AppConfig } from '../config';
import { runProcess, shellQuote, splitArgs } from '../process';
import type { AlertDelivery, DispatchAlert } from '../monitor/types';

const SSH_TIMEOUT_MS = 15_000;
const TELEGRAM_TIMEOUT_MS = 10_000;
const STDERR_PREVIEW_CHARS = 200;

export type AlertConfig = AppConfig['alert'];

function errorName(err: unknown): string {
  if (err instanceof Error) return err.name;
  return typeof err;
}

async function sendViaSsh(config: AlertConfig['ssh'], message: string): Promise<AlertDelivery> {
  if (!config.host || !config.command) {
    return { delivered: false, detail: 'missing ORIGIN_ALERT_HOST/ORIGIN_ALERT_CMD' };
  }

  const argv = splitArgs(config.options);
  if (config.keyFile) argv.push('-i', config.keyFile);
  // The remote side runs this through a shell; quote the message so spaces and
  // non-ASCII text stay one argument.
  argv.push(config.host, `${config.command} ${shellQuote(message)}`);

  const r = await runProcess('ssh', argv, SSH_TIMEOUT_MS);
  if (r.error !== null) {
    return { delivered: false, detail: r.timedOut ? 'ssh_timeout' : `ssh_exc=${r.error}` };
  }
  if (r.code === 0) {
    return { delivered: true, detail: 'ssh_ok' };
  }
  return {
    delivered: false,
    detail: `ssh_failed rc=${r.code} stderr=${r.stderr.trim().slice(0, STDERR_PREVIEW_CHARS)}`,
  };
}

async function sendViaTelegram(
  config: AlertConfig['telegram'],
  message: string,
): Promise<AlertDelivery> {
  if (!config.botToken || !config.chatId) {
    return { delivered: false, detail: 'missing TELEGRAM_BOT_TOKEN/TELEGRAM_CHAT_ID' };
  }

  const controller = new AbortController();
  const t = setTimeout(() => controller.abort(), TELEGRAM_TIMEOUT_MS);
  try {
    const res = await request(`https://api.telegram.org/bot${config.botToken}/sendMessage`, {
      method: 'POST',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({ chat_id: config.chatId, text: message }).toString(),
      signal: controller.signal,
    });
    await res.body.dump();
    if (res.statusCode === 200) {
      return { delivered: true, detail: 'telegram_ok' };
    }
    return { delivered: false, detail: `telegram_http=${res.statusCode}` };
  } catch (err) {
    return { delivered: false, detail: `telegram_exc=${errorName(err)}` };
  } finally {
    clearTimeout(t);
  }
}

/** Builds the alert channel from config. The "none" method always reports success. */
export function createAlertDispatcher(config: AlertConfig): DispatchAlert {
  return async (message: string): Promise<AlertDelivery> => {
    switch (config.method) {
      case 'none':
        return { delivered: true, detail: 'alert_disabled' };
      case 'ssh':
        return sendViaSsh(config.ssh, message);
      case 'telegram':
        return sendViaTelegram(config.telegram, message);
      case null:
        return { delivered: false, detail: `unknown alert method: ${config.methodRaw}` };
    }
  };
}
