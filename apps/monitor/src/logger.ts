import { appendFile, mkdir, open, type FileHandle } from 'node:fs/promises';
import { dirname } from 'node:path';

import { errnoCode, toErrorMessage } from './errors';

/** Append-only run log: one line per probe cycle, plus alert and push lines. */
export interface RunLog {
  append(line: string): Promise<void>;
}

export class FileRunLog implements RunLog {
  constructor(private readonly path: string) {}

  async append(line: string): Promise<void> {
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await appendFile(this.path, `${line.replace(/\n+$/, '')}\n`, 'utf8');
    } catch (err) {
      // Losing a log line must not abort the run.
      console.error(`log: append failed path=${this.path} error=${toErrorMessage(err)}`);
    }
  }
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

// Local wall-clock time, e.g. "2026-01-02 03:04:05".
export function formatLocalTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`
  );
}

const TAIL_BLOCK_BYTES = 4096;

/** Last `lines` lines of a file, reading backwards in blocks. Null when the file is missing. */
export async function tailFile(path: string, lines: number): Promise<string | null> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return null;
    throw err;
  }

  try {
    const { size } = await handle.stat();
    let position = size;
    let data = Buffer.alloc(0);

    while (position > 0 && countNewlines(data) <= lines) {
      const step = Math.min(TAIL_BLOCK_BYTES, position);
      position -= step;
      const chunk = Buffer.alloc(step);
      await handle.read(chunk, 0, step, position);
      data = Buffer.concat([chunk, data]);
    }

    const all = data.toString('utf8').split(/\r?\n/);
    if (all.length > 0 && all[all.length - 1] === '') all.pop();
    return all.slice(-lines).join('\n');
  } finally {
    await handle.close();
  }
}

function countNewlines(buf: Buffer): number {
  let n = 0;
  for (const byte of buf) {
    if (byte === 0x0a) n++;
  }
  return n;
}
