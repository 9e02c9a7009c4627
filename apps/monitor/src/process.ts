import { spawn } from 'node:child_process';

export type ProcessResult = {
  // null when the process never started, was killed, or timed out.
  code: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  error: string | null;
};

/**
 * Splits an options string such as `-o BatchMode=yes -o "ProxyCommand=ssh -W %h:%p bastion"`
 * into argv tokens with POSIX shell quoting. Single quotes are literal. Outside quotes a backslash
 * escapes any character; inside double quotes only `"` and a backslash. An unterminated quote runs
 * to the end of the text.
 */
export function splitArgs(text: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let inToken = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (quote === "'") {
      if (ch === "'") quote = null;
      else current += ch;
    } else if (quote === '"') {
      const next = text.charAt(i + 1);
      if (ch === '"') quote = null;
      else if (ch === '\\' && (next === '"' || next === '\\')) current += text.charAt(++i);
      else current += ch;
    } else if (ch === '\\' && i + 1 < text.length) {
      current += text.charAt(++i);
      inToken = true;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      inToken = true;
    } else if (/\s/.test(ch)) {
      if (inToken) tokens.push(current);
      current = '';
      inToken = false;
    } else {
      current += ch;
      inToken = true;
    }
  }
  if (inToken) tokens.push(current);
  return tokens;
}

/** POSIX single-quote escaping for a string that a remote shell will re-parse. */
export function shellQuote(value: string): string {
  if (value.length > 0 && /^[A-Za-z0-9_\-.,:/@%+=]+$/.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** Runs a command to completion or kills it after `timeoutMs`. Never rejects. */
export function runProcess(command: string, args: string[], timeoutMs: number): Promise<ProcessResult> {
  return new Promise<ProcessResult>((resolve) => {
    let stdout = '';
    let stderr = '';
    let settled = false;

    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

    const timeout = setTimeout(() => {
      if (settled) return;
      settled = true;
      child.kill('SIGKILL');
      resolve({ code: null, stdout, stderr, timedOut: true, error: `timed out after ${timeoutMs}ms` });
    }, timeoutMs);

    child.stdout?.on('data', (chunk: Buffer) => {
      stdout += chunk.toString('utf8');
    });
    child.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString('utf8');
    });

    child.on('error', (err: NodeJS.ErrnoException) => {
      if (settled) return;
      clearTimeout(timeout);
      settled = true;
      resolve({ code: null, stdout, stderr, timedOut: false, error: err.code ?? err.message });
    });

    child.on('close', (code: number | null) => {
      if (settled) return;
      clearTimeout(timeout);
      settled = true;
      resolve({ code, stdout, stderr, timedOut: false, error: null });
    });
  });
}
