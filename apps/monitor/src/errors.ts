export class AppError extends Error {
  constructor(
    public readonly exitCode: number,
    public readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

// Missing or empty target/domain lists, unreadable files. Fatal before any probing.
export class ConfigError extends AppError {
  constructor(message: string) {
    super(2, 'CONFIG_INVALID', message);
    this.name = 'ConfigError';
  }
}

export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

// `code` of a Node system error (ENOENT, EACCES, ...), if there is one.
export function errnoCode(err: unknown): string | undefined {
  if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
