export class CliError extends Error {
  readonly exitCode: number;

  constructor(message: string, options: { cause?: unknown; exitCode?: number } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.exitCode = options.exitCode ?? 1;
  }
}

export class NetworkError extends CliError {
  constructor(readonly url: string, cause: unknown) {
    super(`Request to ${url} failed: ${describeError(cause)}`, { cause });
  }
}

export class HttpStatusError extends CliError {
  constructor(readonly url: string, readonly status: number) {
    super(`Bad (!= 200) status code ${status} from ${url}`);
  }
}

export class DecodeError extends CliError {
  constructor(message: string, readonly path?: string, cause?: unknown) {
    super(message, { cause });
  }
}

export class InvalidUrlError extends DecodeError {
  constructor(readonly value: string, cause?: unknown) {
    super(`Invalid base URL: ${JSON.stringify(value)}`, undefined, cause);
  }
}

export class FilesystemError extends CliError {
  constructor(message: string, readonly filePath: string, cause?: unknown) {
    super(message, { cause });
  }
}

export class NotFoundError extends FilesystemError {
  constructor(filePath: string) {
    super(`No cache file at ${filePath}`, filePath);
  }
}

export class ValidationError extends CliError {
  constructor(message: string) {
    super(message, { exitCode: 2 });
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Runs a command action and converts any failure into a diagnostic on
 * `writeError` plus an exit code. Only this function decides exit codes.
 */
export async function runWithBoundary(
  action: () => Promise<void>,
  writeError: (line: string) => void = (line) => console.error(line),
): Promise<number> {
  try {
    await action();
    return 0;
  } catch (error) {
    writeError(`Error: ${describeError(error)}`);
    return error instanceof CliError ? error.exitCode : 1;
  }
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}
