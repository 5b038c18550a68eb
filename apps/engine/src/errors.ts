import { ZodError } from 'zod';

export type ErrorCode = 'CONFIGURATION' | 'STORAGE' | 'TRANSPORT' | 'STALE_DEPENDENCY' | 'INTERNAL';

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AppError';
  }
}

/** Cyclic dependencies, unknown check types, malformed parameters. Fatal before any check runs. */
export class ConfigurationError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION', message, options);
    this.name = 'ConfigurationError';
  }
}

/** A partition or state file could not be read or written. Fatal for the invocation. */
export class StorageError extends AppError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super('STORAGE', message, options);
    this.name = 'StorageError';
  }
}

/** Network failure or timeout during a probe. Executors map it to `down`. */
export class TransportError extends AppError {
  constructor(
    message: string,
    public readonly timedOut: boolean,
    options?: { cause?: unknown },
  ) {
    super('TRANSPORT', message, options);
    this.name = 'TransportError';
  }
}

/** A dependent check was about to run without a same-cycle result for its dependency. */
export class StaleDependencyError extends AppError {
  constructor(
    public readonly checkId: string,
    public readonly dependsOn: string,
  ) {
    super('STALE_DEPENDENCY', `Dependency ${dependsOn} of ${checkId} has no result this cycle`);
    this.name = 'StaleDependencyError';
  }
}

export function toErrorMessage(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
  }
  if (err instanceof Error) return err.message;
  return String(err);
}

export function isErrnoCode(err: unknown, code: string): boolean {
  if (err && typeof err === 'object' && 'code' in err) {
    return err.code === code;
  }
  return false;
}

/** Process exit code for the external invoker. */
export function exitCodeForError(err: unknown): number {
  if (err instanceof ConfigurationError) return 2;
  return 1;
}
