/**
 * Error taxonomy for the export run.
 *
 * Lower layers (auth, gateway, CSV writer) throw these typed errors; the run
 * boundary decides what is fatal. Document download failures are never thrown
 * past the DocumentFetcher; they end up in its FetchReport instead.
 */

export type ExportErrorKind =
  | "config"
  | "authentication"
  | "api"
  | "file_write"
  | "transformation";

export abstract class ExportError extends Error {
  abstract readonly kind: ExportErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends ExportError {
  readonly kind = "config" as const;
}

/** Token exchange failed. Not retried: bad credentials do not heal themselves. */
export class AuthenticationError extends ExportError {
  readonly kind = "authentication" as const;
}

export class APIError extends ExportError {
  readonly kind = "api" as const;
  readonly endpoint: string;
  readonly status?: number;
  /** Physical attempts made before giving up. */
  readonly attempts: number;

  constructor(
    message: string,
    details: { endpoint: string; status?: number; attempts?: number; cause?: unknown }
  ) {
    super(message, { cause: details.cause });
    this.endpoint = details.endpoint;
    this.status = details.status;
    this.attempts = details.attempts ?? 1;
  }
}

export class FileWriteError extends ExportError {
  readonly kind = "file_write" as const;
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.path = path;
  }
}

export class TransformationError extends ExportError {
  readonly kind = "transformation" as const;
  readonly employeeId?: string;

  constructor(message: string, employeeId?: string) {
    super(message);
    this.employeeId = employeeId;
  }
}

/** Errors that abort a run with no CSV output. */
export function isFatalExportError(err: unknown): err is ExportError {
  return (
    err instanceof ConfigError ||
    err instanceof AuthenticationError ||
    err instanceof APIError ||
    err instanceof FileWriteError
  );
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
