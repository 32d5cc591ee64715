import type { ErrorCode } from '@pmm-link/shared';

export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 500 | 502;

export interface ErrorBody {
  ok: false;
  message: string;
  error_code: ErrorCode;
  [key: string]: unknown;
}

/** Base class for every failure the endpoint layer converts into a JSON response */
export abstract class WorkflowError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly status: ErrorStatus;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }

  toBody(): ErrorBody {
    return { ...this.details(), ok: false, message: this.message, error_code: this.code };
  }

  protected details(): Record<string, unknown> {
    return {};
  }
}

/** Credentials rejected by DigitalOcean or the PMM server */
export class AuthError extends WorkflowError {
  readonly code = 'auth';
  readonly status = 401;
}

/** A valid credential lacking the scope for one operation; the session keeps it */
export class PermissionError extends WorkflowError {
  readonly code = 'permission';
  readonly status = 403;
}

/** Network failure or timeout talking to an upstream */
export class ConnectivityError extends WorkflowError {
  readonly code = 'connectivity';
  readonly status = 502;
}

/** Any other non-2xx answer from an upstream API */
export class ProviderError extends WorkflowError {
  readonly code = 'provider';
  readonly status = 502;

  constructor(
    message: string,
    readonly upstreamStatus?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }

  protected override details(): Record<string, unknown> {
    return this.upstreamStatus === undefined ? {} : { upstream_status: this.upstreamStatus };
  }
}

/** pmm-admin missing, or exited non-zero */
export class RegistrationError extends WorkflowError {
  readonly code = 'registration';
  readonly status = 502;

  constructor(
    message: string,
    readonly output = '',
    options?: ErrorOptions,
  ) {
    super(message, options);
  }

  protected override details(): Record<string, unknown> {
    return { output: this.output };
  }
}

export class NotFoundError extends WorkflowError {
  readonly code = 'not_found';
  readonly status = 404;

  constructor(
    message: string,
    readonly output = '',
  ) {
    super(message);
  }

  protected override details(): Record<string, unknown> {
    return { output: this.output };
  }
}

export class ValidationError extends WorkflowError {
  readonly code = 'validation';
  readonly status = 400;
}

/** A known engine that can be listed but not yet monitored */
export class UnsupportedEngineError extends ValidationError {
  constructor(
    displayName: string,
    readonly notice: string,
  ) {
    super(`${displayName} is not yet supported.`);
  }

  protected override details(): Record<string, unknown> {
    return { notice: this.notice };
  }
}

export interface UserExistsContext {
  dbId: string;
  dbName: string;
  /** Whether DigitalOcean still exposes the user's password */
  passwordRetrievable: boolean;
}

/**
 * The monitoring user is already present on the cluster. Recoverable: the
 * operator fetches or resets the password and enters it manually.
 */
export class UserExistsError extends WorkflowError {
  readonly code = 'user_exists';
  readonly status = 409;

  constructor(
    readonly username: string,
    readonly context: UserExistsContext,
  ) {
    super(`User '${username}' already exists on this database.`);
  }

  remediation(): string[] {
    const { dbId, dbName, passwordRetrievable } = this.context;
    const label = dbName || dbId;
    if (passwordRetrievable) {
      return [
        `Open the DigitalOcean control panel, then Databases > ${label} > Users & Databases, and reveal the password of ${this.username}.`,
        `Or run: doctl databases user get ${dbId} ${this.username} --format Name,Password`,
        'Enter the username and password manually to continue.',
      ];
    }
    return [
      `Open the DigitalOcean control panel, then Databases > ${label} > Users & Databases, and reset the password of ${this.username}.`,
      `Or run: doctl databases user reset ${dbId} ${this.username}`,
      'Enter the username and the new password manually to continue.',
    ];
  }

  protected override details(): Record<string, unknown> {
    return {
      username: this.username,
      db_id: this.context.dbId,
      db_name: this.context.dbName,
      remediation: this.remediation(),
    };
  }
}

/** Human-readable reason from a fetch rejection (undici wraps the socket error in `cause`) */
export function describeFetchError(error: unknown): string {
  if (error instanceof Error) {
    if (error.name === 'TimeoutError' || error.name === 'AbortError') return 'request timed out';
    const cause: unknown = error.cause;
    if (cause instanceof Error && cause.message) return cause.message;
    return error.message;
  }
  return String(error);
}
