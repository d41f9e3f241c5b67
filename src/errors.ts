/**
 * Error taxonomy shared by the lifecycle manager, the provisioning layer and
 * the HTTP adapter. Each class carries a stable code and the status the
 * router answers with.
 */

export type PlatformErrorCode = "VALIDATION" | "NOT_FOUND" | "CONFLICT" | "EXECUTION" | "PERSISTENCE";

export abstract class PlatformError extends Error {
  abstract readonly code: PlatformErrorCode;
  abstract readonly httpStatus: number;
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.details = details;
  }

  toJSON(): { error: string; code: PlatformErrorCode; details?: Record<string, unknown> } {
    return {
      error: this.message,
      code: this.code,
      ...(this.details ? { details: this.details } : {})
    };
  }
}

export class ValidationError extends PlatformError {
  readonly code = "VALIDATION";
  readonly httpStatus = 400;

  constructor(message: string, readonly issues: string[] = []) {
    super(message, issues.length > 0 ? { issues } : undefined);
  }
}

export class NotFoundError extends PlatformError {
  readonly code = "NOT_FOUND";
  readonly httpStatus = 404;

  constructor(resource: string, id: string) {
    super(`${resource} not found: ${id}`, { resource, id });
  }
}

export class ConflictError extends PlatformError {
  readonly code = "CONFLICT";
  readonly httpStatus = 409;
}

/** An external tool or cluster call failed; `stderr` holds the captured diagnostics. */
export class ExecutionError extends PlatformError {
  readonly code = "EXECUTION";
  readonly httpStatus = 502;
  readonly stderr: string;
  readonly exitCode: number | null;

  constructor(message: string, input: { stderr?: string; exitCode?: number | null; cause?: unknown } = {}) {
    const stderr = input.stderr?.trim() ?? "";
    super(stderr ? `${message}: ${stderr}` : message, undefined, { cause: input.cause });
    this.stderr = stderr;
    this.exitCode = input.exitCode ?? null;
  }
}

export class PersistenceError extends PlatformError {
  readonly code = "PERSISTENCE";
  readonly httpStatus = 503;

  constructor(message: string, cause?: unknown) {
    super(message, undefined, { cause });
  }
}
