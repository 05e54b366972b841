// HTTP-facing errors carry a status code; the express error handler maps them.
export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = true;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'job not found') {
    super(message, 404);
  }
}

export class WebhookAuthError extends AppError {
  constructor(message = 'invalid callback token') {
    super(message, 401);
  }
}

export class ProvisionError extends Error {
  readonly transient: boolean;
  readonly attempts: number;

  constructor(message: string, options: { transient: boolean; attempts?: number; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'ProvisionError';
    this.transient = options.transient;
    this.attempts = options.attempts ?? 1;
  }
}

export class LaunchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'LaunchError';
  }
}

export class TeardownError extends Error {
  readonly sandboxId: string;

  constructor(sandboxId: string, options?: { cause?: unknown }) {
    super(`teardown of sandbox ${sandboxId} failed`, { cause: options?.cause });
    this.name = 'TeardownError';
    this.sandboxId = sandboxId;
  }
}

export class DeadlineExceeded extends Error {
  constructor(jobId: string, deadline: string) {
    super(`job ${jobId} exceeded its deadline (${deadline})`);
    this.name = 'DeadlineExceeded';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
