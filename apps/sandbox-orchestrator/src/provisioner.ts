import { setTimeout as sleep } from 'node:timers/promises';

import { parseCodeRef, shellQuote } from './codeRef.js';
import { ProvisionError, TeardownError, errorMessage } from './errors.js';
import logger from './logger.js';
import { ProvisionPayload, SandboxHandle, SandboxProvider } from './types.js';

export const RUNNER_DIR = '/opt/agent-runner';
export const WORKSPACE_DIR = '/home/user/workspace';

export interface ProvisionerOptions {
  maxAttempts: number;
  backoffMs: number;
  attemptTimeoutMs: number;
}

const TRANSIENT_STATUS = new Set([408, 429, 502, 503, 504]);
const TRANSIENT_PATTERN =
  /\b(?:429|502|503|504)\b|\btime(?:d)? ?out\b|rate limit|ECONNRESET|ECONNREFUSED|ETIMEDOUT|EAI_AGAIN|socket hang up/i;

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

export function isTransientError(error: unknown): boolean {
  if (error instanceof ProvisionError) {
    return error.transient;
  }
  if (error instanceof Error && error.name === 'TimeoutError') {
    return true;
  }
  const status = statusOf(error);
  if (status !== undefined) {
    return TRANSIENT_STATUS.has(status);
  }
  return TRANSIENT_PATTERN.test(errorMessage(error));
}

function aborted(jobId: string): ProvisionError {
  return new ProvisionError(`provisioning of job ${jobId} aborted`, { transient: false });
}

class AttemptTimeout extends Error {
  constructor(ms: number) {
    super(`provisioning attempt timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

export class SandboxProvisioner {
  private readonly provider: SandboxProvider;
  private readonly options: ProvisionerOptions;

  constructor(provider: SandboxProvider, options: ProvisionerOptions) {
    this.provider = provider;
    this.options = options;
  }

  /**
   * Retries transient failures with exponential backoff. Once `signal` is
   * aborted no further attempt starts, and a sandbox that still arrives is
   * torn down.
   */
  async provision(jobId: string, payload: ProvisionPayload, signal?: AbortSignal): Promise<SandboxHandle> {
    const maxAttempts = Math.max(1, this.options.maxAttempts);
    let attempt = 1;
    while (true) {
      if (signal?.aborted) {
        throw aborted(jobId);
      }
      let handle: SandboxHandle;
      try {
        handle = await this.attemptProvision(jobId, payload);
      } catch (err) {
        if (signal?.aborted) {
          throw aborted(jobId);
        }
        const transient = isTransientError(err);
        if (!transient || attempt >= maxAttempts) {
          logger.error('sandbox provisioning failed', { jobId, attempt, transient, error: errorMessage(err) });
          throw new ProvisionError(`provisioning failed after ${attempt} attempt(s): ${errorMessage(err)}`, {
            transient,
            attempts: attempt,
            cause: err,
          });
        }
        const delay = this.options.backoffMs * 2 ** (attempt - 1);
        logger.warn('transient provisioning error, retrying', { jobId, attempt, delay, error: errorMessage(err) });
        try {
          await sleep(delay, undefined, { signal });
        } catch (sleepErr) {
          if (!signal?.aborted) {
            throw sleepErr;
          }
        }
        attempt += 1;
        continue;
      }

      if (signal?.aborted) {
        await this.teardown(handle);
        throw aborted(jobId);
      }
      logger.info('sandbox provisioned', { jobId, sandboxId: handle.sandboxId, attempt });
      return handle;
    }
  }

  /** Best-effort: failures are logged and never thrown. */
  async teardown(handle: Pick<SandboxHandle, 'sandboxId'>): Promise<void> {
    try {
      await this.provider.destroySandbox(handle.sandboxId);
      logger.info('sandbox destroyed', { sandboxId: handle.sandboxId });
    } catch (err) {
      const failure = new TeardownError(handle.sandboxId, { cause: err });
      logger.error(failure.message, { sandboxId: handle.sandboxId, error: errorMessage(err) });
    }
  }

  private async attemptProvision(jobId: string, payload: ProvisionPayload): Promise<SandboxHandle> {
    const creation = this.provider.createSandbox({
      jobId,
      timeoutMs: payload.sandboxTimeoutMs,
      env: payload.env,
    });

    let timer: NodeJS.Timeout | undefined;
    const expiry = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => reject(new AttemptTimeout(this.options.attemptTimeoutMs)), this.options.attemptTimeoutMs);
    });

    let handle: SandboxHandle;
    try {
      handle = await Promise.race([creation, expiry]);
    } catch (err) {
      if (err instanceof AttemptTimeout) {
        // The create call may still land; whatever it yields is not ours to keep.
        creation.then(
          (late) => this.teardown(late),
          (lateErr: unknown) => logger.debug('late sandbox creation failed', { jobId, error: errorMessage(lateErr) }),
        );
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }

    try {
      await this.inject(jobId, handle, payload);
    } catch (err) {
      await this.teardown(handle);
      throw err;
    }
    return handle;
  }

  private async inject(jobId: string, handle: SandboxHandle, payload: ProvisionPayload): Promise<void> {
    const codeRef = parseCodeRef(payload.codeRef);
    if (!codeRef) {
      throw new ProvisionError(`invalid code reference: ${payload.codeRef}`, { transient: false });
    }

    await this.provider.writeFiles(handle.sandboxId, [
      {
        path: `${RUNNER_DIR}/task.json`,
        data: JSON.stringify(
          { jobId, task: payload.task, codeRef: payload.codeRef, callbackUrl: payload.callbackUrl, cwd: WORKSPACE_DIR },
          null,
          2,
        ),
      },
    ]);

    const branch = codeRef.ref ? ` --branch ${shellQuote(codeRef.ref)}` : '';
    logger.debug('cloning code into sandbox', { jobId, sandboxId: handle.sandboxId, repoUrl: codeRef.repoUrl });
    await this.provider.runCommand(
      handle.sandboxId,
      `git clone --depth 1${branch} ${shellQuote(codeRef.repoUrl)} ${WORKSPACE_DIR}`,
      { timeoutMs: this.options.attemptTimeoutMs },
    );
  }
}
