import { randomBytes, randomUUID } from 'node:crypto';

import { HeartbeatPolicy } from './config.js';
import { AppError, DeadlineExceeded, errorMessage } from './errors.js';
import logger from './logger.js';
import { SandboxProvisioner } from './provisioner.js';
import { RunnerLauncher } from './runnerLauncher.js';
import { TimeoutScheduler } from './timeoutScheduler.js';
import {
  ACTIVE_STATUSES,
  ApplyOutcome,
  JobRecord,
  JobResult,
  JobStatus,
  JobStore,
  JobSubmission,
  JobView,
  SandboxHandle,
  WebhookEventKind,
  isTerminal,
} from './types.js';

export interface OrchestratorOptions {
  store: JobStore;
  provisioner: SandboxProvisioner;
  launcher: RunnerLauncher;
  publicBaseUrl: string;
  defaultMaxRuntimeSeconds: number;
  heartbeatExtensionSeconds: number;
  heartbeatPolicy: HeartbeatPolicy;
  maxJobLifetimeSeconds: number;
  retentionHours: number;
  sandboxEnv?: Record<string, string>;
  now?: () => number;
}

export interface RecoverySummary {
  timedOut: number;
  failed: number;
  rearmed: number;
}

const RESTART_MESSAGE = 'interrupted by orchestrator restart';
const SHUTDOWN_MESSAGE = 'interrupted by orchestrator shutdown';

function iso(ms: number): string {
  return new Date(ms).toISOString();
}

function describeFailure(payload: unknown): string {
  if (typeof payload === 'string' && payload.trim()) {
    return payload.trim();
  }
  if (typeof payload === 'object' && payload !== null) {
    if ('error' in payload && typeof payload.error === 'string') {
      return payload.error;
    }
    if ('message' in payload && typeof payload.message === 'string') {
      return payload.message;
    }
  }
  return 'runner reported failure';
}

/**
 * Drives each job through provision → launch → running and applies webhook
 * events, deadlines and cancel requests. Every terminal change is a
 * compare-and-swap on the store; whoever loses it does nothing, and the
 * winner alone claims the sandbox for teardown.
 */
export class JobOrchestrator {
  private readonly store: JobStore;
  private readonly provisioner: SandboxProvisioner;
  private readonly launcher: RunnerLauncher;
  private readonly scheduler: TimeoutScheduler;
  private readonly options: OrchestratorOptions;
  private readonly now: () => number;
  private readonly inflight = new Set<Promise<void>>();
  private readonly controllers = new Map<string, AbortController>();
  private stopped = false;

  constructor(options: OrchestratorOptions) {
    this.options = options;
    this.store = options.store;
    this.provisioner = options.provisioner;
    this.launcher = options.launcher;
    this.now = options.now ?? Date.now;
    this.scheduler = new TimeoutScheduler((jobId) => this.handleDeadline(jobId), this.now);
  }

  submit(submission: JobSubmission): { jobId: string } {
    if (this.stopped) {
      throw new AppError('orchestrator is shutting down', 503);
    }
    const jobId = randomUUID();
    const createdAt = this.now();
    const maxRuntimeSeconds = submission.maxRuntimeSeconds ?? this.options.defaultMaxRuntimeSeconds;
    const deadline = createdAt + maxRuntimeSeconds * 1000;

    const record = this.store.create({
      jobId,
      task: submission.task,
      codeRef: submission.codeRef,
      callbackToken: randomBytes(24).toString('hex'),
      maxRuntimeSeconds,
      createdAt: iso(createdAt),
      deadlineAt: iso(deadline),
    });
    this.scheduler.schedule(jobId, deadline);
    logger.info('job accepted', { jobId, maxRuntimeSeconds });

    const controller = new AbortController();
    this.controllers.set(jobId, controller);
    const run: Promise<void> = this.run(record, controller.signal)
      .catch((err: unknown) => {
        logger.error('unexpected error driving job', { jobId, error: errorMessage(err) });
      })
      .finally(() => {
        this.controllers.delete(jobId);
        this.inflight.delete(run);
      });
    this.inflight.add(run);

    return { jobId };
  }

  getJob(jobId: string): JobView | undefined {
    const record = this.store.get(jobId);
    if (!record) {
      return undefined;
    }
    const view: JobView = {
      jobId: record.jobId,
      status: record.status,
      createdAt: record.createdAt,
      updatedAt: record.updatedAt,
      deadlineAt: record.deadlineAt,
    };
    if (record.result?.output !== undefined) {
      view.result = record.result.output;
    }
    if (record.result?.error !== undefined) {
      view.error = record.result.error;
    }
    return view;
  }

  callbackUrl(jobId: string): string {
    return `${this.options.publicBaseUrl}/webhooks/runner/${encodeURIComponent(jobId)}`;
  }

  async cancel(jobId: string, reason = 'cancelled by request'): Promise<boolean> {
    return this.resolve(jobId, ACTIVE_STATUSES, 'CANCELLED', { error: reason });
  }

  /**
   * Applies an already validated runner event. Status and `eventSeq` are
   * recorded before the first suspension point, so among racing events the
   * first one processed wins and a redelivery sees it at once.
   */
  async applyEvent(jobId: string, kind: WebhookEventKind, payload: unknown, eventSeq?: number): Promise<ApplyOutcome> {
    switch (kind) {
      case 'progress':
        return this.applyHeartbeat(jobId, eventSeq);
      case 'succeeded': {
        const won = await this.resolve(jobId, ['PROVISIONING', 'RUNNING'], 'SUCCEEDED', { output: payload }, eventSeq);
        return won ? 'applied' : 'race_lost';
      }
      case 'failed': {
        const won = await this.resolve(
          jobId,
          ['PROVISIONING', 'RUNNING'],
          'FAILED',
          { output: payload, error: describeFailure(payload) },
          eventSeq,
        );
        return won ? 'applied' : 'race_lost';
      }
    }
  }

  async handleDeadline(jobId: string): Promise<void> {
    const record = this.store.get(jobId);
    if (!record || isTerminal(record.status)) {
      return;
    }
    const expiresAt = Date.parse(record.expiresAt);
    if (this.now() < expiresAt) {
      this.scheduler.schedule(jobId, expiresAt);
      return;
    }
    const timedOut = await this.resolve(jobId, ACTIVE_STATUSES, 'TIMED_OUT', {
      error: new DeadlineExceeded(jobId, record.expiresAt).message,
    });
    if (timedOut) {
      logger.warn('job timed out', { jobId, expiresAt: record.expiresAt });
    }
  }

  /**
   * Startup sweep over jobs left non-terminal by a previous process. Call it
   * before accepting new work: jobs still being provisioned by this process
   * would be failed as interrupted.
   */
  async recover(): Promise<RecoverySummary> {
    const summary: RecoverySummary = { timedOut: 0, failed: 0, rearmed: 0 };
    const now = this.now();

    for (const record of this.store.listActive()) {
      const expiresAt = Date.parse(record.expiresAt);
      if (now >= expiresAt) {
        const resolved = await this.resolve(record.jobId, ACTIVE_STATUSES, 'TIMED_OUT', {
          error: new DeadlineExceeded(record.jobId, record.expiresAt).message,
        });
        if (resolved) {
          summary.timedOut += 1;
        }
      } else if (record.status === 'PENDING' || record.status === 'PROVISIONING') {
        const resolved = await this.resolve(record.jobId, [record.status], 'FAILED', { error: RESTART_MESSAGE });
        if (resolved) {
          summary.failed += 1;
        }
      } else {
        this.scheduler.schedule(record.jobId, expiresAt);
        summary.rearmed += 1;
      }
    }

    logger.info('startup sweep finished', { ...summary });
    return summary;
  }

  purgeExpired(): number {
    const cutoff = iso(this.now() - this.options.retentionHours * 60 * 60 * 1000);
    const purged = this.store.purgeFinishedBefore(cutoff);
    if (purged > 0) {
      logger.info('purged finished jobs', { purged, cutoff });
    }
    return purged;
  }

  /**
   * Stops intake and waits for every provisioning task, so the store can be
   * closed afterwards. Sandboxes still being created are released.
   */
  async shutdown(options: { cancelActiveJobs?: boolean } = {}): Promise<void> {
    this.stopped = true;
    this.scheduler.clearAll();
    if (options.cancelActiveJobs) {
      for (const record of this.store.listActive()) {
        await this.cancel(record.jobId, 'orchestrator shutting down');
      }
    }
    for (const controller of this.controllers.values()) {
      controller.abort();
    }
    await this.idle();
  }

  /** Resolves once every provisioning/launch task started so far has settled. */
  async idle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight]);
    }
  }

  private async run(record: JobRecord, signal: AbortSignal): Promise<void> {
    const { jobId } = record;
    const callbackUrl = this.callbackUrl(jobId);

    let handle: SandboxHandle;
    try {
      handle = await this.provisioner.provision(
        jobId,
        {
          task: record.task,
          codeRef: record.codeRef,
          callbackUrl,
          env: this.options.sandboxEnv ?? {},
          sandboxTimeoutMs: this.options.maxJobLifetimeSeconds * 1000,
        },
        signal,
      );
    } catch (err) {
      await this.resolve(jobId, ['PENDING'], 'FAILED', { error: this.stopped ? SHUTDOWN_MESSAGE : errorMessage(err) });
      return;
    }

    // Until the swap below the handle lives only here; every way out of this
    // block must release it.
    let recorded: boolean;
    try {
      recorded =
        !signal.aborted &&
        this.store.transition(jobId, ['PENDING'], 'PROVISIONING', { sandboxRef: handle.sandboxId });
    } catch (err) {
      await this.provisioner.teardown(handle);
      throw err;
    }
    if (!recorded) {
      logger.info('job resolved during provisioning, releasing sandbox', { jobId, sandboxId: handle.sandboxId });
      await this.provisioner.teardown(handle);
      if (this.stopped) {
        await this.resolve(jobId, ['PENDING'], 'FAILED', { error: SHUTDOWN_MESSAGE });
      }
      return;
    }

    try {
      await this.launcher.launch(handle, jobId, callbackUrl, record.callbackToken);
    } catch (err) {
      await this.resolve(jobId, ['PROVISIONING'], 'FAILED', { error: errorMessage(err) });
      return;
    }

    if (this.store.transition(jobId, ['PROVISIONING'], 'RUNNING')) {
      logger.info('job running', { jobId, sandboxId: handle.sandboxId });
    }
  }

  private applyHeartbeat(jobId: string, eventSeq?: number): ApplyOutcome {
    const record = this.store.get(jobId);
    if (!record || isTerminal(record.status)) {
      return 'race_lost';
    }
    const now = this.now();
    const window = this.options.heartbeatExtensionSeconds * 1000;
    const current = Date.parse(record.expiresAt);
    const proposed = this.options.heartbeatPolicy === 'extend' ? current + window : Math.max(current, now + window);
    const cap = Date.parse(record.createdAt) + this.options.maxJobLifetimeSeconds * 1000;
    const next = Math.max(current, Math.min(proposed, cap));

    if (next > current) {
      if (!this.store.extendExpiry(jobId, iso(next))) {
        return 'race_lost';
      }
      // Nothing is armed once shutdown has cleared the timers.
      if (this.scheduler.extend(jobId, next)) {
        logger.debug('deadline extended', { jobId, expiresAt: iso(next) });
      }
    }
    if (eventSeq !== undefined) {
      this.store.recordEventSeq(jobId, eventSeq);
    }
    return 'applied';
  }

  private async resolve(
    jobId: string,
    from: readonly JobStatus[],
    to: JobStatus,
    result: JobResult,
    eventSeq?: number,
  ): Promise<boolean> {
    if (!this.store.transition(jobId, from, to, { result, eventSeq })) {
      logger.debug('transition lost, job already resolved', { jobId, to });
      return false;
    }
    this.scheduler.clear(jobId);
    this.controllers.get(jobId)?.abort();
    logger.info('job finished', { jobId, status: to, error: result.error });

    const sandboxRef = this.store.claimTeardown(jobId);
    if (sandboxRef) {
      await this.provisioner.teardown({ sandboxId: sandboxRef });
    }
    return true;
  }
}
