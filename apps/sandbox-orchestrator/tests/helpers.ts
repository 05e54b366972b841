import { setTimeout as sleep } from 'node:timers/promises';

import { OrchestratorConfig, loadConfig } from '../src/config.js';
import { MemoryJobStore } from '../src/jobStore.js';
import { ServiceOverrides, createService } from '../src/service.js';
import { JobStore, NewJob, SandboxFile, SandboxHandle, SandboxProvider } from '../src/types.js';

export const TEST_BASE_URL = 'http://orchestrator.test';

interface CreateRequest {
  jobId: string;
  timeoutMs: number;
  env: Record<string, string>;
}

interface StartedCommand {
  sandboxId: string;
  command: string;
  cwd?: string;
  env: Record<string, string>;
}

/** In-process stand-in for the sandbox service, with scripted failures. */
export class FakeSandboxProvider implements SandboxProvider {
  readonly name = 'fake';
  readonly createRequests: CreateRequest[] = [];
  readonly created: string[] = [];
  readonly files = new Map<string, SandboxFile[]>();
  readonly commands: Array<{ sandboxId: string; command: string }> = [];
  readonly started: StartedCommand[] = [];
  readonly destroyCalls: string[] = [];
  readonly destroyed: string[] = [];

  /** Errors thrown by successive createSandbox calls, consumed in order. */
  createFailures: Error[] = [];
  createDelayMs = 0;
  createGate?: Promise<void>;
  destroyGate?: Promise<void>;
  commandFailure?: Error;
  launchFailure?: Error;
  destroyFailure?: Error;

  private counter = 0;

  async createSandbox(opts: CreateRequest): Promise<SandboxHandle> {
    this.createRequests.push(opts);
    if (this.createGate) {
      await this.createGate;
    }
    if (this.createDelayMs > 0) {
      await sleep(this.createDelayMs);
    }
    const failure = this.createFailures.shift();
    if (failure) {
      throw failure;
    }
    this.counter += 1;
    const sandboxId = `sbx-${this.counter}`;
    this.created.push(sandboxId);
    return { sandboxId, endpoint: `https://3000-${sandboxId}.sandbox.test`, createdAt: new Date().toISOString() };
  }

  async writeFiles(sandboxId: string, files: SandboxFile[]): Promise<void> {
    this.files.set(sandboxId, [...(this.files.get(sandboxId) ?? []), ...files]);
  }

  async runCommand(sandboxId: string, command: string): Promise<void> {
    this.commands.push({ sandboxId, command });
    if (this.commandFailure) {
      throw this.commandFailure;
    }
  }

  async startBackground(
    sandboxId: string,
    command: string,
    opts: { cwd?: string; env: Record<string, string> },
  ): Promise<void> {
    if (this.launchFailure) {
      throw this.launchFailure;
    }
    this.started.push({ sandboxId, command, cwd: opts.cwd, env: opts.env });
  }

  async destroySandbox(sandboxId: string): Promise<void> {
    this.destroyCalls.push(sandboxId);
    if (this.destroyGate) {
      await this.destroyGate;
    }
    if (this.destroyFailure) {
      throw this.destroyFailure;
    }
    this.destroyed.push(sandboxId);
  }
}

export function testConfig(env: NodeJS.ProcessEnv = {}): OrchestratorConfig {
  return loadConfig({
    PUBLIC_BASE_URL: TEST_BASE_URL,
    PROVISION_BACKOFF_MS: '1',
    PROVISION_TIMEOUT_MS: '1000',
    ...env,
  });
}

export function createHarness(env: NodeJS.ProcessEnv = {}, overrides: Omit<ServiceOverrides, 'provider'> = {}) {
  const provider = new FakeSandboxProvider();
  const config = testConfig(env);
  const service = createService(config, { store: new MemoryJobStore(), env: {}, ...overrides, provider });
  return { ...service, provider, config };
}

export function newJob(jobId: string, overrides: Partial<NewJob> = {}): NewJob {
  const createdAt = Date.now();
  return {
    jobId,
    task: 'make the test suite pass',
    codeRef: 'acme/widgets',
    callbackToken: 'test-token',
    maxRuntimeSeconds: 600,
    createdAt: new Date(createdAt).toISOString(),
    deadlineAt: new Date(createdAt + 600_000).toISOString(),
    ...overrides,
  };
}

/** Seeds a job and walks it to RUNNING with the given sandbox. */
export function seedRunning(store: JobStore, job: NewJob, sandboxRef = 'sbx-seeded'): void {
  store.create(job);
  store.transition(job.jobId, ['PENDING'], 'PROVISIONING', { sandboxRef });
  store.transition(job.jobId, ['PROVISIONING'], 'RUNNING');
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

export async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const started = Date.now();
  while (!predicate()) {
    if (Date.now() - started > timeoutMs) {
      throw new Error(`condition not met within ${timeoutMs}ms`);
    }
    await sleep(5);
  }
}
