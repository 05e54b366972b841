import { Sandbox } from 'e2b';

import { ProvisionError } from './errors.js';
import logger from './logger.js';
import { SandboxFile, SandboxHandle, SandboxProvider } from './types.js';

export interface E2bProviderOptions {
  apiKey?: string;
  template: string;
  runnerPort?: number;
}

/**
 * E2B micro-VM sandboxes. Instances created by this process are cached so the
 * injection and launch steps reuse the same connection.
 */
export class E2bSandboxProvider implements SandboxProvider {
  readonly name = 'e2b';
  private readonly apiKey?: string;
  private readonly template: string;
  private readonly runnerPort: number;
  private readonly sandboxes = new Map<string, Sandbox>();

  constructor(options: E2bProviderOptions) {
    this.apiKey = options.apiKey;
    this.template = options.template;
    this.runnerPort = options.runnerPort ?? 3000;
  }

  async createSandbox(opts: { jobId: string; timeoutMs: number; env: Record<string, string> }): Promise<SandboxHandle> {
    if (!this.apiKey) {
      throw new ProvisionError('E2B_API_KEY is required for sandbox provisioning', { transient: false });
    }
    const sandbox = await Sandbox.create(this.template, {
      apiKey: this.apiKey,
      timeoutMs: opts.timeoutMs,
      envs: opts.env,
      metadata: { jobId: opts.jobId },
    });
    this.sandboxes.set(sandbox.sandboxId, sandbox);
    logger.debug('e2b sandbox created', { jobId: opts.jobId, sandboxId: sandbox.sandboxId, template: this.template });
    return {
      sandboxId: sandbox.sandboxId,
      endpoint: `https://${sandbox.getHost(this.runnerPort)}`,
      createdAt: new Date().toISOString(),
    };
  }

  async writeFiles(sandboxId: string, files: SandboxFile[]): Promise<void> {
    const sandbox = await this.connect(sandboxId);
    for (const file of files) {
      await sandbox.files.write(file.path, file.data);
    }
  }

  async runCommand(sandboxId: string, command: string, opts: { cwd?: string; timeoutMs?: number } = {}): Promise<void> {
    const sandbox = await this.connect(sandboxId);
    await sandbox.commands.run(command, { cwd: opts.cwd, timeoutMs: opts.timeoutMs });
  }

  async startBackground(
    sandboxId: string,
    command: string,
    opts: { cwd?: string; env: Record<string, string> },
  ): Promise<void> {
    const sandbox = await this.connect(sandboxId);
    const handle = await sandbox.commands.run(command, {
      background: true,
      cwd: opts.cwd,
      envs: opts.env,
      // The runner is bounded by the sandbox lifetime, not by the command timeout.
      timeoutMs: 0,
    });
    // The process keeps running; only the event stream is dropped.
    await handle.disconnect();
  }

  async destroySandbox(sandboxId: string): Promise<void> {
    this.sandboxes.delete(sandboxId);
    const killed = await Sandbox.kill(sandboxId, { apiKey: this.apiKey });
    if (!killed) {
      logger.debug('e2b sandbox already gone', { sandboxId });
    }
  }

  private async connect(sandboxId: string): Promise<Sandbox> {
    const cached = this.sandboxes.get(sandboxId);
    if (cached) {
      return cached;
    }
    const sandbox = await Sandbox.connect(sandboxId, { apiKey: this.apiKey });
    this.sandboxes.set(sandboxId, sandbox);
    return sandbox;
  }
}
