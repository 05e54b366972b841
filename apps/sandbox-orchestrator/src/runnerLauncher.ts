import { LaunchError, errorMessage } from './errors.js';
import logger from './logger.js';
import { WORKSPACE_DIR } from './provisioner.js';
import { SandboxHandle, SandboxProvider } from './types.js';

export class RunnerLauncher {
  private readonly provider: SandboxProvider;
  private readonly command: string;

  constructor(provider: SandboxProvider, command: string) {
    this.provider = provider;
    this.command = command;
  }

  /**
   * Starts the runner detached. Resolves once the process is started; the
   * outcome of the run only ever arrives through the webhook.
   */
  async launch(handle: SandboxHandle, jobId: string, callbackUrl: string, callbackToken: string): Promise<void> {
    try {
      await this.provider.startBackground(handle.sandboxId, this.command, {
        cwd: WORKSPACE_DIR,
        env: {
          JOB_ID: jobId,
          CALLBACK_URL: callbackUrl,
          CALLBACK_TOKEN: callbackToken,
        },
      });
    } catch (err) {
      throw new LaunchError(`runner launch failed in sandbox ${handle.sandboxId}: ${errorMessage(err)}`, { cause: err });
    }
    logger.info('runner launched', { jobId, sandboxId: handle.sandboxId });
  }
}
