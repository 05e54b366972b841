import { OrchestratorConfig, collectForwardedEnv } from './config.js';
import { E2bSandboxProvider } from './e2bProvider.js';
import { JobOrchestrator } from './orchestrator.js';
import { SandboxProvisioner } from './provisioner.js';
import { RunnerLauncher } from './runnerLauncher.js';
import { createApp } from './server.js';
import { SqliteJobStore } from './sqliteJobStore.js';
import { JobStore, SandboxProvider } from './types.js';
import { WebhookReceiver } from './webhookReceiver.js';

export interface ServiceOverrides {
  store?: JobStore;
  provider?: SandboxProvider;
  env?: NodeJS.ProcessEnv;
  now?: () => number;
}

export function createService(config: OrchestratorConfig, overrides: ServiceOverrides = {}) {
  const store = overrides.store ?? new SqliteJobStore(config.dbPath);
  const provider =
    overrides.provider ?? new E2bSandboxProvider({ apiKey: config.e2bApiKey, template: config.e2bTemplate });

  const provisioner = new SandboxProvisioner(provider, {
    maxAttempts: config.provisionMaxAttempts,
    backoffMs: config.provisionBackoffMs,
    attemptTimeoutMs: config.provisionTimeoutMs,
  });
  const launcher = new RunnerLauncher(provider, config.runnerCommand);

  const orchestrator = new JobOrchestrator({
    store,
    provisioner,
    launcher,
    publicBaseUrl: config.publicBaseUrl,
    defaultMaxRuntimeSeconds: config.defaultMaxRuntimeSeconds,
    heartbeatExtensionSeconds: config.heartbeatExtensionSeconds,
    heartbeatPolicy: config.heartbeatPolicy,
    maxJobLifetimeSeconds: config.maxJobLifetimeSeconds,
    retentionHours: config.retentionHours,
    sandboxEnv: collectForwardedEnv(config.forwardEnvKeys, overrides.env),
    now: overrides.now,
  });
  const receiver = new WebhookReceiver(store, orchestrator);
  const app = createApp({ orchestrator, receiver, maxRuntimeLimitSeconds: config.maxJobLifetimeSeconds });

  return { app, store, orchestrator, receiver, provider };
}
