export type HeartbeatPolicy = 'reset' | 'extend';

export interface OrchestratorConfig {
  port: number;
  publicBaseUrl: string;
  dbPath: string;
  defaultMaxRuntimeSeconds: number;
  provisionMaxAttempts: number;
  provisionBackoffMs: number;
  provisionTimeoutMs: number;
  heartbeatExtensionSeconds: number;
  heartbeatPolicy: HeartbeatPolicy;
  maxJobLifetimeSeconds: number;
  retentionHours: number;
  cancelJobsOnShutdown: boolean;
  e2bApiKey?: string;
  e2bTemplate: string;
  runnerCommand: string;
  forwardEnvKeys: string[];
}

// Provider credentials forwarded into the sandbox when set on the host.
const DEFAULT_FORWARD_ENV = [
  'ANTHROPIC_API_KEY',
  'ANTHROPIC_BASE_URL',
  'ANTHROPIC_AUTH_TOKEN',
  'CLAUDE_CODE_USE_BEDROCK',
  'AWS_REGION',
  'AWS_ACCESS_KEY_ID',
  'AWS_SECRET_ACCESS_KEY',
  'AWS_SESSION_TOKEN',
  'CLAUDE_CODE_USE_VERTEX',
  'CLOUD_ML_REGION',
  'ANTHROPIC_VERTEX_PROJECT_ID',
];

function validateString(value: string | undefined): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function positiveNumber(value: string | undefined, fallback: number): number {
  const raw = validateString(value);
  if (!raw) {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function splitCsv(value: string | undefined): string[] | undefined {
  const raw = validateString(value);
  if (!raw) {
    return undefined;
  }
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): OrchestratorConfig {
  const port = Math.floor(positiveNumber(env.PORT, 4000));
  return {
    port,
    publicBaseUrl: (validateString(env.PUBLIC_BASE_URL) ?? `http://localhost:${port}`).replace(/\/+$/, ''),
    dbPath: validateString(env.JOBS_DB_PATH) ?? 'jobs.db',
    defaultMaxRuntimeSeconds: positiveNumber(env.DEFAULT_MAX_RUNTIME_SECONDS, 1800),
    provisionMaxAttempts: Math.floor(positiveNumber(env.PROVISION_MAX_ATTEMPTS, 3)),
    provisionBackoffMs: positiveNumber(env.PROVISION_BACKOFF_MS, 1000),
    provisionTimeoutMs: positiveNumber(env.PROVISION_TIMEOUT_MS, 120_000),
    heartbeatExtensionSeconds: positiveNumber(env.HEARTBEAT_EXTENSION_SECONDS, 300),
    heartbeatPolicy: env.HEARTBEAT_POLICY === 'extend' ? 'extend' : 'reset',
    maxJobLifetimeSeconds: positiveNumber(env.MAX_JOB_LIFETIME_SECONDS, 4 * 60 * 60),
    retentionHours: positiveNumber(env.JOB_RETENTION_HOURS, 72),
    cancelJobsOnShutdown: (env.CANCEL_JOBS_ON_SHUTDOWN || 'false') === 'true',
    e2bApiKey: validateString(env.E2B_API_KEY),
    e2bTemplate: validateString(env.E2B_TEMPLATE) ?? 'base',
    runnerCommand: validateString(env.RUNNER_COMMAND) ?? 'node /opt/agent-runner/runner.mjs',
    forwardEnvKeys: splitCsv(env.SANDBOX_FORWARD_ENV) ?? DEFAULT_FORWARD_ENV,
  };
}

/** Picks the forwarded keys that are actually set in `env`. */
export function collectForwardedEnv(keys: string[], env: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const forwarded: Record<string, string> = {};
  for (const key of keys) {
    const value = env[key];
    if (value) {
      forwarded[key] = value;
    }
  }
  return forwarded;
}
