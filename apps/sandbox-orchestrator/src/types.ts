export type JobStatus =
  | 'PENDING'
  | 'PROVISIONING'
  | 'RUNNING'
  | 'SUCCEEDED'
  | 'FAILED'
  | 'TIMED_OUT'
  | 'CANCELLED';

export const TERMINAL_STATUSES: readonly JobStatus[] = ['SUCCEEDED', 'FAILED', 'TIMED_OUT', 'CANCELLED'];
export const ACTIVE_STATUSES: readonly JobStatus[] = ['PENDING', 'PROVISIONING', 'RUNNING'];

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export interface JobResult {
  output?: unknown;
  error?: string;
}

export interface JobRecord {
  jobId: string;
  task: string;
  codeRef: string;
  status: JobStatus;
  sandboxRef: string | null;
  result: JobResult | null;
  lastEventSeq: number;
  callbackToken: string;
  maxRuntimeSeconds: number;
  createdAt: string;
  updatedAt: string;
  deadlineAt: string;
  expiresAt: string;
}

export interface NewJob {
  jobId: string;
  task: string;
  codeRef: string;
  callbackToken: string;
  maxRuntimeSeconds: number;
  createdAt: string;
  deadlineAt: string;
}

export interface TransitionChanges {
  sandboxRef?: string;
  result?: JobResult;
  /** Sequence number of the event that caused the change; only moves forward. */
  eventSeq?: number;
}

/**
 * Keyed job storage. `transition` is the only way status, result and
 * sandboxRef change; it succeeds only when the current status is one of
 * `from` and reports a lost race by returning false.
 */
export interface JobStore {
  create(job: NewJob): JobRecord;
  get(jobId: string): JobRecord | undefined;
  transition(jobId: string, from: readonly JobStatus[], to: JobStatus, changes?: TransitionChanges): boolean;
  /** Clears sandboxRef and hands the previous value to exactly one caller. */
  claimTeardown(jobId: string): string | null;
  recordEventSeq(jobId: string, seq: number): boolean;
  extendExpiry(jobId: string, expiresAt: string): boolean;
  listActive(): JobRecord[];
  purgeFinishedBefore(cutoff: string): number;
  close?(): void;
}

export interface JobSubmission {
  task: string;
  codeRef: string;
  maxRuntimeSeconds?: number;
}

export interface JobView {
  jobId: string;
  status: JobStatus;
  result?: unknown;
  error?: string;
  createdAt: string;
  updatedAt: string;
  deadlineAt: string;
}

export interface SandboxHandle {
  sandboxId: string;
  endpoint: string;
  createdAt: string;
}

export interface ProvisionPayload {
  task: string;
  codeRef: string;
  callbackUrl: string;
  env: Record<string, string>;
  sandboxTimeoutMs: number;
}

export interface SandboxFile {
  path: string;
  data: string;
}

/** Boundary to the remote sandbox service. */
export interface SandboxProvider {
  readonly name: string;
  createSandbox(opts: { jobId: string; timeoutMs: number; env: Record<string, string> }): Promise<SandboxHandle>;
  writeFiles(sandboxId: string, files: SandboxFile[]): Promise<void>;
  runCommand(sandboxId: string, command: string, opts?: { cwd?: string; timeoutMs?: number }): Promise<void>;
  /** Starts a command and returns once it is running; does not wait for exit. */
  startBackground(sandboxId: string, command: string, opts: { cwd?: string; env: Record<string, string> }): Promise<void>;
  destroySandbox(sandboxId: string): Promise<void>;
}

export type WebhookEventKind = 'progress' | 'succeeded' | 'failed';

export const WEBHOOK_EVENT_KINDS: readonly WebhookEventKind[] = ['progress', 'succeeded', 'failed'];

export interface WebhookEvent {
  jobId: string;
  eventSeq: number;
  eventKind: WebhookEventKind;
  payload: unknown;
  token?: string;
}

export type WebhookAck = 'accepted' | 'duplicate' | 'stale';

export type ApplyOutcome = 'applied' | 'race_lost';
