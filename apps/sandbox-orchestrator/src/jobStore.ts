import { JobRecord, JobStatus, JobStore, NewJob, TransitionChanges, isTerminal } from './types.js';

/**
 * Map-backed store. Every method runs to completion without awaiting, so each
 * call is atomic with respect to the other async tasks of the process.
 */
export class MemoryJobStore implements JobStore {
  private readonly jobs: Map<string, JobRecord>;

  constructor(jobs = new Map<string, JobRecord>()) {
    this.jobs = jobs;
  }

  create(job: NewJob): JobRecord {
    if (this.jobs.has(job.jobId)) {
      throw new Error(`job ${job.jobId} already exists`);
    }
    const record: JobRecord = {
      ...job,
      status: 'PENDING',
      sandboxRef: null,
      result: null,
      lastEventSeq: 0,
      updatedAt: job.createdAt,
      expiresAt: job.deadlineAt,
    };
    this.jobs.set(job.jobId, record);
    return structuredClone(record);
  }

  get(jobId: string): JobRecord | undefined {
    const record = this.jobs.get(jobId);
    return record ? structuredClone(record) : undefined;
  }

  transition(jobId: string, from: readonly JobStatus[], to: JobStatus, changes: TransitionChanges = {}): boolean {
    const record = this.jobs.get(jobId);
    if (!record || !from.includes(record.status)) {
      return false;
    }
    record.status = to;
    record.updatedAt = new Date().toISOString();
    if (changes.sandboxRef !== undefined) {
      record.sandboxRef = changes.sandboxRef;
    }
    if (changes.result !== undefined && isTerminal(to) && record.result === null) {
      record.result = structuredClone(changes.result);
    }
    if (changes.eventSeq !== undefined && changes.eventSeq > record.lastEventSeq) {
      record.lastEventSeq = changes.eventSeq;
    }
    return true;
  }

  claimTeardown(jobId: string): string | null {
    const record = this.jobs.get(jobId);
    if (!record || record.sandboxRef === null) {
      return null;
    }
    const sandboxRef = record.sandboxRef;
    record.sandboxRef = null;
    record.updatedAt = new Date().toISOString();
    return sandboxRef;
  }

  recordEventSeq(jobId: string, seq: number): boolean {
    const record = this.jobs.get(jobId);
    if (!record || seq <= record.lastEventSeq) {
      return false;
    }
    record.lastEventSeq = seq;
    return true;
  }

  extendExpiry(jobId: string, expiresAt: string): boolean {
    const record = this.jobs.get(jobId);
    if (!record || isTerminal(record.status)) {
      return false;
    }
    record.expiresAt = expiresAt;
    return true;
  }

  listActive(): JobRecord[] {
    return [...this.jobs.values()]
      .filter((record) => !isTerminal(record.status))
      .map((record) => structuredClone(record));
  }

  purgeFinishedBefore(cutoff: string): number {
    const limit = Date.parse(cutoff);
    let purged = 0;
    for (const [jobId, record] of this.jobs) {
      if (isTerminal(record.status) && Date.parse(record.updatedAt) < limit) {
        this.jobs.delete(jobId);
        purged += 1;
      }
    }
    return purged;
  }
}
