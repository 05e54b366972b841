import { timingSafeEqual } from 'node:crypto';

import { WebhookAuthError } from './errors.js';
import logger from './logger.js';
import { ApplyOutcome, JobStore, WebhookAck, WebhookEvent, WebhookEventKind, isTerminal } from './types.js';

/**
 * Applies an event. An `applied` outcome means `eventSeq` was recorded on the
 * job together with the change, before the returned promise first suspends.
 */
export interface EventSink {
  applyEvent(jobId: string, kind: WebhookEventKind, payload: unknown, eventSeq: number): Promise<ApplyOutcome>;
}

function tokensMatch(expected: string, provided: string | undefined): boolean {
  if (!provided) {
    return false;
  }
  const a = Buffer.from(expected);
  const b = Buffer.from(provided);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Filters runner callbacks before they reach the orchestrator. Redelivery of
 * the last accepted sequence number is a `duplicate`; anything aimed at an
 * unknown or finished job, or older than the last accepted event, is `stale`.
 * Neither is an error: delivery is retried by the sender. The sink records the
 * sequence number together with the change it applies.
 */
export class WebhookReceiver {
  private readonly store: JobStore;
  private readonly sink: EventSink;

  constructor(store: JobStore, sink: EventSink) {
    this.store = store;
    this.sink = sink;
  }

  async receive(event: WebhookEvent): Promise<WebhookAck> {
    const { jobId, eventSeq, eventKind } = event;
    const record = this.store.get(jobId);
    if (!record) {
      logger.debug('webhook for unknown job', { jobId, eventSeq });
      return 'stale';
    }
    if (!tokensMatch(record.callbackToken, event.token)) {
      logger.warn('webhook rejected: bad callback token', { jobId, eventSeq });
      throw new WebhookAuthError();
    }
    if (eventSeq > 0 && eventSeq === record.lastEventSeq) {
      return 'duplicate';
    }
    if (isTerminal(record.status) || eventSeq < record.lastEventSeq) {
      logger.debug('stale webhook dropped', { jobId, eventSeq, eventKind, status: record.status });
      return 'stale';
    }

    const outcome = await this.sink.applyEvent(jobId, eventKind, event.payload, eventSeq);
    if (outcome === 'race_lost') {
      return 'stale';
    }
    logger.info('webhook accepted', { jobId, eventSeq, eventKind });
    return 'accepted';
  }
}
