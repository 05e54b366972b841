import express, { NextFunction, Request, RequestHandler, Response } from 'express';
import morgan from 'morgan';

import { parseCodeRef } from './codeRef.js';
import { AppError, NotFoundError, ValidationError } from './errors.js';
import logger from './logger.js';
import { JobOrchestrator } from './orchestrator.js';
import { WEBHOOK_EVENT_KINDS, WebhookEventKind } from './types.js';
import { WebhookReceiver } from './webhookReceiver.js';

export interface AppOptions {
  orchestrator: JobOrchestrator;
  receiver: WebhookReceiver;
  maxRuntimeLimitSeconds?: number;
}

function validateString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function isEventKind(value: unknown): value is WebhookEventKind {
  return typeof value === 'string' && WEBHOOK_EVENT_KINDS.some((kind) => kind === value);
}

// express 4 does not forward rejected promises to the error middleware.
function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function createApp(options: AppOptions) {
  const { orchestrator, receiver } = options;

  const app = express();
  if (process.env.NODE_ENV !== 'test') {
    app.use(morgan('combined'));
  }
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  app.post('/jobs', (req: Request, res: Response) => {
    const task = validateString(req.body?.task ?? req.body?.taskDescription);
    const repo = validateString(req.body?.repoUrl ?? req.body?.repoSlug);
    const branch = validateString(req.body?.branch);
    const codeRef = validateString(req.body?.codeRef) ?? (repo && branch ? `${repo}#${branch}` : repo);
    const rawRuntime: unknown = req.body?.maxRuntimeSeconds;

    if (!task || !codeRef) {
      throw new ValidationError('task e codeRef (ou repoUrl/repoSlug) são obrigatórios');
    }
    if (!parseCodeRef(codeRef)) {
      throw new ValidationError(`codeRef inválido: ${codeRef}`);
    }

    let maxRuntimeSeconds: number | undefined;
    if (rawRuntime !== undefined && rawRuntime !== null) {
      if (typeof rawRuntime !== 'number' || !Number.isFinite(rawRuntime) || rawRuntime <= 0) {
        throw new ValidationError('maxRuntimeSeconds must be a positive number');
      }
      if (options.maxRuntimeLimitSeconds !== undefined && rawRuntime > options.maxRuntimeLimitSeconds) {
        throw new ValidationError(`maxRuntimeSeconds must not exceed ${options.maxRuntimeLimitSeconds}`);
      }
      maxRuntimeSeconds = rawRuntime;
    }

    const { jobId } = orchestrator.submit({ task, codeRef, maxRuntimeSeconds });
    res.status(201).json({ jobId });
  });

  app.get('/jobs/:id', (req: Request, res: Response) => {
    const job = orchestrator.getJob(req.params.id);
    if (!job) {
      throw new NotFoundError();
    }
    res.json(job);
  });

  app.post(
    '/jobs/:id/cancel',
    asyncHandler(async (req, res) => {
      const jobId = req.params.id;
      if (!orchestrator.getJob(jobId)) {
        throw new NotFoundError();
      }
      const cancelled = await orchestrator.cancel(jobId, validateString(req.body?.reason));
      res.json({ jobId, cancelled, status: orchestrator.getJob(jobId)?.status });
    }),
  );

  app.post(
    '/webhooks/runner/:jobId',
    asyncHandler(async (req, res) => {
      const jobId = req.params.jobId;
      const bodyJobId: unknown = req.body?.jobId;
      const eventSeq: unknown = req.body?.eventSeq;
      const eventKind: unknown = req.body?.eventKind;
      const payload: unknown = req.body?.payload;

      if (bodyJobId !== undefined && bodyJobId !== jobId) {
        throw new ValidationError('jobId does not match the callback URL');
      }
      if (typeof eventSeq !== 'number' || !Number.isInteger(eventSeq) || eventSeq < 1) {
        throw new ValidationError('eventSeq must be a positive integer');
      }
      if (!isEventKind(eventKind)) {
        throw new ValidationError(`eventKind must be one of ${WEBHOOK_EVENT_KINDS.join(', ')}`);
      }

      const ack = await receiver.receive({
        jobId,
        eventSeq,
        eventKind,
        payload: payload ?? null,
        token: validateString(req.get('x-callback-token')),
      });
      res.json({ ack });
    }),
  );

  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof AppError) {
      res.status(err.statusCode).json({ error: err.message });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'invalid JSON body' });
      return;
    }
    logger.error('Unexpected error handling request', { path: req.path, method: req.method, error: err.message });
    res.status(500).json({ error: 'internal_error' });
  });

  return app;
}
