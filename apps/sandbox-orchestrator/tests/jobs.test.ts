import test from 'node:test';
import assert from 'node:assert/strict';
import request from 'supertest';

import { createHarness } from './helpers.js';

test('reports health', async () => {
  const { app } = createHarness();
  const response = await request(app).get('/health').expect(200);
  assert.deepEqual(response.body, { status: 'ok' });
});

test('accepts a job request and runs it asynchronously', async () => {
  const { app, orchestrator, provider } = createHarness();

  const creation = await request(app)
    .post('/jobs')
    .send({ task: 'fix failing tests', codeRef: 'acme/widgets#main' })
    .expect(201);
  const jobId: string = creation.body.jobId;
  assert.equal(typeof jobId, 'string');
  assert.deepEqual(Object.keys(creation.body), ['jobId']);

  await orchestrator.idle();
  const status = await request(app).get(`/jobs/${jobId}`).expect(200);
  assert.equal(status.body.jobId, jobId);
  assert.equal(status.body.status, 'RUNNING');
  assert.equal(status.body.result, undefined);
  assert.equal(typeof status.body.deadlineAt, 'string');
  assert.equal(provider.started[0].env.CALLBACK_URL, `http://orchestrator.test/webhooks/runner/${jobId}`);
  await orchestrator.shutdown();
});

test('accepts a repository url with a branch', async () => {
  const { app, orchestrator, provider } = createHarness();

  await request(app)
    .post('/jobs')
    .send({
      repoUrl: 'https://github.com/example/repo.git',
      branch: 'develop',
      taskDescription: 'refactor the payment module',
    })
    .expect(201);
  await orchestrator.idle();

  assert.equal(
    provider.commands[0].command,
    "git clone --depth 1 --branch 'develop' 'https://github.com/example/repo.git' /home/user/workspace",
  );
  await orchestrator.shutdown();
});

test('rejects invalid payload', async () => {
  const { app } = createHarness();
  const response = await request(app).post('/jobs').send({}).expect(400);
  assert.equal(response.body.error, 'task e codeRef (ou repoUrl/repoSlug) são obrigatórios');
});

test('rejects an unusable code reference', async () => {
  const { app } = createHarness();
  const response = await request(app).post('/jobs').send({ task: 'noop', codeRef: 'not a repo' }).expect(400);
  assert.equal(response.body.error, 'codeRef inválido: not a repo');
});

test('validates maxRuntimeSeconds', async () => {
  const { app } = createHarness();
  const body = { task: 'noop', codeRef: 'acme/widgets' };

  const negative = await request(app)
    .post('/jobs')
    .send({ ...body, maxRuntimeSeconds: -1 })
    .expect(400);
  assert.equal(negative.body.error, 'maxRuntimeSeconds must be a positive number');

  const tooLong = await request(app)
    .post('/jobs')
    .send({ ...body, maxRuntimeSeconds: 20_000 })
    .expect(400);
  assert.equal(tooLong.body.error, 'maxRuntimeSeconds must not exceed 14400');
});

test('rejects malformed JSON', async () => {
  const { app } = createHarness();
  const response = await request(app)
    .post('/jobs')
    .set('Content-Type', 'application/json')
    .send('{"task":')
    .expect(400);
  assert.equal(response.body.error, 'invalid JSON body');
});

test('returns 404 for an unknown job', async () => {
  const { app } = createHarness();
  const response = await request(app).get('/jobs/job-missing').expect(404);
  assert.deepEqual(response.body, { error: 'job not found' });
  await request(app).post('/jobs/job-missing/cancel').expect(404);
});

test('a runner callback completes the job', async () => {
  const { app, orchestrator, provider, store } = createHarness();
  const creation = await request(app).post('/jobs').send({ task: 'bump deps', codeRef: 'acme/widgets' }).expect(201);
  const jobId: string = creation.body.jobId;
  await orchestrator.idle();
  const token = store.get(jobId)?.callbackToken ?? '';

  const event = { jobId, eventSeq: 1, eventKind: 'succeeded', payload: { summary: 'tests pass' } };
  const first = await request(app)
    .post(`/webhooks/runner/${jobId}`)
    .set('x-callback-token', token)
    .send(event)
    .expect(200);
  assert.deepEqual(first.body, { ack: 'accepted' });

  const status = await request(app).get(`/jobs/${jobId}`).expect(200);
  assert.equal(status.body.status, 'SUCCEEDED');
  assert.deepEqual(status.body.result, { summary: 'tests pass' });
  assert.deepEqual(provider.destroyed, ['sbx-1']);

  const again = await request(app)
    .post(`/webhooks/runner/${jobId}`)
    .set('x-callback-token', token)
    .send(event)
    .expect(200);
  assert.deepEqual(again.body, { ack: 'duplicate' });
});

test('rejects callbacks without the job token', async () => {
  const { app, orchestrator } = createHarness();
  const creation = await request(app).post('/jobs').send({ task: 'bump deps', codeRef: 'acme/widgets' }).expect(201);
  const jobId: string = creation.body.jobId;
  await orchestrator.idle();

  const response = await request(app)
    .post(`/webhooks/runner/${jobId}`)
    .set('x-callback-token', 'test-wrong-token')
    .send({ eventSeq: 1, eventKind: 'succeeded', payload: null })
    .expect(401);
  assert.deepEqual(response.body, { error: 'invalid callback token' });
  assert.equal(orchestrator.getJob(jobId)?.status, 'RUNNING');
  await orchestrator.shutdown();
});

test('rejects malformed callbacks', async () => {
  const { app } = createHarness();
  const url = '/webhooks/runner/job-1';

  const badSeq = await request(app).post(url).send({ eventSeq: 0, eventKind: 'progress' }).expect(400);
  assert.equal(badSeq.body.error, 'eventSeq must be a positive integer');

  const badKind = await request(app).post(url).send({ eventSeq: 1, eventKind: 'done' }).expect(400);
  assert.equal(badKind.body.error, 'eventKind must be one of progress, succeeded, failed');

  const mismatch = await request(app).post(url).send({ jobId: 'job-2', eventSeq: 1, eventKind: 'progress' }).expect(400);
  assert.equal(mismatch.body.error, 'jobId does not match the callback URL');
});

test('callbacks for unknown jobs are acknowledged as stale', async () => {
  const { app } = createHarness();
  const response = await request(app)
    .post('/webhooks/runner/job-gone')
    .set('x-callback-token', 'test-token')
    .send({ eventSeq: 4, eventKind: 'failed', payload: 'boom' })
    .expect(200);
  assert.deepEqual(response.body, { ack: 'stale' });
});

test('cancels a running job', async () => {
  const { app, orchestrator, provider } = createHarness();
  const creation = await request(app).post('/jobs').send({ task: 'bump deps', codeRef: 'acme/widgets' }).expect(201);
  const jobId: string = creation.body.jobId;
  await orchestrator.idle();

  const first = await request(app).post(`/jobs/${jobId}/cancel`).send({ reason: 'no longer needed' }).expect(200);
  assert.deepEqual(first.body, { jobId, cancelled: true, status: 'CANCELLED' });
  assert.deepEqual(provider.destroyed, ['sbx-1']);

  const second = await request(app).post(`/jobs/${jobId}/cancel`).expect(200);
  assert.deepEqual(second.body, { jobId, cancelled: false, status: 'CANCELLED' });

  const status = await request(app).get(`/jobs/${jobId}`).expect(200);
  assert.equal(status.body.error, 'no longer needed');
});
