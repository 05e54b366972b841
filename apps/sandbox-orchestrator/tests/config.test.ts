import test from 'node:test';
import assert from 'node:assert/strict';

import { parseCodeRef, shellQuote } from '../src/codeRef.js';
import { collectForwardedEnv, loadConfig } from '../src/config.js';

test('loadConfig falls back to defaults', () => {
  const config = loadConfig({});
  assert.equal(config.port, 4000);
  assert.equal(config.publicBaseUrl, 'http://localhost:4000');
  assert.equal(config.dbPath, 'jobs.db');
  assert.equal(config.defaultMaxRuntimeSeconds, 1800);
  assert.equal(config.provisionMaxAttempts, 3);
  assert.equal(config.provisionBackoffMs, 1000);
  assert.equal(config.heartbeatExtensionSeconds, 300);
  assert.equal(config.heartbeatPolicy, 'reset');
  assert.equal(config.maxJobLifetimeSeconds, 14400);
  assert.equal(config.retentionHours, 72);
  assert.equal(config.cancelJobsOnShutdown, false);
  assert.equal(config.e2bApiKey, undefined);
  assert.equal(config.e2bTemplate, 'base');
  assert.equal(config.runnerCommand, 'node /opt/agent-runner/runner.mjs');
  assert.ok(config.forwardEnvKeys.includes('ANTHROPIC_API_KEY'));
});

test('loadConfig reads overrides from the environment', () => {
  const config = loadConfig({
    PORT: '8080',
    PUBLIC_BASE_URL: 'https://orchestrator.example.com/',
    HEARTBEAT_POLICY: 'extend',
    CANCEL_JOBS_ON_SHUTDOWN: 'true',
    E2B_API_KEY: 'test-key',
    SANDBOX_FORWARD_ENV: 'FOO, BAR,,',
  });
  assert.equal(config.port, 8080);
  assert.equal(config.publicBaseUrl, 'https://orchestrator.example.com');
  assert.equal(config.heartbeatPolicy, 'extend');
  assert.equal(config.cancelJobsOnShutdown, true);
  assert.equal(config.e2bApiKey, 'test-key');
  assert.deepEqual(config.forwardEnvKeys, ['FOO', 'BAR']);
});

test('loadConfig ignores unusable numbers', () => {
  const config = loadConfig({
    DEFAULT_MAX_RUNTIME_SECONDS: 'soon',
    PROVISION_BACKOFF_MS: '-5',
    PROVISION_MAX_ATTEMPTS: '2.7',
    HEARTBEAT_POLICY: 'sometimes',
  });
  assert.equal(config.defaultMaxRuntimeSeconds, 1800);
  assert.equal(config.provisionBackoffMs, 1000);
  assert.equal(config.provisionMaxAttempts, 2);
  assert.equal(config.heartbeatPolicy, 'reset');
});

test('collectForwardedEnv keeps only keys that are set', () => {
  const forwarded = collectForwardedEnv(['ANTHROPIC_API_KEY', 'AWS_REGION', 'CLOUD_ML_REGION'], {
    ANTHROPIC_API_KEY: 'test-secret',
    AWS_REGION: '',
    PATH: '/usr/bin',
  });
  assert.deepEqual(forwarded, { ANTHROPIC_API_KEY: 'test-secret' });
});

test('parseCodeRef expands repository slugs', () => {
  assert.deepEqual(parseCodeRef('acme/widgets'), { repoUrl: 'https://github.com/acme/widgets.git' });
  assert.deepEqual(parseCodeRef('acme/widgets#main'), { repoUrl: 'https://github.com/acme/widgets.git', ref: 'main' });
  assert.deepEqual(parseCodeRef('acme/widgets#'), { repoUrl: 'https://github.com/acme/widgets.git' });
});

test('parseCodeRef accepts git urls with an optional ref', () => {
  assert.deepEqual(parseCodeRef('https://git.example.com/team/app.git#release/1.2'), {
    repoUrl: 'https://git.example.com/team/app.git',
    ref: 'release/1.2',
  });
  assert.deepEqual(parseCodeRef('git@github.com:acme/widgets.git'), { repoUrl: 'git@github.com:acme/widgets.git' });
  assert.deepEqual(parseCodeRef('file:///srv/repos/app'), { repoUrl: 'file:///srv/repos/app' });
});

test('parseCodeRef rejects anything else', () => {
  assert.equal(parseCodeRef('not a repo'), undefined);
  assert.equal(parseCodeRef('widgets'), undefined);
  assert.equal(parseCodeRef('https://example.com/a b.git'), undefined);
});

test('shellQuote escapes single quotes', () => {
  assert.equal(shellQuote('main'), `'main'`);
  assert.equal(shellQuote("it's"), `'it'\\''s'`);
});
