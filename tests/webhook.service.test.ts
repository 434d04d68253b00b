import assert from 'node:assert/strict';
import { rmSync } from 'node:fs';
import { afterEach, beforeEach, describe, test } from 'node:test';

import { JobFileStore } from '../src/jobs/storage/job-store';
import { signPayload } from '../src/webhook/signature';
import { statusMessage, WebhookService } from '../src/webhook/webhook.service';
import type { InboundWebhook } from '../src/webhook/webhook.types';
import { ALLOWED_USER, createStore, FakeCodeHosting, jobInput, tempDir, TEST_SECRET, testConfig } from './helpers';

function commentPayload(body: string, overrides: Record<string, unknown> = {}) {
  return {
    action: 'created',
    issue: { number: 7, pull_request: { url: 'https://api.github.com/repos/acme/widgets/pulls/7' } },
    comment: { id: 5001, body },
    repository: { full_name: 'acme/widgets' },
    sender: { login: ALLOWED_USER },
    ...overrides,
  };
}

function delivery(payload: unknown, eventName = 'issue_comment', secret = TEST_SECRET): InboundWebhook {
  const rawBody = Buffer.from(JSON.stringify(payload));
  return { eventName, signature: signPayload(rawBody, secret), deliveryId: 'delivery-1', rawBody };
}

describe('WebhookService', () => {
  let stateRoot: string;
  let store: JobFileStore;
  let hosting: FakeCodeHosting;
  let service: WebhookService;

  beforeEach(async () => {
    stateRoot = tempDir('pr-relay-webhook-');
    store = await createStore(stateRoot);
    hosting = new FakeCodeHosting();
    hosting.branches['acme/widgets#7'] = 'feature/widgets';
    service = new WebhookService(store, hosting, testConfig(stateRoot));
  });

  afterEach(() => {
    rmSync(stateRoot, { recursive: true, force: true });
  });

  test('queues an action command on the pull request head branch', async () => {
    const outcome = await service.handle(delivery(commentPayload('[action] go')));

    assert.deepEqual(outcome, { kind: 'queued', jobId: 1, position: 1 });
    const job = await store.byTrigger('5001');
    assert.equal(job?.status, 'pending');
    assert.equal(job?.command, 'action');
    assert.equal(job?.branch, 'feature/widgets');
    assert.equal(job?.prNumber, 7);
  });

  test('reports the queue position behind pending jobs', async () => {
    await store.create(jobInput('1'));
    await store.create(jobInput('2'));

    const outcome = await service.handle(delivery(commentPayload('[fix]')));
    assert.deepEqual(outcome, { kind: 'queued', jobId: 3, position: 3 });
  });

  test('rejects a bad signature without touching the store', async () => {
    const outcome = await service.handle(delivery(commentPayload('[action]'), 'issue_comment', 'wrong-secret'));

    assert.deepEqual(outcome, { kind: 'unauthenticated' });
    assert.equal(await store.queueLength(), 0);
  });

  test('rejects a signed body that is not JSON', async () => {
    const rawBody = Buffer.from('not json');
    const outcome = await service.handle({
      eventName: 'issue_comment',
      signature: signPayload(rawBody, TEST_SECRET),
      deliveryId: undefined,
      rawBody,
    });
    assert.equal(outcome.kind, 'malformed');
  });

  test('rejects an issue_comment body with the wrong shape', async () => {
    const outcome = await service.handle(delivery({ action: 'created', issue: {} }));
    assert.equal(outcome.kind, 'malformed');
  });

  test('ignores a comment from another user without creating a job', async () => {
    const outcome = await service.handle(delivery(commentPayload('[action]', { sender: { login: 'intruder' } })));

    assert.deepEqual(outcome, { kind: 'ignored', reason: 'sender_not_allowed' });
    assert.equal(await store.byTrigger('5001'), null);
  });

  test('ignores other events', async () => {
    const outcome = await service.handle(delivery({ zen: 'Keep it logically awesome.' }, 'ping'));
    assert.deepEqual(outcome, { kind: 'ignored', reason: 'unsupported_event' });
  });

  test('answers status for an empty queue', async () => {
    const outcome = await service.handle(delivery(commentPayload('[status]')));
    assert.deepEqual(outcome, { kind: 'status', queueLength: 0, message: 'Queue is empty.' });
  });

  test('answers status with the pending count and creates no job', async () => {
    await store.create(jobInput('1'));
    await store.create(jobInput('2'));
    await store.create(jobInput('3'));

    const outcome = await service.handle(delivery(commentPayload('[status]')));

    assert.deepEqual(outcome, { kind: 'status', queueLength: 3, message: '3 job(s) pending in queue.' });
    assert.equal(await store.byTrigger('5001'), null);
  });

  test('returns the existing job for a redelivered comment', async () => {
    await service.handle(delivery(commentPayload('[action]')));
    hosting.branches = {};

    const outcome = await service.handle(delivery(commentPayload('[action]')));

    assert.deepEqual(outcome, { kind: 'duplicate', jobId: 1 });
    assert.equal(await store.queueLength(), 1);
  });

  test('reports a failed branch lookup as unavailable', async () => {
    hosting.branches = {};

    const outcome = await service.handle(delivery(commentPayload('[action]')));

    assert.equal(outcome.kind, 'unavailable');
    assert.equal(outcome.kind === 'unavailable' ? outcome.reason : null, 'branch_resolution_failed');
    assert.equal(await store.queueLength(), 0);
  });

  test('formats status messages', () => {
    assert.equal(statusMessage(0), 'Queue is empty.');
    assert.equal(statusMessage(1), '1 job(s) pending in queue.');
  });
});
