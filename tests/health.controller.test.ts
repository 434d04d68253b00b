import assert from 'node:assert/strict';
import { rmSync } from 'node:fs';
import { afterEach, beforeEach, describe, test } from 'node:test';

import { HealthController } from '../src/health.controller';
import { JobFileStore } from '../src/jobs/storage/job-store';
import { createStore, jobInput, tempDir } from './helpers';

describe('HealthController', () => {
  let stateRoot: string;
  let store: JobFileStore;

  beforeEach(async () => {
    stateRoot = tempDir('pr-relay-health-');
    store = await createStore(stateRoot);
  });

  afterEach(() => {
    rmSync(stateRoot, { recursive: true, force: true });
  });

  test('reports liveness with the pending count', async () => {
    const controller = new HealthController(store);
    assert.deepEqual(await controller.health(), { status: 'ok', queue_length: 0 });

    await store.create(jobInput('1'));
    await store.create(jobInput('2'));
    assert.deepEqual(await controller.health(), { status: 'ok', queue_length: 2 });
  });
});
