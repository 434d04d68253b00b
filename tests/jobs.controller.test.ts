import assert from 'node:assert/strict';
import { rmSync } from 'node:fs';
import { firstValueFrom, take, toArray } from 'rxjs';
import { afterEach, beforeEach, describe, test } from 'node:test';
import { NotFoundException } from '@nestjs/common';
import { PATH_METADATA } from '@nestjs/common/constants';
import 'reflect-metadata';

import { JobsController } from '../src/jobs/jobs.controller';
import { JobFileStore } from '../src/jobs/storage/job-store';
import { createStore, jobInput, tempDir } from './helpers';

describe('JobsController', () => {
  let stateRoot: string;
  let store: JobFileStore;
  let controller: JobsController;

  beforeEach(async () => {
    stateRoot = tempDir('pr-relay-jobs-');
    store = await createStore(stateRoot);
    controller = new JobsController(store);
  });

  afterEach(() => {
    rmSync(stateRoot, { recursive: true, force: true });
  });

  test('is mounted under jobs', () => {
    assert.equal(Reflect.getMetadata(PATH_METADATA, JobsController), 'jobs');
  });

  test('get returns the job record', async () => {
    await store.create(jobInput('300'));

    const job = await controller.get(1);
    assert.equal(job.id, 1);
    assert.equal(job.status, 'pending');
  });

  test('get rejects unknown jobs with 404', async () => {
    await assert.rejects(controller.get(99), NotFoundException);
  });

  test('byTrigger finds the job created for a comment', async () => {
    await store.create(jobInput('300'));

    assert.equal((await controller.byTrigger('300')).id, 1);
    await assert.rejects(controller.byTrigger('301'), NotFoundException);
  });

  test('events honours take', async () => {
    await store.create(jobInput('300'));
    await store.addEvent(1, 'started', 'one');
    await store.addEvent(1, 'sync', 'two');
    await store.addEvent(1, 'agent', 'three');

    const events = await controller.events(1, { take: 2 });
    assert.deepEqual(
      events.map((event) => event.type),
      ['sync', 'agent'],
    );
    await assert.rejects(controller.events(2, {}), NotFoundException);
  });

  test('stream emits recorded events as server-sent events', async () => {
    await store.addEvent(5, 'started', 'one');
    await store.addEvent(5, 'done', 'two');

    const emitted = await firstValueFrom(controller.stream(5).pipe(take(2), toArray()));

    assert.deepEqual(
      emitted.map((event) => event.type),
      ['started', 'done'],
    );
    const first = emitted[0]?.data;
    assert.equal(typeof first === 'object' && first !== null && 'message' in first ? first.message : null, 'one');
  });

  test('stream completes after the final event of a finished job', async () => {
    await store.create(jobInput('300'));
    await store.markRunning(1);
    await store.markTerminal(1, 'done');
    await store.addEvent(1, 'started', 'one');
    await store.addEvent(1, 'done', 'two');

    const emitted = await firstValueFrom(controller.stream(1).pipe(toArray()));

    assert.deepEqual(
      emitted.map((event) => event.type),
      ['started', 'done'],
    );
  });

  test('stream completes one poll after a failed job without a final event', async () => {
    await store.create(jobInput('300'));
    await store.markRunning(1);
    await store.markTerminal(1, 'failed', 'timeout');
    await store.addEvent(1, 'started', 'one');

    const emitted = await firstValueFrom(controller.stream(1).pipe(toArray()));

    assert.deepEqual(
      emitted.map((event) => event.type),
      ['started'],
    );
  });
});
