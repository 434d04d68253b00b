import { promises as fs } from 'node:fs';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';

import { APP_CONFIG, type AppConfig } from '../../config/app-config';
import { InvalidJobTransitionError, JobNotFoundError } from '../job.errors';
import {
  isQueuedCommand,
  type CreateJobInput,
  type CreateJobResult,
  type JobEventRecord,
  type JobRecord,
  type PendingJob,
  type RunningJob,
  type TerminalOutcome,
} from '../job.types';

interface StoredEventEnvelope extends JobEventRecord {
  v: 1;
}

const TRIGGER_ID_PATTERN = /^[A-Za-z0-9_-]+$/;
const LOCK_WAIT_MS = 5000;
const STALE_LOCK_MS = 30_000;

function asRecord(value: unknown): Record<string, unknown> | null {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return null;
  }
  return value as Record<string, unknown>;
}

function hasText(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function isPositiveInt(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function nowIso(): string {
  return new Date().toISOString();
}

async function sleep(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isErrno(error: unknown, code: string): boolean {
  return error instanceof Error && (error as NodeJS.ErrnoException).code === code;
}

export function assertTriggerId(triggerId: string): void {
  if (!TRIGGER_ID_PATTERN.test(triggerId)) {
    throw new Error(`invalid trigger id: ${JSON.stringify(triggerId)}`);
  }
}

export function normalizeJobRecord(value: unknown): JobRecord | null {
  const record = asRecord(value);
  if (!record) {
    return null;
  }

  const { id, triggerId, repo, prNumber, branch, command, createdAt } = record;
  if (
    !isPositiveInt(id) ||
    !hasText(triggerId) ||
    !hasText(repo) ||
    !isPositiveInt(prNumber) ||
    !hasText(branch) ||
    typeof command !== 'string' ||
    !isQueuedCommand(command) ||
    !hasText(createdAt)
  ) {
    return null;
  }

  const base = { id, triggerId, repo, prNumber, branch, command, createdAt };
  const { startedAt, finishedAt, error } = record;

  switch (record.status) {
    case 'pending':
      return { ...base, status: 'pending' };
    case 'running':
      return hasText(startedAt) ? { ...base, status: 'running', startedAt } : null;
    case 'done':
      return hasText(startedAt) && hasText(finishedAt)
        ? { ...base, status: 'done', startedAt, finishedAt }
        : null;
    case 'failed':
      return hasText(startedAt) && hasText(finishedAt) && typeof error === 'string'
        ? { ...base, status: 'failed', startedAt, finishedAt, error }
        : null;
    default:
      return null;
  }
}

function normalizeEvent(value: unknown): JobEventRecord | null {
  const record = asRecord(value);
  if (!record) {
    return null;
  }

  const { id, jobId, type, message, payload, createdAt } = record;
  if (!hasText(id) || !isPositiveInt(jobId) || !hasText(type) || typeof message !== 'string' || !hasText(createdAt)) {
    return null;
  }
  return payload === undefined ? { id, jobId, type, message, createdAt } : { id, jobId, type, message, payload, createdAt };
}

/**
 * Durable job queue kept as JSON files under a state root.
 *
 * Every public operation runs under one store-wide lock file, so the webhook
 * path and the worker (or several processes sharing the state root) observe
 * each other's writes atomically. Records are replaced by rename, never
 * rewritten in place. `pending/` holds one empty marker per pending job, so
 * queue reads never scan finished jobs.
 */
@Injectable()
export class JobFileStore implements OnModuleInit {
  private readonly logger = new Logger(JobFileStore.name);
  private readonly stateRoot: string;

  constructor(@Inject(APP_CONFIG) config: Pick<AppConfig, 'stateRoot'>) {
    this.stateRoot = path.resolve(config.stateRoot);
  }

  async onModuleInit(): Promise<void> {
    await this.init();
  }

  async init(): Promise<void> {
    await fs.mkdir(this.jobsDir(), { recursive: true });
    await fs.mkdir(this.triggersDir(), { recursive: true });
    await fs.mkdir(this.eventsDir(), { recursive: true });
    const createdIndex = await fs.mkdir(this.pendingDir(), { recursive: true });
    if (createdIndex !== undefined) {
      await this.withLock(() => this.rebuildPendingIndex());
    }
  }

  async create(input: CreateJobInput): Promise<CreateJobResult> {
    assertTriggerId(input.triggerId);

    return this.withLock<CreateJobResult>(async () => {
      const existing = await this.readTrigger(input.triggerId);
      if (existing !== null) {
        if (await this.recordExists(existing)) {
          return { kind: 'duplicate', jobId: existing };
        }
        // Claimed by a create that never wrote its record.
        this.logger.warn(`releasing trigger ${input.triggerId} of missing job id=${existing}`);
        await fs.rm(this.triggerPath(input.triggerId), { force: true });
      }

      const id = (await this.readSequence()) + 1;
      await this.writeJson(this.sequencePath(), { last: id });

      const claimed = await this.claimTrigger(input.triggerId, id);
      if (!claimed) {
        const winner = await this.readTrigger(input.triggerId);
        return { kind: 'duplicate', jobId: winner ?? id };
      }

      const job: PendingJob = {
        id,
        triggerId: input.triggerId,
        repo: input.repo,
        prNumber: input.prNumber,
        branch: input.branch,
        command: input.command,
        status: 'pending',
        createdAt: nowIso(),
      };
      await fs.writeFile(this.pendingMarkerPath(id), '', 'utf8');
      await this.writeJson(this.recordPath(id), job);
      return { kind: 'created', job };
    });
  }

  async nextPending(): Promise<PendingJob | null> {
    return this.withLock(async () => {
      const pending = await this.listPending();
      return pending[0] ?? null;
    });
  }

  async positionOf(jobId: number): Promise<number> {
    return this.withLock(async () => {
      const pending = await this.listPending();
      return pending.filter((job) => job.id <= jobId).length;
    });
  }

  async queueLength(): Promise<number> {
    return this.withLock(async () => (await this.listPending()).length);
  }

  async markRunning(jobId: number): Promise<RunningJob> {
    return this.withLock(async () => {
      const current = await this.readRecordOrThrow(jobId);
      if (current.status !== 'pending') {
        throw new InvalidJobTransitionError(jobId, current.status, 'running');
      }

      const running: RunningJob = { ...current, status: 'running', startedAt: nowIso() };
      await this.writeJson(this.recordPath(jobId), running);
      await fs.rm(this.pendingMarkerPath(jobId), { force: true });
      return running;
    });
  }

  async markTerminal(jobId: number, outcome: TerminalOutcome, error?: string): Promise<JobRecord> {
    return this.withLock(async () => {
      const current = await this.readRecordOrThrow(jobId);
      if (current.status !== 'running') {
        throw new InvalidJobTransitionError(jobId, current.status, outcome);
      }

      const finishedAt = nowIso();
      const next: JobRecord =
        outcome === 'done'
          ? { ...current, status: 'done', finishedAt }
          : { ...current, status: 'failed', finishedAt, error: error ?? 'failed' };
      await this.writeJson(this.recordPath(jobId), next);
      return next;
    });
  }

  async byTrigger(triggerId: string): Promise<JobRecord | null> {
    if (!TRIGGER_ID_PATTERN.test(triggerId)) {
      return null;
    }

    return this.withLock(async () => {
      const jobId = await this.readTrigger(triggerId);
      return jobId === null ? null : this.readRecord(jobId);
    });
  }

  async findById(jobId: number): Promise<JobRecord | null> {
    return this.withLock(() => this.readRecord(jobId));
  }

  async addEvent(jobId: number, type: string, message: string, payload?: unknown): Promise<void> {
    const event: StoredEventEnvelope = {
      v: 1,
      id: randomUUID(),
      jobId,
      type,
      message,
      payload,
      createdAt: nowIso(),
    };
    await fs.appendFile(this.eventsPath(jobId), `${JSON.stringify(event)}\n`, 'utf8');
  }

  async listEvents(jobId: number, take = 100): Promise<JobEventRecord[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.eventsPath(jobId), 'utf8');
    } catch (error) {
      if (isErrno(error, 'ENOENT')) return [];
      throw error;
    }

    const events = raw
      .split('\n')
      .filter((line) => line.trim())
      .map((line) => this.parseEventLine(jobId, line))
      .filter((event): event is JobEventRecord => event !== null);

    return events.slice(Math.max(events.length - take, 0));
  }

  private parseEventLine(jobId: number, line: string): JobEventRecord | null {
    try {
      return normalizeEvent(JSON.parse(line));
    } catch (error) {
      if (!(error instanceof SyntaxError)) {
        throw error;
      }
      this.logger.warn(`skipping unreadable event line id=${jobId}: ${error.message}`);
      return null;
    }
  }

  /**
   * Pending jobs in id order, read through the marker index. Markers whose
   * record is gone or no longer pending are removed.
   */
  private async listPending(): Promise<PendingJob[]> {
    const ids = (await fs.readdir(this.pendingDir()))
      .filter((name) => /^\d+$/.test(name))
      .map(Number)
      .sort((a, b) => a - b);

    const pending: PendingJob[] = [];
    for (const id of ids) {
      const record = await this.readRecord(id);
      if (record?.status === 'pending') {
        pending.push(record);
      } else {
        await fs.rm(this.pendingMarkerPath(id), { force: true });
      }
    }
    return pending;
  }

  private async rebuildPendingIndex(): Promise<void> {
    const entries = await fs.readdir(this.jobsDir());
    for (const name of entries) {
      const match = /^(\d+)\.json$/.exec(name);
      if (!match) continue;
      const id = Number(match[1]);
      const record = await this.readRecord(id);
      if (record?.status === 'pending') {
        await fs.writeFile(this.pendingMarkerPath(id), '', 'utf8');
      }
    }
  }

  private async recordExists(jobId: number): Promise<boolean> {
    return (await this.readJson(this.recordPath(jobId))) !== null;
  }

  private async readRecord(jobId: number): Promise<JobRecord | null> {
    const raw = await this.readJson(this.recordPath(jobId));
    if (raw === null) {
      return null;
    }

    const record = normalizeJobRecord(raw);
    if (!record) {
      this.logger.warn(`skipping malformed job record id=${jobId}`);
    }
    return record;
  }

  private async readRecordOrThrow(jobId: number): Promise<JobRecord> {
    const record = await this.readRecord(jobId);
    if (!record) {
      throw new JobNotFoundError(jobId);
    }
    return record;
  }

  private async readSequence(): Promise<number> {
    const raw = asRecord(await this.readJson(this.sequencePath()));
    const last = raw?.last;
    return isPositiveInt(last) ? last : 0;
  }

  private async readTrigger(triggerId: string): Promise<number | null> {
    const raw = await this.readJson(this.triggerPath(triggerId));
    if (raw === null) {
      return null;
    }

    const jobId = asRecord(raw)?.jobId;
    if (!isPositiveInt(jobId)) {
      throw new Error(`corrupt trigger index entry: ${triggerId}`);
    }
    return jobId;
  }

  private async claimTrigger(triggerId: string, jobId: number): Promise<boolean> {
    const target = this.triggerPath(triggerId);
    const temp = `${target}.tmp-${process.pid}-${Date.now()}`;
    await fs.writeFile(temp, JSON.stringify({ jobId }), 'utf8');
    try {
      // link() fails with EEXIST instead of replacing, unlike rename().
      await fs.link(temp, target);
      return true;
    } catch (error) {
      if (isErrno(error, 'EEXIST')) return false;
      throw error;
    } finally {
      await fs.rm(temp, { force: true });
    }
  }

  private async readJson(filePath: string): Promise<unknown> {
    try {
      const raw = await fs.readFile(filePath, 'utf8');
      return JSON.parse(raw);
    } catch (error) {
      if (isErrno(error, 'ENOENT')) return null;
      throw error;
    }
  }

  private async writeJson(filePath: string, value: unknown): Promise<void> {
    const temp = `${filePath}.tmp-${process.pid}-${Date.now()}`;
    await fs.writeFile(temp, JSON.stringify(value, null, 2), 'utf8');
    await fs.rename(temp, filePath);
  }

  private async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const lockPath = path.join(this.stateRoot, '.lock');
    const start = Date.now();
    while (true) {
      try {
        await fs.writeFile(lockPath, JSON.stringify({ pid: process.pid, startedAt: nowIso() }), { flag: 'wx' });
      } catch (error) {
        if (!isErrno(error, 'EEXIST')) {
          throw error;
        }
        if (Date.now() - start > LOCK_WAIT_MS) {
          throw new Error(`failed to acquire job store lock: ${lockPath}`);
        }
        await sleep(10);
        await this.pruneStaleLock(lockPath);
        continue;
      }

      try {
        return await fn();
      } finally {
        await fs.rm(lockPath, { force: true });
      }
    }
  }

  private async pruneStaleLock(lockPath: string): Promise<void> {
    const raw = asRecord(await this.readJson(lockPath).catch(() => null));
    const startedAt = typeof raw?.startedAt === 'string' ? new Date(raw.startedAt).getTime() : Number.NaN;
    if (Number.isNaN(startedAt)) return;
    if (Date.now() - startedAt > STALE_LOCK_MS) {
      this.logger.warn(`removing stale job store lock: ${lockPath}`);
      await fs.rm(lockPath, { force: true });
    }
  }

  private jobsDir(): string {
    return path.join(this.stateRoot, 'jobs');
  }

  private triggersDir(): string {
    return path.join(this.stateRoot, 'triggers');
  }

  private pendingDir(): string {
    return path.join(this.stateRoot, 'pending');
  }

  private eventsDir(): string {
    return path.join(this.stateRoot, 'events');
  }

  private sequencePath(): string {
    return path.join(this.stateRoot, 'sequence.json');
  }

  private recordPath(jobId: number): string {
    return path.join(this.jobsDir(), `${jobId}.json`);
  }

  private triggerPath(triggerId: string): string {
    return path.join(this.triggersDir(), `${triggerId}.json`);
  }

  private pendingMarkerPath(jobId: number): string {
    return path.join(this.pendingDir(), String(jobId));
  }

  private eventsPath(jobId: number): string {
    return path.join(this.eventsDir(), `${jobId}.jsonl`);
  }
}
