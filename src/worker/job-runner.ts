import { promises as fs } from 'node:fs';
import { setTimeout as sleep } from 'node:timers/promises';
import { Inject, Injectable, Logger } from '@nestjs/common';

import {
  AGENT,
  CODE_HOSTING,
  PATH_RESOLVER,
  VERSION_CONTROL,
  type Agent,
  type CodeHosting,
  type PathResolver,
  type VersionControl,
} from '../collaborators/collaborator.types';
import { APP_CONFIG, type AppConfig } from '../config/app-config';
import { assertNever, type RunningJob } from '../jobs/job.types';
import { JobFileStore } from '../jobs/storage/job-store';
import { buildActionInstruction, buildFixInstruction, findPlanDocument, NONE_PLACEHOLDER } from './instructions';
import {
  buildNotification,
  classifyAgentResult,
  errorText,
  failure,
  type JobOutcome,
} from './outcome';

const TERMINAL_WRITE_BACKOFF_MS = [100, 500, 2000];

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Carries one claimed job through resolve, materialize, sync and dispatch,
 * then records the terminal state and posts the single status comment.
 */
@Injectable()
export class JobRunner {
  private readonly logger = new Logger(JobRunner.name);

  constructor(
    private readonly store: JobFileStore,
    @Inject(PATH_RESOLVER) private readonly paths: PathResolver,
    @Inject(VERSION_CONTROL) private readonly git: VersionControl,
    @Inject(CODE_HOSTING) private readonly codeHosting: CodeHosting,
    @Inject(AGENT) private readonly agent: Agent,
    @Inject(APP_CONFIG) private readonly config: Pick<AppConfig, 'agent' | 'git'>,
  ) {}

  /**
   * Claims the oldest pending job and runs it to completion. Resolves `false`
   * when the queue is empty.
   */
  async runNext(): Promise<boolean> {
    const next = await this.store.nextPending();
    if (!next) {
      return false;
    }

    const job = await this.store.markRunning(next.id);
    this.logger.log(`job started id=${job.id} command=${job.command} repo=${job.repo} pr=${job.prNumber}`);
    await this.record(job.id, 'started', `[${job.command}] started on ${job.branch}`);

    let outcome: JobOutcome;
    try {
      outcome = await this.execute(job);
    } catch (error) {
      this.logger.error(`job id=${job.id} raised: ${describeError(error)}`);
      outcome = failure('internal_error', 'unexpected worker error', describeError(error));
    }

    await this.finalize(job, outcome);
    return true;
  }

  private async execute(job: RunningJob): Promise<JobOutcome> {
    const workdir = this.paths.resolve(job.repo);
    if (!workdir) {
      return failure('repository_not_configured', `repository not configured: ${job.repo}`);
    }

    const stopped = (await this.materialize(job, workdir)) ?? (await this.sync(job, workdir));
    if (stopped) {
      return stopped;
    }

    return this.dispatch(job, workdir);
  }

  /** Resolves a failed outcome when the stage stops the job, otherwise null. */
  private async materialize(job: RunningJob, workdir: string): Promise<JobOutcome | null> {
    if (await pathExists(workdir)) {
      return null;
    }

    await this.record(job.id, 'clone', `cloning ${job.repo} into ${workdir}`);
    const cloned = await this.git.clone(job.repo, workdir, this.config.git.cloneTimeoutMs);
    return cloned.ok ? null : failure('clone_failed', 'clone failed', cloned.diagnostic);
  }

  private async sync(job: RunningJob, workdir: string): Promise<JobOutcome | null> {
    const timeoutMs = this.config.git.syncTimeoutMs;
    await this.record(job.id, 'sync', `syncing ${job.branch}`);

    const steps = [
      () => this.git.fetch(workdir, job.branch, timeoutMs),
      () => this.git.checkout(workdir, job.branch, timeoutMs),
      () => this.git.pull(workdir, job.branch, timeoutMs),
    ];
    for (const step of steps) {
      const result = await step();
      if (!result.ok) {
        return failure('sync_failed', `branch sync failed for ${job.branch}`, result.diagnostic);
      }
    }
    return null;
  }

  private async dispatch(job: RunningJob, workdir: string): Promise<JobOutcome> {
    const instruction = await this.buildInstruction(job, workdir);
    await this.record(job.id, 'agent', `agent dispatched for [${job.command}]`);

    const result = await this.agent.execute({
      instruction,
      workdir,
      maxTurns: this.config.agent.maxTurns,
      timeoutMs: this.config.agent.timeoutMs,
    });
    this.logger.log(`agent finished id=${job.id} exit=${result.exitCode} timedOut=${result.timedOut}`);
    return classifyAgentResult(result, this.config.agent.kind);
  }

  private async buildInstruction(job: RunningJob, workdir: string): Promise<string> {
    switch (job.command) {
      case 'action': {
        const plan = await findPlanDocument(workdir);
        if (!plan) {
          this.logger.warn(`no plan document found id=${job.id} workdir=${workdir}`);
        }
        return buildActionInstruction(job, plan);
      }
      case 'fix': {
        const [comments, bodies] = await Promise.all([
          this.reviewText(job, 'review comments', () => this.codeHosting.fetchReviewComments(job.repo, job.prNumber)),
          this.reviewText(job, 'review bodies', () => this.codeHosting.fetchReviewBodies(job.repo, job.prNumber)),
        ]);
        return buildFixInstruction(job, comments, bodies);
      }
      default:
        return assertNever(job.command);
    }
  }

  private async reviewText(job: RunningJob, label: string, fetch: () => Promise<string>): Promise<string> {
    try {
      return await fetch();
    } catch (error) {
      this.logger.warn(`could not fetch ${label} id=${job.id}: ${describeError(error)}`);
      return NONE_PLACEHOLDER;
    }
  }

  private async finalize(job: RunningJob, outcome: JobOutcome): Promise<void> {
    if (outcome.status === 'done') {
      await this.persistTerminal(job, () => this.store.markTerminal(job.id, 'done'));
      await this.record(job.id, 'done', `[${job.command}] finished`);
      this.logger.log(`job done id=${job.id}`);
    } else {
      const error = errorText(outcome);
      await this.persistTerminal(job, () => this.store.markTerminal(job.id, 'failed', error));
      await this.record(job.id, 'failed', outcome.summary, { kind: outcome.kind, error });
      this.logger.warn(`job failed id=${job.id} kind=${outcome.kind}: ${outcome.summary}`);
    }

    const body = buildNotification(job, outcome, this.config.agent.timeoutMs);
    try {
      await this.codeHosting.postComment(job.repo, job.prNumber, body);
    } catch (error) {
      this.logger.error(`status comment failed id=${job.id}: ${describeError(error)}`);
    }
  }

  /**
   * Retries the terminal write with backoff. A job whose record cannot be
   * updated stays `running` on disk, but the pull request is still notified.
   */
  private async persistTerminal(job: RunningJob, write: () => Promise<unknown>): Promise<void> {
    for (let attempt = 0; ; attempt += 1) {
      try {
        await write();
        return;
      } catch (error) {
        const delay = TERMINAL_WRITE_BACKOFF_MS[attempt];
        if (delay === undefined) {
          this.logger.error(`could not record terminal state id=${job.id}: ${describeError(error)}`);
          return;
        }
        this.logger.warn(`terminal write failed id=${job.id} attempt=${attempt + 1}: ${describeError(error)}`);
        await sleep(delay);
      }
    }
  }

  private async record(jobId: number, type: string, message: string, payload?: unknown): Promise<void> {
    try {
      await this.store.addEvent(jobId, type, message, payload);
    } catch (error) {
      this.logger.warn(`could not record event id=${jobId} type=${type}: ${describeError(error)}`);
    }
  }
}
