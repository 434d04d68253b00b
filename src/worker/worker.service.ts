import { setTimeout as delay } from 'node:timers/promises';
import {
  BeforeApplicationShutdown,
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
} from '@nestjs/common';

import { APP_CONFIG, type AppConfig } from '../config/app-config';
import { JobRunner } from './job-runner';

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Single consumer of the job queue. Runs jobs one at a time, sleeps for the
 * poll interval when the queue is empty, and stops between jobs on shutdown.
 */
@Injectable()
export class WorkerService implements OnApplicationBootstrap, BeforeApplicationShutdown {
  private readonly logger = new Logger(WorkerService.name);
  private stopRequested = false;
  private idleAbort = new AbortController();
  private loop: Promise<void> | null = null;

  constructor(
    @Inject(JobRunner) private readonly runner: Pick<JobRunner, 'runNext'>,
    @Inject(APP_CONFIG) private readonly config: Pick<AppConfig, 'worker'>,
  ) {}

  onApplicationBootstrap(): void {
    this.start();
  }

  async beforeApplicationShutdown(signal?: string): Promise<void> {
    this.logger.log(`shutting down${signal ? ` on ${signal}` : ''}`);
    await this.stop();
  }

  get running(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop) {
      return;
    }

    this.stopRequested = false;
    this.idleAbort = new AbortController();
    this.logger.log(`ready. pollInterval=${this.config.worker.pollIntervalMs}ms`);
    this.loop = this.run().catch((error: unknown) => {
      this.logger.error(`worker loop stopped unexpectedly: ${error instanceof Error ? error.message : String(error)}`);
    });
  }

  /**
   * Asks the loop to stop and waits up to `graceMs` for the job in progress.
   * Resolves `false` when the grace period ran out first.
   */
  async stop(graceMs = this.config.worker.shutdownGraceMs): Promise<boolean> {
    this.stopRequested = true;
    this.idleAbort.abort();

    const loop = this.loop;
    if (!loop) {
      return true;
    }

    const graceAbort = new AbortController();
    const finished = await Promise.race([
      loop.then(() => true),
      delay(graceMs, false, { signal: graceAbort.signal, ref: false }).catch((error: unknown) => {
        if (isAbortError(error)) return true;
        throw error;
      }),
    ]);
    graceAbort.abort();

    if (finished) {
      this.loop = null;
      this.logger.log('stopped');
    } else {
      this.logger.warn(`job still in progress after ${graceMs}ms grace period; leaving it running`);
    }
    return finished;
  }

  private async run(): Promise<void> {
    while (!this.stopRequested) {
      let processed = false;
      try {
        processed = await this.runner.runNext();
      } catch (error) {
        this.logger.error(`processing cycle failed: ${error instanceof Error ? error.message : String(error)}`);
      }

      if (!processed && !this.stopRequested) {
        await this.idle();
      }
    }
  }

  private async idle(): Promise<void> {
    try {
      await delay(this.config.worker.pollIntervalMs, undefined, { signal: this.idleAbort.signal });
    } catch (error) {
      if (!isAbortError(error)) {
        throw error;
      }
    }
  }
}
