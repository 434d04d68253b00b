import type { JobStatus } from './job.types';

export class JobNotFoundError extends Error {
  constructor(readonly jobId: number) {
    super(`job not found: ${jobId}`);
    this.name = 'JobNotFoundError';
  }
}

export class InvalidJobTransitionError extends Error {
  constructor(
    readonly jobId: number,
    readonly from: JobStatus,
    readonly to: JobStatus,
  ) {
    super(`job ${jobId} cannot move from ${from} to ${to}`);
    this.name = 'InvalidJobTransitionError';
  }
}
