export const commands = ['action', 'fix', 'status'] as const;
export const queuedCommands = ['action', 'fix'] as const;
export const jobStatuses = ['pending', 'running', 'done', 'failed'] as const;
export const terminalOutcomes = ['done', 'failed'] as const;

export type Command = (typeof commands)[number];
export type QueuedCommand = (typeof queuedCommands)[number];
export type JobStatus = (typeof jobStatuses)[number];
export type TerminalOutcome = (typeof terminalOutcomes)[number];

interface JobBase {
  id: number;
  triggerId: string;
  repo: string;
  prNumber: number;
  branch: string;
  command: QueuedCommand;
  createdAt: string;
}

export interface PendingJob extends JobBase {
  status: 'pending';
}

export interface RunningJob extends JobBase {
  status: 'running';
  startedAt: string;
}

export interface DoneJob extends JobBase {
  status: 'done';
  startedAt: string;
  finishedAt: string;
}

export interface FailedJob extends JobBase {
  status: 'failed';
  startedAt: string;
  finishedAt: string;
  error: string;
}

export type JobRecord = PendingJob | RunningJob | DoneJob | FailedJob;

export interface CreateJobInput {
  repo: string;
  prNumber: number;
  branch: string;
  command: QueuedCommand;
  triggerId: string;
}

export type CreateJobResult =
  | { kind: 'created'; job: PendingJob }
  | { kind: 'duplicate'; jobId: number };

export interface JobEventRecord {
  id: string;
  jobId: number;
  type: string;
  message: string;
  payload?: unknown;
  createdAt: string;
}

export function isTerminal(job: JobRecord): job is DoneJob | FailedJob {
  switch (job.status) {
    case 'pending':
    case 'running':
      return false;
    case 'done':
    case 'failed':
      return true;
    default:
      return assertNever(job);
  }
}

export function isQueuedCommand(value: string): value is QueuedCommand {
  return (queuedCommands as readonly string[]).includes(value);
}

export function assertNever(value: never): never {
  throw new Error(`unexpected value: ${JSON.stringify(value)}`);
}
