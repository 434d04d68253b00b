import type { AgentResult } from '../collaborators/collaborator.types';
import type { AgentKind } from '../config/app-config';
import { assertNever, type RunningJob } from '../jobs/job.types';

export const DIAGNOSTIC_TAIL_CHARS = 500;
export const TIMEOUT_ERROR = 'timeout';

const AUTH_FAILURE = /API Error: 40[13]|invalid[ -]x?-?api[ -]key|authentication[ _](?:error|failed)|\bunauthorized\b/i;
const MAX_TURNS_REACHED = /Reached max turns/;

export type FailureKind =
  | 'repository_not_configured'
  | 'clone_failed'
  | 'sync_failed'
  | 'agent_failed'
  | 'timeout'
  | 'internal_error';

export interface FailedOutcome {
  status: 'failed';
  kind: FailureKind;
  summary: string;
  diagnostic?: string;
}

export type JobOutcome = { status: 'done' } | FailedOutcome;

export function tailDiagnostic(text: string, limit = DIAGNOSTIC_TAIL_CHARS): string {
  const trimmed = text.trim();
  return trimmed.length > limit ? trimmed.slice(trimmed.length - limit) : trimmed;
}

export function formatDuration(ms: number): string {
  if (ms % 3_600_000 === 0) {
    const hours = ms / 3_600_000;
    return `${hours} hour${hours === 1 ? '' : 's'}`;
  }
  if (ms % 60_000 === 0) {
    const minutes = ms / 60_000;
    return `${minutes} minute${minutes === 1 ? '' : 's'}`;
  }
  const seconds = Math.round(ms / 1000);
  return `${seconds} second${seconds === 1 ? '' : 's'}`;
}

export function failure(kind: FailureKind, summary: string, output?: string): FailedOutcome {
  const diagnostic = output === undefined ? '' : tailDiagnostic(output);
  return diagnostic ? { status: 'failed', kind, summary, diagnostic } : { status: 'failed', kind, summary };
}

/**
 * Error text persisted on the job record.
 */
export function errorText(outcome: FailedOutcome): string {
  if (outcome.kind === 'timeout') {
    return TIMEOUT_ERROR;
  }
  return outcome.diagnostic ? `${outcome.summary}: ${outcome.diagnostic}` : outcome.summary;
}

/**
 * Maps an agent run onto a job outcome. A zero exit still fails when the
 * output shows an authentication problem or is empty. The exhausted turn
 * budget marker is only printed by `claude`.
 */
export function classifyAgentResult(result: AgentResult, kind: AgentKind): JobOutcome {
  if (result.timedOut) {
    return failure('timeout', 'agent timed out');
  }
  if (result.exitCode !== 0) {
    return failure('agent_failed', `agent exited with status ${result.exitCode}`, result.output);
  }
  if (AUTH_FAILURE.test(result.output)) {
    return failure('agent_failed', 'agent authentication failure detected', result.output);
  }
  if (kind === 'claude' && MAX_TURNS_REACHED.test(result.output)) {
    return failure('agent_failed', 'agent exhausted max turns without completing', result.output);
  }
  if (!result.output.trim()) {
    return failure('agent_failed', 'agent produced no output');
  }
  return { status: 'done' };
}

/**
 * Text of the single comment posted when a job reaches a terminal state.
 */
export function buildNotification(job: RunningJob, outcome: JobOutcome, agentTimeoutMs: number): string {
  const label = `\`[${job.command}]\` (job #${job.id})`;
  if (outcome.status === 'done') {
    return `✅ ${label} finished.`;
  }

  switch (outcome.kind) {
    case 'timeout':
      return `⏱️ ${label} timed out after ${formatDuration(agentTimeoutMs)}. Work may be incomplete.`;
    case 'repository_not_configured':
      return `❌ ${label} failed: ${outcome.summary}. Add the repository to the relay configuration.`;
    case 'clone_failed':
    case 'sync_failed':
    case 'agent_failed':
    case 'internal_error': {
      const details = outcome.diagnostic ? `\n\n\`\`\`\n${outcome.diagnostic}\n\`\`\`` : '';
      return `❌ ${label} failed: ${outcome.summary}.${details}`;
    }
    default:
      return assertNever(outcome.kind);
  }
}
