import type { Command } from '../jobs/job.types';

export const ISSUE_COMMENT_EVENT = 'issue_comment';

export const ignoreReasons = [
  'unsupported_event',
  'unsupported_action',
  'not_pull_request',
  'sender_not_allowed',
  'no_command',
] as const;

export type IgnoreReason = (typeof ignoreReasons)[number];

/**
 * Subset of the `issue_comment` webhook payload the relay reads.
 */
export interface IssueCommentEvent {
  action: string;
  issue: {
    number: number;
    pull_request?: Record<string, unknown> | null;
  };
  comment: {
    id: number;
    body: string;
  };
  repository: {
    full_name: string;
  };
  sender: {
    login: string;
  };
}

export interface ExtractedCommand {
  kind: 'command';
  command: Command;
  repo: string;
  prNumber: number;
  commentId: string;
  commentBody: string;
}

export type Classification =
  | ExtractedCommand
  | { kind: 'ignored'; reason: IgnoreReason }
  | { kind: 'invalid'; detail: string };

export interface InboundWebhook {
  eventName: string | undefined;
  signature: string | undefined;
  deliveryId: string | undefined;
  rawBody: Buffer;
}

export type IngressOutcome =
  | { kind: 'unauthenticated' }
  | { kind: 'malformed'; detail: string }
  | { kind: 'ignored'; reason: IgnoreReason }
  | { kind: 'status'; queueLength: number; message: string }
  | { kind: 'queued'; jobId: number; position: number }
  | { kind: 'duplicate'; jobId: number }
  | { kind: 'unavailable'; reason: UnavailableReason; detail: string };

export type UnavailableReason = 'branch_resolution_failed' | 'queue_enqueue_failed' | 'queue_unavailable';
