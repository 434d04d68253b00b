import type { Command } from '../jobs/job.types';
import { ISSUE_COMMENT_EVENT, type Classification, type IssueCommentEvent } from './webhook.types';

const COMMAND_PATTERN = /^\[(action|fix|status)\]/i;

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Narrowly validates that a parsed body carries the `issue_comment` fields the
 * classifier reads.
 */
export function isIssueCommentEvent(payload: unknown): payload is IssueCommentEvent {
  if (!isObject(payload)) {
    return false;
  }

  const { action, issue, comment, repository, sender } = payload;
  return (
    typeof action === 'string' &&
    isObject(issue) &&
    typeof issue.number === 'number' &&
    isObject(comment) &&
    typeof comment.id === 'number' &&
    typeof comment.body === 'string' &&
    isObject(repository) &&
    typeof repository.full_name === 'string' &&
    isObject(sender) &&
    typeof sender.login === 'string'
  );
}

/**
 * Extracts the command token from the first line of a comment body.
 */
export function parseCommand(body: string): Command | null {
  const firstLine = body.split(/\r?\n/, 1)[0]?.trim() ?? '';
  const match = COMMAND_PATTERN.exec(firstLine);
  if (!match?.[1]) {
    return null;
  }

  const token = match[1].toLowerCase();
  switch (token) {
    case 'action':
    case 'fix':
    case 'status':
      return token;
    default:
      return null;
  }
}

/**
 * Decides whether an authenticated webhook carries a command from the allowed
 * user. Checks run in a fixed order and the first failing one wins.
 */
export function classifyEvent(eventName: string | undefined, body: unknown, allowedUser: string): Classification {
  if (eventName !== ISSUE_COMMENT_EVENT) {
    return { kind: 'ignored', reason: 'unsupported_event' };
  }

  if (!isIssueCommentEvent(body)) {
    return { kind: 'invalid', detail: 'unsupported issue_comment payload' };
  }

  if (body.action !== 'created') {
    return { kind: 'ignored', reason: 'unsupported_action' };
  }

  if (!isObject(body.issue.pull_request)) {
    return { kind: 'ignored', reason: 'not_pull_request' };
  }

  if (body.sender.login !== allowedUser) {
    return { kind: 'ignored', reason: 'sender_not_allowed' };
  }

  const command = parseCommand(body.comment.body);
  if (!command) {
    return { kind: 'ignored', reason: 'no_command' };
  }

  return {
    kind: 'command',
    command,
    repo: body.repository.full_name,
    prNumber: body.issue.number,
    commentId: String(body.comment.id),
    commentBody: body.comment.body,
  };
}
