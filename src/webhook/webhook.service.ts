import { Inject, Injectable, Logger } from '@nestjs/common';

import { CODE_HOSTING, type CodeHosting } from '../collaborators/collaborator.types';
import { APP_CONFIG, type AppConfig } from '../config/app-config';
import { JobFileStore } from '../jobs/storage/job-store';
import type { QueuedCommand } from '../jobs/job.types';
import { classifyEvent } from './event-classifier';
import { verifySignature } from './signature';
import type { ExtractedCommand, InboundWebhook, IngressOutcome } from './webhook.types';

export function statusMessage(queueLength: number): string {
  return queueLength === 0 ? 'Queue is empty.' : `${queueLength} job(s) pending in queue.`;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function parseJson(rawBody: Buffer): { ok: true; value: unknown } | { ok: false; detail: string } {
  try {
    return { ok: true, value: JSON.parse(rawBody.toString('utf8')) };
  } catch (error) {
    return { ok: false, detail: describeError(error) };
  }
}

/**
 * Turns one webhook delivery into an ingress outcome. Jobs are only inserted
 * here; running them and posting status comments belongs to the worker.
 */
@Injectable()
export class WebhookService {
  private readonly logger = new Logger(WebhookService.name);

  constructor(
    private readonly store: JobFileStore,
    @Inject(CODE_HOSTING) private readonly codeHosting: Pick<CodeHosting, 'resolveHeadBranch'>,
    @Inject(APP_CONFIG) private readonly config: Pick<AppConfig, 'webhookSecret' | 'allowedUser'>,
  ) {}

  async handle(inbound: InboundWebhook): Promise<IngressOutcome> {
    const delivery = inbound.deliveryId ?? '-';
    if (!verifySignature(inbound.rawBody, inbound.signature, this.config.webhookSecret)) {
      this.logger.warn(`rejected delivery=${delivery}: invalid signature`);
      return { kind: 'unauthenticated' };
    }

    const parsed = parseJson(inbound.rawBody);
    if (!parsed.ok) {
      this.logger.warn(`rejected delivery=${delivery}: unparsable body`);
      return { kind: 'malformed', detail: parsed.detail };
    }

    const classification = classifyEvent(inbound.eventName, parsed.value, this.config.allowedUser);
    switch (classification.kind) {
      case 'invalid':
        this.logger.warn(`rejected delivery=${delivery}: ${classification.detail}`);
        return { kind: 'malformed', detail: classification.detail };
      case 'ignored':
        this.logger.debug(`ignored delivery=${delivery} reason=${classification.reason}`);
        return classification;
      case 'command':
        break;
    }

    const { command } = classification;
    if (command === 'status') {
      return this.reportStatus(delivery);
    }
    return this.enqueue(delivery, classification, command);
  }

  private async reportStatus(delivery: string): Promise<IngressOutcome> {
    try {
      const queueLength = await this.store.queueLength();
      this.logger.log(`status delivery=${delivery} pending=${queueLength}`);
      return { kind: 'status', queueLength, message: statusMessage(queueLength) };
    } catch (error) {
      this.logger.error(`status read failed delivery=${delivery}: ${describeError(error)}`);
      return { kind: 'unavailable', reason: 'queue_unavailable', detail: describeError(error) };
    }
  }

  private async enqueue(delivery: string, extracted: ExtractedCommand, command: QueuedCommand): Promise<IngressOutcome> {
    const { repo, prNumber, commentId } = extracted;

    let branch: string;
    try {
      const existing = await this.store.byTrigger(commentId);
      if (existing) {
        this.logger.log(`duplicate delivery=${delivery} trigger=${commentId} job=${existing.id}`);
        return { kind: 'duplicate', jobId: existing.id };
      }
    } catch (error) {
      this.logger.error(`trigger lookup failed delivery=${delivery}: ${describeError(error)}`);
      return { kind: 'unavailable', reason: 'queue_enqueue_failed', detail: describeError(error) };
    }

    try {
      branch = await this.codeHosting.resolveHeadBranch(repo, prNumber);
    } catch (error) {
      this.logger.error(`head branch lookup failed repo=${repo} pr=${prNumber}: ${describeError(error)}`);
      return { kind: 'unavailable', reason: 'branch_resolution_failed', detail: describeError(error) };
    }

    try {
      const created = await this.store.create({ repo, prNumber, branch, command, triggerId: commentId });
      if (created.kind === 'duplicate') {
        this.logger.log(`duplicate delivery=${delivery} trigger=${commentId} job=${created.jobId}`);
        return { kind: 'duplicate', jobId: created.jobId };
      }

      const position = await this.store.positionOf(created.job.id);
      this.logger.log(
        `queued job=${created.job.id} command=${command} repo=${repo} pr=${prNumber} branch=${branch} position=${position}`,
      );
      return { kind: 'queued', jobId: created.job.id, position };
    } catch (error) {
      this.logger.error(`enqueue failed delivery=${delivery}: ${describeError(error)}`);
      return { kind: 'unavailable', reason: 'queue_enqueue_failed', detail: describeError(error) };
    }
  }
}
