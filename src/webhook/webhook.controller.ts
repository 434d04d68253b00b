import { Body, Controller, Headers, HttpCode, HttpStatus, Post, Res } from '@nestjs/common';
import { ApiHeader, ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';

import { assertNever } from '../jobs/job.types';
import { WebhookService } from './webhook.service';
import type { IngressOutcome } from './webhook.types';

export type WebhookResponseBody =
  | { status: 'error'; reason: string }
  | { status: 'ignored'; reason: string; job_id?: number }
  | { status: 'ok'; command: 'status'; queue_length: number; message: string }
  | { status: 'ok'; job_id: number; position: number };

/** The part of the Fastify reply the controller touches. */
export interface StatusReply {
  status(statusCode: number): unknown;
}

export interface WebhookResponse {
  statusCode: number;
  body: WebhookResponseBody;
}

export function toWebhookResponse(outcome: IngressOutcome): WebhookResponse {
  switch (outcome.kind) {
    case 'unauthenticated':
      return { statusCode: HttpStatus.UNAUTHORIZED, body: { status: 'error', reason: 'invalid_signature' } };
    case 'malformed':
      return { statusCode: HttpStatus.BAD_REQUEST, body: { status: 'error', reason: 'invalid_payload' } };
    case 'ignored':
      return { statusCode: HttpStatus.OK, body: { status: 'ignored', reason: outcome.reason } };
    case 'status':
      return {
        statusCode: HttpStatus.OK,
        body: { status: 'ok', command: 'status', queue_length: outcome.queueLength, message: outcome.message },
      };
    case 'queued':
      return { statusCode: HttpStatus.OK, body: { status: 'ok', job_id: outcome.jobId, position: outcome.position } };
    case 'duplicate':
      return { statusCode: HttpStatus.OK, body: { status: 'ignored', reason: 'duplicate', job_id: outcome.jobId } };
    case 'unavailable':
      return {
        statusCode: outcome.reason === 'branch_resolution_failed' ? HttpStatus.BAD_GATEWAY : HttpStatus.SERVICE_UNAVAILABLE,
        body: { status: 'error', reason: outcome.reason },
      };
    default:
      return assertNever(outcome);
  }
}

@ApiTags('webhook')
@Controller('webhook')
export class WebhookController {
  constructor(private readonly webhookService: WebhookService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Receive a GitHub issue_comment webhook delivery' })
  @ApiHeader({ name: 'X-Hub-Signature-256', required: true })
  @ApiHeader({ name: 'X-GitHub-Event', required: true })
  @ApiHeader({ name: 'X-GitHub-Delivery', required: false })
  @ApiOkResponse({ description: 'Delivery accepted, ignored, or answered' })
  async receive(
    @Body() body: unknown,
    @Headers('x-hub-signature-256') signature: string | undefined,
    @Headers('x-github-event') eventName: string | undefined,
    @Headers('x-github-delivery') deliveryId: string | undefined,
    @Res({ passthrough: true }) reply: StatusReply,
  ): Promise<WebhookResponseBody> {
    const rawBody = Buffer.isBuffer(body) ? body : Buffer.from(typeof body === 'string' ? body : '', 'utf8');
    const outcome = await this.webhookService.handle({ eventName, signature, deliveryId, rawBody });
    const response = toWebhookResponse(outcome);
    reply.status(response.statusCode);
    return response.body;
  }
}
