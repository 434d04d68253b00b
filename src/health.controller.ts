import { Controller, Get } from '@nestjs/common';
import { ApiOkResponse, ApiTags } from '@nestjs/swagger';

import { JobFileStore } from './jobs/storage/job-store';

@ApiTags('health')
@Controller('health')
export class HealthController {
  constructor(private readonly store: JobFileStore) {}

  @Get()
  @ApiOkResponse({ description: 'Liveness with the number of pending jobs' })
  async health(): Promise<{ status: 'ok'; queue_length: number }> {
    return { status: 'ok', queue_length: await this.store.queueLength() };
  }
}
