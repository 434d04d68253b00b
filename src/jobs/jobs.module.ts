import { Module } from '@nestjs/common';

import { JobsController } from './jobs.controller';
import { JobFileStore } from './storage/job-store';

@Module({
  controllers: [JobsController],
  providers: [JobFileStore],
  exports: [JobFileStore],
})
export class JobsModule {}
