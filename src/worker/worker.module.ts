import { Module } from '@nestjs/common';

import { CollaboratorsModule } from '../collaborators/collaborators.module';
import { JobsModule } from '../jobs/jobs.module';
import { JobRunner } from './job-runner';
import { WorkerService } from './worker.service';

@Module({
  imports: [JobsModule, CollaboratorsModule],
  providers: [JobRunner, WorkerService],
  exports: [WorkerService],
})
export class WorkerModule {}
