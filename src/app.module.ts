import { Module } from '@nestjs/common';

import { CollaboratorsModule } from './collaborators/collaborators.module';
import { ConfigModule } from './config/config.module';
import { HealthController } from './health.controller';
import { JobsModule } from './jobs/jobs.module';
import { WebhookModule } from './webhook/webhook.module';
import { WorkerModule } from './worker/worker.module';

@Module({
  imports: [ConfigModule, JobsModule, CollaboratorsModule, WorkerModule, WebhookModule],
  controllers: [HealthController],
})
export class AppModule {}
