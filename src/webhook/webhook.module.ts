import { Module } from '@nestjs/common';

import { CollaboratorsModule } from '../collaborators/collaborators.module';
import { JobsModule } from '../jobs/jobs.module';
import { WebhookController } from './webhook.controller';
import { WebhookService } from './webhook.service';

@Module({
  imports: [JobsModule, CollaboratorsModule],
  controllers: [WebhookController],
  providers: [WebhookService],
})
export class WebhookModule {}
