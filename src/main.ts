import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';

import { AppModule } from './app.module';
import { APP_CONFIG, type AppConfig } from './config/app-config';

/**
 * Keeps JSON bodies as raw bytes so the webhook signature is checked against
 * exactly what was sent.
 */
function createAdapter(): FastifyAdapter {
  const adapter = new FastifyAdapter();
  const instance = adapter.getInstance();
  instance.removeContentTypeParser('application/json');
  instance.addContentTypeParser(
    'application/json',
    { parseAs: 'buffer' },
    (_request: unknown, body: Buffer, done: (error: Error | null, body?: Buffer) => void) => {
      done(null, body);
    },
  );
  return adapter;
}

async function bootstrap() {
  const app = await NestFactory.create<NestFastifyApplication>(AppModule, createAdapter(), { bodyParser: false });

  app.setGlobalPrefix('v1', { exclude: ['webhook', 'health'] });
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidUnknownValues: false,
    }),
  );
  app.enableShutdownHooks();

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('PR Relay')
      .setDescription('Runs a coding agent on pull requests in response to review comments')
      .setVersion('0.1.0')
      .build(),
  );
  SwaggerModule.setup('/docs', app, document);

  const config = app.get<AppConfig>(APP_CONFIG);
  await app.listen(config.port, '0.0.0.0');

  Logger.log(`relay listening on http://localhost:${config.port} state=${config.stateRoot}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(error instanceof Error ? error.message : String(error), 'Bootstrap');
  process.exit(1);
});
