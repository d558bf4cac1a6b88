import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { SETTINGS, Settings } from './config/settings';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const settings = app.get<Settings>(SETTINGS);

  app.enableCors({ origin: settings.server.corsOrigin });
  app.enableShutdownHooks();

  await app.listen(settings.server.port);
  Logger.log(
    `Relay listening on :${settings.server.port} | retriever=${settings.retrieval.url} | model=${settings.model.name}`,
    'Bootstrap',
  );
}

bootstrap().catch((err: unknown) => {
  Logger.error(err instanceof Error ? err.stack : String(err), 'Bootstrap');
  process.exit(1);
});
