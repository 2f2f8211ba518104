import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { HttpConfig } from './config/relay.config';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule.register(process.argv[2]));
  app.enableShutdownHooks();

  const { port } = app.get(ConfigService).getOrThrow<HttpConfig>('http');
  await app.listen(port);
  Logger.log(`Relay listening on port ${port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(
    error instanceof Error ? error.message : String(error),
    error instanceof Error ? error.stack : undefined,
    'Bootstrap',
  );
  process.exit(1);
});
