import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { EnvVars } from './config';
import { ShutdownService } from './modules/presence/application/lifecycle/shutdown.service';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  const logger = app.get(Logger);
  app.useLogger(logger);
  app.enableShutdownHooks();

  const swaggerConfig = new DocumentBuilder()
    .setTitle('Presence Log API')
    .setDescription('Presence tracker with per-day logs and Jalali summaries')
    .setVersion('1.0')
    .addTag('Presence')
    .build();
  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('docs', app, document);

  const configService = app.get<ConfigService<EnvVars, true>>(ConfigService);
  const host = configService.get('HOST', { infer: true });
  const port = configService.get('PORT', { infer: true });

  app.get(ShutdownService).requests.subscribe(() => {
    app.close().catch((error: unknown) => {
      logger.error({ err: error }, 'Failed to close application');
      process.exitCode = 1;
    });
  });

  await app.listen(port, host);
  logger.log(`Presence log listening on ${await app.getUrl()}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start application', error);
  process.exit(1);
});
