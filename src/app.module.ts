import { Module } from '@nestjs/common';
import { APP_FILTER, APP_PIPE } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { LoggerModule, Params } from 'nestjs-pino';
import pino, { LevelWithSilent } from 'pino';
import { EnvVars, validate } from './config';

// Core Modules
import { TypedCqrsModule } from './modules/shared/cqrs/cqrs.module';
import { DomainExceptionFilter } from './modules/shared/errors/domain-exception.filter';
import { ZodValidationPipe } from './util/pipes/zod-validation.pipe';
import {
  requestSerializer,
  responseSerializer,
} from './modules/logger/serializers';

// Feature Modules
import { PresenceModule } from './modules/presence/presence.module';

export const getLoggerConfig = (
  configService: ConfigService<EnvVars, true>,
): Params => {
  const isLocal = configService.get('IS_LOCAL', { infer: true });

  return {
    pinoHttp: {
      serializers: {
        err: pino.stdSerializers.err,
        req: requestSerializer,
        res: responseSerializer,
      },
      autoLogging: !isLocal,
      wrapSerializers: true,
      level: isLocal ? 'debug' : 'info',
      transport: isLocal
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              singleLine: true,
              translateTime: 'SYS:HH:MM:ss',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
      customLogLevel: (_req, res, err): LevelWithSilent => {
        if (res.statusCode >= 500 || err) {
          return 'error';
        }
        if (res.statusCode >= 400) {
          return 'warn';
        }
        return 'info';
      },
      customSuccessMessage: (req, res): string =>
        `${req.method} ${req.url} completed with ${res.statusCode}`,
      customErrorMessage: (_req, res): string =>
        'request errored with status code: ' + res.statusCode,
      customAttributeKeys: {
        req: 'request',
        res: 'response',
        err: 'error',
        responseTime: 'timeTaken',
      },
    },
  };
};

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate,
    }),
    LoggerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: getLoggerConfig,
    }),
    TypedCqrsModule,
    PresenceModule,
  ],
  providers: [
    { provide: APP_PIPE, useClass: ZodValidationPipe },
    { provide: APP_FILTER, useClass: DomainExceptionFilter },
  ],
})
export class AppModule {}
