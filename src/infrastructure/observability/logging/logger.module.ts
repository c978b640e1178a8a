// src/infrastructure/observability/logging/logger.module.ts
import { Global, Module } from '@nestjs/common';
import { LoggerModule as PinoLoggerModule, Params } from 'nestjs-pino';
import { EnvConfigService } from '@infrastructure/config/env-config.service';
import { AppLoggerService } from './app-logger.service';

@Global()
@Module({
  imports: [
    PinoLoggerModule.forRootAsync({
      inject: [EnvConfigService],
      useFactory: (envConfig: EnvConfigService): Params => {
        const isProduction = envConfig.isProduction;

        return {
          pinoHttp: {
            // Log level by environment
            level: isProduction ? 'info' : 'debug',

            // Readable output in development, JSON in production
            transport: isProduction
              ? undefined
              : {
                  target: 'pino-pretty',
                  options: {
                    colorize: true,
                    singleLine: false,
                    translateTime: 'SYS:standard',
                    ignore: 'pid,hostname',
                  },
                },

            // Never print the bot token
            redact: {
              paths: ['token', 'botToken', '*.token', '*.botToken'],
              censor: '[REDACTED]',
            },
          },
        };
      },
    }),
  ],
  providers: [AppLoggerService],
  exports: [PinoLoggerModule, AppLoggerService],
})
export class LoggerModule {}
