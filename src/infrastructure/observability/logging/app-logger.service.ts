// src/infrastructure/observability/logging/app-logger.service.ts
import { Injectable } from '@nestjs/common';
import { PinoLogger, InjectPinoLogger } from 'nestjs-pino';

export type RecipeApiOperation = 'random' | 'search' | 'filter' | 'lookup';

/**
 * Structured log events for the bot's two kinds of work: outbound
 * recipe API calls and handled Telegram updates.
 */
@Injectable()
export class AppLoggerService {
  constructor(
    @InjectPinoLogger(AppLoggerService.name)
    private readonly logger: PinoLogger,
  ) {}

  /**
   * Recipe API call finished (successfully or not)
   */
  logApiCall(context: {
    operation: RecipeApiOperation;
    endpoint: string;
    durationMs: number;
    success: boolean;
    status?: number;
    resultCount?: number;
    error?: string;
  }): void {
    const logData = {
      component: 'cocktaildb',
      ...context,
    };

    if (context.success) {
      this.logger.debug(
        logData,
        `Recipe API ${context.operation} returned ${context.resultCount ?? 0} result(s)`,
      );
    } else {
      this.logger.error(logData, `Recipe API ${context.operation} failed`);
    }
  }

  /**
   * Telegram update answered
   */
  logUpdate(context: {
    kind: 'command' | 'callback';
    name: string;
    chatId: number | null;
    userId: number | null;
    durationMs: number;
    delivered: boolean;
    error?: string;
  }): void {
    const logData = {
      component: 'telegram',
      ...context,
    };

    if (context.delivered) {
      this.logger.info(logData, `Handled ${context.kind} ${context.name}`);
    } else {
      this.logger.warn(logData, `Reply to ${context.kind} ${context.name} was not delivered`);
    }
  }
}
