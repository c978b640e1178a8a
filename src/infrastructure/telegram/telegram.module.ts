import { Module } from '@nestjs/common';
import { Telegraf } from 'telegraf';
import { ICocktailCatalogPort } from '@application/ports/outbound';
import { CocktailReplyFormatter } from '@application/services';
import { DispatchCommandUseCase } from '@application/use-cases';
import { CocktailDbModule } from '@infrastructure/adapters';
import { EnvConfigService } from '@infrastructure/config/env-config.service';
import { TELEGRAF_BOT } from './telegram.constants';
import { TelegramBotService } from './telegram-bot.service';
import { TelegramReplySender } from './telegram-reply.sender';
import { TelegramUpdateHandler } from './telegram-update.handler';

/**
 * Telegram module: the bot transport plus the dispatcher it feeds.
 *
 * The telegraf instance and the dispatcher are built once here and injected
 * where needed; nothing reaches for a global client.
 */
@Module({
  imports: [CocktailDbModule],
  providers: [
    CocktailReplyFormatter,
    {
      provide: 'IDispatchCommand',
      useFactory: (
        catalog: ICocktailCatalogPort,
        formatter: CocktailReplyFormatter,
      ): DispatchCommandUseCase => {
        return new DispatchCommandUseCase(catalog, formatter);
      },
      inject: ['ICocktailCatalog', CocktailReplyFormatter],
    },
    {
      provide: TELEGRAF_BOT,
      useFactory: (envConfig: EnvConfigService): Telegraf => new Telegraf(envConfig.botToken),
      inject: [EnvConfigService],
    },
    TelegramReplySender,
    TelegramUpdateHandler,
    TelegramBotService,
  ],
})
export class TelegramModule {}
