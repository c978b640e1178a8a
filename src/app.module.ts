import { Module } from '@nestjs/common';
import { ConfigModule } from '@infrastructure/config/config.module';
import { LoggerModule } from '@infrastructure/observability';
import { TelegramModule } from '@infrastructure/telegram';

@Module({
  imports: [
    // Validated environment, available everywhere
    ConfigModule,

    // pino logger replacing Nest's default one
    LoggerModule,

    // Bot transport, dispatcher and recipe API client
    TelegramModule,
  ],
})
export class AppModule {}
