import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { TelegramBotService } from '@infrastructure/telegram';

async function bootstrap(): Promise<void> {
  // No HTTP server: the bot talks to Telegram through long polling
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
    abortOnError: false,
  });

  app.useLogger(app.get(Logger));
  app.enableShutdownHooks();

  app.get(Logger).log('🍹 Cocktail Bot started. Press Ctrl+C to stop.');

  // Resolves once a shutdown signal stopped polling
  try {
    await app.get(TelegramBotService).start();
  } catch (error) {
    await app.close();
    throw error;
  }
}

bootstrap().catch((error: unknown) => {
  // Invalid configuration or a bot that cannot poll: exit non-zero
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
