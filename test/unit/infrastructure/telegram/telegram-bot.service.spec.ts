import { Logger } from '@nestjs/common';
import { Telegraf } from 'telegraf';
import { SERVICE_UNAVAILABLE_MESSAGE } from '@application/services';
import { ReplyChannel, TelegramBotService, TelegramUpdateHandler } from '@infrastructure/telegram';

type Handler = (ctx: Record<string, unknown>) => Promise<void>;
type ErrorHandler = (error: unknown, ctx: Record<string, unknown>) => Promise<void>;

describe('TelegramBotService', () => {
  let service: TelegramBotService;
  let handlers: Map<string, Handler>;
  let errorHandler: ErrorHandler | undefined;
  let fakeBot: { on: jest.Mock; catch: jest.Mock; launch: jest.Mock; stop: jest.Mock };
  let mockUpdateHandler: { handleText: jest.Mock; handleCallback: jest.Mock };

  const createContext = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
    chat: { id: 42 },
    from: { id: 7, username: 'tester' },
    update: { update_id: 1001 },
    reply: jest.fn().mockResolvedValue(undefined),
    replyWithPhoto: jest.fn().mockResolvedValue(undefined),
    answerCbQuery: jest.fn().mockResolvedValue(true),
    sendChatAction: jest.fn().mockResolvedValue(true),
    ...overrides,
  });

  const handlerFor = (update: string): Handler => {
    const handler = handlers.get(update);
    if (!handler) {
      throw new Error(`No handler registered for ${update}`);
    }
    return handler;
  };

  beforeEach(() => {
    handlers = new Map();
    errorHandler = undefined;
    fakeBot = {
      on: jest.fn((update: string, handler: Handler) => handlers.set(update, handler)),
      catch: jest.fn((handler: ErrorHandler) => {
        errorHandler = handler;
      }),
      launch: jest.fn(() => new Promise<void>(() => undefined)),
      stop: jest.fn(),
    };
    mockUpdateHandler = {
      handleText: jest.fn().mockResolvedValue(undefined),
      handleCallback: jest.fn().mockResolvedValue(undefined),
    };

    service = new TelegramBotService(
      fakeBot as unknown as Telegraf,
      mockUpdateHandler as unknown as TelegramUpdateHandler,
    );
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('lifecycle', () => {
    // Stands in for telegraf: reports the launch, then polls until stop() is called
    const pollUntilStopped = (): void => {
      fakeBot.launch.mockImplementation((_config: unknown, onLaunch: () => void) => {
        onLaunch();
        return new Promise<void>((resolve) => {
          fakeBot.stop.mockImplementation(() => resolve());
        });
      });
    };

    it('should register handlers and start polling for messages and button presses', () => {
      void service.start();

      expect([...handlers.keys()]).toEqual(['message', 'callback_query']);
      expect(fakeBot.launch).toHaveBeenCalledWith(
        { allowedUpdates: ['message', 'callback_query'] },
        expect.any(Function),
      );
    });

    it('should stop polling on shutdown and let start resolve', async () => {
      pollUntilStopped();
      const polling = service.start();

      service.onApplicationShutdown('SIGTERM');

      expect(fakeBot.stop).toHaveBeenCalledWith('SIGTERM');
      await expect(polling).resolves.toBeUndefined();
    });

    it('should not stop a bot whose launch has not completed', () => {
      void service.start();

      service.onApplicationShutdown('SIGTERM');

      expect(fakeBot.stop).not.toHaveBeenCalled();
    });

    it('should not stop a bot that never started', () => {
      service.onApplicationShutdown('SIGINT');

      expect(fakeBot.stop).not.toHaveBeenCalled();
    });

    it('should reject and log when polling cannot start', async () => {
      const errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
      fakeBot.launch.mockRejectedValue(new Error('401: Unauthorized'));

      await expect(service.start()).rejects.toThrow('401: Unauthorized');

      expect(errorSpy).toHaveBeenCalledWith('Polling failed: 401: Unauthorized');
      service.onApplicationShutdown('SIGTERM');
      expect(fakeBot.stop).not.toHaveBeenCalled();
    });

    it('should not stop again once polling has ended', async () => {
      pollUntilStopped();
      const polling = service.start();
      service.onApplicationShutdown('SIGTERM');
      await polling;

      service.onApplicationShutdown('SIGINT');

      expect(fakeBot.stop).toHaveBeenCalledTimes(1);
    });
  });

  describe('message updates', () => {
    it('should pass text and sender to the update handler', async () => {
      service.registerHandlers();
      const ctx = createContext({ message: { text: '/random' } });

      await handlerFor('message')(ctx);

      expect(mockUpdateHandler.handleText).toHaveBeenCalledWith(
        '/random',
        { chatId: 42, userId: 7, username: 'tester' },
        expect.objectContaining({ sendText: expect.any(Function), sendPhoto: expect.any(Function) }),
      );
    });

    it('should reply in the same chat through the channel', async () => {
      service.registerHandlers();
      const ctx = createContext({ message: { text: '/help' } });
      await handlerFor('message')(ctx);
      const channel: ReplyChannel = mockUpdateHandler.handleText.mock.calls[0][2];

      await channel.sendText('hi', { parse_mode: 'HTML' });

      expect(ctx.reply).toHaveBeenCalledWith('hi', { parse_mode: 'HTML' });
    });

    it('should show typing in the same chat through the channel', async () => {
      service.registerHandlers();
      const ctx = createContext({ message: { text: '/random' } });
      await handlerFor('message')(ctx);
      const channel: ReplyChannel = mockUpdateHandler.handleText.mock.calls[0][2];

      await channel.showTyping();

      expect(ctx.sendChatAction).toHaveBeenCalledWith('typing');
    });

    it('should ignore messages without text', async () => {
      service.registerHandlers();

      await handlerFor('message')(createContext({ message: { sticker: {} } }));

      expect(mockUpdateHandler.handleText).not.toHaveBeenCalled();
    });
  });

  describe('callback updates', () => {
    it('should pass the callback data and answer the query through the channel', async () => {
      service.registerHandlers();
      const ctx = createContext({ callbackQuery: { data: '11007' } });

      await handlerFor('callback_query')(ctx);
      expect(mockUpdateHandler.handleCallback).toHaveBeenCalledWith(
        '11007',
        { chatId: 42, userId: 7, username: 'tester' },
        expect.anything(),
      );

      await mockUpdateHandler.handleCallback.mock.calls[0][2].acknowledge();
      expect(ctx.answerCbQuery).toHaveBeenCalledTimes(1);
    });

    it('should hand over empty data for queries without data', async () => {
      service.registerHandlers();

      await handlerFor('callback_query')(createContext({ callbackQuery: { game_short_name: 'x' } }));

      expect(mockUpdateHandler.handleCallback.mock.calls[0][0]).toBe('');
    });
  });

  describe('error hook', () => {
    it('should answer with the generic message', async () => {
      service.registerHandlers();
      const ctx = createContext();

      await errorHandler?.(new Error('boom'), ctx);

      expect(errorHandler).toBeDefined();
      expect(ctx.reply).toHaveBeenCalledWith(SERVICE_UNAVAILABLE_MESSAGE);
    });

    it('should not reply when the update has no chat', async () => {
      service.registerHandlers();
      const ctx = createContext({ chat: undefined });

      await errorHandler?.(new Error('boom'), ctx);

      expect(ctx.reply).not.toHaveBeenCalled();
    });

    it('should swallow a failing notification after logging it', async () => {
      service.registerHandlers();
      const errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
      const ctx = createContext({ reply: jest.fn().mockRejectedValue(new Error('blocked')) });

      await expect(errorHandler?.(new Error('boom'), ctx)).resolves.toBeUndefined();

      expect(errorSpy).toHaveBeenCalledWith('Could not notify chat 42: blocked');
    });
  });
});
