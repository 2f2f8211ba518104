import { Telegraf, Telegram } from 'telegraf';
import type { Message, Update, UserFromGetMe } from 'telegraf/types';
import {
  isTelegramUpdate,
  TelegramTransportService,
} from '../telegram-transport.service';
import { RelayService } from '../relay.service';
import { ChatMessage } from '../../models/chat-message.model';
import { TelegramOptions } from '../../interfaces/config.interface';

const botInfo = {
  id: 1,
  is_bot: true,
  first_name: 'Relay',
  username: 'relay_bot',
  can_join_groups: true,
  can_read_all_group_messages: false,
  supports_inline_queries: false,
} as UserFromGetMe;

function toUpdate(body: unknown): Update {
  if (!isTelegramUpdate(body)) {
    throw new Error('not a Telegram update');
  }
  return body;
}

function textUpdate(text: string): Update {
  return toUpdate({
    update_id: 1,
    message: {
      message_id: 10,
      date: 0,
      chat: { id: 100, type: 'private', first_name: 'Ada' },
      from: { id: 5, is_bot: false, first_name: 'Ada' },
      text,
    },
  });
}

describe('TelegramTransportService', () => {
  let bot: Telegraf;
  let relay: { handle: jest.Mock };

  function createService(options: Partial<TelegramOptions> = {}) {
    return new TelegramTransportService(
      { botToken: 'test-token', ...options },
      relay as unknown as RelayService,
      bot,
    );
  }

  beforeEach(() => {
    bot = new Telegraf('test-token');
    bot.botInfo = botInfo;
    relay = { handle: jest.fn().mockResolvedValue(undefined) };
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('isTelegramUpdate', () => {
    it.each([
      [{ update_id: 1 }, true],
      [{ update_id: '1' }, false],
      [{}, false],
      [null, false],
      ['update', false],
    ])('should classify %p', (body, expected) => {
      expect(isTelegramUpdate(body)).toBe(expected);
    });
  });

  describe('handleUpdate', () => {
    it('should relay text messages as chat messages', async () => {
      const service = createService();

      await service.handleUpdate(textUpdate('hello'));

      expect(relay.handle).toHaveBeenCalledTimes(1);
      const message: unknown = relay.handle.mock.calls[0][0];
      expect(message).toBeInstanceOf(ChatMessage);
      expect(message).toMatchObject({
        chatId: '100',
        userId: '5',
        firstName: 'Ada',
        text: 'hello',
      });
    });

    it('should ignore updates without text', async () => {
      const service = createService();

      await service.handleUpdate(
        toUpdate({
          update_id: 2,
          message: {
            message_id: 11,
            date: 0,
            chat: { id: 100, type: 'private', first_name: 'Ada' },
            sticker: { file_id: 'sticker', file_unique_id: 'sticker' },
          },
        }),
      );

      expect(relay.handle).not.toHaveBeenCalled();
    });

    it('should send replies to the originating chat', async () => {
      const sendMessage = jest
        .spyOn(Telegram.prototype, 'sendMessage')
        .mockResolvedValue({} as Message.TextMessage);
      const service = createService();

      await service.handleUpdate(textUpdate('hello'));
      const message: ChatMessage = relay.handle.mock.calls[0][0];
      await message.reply('hi back');

      expect(sendMessage).toHaveBeenCalledTimes(1);
      expect(sendMessage.mock.calls[0][0]).toBe(100);
      expect(sendMessage.mock.calls[0][1]).toBe('hi back');
    });
  });

  describe('lifecycle', () => {
    let getMe: jest.SpyInstance;
    let setWebhook: jest.SpyInstance;
    let deleteWebhook: jest.SpyInstance;
    let launch: jest.SpyInstance;
    let stop: jest.SpyInstance;

    beforeEach(() => {
      getMe = jest.spyOn(bot.telegram, 'getMe').mockResolvedValue(botInfo);
      setWebhook = jest.spyOn(bot.telegram, 'setWebhook').mockResolvedValue(true);
      deleteWebhook = jest
        .spyOn(bot.telegram, 'deleteWebhook')
        .mockResolvedValue(true);
      launch = jest.spyOn(bot, 'launch').mockResolvedValue(undefined);
      stop = jest.spyOn(bot, 'stop').mockImplementation(() => undefined);
    });

    it('should default to polling', () => {
      expect(createService().mode).toBe('polling');
    });

    it('should register the webhook with its secret in webhook mode', async () => {
      const service = createService({
        transport: 'webhook',
        webhookUrl: 'https://relay.test/telegram/webhook',
        webhookSecret: 'test-secret',
      });

      await service.onApplicationBootstrap();
      service.onApplicationShutdown('SIGTERM');

      expect(getMe).toHaveBeenCalledTimes(1);
      expect(setWebhook).toHaveBeenCalledWith(
        'https://relay.test/telegram/webhook',
        { secret_token: 'test-secret' },
      );
      expect(launch).not.toHaveBeenCalled();
      expect(stop).not.toHaveBeenCalled();
    });

    it('should leave the webhook alone when no URL is configured', async () => {
      const service = createService({ transport: 'webhook' });

      await service.onApplicationBootstrap();

      expect(setWebhook).not.toHaveBeenCalled();
      expect(launch).not.toHaveBeenCalled();
    });

    it('should drop any webhook and start polling', async () => {
      const service = createService({ transport: 'polling' });

      await service.onApplicationBootstrap();
      service.onApplicationShutdown('SIGTERM');

      expect(deleteWebhook).toHaveBeenCalledTimes(1);
      expect(launch).toHaveBeenCalledTimes(1);
      expect(stop).toHaveBeenCalledWith('SIGTERM');
    });

    it('should still poll when deleting the webhook fails', async () => {
      deleteWebhook.mockRejectedValue(new Error('network down'));
      const service = createService();

      await service.onApplicationBootstrap();

      expect(launch).toHaveBeenCalledTimes(1);
    });

    it('should not stop a polling loop that already failed', async () => {
      launch.mockRejectedValue(new Error('409 Conflict'));
      const service = createService();

      await service.onApplicationBootstrap();
      await new Promise((resolve) => setImmediate(resolve));
      service.onApplicationShutdown('SIGTERM');

      expect(stop).not.toHaveBeenCalled();
    });

    it('should fail bootstrap when the bot token is rejected', async () => {
      getMe.mockRejectedValue(new Error('401: Unauthorized'));
      const service = createService();

      await expect(service.onApplicationBootstrap()).rejects.toThrow(
        '401: Unauthorized',
      );
      expect(launch).not.toHaveBeenCalled();
    });
  });
});
