import { InternalServerErrorException, Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import axios from 'axios';
import { BotConfig, botConfig } from '../../config/bot.config';
import { testBotConfig } from '../../testing/bot-config.fixture';
import { axiosResponse, httpError, networkError } from '../../testing/http-fixtures';
import { TelegramAdapter } from './telegram.adapter';

const update = {
  update_id: 1,
  message: {
    message_id: 42,
    date: 1705312800,
    chat: { id: 2002, type: 'private' },
    from: { id: 1001, is_bot: false, first_name: 'Alice', username: 'alice' },
    text: '/s buy milk',
  },
};

async function createAdapter(config: BotConfig = testBotConfig()): Promise<TelegramAdapter> {
  const moduleRef = await Test.createTestingModule({
    providers: [TelegramAdapter, { provide: botConfig.KEY, useValue: config }],
  }).compile();
  return moduleRef.get(TelegramAdapter);
}

describe('TelegramAdapter', () => {
  let post: jest.SpyInstance;

  beforeEach(() => {
    post = jest.spyOn(axios, 'post');
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  describe('fromIncoming', () => {
    it('maps a text message', async () => {
      const adapter = await createAdapter();

      expect(adapter.fromIncoming(update)).toEqual({
        senderId: 1001,
        conversationId: 2002,
        messageId: 42,
        text: '/s buy milk',
        timestamp: '2024-01-15T10:00:00.000Z',
        sender: { username: 'alice', firstName: 'Alice', lastName: null },
      });
    });

    it.each([
      ['an edited message', { update_id: 2, edited_message: update.message }],
      ['a photo without caption text', { update_id: 3, message: { ...update.message, text: undefined } }],
      ['a message without sender', { update_id: 4, message: { ...update.message, from: undefined } }],
      ['a non-object body', 'hello'],
    ])('ignores %s', async (_label, body) => {
      const adapter = await createAdapter();
      expect(adapter.fromIncoming(body)).toBeNull();
    });
  });

  describe('sendReply', () => {
    it('posts the reply with its parse mode', async () => {
      const adapter = await createAdapter();
      post.mockResolvedValue(axiosResponse({ ok: true }));

      await adapter.sendReply(2002, { text: '```\nstats\n```', parseMode: 'Markdown' });

      expect(post).toHaveBeenCalledWith(
        'https://api.telegram.org/bottest-bot-token/sendMessage',
        { chat_id: 2002, text: '```\nstats\n```', parse_mode: 'Markdown' },
        expect.objectContaining({ timeout: 15_000 }),
      );
    });

    it('omits parse_mode for plain replies', async () => {
      const adapter = await createAdapter();
      post.mockResolvedValue(axiosResponse({ ok: true }));

      await adapter.sendReply(2002, { text: 'sent' });

      expect(post.mock.calls[0][1]).toEqual({ chat_id: 2002, text: 'sent' });
    });

    it('retries rate limits and network failures', async () => {
      const adapter = await createAdapter();
      jest.useFakeTimers({ doNotFake: ['nextTick', 'setImmediate', 'queueMicrotask'] });
      post
        .mockRejectedValueOnce(httpError(429))
        .mockRejectedValueOnce(networkError('ECONNRESET'))
        .mockResolvedValueOnce(axiosResponse({ ok: true }));

      const pending = adapter.sendReply(2002, { text: 'sent' });
      await jest.runAllTimersAsync();
      await pending;

      expect(post).toHaveBeenCalledTimes(3);
    });

    it('gives up after three attempts', async () => {
      const adapter = await createAdapter();
      jest.useFakeTimers({ doNotFake: ['nextTick', 'setImmediate', 'queueMicrotask'] });
      post.mockRejectedValue(httpError(502));

      const pending = expect(adapter.sendReply(2002, { text: 'sent' })).rejects.toBeInstanceOf(
        InternalServerErrorException,
      );
      await jest.runAllTimersAsync();
      await pending;

      expect(post).toHaveBeenCalledTimes(3);
    });

    it('does not retry client errors', async () => {
      const adapter = await createAdapter();
      post.mockRejectedValue(httpError(400, { ok: false, description: 'Bad Request: chat not found' }));

      await expect(adapter.sendReply(2002, { text: 'sent' })).rejects.toThrow(
        'Telegram API error: Bad Request: chat not found',
      );
      expect(post).toHaveBeenCalledTimes(1);
    });
  });

  describe('registerWebhook', () => {
    it('is skipped without a webhook url', async () => {
      const adapter = await createAdapter();

      await expect(adapter.registerWebhook()).resolves.toBe(false);
      expect(post).not.toHaveBeenCalled();
    });

    it('registers the url and secret', async () => {
      const adapter = await createAdapter(
        testBotConfig({
          TELEGRAM_WEBHOOK_URL: 'https://relay.test/telegram/webhook',
          TELEGRAM_WEBHOOK_SECRET: 'test-secret',
        }),
      );
      post.mockResolvedValue(axiosResponse({ ok: true }));

      await expect(adapter.registerWebhook()).resolves.toBe(true);
      expect(post).toHaveBeenCalledWith(
        'https://api.telegram.org/bottest-bot-token/setWebhook',
        {
          url: 'https://relay.test/telegram/webhook',
          allowed_updates: ['message'],
          secret_token: 'test-secret',
        },
        expect.objectContaining({ timeout: 15_000 }),
      );
    });

    it('reports a refused registration without throwing', async () => {
      const adapter = await createAdapter(
        testBotConfig({ TELEGRAM_WEBHOOK_URL: 'https://relay.test/telegram/webhook' }),
      );
      post.mockResolvedValue(axiosResponse({ ok: false, description: 'bad webhook' }));

      await expect(adapter.registerWebhook()).resolves.toBe(false);
    });
  });
});
