import {
  Inject,
  Injectable,
  InternalServerErrorException,
  Logger,
  OnApplicationBootstrap,
} from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import axios from 'axios';
import { Agent } from 'https';
import { botConfig } from '../../config/bot.config';
import { debugLog } from '../../common/utils/debug-logger';
import { isTransientHttpError, withRetry } from '../../common/utils/resilience';
import { BotReply, IncomingMessage } from '../contracts';
import { describeError } from '../errors';
import {
  SendMessagePayload,
  SetWebhookPayload,
  TelegramApiResponse,
  textMessageOf,
} from './telegram.types';

// Force IPv4 to avoid timeout issues in Docker
const httpsAgent = new Agent({ family: 4 });

@Injectable()
export class TelegramAdapter implements OnApplicationBootstrap {
  private readonly log = new Logger(TelegramAdapter.name);
  private readonly flow = debugLog.telegram;

  constructor(
    @Inject(botConfig.KEY)
    private readonly config: ConfigType<typeof botConfig>,
  ) {}

  private get apiBase(): string {
    return `https://api.telegram.org/bot${this.config.telegram.token}`;
  }

  async onApplicationBootstrap(): Promise<void> {
    await this.registerWebhook();
  }

  fromIncoming(update: unknown): IncomingMessage | null {
    const msg = textMessageOf(update);
    if (!msg) {
      this.log.debug('Telegram update without a text message');
      return null;
    }

    return {
      senderId: msg.from.id,
      conversationId: msg.chat.id,
      messageId: msg.message_id,
      text: msg.text,
      timestamp: new Date(msg.date * 1000).toISOString(),
      sender: {
        username: msg.from.username ?? null,
        firstName: msg.from.first_name ?? null,
        lastName: msg.from.last_name ?? null,
      },
    };
  }

  /**
   * Sends one reply, retrying rate limits, server errors and network
   * failures up to three attempts.
   *
   * @throws InternalServerErrorException when the reply could not be delivered
   */
  async sendReply(chatId: number, reply: BotReply, cid?: string): Promise<void> {
    const payload: SendMessagePayload = {
      chat_id: chatId,
      text: reply.text,
      ...(reply.parseMode && { parse_mode: reply.parseMode }),
    };

    try {
      await withRetry(
        () => axios.post(`${this.apiBase}/sendMessage`, payload, { timeout: 15_000, httpsAgent }),
        {
          maxAttempts: 3,
          baseDelayMs: 1000,
          shouldRetry: isTransientHttpError,
          onRetry: (error, attempt) =>
            this.log.warn(`Telegram attempt ${attempt}/3 failed: ${describeError(error)}`),
        },
      );
    } catch (err) {
      const description = axios.isAxiosError<TelegramApiResponse>(err)
        ? err.response?.data?.description ?? err.message
        : describeError(err);
      this.flow.err('Reply not delivered', { chatId, reason: description }, cid);
      throw new InternalServerErrorException(`Telegram API error: ${description}`);
    }

    this.flow.send('Reply sent', { chatId, chars: reply.text.length }, cid);
  }

  /**
   * Points Telegram at our webhook. Skipped when no public URL is set, e.g.
   * behind a reverse proxy that registers the hook itself.
   */
  async registerWebhook(): Promise<boolean> {
    const { webhookUrl, webhookSecret } = this.config.telegram;
    if (!webhookUrl) {
      this.log.log('TELEGRAM_WEBHOOK_URL not set, skipping webhook registration');
      return false;
    }

    const payload: SetWebhookPayload = {
      url: webhookUrl,
      allowed_updates: ['message'],
      ...(webhookSecret ? { secret_token: webhookSecret } : {}),
    };

    try {
      const { data } = await axios.post<TelegramApiResponse>(`${this.apiBase}/setWebhook`, payload, {
        timeout: 15_000,
        httpsAgent,
      });
      if (!data.ok) {
        this.log.error(`setWebhook refused: ${data.description ?? 'unknown reason'}`);
        return false;
      }
    } catch (err) {
      this.log.error(`setWebhook failed: ${describeError(err)}`);
      return false;
    }

    this.log.log('Telegram webhook registered');
    return true;
  }
}
