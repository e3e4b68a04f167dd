import {
  CanActivate,
  ExecutionContext,
  Inject,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { timingSafeEqual } from 'crypto';
import type { Request } from 'express';
import { botConfig } from '../../config/bot.config';

export const SECRET_HEADER = 'x-telegram-bot-api-secret-token';

/**
 * Rejects webhook calls that do not carry the secret registered with
 * setWebhook. Open when TELEGRAM_WEBHOOK_SECRET is unset.
 */
@Injectable()
export class TelegramWebhookGuard implements CanActivate {
  private readonly log = new Logger(TelegramWebhookGuard.name);

  constructor(
    @Inject(botConfig.KEY)
    private readonly config: ConfigType<typeof botConfig>,
  ) {}

  canActivate(ctx: ExecutionContext): boolean {
    const expected = this.config.telegram.webhookSecret;
    if (!expected) return true;

    const req = ctx.switchToHttp().getRequest<Request>();
    const header = req.headers[SECRET_HEADER];
    const received = Array.isArray(header) ? header[0] : header;

    if (!received || !this.matches(received, expected)) {
      this.log.warn(`Webhook call rejected from ${req.ip ?? 'unknown address'}`);
      throw new UnauthorizedException('Invalid webhook secret');
    }
    return true;
  }

  private matches(received: string, expected: string): boolean {
    const a = Buffer.from(received);
    const b = Buffer.from(expected);
    return a.length === b.length && timingSafeEqual(a, b);
  }
}
