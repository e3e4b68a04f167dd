import { Body, Controller, HttpCode, Logger, Post, UseGuards } from '@nestjs/common';
import { BotService } from './bot.service';
import { TelegramAdapter } from './adapters/telegram.adapter';
import { TelegramWebhookGuard } from './guards/telegram-webhook.guard';
import { describeError } from './errors';

@Controller()
export class BotController {
  private readonly log = new Logger(BotController.name);

  constructor(
    private readonly bot: BotService,
    private readonly tg: TelegramAdapter,
  ) {}

  /**
   * Telegram webhook. Once the message is handled (and audited) the update
   * is acknowledged with 200 even if a reply cannot be delivered, so Telegram
   * does not redeliver it.
   */
  @Post('telegram/webhook')
  @HttpCode(200)
  @UseGuards(TelegramWebhookGuard)
  async telegram(@Body() body: unknown): Promise<string> {
    const msg = this.tg.fromIncoming(body);
    if (!msg) {
      this.log.debug('[TG] Update without a text message ignored');
      return 'OK';
    }

    const outcome = await this.bot.handle(msg);
    this.log.debug(`[TG] Message ${msg.messageId} ended as ${outcome.state}`);

    for (const reply of outcome.replies) {
      try {
        await this.tg.sendReply(msg.conversationId, reply, outcome.correlationId);
      } catch (err) {
        this.log.error(`[TG] Reply to message ${msg.messageId} lost: ${describeError(err)}`);
      }
    }
    return 'OK';
  }
}
