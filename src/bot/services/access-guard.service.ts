import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { botConfig } from '../../config/bot.config';

/**
 * Allow-list check. Both lists must contain the ids; an empty list denies
 * everyone.
 */
@Injectable()
export class AccessGuardService implements OnModuleInit {
  private readonly log = new Logger(AccessGuardService.name);

  constructor(
    @Inject(botConfig.KEY)
    private readonly config: ConfigType<typeof botConfig>,
  ) {}

  onModuleInit() {
    const { senderIds, conversationIds } = this.config.allowList;
    if (senderIds.size === 0) {
      this.log.warn('ALLOWED_USERIDS not set, every sender will be denied');
    }
    if (conversationIds.size === 0) {
      this.log.warn('ALLOWED_CHATIDS not set, every chat will be denied');
    }
  }

  permit(senderId: number, conversationId: number): boolean {
    const { senderIds, conversationIds } = this.config.allowList;
    return senderIds.has(senderId) && conversationIds.has(conversationId);
  }
}
