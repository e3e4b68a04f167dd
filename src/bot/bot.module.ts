import { Module } from '@nestjs/common';
import { BotService } from './bot.service';
import { BotController } from './bot.controller';
import { TelegramAdapter } from './adapters/telegram.adapter';
import { TelegramWebhookGuard } from './guards/telegram-webhook.guard';
import { AccessGuardService } from './services/access-guard.service';
import { AuditLogService } from './services/audit-log.service';
import { MessageDedupService } from './services/message-dedup.service';
import { NoteSinkService } from './services/note-sink.service';
import { SummarizerService } from './services/summarizer.service';
import { COMMAND_RUNNER, execCommand, SystemStatsService } from './services/system-stats.service';
import { WebExtractorService } from './services/web-extractor.service';

@Module({
  controllers: [BotController],
  providers: [
    BotService,
    TelegramAdapter,
    TelegramWebhookGuard,
    AccessGuardService,
    WebExtractorService,
    SummarizerService,
    NoteSinkService,
    AuditLogService,
    MessageDedupService,
    SystemStatsService,
    { provide: COMMAND_RUNNER, useValue: execCommand },
  ],
  exports: [BotService],
})
export class BotModule {}
