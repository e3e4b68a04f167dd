import { InternalServerErrorException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { botConfig } from '../config/bot.config';
import { ALLOWED_CHAT, ALLOWED_USER, testBotConfig } from '../testing/bot-config.fixture';
import { TelegramAdapter } from './adapters/telegram.adapter';
import { BotController } from './bot.controller';
import { BotService } from './bot.service';
import { configureDebugLogger } from '../common/utils/debug-logger';
import { DispatchOutcome, IncomingMessage } from './contracts';
import { ok } from './errors';
import { AccessGuardService } from './services/access-guard.service';
import { AuditLogService } from './services/audit-log.service';
import { MessageDedupService } from './services/message-dedup.service';
import { formatNote, NoteSinkService } from './services/note-sink.service';
import { SummarizerService } from './services/summarizer.service';
import { SystemStatsService } from './services/system-stats.service';
import { WebExtractorService } from './services/web-extractor.service';

const incoming: IncomingMessage = {
  senderId: ALLOWED_USER,
  conversationId: ALLOWED_CHAT,
  messageId: 5,
  text: '/help',
  timestamp: '2024-01-15T10:00:00.000Z',
  sender: { username: 'alice', firstName: null, lastName: null },
};

describe('BotController', () => {
  let controller: BotController;
  let bot: jest.Mocked<Pick<BotService, 'handle'>>;
  let tg: jest.Mocked<Pick<TelegramAdapter, 'fromIncoming' | 'sendReply'>>;

  beforeEach(async () => {
    bot = { handle: jest.fn() };
    tg = { fromIncoming: jest.fn(), sendReply: jest.fn().mockResolvedValue(undefined) };

    const moduleRef = await Test.createTestingModule({
      controllers: [BotController],
      providers: [
        { provide: BotService, useValue: bot },
        { provide: TelegramAdapter, useValue: tg },
        { provide: botConfig.KEY, useValue: testBotConfig() },
      ],
    }).compile();

    controller = moduleRef.get(BotController);
  });

  it('ignores updates without a text message', async () => {
    tg.fromIncoming.mockReturnValue(null);

    await expect(controller.telegram({ update_id: 1 })).resolves.toBe('OK');
    expect(bot.handle).not.toHaveBeenCalled();
  });

  it('sends every reply of the outcome to the chat', async () => {
    const outcome: DispatchOutcome = {
      correlationId: 'abc12345',
      state: 'help',
      replies: [{ text: 'help text' }],
    };
    tg.fromIncoming.mockReturnValue(incoming);
    bot.handle.mockResolvedValue(outcome);

    await expect(controller.telegram({ update_id: 1 })).resolves.toBe('OK');
    expect(tg.sendReply).toHaveBeenCalledWith(ALLOWED_CHAT, { text: 'help text' }, 'abc12345');
  });

  it('sends nothing for silent denials', async () => {
    tg.fromIncoming.mockReturnValue(incoming);
    bot.handle.mockResolvedValue({ correlationId: 'abc12345', state: 'denied', replies: [] });

    await controller.telegram({ update_id: 1 });

    expect(tg.sendReply).not.toHaveBeenCalled();
  });

  it('acknowledges the update when a reply cannot be delivered', async () => {
    tg.fromIncoming.mockReturnValue(incoming);
    bot.handle.mockResolvedValue({
      correlationId: 'abc12345',
      state: 'help',
      replies: [{ text: 'x' }, { text: 'y' }],
    });
    tg.sendReply.mockRejectedValueOnce(new InternalServerErrorException('Telegram API error: down'));
    const error = jest.spyOn(controller['log'], 'error').mockImplementation(() => undefined);

    await expect(controller.telegram({ update_id: 1 })).resolves.toBe('OK');
    expect(tg.sendReply).toHaveBeenCalledTimes(2);
    expect(error).toHaveBeenCalledWith('[TG] Reply to message 5 lost: Telegram API error: down');
  });
});

describe('BotController with the dispatcher', () => {
  const update = {
    update_id: 10,
    message: {
      message_id: 42,
      date: 1705312800,
      chat: { id: ALLOWED_CHAT, type: 'private' },
      from: { id: ALLOWED_USER, is_bot: false, first_name: 'Alice', username: 'alice' },
      text: 'buy milk',
    },
  };

  let controller: BotController;
  let tg: TelegramAdapter;
  let sink: jest.Mocked<Pick<NoteSinkService, 'submit'>>;
  let audit: jest.Mocked<Pick<AuditLogService, 'append'>>;

  beforeAll(() => {
    configureDebugLogger({ enabled: false });
  });

  afterAll(() => {
    configureDebugLogger({ enabled: true });
  });

  beforeEach(async () => {
    sink = { submit: jest.fn() };
    sink.submit.mockImplementation(async (enrichment, author) =>
      ok(formatNote(enrichment, author, 'UTC')),
    );
    audit = { append: jest.fn().mockResolvedValue(undefined) };

    const moduleRef = await Test.createTestingModule({
      controllers: [BotController],
      providers: [
        BotService,
        TelegramAdapter,
        AccessGuardService,
        MessageDedupService,
        { provide: botConfig.KEY, useValue: testBotConfig() },
        { provide: WebExtractorService, useValue: { extract: jest.fn() } },
        { provide: SummarizerService, useValue: { summarize: jest.fn() } },
        { provide: NoteSinkService, useValue: sink },
        { provide: AuditLogService, useValue: audit },
        { provide: SystemStatsService, useValue: { collect: jest.fn() } },
      ],
    }).compile();

    controller = moduleRef.get(BotController);
    tg = moduleRef.get(TelegramAdapter);
    jest.spyOn(controller['log'], 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('saves and audits a redelivered update only once', async () => {
    const send = jest
      .spyOn(tg, 'sendReply')
      .mockRejectedValueOnce(new InternalServerErrorException('Telegram API error: down'))
      .mockResolvedValue(undefined);

    await expect(controller.telegram(update)).resolves.toBe('OK');
    await expect(controller.telegram(update)).resolves.toBe('OK');

    expect(sink.submit).toHaveBeenCalledTimes(1);
    expect(audit.append).toHaveBeenCalledTimes(1);
    expect(send).toHaveBeenCalledTimes(1);
  });

  it('treats the same message id in another chat as a new message', async () => {
    jest.spyOn(tg, 'sendReply').mockResolvedValue(undefined);

    await controller.telegram(update);
    await controller.telegram({ ...update, message: { ...update.message, chat: { id: 3003 } } });

    expect(audit.append).toHaveBeenCalledTimes(2);
  });
});
