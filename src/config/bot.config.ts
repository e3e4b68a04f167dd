import { hostname } from 'os';
import { registerAs } from '@nestjs/config';
import { EnvironmentVariables, validateEnv } from './env.validation';

export interface MessageTemplates {
  generalHelp: string;
  missingContent: string;
  sendFailed: string;
  sendSuccess: string;
  /** `{title}` is replaced by the note headline */
  sendSuccessWithTitle: string;
  helpText: string;
  /** Reply to senders outside the allow-lists; unset means no reply */
  accessDenied?: string;
}

export interface AllowList {
  senderIds: ReadonlySet<number>;
  conversationIds: ReadonlySet<number>;
}

export interface BotConfig {
  debug: boolean;
  telegram: {
    token: string;
    webhookUrl?: string;
    webhookSecret?: string;
  };
  allowList: AllowList;
  siyuan: {
    apiUrl: string;
    token: string;
  };
  openai: {
    /** Summaries and articles are disabled without a token */
    token?: string;
    model: string;
    baseUrl: string;
  };
  auditLogPath: string;
  savePlainMessages: boolean;
  timezone?: string;
  noteHostname: string;
  fastfetchConfig: string;
  port: number;
  templates: MessageTemplates;
}

export const DEFAULT_SIYUAN_API_URL =
  'https://liuyun.io/apis/siyuan/inbox/addCloudShorthand';
export const DEFAULT_OPENAI_MODEL = 'gpt-3.5-turbo';
export const DEFAULT_OPENAI_BASE_URL = 'https://api.openai.com/v1';

function defaultHelpText(savePlainMessages: boolean): string {
  const plain = savePlainMessages
    ? 'Any other message is saved to SiYuan as well.'
    : "You can also send any message, but it won't be saved to SiYuan\nwithout using the /s command.";
  return `Available commands:
/help - Show this help message
/s [message] - Save a message to SiYuan
/a [message or link] - Save an AI written article to SiYuan
/stats - Get system statistics

${plain}`;
}

function parseIds(list?: string): ReadonlySet<number> {
  if (!list) return new Set();
  return new Set(
    list
      .split(',')
      .map((id) => id.trim())
      .filter(Boolean)
      .map(Number),
  );
}

/**
 * Turn validated environment values into the immutable runtime config.
 */
export function buildBotConfig(env: EnvironmentVariables): BotConfig {
  const savePlainMessages = env.SAVE_PLAIN_MESSAGES ?? true;

  const config: BotConfig = {
    debug: env.DEBUG ?? false,
    telegram: {
      token: env.TELEGRAM_BOT_TOKEN.trim(),
      webhookUrl: env.TELEGRAM_WEBHOOK_URL,
      webhookSecret: env.TELEGRAM_WEBHOOK_SECRET,
    },
    allowList: Object.freeze({
      senderIds: parseIds(env.ALLOWED_USERIDS),
      conversationIds: parseIds(env.ALLOWED_CHATIDS),
    }),
    siyuan: {
      apiUrl: env.SIYUAN_API_URL ?? DEFAULT_SIYUAN_API_URL,
      token: env.SIYUAN_TOKEN.trim(),
    },
    openai: {
      token: env.OPENAI_TOKEN?.trim(),
      model: env.OPENAI_MODEL ?? DEFAULT_OPENAI_MODEL,
      baseUrl: (env.OPENAI_BASE_URL ?? DEFAULT_OPENAI_BASE_URL).replace(/\/+$/, ''),
    },
    auditLogPath: env.AUDIT_LOG_PATH ?? 'messages.log',
    savePlainMessages,
    timezone: env.TIMEZONE,
    noteHostname: env.NOTE_HOSTNAME ?? hostname(),
    fastfetchConfig: env.FASTFETCH_CONFIG ?? '/opt/fastfetch.jsonc',
    port: env.PORT ?? 3000,
    templates: Object.freeze({
      generalHelp:
        env.TXT_GENERAL_HELP ?? 'Hmm, check /help to see how I may assist you...',
      missingContent:
        env.TXT_MISSING_CONTENT ??
        'Please provide content to save after the /s command',
      sendFailed: env.TXT_SEND_FAILED ?? "❌ couldn't send to Siyuan",
      sendSuccess: env.TXT_SEND_SUCCESS ?? '✔️ sent',
      sendSuccessWithTitle:
        env.TXT_SEND_SUCCESS_WITH_TITLE ?? '✔️ sent as "{title}"',
      helpText: env.TXT_HELP_TEXT ?? defaultHelpText(savePlainMessages),
      accessDenied: env.TXT_ACCESS_DENIED,
    }),
  };

  return Object.freeze(config);
}

/**
 * Validated once when the config module loads; a bad environment stops the
 * bootstrap with a ConfigError.
 */
export const botConfig = registerAs('bot', (): BotConfig =>
  buildBotConfig(validateEnv(process.env)),
);
