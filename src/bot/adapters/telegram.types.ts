/**
 * The subset of the Telegram Bot API objects the relay reads or sends.
 * https://core.telegram.org/bots/api#update
 */

export interface TelegramUser {
  id: number;
  is_bot?: boolean;
  first_name?: string;
  last_name?: string;
  username?: string;
}

interface TelegramChat {
  id: number;
  type?: string;
}

export interface TelegramMessage {
  message_id: number;
  date: number;
  chat: TelegramChat;
  from?: TelegramUser;
  text?: string;
}

export interface SendMessagePayload {
  chat_id: number;
  text: string;
  parse_mode?: 'Markdown' | 'MarkdownV2' | 'HTML';
}

export interface SetWebhookPayload {
  url: string;
  secret_token?: string;
  allowed_updates: string[];
}

export interface TelegramApiResponse {
  ok: boolean;
  description?: string;
}

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

/**
 * Narrows an untrusted webhook body to a text message with sender and chat.
 * Edited messages, channel posts and media without text are not messages here.
 */
export function textMessageOf(
  update: unknown,
): (TelegramMessage & { text: string; from: TelegramUser }) | null {
  if (!isObject(update) || !('message' in update)) return null;
  const message = update.message;
  if (!isObject(message)) return null;
  if (!('text' in message) || typeof message.text !== 'string') return null;
  if (!('message_id' in message) || typeof message.message_id !== 'number') return null;
  if (!('date' in message) || typeof message.date !== 'number') return null;
  if (!('chat' in message) || !isObject(message.chat)) return null;
  if (!('id' in message.chat) || typeof message.chat.id !== 'number') return null;
  if (!('from' in message) || !isObject(message.from)) return null;
  if (!('id' in message.from) || typeof message.from.id !== 'number') return null;

  const from = message.from;
  return {
    message_id: message.message_id,
    date: message.date,
    text: message.text,
    chat: { id: message.chat.id },
    from: {
      id: message.from.id,
      first_name: stringField(from, 'first_name'),
      last_name: stringField(from, 'last_name'),
      username: stringField(from, 'username'),
    },
  };
}

function stringField(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : undefined;
}
