export type BotCommand = 'help' | 'save' | 'article' | 'stats' | 'unknown' | 'plain';

export interface ParsedCommand {
  command: BotCommand;
  /** Text after the command (or the whole text for plain messages), trimmed */
  content: string;
}

const COMMANDS: Record<string, BotCommand> = {
  help: 'help',
  start: 'help',
  s: 'save',
  a: 'article',
  stats: 'stats',
};

// "/cmd", "/cmd@SomeBot", followed by whitespace or end of text
const COMMAND_PATTERN = /^\/([A-Za-z0-9_]+)(?:@[A-Za-z0-9_]+)?(?=\s|$)/;

export function parseCommand(text: string): ParsedCommand {
  const trimmed = text.trim();
  const match = COMMAND_PATTERN.exec(trimmed);

  if (!match) {
    return { command: 'plain', content: trimmed };
  }

  const name = match[1].toLowerCase();
  return {
    command: COMMANDS[name] ?? 'unknown',
    content: trimmed.substring(match[0].length).trim(),
  };
}
