/**
 * Flow logger for the relay pipeline.
 *
 * One line per pipeline event, with an emoji and a colored tag so a single
 * message can be followed from webhook to inbox:
 *
 *   📥 RECV     - Incoming Telegram message
 *   🛡️  GUARD    - Allow-list decision
 *   🏷️  CLASS    - Content classification
 *   ✨ ENRICH   - Summary / article / scrape
 *   🔗 LINK     - External HTTP call
 *   📮 SINK     - Note submitted to the inbox
 *   🗒️  AUDIT    - Audit record appended
 *   📤 SEND     - Reply sent back to the chat
 *   ⚡ PERF     - Timing
 *   ✅ OK / ⚠️ WARN / ❌ ERR
 */

const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface DebugConfig {
  enabled: boolean;
  minLevel: LogLevel;
  showTimestamp: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const config: DebugConfig = {
  enabled: process.env.FLOW_LOGS !== '0',
  minLevel: 'info',
  showTimestamp: true,
};

/**
 * Adjust the flow logger at bootstrap (the DEBUG flag lowers the level).
 */
export function configureDebugLogger(patch: Partial<DebugConfig>): void {
  Object.assign(config, patch);
}

function formatValue(value: unknown, maxLen = 80): string {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'string') {
    const clean = value.replace(/\n/g, '↵').trim();
    return clean.length > maxLen ? clean.substring(0, maxLen) + '…' : clean;
  }
  if (typeof value === 'object') {
    const str = JSON.stringify(value);
    return str.length > maxLen ? str.substring(0, maxLen) + '…' : str;
  }
  return String(value);
}

function formatMs(ms: number): string {
  if (ms < 1) return '<1ms';
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

function timestamp(): string {
  if (!config.showTimestamp) return '';
  const now = new Date();
  const time = now.toTimeString().split(' ')[0];
  const ms = now.getMilliseconds().toString().padStart(3, '0');
  return `${colors.dim}${time}.${ms}${colors.reset} `;
}

function formatCid(cid?: string): string {
  if (!cid) return '';
  return `${colors.dim}[${cid}]${colors.reset} `;
}

const tagColors: Record<string, string> = {
  RECV: colors.cyan,
  GUARD: colors.magenta,
  CLASS: colors.blue,
  ENRICH: colors.magenta,
  LINK: colors.cyan,
  SINK: colors.yellow,
  AUDIT: colors.dim,
  SEND: colors.green,
  PERF: colors.bright,
  OK: colors.green,
  WARN: colors.yellow,
  ERR: colors.red,
};

class DebugLogger {
  constructor(private readonly context: string) {}

  isEnabled(level: LogLevel): boolean {
    if (!config.enabled) return false;
    return LOG_LEVELS[level] >= LOG_LEVELS[config.minLevel];
  }

  private log(
    level: LogLevel,
    emoji: string,
    tag: string,
    message: string,
    data?: Record<string, unknown>,
    cid?: string,
  ) {
    if (!this.isEnabled(level)) return;

    const tagColor = tagColors[tag] ?? colors.white;
    let line = `${timestamp()}${formatCid(cid)}${emoji} ${tagColor}${tag.padEnd(7)}${colors.reset} ${colors.dim}${this.context}${colors.reset} ${message}`;

    if (data && Object.keys(data).length > 0) {
      const dataStr = Object.entries(data)
        .map(([k, v]) => `${colors.dim}${k}=${colors.reset}${formatValue(v)}`)
        .join(' ');
      line += ` ${dataStr}`;
    }

    if (level === 'error') console.error(line);
    else console.log(line);
  }

  recv(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('info', '📥', 'RECV', message, data, cid);
  }

  guard(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('info', '🛡️ ', 'GUARD', message, data, cid);
  }

  classify(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('debug', '🏷️ ', 'CLASS', message, data, cid);
  }

  enrich(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('info', '✨', 'ENRICH', message, data, cid);
  }

  /** External service call */
  link(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('debug', '🔗', 'LINK', message, data, cid);
  }

  sink(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('info', '📮', 'SINK', message, data, cid);
  }

  audit(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('debug', '🗒️ ', 'AUDIT', message, data, cid);
  }

  send(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('info', '📤', 'SEND', message, data, cid);
  }

  perf(message: string, ms: number, cid?: string) {
    const formatted = formatMs(ms);
    const color = ms < 500 ? colors.green : ms < 3000 ? colors.yellow : colors.red;
    this.log('info', '⚡', 'PERF', message, { time: `${color}${formatted}${colors.reset}` }, cid);
  }

  ok(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('info', '✅', 'OK', message, data, cid);
  }

  warn(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('warn', '⚠️ ', 'WARN', message, data, cid);
  }

  err(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('error', '❌', 'ERR', message, data, cid);
  }

  child(subContext: string): DebugLogger {
    return new DebugLogger(`${this.context}:${subContext}`);
  }

  /** Visual separator between two messages, debug only */
  separator(cid?: string) {
    if (!this.isEnabled('debug')) return;
    console.log(
      `${timestamp()}${formatCid(cid)}${colors.dim}${'─'.repeat(60)}${colors.reset}`,
    );
  }

  /** Start a timer and return a function that logs the elapsed time */
  timer(label: string, cid?: string): () => void {
    const start = Date.now();
    return () => {
      this.perf(label, Date.now() - start, cid);
    };
  }
}

export function createDebugLogger(context: string): DebugLogger {
  return new DebugLogger(context);
}

export const debugLog = {
  dispatcher: createDebugLogger('dispatcher'),
  enrichment: createDebugLogger('enrichment'),
  sink: createDebugLogger('sink'),
  telegram: createDebugLogger('telegram'),
};

export { DebugLogger };
