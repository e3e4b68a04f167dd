import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { execFile } from 'child_process';
import { promisify } from 'util';
import { botConfig } from '../../config/bot.config';
import { describeError } from '../errors';

export const COMMAND_RUNNER = 'COMMAND_RUNNER';

export type CommandRunner = (
  file: string,
  args: string[],
  options: { timeout: number },
) => Promise<{ stdout: string }>;

const execFileAsync = promisify(execFile);

export const execCommand: CommandRunner = (file, args, options) =>
  execFileAsync(file, args, { timeout: options.timeout, encoding: 'utf8' });

export const STATS_ERROR = 'Error getting system statistics';

const ANSI_ESCAPE = /\x1B(?:[@-Z\\-_]|\[[0-?]*[ -/]*[@-~])/g;

/**
 * Terminal output made safe for a Telegram code block: escape sequences,
 * non-ASCII and control characters removed.
 */
export function cleanOutput(text: string): string {
  return text
    .replace(ANSI_ESCAPE, '')
    .replace(/[^\x00-\x7F]/g, '')
    .replace(/[\x00-\x08\x0E-\x1F\x7F]/g, '')
    .replace(/Disk \(8;;file:\/\/\/\/8;;\):/g, 'Disk (/):');
}

@Injectable()
export class SystemStatsService {
  private readonly logger = new Logger(SystemStatsService.name);
  private readonly timeout = 15_000;

  constructor(
    @Inject(botConfig.KEY)
    private readonly config: ConfigType<typeof botConfig>,
    @Inject(COMMAND_RUNNER)
    private readonly run: CommandRunner,
  ) {}

  /** Never rejects; failures are logged and answered with STATS_ERROR. */
  async collect(): Promise<string> {
    try {
      const { stdout } = await this.run('fastfetch', ['-c', this.config.fastfetchConfig], {
        timeout: this.timeout,
      });
      return cleanOutput(stdout);
    } catch (err) {
      this.logger.error(`Error running fastfetch: ${describeError(err)}`);
      return STATS_ERROR;
    }
  }
}
