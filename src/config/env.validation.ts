import { plainToInstance, Transform, TransformFnParams } from 'class-transformer';
import {
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsTimeZone,
  IsUrl,
  Matches,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { ConfigError } from './config.error';

const ID_LIST = /^\s*(-?\d+\s*(,\s*-?\d+\s*)*)?$/;

const TRUTHY = ['true', '1', 't', 'yes', 'y'];
const FALSY = ['false', '0', 'f', 'no', 'n'];

function toFlag({ value }: TransformFnParams): unknown {
  if (typeof value !== 'string') return value;
  const v = value.trim().toLowerCase();
  if (TRUTHY.includes(v)) return true;
  if (FALSY.includes(v) || v === '') return false;
  return value;
}

function toDebugFlag(params: TransformFnParams): unknown {
  if (typeof params.value === 'boolean') return params.value;
  return toFlag(params) === true;
}

function toInt({ value }: TransformFnParams): unknown {
  if (typeof value !== 'string' || value.trim() === '') return value;
  return Number(value);
}

function blankToUndefined({ value }: TransformFnParams): unknown {
  if (typeof value === 'string' && value.trim() === '') return undefined;
  return value;
}

/**
 * Shape of the process environment the bot reads. Unknown variables are
 * ignored; the names here are the full configuration surface.
 */
export class EnvironmentVariables {
  @IsString()
  @IsNotEmpty({ message: 'TELEGRAM_BOT_TOKEN is required' })
  TELEGRAM_BOT_TOKEN!: string;

  @IsString()
  @IsNotEmpty({ message: 'SIYUAN_TOKEN is required' })
  SIYUAN_TOKEN!: string;

  @IsOptional()
  @Transform(blankToUndefined)
  @IsUrl({ require_tld: false })
  SIYUAN_API_URL?: string;

  @IsOptional()
  @Matches(ID_LIST, { message: 'ALLOWED_USERIDS must be comma-separated integers' })
  ALLOWED_USERIDS?: string;

  @IsOptional()
  @Matches(ID_LIST, { message: 'ALLOWED_CHATIDS must be comma-separated integers' })
  ALLOWED_CHATIDS?: string;

  // Anything that is not a recognised truthy word means "off".
  @IsOptional()
  @Transform(toDebugFlag)
  @IsBoolean()
  DEBUG?: boolean;

  @IsOptional()
  @Transform(blankToUndefined)
  @IsString()
  OPENAI_TOKEN?: string;

  @IsOptional()
  @Transform(blankToUndefined)
  @IsString()
  OPENAI_MODEL?: string;

  @IsOptional()
  @Transform(blankToUndefined)
  @IsUrl({ require_tld: false })
  OPENAI_BASE_URL?: string;

  @IsOptional()
  @Transform(blankToUndefined)
  @IsString()
  AUDIT_LOG_PATH?: string;

  @IsOptional()
  @Transform(toFlag)
  @IsBoolean({ message: 'SAVE_PLAIN_MESSAGES must be true or false' })
  SAVE_PLAIN_MESSAGES?: boolean;

  @IsOptional()
  @Transform(blankToUndefined)
  @IsTimeZone()
  TIMEZONE?: string;

  @IsOptional()
  @Transform(blankToUndefined)
  @IsString()
  NOTE_HOSTNAME?: string;

  @IsOptional()
  @Transform(blankToUndefined)
  @IsString()
  FASTFETCH_CONFIG?: string;

  @IsOptional()
  @Transform(blankToUndefined)
  @IsUrl({ protocols: ['https'], require_protocol: true })
  TELEGRAM_WEBHOOK_URL?: string;

  @IsOptional()
  @Transform(blankToUndefined)
  @Matches(/^[A-Za-z0-9_-]{1,256}$/, {
    message: 'TELEGRAM_WEBHOOK_SECRET may only contain A-Z, a-z, 0-9, _ and -',
  })
  TELEGRAM_WEBHOOK_SECRET?: string;

  @IsOptional()
  @Transform(toInt)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional() @IsString() TXT_GENERAL_HELP?: string;
  @IsOptional() @IsString() TXT_MISSING_CONTENT?: string;
  @IsOptional() @IsString() TXT_SEND_FAILED?: string;
  @IsOptional() @IsString() TXT_SEND_SUCCESS?: string;
  @IsOptional() @IsString() TXT_SEND_SUCCESS_WITH_TITLE?: string;
  @IsOptional() @IsString() TXT_HELP_TEXT?: string;

  @IsOptional()
  @Transform(blankToUndefined)
  @IsString()
  TXT_ACCESS_DENIED?: string;
}

/**
 * Validate raw environment values. Throws {@link ConfigError} listing every
 * problem found.
 */
export function validateEnv(raw: Record<string, unknown>): EnvironmentVariables {
  const env = plainToInstance(EnvironmentVariables, raw);
  const errors = validateSync(env, { skipMissingProperties: false });

  if (errors.length > 0) {
    const problems = errors.flatMap((e) =>
      Object.values(e.constraints ?? {}).map((msg) =>
        msg.startsWith(e.property) ? msg : `${e.property}: ${msg}`,
      ),
    );
    throw new ConfigError('Invalid environment configuration', problems);
  }

  return env;
}
