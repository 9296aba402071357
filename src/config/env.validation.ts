import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Matches,
  Max,
  Min,
  validateSync,
} from 'class-validator';

const BOOLEAN_STRINGS = ['true', 'false'];

/**
 * Environment variables accepted at startup. Everything is optional; the
 * configuration factory supplies defaults for what is missing.
 */
export class EnvironmentVariables {
  @IsOptional()
  @IsIn(['development', 'production', 'test'])
  NODE_ENV?: string;

  @IsOptional()
  @IsIn(['error', 'warn', 'info', 'verbose', 'debug'])
  LOG_LEVEL?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsString()
  MARKET_LABEL?: string;

  @IsOptional()
  @Matches(/^[A-Za-z_]+(\/[A-Za-z0-9_+-]+)*$/, {
    message: 'MARKET_TIMEZONE must be an IANA zone name such as Asia/Kolkata',
  })
  MARKET_TIMEZONE?: string;

  @IsOptional()
  @IsString()
  FYERS_SYMBOL?: string;

  @IsOptional()
  @IsString()
  YAHOO_SYMBOL?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  BAR_INTERVAL_MINUTES?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(30)
  HISTORY_DAYS?: number;

  @IsOptional()
  @Matches(/^(fyers|yahoo)(,(fyers|yahoo))*$/, {
    message: 'DATA_SOURCES must be a comma-separated list of fyers and yahoo',
  })
  DATA_SOURCES?: string;

  @IsOptional()
  @IsString()
  FYERS_CLIENT_ID?: string;

  @IsOptional()
  @IsString()
  FYERS_SECRET_KEY?: string;

  @IsOptional()
  @IsString()
  FYERS_PIN?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  FYERS_API_BASE_URL?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  YAHOO_API_BASE_URL?: string;

  @IsOptional()
  @IsString()
  CREDENTIALS_PATH?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  HOLIDAY_API_URL?: string;

  @IsOptional()
  @Matches(/^(\d{4}-\d{2}-\d{2})?(,\d{4}-\d{2}-\d{2})*$/, {
    message: 'MARKET_HOLIDAYS must be a comma-separated list of YYYY-MM-DD dates',
  })
  MARKET_HOLIDAYS?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  RSI_PERIOD?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  EMA_FAST_PERIOD?: number;

  @IsOptional()
  @IsInt()
  @Min(2)
  EMA_SLOW_PERIOD?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  DIVERGENCE_LOOKBACK?: number;

  @IsOptional()
  @IsInt()
  @Min(2)
  MIN_BARS?: number;

  @IsOptional()
  @IsInt()
  @Min(2)
  DAILY_SUMMARY_MIN_BARS?: number;

  @IsOptional()
  @IsIn(BOOLEAN_STRINGS)
  DEBUG_MODE?: string;

  @IsOptional()
  @Matches(/^([01]\d|2[0-3]):[0-5]\d$/, { message: 'DAILY_SUMMARY_TIME must be HH:mm' })
  DAILY_SUMMARY_TIME?: string;

  @IsOptional()
  @IsIn(BOOLEAN_STRINGS)
  RUN_ON_STARTUP?: string;

  @IsOptional()
  @IsIn(BOOLEAN_STRINGS)
  ALERTS_ENABLED?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  WHATSAPP_URL?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  EMAIL_WEBHOOK_URL?: string;

  @IsOptional()
  @IsString()
  SMTP_HOST?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  SMTP_PORT?: number;

  @IsOptional()
  @IsString()
  SMTP_USER?: string;

  @IsOptional()
  @IsString()
  SMTP_PASSWORD?: string;

  @IsOptional()
  @IsIn(BOOLEAN_STRINGS)
  SMTP_SECURE?: string;

  @IsOptional()
  @IsString()
  SMTP_FROM?: string;

  @IsOptional()
  @IsString()
  ALERTS_EMAIL_RECIPIENTS?: string;

  @IsOptional()
  @IsInt()
  @Min(100)
  HTTP_TIMEOUT_MS?: number;
}

// Empty values in .env files mean "unset"
function dropEmptyValues(config: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(config).filter(([, value]) => value !== undefined && value !== ''),
  );
}

export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, dropEmptyValues(config), {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .flatMap((error) => Object.values(error.constraints ?? {}))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validated;
}
