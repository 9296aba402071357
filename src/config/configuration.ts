import { FEED_SOURCES, FeedSource } from '../market-data/market-data.types';
import { resolveSignalOptions, SignalEngineOptions } from '../signals/signal-engine';

export interface SmtpConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  secure: boolean;
  from: string;
}

export interface AppConfig {
  port: number;
  market: {
    label: string;
    timezone: string;
    fyersSymbol: string;
    yahooSymbol: string;
    barIntervalMinutes: number;
    historyDays: number;
    dataSources: FeedSource[];
    holidayApiUrl: string;
    holidays: string[];
  };
  fyers: {
    clientId?: string;
    secretKey?: string;
    pin?: string;
    apiBaseUrl: string;
    credentialsPath: string;
  };
  yahoo: {
    apiBaseUrl: string;
  };
  signals: {
    engine: SignalEngineOptions;
    dailySummaryMinBars: number;
    debugMode: boolean;
  };
  schedule: {
    dailySummaryTime: string;
    runOnStartup: boolean;
  };
  alerts: {
    enabled: boolean;
    whatsappUrl?: string;
    emailWebhookUrl?: string;
    smtp?: SmtpConfig;
    emailRecipients: string[];
  };
  http: {
    timeoutMs: number;
  };
}

type Env = Record<string, string | undefined>;

function str(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function int(env: Env, key: string, fallback: number): number {
  const value = str(env, key);
  return value === undefined ? fallback : parseInt(value, 10);
}

function bool(env: Env, key: string, fallback: boolean): boolean {
  const value = str(env, key);
  return value === undefined ? fallback : value === 'true';
}

function list(env: Env, key: string): string[] {
  return (str(env, key) ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item);
}

function isFeedSource(value: string): value is FeedSource {
  return FEED_SOURCES.some((source) => source === value);
}

function buildSmtp(env: Env): SmtpConfig | undefined {
  const host = str(env, 'SMTP_HOST');
  const user = str(env, 'SMTP_USER');
  const password = str(env, 'SMTP_PASSWORD');
  if (!host || !user || !password) {
    return undefined;
  }
  return {
    host,
    port: int(env, 'SMTP_PORT', 587),
    user,
    password,
    secure: bool(env, 'SMTP_SECURE', false),
    from: str(env, 'SMTP_FROM') ?? user,
  };
}

export function buildConfiguration(env: Env): AppConfig {
  const debugMode = bool(env, 'DEBUG_MODE', false);
  const dataSources = list(env, 'DATA_SOURCES').filter(isFeedSource);

  return {
    port: int(env, 'PORT', 3000),
    market: {
      label: str(env, 'MARKET_LABEL') ?? 'NIFTY50',
      timezone: str(env, 'MARKET_TIMEZONE') ?? 'Asia/Kolkata',
      fyersSymbol: str(env, 'FYERS_SYMBOL') ?? 'NSE:NIFTY50-INDEX',
      yahooSymbol: str(env, 'YAHOO_SYMBOL') ?? '^NSEI',
      barIntervalMinutes: int(env, 'BAR_INTERVAL_MINUTES', 15),
      historyDays: int(env, 'HISTORY_DAYS', 5),
      dataSources: dataSources.length > 0 ? dataSources : ['fyers', 'yahoo'],
      holidayApiUrl:
        str(env, 'HOLIDAY_API_URL') ?? 'https://www.nseindia.com/api/holiday-master?type=trading',
      holidays: list(env, 'MARKET_HOLIDAYS'),
    },
    fyers: {
      clientId: str(env, 'FYERS_CLIENT_ID'),
      secretKey: str(env, 'FYERS_SECRET_KEY'),
      pin: str(env, 'FYERS_PIN'),
      apiBaseUrl: str(env, 'FYERS_API_BASE_URL') ?? 'https://api-t1.fyers.in',
      credentialsPath: str(env, 'CREDENTIALS_PATH') ?? 'credentials.json',
    },
    yahoo: {
      apiBaseUrl: str(env, 'YAHOO_API_BASE_URL') ?? 'https://query1.finance.yahoo.com',
    },
    signals: {
      engine: resolveSignalOptions({
        rsiPeriod: int(env, 'RSI_PERIOD', 14),
        emaFastPeriod: int(env, 'EMA_FAST_PERIOD', 5),
        emaSlowPeriod: int(env, 'EMA_SLOW_PERIOD', 21),
        divergenceLookback: int(env, 'DIVERGENCE_LOOKBACK', 90),
        minBars: int(env, 'MIN_BARS', 50),
        includeStatus: debugMode,
      }),
      dailySummaryMinBars: int(env, 'DAILY_SUMMARY_MIN_BARS', 21),
      debugMode,
    },
    schedule: {
      dailySummaryTime: str(env, 'DAILY_SUMMARY_TIME') ?? '10:00',
      runOnStartup: bool(env, 'RUN_ON_STARTUP', true),
    },
    alerts: {
      enabled: bool(env, 'ALERTS_ENABLED', true),
      whatsappUrl: str(env, 'WHATSAPP_URL'),
      emailWebhookUrl: str(env, 'EMAIL_WEBHOOK_URL'),
      smtp: buildSmtp(env),
      emailRecipients: list(env, 'ALERTS_EMAIL_RECIPIENTS'),
    },
    http: {
      timeoutMs: int(env, 'HTTP_TIMEOUT_MS', 10000),
    },
  };
}

export default () => buildConfiguration(process.env);
