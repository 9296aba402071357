import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { isAxiosError } from 'axios';
import { AppConfig } from '../../config/configuration';
import { FyersAuthService, FyersCredentials } from '../../auth/fyers-auth.service';
import { errorMessage } from '../../common/utils/error.utils';
import { shiftDateKey, zonedDateKey } from '../../common/utils/time.utils';
import { LoggerService } from '../../logger/logger.service';
import { Bar, FetchRequest, FetchResult, PriceFeedAdapter } from '../market-data.types';

interface HistoryResponse {
  s?: string;
  code?: number;
  message?: string;
  candles?: unknown[];
}

const INVALID_TOKEN_CODE = -16;

function toBar(row: unknown): Bar | undefined {
  if (!Array.isArray(row) || row.length < 6) {
    return undefined;
  }
  const values = row.slice(0, 6);
  if (!values.every((value): value is number => typeof value === 'number' && Number.isFinite(value))) {
    return undefined;
  }
  const [time, open, high, low, close, volume] = values;
  return { time: time * 1000, open, high, low, close, volume };
}

/**
 * Broker history API. Candles arrive as `[epochSeconds, o, h, l, c, v]`.
 */
@Injectable()
export class FyersAdapter implements PriceFeedAdapter {
  readonly source = 'fyers' as const;
  private readonly apiBaseUrl: string;
  private readonly symbol: string;
  private readonly timezone: string;
  private readonly timeoutMs: number;

  constructor(
    configService: ConfigService<AppConfig, true>,
    private auth: FyersAuthService,
    private logger: LoggerService,
  ) {
    this.logger.setContext('FyersAdapter');
    const market = configService.get('market', { infer: true });
    this.apiBaseUrl = configService.get('fyers', { infer: true }).apiBaseUrl;
    this.symbol = market.fyersSymbol;
    this.timezone = market.timezone;
    this.timeoutMs = configService.get('http', { infer: true }).timeoutMs;
  }

  async fetchBars(request: FetchRequest): Promise<FetchResult> {
    try {
      let credentials = await this.auth.getCredentials();
      if (!credentials) {
        return { ok: false, source: this.source, error: 'Fyers credentials not configured' };
      }

      let response = await this.requestHistory(credentials, request);

      if (response.code === INVALID_TOKEN_CODE) {
        this.logger.warn('Fyers token invalid, refreshing');
        const refreshed = await this.auth.refreshAccessToken();
        credentials = refreshed ? await this.auth.getCredentials() : undefined;
        if (!credentials) {
          return { ok: false, source: this.source, error: 'Fyers token invalid and refresh failed' };
        }
        response = await this.requestHistory(credentials, request);
      }

      if (response.s !== 'ok' || !Array.isArray(response.candles)) {
        return {
          ok: false,
          source: this.source,
          error: `Unexpected response: ${response.message ?? JSON.stringify(response)}`,
        };
      }

      const bars = response.candles.map(toBar).filter((bar): bar is Bar => bar !== undefined);
      this.logger.debug(`Fetched ${bars.length} bar(s) from Fyers`, {
        symbol: this.symbol,
        received: response.candles.length,
      });
      return { ok: true, source: this.source, bars };
    } catch (error: unknown) {
      return { ok: false, source: this.source, error: errorMessage(error) };
    }
  }

  private async requestHistory(credentials: FyersCredentials, request: FetchRequest): Promise<HistoryResponse> {
    const rangeTo = zonedDateKey(request.now, this.timezone);
    const rangeFrom = shiftDateKey(rangeTo, -request.historyDays);

    try {
      const response = await axios.get<HistoryResponse>(`${this.apiBaseUrl}/data/history`, {
        params: {
          symbol: this.symbol,
          resolution: String(request.intervalMinutes),
          date_format: '1',
          range_from: rangeFrom,
          range_to: rangeTo,
          cont_flag: '1',
        },
        headers: { Authorization: `${credentials.clientId}:${credentials.accessToken}` },
        timeout: this.timeoutMs,
      });
      return response.data ?? {};
    } catch (error: unknown) {
      // Token errors come back as 401 with the usual JSON body
      if (isAxiosError<HistoryResponse>(error) && error.response?.data) {
        return error.response.data;
      }
      throw error;
    }
  }
}
