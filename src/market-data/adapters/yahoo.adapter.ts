import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { AppConfig } from '../../config/configuration';
import { errorMessage } from '../../common/utils/error.utils';
import { LoggerService } from '../../logger/logger.service';
import { Bar, FetchRequest, FetchResult, PriceFeedAdapter } from '../market-data.types';

type Column = Array<number | null> | undefined;

interface ChartResponse {
  chart?: {
    result?: Array<{
      timestamp?: number[];
      indicators?: {
        quote?: Array<{
          open?: Array<number | null>;
          high?: Array<number | null>;
          low?: Array<number | null>;
          close?: Array<number | null>;
          volume?: Array<number | null>;
        }>;
      };
    }> | null;
    error?: { code?: string; description?: string } | null;
  };
}

const USER_AGENT = 'Mozilla/5.0';

function valueAt(column: Column, index: number): number | undefined {
  const value = column?.[index];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Public chart API, used as the fallback feed. Rows with any missing field
 * are dropped.
 */
@Injectable()
export class YahooAdapter implements PriceFeedAdapter {
  readonly source = 'yahoo' as const;
  private readonly apiBaseUrl: string;
  private readonly symbol: string;
  private readonly timeoutMs: number;

  constructor(
    configService: ConfigService<AppConfig, true>,
    private logger: LoggerService,
  ) {
    this.logger.setContext('YahooAdapter');
    this.apiBaseUrl = configService.get('yahoo', { infer: true }).apiBaseUrl;
    this.symbol = configService.get('market', { infer: true }).yahooSymbol;
    this.timeoutMs = configService.get('http', { infer: true }).timeoutMs;
  }

  async fetchBars(request: FetchRequest): Promise<FetchResult> {
    try {
      const response = await axios.get<ChartResponse>(
        `${this.apiBaseUrl}/v8/finance/chart/${encodeURIComponent(this.symbol)}`,
        {
          params: { interval: `${request.intervalMinutes}m`, range: `${request.historyDays}d` },
          headers: { 'User-Agent': USER_AGENT },
          timeout: this.timeoutMs,
        },
      );

      const chart = response.data?.chart;
      const result = chart?.result?.[0];
      if (!result) {
        const reason = chart?.error?.description ?? 'no chart result';
        return { ok: false, source: this.source, error: `Unexpected response: ${reason}` };
      }

      const timestamps = result.timestamp ?? [];
      const quote = result.indicators?.quote?.[0];
      const bars: Bar[] = [];

      timestamps.forEach((timestamp, i) => {
        const open = valueAt(quote?.open, i);
        const high = valueAt(quote?.high, i);
        const low = valueAt(quote?.low, i);
        const close = valueAt(quote?.close, i);
        const volume = valueAt(quote?.volume, i);
        if (
          open === undefined ||
          high === undefined ||
          low === undefined ||
          close === undefined ||
          volume === undefined
        ) {
          return;
        }
        bars.push({ time: timestamp * 1000, open, high, low, close, volume });
      });

      this.logger.debug(`Fetched ${bars.length} bar(s) from Yahoo`, {
        symbol: this.symbol,
        received: timestamps.length,
      });
      return { ok: true, source: this.source, bars };
    } catch (error: unknown) {
      return { ok: false, source: this.source, error: errorMessage(error) };
    }
  }
}
