import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../config/configuration';
import { LoggerService } from '../logger/logger.service';
import { FyersAdapter } from './adapters/fyers.adapter';
import { YahooAdapter } from './adapters/yahoo.adapter';
import { Bar, FeedSource, PriceFeedAdapter, SeriesResult } from './market-data.types';

/** Sorts by time and keeps the last bar seen for a repeated timestamp. */
export function normalizeBars(bars: readonly Bar[]): Bar[] {
  const byTime = new Map<number, Bar>();
  for (const bar of bars) {
    byTime.set(bar.time, bar);
  }
  return [...byTime.values()].sort((a, b) => a.time - b.time);
}

@Injectable()
export class MarketDataService {
  private readonly adapters: Record<FeedSource, PriceFeedAdapter>;
  private readonly market: AppConfig['market'];

  constructor(
    configService: ConfigService<AppConfig, true>,
    fyersAdapter: FyersAdapter,
    yahooAdapter: YahooAdapter,
    private logger: LoggerService,
  ) {
    this.logger.setContext('MarketDataService');
    this.market = configService.get('market', { infer: true });
    this.adapters = { fyers: fyersAdapter, yahoo: yahooAdapter };
  }

  getSources(): FeedSource[] {
    return [...this.market.dataSources];
  }

  /**
   * Tries each configured source in order and returns the first one that
   * produced bars. Every failure is reported when none did.
   */
  async fetchSeries(now: Date = new Date()): Promise<SeriesResult> {
    const failures: Array<{ source: FeedSource; error: string }> = [];

    for (const source of this.market.dataSources) {
      const result = await this.adapters[source].fetchBars({
        intervalMinutes: this.market.barIntervalMinutes,
        historyDays: this.market.historyDays,
        now,
      });

      if (result.ok && result.bars.length > 0) {
        const bars = normalizeBars(result.bars);
        this.logger.log(`Using ${source} data (${bars.length} bars)`, { source, barCount: bars.length });
        return { ok: true, source, bars };
      }

      const error = result.ok ? 'no bars returned' : result.error;
      this.logger.warn(`${source} fetch failed`, { source, error });
      failures.push({ source, error });
    }

    return { ok: false, failures };
  }
}
