import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { AppConfig } from '../config/configuration';
import { errorMessage } from '../common/utils/error.utils';
import { daysBetween, zonedDateKey, zonedParts } from '../common/utils/time.utils';
import { LoggerService } from '../logger/logger.service';

interface HolidayPayload {
  CM?: Array<{ tradingDate?: string }>;
}

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

const REFRESH_AFTER_DAYS = 7;

/** `26-Jan-2026` to `2026-01-26`; undefined for anything else. */
export function parseExchangeDate(value: string): string | undefined {
  const match = /^(\d{1,2})-([A-Za-z]{3})-(\d{4})$/.exec(value.trim());
  if (!match) {
    return undefined;
  }
  const month = MONTHS[match[2].toLowerCase()];
  if (!month) {
    return undefined;
  }
  return `${match[3]}-${String(month).padStart(2, '0')}-${match[1].padStart(2, '0')}`;
}

@Injectable()
export class MarketCalendarService {
  private readonly timezone: string;
  private readonly holidayApiUrl: string;
  private readonly configuredHolidays: Set<string>;
  private readonly timeoutMs: number;
  private cache?: { fetchedOn: string; holidays: Set<string> };

  constructor(
    configService: ConfigService<AppConfig, true>,
    private logger: LoggerService,
  ) {
    this.logger.setContext('MarketCalendarService');
    const market = configService.get('market', { infer: true });
    this.timezone = market.timezone;
    this.holidayApiUrl = market.holidayApiUrl;
    this.configuredHolidays = new Set(market.holidays);
    this.timeoutMs = configService.get('http', { infer: true }).timeoutMs;
  }

  /** True on weekends and exchange holidays, judged in the market time zone. */
  async isMarketHoliday(date: Date = new Date()): Promise<boolean> {
    const { weekday } = zonedParts(date, this.timezone);
    if (weekday === 0 || weekday === 6) {
      return true;
    }

    const dateKey = zonedDateKey(date, this.timezone);
    if (this.configuredHolidays.has(dateKey)) {
      return true;
    }

    await this.refreshIfStale(dateKey);
    return this.cache?.holidays.has(dateKey) ?? false;
  }

  getCachedHolidays(): string[] {
    return [...(this.cache?.holidays ?? [])].sort();
  }

  private async refreshIfStale(todayKey: string): Promise<void> {
    if (this.cache && Math.abs(daysBetween(this.cache.fetchedOn, todayKey)) < REFRESH_AFTER_DAYS) {
      return;
    }

    try {
      const response = await axios.get<HolidayPayload>(this.holidayApiUrl, {
        headers: { 'User-Agent': 'Mozilla/5.0' },
        timeout: this.timeoutMs,
      });
      const holidays = new Set<string>();
      for (const entry of response.data?.CM ?? []) {
        const parsed = entry.tradingDate ? parseExchangeDate(entry.tradingDate) : undefined;
        if (parsed) {
          holidays.add(parsed);
        }
      }
      this.cache = { fetchedOn: todayKey, holidays };
      this.logger.log(`Holiday list updated (${holidays.size} dates)`, { fetchedOn: todayKey });
    } catch (error: unknown) {
      // Keep whatever list we had; the next call tries again
      this.logger.warn('Could not update exchange holiday list', { error: errorMessage(error) });
    }
  }
}
