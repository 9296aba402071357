import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AlertsService } from '../alerts/alerts.service';
import { MarketCalendarService } from '../calendar/market-calendar.service';
import { AppConfig } from '../config/configuration';
import { errorMessage, errorStack } from '../common/utils/error.utils';
import { LoggerService } from '../logger/logger.service';
import { MarketDataService } from '../market-data/market-data.service';
import { FeedSource, SeriesResult } from '../market-data/market-data.types';
import { firedSignals, SignalKind, TrendLabel } from '../signals/signal-engine';
import { SignalEngineError } from '../signals/signal-engine.errors';
import { SignalsService } from '../signals/signals.service';

type SkipReason = 'in-progress' | 'fetch-failed' | 'insufficient-history' | 'malformed-series';

export type CycleOutcome =
  | { status: 'skipped'; reason: SkipReason; detail: string; at: string }
  | { status: 'completed'; source: FeedSource; barCount: number; barTime: string; fired: SignalKind[]; at: string }
  | { status: 'failed'; error: string; at: string };

export type SummaryOutcome =
  | { status: 'skipped'; reason: SkipReason | 'market-holiday'; detail: string; at: string }
  | { status: 'sent'; source: FeedSource; trend: TrendLabel; diff: number; at: string }
  | { status: 'failed'; error: string; at: string };

function describeFailures(series: Extract<SeriesResult, { ok: false }>): string {
  return series.failures.map((failure) => `${failure.source}: ${failure.error}`).join('; ');
}

function skipReasonFor(error: SignalEngineError): SkipReason {
  return error.code === 'INSUFFICIENT_HISTORY' ? 'insufficient-history' : 'malformed-series';
}

@Injectable()
export class JobsService {
  private cycleRunning = false;
  private summaryRunning = false;
  private lastSignalCycle?: CycleOutcome;
  private lastDailySummary?: SummaryOutcome;
  private readonly summaryTime: string;

  constructor(
    configService: ConfigService<AppConfig, true>,
    private marketDataService: MarketDataService,
    private signalsService: SignalsService,
    private alertsService: AlertsService,
    private calendarService: MarketCalendarService,
    private logger: LoggerService,
  ) {
    this.logger.setContext('JobsService');
    this.summaryTime = configService.get('schedule', { infer: true }).dailySummaryTime;
  }

  getLastSignalCycle(): CycleOutcome | undefined {
    return this.lastSignalCycle;
  }

  getLastDailySummary(): SummaryOutcome | undefined {
    return this.lastDailySummary;
  }

  /**
   * One polling cycle: fetch, evaluate the last bar, alert on what fired.
   * Never throws; a cycle already in progress makes this call a no-op.
   */
  async runSignalCycle(now: Date = new Date()): Promise<CycleOutcome> {
    if (this.cycleRunning) {
      this.logger.warn('Signal cycle already running, skipping this trigger');
      return { status: 'skipped', reason: 'in-progress', detail: 'signal cycle already running', at: now.toISOString() };
    }

    this.cycleRunning = true;
    let outcome: CycleOutcome;
    try {
      outcome = await this.executeSignalCycle(now);
    } catch (error: unknown) {
      this.logger.error('Signal cycle failed', errorStack(error), { error: errorMessage(error) });
      outcome = { status: 'failed', error: errorMessage(error), at: now.toISOString() };
    } finally {
      this.cycleRunning = false;
    }

    this.lastSignalCycle = outcome;
    return outcome;
  }

  async runDailySummary(now: Date = new Date()): Promise<SummaryOutcome> {
    if (this.summaryRunning) {
      this.logger.warn('Daily summary already running, skipping this trigger');
      return { status: 'skipped', reason: 'in-progress', detail: 'daily summary already running', at: now.toISOString() };
    }

    this.summaryRunning = true;
    let outcome: SummaryOutcome;
    try {
      outcome = await this.executeDailySummary(now);
    } catch (error: unknown) {
      this.logger.error('Daily summary failed', errorStack(error), { error: errorMessage(error) });
      outcome = { status: 'failed', error: errorMessage(error), at: now.toISOString() };
    } finally {
      this.summaryRunning = false;
    }

    this.lastDailySummary = outcome;
    return outcome;
  }

  private async executeSignalCycle(now: Date): Promise<CycleOutcome> {
    const at = now.toISOString();
    const series = await this.marketDataService.fetchSeries(now);
    if (!series.ok) {
      const detail = describeFailures(series);
      this.logger.warn('No valid data fetched, skipping cycle', { detail });
      return { status: 'skipped', reason: 'fetch-failed', detail, at };
    }

    const result = this.signalsService.evaluate(series.bars, series.source, now);
    if (!result.ok) {
      this.logger.warn('Series not usable, skipping cycle', {
        source: series.source,
        code: result.error.code,
        error: result.error.message,
      });
      return { status: 'skipped', reason: skipReasonFor(result.error), detail: result.error.message, at };
    }

    const { signals } = result;
    if (signals.status) {
      await this.alertsService.send(this.signalsService.describeStatus(signals.status), now);
    }

    const fired = firedSignals(signals);
    if (fired.length === 0) {
      this.logger.log('No new signals this cycle');
    }
    for (const kind of fired) {
      await this.alertsService.sendSignalAlert(kind, this.signalsService.describeSignal(kind), signals.barTime, now);
    }

    return {
      status: 'completed',
      source: series.source,
      barCount: series.bars.length,
      barTime: new Date(signals.barTime).toISOString(),
      fired,
      at,
    };
  }

  private async executeDailySummary(now: Date): Promise<SummaryOutcome> {
    const at = now.toISOString();
    if (await this.calendarService.isMarketHoliday(now)) {
      this.logger.log('Market closed today, skipping daily summary');
      return { status: 'skipped', reason: 'market-holiday', detail: 'weekend or exchange holiday', at };
    }

    const series = await this.marketDataService.fetchSeries(now);
    if (!series.ok) {
      const detail = describeFailures(series);
      this.logger.warn('No data for daily summary', { detail });
      return { status: 'skipped', reason: 'fetch-failed', detail, at };
    }

    const result = this.signalsService.summarize(series.bars);
    if (!result.ok) {
      this.logger.warn('Series not usable for daily summary', {
        code: result.error.code,
        error: result.error.message,
      });
      return { status: 'skipped', reason: skipReasonFor(result.error), detail: result.error.message, at };
    }

    const { status } = result;
    await this.alertsService.send(this.signalsService.describeDailySummary(status, this.summaryTime), now);
    return { status: 'sent', source: series.source, trend: status.trend, diff: status.diff, at };
  }
}
