import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../config/configuration';
import { LoggerService } from '../logger/logger.service';
import { Bar, FeedSource } from '../market-data/market-data.types';
import { formatDailySummary, formatSignalMessage, formatStatusLine } from './alert-messages';
import {
  computeEmaStatus,
  computeSignals,
  EmaStatus,
  EmaStatusResult,
  firedSignals,
  SignalEngineOptions,
  SignalKind,
  SignalResult,
  SignalSet,
} from './signal-engine';

export interface LatestEvaluation {
  source: FeedSource;
  barCount: number;
  evaluatedAt: string;
  fired: SignalKind[];
  signals: SignalSet;
}

@Injectable()
export class SignalsService {
  private readonly engineOptions: SignalEngineOptions;
  private readonly dailySummaryMinBars: number;
  private readonly market: AppConfig['market'];
  private latest?: LatestEvaluation;

  constructor(
    configService: ConfigService<AppConfig, true>,
    private logger: LoggerService,
  ) {
    this.logger.setContext('SignalsService');
    const signals = configService.get('signals', { infer: true });
    this.engineOptions = signals.engine;
    this.dailySummaryMinBars = signals.dailySummaryMinBars;
    this.market = configService.get('market', { infer: true });
  }

  getEngineOptions(): SignalEngineOptions {
    return { ...this.engineOptions };
  }

  evaluate(series: readonly Bar[], source: FeedSource, now: Date = new Date()): SignalResult {
    const result = computeSignals(series, this.engineOptions);
    if (!result.ok) {
      this.logger.debug('Signal evaluation failed', { code: result.error.code, error: result.error.message });
      return result;
    }

    const fired = firedSignals(result.signals);
    this.latest = {
      source,
      barCount: series.length,
      evaluatedAt: now.toISOString(),
      fired,
      signals: result.signals,
    };
    this.logger.debug('Signals evaluated', {
      barTime: new Date(result.signals.barTime).toISOString(),
      fired,
    });
    return result;
  }

  summarize(series: readonly Bar[]): EmaStatusResult {
    return computeEmaStatus(series, {
      emaFastPeriod: this.engineOptions.emaFastPeriod,
      emaSlowPeriod: this.engineOptions.emaSlowPeriod,
      minBars: this.dailySummaryMinBars,
    });
  }

  getLatest(): LatestEvaluation | undefined {
    return this.latest;
  }

  describeSignal(kind: SignalKind): string {
    return formatSignalMessage(kind, this.engineOptions);
  }

  describeStatus(status: EmaStatus): string {
    return formatStatusLine(status, this.engineOptions);
  }

  describeDailySummary(status: EmaStatus, summaryTime: string): string {
    return formatDailySummary(status, {
      emaFastPeriod: this.engineOptions.emaFastPeriod,
      emaSlowPeriod: this.engineOptions.emaSlowPeriod,
      marketLabel: this.market.label,
      summaryTime,
      timezone: this.market.timezone,
    });
  }
}
