import { Bar } from '../market-data/market-data.types';
import { computeEma, computeRsi, IndicatorSeries } from './indicators';
import {
  InsufficientHistoryError,
  MalformedSeriesError,
  SignalEngineError,
} from './signal-engine.errors';

export interface SignalEngineOptions {
  rsiPeriod: number;
  emaFastPeriod: number;
  emaSlowPeriod: number;
  divergenceLookback: number;
  minBars: number;
  includeStatus: boolean;
}

export const DEFAULT_SIGNAL_OPTIONS: Readonly<SignalEngineOptions> = {
  rsiPeriod: 14,
  emaFastPeriod: 5,
  emaSlowPeriod: 21,
  divergenceLookback: 90,
  minBars: 50,
  includeStatus: false,
};

export interface IndicatorFrame {
  rsi: IndicatorSeries;
  emaFast: IndicatorSeries;
  emaSlow: IndicatorSeries;
}

export type TrendLabel = 'Bullish' | 'Bearish';

export interface EmaStatus {
  barTime: number;
  close: number;
  emaFast: number;
  emaSlow: number;
  diff: number;
  trend: TrendLabel;
}

export const SIGNAL_KINDS = [
  'emaBullCross',
  'emaBearCross',
  'bullishDivergence',
  'bearishDivergence',
] as const;

export type SignalKind = (typeof SIGNAL_KINDS)[number];

export type SignalSet = Record<SignalKind, boolean> & {
  barTime: number;
  status?: EmaStatus;
};

export type SignalResult =
  | { ok: true; signals: SignalSet }
  | { ok: false; error: SignalEngineError };

export type EmaStatusResult =
  | { ok: true; status: EmaStatus }
  | { ok: false; error: SignalEngineError };

function assertPositiveInteger(name: string, value: number) {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

export function resolveSignalOptions(overrides: Partial<SignalEngineOptions> = {}): SignalEngineOptions {
  const options = { ...DEFAULT_SIGNAL_OPTIONS, ...overrides };

  assertPositiveInteger('rsiPeriod', options.rsiPeriod);
  assertPositiveInteger('emaFastPeriod', options.emaFastPeriod);
  assertPositiveInteger('emaSlowPeriod', options.emaSlowPeriod);
  assertPositiveInteger('divergenceLookback', options.divergenceLookback);
  assertPositiveInteger('minBars', options.minBars);
  if (options.emaFastPeriod >= options.emaSlowPeriod) {
    throw new RangeError(
      `emaFastPeriod (${options.emaFastPeriod}) must be below emaSlowPeriod (${options.emaSlowPeriod})`,
    );
  }
  if (options.minBars < 2) {
    throw new RangeError('minBars must be at least 2 to compare the last two bars');
  }

  return options;
}

/**
 * Checks length first, then shape. Returns the first problem found, or
 * undefined for a usable series.
 */
export function validateSeries(series: readonly Bar[], minBars: number): SignalEngineError | undefined {
  if (series.length < minBars) {
    return new InsufficientHistoryError(minBars, series.length);
  }

  for (let i = 0; i < series.length; i++) {
    if (!Number.isFinite(series[i].close)) {
      return new MalformedSeriesError('NON_FINITE_CLOSE', i);
    }
    if (i > 0 && !(series[i].time > series[i - 1].time)) {
      return new MalformedSeriesError('NON_INCREASING_TIME', i);
    }
  }

  return undefined;
}

export function computeIndicatorFrame(
  closes: readonly number[],
  options: Pick<SignalEngineOptions, 'rsiPeriod' | 'emaFastPeriod' | 'emaSlowPeriod'>,
): IndicatorFrame {
  return {
    rsi: computeRsi(closes, options.rsiPeriod),
    emaFast: computeEma(closes, options.emaFastPeriod),
    emaSlow: computeEma(closes, options.emaSlowPeriod),
  };
}

/** Crossover of `fast` over `slow` between the last two entries. */
export function detectCrossover(
  fast: IndicatorSeries,
  slow: IndicatorSeries,
): { bull: boolean; bear: boolean } {
  const last = fast.length - 1;
  if (last < 1 || slow.length !== fast.length) {
    return { bull: false, bear: false };
  }

  const fastNow = fast[last];
  const slowNow = slow[last];
  const fastPrev = fast[last - 1];
  const slowPrev = slow[last - 1];
  if (fastNow === undefined || slowNow === undefined || fastPrev === undefined || slowPrev === undefined) {
    return { bull: false, bear: false };
  }

  return {
    bull: fastNow > slowNow && fastPrev <= slowPrev,
    bear: fastNow < slowNow && fastPrev >= slowPrev,
  };
}

/**
 * Compares the last bar with the bar `lookback` bars earlier. Price lower
 * with RSI higher is bullish; price higher with RSI lower is bearish.
 */
export function detectDivergence(
  closes: readonly number[],
  rsi: IndicatorSeries,
  lookback: number,
): { bullish: boolean; bearish: boolean } {
  const last = closes.length - 1;
  const past = last - lookback;
  if (past < 0 || rsi.length !== closes.length) {
    return { bullish: false, bearish: false };
  }

  const rsiNow = rsi[last];
  const rsiPast = rsi[past];
  if (rsiNow === undefined || rsiPast === undefined) {
    return { bullish: false, bearish: false };
  }

  return {
    bullish: closes[last] < closes[past] && rsiNow > rsiPast,
    bearish: closes[last] > closes[past] && rsiNow < rsiPast,
  };
}

// A zero difference reads as Bearish
export function trendOf(diff: number): TrendLabel {
  return diff > 0 ? 'Bullish' : 'Bearish';
}

function statusAt(bar: Bar, emaFast: number | undefined, emaSlow: number | undefined): EmaStatus | undefined {
  if (emaFast === undefined || emaSlow === undefined) {
    return undefined;
  }
  const diff = emaFast - emaSlow;
  return {
    barTime: bar.time,
    close: bar.close,
    emaFast,
    emaSlow,
    diff,
    trend: trendOf(diff),
  };
}

/**
 * Evaluates the signal flags on the last bar of `series`.
 *
 * Pure: the series is not modified and nothing is remembered between calls,
 * so the same input always yields the same result.
 */
export function computeSignals(
  series: readonly Bar[],
  overrides: Partial<SignalEngineOptions> = {},
): SignalResult {
  const options = resolveSignalOptions(overrides);
  const error = validateSeries(series, options.minBars);
  if (error) {
    return { ok: false, error };
  }

  const closes = series.map((bar) => bar.close);
  const frame = computeIndicatorFrame(closes, options);
  const crossover = detectCrossover(frame.emaFast, frame.emaSlow);
  const divergence = detectDivergence(closes, frame.rsi, options.divergenceLookback);

  const last = series.length - 1;
  const signals: SignalSet = {
    emaBullCross: crossover.bull,
    emaBearCross: crossover.bear,
    bullishDivergence: divergence.bullish,
    bearishDivergence: divergence.bearish,
    barTime: series[last].time,
  };

  if (options.includeStatus) {
    const status = statusAt(series[last], frame.emaFast[last], frame.emaSlow[last]);
    if (status) {
      signals.status = status;
    }
  }

  return { ok: true, signals };
}

/** EMA pair on the last bar, used by the daily summary. */
export function computeEmaStatus(
  series: readonly Bar[],
  options: Pick<SignalEngineOptions, 'emaFastPeriod' | 'emaSlowPeriod' | 'minBars'>,
): EmaStatusResult {
  const minBars = Math.max(options.minBars, options.emaSlowPeriod);
  const error = validateSeries(series, minBars);
  if (error) {
    return { ok: false, error };
  }

  const closes = series.map((bar) => bar.close);
  const last = series.length - 1;
  const status = statusAt(
    series[last],
    computeEma(closes, options.emaFastPeriod)[last],
    computeEma(closes, options.emaSlowPeriod)[last],
  );
  if (!status) {
    return { ok: false, error: new InsufficientHistoryError(minBars, series.length) };
  }

  return { ok: true, status };
}

/** Fired signal kinds in a fixed order: crossovers first, then divergences. */
export function firedSignals(signals: SignalSet): SignalKind[] {
  return SIGNAL_KINDS.filter((kind) => signals[kind]);
}
