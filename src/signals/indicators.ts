import { AverageGain, AverageLoss } from 'technicalindicators';

/** One value per bar; `undefined` while the indicator is still warming up. */
export type IndicatorSeries = Array<number | undefined>;

function undefinedSeries(length: number): IndicatorSeries {
  return Array.from({ length }, () => undefined);
}

// technicalindicators only returns values for the tail of the input, so the
// output is right-aligned onto the bars and the warm-up bars stay undefined.
function alignToBars(values: number[], length: number, warmup: number): IndicatorSeries {
  const offset = length - values.length;
  return Array.from({ length }, (_, i) => (i < warmup || i < offset ? undefined : values[i - offset]));
}

/**
 * Exponential moving average with alpha = 2 / (period + 1), seeded with the
 * first close and reported from index `period - 1`.
 *
 * Each step moves the average by `alpha * (close - ema)`, so a run of equal
 * closes keeps it exactly equal to that close whatever the period.
 */
export function computeEma(closes: readonly number[], period: number): IndicatorSeries {
  if (closes.length < period) {
    return undefinedSeries(closes.length);
  }
  const alpha = 2 / (period + 1);
  const values: number[] = [];
  let ema = closes[0];
  for (const close of closes) {
    ema += alpha * (close - ema);
    values.push(ema);
  }
  return alignToBars(values, closes.length, period - 1);
}

export function rsiFromAverages(avgGain: number, avgLoss: number): number {
  if (avgGain === 0 && avgLoss === 0) {
    return 50; // flat window: no momentum either way
  }
  if (avgLoss === 0) {
    return 100;
  }
  if (avgGain === 0) {
    return 0;
  }
  return 100 - 100 / (1 + avgGain / avgLoss);
}

/**
 * Wilder RSI. The first averages are the plain mean of the first `period`
 * close-to-close changes, so the first defined value sits at index `period`.
 */
export function computeRsi(closes: readonly number[], period: number): IndicatorSeries {
  if (closes.length <= period) {
    return undefinedSeries(closes.length);
  }

  const gains = AverageGain.calculate({ period, values: [...closes] });
  const losses = AverageLoss.calculate({ period, values: [...closes] });
  const count = Math.min(gains.length, losses.length);

  const rsi: number[] = [];
  for (let i = 0; i < count; i++) {
    const avgGain = gains[gains.length - count + i];
    const avgLoss = losses[losses.length - count + i];
    rsi.push(rsiFromAverages(avgGain, avgLoss));
  }

  return alignToBars(rsi, closes.length, period);
}
