import { EmaStatus, SignalKind, SignalEngineOptions } from './signal-engine';

type EmaPeriods = Pick<SignalEngineOptions, 'emaFastPeriod' | 'emaSlowPeriod'>;

export interface DailySummaryLabels extends EmaPeriods {
  marketLabel: string;
  summaryTime: string;
  timezone: string;
}

function formatSigned(value: number): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(2)}`;
}

export function formatSignalMessage(kind: SignalKind, periods: EmaPeriods): string {
  const fast = `EMA${periods.emaFastPeriod}`;
  const slow = `EMA${periods.emaSlowPeriod}`;

  switch (kind) {
    case 'emaBullCross':
      return `📈 EMA Bullish Cross: ${fast} > ${slow}`;
    case 'emaBearCross':
      return `📉 EMA Bearish Cross: ${fast} < ${slow}`;
    case 'bullishDivergence':
      return '🟢 Bullish RSI Divergence';
    case 'bearishDivergence':
      return '🔴 Bearish RSI Divergence';
  }
}

export function formatStatusLine(status: EmaStatus, periods: EmaPeriods): string {
  return (
    `🧭 EMA Status: Close: ${status.close.toFixed(2)}, ` +
    `EMA${periods.emaFastPeriod}: ${status.emaFast.toFixed(2)}, ` +
    `EMA${periods.emaSlowPeriod}: ${status.emaSlow.toFixed(2)}, ` +
    `Diff: ${status.diff.toFixed(2)} → ${status.trend}`
  );
}

export function formatDailySummary(status: EmaStatus, labels: DailySummaryLabels): string {
  const fast = `EMA${labels.emaFastPeriod}`;
  const slow = `EMA${labels.emaSlowPeriod}`;
  const comparison = status.emaFast > status.emaSlow ? '>' : '<';

  return [
    `${labels.marketLabel} Daily EMA Summary (${labels.summaryTime} ${labels.timezone}):`,
    `Close: ${status.close.toFixed(2)}`,
    `${fast}: ${status.emaFast.toFixed(2)}`,
    `${slow}: ${status.emaSlow.toFixed(2)}`,
    `➤ ${fast} ${comparison} ${slow} → ${status.trend} Bias (${formatSigned(status.diff)} pts)`,
  ].join('\n');
}
