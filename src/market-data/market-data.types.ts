export interface Bar {
  time: number; // epoch milliseconds, bar open
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export const FEED_SOURCES = ['fyers', 'yahoo'] as const;

export type FeedSource = (typeof FEED_SOURCES)[number];

export interface FetchRequest {
  intervalMinutes: number;
  historyDays: number;
  now: Date;
}

export type FetchResult =
  | { ok: true; source: FeedSource; bars: Bar[] }
  | { ok: false; source: FeedSource; error: string };

export type SeriesResult =
  | { ok: true; source: FeedSource; bars: Bar[] }
  | { ok: false; failures: Array<{ source: FeedSource; error: string }> };

export interface PriceFeedAdapter {
  readonly source: FeedSource;
  fetchBars(request: FetchRequest): Promise<FetchResult>;
}
