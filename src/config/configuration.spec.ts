import { buildConfiguration } from './configuration';

describe('buildConfiguration', () => {
  it('applies defaults for an empty environment', () => {
    const config = buildConfiguration({});

    expect(config.port).toBe(3000);
    expect(config.market).toEqual({
      label: 'NIFTY50',
      timezone: 'Asia/Kolkata',
      fyersSymbol: 'NSE:NIFTY50-INDEX',
      yahooSymbol: '^NSEI',
      barIntervalMinutes: 15,
      historyDays: 5,
      dataSources: ['fyers', 'yahoo'],
      holidayApiUrl: 'https://www.nseindia.com/api/holiday-master?type=trading',
      holidays: [],
    });
    expect(config.signals.engine).toEqual({
      rsiPeriod: 14,
      emaFastPeriod: 5,
      emaSlowPeriod: 21,
      divergenceLookback: 90,
      minBars: 50,
      includeStatus: false,
    });
    expect(config.signals.dailySummaryMinBars).toBe(21);
    expect(config.schedule).toEqual({ dailySummaryTime: '10:00', runOnStartup: true });
    expect(config.alerts.enabled).toBe(true);
    expect(config.alerts.smtp).toBeUndefined();
    expect(config.alerts.emailRecipients).toEqual([]);
    expect(config.fyers.credentialsPath).toBe('credentials.json');
  });

  it('turns on the status line in debug mode', () => {
    const config = buildConfiguration({ DEBUG_MODE: 'true' });

    expect(config.signals.debugMode).toBe(true);
    expect(config.signals.engine.includeStatus).toBe(true);
  });

  it('keeps the configured source order', () => {
    expect(buildConfiguration({ DATA_SOURCES: 'yahoo,fyers' }).market.dataSources).toEqual(['yahoo', 'fyers']);
    expect(buildConfiguration({ DATA_SOURCES: 'yahoo' }).market.dataSources).toEqual(['yahoo']);
  });

  it('parses list variables', () => {
    const config = buildConfiguration({
      MARKET_HOLIDAYS: '2026-01-26, 2026-03-03',
      ALERTS_EMAIL_RECIPIENTS: 'a@example.com,b@example.com',
    });

    expect(config.market.holidays).toEqual(['2026-01-26', '2026-03-03']);
    expect(config.alerts.emailRecipients).toEqual(['a@example.com', 'b@example.com']);
  });

  it('builds SMTP settings only when host, user and password are set', () => {
    expect(buildConfiguration({ SMTP_HOST: 'smtp.example.com' }).alerts.smtp).toBeUndefined();

    const config = buildConfiguration({
      SMTP_HOST: 'smtp.example.com',
      SMTP_USER: 'alerts@example.com',
      SMTP_PASSWORD: 'test-secret',
    });

    expect(config.alerts.smtp).toEqual({
      host: 'smtp.example.com',
      port: 587,
      user: 'alerts@example.com',
      password: 'test-secret',
      secure: false,
      from: 'alerts@example.com',
    });
  });

  it('rejects a fast EMA period that is not below the slow one', () => {
    expect(() => buildConfiguration({ EMA_FAST_PERIOD: '21' })).toThrow(RangeError);
  });
});
