import { validate } from './env.validation';

describe('validate', () => {
  it('converts numeric variables and ignores unrelated ones', () => {
    const result = validate({
      PORT: '8080',
      DATA_SOURCES: 'yahoo,fyers',
      DAILY_SUMMARY_TIME: '09:30',
      DEBUG_MODE: 'true',
      PATH: '/usr/bin',
    });

    expect(result.PORT).toBe(8080);
    expect(result.DATA_SOURCES).toBe('yahoo,fyers');
    expect(result.DEBUG_MODE).toBe('true');
  });

  it('treats empty values as unset', () => {
    expect(() => validate({ WHATSAPP_URL: '', SMTP_PORT: '', MARKET_HOLIDAYS: '' })).not.toThrow();
  });

  it('rejects a malformed summary time', () => {
    expect(() => validate({ DAILY_SUMMARY_TIME: '25:00' })).toThrow(
      'Invalid environment configuration: DAILY_SUMMARY_TIME must be HH:mm',
    );
  });

  it('rejects unknown data sources', () => {
    expect(() => validate({ DATA_SOURCES: 'fyers,binance' })).toThrow(
      'DATA_SOURCES must be a comma-separated list of fyers and yahoo',
    );
  });

  it('rejects non-boolean flags', () => {
    expect(() => validate({ DEBUG_MODE: 'yes' })).toThrow(/DEBUG_MODE/);
  });

  it('rejects a non-numeric port', () => {
    expect(() => validate({ PORT: 'abc' })).toThrow(/PORT/);
  });

  it('accepts holiday dates', () => {
    expect(() => validate({ MARKET_HOLIDAYS: '2026-01-26,2026-03-03' })).not.toThrow();
    expect(() => validate({ MARKET_HOLIDAYS: '26-01-2026' })).toThrow(/MARKET_HOLIDAYS/);
  });
});
