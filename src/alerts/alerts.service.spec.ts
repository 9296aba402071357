import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import * as nodemailer from 'nodemailer';
import { AlertsService } from './alerts.service';
import { AppConfig, buildConfiguration } from '../config/configuration';
import { axiosResponse } from '../common/testing/axios-response';
import { LoggerService } from '../logger/logger.service';

jest.mock('axios');

const mockSendMail = jest.fn();

jest.mock('nodemailer', () => ({
  createTransport: jest.fn(() => ({ sendMail: mockSendMail })),
}));

const mockedAxios = jest.mocked(axios);

describe('AlertsService', () => {
  let mockLoggerService: { setContext: jest.Mock; log: jest.Mock; error: jest.Mock; warn: jest.Mock; debug: jest.Mock };

  const now = new Date('2026-01-07T05:00:00Z');
  const whatsappUrl = 'https://wa.example.com/send?phone=910000000000&apikey=test-key';
  const emailWebhookUrl = 'https://hooks.example.com/email';
  const smtpEnv = {
    SMTP_HOST: 'smtp.example.com',
    SMTP_USER: 'alerts@example.com',
    SMTP_PASSWORD: 'test-secret',
    ALERTS_EMAIL_RECIPIENTS: 'a@example.com,b@example.com',
  };

  async function createService(env: Record<string, string>): Promise<AlertsService> {
    const config = buildConfiguration(env);
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AlertsService,
        {
          provide: ConfigService,
          useValue: { get: jest.fn((key: keyof AppConfig) => config[key]) },
        },
        {
          provide: LoggerService,
          useValue: mockLoggerService,
        },
      ],
    }).compile();

    return module.get<AlertsService>(AlertsService);
  }

  beforeEach(() => {
    jest.clearAllMocks();
    mockedAxios.get.mockReset();
    mockedAxios.post.mockReset();
    mockLoggerService = {
      setContext: jest.fn(),
      log: jest.fn(),
      error: jest.fn(),
      warn: jest.fn(),
      debug: jest.fn(),
    };
  });

  it('wraps messages in a timestamped envelope', async () => {
    const service = await createService({});

    expect(service.formatEnvelope('🟢 Bullish RSI Divergence', now)).toBe(
      '[2026-01-07 10:30] NIFTY50 Alert:\n🟢 Bullish RSI Divergence',
    );
  });

  it('lists only the configured channels', async () => {
    expect((await createService({})).getChannels()).toEqual([]);
    expect((await createService({ WHATSAPP_URL: whatsappUrl, ...smtpEnv })).getChannels()).toEqual([
      'whatsapp',
      'smtp',
    ]);
  });

  it('appends the text to the WhatsApp gateway URL', async () => {
    mockedAxios.get.mockResolvedValue(axiosResponse('queued'));
    const service = await createService({ WHATSAPP_URL: whatsappUrl });

    const reports = await service.send('📈 EMA Bullish Cross: EMA5 > EMA21', now);

    const text = '[2026-01-07 10:30] NIFTY50 Alert:\n📈 EMA Bullish Cross: EMA5 > EMA21';
    expect(reports).toEqual([{ channel: 'whatsapp', ok: true }]);
    expect(mockedAxios.get).toHaveBeenCalledWith(`${whatsappUrl}&text=${encodeURIComponent(text)}`, {
      timeout: 10000,
    });
  });

  it('starts the query string when the gateway URL has none', async () => {
    mockedAxios.get.mockResolvedValue(axiosResponse('queued'));
    const service = await createService({ WHATSAPP_URL: 'https://wa.example.com/send' });

    await service.send('hi', now);

    expect(mockedAxios.get.mock.calls[0][0]).toBe(
      `https://wa.example.com/send?text=${encodeURIComponent('[2026-01-07 10:30] NIFTY50 Alert:\nhi')}`,
    );
  });

  it('posts the text to the email webhook', async () => {
    mockedAxios.post.mockResolvedValue(axiosResponse({ ok: true }));
    const service = await createService({ EMAIL_WEBHOOK_URL: emailWebhookUrl });

    const reports = await service.send('🔴 Bearish RSI Divergence', now);

    expect(reports).toEqual([{ channel: 'emailWebhook', ok: true }]);
    expect(mockedAxios.post).toHaveBeenCalledWith(
      emailWebhookUrl,
      { text: '[2026-01-07 10:30] NIFTY50 Alert:\n🔴 Bearish RSI Divergence' },
      { timeout: 10000 },
    );
  });

  it('mails the configured recipients over SMTP', async () => {
    mockSendMail.mockResolvedValue({ messageId: 'test-id' });
    const service = await createService(smtpEnv);

    const reports = await service.send('NIFTY50 Daily EMA Summary (10:00 Asia/Kolkata):\nClose: 22010.00', now);

    expect(reports).toEqual([{ channel: 'smtp', ok: true }]);
    expect(nodemailer.createTransport).toHaveBeenCalledWith({
      host: 'smtp.example.com',
      port: 587,
      secure: false,
      auth: { user: 'alerts@example.com', pass: 'test-secret' },
    });
    expect(mockSendMail).toHaveBeenCalledWith({
      from: 'alerts@example.com',
      to: 'a@example.com, b@example.com',
      subject: 'NIFTY50 Alert: NIFTY50 Daily EMA Summary (10:00 Asia/Kolkata):',
      text: '[2026-01-07 10:30] NIFTY50 Alert:\nNIFTY50 Daily EMA Summary (10:00 Asia/Kolkata):\nClose: 22010.00',
    });
  });

  it('reports a failed channel and still tries the others', async () => {
    mockedAxios.get.mockRejectedValue(new Error('Request failed with status code 500'));
    mockedAxios.post.mockResolvedValue(axiosResponse({ ok: true }));
    const service = await createService({ WHATSAPP_URL: whatsappUrl, EMAIL_WEBHOOK_URL: emailWebhookUrl });

    const reports = await service.send('hi', now);

    expect(reports).toEqual([
      { channel: 'whatsapp', ok: false, error: 'Request failed with status code 500' },
      { channel: 'emailWebhook', ok: true },
    ]);
  });

  it('only logs when alerts are disabled', async () => {
    const service = await createService({ ALERTS_ENABLED: 'false', WHATSAPP_URL: whatsappUrl });

    await expect(service.send('hi', now)).resolves.toEqual([]);
    expect(mockedAxios.get).not.toHaveBeenCalled();
    expect(mockLoggerService.log).toHaveBeenCalledWith('Alert', { text: '[2026-01-07 10:30] NIFTY50 Alert:\nhi' });
  });

  it('warns when no channel is configured', async () => {
    const service = await createService({});

    await expect(service.send('hi', now)).resolves.toEqual([]);
    expect(mockLoggerService.warn).toHaveBeenCalledWith('No alert channel configured, alert only logged');
  });

  describe('sendSignalAlert', () => {
    const barTime = Date.UTC(2026, 0, 7, 4, 45);

    it('sends each signal once per bar', async () => {
      mockedAxios.get.mockResolvedValue(axiosResponse('queued'));
      const service = await createService({ WHATSAPP_URL: whatsappUrl });

      const first = await service.sendSignalAlert('emaBullCross', 'cross', barTime, now);
      const repeat = await service.sendSignalAlert('emaBullCross', 'cross', barTime, now);

      expect(first).toEqual({ sent: true, reports: [{ channel: 'whatsapp', ok: true }] });
      expect(repeat).toEqual({ sent: false, reports: [] });
      expect(mockedAxios.get).toHaveBeenCalledTimes(1);
    });

    it('sends again on a new bar or for another signal', async () => {
      mockedAxios.get.mockResolvedValue(axiosResponse('queued'));
      const service = await createService({ WHATSAPP_URL: whatsappUrl });

      await service.sendSignalAlert('emaBullCross', 'cross', barTime, now);
      const otherKind = await service.sendSignalAlert('bullishDivergence', 'divergence', barTime, now);
      const nextBar = await service.sendSignalAlert('emaBullCross', 'cross', barTime + 15 * 60 * 1000, now);

      expect(otherKind.sent).toBe(true);
      expect(nextBar.sent).toBe(true);
      expect(mockedAxios.get).toHaveBeenCalledTimes(3);
    });

    it('sends again for the same bar when every channel failed', async () => {
      mockedAxios.get.mockRejectedValueOnce(new Error('Request failed with status code 502'));
      mockedAxios.get.mockResolvedValueOnce(axiosResponse('queued'));
      const service = await createService({ WHATSAPP_URL: whatsappUrl });

      const failed = await service.sendSignalAlert('emaBearCross', 'cross', barTime, now);
      const retried = await service.sendSignalAlert('emaBearCross', 'cross', barTime, now);
      const repeat = await service.sendSignalAlert('emaBearCross', 'cross', barTime, now);

      expect(failed).toEqual({
        sent: false,
        reports: [{ channel: 'whatsapp', ok: false, error: 'Request failed with status code 502' }],
      });
      expect(retried).toEqual({ sent: true, reports: [{ channel: 'whatsapp', ok: true }] });
      expect(repeat).toEqual({ sent: false, reports: [] });
      expect(mockedAxios.get).toHaveBeenCalledTimes(2);
      expect(mockLoggerService.warn).toHaveBeenCalledWith('Signal alert failed on every channel, will retry', {
        kind: 'emaBearCross',
        barTime,
      });
    });

    it('records the bar when one of several channels delivered', async () => {
      mockedAxios.get.mockRejectedValue(new Error('Request failed with status code 500'));
      mockedAxios.post.mockResolvedValue(axiosResponse({ ok: true }));
      const service = await createService({ WHATSAPP_URL: whatsappUrl, EMAIL_WEBHOOK_URL: emailWebhookUrl });

      const first = await service.sendSignalAlert('bearishDivergence', 'divergence', barTime, now);
      const repeat = await service.sendSignalAlert('bearishDivergence', 'divergence', barTime, now);

      expect(first.sent).toBe(true);
      expect(repeat).toEqual({ sent: false, reports: [] });
      expect(mockedAxios.get).toHaveBeenCalledTimes(1);
    });

    it('records the bar when there is no channel to try', async () => {
      const service = await createService({});

      const first = await service.sendSignalAlert('emaBullCross', 'cross', barTime, now);
      const repeat = await service.sendSignalAlert('emaBullCross', 'cross', barTime, now);

      expect(first).toEqual({ sent: true, reports: [] });
      expect(repeat).toEqual({ sent: false, reports: [] });
    });
  });
});
