import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import * as nodemailer from 'nodemailer';
import { AppConfig } from '../config/configuration';
import { errorMessage } from '../common/utils/error.utils';
import { formatZonedTimestamp } from '../common/utils/time.utils';
import { LoggerService } from '../logger/logger.service';
import { SignalKind } from '../signals/signal-engine';

export type AlertChannel = 'whatsapp' | 'emailWebhook' | 'smtp';

export interface DeliveryReport {
  channel: AlertChannel;
  ok: boolean;
  error?: string;
}

export interface SignalAlertOutcome {
  sent: boolean;
  reports: DeliveryReport[];
}

@Injectable()
export class AlertsService {
  private transporter: nodemailer.Transporter | null = null;
  private lastAlertedBar: Map<SignalKind, number> = new Map(); // bar time of the last alert per signal kind
  private readonly config: AppConfig['alerts'];
  private readonly marketLabel: string;
  private readonly timezone: string;
  private readonly timeoutMs: number;

  constructor(
    configService: ConfigService<AppConfig, true>,
    private logger: LoggerService,
  ) {
    this.logger.setContext('AlertsService');
    this.config = configService.get('alerts', { infer: true });
    const market = configService.get('market', { infer: true });
    this.marketLabel = market.label;
    this.timezone = market.timezone;
    this.timeoutMs = configService.get('http', { infer: true }).timeoutMs;
    this.initializeEmail();
  }

  private initializeEmail() {
    const smtp = this.config.smtp;
    if (!smtp || this.config.emailRecipients.length === 0) {
      this.logger.debug('SMTP alerts disabled or no recipients configured');
      return;
    }

    this.transporter = nodemailer.createTransport({
      host: smtp.host,
      port: smtp.port,
      secure: smtp.secure, // true for 465, false for other ports
      auth: {
        user: smtp.user,
        pass: smtp.password,
      },
    });

    this.logger.log('Email transporter initialized', {
      host: smtp.host,
      port: smtp.port,
      recipients: this.config.emailRecipients.length,
    });
  }

  getChannels(): AlertChannel[] {
    const channels: AlertChannel[] = [];
    if (this.config.whatsappUrl) channels.push('whatsapp');
    if (this.config.emailWebhookUrl) channels.push('emailWebhook');
    if (this.transporter) channels.push('smtp');
    return channels;
  }

  isEnabled(): boolean {
    return this.config.enabled;
  }

  formatEnvelope(message: string, now: Date = new Date()): string {
    return `[${formatZonedTimestamp(now, this.timezone)}] ${this.marketLabel} Alert:\n${message}`;
  }

  /**
   * Delivers `message` on every configured channel. Failures are reported
   * per channel and never thrown.
   */
  async send(message: string, now: Date = new Date()): Promise<DeliveryReport[]> {
    const text = this.formatEnvelope(message, now);
    this.logger.log('Alert', { text });

    if (!this.config.enabled) {
      this.logger.debug('Alerts disabled, not delivering');
      return [];
    }

    const reports: DeliveryReport[] = [];
    const whatsappUrl = this.config.whatsappUrl;
    const emailWebhookUrl = this.config.emailWebhookUrl;

    if (whatsappUrl) {
      reports.push(await this.deliver('whatsapp', () => this.sendWhatsapp(whatsappUrl, text)));
    }
    if (emailWebhookUrl) {
      reports.push(await this.deliver('emailWebhook', () => this.sendEmailWebhook(emailWebhookUrl, text)));
    }
    if (this.transporter) {
      const transporter = this.transporter;
      reports.push(await this.deliver('smtp', () => this.sendEmail(transporter, message, text)));
    }

    if (reports.length === 0) {
      this.logger.warn('No alert channel configured, alert only logged');
    }
    return reports;
  }

  /**
   * Sends a signal alert unless the same signal already went out for this bar.
   * The bar is only recorded once a channel accepted it, or when there is no
   * channel to try, so a run after a failed delivery sends it again.
   */
  async sendSignalAlert(
    kind: SignalKind,
    message: string,
    barTime: number,
    now: Date = new Date(),
  ): Promise<SignalAlertOutcome> {
    if (this.lastAlertedBar.get(kind) === barTime) {
      this.logger.debug('Signal already alerted for this bar', { kind, barTime });
      return { sent: false, reports: [] };
    }

    const reports = await this.send(message, now);
    const delivered = reports.length === 0 || reports.some((report) => report.ok);
    if (delivered) {
      this.lastAlertedBar.set(kind, barTime);
    } else {
      this.logger.warn('Signal alert failed on every channel, will retry', { kind, barTime });
    }
    return { sent: delivered, reports };
  }

  private async deliver(channel: AlertChannel, fn: () => Promise<void>): Promise<DeliveryReport> {
    try {
      await fn();
      return { channel, ok: true };
    } catch (error: unknown) {
      const message = errorMessage(error);
      this.logger.warn('Alert delivery failed', { channel, error: message });
      return { channel, ok: false, error: message };
    }
  }

  private async sendWhatsapp(baseUrl: string, text: string): Promise<void> {
    // Gateway URLs already carry phone and key parameters
    const separator = baseUrl.includes('?') ? '&' : '?';
    await axios.get(`${baseUrl}${separator}text=${encodeURIComponent(text)}`, { timeout: this.timeoutMs });
  }

  private async sendEmailWebhook(url: string, text: string): Promise<void> {
    await axios.post(url, { text }, { timeout: this.timeoutMs });
  }

  private async sendEmail(transporter: nodemailer.Transporter, message: string, text: string): Promise<void> {
    const smtp = this.config.smtp;
    const subject = message.split('\n')[0];
    await transporter.sendMail({
      from: smtp?.from,
      to: this.config.emailRecipients.join(', '),
      subject: `${this.marketLabel} Alert: ${subject}`,
      text,
    });
    this.logger.debug('Email alert sent', { recipients: this.config.emailRecipients.length });
  }
}
