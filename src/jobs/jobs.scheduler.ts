import { Injectable, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { FyersAuthService } from '../auth/fyers-auth.service';
import { AppConfig } from '../config/configuration';
import { errorMessage } from '../common/utils/error.utils';
import { zonedDateKey, zonedTimeOfDay } from '../common/utils/time.utils';
import { LoggerService } from '../logger/logger.service';
import { JobsService } from './jobs.service';

@Injectable()
export class JobsScheduler implements OnApplicationBootstrap {
  private lastSummaryDate?: string;
  private readonly schedule: AppConfig['schedule'];
  private readonly timezone: string;

  constructor(
    configService: ConfigService<AppConfig, true>,
    private jobsService: JobsService,
    private fyersAuthService: FyersAuthService,
    private logger: LoggerService,
  ) {
    this.logger.setContext('JobsScheduler');
    this.schedule = configService.get('schedule', { infer: true });
    this.timezone = configService.get('market', { infer: true }).timezone;
  }

  onApplicationBootstrap() {
    this.logger.log('Alert scheduler started', {
      signalCycle: 'every 15 minutes',
      dailySummary: `${this.schedule.dailySummaryTime} ${this.timezone}`,
    });
    if (!this.schedule.runOnStartup) {
      return;
    }
    this.runStartup().catch((error: unknown) => {
      this.logger.warn('Startup run failed', { error: errorMessage(error) });
    });
  }

  // Token first, then one cycle straight away instead of waiting for the next tick
  async runStartup() {
    if (this.fyersAuthService.isConfigured()) {
      await this.fyersAuthService.refreshAccessToken();
    }
    await this.jobsService.runSignalCycle();
  }

  @Cron('*/15 * * * *')
  async handleSignalCycle() {
    const outcome = await this.jobsService.runSignalCycle();
    this.logger.debug('Signal cycle finished', { status: outcome.status });
  }

  // @Cron takes no runtime values, so the configured summary time is
  // compared on a one-minute tick, at most once per market date
  @Cron(CronExpression.EVERY_MINUTE)
  async handleDailySummaryCheck() {
    await this.checkDailySummary(new Date());
  }

  async checkDailySummary(now: Date) {
    if (zonedTimeOfDay(now, this.timezone) !== this.schedule.dailySummaryTime) {
      return;
    }
    const dateKey = zonedDateKey(now, this.timezone);
    if (this.lastSummaryDate === dateKey) {
      return;
    }
    this.lastSummaryDate = dateKey;

    this.logger.log('Triggering daily summary', { date: dateKey });
    const outcome = await this.jobsService.runDailySummary(now);
    this.logger.debug('Daily summary finished', { status: outcome.status });
  }
}
