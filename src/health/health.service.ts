import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AlertChannel, AlertsService } from '../alerts/alerts.service';
import { FyersAuthService } from '../auth/fyers-auth.service';
import { AppConfig } from '../config/configuration';
import { CycleOutcome, JobsService, SummaryOutcome } from '../jobs/jobs.service';
import { FeedSource } from '../market-data/market-data.types';

export interface HealthCheckResult {
  status: 'healthy' | 'degraded';
  timestamp: string;
  uptime: number;
  market: {
    label: string;
    timezone: string;
    sources: FeedSource[];
  };
  checks: {
    credentials: {
      status: 'configured' | 'missing';
      lastRefresh?: string;
    };
    alerts: {
      enabled: boolean;
      channels: AlertChannel[];
    };
  };
  jobs: {
    signalCycle?: CycleOutcome;
    dailySummary?: SummaryOutcome;
  };
}

@Injectable()
export class HealthService {
  private startTime: number;

  constructor(
    private configService: ConfigService<AppConfig, true>,
    private jobsService: JobsService,
    private alertsService: AlertsService,
    private fyersAuthService: FyersAuthService,
  ) {
    this.startTime = Date.now();
  }

  async checkHealth(): Promise<HealthCheckResult> {
    const market = this.configService.get('market', { infer: true });
    const configured = this.fyersAuthService.isConfigured();
    const lastRefresh = configured ? await this.fyersAuthService.getLastRefresh() : undefined;
    const channels = this.alertsService.getChannels();
    const enabled = this.alertsService.isEnabled();
    const signalCycle = this.jobsService.getLastSignalCycle();
    const dailySummary = this.jobsService.getLastDailySummary();

    // Yahoo needs no credentials, so only a failing cycle or a mute alert path degrades
    const degraded = signalCycle?.status === 'failed' || (enabled && channels.length === 0);

    return {
      status: degraded ? 'degraded' : 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000), // seconds
      market: {
        label: market.label,
        timezone: market.timezone,
        sources: market.dataSources,
      },
      checks: {
        credentials: { status: configured ? 'configured' : 'missing', lastRefresh },
        alerts: { enabled, channels },
      },
      jobs: { signalCycle, dailySummary },
    };
  }
}
