import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import * as crypto from 'crypto';
import { AppConfig } from '../config/configuration';
import { errorMessage } from '../common/utils/error.utils';
import { LoggerService } from '../logger/logger.service';
import { TokenStoreService } from './token-store.service';

interface RefreshTokenResponse {
  s?: string;
  code?: number;
  message?: string;
  access_token?: string;
  refresh_token?: string;
}

export interface FyersCredentials {
  clientId: string;
  accessToken: string;
}

@Injectable()
export class FyersAuthService {
  private readonly config: AppConfig['fyers'];
  private readonly timeoutMs: number;
  private refreshInFlight?: Promise<boolean>;

  constructor(
    configService: ConfigService<AppConfig, true>,
    private tokenStore: TokenStoreService,
    private logger: LoggerService,
  ) {
    this.logger.setContext('FyersAuthService');
    this.config = configService.get('fyers', { infer: true });
    this.timeoutMs = configService.get('http', { infer: true }).timeoutMs;
  }

  isConfigured(): boolean {
    return Boolean(this.config.clientId && this.config.secretKey);
  }

  /** Client id and current access token, or undefined when either is missing. */
  async getCredentials(): Promise<FyersCredentials | undefined> {
    if (!this.config.clientId) {
      return undefined;
    }
    const stored = await this.tokenStore.read();
    if (!stored.access_token) {
      return undefined;
    }
    return { clientId: this.config.clientId, accessToken: stored.access_token };
  }

  async getLastRefresh(): Promise<string | undefined> {
    const stored = await this.tokenStore.read();
    return stored.last_refresh;
  }

  /**
   * Exchanges the stored refresh token for a new access token. Concurrent
   * callers share the same request.
   */
  refreshAccessToken(): Promise<boolean> {
    if (!this.refreshInFlight) {
      this.refreshInFlight = this.requestNewToken().finally(() => {
        this.refreshInFlight = undefined;
      });
    }
    return this.refreshInFlight;
  }

  appIdHash(): string {
    return crypto
      .createHash('sha256')
      .update(`${this.config.clientId ?? ''}:${this.config.secretKey ?? ''}`)
      .digest('hex');
  }

  private async requestNewToken(): Promise<boolean> {
    if (!this.isConfigured()) {
      this.logger.debug('Fyers client credentials not configured, skipping token refresh');
      return false;
    }

    try {
      const stored = await this.tokenStore.read();
      if (!stored.refresh_token) {
        this.logger.warn('No refresh token stored, cannot refresh access token', {
          path: this.tokenStore.getPath(),
        });
        return false;
      }

      const payload: Record<string, string> = {
        grant_type: 'refresh_token',
        appIdHash: this.appIdHash(),
        refresh_token: stored.refresh_token,
      };
      if (this.config.pin) {
        payload.pin = this.config.pin;
      }

      const response = await axios.post<RefreshTokenResponse>(
        `${this.config.apiBaseUrl}/api/v3/validate-refresh-token`,
        payload,
        { timeout: this.timeoutMs },
      );
      const data = response.data;

      if (data?.s !== 'ok' || typeof data.access_token !== 'string') {
        this.logger.warn('Token refresh rejected', {
          code: data?.code,
          message: data?.message,
        });
        return false;
      }

      await this.tokenStore.update({
        access_token: data.access_token,
        refresh_token: data.refresh_token ?? stored.refresh_token,
        last_refresh: new Date().toISOString(),
      });
      this.logger.log('Fyers access token refreshed');
      return true;
    } catch (error: unknown) {
      this.logger.warn('Error refreshing Fyers access token', { error: errorMessage(error) });
      return false;
    }
  }
}
