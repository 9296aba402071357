import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import { AppConfig } from '../config/configuration';
import { LoggerService } from '../logger/logger.service';

export interface StoredCredentials {
  access_token?: string;
  refresh_token?: string;
  last_refresh?: string;
}

const CREDENTIAL_KEYS: Array<keyof StoredCredentials> = ['access_token', 'refresh_token', 'last_refresh'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Flat JSON file holding the broker tokens. Tokens rotate at runtime, so they
 * live here rather than in the environment.
 */
@Injectable()
export class TokenStoreService {
  private readonly path: string;

  constructor(
    configService: ConfigService<AppConfig, true>,
    private logger: LoggerService,
  ) {
    this.logger.setContext('TokenStoreService');
    this.path = configService.get('fyers', { infer: true }).credentialsPath;
  }

  getPath(): string {
    return this.path;
  }

  async read(): Promise<StoredCredentials> {
    let raw: string;
    try {
      raw = await fs.readFile(this.path, 'utf8');
    } catch (error: unknown) {
      if (isRecord(error) && error.code === 'ENOENT') {
        return {};
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(raw);
    if (!isRecord(parsed)) {
      throw new Error(`Credentials file ${this.path} does not hold a JSON object`);
    }

    const credentials: StoredCredentials = {};
    for (const key of CREDENTIAL_KEYS) {
      const value = parsed[key];
      if (typeof value === 'string' && value) {
        credentials[key] = value;
      }
    }
    return credentials;
  }

  async update(patch: StoredCredentials): Promise<StoredCredentials> {
    const current = await this.read();
    const next = { ...current, ...patch };
    await fs.writeFile(this.path, `${JSON.stringify(next, null, 2)}\n`, 'utf8');
    this.logger.debug('Credentials file updated', { path: this.path, keys: Object.keys(patch) });
    return next;
  }
}
