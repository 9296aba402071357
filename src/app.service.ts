import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from './config/configuration';

@Injectable()
export class AppService {
  constructor(private configService: ConfigService<AppConfig, true>) {}

  getHello(): string {
    const { label } = this.configService.get('market', { infer: true });
    return `${label} Signal Alerts API`;
  }
}
