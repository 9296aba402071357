import { Controller, HttpCode, Post } from '@nestjs/common';
import { AlertsService } from './alerts.service';

@Controller('api/alerts')
export class AlertsController {
  constructor(private alertsService: AlertsService) {}

  @Post('test')
  @HttpCode(200)
  async sendTestAlert() {
    const reports = await this.alertsService.send(
      'Test alert: if you can read this, alert delivery is configured correctly.',
    );
    return {
      success: reports.length > 0 && reports.every((report) => report.ok),
      reports,
    };
  }
}
