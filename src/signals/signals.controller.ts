import { Controller, Get, NotFoundException } from '@nestjs/common';
import { SignalsService } from './signals.service';

@Controller('api/signals')
export class SignalsController {
  constructor(private signalsService: SignalsService) {}

  @Get('latest')
  getLatest() {
    const latest = this.signalsService.getLatest();
    if (!latest) {
      throw new NotFoundException('No signal evaluation has completed yet');
    }
    return {
      ...latest,
      barTime: new Date(latest.signals.barTime).toISOString(),
    };
  }
}
