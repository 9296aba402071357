import { ConflictException, Controller, HttpCode, Post } from '@nestjs/common';
import { JobsService } from './jobs.service';

@Controller('api/jobs')
export class JobsController {
  constructor(private jobsService: JobsService) {}

  @Post('signal-cycle')
  @HttpCode(200)
  async runSignalCycle() {
    const outcome = await this.jobsService.runSignalCycle();
    if (outcome.status === 'skipped' && outcome.reason === 'in-progress') {
      throw new ConflictException(outcome.detail);
    }
    return outcome;
  }

  @Post('daily-summary')
  @HttpCode(200)
  async runDailySummary() {
    const outcome = await this.jobsService.runDailySummary();
    if (outcome.status === 'skipped' && outcome.reason === 'in-progress') {
      throw new ConflictException(outcome.detail);
    }
    return outcome;
  }
}
