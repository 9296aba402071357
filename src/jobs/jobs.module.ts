import { Module } from '@nestjs/common';
import { AlertsModule } from '../alerts/alerts.module';
import { AuthModule } from '../auth/auth.module';
import { CalendarModule } from '../calendar/calendar.module';
import { MarketDataModule } from '../market-data/market-data.module';
import { SignalsModule } from '../signals/signals.module';
import { JobsController } from './jobs.controller';
import { JobsService } from './jobs.service';
import { JobsScheduler } from './jobs.scheduler';

@Module({
  imports: [AlertsModule, AuthModule, CalendarModule, MarketDataModule, SignalsModule],
  controllers: [JobsController],
  providers: [JobsService, JobsScheduler],
  exports: [JobsService],
})
export class JobsModule {}
