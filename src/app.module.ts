import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { AuthModule } from './auth/auth.module';
import { SignalsModule } from './signals/signals.module';
import { MarketDataModule } from './market-data/market-data.module';
import { CalendarModule } from './calendar/calendar.module';
import { JobsModule } from './jobs/jobs.module';
import { HealthModule } from './health/health.module';
import { LoggerModule } from './logger/logger.module';
import { AlertsModule } from './alerts/alerts.module';
import configuration from './config/configuration';
import { validate } from './config/env.validation';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [configuration],
      validate,
    }),
    ScheduleModule.forRoot(),
    LoggerModule,
    AuthModule,
    SignalsModule,
    MarketDataModule,
    CalendarModule,
    AlertsModule,
    JobsModule,
    HealthModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
