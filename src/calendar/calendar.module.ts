import { Module } from '@nestjs/common';
import { MarketCalendarService } from './market-calendar.service';

@Module({
  providers: [MarketCalendarService],
  exports: [MarketCalendarService],
})
export class CalendarModule {}
