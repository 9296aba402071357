import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { FyersAdapter } from './adapters/fyers.adapter';
import { YahooAdapter } from './adapters/yahoo.adapter';
import { MarketDataService } from './market-data.service';

@Module({
  imports: [AuthModule],
  providers: [FyersAdapter, YahooAdapter, MarketDataService],
  exports: [MarketDataService],
})
export class MarketDataModule {}
