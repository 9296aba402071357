import 'reflect-metadata';
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import configuration from '../src/config/configuration';
import { validate } from '../src/config/env.validation';
import { LoggerModule } from '../src/logger/logger.module';
import { MarketDataModule } from '../src/market-data/market-data.module';
import { MarketDataService } from '../src/market-data/market-data.service';
import { SignalsModule } from '../src/signals/signals.module';
import { SignalsService } from '../src/signals/signals.service';
import { computeIndicatorFrame, firedSignals } from '../src/signals/signal-engine';

// Feed and engine only: no scheduler and no alert delivery
@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, envFilePath: '.env', load: [configuration], validate }),
    LoggerModule,
    MarketDataModule,
    SignalsModule,
  ],
})
class CheckSignalsModule {}

function fmt(value: number | undefined): string {
  return value === undefined ? 'n/a' : value.toFixed(2);
}

async function checkSignals() {
  const app = await NestFactory.createApplicationContext(CheckSignalsModule, { logger: ['error', 'warn'] });
  const marketDataService = app.get(MarketDataService);
  const signalsService = app.get(SignalsService);
  const options = signalsService.getEngineOptions();

  console.log('\n📊 SIGNAL CHECK (dry run, no alerts sent)\n');
  console.log(`Sources: ${marketDataService.getSources().join(' → ')}`);

  const series = await marketDataService.fetchSeries();
  if (!series.ok) {
    console.log('\n❌ No data fetched:');
    for (const failure of series.failures) {
      console.log(`   ${failure.source}: ${failure.error}`);
    }
    await app.close();
    return;
  }

  const { bars } = series;
  console.log(`Using ${series.source}: ${bars.length} bars`);
  if (bars.length > 0) {
    console.log(`   First: ${new Date(bars[0].time).toISOString()}`);
    console.log(`   Last:  ${new Date(bars[bars.length - 1].time).toISOString()}`);
  }

  const frame = computeIndicatorFrame(
    bars.map((bar) => bar.close),
    options,
  );
  console.log(`\n🔍 Last 5 bars:`);
  for (let i = Math.max(0, bars.length - 5); i < bars.length; i++) {
    console.log(
      `   ${new Date(bars[i].time).toISOString()}  close ${bars[i].close.toFixed(2)}  ` +
        `RSI${options.rsiPeriod} ${fmt(frame.rsi[i])}  ` +
        `EMA${options.emaFastPeriod} ${fmt(frame.emaFast[i])}  ` +
        `EMA${options.emaSlowPeriod} ${fmt(frame.emaSlow[i])}`,
    );
  }

  const result = signalsService.evaluate(bars, series.source);
  if (!result.ok) {
    console.log(`\n⚠️  ${result.error.code}: ${result.error.message}`);
    await app.close();
    return;
  }

  const fired = firedSignals(result.signals);
  console.log(`\n🚦 Signals on last bar:`);
  console.log(`   EMA bull cross:     ${result.signals.emaBullCross}`);
  console.log(`   EMA bear cross:     ${result.signals.emaBearCross}`);
  console.log(`   Bullish divergence: ${result.signals.bullishDivergence}`);
  console.log(`   Bearish divergence: ${result.signals.bearishDivergence}`);
  if (fired.length > 0) {
    console.log(`\nWould send:`);
    for (const kind of fired) {
      console.log(`   ${signalsService.describeSignal(kind)}`);
    }
  }

  const summary = signalsService.summarize(bars);
  if (summary.ok) {
    console.log(`\n${signalsService.describeStatus(summary.status)}`);
  }

  await app.close();
}

checkSignals().catch((error: unknown) => {
  console.error('Signal check failed', error);
  process.exit(1);
});
