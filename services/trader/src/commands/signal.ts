import type Big from 'big.js';
import { generateCrossoverSignal, type CrossoverSignal } from '@crossbot/trading-utils';
import type { TradingConfig } from '../config/trading.js';
import type { ExchangeClient } from '../exchange/types.js';

export type SignalReport = {
  symbol: string;
  price: Big;
  lastCandleAt: string | null;
  signal: CrossoverSignal;
};

/**
 * 주문 없이 현재 크로스오버 신호만 계산 (공개 API만 사용)
 */
export async function evaluateSignal(
  exchange: ExchangeClient,
  config: Pick<TradingConfig, 'symbol' | 'candleInterval' | 'candleLookback' | 'shortPeriod' | 'longPeriod'>,
): Promise<SignalReport> {
  const price = await exchange.getPrice(config.symbol);
  const candles = await exchange.getHistoricalCandles(
    config.symbol,
    config.candleInterval,
    config.candleLookback,
  );

  const signal = generateCrossoverSignal(candles, {
    shortPeriod: config.shortPeriod,
    longPeriod: config.longPeriod,
  });

  return {
    symbol: config.symbol,
    price,
    lastCandleAt: candles.length > 0 ? candles[candles.length - 1].timestamp : null,
    signal,
  };
}

export function formatSignalReport(report: SignalReport): string[] {
  const { signal } = report;
  const fmt = (v: Big | undefined) => (v ? v.toFixed(4) : '-');

  return [
    `📊 ${report.symbol} 신호 분석`,
    `   현재가: ${report.price.toString()} | 캔들: ${signal.candleCount}개 | 최근: ${report.lastCandleAt ?? '-'}`,
    `   이전 단기/장기 MA: ${fmt(signal.previous?.shortAverage)} / ${fmt(signal.previous?.longAverage)}`,
    `   현재 단기/장기 MA: ${fmt(signal.current?.shortAverage)} / ${fmt(signal.current?.longAverage)}`,
    `   신호: ${signal.action} (${signal.reason})`,
  ];
}
