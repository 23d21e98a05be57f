import { env, envBoolean, envNumber, envString, parseLogLevel, type LogLevel } from '@crossbot/shared-utils';

/** Binance kline interval */
export const CANDLE_INTERVALS = [
  '1s', '1m', '3m', '5m', '15m', '30m',
  '1h', '2h', '4h', '6h', '8h', '12h',
  '1d', '3d', '1w', '1M',
] as const;
export type CandleInterval = (typeof CANDLE_INTERVALS)[number];

/** 한 번의 klines 요청으로 받을 수 있는 최대 캔들 수 */
export const MAX_CANDLE_LOOKBACK = 1000;

export type TradingConfig = {
  symbol: string;
  baseAsset: string;
  quoteAsset: string;
  pollIntervalSec: number;
  /** 매수 1회당 quote 자산 기준 주문 금액 */
  tradeAmount: number;
  shortPeriod: number;
  longPeriod: number;
  candleInterval: CandleInterval;
  candleLookback: number;
  dryRun: boolean;
  binanceBaseUrl: string;
  logLevel: LogLevel;
};

function isCandleInterval(value: string): value is CandleInterval {
  return (CANDLE_INTERVALS as readonly string[]).includes(value);
}

function parseCandleInterval(value: string | undefined): CandleInterval {
  const raw = value ?? '1m';
  if (isCandleInterval(raw)) return raw;
  throw new Error(`CANDLE_INTERVAL must be one of ${CANDLE_INTERVALS.join('|')}, got: ${value}`);
}

function mustPositiveInt(name: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got: ${value}`);
  }
  return value;
}

function mustPositive(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be greater than 0, got: ${value}`);
  }
  return value;
}

function mustAsset(name: string, value: string): string {
  const normalized = value.trim().toUpperCase();
  if (!/^[A-Z0-9]+$/.test(normalized)) {
    throw new Error(`${name} must be alphanumeric, got: ${value}`);
  }
  return normalized;
}

function mustUrl(name: string, value: string): string {
  try {
    new URL(value);
  } catch {
    throw new Error(`${name} must be a valid URL, got: ${value}`);
  }
  return value;
}

/**
 * 환경변수(.env 포함)에서 거래 설정 로드
 *
 * 잘못된 값은 시작 시점에 변수명을 담아 에러를 던진다.
 */
export function loadTradingConfig(): TradingConfig {
  const shortPeriod = mustPositiveInt('SHORT_MA_PERIOD', envNumber('SHORT_MA_PERIOD', 20));
  const longPeriod = mustPositiveInt('LONG_MA_PERIOD', envNumber('LONG_MA_PERIOD', 50));

  if (shortPeriod >= longPeriod) {
    throw new Error(
      `SHORT_MA_PERIOD must be less than LONG_MA_PERIOD, got: ${shortPeriod} >= ${longPeriod}`,
    );
  }

  const candleLookback = mustPositiveInt('CANDLE_LOOKBACK', envNumber('CANDLE_LOOKBACK', 100));
  if (candleLookback <= longPeriod) {
    throw new Error(
      `CANDLE_LOOKBACK must be greater than LONG_MA_PERIOD (${longPeriod}), got: ${candleLookback}`,
    );
  }
  if (candleLookback > MAX_CANDLE_LOOKBACK) {
    throw new Error(`CANDLE_LOOKBACK must be at most ${MAX_CANDLE_LOOKBACK}, got: ${candleLookback}`);
  }

  return {
    symbol: mustAsset('TRADE_SYMBOL', envString('TRADE_SYMBOL', 'BTCUSDT')),
    baseAsset: mustAsset('BASE_ASSET', envString('BASE_ASSET', 'BTC')),
    quoteAsset: mustAsset('QUOTE_ASSET', envString('QUOTE_ASSET', 'USDT')),
    pollIntervalSec: mustPositiveInt('POLL_INTERVAL_SEC', envNumber('POLL_INTERVAL_SEC', 60)),
    tradeAmount: mustPositive('TRADE_AMOUNT', envNumber('TRADE_AMOUNT', 100)),
    shortPeriod,
    longPeriod,
    candleInterval: parseCandleInterval(env('CANDLE_INTERVAL')),
    candleLookback,
    dryRun: envBoolean('DRY_RUN', true),
    binanceBaseUrl: mustUrl('BINANCE_BASE_URL', envString('BINANCE_BASE_URL', 'https://api.binance.com')),
    logLevel: parseLogLevel(env('LOG_LEVEL')),
  };
}
