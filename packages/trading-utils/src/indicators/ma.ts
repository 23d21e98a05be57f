import Big from 'big.js';
import { LocalComputationError } from '../errors.js';
import type { Candle, IndicatorSnapshot, MAPeriods } from '../types.js';

export const DEFAULT_MA_PERIODS: MAPeriods = {
  shortPeriod: 20,
  longPeriod: 50,
};

function assertPeriod(period: number): void {
  if (!Number.isInteger(period) || period < 1) {
    throw new LocalComputationError(`이동평균 기간은 1 이상의 정수여야 합니다. 현재: ${period}`);
  }
}

function closesOf(candles: Candle[]): Big[] {
  return candles.map((c) => new Big(c.close));
}

/**
 * 단순 이동평균 (SMA) 계산 - 마지막 period개 종가 기준
 *
 * @param candles - OHLCV 캔들 배열 (오래된 순)
 * @param period - 이동평균 기간
 * @returns SMA 값
 *
 * @example
 * ```typescript
 * const sma20 = calculateMA(candles, 20);
 * ```
 */
export function calculateMA(candles: Candle[], period: number): Big {
  assertPeriod(period);

  if (candles.length < period) {
    throw new LocalComputationError(
      `SMA 계산에 최소 ${period}개의 캔들이 필요합니다. 현재: ${candles.length}개`,
    );
  }

  const slice = closesOf(candles.slice(-period));
  const sum = slice.reduce((acc, val) => acc.plus(val), new Big(0));
  return sum.div(period);
}

/**
 * 인덱스별 SMA 시계열
 *
 * i번째 값은 i 이하 캔들만 사용한다. 기간이 채워지기 전(i < period - 1)은 undefined.
 * 누적합을 굴려서 O(n)으로 계산한다.
 */
export function calculateSMASeries(candles: Candle[], period: number): Array<Big | undefined> {
  assertPeriod(period);

  const closes = closesOf(candles);
  const out: Array<Big | undefined> = [];
  let windowSum = new Big(0);

  for (let i = 0; i < closes.length; i++) {
    windowSum = windowSum.plus(closes[i]);

    if (i >= period) {
      windowSum = windowSum.minus(closes[i - period]);
    }

    out.push(i >= period - 1 ? windowSum.div(period) : undefined);
  }

  return out;
}

/**
 * 단기/장기 이동평균 스냅샷 시계열
 *
 * @param candles - OHLCV 캔들 배열
 * @param periods - 단기/장기 기간 (기본 20/50)
 * @returns 캔들 인덱스와 1:1 대응하는 스냅샷 배열
 *
 * @example
 * ```typescript
 * const series = calculateIndicatorSeries(candles, { shortPeriod: 20, longPeriod: 50 });
 * const latest = series[series.length - 1];
 * console.log(latest.shortAverage?.toString(), latest.longAverage?.toString());
 * ```
 */
export function calculateIndicatorSeries(
  candles: Candle[],
  periods: MAPeriods = DEFAULT_MA_PERIODS,
): IndicatorSnapshot[] {
  const shortSeries = calculateSMASeries(candles, periods.shortPeriod);
  const longSeries = calculateSMASeries(candles, periods.longPeriod);

  return candles.map((_, i) => {
    const snapshot: IndicatorSnapshot = {};
    const shortAverage = shortSeries[i];
    const longAverage = longSeries[i];
    if (shortAverage !== undefined) snapshot.shortAverage = shortAverage;
    if (longAverage !== undefined) snapshot.longAverage = longAverage;
    return snapshot;
  });
}
