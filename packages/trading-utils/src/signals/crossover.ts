import { LocalComputationError } from '../errors.js';
import { DEFAULT_MA_PERIODS, calculateIndicatorSeries } from '../indicators/ma.js';
import type { Candle, CrossoverSignal, IndicatorSnapshot, MAPeriods, Signal } from '../types.js';

/**
 * 두 스냅샷 사이의 골든/데드 크로스 판정
 *
 * - BUY: 이전 단기 < 장기, 현재 단기 > 장기
 * - SELL: 이전 단기 > 장기, 현재 단기 < 장기
 * - 그 외 HOLD (값이 하나라도 없거나 같으면 크로스 아님)
 */
export function detectCrossover(
  prev: IndicatorSnapshot | undefined,
  curr: IndicatorSnapshot | undefined,
): Signal {
  const prevShort = prev?.shortAverage;
  const prevLong = prev?.longAverage;
  const currShort = curr?.shortAverage;
  const currLong = curr?.longAverage;

  if (!prevShort || !prevLong || !currShort || !currLong) {
    return 'HOLD';
  }

  if (prevShort.lt(prevLong) && currShort.gt(currLong)) {
    return 'BUY';
  }

  if (prevShort.gt(prevLong) && currShort.lt(currLong)) {
    return 'SELL';
  }

  return 'HOLD';
}

/**
 * 캔들 시계열로부터 이동평균 크로스오버 신호 생성
 *
 * 캔들이 장기 기간보다 적으면 지표를 계산하지 않고 HOLD.
 *
 * @example
 * ```typescript
 * const signal = generateCrossoverSignal(candles, { shortPeriod: 20, longPeriod: 50 });
 * if (signal.action === 'BUY') {
 *   console.log('골든크로스: 매수 신호');
 * }
 * ```
 */
export function generateCrossoverSignal(
  candles: Candle[],
  periods: MAPeriods = DEFAULT_MA_PERIODS,
): CrossoverSignal {
  if (periods.shortPeriod >= periods.longPeriod) {
    throw new LocalComputationError(
      `단기 기간(${periods.shortPeriod})은 장기 기간(${periods.longPeriod})보다 작아야 합니다.`,
    );
  }

  if (candles.length < periods.longPeriod) {
    return { action: 'HOLD', reason: 'INSUFFICIENT_CANDLES', candleCount: candles.length };
  }

  // 마지막 두 스냅샷만 필요하므로 장기 기간 + 1개까지만 잘라서 계산
  const window = candles.slice(-(periods.longPeriod + 1));
  const series = calculateIndicatorSeries(window, periods);
  const previous = series[series.length - 2];
  const current = series[series.length - 1];

  const action = detectCrossover(previous, current);
  const reason = action === 'BUY' ? 'GOLDEN_CROSS' : action === 'SELL' ? 'DEATH_CROSS' : 'NO_CROSS';

  return {
    action,
    reason,
    candleCount: candles.length,
    previous,
    current,
  };
}
