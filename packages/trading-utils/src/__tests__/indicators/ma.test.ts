import { describe, it, expect } from 'vitest';
import {
  calculateMA,
  calculateSMASeries,
  calculateIndicatorSeries,
} from '../../indicators/ma.js';
import { LocalComputationError } from '../../errors.js';
import type { Candle } from '../../types.js';

function createCandle(close: number | string, index = 0): Candle {
  return {
    timestamp: new Date(Date.UTC(2025, 0, 1, 0, index)).toISOString(),
    open: close,
    high: close,
    low: close,
    close,
    volume: 1000,
  };
}

function createCandles(closes: number[]): Candle[] {
  return closes.map((close, i) => createCandle(close, i));
}

describe('calculateMA', () => {
  it('마지막 period개 종가의 SMA를 계산해야 함', () => {
    const candles = createCandles([100, 110, 120, 130, 140]);

    // (100 + 110 + 120 + 130 + 140) / 5 = 120
    expect(calculateMA(candles, 5).toString()).toBe('120');
    // (120 + 130 + 140) / 3 = 130
    expect(calculateMA(candles, 3).toString()).toBe('130');
  });

  it('문자열 종가도 처리해야 함', () => {
    const candles: Candle[] = [createCandle('1.5', 0), createCandle('2.5', 1)];

    expect(calculateMA(candles, 2).toString()).toBe('2');
  });

  it('캔들 수가 부족하면 LocalComputationError', () => {
    const candles = createCandles([100, 110]);

    expect(() => calculateMA(candles, 5)).toThrow(LocalComputationError);
  });

  it('기간이 1 미만이거나 정수가 아니면 에러', () => {
    const candles = createCandles([100, 110]);

    expect(() => calculateMA(candles, 0)).toThrow('이동평균 기간은 1 이상의 정수');
    expect(() => calculateMA(candles, 1.5)).toThrow(LocalComputationError);
  });
});

describe('calculateSMASeries', () => {
  it('기간이 채워지기 전 인덱스는 undefined', () => {
    const series = calculateSMASeries(createCandles([1, 2, 3, 4, 5]), 3);

    expect(series).toHaveLength(5);
    expect(series[0]).toBeUndefined();
    expect(series[1]).toBeUndefined();
    expect(series.slice(2).map((v) => v?.toString())).toEqual(['2', '3', '4']);
  });

  it('i번째 값은 i 이후 캔들에 영향을 받지 않음 (look-ahead 없음)', () => {
    const base = createCandles([10, 20, 30, 40]);
    const extended = [...base, createCandle(1_000_000, 4)];

    const a = calculateSMASeries(base, 2);
    const b = calculateSMASeries(extended, 2);

    expect(b.slice(0, 4).map((v) => v?.toString())).toEqual(a.map((v) => v?.toString()));
  });

  it('각 값은 calculateMA와 같아야 함', () => {
    const candles = createCandles([5, 7, 9, 4, 6, 8, 3, 11]);
    const series = calculateSMASeries(candles, 4);

    for (let i = 3; i < candles.length; i++) {
      expect(series[i]?.toString()).toBe(calculateMA(candles.slice(0, i + 1), 4).toString());
    }
  });

  it('빈 배열은 빈 결과', () => {
    expect(calculateSMASeries([], 3)).toEqual([]);
  });
});

describe('calculateIndicatorSeries', () => {
  it('기본 20/50 기간으로 스냅샷을 채워야 함', () => {
    const candles = createCandles(Array.from({ length: 60 }, (_, i) => 100 + i));
    const series = calculateIndicatorSeries(candles);

    expect(series).toHaveLength(60);
    expect(series[18]).toEqual({});
    expect(series[19]?.shortAverage).toBeDefined();
    expect(series[19]?.longAverage).toBeUndefined();
    expect(series[49]?.longAverage).toBeDefined();

    // 마지막 20개: 140..159 → 149.5, 마지막 50개: 110..159 → 134.5
    expect(series[59]?.shortAverage?.toString()).toBe('149.5');
    expect(series[59]?.longAverage?.toString()).toBe('134.5');
  });

  it('사용자 지정 기간을 사용해야 함', () => {
    const series = calculateIndicatorSeries(createCandles([1, 2, 3, 4]), {
      shortPeriod: 2,
      longPeriod: 3,
    });

    expect(series[3]?.shortAverage?.toString()).toBe('3.5');
    expect(series[3]?.longAverage?.toString()).toBe('3');
  });
});
