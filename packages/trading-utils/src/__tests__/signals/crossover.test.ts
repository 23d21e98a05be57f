import { describe, it, expect } from 'vitest';
import Big from 'big.js';
import { detectCrossover, generateCrossoverSignal } from '../../signals/crossover.js';
import { LocalComputationError } from '../../errors.js';
import type { Candle, IndicatorSnapshot } from '../../types.js';

function createCandle(close: number, index: number): Candle {
  return {
    timestamp: new Date(Date.UTC(2025, 0, 1, 0, index)).toISOString(),
    open: close,
    high: close,
    low: close,
    close,
    volume: 1000,
  };
}

/** 앞 49개는 100, 이후 tail 값을 붙인 캔들 시계열 */
function flatThen(...tail: number[]): Candle[] {
  const closes = [...Array.from({ length: 49 }, () => 100), ...tail];
  return closes.map((close, i) => createCandle(close, i));
}

function snap(shortAverage: number, longAverage: number): IndicatorSnapshot {
  return { shortAverage: new Big(shortAverage), longAverage: new Big(longAverage) };
}

describe('detectCrossover', () => {
  it('단기 99→101, 장기 100→100.5 이면 BUY (골든 크로스)', () => {
    expect(detectCrossover(snap(99, 100), snap(101, 100.5))).toBe('BUY');
  });

  it('단기가 장기를 위에서 아래로 뚫으면 SELL (데드 크로스)', () => {
    expect(detectCrossover(snap(101, 100), snap(99, 100.5))).toBe('SELL');
  });

  it('교차가 없으면 HOLD', () => {
    expect(detectCrossover(snap(101, 100), snap(102, 100.5))).toBe('HOLD');
    expect(detectCrossover(snap(98, 100), snap(99, 100.5))).toBe('HOLD');
  });

  it('어느 쪽이든 같으면 크로스가 아님', () => {
    expect(detectCrossover(snap(100, 100), snap(101, 100.5))).toBe('HOLD');
    expect(detectCrossover(snap(99, 100), snap(100.5, 100.5))).toBe('HOLD');
    expect(detectCrossover(snap(100, 100), snap(99, 100.5))).toBe('HOLD');
  });

  it('스냅샷이나 값이 없으면 HOLD', () => {
    expect(detectCrossover(undefined, snap(101, 100.5))).toBe('HOLD');
    expect(detectCrossover({ shortAverage: new Big(99) }, snap(101, 100.5))).toBe('HOLD');
    expect(detectCrossover(snap(99, 100), {})).toBe('HOLD');
  });
});

describe('generateCrossoverSignal', () => {
  it('골든 크로스 시 BUY 신호', () => {
    // 이전 시점 (0..49): 단기 (19×100 + 90)/20 = 99.5, 장기 (49×100 + 90)/50 = 99.8 → 단기 < 장기
    // 현재 시점 (1..50): 단기 (18×100 + 90 + 150)/20 = 102, 장기 (48×100 + 90 + 150)/50 = 100.8 → 단기 > 장기
    const signal = generateCrossoverSignal(flatThen(90, 150));

    expect(signal.action).toBe('BUY');
    expect(signal.reason).toBe('GOLDEN_CROSS');
    expect(signal.candleCount).toBe(51);
    expect(signal.previous?.shortAverage?.toString()).toBe('99.5');
    expect(signal.previous?.longAverage?.toString()).toBe('99.8');
    expect(signal.current?.shortAverage?.toString()).toBe('102');
    expect(signal.current?.longAverage?.toString()).toBe('100.8');
  });

  it('데드 크로스 시 SELL 신호', () => {
    // 이전 시점: 단기 (19×100 + 110)/20 = 100.5, 장기 (49×100 + 110)/50 = 100.2 → 단기 > 장기
    // 현재 시점: 단기 (18×100 + 110 + 50)/20 = 98, 장기 (48×100 + 110 + 50)/50 = 99.2 → 단기 < 장기
    const signal = generateCrossoverSignal(flatThen(110, 50));

    expect(signal.action).toBe('SELL');
    expect(signal.reason).toBe('DEATH_CROSS');
    expect(signal.current?.shortAverage?.toString()).toBe('98');
    expect(signal.current?.longAverage?.toString()).toBe('99.2');
  });

  it('교차가 없으면 HOLD', () => {
    const candles = Array.from({ length: 60 }, (_, i) => createCandle(100 + i, i));

    const signal = generateCrossoverSignal(candles);

    expect(signal.action).toBe('HOLD');
    expect(signal.reason).toBe('NO_CROSS');
  });

  it('이전 시점에 두 평균이 같으면 HOLD', () => {
    // 이전 시점 (0..49): 모두 100 → 단기 = 장기
    const signal = generateCrossoverSignal(flatThen(100, 150));

    expect(signal.action).toBe('HOLD');
    expect(signal.reason).toBe('NO_CROSS');
  });

  it('캔들이 50개 미만이면 가격 패턴과 무관하게 HOLD', () => {
    const patterns: number[][] = [
      Array.from({ length: 49 }, (_, i) => (i === 48 ? 1000 : 100)),
      Array.from({ length: 49 }, (_, i) => (i === 48 ? 1 : 100)),
      Array.from({ length: 30 }, (_, i) => 100 - i),
      [100],
      [],
    ];

    for (const closes of patterns) {
      const signal = generateCrossoverSignal(closes.map((c, i) => createCandle(c, i)));
      expect(signal.action).toBe('HOLD');
      expect(signal.reason).toBe('INSUFFICIENT_CANDLES');
      expect(signal.current).toBeUndefined();
    }
  });

  it('캔들이 정확히 50개면 이전 장기 평균이 없어 HOLD', () => {
    const candles = Array.from({ length: 50 }, (_, i) => createCandle(i === 49 ? 1000 : 100, i));

    const signal = generateCrossoverSignal(candles);

    expect(signal.action).toBe('HOLD');
    expect(signal.previous?.longAverage).toBeUndefined();
  });

  it('앞쪽 오래된 캔들은 결과에 영향을 주지 않음', () => {
    const older = Array.from({ length: 30 }, (_, i) => createCandle(5000, i));
    const recent = flatThen(90, 150).map((c, i) => ({ ...c, timestamp: createCandle(0, 30 + i).timestamp }));

    const signal = generateCrossoverSignal([...older, ...recent]);

    expect(signal.action).toBe('BUY');
    expect(signal.candleCount).toBe(81);
  });

  it('사용자 지정 기간을 사용해야 함', () => {
    const closes = [10, 10, 10, 4, 4, 20];
    // 이전 (idx 4): 단기 (10+4+4)/3 = 6, 장기 (10+10+10+4+4)/5 = 7.6 → 단기 < 장기
    // 현재 (idx 5): 단기 (4+4+20)/3 = 9.33.., 장기 (10+10+4+4+20)/5 = 9.6 → 단기 < 장기 → HOLD
    const signal = generateCrossoverSignal(
      closes.map((c, i) => createCandle(c, i)),
      { shortPeriod: 3, longPeriod: 5 },
    );
    expect(signal.action).toBe('HOLD');

    const crossing = [10, 10, 10, 4, 4, 30];
    // 현재: 단기 (4+4+30)/3 = 12.67, 장기 (10+10+4+4+30)/5 = 11.6 → BUY
    const buy = generateCrossoverSignal(
      crossing.map((c, i) => createCandle(c, i)),
      { shortPeriod: 3, longPeriod: 5 },
    );
    expect(buy.action).toBe('BUY');
  });

  it('단기 기간이 장기 기간 이상이면 LocalComputationError', () => {
    expect(() => generateCrossoverSignal([], { shortPeriod: 50, longPeriod: 50 })).toThrow(
      LocalComputationError,
    );
  });
});
