import type Big from 'big.js';

// =============================================================================
// Candle Data
// =============================================================================

/**
 * OHLCV candle data (chronological, oldest first)
 */
export interface Candle {
  timestamp: string; // ISO timestamp of the candle open
  open: string | number;
  high: string | number;
  low: string | number;
  close: string | number;
  volume: string | number;
}

// =============================================================================
// Indicators
// =============================================================================

/**
 * Short/long SMA at one candle index. A field is absent until its window is full.
 */
export interface IndicatorSnapshot {
  shortAverage?: Big;
  longAverage?: Big;
}

export interface MAPeriods {
  shortPeriod: number; // Default 20
  longPeriod: number;  // Default 50
}

// =============================================================================
// Signals
// =============================================================================

export type Signal = 'BUY' | 'SELL' | 'HOLD';

export type SignalReason =
  | 'GOLDEN_CROSS'
  | 'DEATH_CROSS'
  | 'NO_CROSS'
  | 'INSUFFICIENT_CANDLES';

export interface CrossoverSignal {
  action: Signal;
  reason: SignalReason;
  candleCount: number;
  previous?: IndicatorSnapshot;
  current?: IndicatorSnapshot;
}

// =============================================================================
// Risk Management
// =============================================================================

/**
 * Exchange quantity filter
 */
export interface SymbolFilter {
  stepSize: Big;
  minQty?: Big;
}

/**
 * Fixed-notional sizing parameters
 */
export interface OrderSizingParams {
  notional: Big;   // Quote-currency amount to spend
  price: Big;      // Current price, must be > 0
  stepSize?: Big;  // Falls back to DEFAULT_STEP_SIZE
}
