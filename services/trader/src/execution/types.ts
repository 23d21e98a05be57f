import type { CrossoverSignal, Signal } from '@crossbot/trading-utils';
import type { TradingConfig } from '../config/trading.js';
import type { OrderResult } from '../exchange/types.js';

export type LoopState =
  | 'IDLE'
  | 'POLLING'
  | 'DECIDING'
  | 'ORDERING'
  | 'SLEEPING'
  | 'FAULTED_RECOVERING';

export type SkipReason =
  | 'INSUFFICIENT_BALANCE' // 매수: quote 자산 free < 주문 금액
  | 'ZERO_QUANTITY'        // 가격 0 또는 step 미만으로 수량 0
  | 'BELOW_MIN_QTY'        // 수량이 LOT_SIZE.minQty 미만
  | 'NO_BASE_BALANCE'      // 매도: base 자산 free = 0
  | 'DRY_RUN';

export type CycleResult =
  | { outcome: 'HOLD'; signal: CrossoverSignal }
  | {
      outcome: 'SKIPPED';
      signal: CrossoverSignal;
      skipReason: SkipReason;
      quantity?: string;
    }
  | { outcome: 'ORDERED'; signal: CrossoverSignal; order: OrderResult }
  | {
      outcome: 'FAULTED';
      error: Error;
      failedState: LoopState;
      /** 이번 사이클에서 DECIDING이 끝났을 때만 존재 */
      signal?: Signal;
    };

export type TradingLoopConfig = Pick<
  TradingConfig,
  | 'symbol'
  | 'baseAsset'
  | 'quoteAsset'
  | 'pollIntervalSec'
  | 'tradeAmount'
  | 'shortPeriod'
  | 'longPeriod'
  | 'candleInterval'
  | 'candleLookback'
  | 'dryRun'
>;
