import type Big from 'big.js';
import type { Candle, SymbolFilter } from '@crossbot/trading-utils';

export type OrderSide = 'BUY' | 'SELL';

export interface Balance {
  asset: string;
  free: Big;
  locked: Big;
}

export interface OrderResult {
  symbol: string;
  side: OrderSide;
  requestedQty: string;
  status: 'SUCCESS' | 'FAILED';
  orderId?: string;
  executedQty?: string;
  quoteQty?: string;
  message: string;
  raw?: unknown;
}

/**
 * 실행 루프가 의존하는 거래소 기능
 *
 * 실패는 모두 ExchangeError로 던진다.
 */
export interface ExchangeClient {
  readonly exchange: string;
  getAccountBalances(): Promise<Record<string, Balance>>;
  getPrice(symbol: string): Promise<Big>;
  getHistoricalCandles(symbol: string, interval: string, lookback: number): Promise<Candle[]>;
  getSymbolFilters(symbol: string): Promise<SymbolFilter>;
  placeMarketOrder(symbol: string, side: OrderSide, quantity: Big): Promise<OrderResult>;
}
