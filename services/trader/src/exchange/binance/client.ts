import { createHmac } from 'node:crypto';
import Big from 'big.js';
import type { z } from 'zod';
import { createLogger, millisToIso, type LoggerLike } from '@crossbot/shared-utils';
import type { Candle, SymbolFilter } from '@crossbot/trading-utils';
import { ExchangeError } from '../errors.js';
import type { Balance, ExchangeClient, OrderResult, OrderSide } from '../types.js';
import {
  BinanceAccountSchema,
  BinanceErrorSchema,
  BinanceExchangeInfoSchema,
  BinanceKlinesSchema,
  BinanceOrderSchema,
  BinanceTickerPriceSchema,
} from './schemas.js';

export const BINANCE_BASE_URL = 'https://api.binance.com';

/** klines limit 상한 */
const MAX_KLINES_LIMIT = 1000;

export type BinanceClientOptions = {
  baseUrl?: string;
  apiKey?: string;
  secretKey?: string;
  recvWindow?: number;
  logger?: LoggerLike;
  /** 서명 timestamp (테스트에서 고정) */
  now?: () => number;
};

type RequestParams = Record<string, string>;

type RequestOptions = {
  method: 'GET' | 'POST';
  path: string;
  params?: RequestParams;
  signed?: boolean;
};

/**
 * Binance 현물 REST 클라이언트
 *
 * 서명이 필요한 요청(account, order)은 HMAC-SHA256(query, secretKey)를 signature로 붙이고
 * X-MBX-APIKEY 헤더를 보낸다. 모든 실패는 ExchangeError로 변환한다.
 */
export class BinanceClient implements ExchangeClient {
  public readonly exchange = 'BINANCE' as const;

  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly secretKey?: string;
  private readonly recvWindow: number;
  private readonly logger: LoggerLike;
  private readonly now: () => number;

  constructor(options: BinanceClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? BINANCE_BASE_URL).replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.secretKey = options.secretKey;
    this.recvWindow = options.recvWindow ?? 5000;
    this.logger = options.logger ?? createLogger('binance-client');
    this.now = options.now ?? (() => Date.now());
  }

  private sign(query: string, secretKey: string): string {
    return createHmac('sha256', secretKey).update(query, 'utf-8').digest('hex');
  }

  private buildQuery(endpoint: string, params: RequestParams, signed: boolean): {
    query: string;
    headers: Record<string, string>;
  } {
    const headers: Record<string, string> = { accept: 'application/json' };
    const search = new URLSearchParams(params);

    if (!signed) {
      return { query: search.toString(), headers };
    }

    if (!this.apiKey || !this.secretKey) {
      throw new ExchangeError('API_KEY/SECRET_KEY가 설정되지 않아 서명 요청을 보낼 수 없습니다.', {
        endpoint,
      });
    }

    search.set('recvWindow', String(this.recvWindow));
    search.set('timestamp', String(this.now()));

    const unsigned = search.toString();
    headers['X-MBX-APIKEY'] = this.apiKey;

    return { query: `${unsigned}&signature=${this.sign(unsigned, this.secretKey)}`, headers };
  }

  private async request<T>(
    options: RequestOptions,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    const { method, path, params = {}, signed = false } = options;
    const endpoint = `${method} ${path}`;
    const { query, headers } = this.buildQuery(endpoint, params, signed);
    const url = query.length > 0 ? `${this.baseUrl}${path}?${query}` : `${this.baseUrl}${path}`;

    this.logger.debug('Binance 요청', { endpoint, params });

    let res: Response;
    try {
      res = await fetch(url, { method, headers });
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      throw new ExchangeError(`Binance 요청 실패(${endpoint}): ${msg}`, { endpoint, cause: error });
    }

    const text = await res.text().catch(() => '');

    let body: unknown;
    try {
      body = text.length > 0 ? JSON.parse(text) : null;
    } catch {
      body = undefined;
    }

    if (!res.ok) {
      const parsedError = BinanceErrorSchema.safeParse(body);
      if (parsedError.success) {
        throw new ExchangeError(
          `Binance 오류(${res.status}, code=${parsedError.data.code}): ${parsedError.data.msg}`,
          { endpoint, status: res.status, code: parsedError.data.code },
        );
      }
      throw new ExchangeError(`Binance 오류(${res.status}): ${text.slice(0, 200)}`, {
        endpoint,
        status: res.status,
      });
    }

    if (body === undefined) {
      throw new ExchangeError(`Binance 응답 JSON 파싱 실패(${endpoint})`, {
        endpoint,
        status: res.status,
      });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ExchangeError(`Binance 응답 형식 오류(${endpoint}): ${parsed.error.message}`, {
        endpoint,
        status: res.status,
        cause: parsed.error,
      });
    }

    return parsed.data;
  }

  async getAccountBalances(): Promise<Record<string, Balance>> {
    const account = await this.request(
      { method: 'GET', path: '/api/v3/account', signed: true },
      BinanceAccountSchema,
    );

    const out: Record<string, Balance> = {};
    for (const row of account.balances) {
      out[row.asset] = {
        asset: row.asset,
        free: new Big(row.free),
        locked: new Big(row.locked),
      };
    }
    return out;
  }

  async getPrice(symbol: string): Promise<Big> {
    const ticker = await this.request(
      { method: 'GET', path: '/api/v3/ticker/price', params: { symbol } },
      BinanceTickerPriceSchema,
    );
    return new Big(ticker.price);
  }

  async getHistoricalCandles(symbol: string, interval: string, lookback: number): Promise<Candle[]> {
    if (!Number.isInteger(lookback) || lookback < 1 || lookback > MAX_KLINES_LIMIT) {
      throw new ExchangeError(`klines lookback은 1~${MAX_KLINES_LIMIT} 정수여야 합니다. 현재: ${lookback}`, {
        endpoint: 'GET /api/v3/klines',
      });
    }

    const rows = await this.request(
      {
        method: 'GET',
        path: '/api/v3/klines',
        params: { symbol, interval, limit: String(lookback) },
      },
      BinanceKlinesSchema,
    );

    return rows.map(([openTime, open, high, low, close, volume]) => ({
      timestamp: millisToIso(openTime),
      open,
      high,
      low,
      close,
      volume,
    }));
  }

  async getSymbolFilters(symbol: string): Promise<SymbolFilter> {
    const endpoint = 'GET /api/v3/exchangeInfo';
    const info = await this.request(
      { method: 'GET', path: '/api/v3/exchangeInfo', params: { symbol } },
      BinanceExchangeInfoSchema,
    );

    const row = info.symbols.find((s) => s.symbol === symbol);
    if (!row) {
      throw new ExchangeError(`exchangeInfo에 심볼 없음: ${symbol}`, { endpoint });
    }

    const lotSize = row.filters.find((f) => f.filterType === 'LOT_SIZE');
    if (!lotSize?.stepSize) {
      throw new ExchangeError(`LOT_SIZE 필터 없음: ${symbol}`, { endpoint });
    }

    const filter: SymbolFilter = { stepSize: new Big(lotSize.stepSize) };
    if (lotSize.minQty) filter.minQty = new Big(lotSize.minQty);
    return filter;
  }

  async placeMarketOrder(symbol: string, side: OrderSide, quantity: Big): Promise<OrderResult> {
    // toString()은 작은 수를 지수 표기로 바꾸므로 toFixed() 사용
    const requestedQty = quantity.toFixed();

    const order = await this.request(
      {
        method: 'POST',
        path: '/api/v3/order',
        params: {
          symbol,
          side,
          type: 'MARKET',
          quantity: requestedQty,
          newOrderRespType: 'RESULT',
        },
        signed: true,
      },
      BinanceOrderSchema,
    );

    const accepted = ['NEW', 'PARTIALLY_FILLED', 'FILLED'].includes(order.status);

    return {
      symbol,
      side,
      requestedQty,
      status: accepted ? 'SUCCESS' : 'FAILED',
      orderId: String(order.orderId),
      executedQty: order.executedQty,
      quoteQty: order.cummulativeQuoteQty,
      message: accepted
        ? `Binance 주문 접수 성공 (status=${order.status})`
        : `Binance 주문 미체결 (status=${order.status})`,
      raw: order,
    };
  }
}
