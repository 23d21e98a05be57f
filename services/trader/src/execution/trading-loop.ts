import Big from 'big.js';
import { sleep as defaultSleep, type LoggerLike } from '@crossbot/shared-utils';
import {
  DEFAULT_STEP_SIZE,
  calculateOrderQuantity,
  generateCrossoverSignal,
  quantizeQuantity,
  type CrossoverSignal,
  type IndicatorSnapshot,
  type Signal,
  type SymbolFilter,
} from '@crossbot/trading-utils';
import { ExchangeError } from '../exchange/errors.js';
import type { Balance, ExchangeClient } from '../exchange/types.js';
import type { CycleResult, LoopState, SkipReason, TradingLoopConfig } from './types.js';

/** 의존성 주입 인터페이스 (테스트 교체 가능) */
export type TradingLoopDeps = {
  exchange: ExchangeClient;
  config: TradingLoopConfig;
  logger: LoggerLike;
  /** 사이클 사이 대기 (테스트에서 즉시 처리). stop() 시 signal이 abort된다 */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

function freeOf(balances: Record<string, Balance>, asset: string): Big {
  return balances[asset]?.free ?? new Big(0);
}

function describeSnapshot(snapshot: IndicatorSnapshot | undefined) {
  return {
    short: snapshot?.shortAverage?.toString() ?? null,
    long: snapshot?.longAverage?.toString() ?? null,
  };
}

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

/**
 * 이동평균 크로스오버 실행 루프
 *
 * IDLE → POLLING → DECIDING → (ORDERING) → SLEEPING → POLLING ...
 * 사이클 중 어떤 에러든 FAULTED_RECOVERING으로 바뀌고, 같은 간격만큼 쉰 뒤 POLLING부터 재개한다.
 * stop()이 호출되기 전까지 종료하지 않는다.
 */
export class TradingLoop {
  private readonly exchange: ExchangeClient;
  private readonly config: TradingLoopConfig;
  private readonly logger: LoggerLike;
  private readonly sleepFn: (ms: number, signal?: AbortSignal) => Promise<void>;

  private currentState: LoopState = 'IDLE';
  private lastDecided: Signal | undefined;
  private running = false;
  private cycles = 0;
  private sleepAbort?: AbortController;

  constructor(deps: TradingLoopDeps) {
    this.exchange = deps.exchange;
    this.config = deps.config;
    this.logger = deps.logger;
    this.sleepFn = deps.sleep ?? defaultSleep;
  }

  get state(): LoopState {
    return this.currentState;
  }

  /** 마지막으로 DECIDING을 끝낸 사이클의 신호 */
  get lastSignal(): Signal | undefined {
    return this.lastDecided;
  }

  get cycleCount(): number {
    return this.cycles;
  }

  get isRunning(): boolean {
    return this.running;
  }

  private transition(next: LoopState): void {
    this.logger.debug('상태 전이', { from: this.currentState, to: next });
    this.currentState = next;
  }

  /**
   * 한 사이클 실행 (대기 제외)
   *
   * 에러를 밖으로 던지지 않고 FAULTED 결과로 돌려준다.
   */
  async runCycle(): Promise<CycleResult> {
    const { symbol } = this.config;
    let cycleSignal: Signal | undefined;

    this.cycles++;

    try {
      // ── 1. POLLING ───────────────────────────────────────────────
      this.transition('POLLING');
      const balances = await this.exchange.getAccountBalances();
      const price = await this.exchange.getPrice(symbol);

      // ── 2. DECIDING ──────────────────────────────────────────────
      this.transition('DECIDING');
      const candles = await this.exchange.getHistoricalCandles(
        symbol,
        this.config.candleInterval,
        this.config.candleLookback,
      );

      const signal = generateCrossoverSignal(candles, {
        shortPeriod: this.config.shortPeriod,
        longPeriod: this.config.longPeriod,
      });

      cycleSignal = signal.action;
      this.lastDecided = signal.action;

      this.logger.info('신호 계산 완료', {
        cycle: this.cycles,
        symbol,
        price: price.toString(),
        action: signal.action,
        reason: signal.reason,
        candles: signal.candleCount,
        previous: describeSnapshot(signal.previous),
        current: describeSnapshot(signal.current),
      });

      if (signal.action === 'HOLD') {
        return { outcome: 'HOLD', signal };
      }

      // ── 3. ORDERING ──────────────────────────────────────────────
      this.transition('ORDERING');

      return signal.action === 'BUY'
        ? await this.executeBuy(signal, balances, price)
        : await this.executeSell(signal, balances);
    } catch (e: unknown) {
      const error = toError(e);
      const failedState = this.currentState;

      this.transition('FAULTED_RECOVERING');
      this.logger.error('사이클 실패, 다음 주기에 재시도', {
        cycle: this.cycles,
        symbol,
        failedState,
        signal: cycleSignal ?? null,
        errorName: error.name,
        error: error.message,
        ...(error instanceof ExchangeError
          ? { endpoint: error.endpoint, status: error.status, code: error.code }
          : {}),
      });

      return { outcome: 'FAULTED', error, failedState, signal: cycleSignal };
    }
  }

  private skip(
    signal: CrossoverSignal,
    skipReason: SkipReason,
    data: Record<string, unknown>,
    quantity?: Big,
  ): CycleResult {
    this.logger.warn('주문 스킵', {
      symbol: this.config.symbol,
      action: signal.action,
      skipReason,
      ...data,
    });

    return {
      outcome: 'SKIPPED',
      signal,
      skipReason,
      quantity: quantity?.toFixed(),
    };
  }

  /**
   * 수량 필터 조회 (실패 시 기본 stepSize, minQty 없음)
   */
  private async resolveFilter(): Promise<SymbolFilter> {
    try {
      return await this.exchange.getSymbolFilters(this.config.symbol);
    } catch (e: unknown) {
      if (!(e instanceof ExchangeError)) throw e;

      this.logger.warn('심볼 필터 조회 실패, 기본 stepSize 사용', {
        symbol: this.config.symbol,
        stepSize: DEFAULT_STEP_SIZE.toString(),
        error: e.message,
      });
      return { stepSize: DEFAULT_STEP_SIZE };
    }
  }

  /** 0 또는 minQty 미만이면 스킵 사유, 아니면 undefined */
  private sizeViolation(quantity: Big, filter: SymbolFilter): SkipReason | undefined {
    if (quantity.lte(0)) return 'ZERO_QUANTITY';
    if (filter.minQty && quantity.lt(filter.minQty)) return 'BELOW_MIN_QTY';
    return undefined;
  }

  private async executeBuy(
    signal: CrossoverSignal,
    balances: Record<string, Balance>,
    price: Big,
  ): Promise<CycleResult> {
    const { symbol, quoteAsset } = this.config;
    const tradeAmount = new Big(this.config.tradeAmount);
    const quoteFree = freeOf(balances, quoteAsset);

    if (quoteFree.lt(tradeAmount)) {
      return this.skip(signal, 'INSUFFICIENT_BALANCE', {
        asset: quoteAsset,
        free: quoteFree.toString(),
        required: tradeAmount.toString(),
      });
    }

    const filter = await this.resolveFilter();
    const quantity = calculateOrderQuantity({ notional: tradeAmount, price, stepSize: filter.stepSize });

    const violation = this.sizeViolation(quantity, filter);
    if (violation) {
      return this.skip(signal, violation, {
        price: price.toString(),
        notional: tradeAmount.toString(),
        quantity: quantity.toFixed(),
        stepSize: filter.stepSize.toString(),
        minQty: filter.minQty?.toString() ?? null,
      });
    }

    if (this.config.dryRun) {
      return this.skip(signal, 'DRY_RUN', { side: 'BUY', quantity: quantity.toFixed() }, quantity);
    }

    const order = await this.exchange.placeMarketOrder(symbol, 'BUY', quantity);
    this.logOrder(order.status, { ...order, raw: undefined });

    return { outcome: 'ORDERED', signal, order };
  }

  private async executeSell(
    signal: CrossoverSignal,
    balances: Record<string, Balance>,
  ): Promise<CycleResult> {
    const { symbol, baseAsset } = this.config;
    const baseFree = freeOf(balances, baseAsset);

    if (baseFree.lte(0)) {
      return this.skip(signal, 'NO_BASE_BALANCE', { asset: baseAsset, free: baseFree.toString() });
    }

    // 보유 잔고 전체를 stepSize 배수로 내림해서 매도 (나머지는 dust로 남음)
    const filter = await this.resolveFilter();
    const quantity = quantizeQuantity(baseFree, filter.stepSize);

    const violation = this.sizeViolation(quantity, filter);
    if (violation) {
      return this.skip(signal, violation, {
        asset: baseAsset,
        free: baseFree.toString(),
        quantity: quantity.toFixed(),
        stepSize: filter.stepSize.toString(),
        minQty: filter.minQty?.toString() ?? null,
      });
    }

    if (this.config.dryRun) {
      return this.skip(signal, 'DRY_RUN', { side: 'SELL', quantity: quantity.toFixed() }, quantity);
    }

    const order = await this.exchange.placeMarketOrder(symbol, 'SELL', quantity);
    this.logOrder(order.status, { ...order, raw: undefined });

    return { outcome: 'ORDERED', signal, order };
  }

  private logOrder(status: 'SUCCESS' | 'FAILED', data: Record<string, unknown>): void {
    if (status === 'SUCCESS') {
      this.logger.info('주문 접수', data);
    } else {
      this.logger.warn('주문 실패', data);
    }
  }

  /**
   * 루프 시작 - stop() 전까지 반환하지 않는다
   */
  async start(): Promise<void> {
    if (this.running) {
      this.logger.warn('루프 중복 실행 스킵', { symbol: this.config.symbol });
      return;
    }

    this.running = true;
    const abort = new AbortController();
    this.sleepAbort = abort;
    const intervalMs = this.config.pollIntervalSec * 1000;

    this.logger.info('루프 시작', {
      symbol: this.config.symbol,
      intervalMs,
      dryRun: this.config.dryRun,
      shortPeriod: this.config.shortPeriod,
      longPeriod: this.config.longPeriod,
    });

    try {
      while (this.running) {
        const result = await this.runCycle();

        // FAULTED는 FAULTED_RECOVERING 상태 그대로 대기
        if (result.outcome !== 'FAULTED') {
          this.transition('SLEEPING');
        }

        if (!this.running) break;
        await this.sleepFn(intervalMs, abort.signal);
      }
    } finally {
      this.running = false;
      this.sleepAbort = undefined;
      this.transition('IDLE');
      this.logger.info('루프 종료', { symbol: this.config.symbol, cycles: this.cycles });
    }
  }

  /**
   * 루프 중지 요청 - 진행 중인 사이클은 끝까지 실행하고, 대기 중이면 즉시 깨운다
   */
  stop(): void {
    this.running = false;
    this.sleepAbort?.abort();
  }
}
