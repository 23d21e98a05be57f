import Big from 'big.js';
import type { OrderSizingParams } from '../types.js';

/** 거래소 필터를 못 받았을 때 쓰는 수량 단위 */
export const DEFAULT_STEP_SIZE = new Big('0.00001');

function resolveStepSize(stepSize: Big | undefined): Big {
  if (!stepSize || stepSize.lte(0)) return DEFAULT_STEP_SIZE;
  return stepSize;
}

/**
 * 수량을 stepSize 배수로 내림
 *
 * 이미 배수인 수량은 그대로 돌려준다 (재양자화해도 값이 같음).
 *
 * @param quantity - 원 수량
 * @param stepSize - 최소 수량 단위 (LOT_SIZE.stepSize)
 * @returns stepSize의 배수로 내림한 수량 (음수면 0)
 */
export function quantizeQuantity(quantity: Big, stepSize?: Big): Big {
  const step = resolveStepSize(stepSize);
  if (quantity.lte(0)) return new Big(0);

  const units = quantity.div(step).round(0, Big.roundDown);
  return units.times(step);
}

/**
 * 고정 금액 기반 주문 수량 계산
 *
 * quantity = floor((notional / price) / stepSize) × stepSize
 *
 * 가격이 0 이하(조회 실패 포함)이거나 금액이 0 이하이면 0을 돌려주고,
 * 호출 측은 주문을 건너뛴다.
 *
 * @example
 * ```typescript
 * const qty = calculateOrderQuantity({
 *   notional: new Big(100),       // 100 USDT
 *   price: new Big(64000),        // BTC 현재가
 *   stepSize: new Big('0.00001'), // LOT_SIZE
 * });
 * console.log(qty.toString()); // '0.00156'
 * ```
 */
export function calculateOrderQuantity(params: OrderSizingParams): Big {
  const { notional, price } = params;
  const step = resolveStepSize(params.stepSize);

  if (price.lte(0) || notional.lte(0)) {
    return new Big(0);
  }

  // 나눗셈은 Big.DP 자리에서 반올림되므로 quantity × price ≤ notional을 한 번 더 맞춘다
  let units = notional.div(price).div(step).round(0, Big.roundDown);
  while (units.gt(0) && units.times(step).times(price).gt(notional)) {
    units = units.minus(1);
  }

  return units.times(step);
}
