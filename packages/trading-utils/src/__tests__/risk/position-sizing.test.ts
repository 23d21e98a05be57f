import { describe, it, expect } from 'vitest';
import Big from 'big.js';
import {
  DEFAULT_STEP_SIZE,
  calculateOrderQuantity,
  quantizeQuantity,
} from '../../risk/position-sizing.js';

describe('Position Sizing', () => {
  describe('quantizeQuantity', () => {
    it('정상: stepSize 배수로 내림해야 함', () => {
      expect(quantizeQuantity(new Big('1.23456789'), new Big('0.001')).toString()).toBe('1.234');
    });

    it('정상: 이미 배수인 수량은 그대로', () => {
      expect(quantizeQuantity(new Big('0.5'), new Big('0.1')).toString()).toBe('0.5');
    });

    it('재양자화해도 값이 같아야 함', () => {
      const steps = ['1', '0.1', '0.001', '0.00001', '0.25'];
      const quantities = ['0', '0.3', '1.99999', '123.456789', '0.000123'];

      for (const s of steps) {
        for (const q of quantities) {
          const once = quantizeQuantity(new Big(q), new Big(s));
          const twice = quantizeQuantity(once, new Big(s));
          expect(twice.eq(once)).toBe(true);
        }
      }
    });

    it('경계: 음수/0 수량은 0', () => {
      expect(quantizeQuantity(new Big(-1), new Big('0.1')).toString()).toBe('0');
      expect(quantizeQuantity(new Big(0), new Big('0.1')).toString()).toBe('0');
    });

    it('stepSize가 없으면 기본값 0.00001 사용', () => {
      expect(DEFAULT_STEP_SIZE.toString()).toBe('0.00001');
      expect(quantizeQuantity(new Big('0.123456789')).toString()).toBe('0.12345');
    });
  });

  describe('calculateOrderQuantity', () => {
    it('정상: 100 USDT / 64000 → 0.00156', () => {
      // 100 / 64000 = 0.0015625 → 156.25 step → 156 step
      const qty = calculateOrderQuantity({
        notional: new Big(100),
        price: new Big(64000),
        stepSize: new Big('0.00001'),
      });

      expect(qty.toString()).toBe('0.00156');
    });

    it('정상: 큰 stepSize로 내림해야 함', () => {
      // 100 / 30 = 3.333... → 33 step → 3.3
      const qty = calculateOrderQuantity({
        notional: new Big(100),
        price: new Big(30),
        stepSize: new Big('0.1'),
      });

      expect(qty.toString()).toBe('3.3');
    });

    it('stepSize가 없거나 0 이하이면 기본값 사용', () => {
      const base = { notional: new Big(100), price: new Big(64000) };

      expect(calculateOrderQuantity(base).toString()).toBe('0.00156');
      expect(calculateOrderQuantity({ ...base, stepSize: new Big(0) }).toString()).toBe('0.00156');
    });

    it('경계: 가격이 0이면 0', () => {
      const qty = calculateOrderQuantity({
        notional: new Big(100),
        price: new Big(0),
        stepSize: new Big('0.001'),
      });

      expect(qty.toString()).toBe('0');
    });

    it('경계: 금액이 한 step에도 못 미치면 0', () => {
      // 0.5 / 100 = 0.005 < 0.01
      const qty = calculateOrderQuantity({
        notional: new Big('0.5'),
        price: new Big(100),
        stepSize: new Big('0.01'),
      });

      expect(qty.toString()).toBe('0');
    });

    it('수량 × 가격 ≤ 금액, 수량은 stepSize의 배수', () => {
      const notionals = ['10', '100', '999.99', '12345.678'];
      const prices = ['3', '0.0007', '64123.45', '7.77', '1'];
      const steps = ['1', '0.1', '0.001', '0.00001'];

      for (const n of notionals) {
        for (const p of prices) {
          for (const s of steps) {
            const notional = new Big(n);
            const price = new Big(p);
            const stepSize = new Big(s);
            const qty = calculateOrderQuantity({ notional, price, stepSize });

            expect(qty.gte(0)).toBe(true);
            expect(qty.times(price).lte(notional)).toBe(true);
            expect(qty.mod(stepSize).eq(0)).toBe(true);
            // 한 step 더하면 금액을 넘어야 함
            expect(qty.plus(stepSize).times(price).gt(notional)).toBe(true);
          }
        }
      }
    });
  });
});
