import { z } from 'zod';

const DecimalStringSchema = z.string().regex(/^-?\d+(\.\d+)?$/, 'decimal string expected');

// =============================================================================
// Binance spot REST 응답 스키마 (필요한 필드만 검증, 나머지는 버림)
// =============================================================================

export const BinanceErrorSchema = z.object({
  code: z.number(),
  msg: z.string(),
});

export const BinanceAccountSchema = z.object({
  balances: z.array(
    z.object({
      asset: z.string(),
      free: DecimalStringSchema,
      locked: DecimalStringSchema,
    }),
  ),
});

export const BinanceTickerPriceSchema = z.object({
  symbol: z.string(),
  price: DecimalStringSchema,
});

/**
 * [openTime, open, high, low, close, volume, closeTime, ...]
 */
export const BinanceKlinesSchema = z.array(
  z
    .tuple([
      z.number(),
      DecimalStringSchema,
      DecimalStringSchema,
      DecimalStringSchema,
      DecimalStringSchema,
      DecimalStringSchema,
    ])
    .rest(z.unknown()),
);

export const BinanceExchangeInfoSchema = z.object({
  symbols: z.array(
    z.object({
      symbol: z.string(),
      filters: z.array(
        z
          .object({
            filterType: z.string(),
            stepSize: DecimalStringSchema.optional(),
            minQty: DecimalStringSchema.optional(),
          })
          .passthrough(),
      ),
    }),
  ),
});

export const BinanceOrderSchema = z.object({
  symbol: z.string(),
  orderId: z.number(),
  status: z.string(),
  executedQty: DecimalStringSchema.optional(),
  cummulativeQuoteQty: DecimalStringSchema.optional(),
});

