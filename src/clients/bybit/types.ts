import { z } from 'zod';

/**
 * Bybit V5 REST payloads. Numbers arrive as strings; parsing to numbers
 * happens in the gateway so a blank field can be told apart from zero.
 */

export const BybitSideSchema = z.enum(['Buy', 'Sell']);
export type BybitSide = z.infer<typeof BybitSideSchema>;

export const BybitEnvelopeSchema = z.object({
  retCode: z.number(),
  retMsg: z.string(),
  result: z.unknown(),
  time: z.number().optional(),
});

export type BybitEnvelope = z.infer<typeof BybitEnvelopeSchema>;

// GET /v5/account/wallet-balance
export const BybitWalletBalanceSchema = z.object({
  list: z.array(
    z.object({
      accountType: z.string().optional(),
      totalEquity: z.string(),
      totalInitialMargin: z.string(),
      totalAvailableBalance: z.string(),
    })
  ),
});

// GET /v5/order/realtime
export const BybitOrderSchema = z.object({
  orderId: z.string(),
  orderLinkId: z.string().default(''),
  symbol: z.string(),
  side: BybitSideSchema,
  qty: z.string(),
  price: z.string().default(''),
  reduceOnly: z.boolean().default(false),
  orderStatus: z.string().optional(),
});

export type BybitOrder = z.infer<typeof BybitOrderSchema>;

export const BybitOrderListSchema = z.object({
  list: z.array(BybitOrderSchema),
  nextPageCursor: z.string().default(''),
});

// POST /v5/order/cancel-all
export const BybitCancelAllSchema = z.object({
  list: z.array(z.object({ orderId: z.string(), orderLinkId: z.string().optional() })),
});

// GET /v5/position/list; side is "" (or "None") for an empty one-way slot
export const BybitPositionSchema = z.object({
  symbol: z.string(),
  side: z.string(),
  size: z.string(),
  avgPrice: z.string().default('0'),
});

export type BybitPosition = z.infer<typeof BybitPositionSchema>;

export const BybitPositionListSchema = z.object({
  list: z.array(BybitPositionSchema),
  nextPageCursor: z.string().default(''),
});

// POST /v5/order/create
export const BybitCreateOrderSchema = z.object({
  orderId: z.string(),
  orderLinkId: z.string(),
});

// GET /v5/market/instruments-info
export const BybitInstrumentsSchema = z.object({
  list: z.array(
    z.object({
      symbol: z.string(),
      lotSizeFilter: z.object({
        qtyStep: z.string(),
        minOrderQty: z.string(),
      }),
    })
  ),
});

// GET /v5/market/time
export const BybitServerTimeSchema = z.object({
  timeSecond: z.string(),
});

/**
 * Request body for POST /v5/order/create
 */
export interface BybitCreateOrderRequest {
  category: 'linear';
  symbol: string;
  side: BybitSide;
  orderType: 'Market';
  qty: string;
  reduceOnly: true;
  timeInForce: 'IOC';
  orderLinkId: string;
}

/**
 * Return codes the gateway branches on
 */
export const BYBIT_RET_CODES = {
  OK: 0,
  SERVER_TIMEOUT: 10000,
  PARAMS_ERROR: 10001,
  RECV_WINDOW: 10002,
  RATE_LIMITED: 10006,
  SERVER_ERROR: 10016,
  DUPLICATE_ORDER_LINK_ID: 110072,
  MIN_ORDER_VALUE: 110094,
} as const;

export const BYBIT_TRANSIENT_CODES: ReadonlySet<number> = new Set([
  BYBIT_RET_CODES.SERVER_TIMEOUT,
  BYBIT_RET_CODES.RECV_WINDOW,
  BYBIT_RET_CODES.RATE_LIMITED,
  BYBIT_RET_CODES.SERVER_ERROR,
]);
