import type { ExchangeId, OrderSide, PositionSide } from '../../config/constants.js';

// ============================================
// Account Types
// ============================================

/**
 * Unified-account margin figures, in settle-coin units
 */
export interface MarginBalances {
  totalEquity: number;
  usedInitialMargin: number;
  freeMargin: number;
}

/**
 * Margin snapshot plus derived utilization (used / equity, clamped to [0, 1])
 */
export interface AccountMarginState extends MarginBalances {
  utilization: number;
  measuredAt: number;
}

// ============================================
// Order & Position Types
// ============================================

export interface OpenOrder {
  orderId: string;
  symbol: string;
  side: OrderSide;
  qty: number;
  price: number | null;
  reduceOnly: boolean;
}

/**
 * Live position as reported by the exchange; size is always positive
 */
export interface Position {
  symbol: string;
  side: PositionSide;
  size: number;
  entryPrice: number;
}

/**
 * Quantity rules for an instrument
 */
export interface InstrumentRules {
  symbol: string;
  qtyStep: number;
  minQty: number;
}

export interface PlaceOrderOptions {
  /** Reused across retries so a resubmission cannot double-fill */
  clientOrderId?: string;
}

export interface PlacedOrder {
  orderId: string;
  clientOrderId: string;
  symbol: string;
  side: OrderSide;
  qty: number;
  /** True when the exchange reported the client id as already used */
  duplicate: boolean;
}

// ============================================
// Gateway Interface
// ============================================

/**
 * Exchange operations the safety controls depend on.
 * Every call must be safe to retry; quantities are exchange-native.
 */
export interface IExchangeGateway {
  readonly exchange: ExchangeId;

  getMarginBalances(): Promise<MarginBalances>;
  /** Open orders, optionally for one symbol */
  listOpenOrders(symbol?: string): Promise<OpenOrder[]>;
  /** Cancel open orders (all, or one symbol's); resolves to the number cancelled */
  cancelAllOrders(symbol?: string): Promise<number>;
  /** Positions with non-zero size */
  listPositions(): Promise<Position[]>;
  placeReduceOnlyMarket(symbol: string, side: OrderSide, qty: number, options?: PlaceOrderOptions): Promise<PlacedOrder>;
  getInstrumentRules(symbol: string, options?: { refresh?: boolean }): Promise<InstrumentRules>;
  /** Reachability check; resolves to round-trip latency in ms */
  ping(): Promise<number>;
}

/**
 * Side that reduces a position
 */
export function closingSide(side: PositionSide): OrderSide {
  return side === 'long' ? 'sell' : 'buy';
}
