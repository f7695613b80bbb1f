import { EventEmitter } from 'events';
import { EXCHANGES, type OrderSide, type PositionSide } from '../../config/constants.js';
import type {
  IExchangeGateway,
  MarginBalances,
  OpenOrder,
  Position,
  InstrumentRules,
  PlaceOrderOptions,
  PlacedOrder,
} from '../shared/interfaces.js';
import { closingSide } from '../shared/interfaces.js';
import { logger, type Logger } from '../../utils/logger.js';
import { roundToStep } from '../../utils/math.js';
import { GatewayRejectedError, PrecisionError } from '../../utils/errors.js';

/**
 * Paper exchange configuration
 */
export interface PaperExchangeConfig {
  equity: number;
  usedInitialMargin: number;
  /** Rules for symbols not registered with setInstrumentRules */
  defaultRules: Omit<InstrumentRules, 'symbol'>;
}

/**
 * Paper Exchange
 * In-memory account for paper mode and tests. Reduce-only market orders fill
 * immediately at the full requested quantity.
 */
export class PaperExchange extends EventEmitter implements IExchangeGateway {
  readonly exchange = EXCHANGES.PAPER;

  protected log: Logger;
  private config: PaperExchangeConfig;
  private positions: Map<string, Position> = new Map();
  private orders: Map<string, OpenOrder> = new Map();
  private rules: Map<string, InstrumentRules> = new Map();
  private submitted: Map<string, PlacedOrder> = new Map();
  private orderCounter = 0;

  constructor(config?: Partial<PaperExchangeConfig>) {
    super();
    this.log = logger('PaperExchange');
    this.config = {
      equity: config?.equity ?? 1000,
      usedInitialMargin: config?.usedInitialMargin ?? 0,
      defaultRules: config?.defaultRules ?? { qtyStep: 0.001, minQty: 0.001 },
    };
  }

  // ============================================
  // Seeding
  // ============================================

  setMargin(equity: number, usedInitialMargin: number): void {
    this.config.equity = equity;
    this.config.usedInitialMargin = usedInitialMargin;
  }

  setInstrumentRules(symbol: string, rules: Omit<InstrumentRules, 'symbol'>): void {
    this.rules.set(symbol, { symbol, ...rules });
  }

  openPosition(symbol: string, side: PositionSide, size: number, entryPrice: number = 0): void {
    this.positions.set(symbol, { symbol, side, size, entryPrice });
  }

  addOpenOrder(order: { symbol: string; side: OrderSide; qty: number; price?: number; reduceOnly?: boolean }): string {
    const orderId = this.nextOrderId();
    this.orders.set(orderId, {
      orderId,
      symbol: order.symbol,
      side: order.side,
      qty: order.qty,
      price: order.price ?? null,
      reduceOnly: order.reduceOnly ?? false,
    });
    return orderId;
  }

  // ============================================
  // IExchangeGateway
  // ============================================

  async getMarginBalances(): Promise<MarginBalances> {
    return {
      totalEquity: this.config.equity,
      usedInitialMargin: this.config.usedInitialMargin,
      freeMargin: this.config.equity - this.config.usedInitialMargin,
    };
  }

  async listOpenOrders(symbol?: string): Promise<OpenOrder[]> {
    return [...this.orders.values()].filter((order) => !symbol || order.symbol === symbol).map((order) => ({ ...order }));
  }

  async cancelAllOrders(symbol?: string): Promise<number> {
    let cancelled = 0;
    for (const [orderId, order] of this.orders) {
      if (!symbol || order.symbol === symbol) {
        this.orders.delete(orderId);
        cancelled++;
      }
    }
    this.log.debug('Cancelled paper orders', { symbol: symbol ?? 'ALL', cancelled });
    return cancelled;
  }

  async listPositions(): Promise<Position[]> {
    return [...this.positions.values()].map((position) => ({ ...position }));
  }

  async placeReduceOnlyMarket(
    symbol: string,
    side: OrderSide,
    qty: number,
    options: PlaceOrderOptions = {}
  ): Promise<PlacedOrder> {
    const clientOrderId = options.clientOrderId ?? `paper-${this.orderCounter + 1}`;
    const previous = this.submitted.get(clientOrderId);
    if (previous) {
      return { ...previous, duplicate: true };
    }

    const rules = this.rulesFor(symbol);
    const onStep = Math.abs(roundToStep(qty, rules.qtyStep) - qty) <= rules.qtyStep * 1e-6;
    if (!onStep || qty < rules.minQty) {
      throw new PrecisionError(`Quantity ${qty} invalid for ${symbol} (step ${rules.qtyStep}, min ${rules.minQty})`, {
        symbol,
        qty,
      });
    }

    const position = this.positions.get(symbol);
    if (!position || closingSide(position.side) !== side) {
      throw new GatewayRejectedError(`Reduce-only ${side} on ${symbol} would not reduce a position`, undefined, {
        symbol,
        side,
      });
    }

    const remaining = roundToStep(Math.max(0, position.size - qty), rules.qtyStep);
    if (remaining === 0) {
      this.positions.delete(symbol);
    } else {
      this.positions.set(symbol, { ...position, size: remaining });
    }

    const placed: PlacedOrder = {
      orderId: this.nextOrderId(),
      clientOrderId,
      symbol,
      side,
      qty,
      duplicate: false,
    };
    this.submitted.set(clientOrderId, placed);
    this.emit('orderFilled', placed);
    return placed;
  }

  async getInstrumentRules(symbol: string, _options: { refresh?: boolean } = {}): Promise<InstrumentRules> {
    return this.rulesFor(symbol);
  }

  async ping(): Promise<number> {
    return 0;
  }

  private rulesFor(symbol: string): InstrumentRules {
    return this.rules.get(symbol) ?? { symbol, ...this.config.defaultRules };
  }

  private nextOrderId(): string {
    this.orderCounter++;
    return `paper-order-${this.orderCounter}`;
  }
}
