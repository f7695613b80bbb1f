import axios from 'axios';
import { v4 as uuidv4 } from 'uuid';
import type { z } from 'zod';
import type { ExchangeConfig } from '../../config/schema.js';
import { EXCHANGES, BYBIT_ENDPOINTS, type OrderSide } from '../../config/constants.js';
import type {
  IExchangeGateway,
  MarginBalances,
  OpenOrder,
  Position,
  InstrumentRules,
  PlaceOrderOptions,
  PlacedOrder,
} from '../shared/interfaces.js';
import { RetryClient } from '../shared/retryClient.js';
import { RateLimiter, DEFAULT_RATE_LIMITS } from '../shared/rateLimiter.js';
import {
  BybitEnvelopeSchema,
  BybitWalletBalanceSchema,
  BybitOrderListSchema,
  BybitCancelAllSchema,
  BybitPositionListSchema,
  BybitCreateOrderSchema,
  BybitInstrumentsSchema,
  BybitServerTimeSchema,
  BYBIT_RET_CODES,
  BYBIT_TRANSIENT_CODES,
  type BybitOrder,
  type BybitPosition,
  type BybitCreateOrderRequest,
  type BybitSide,
} from './types.js';
import { logger, errorMessage, type Logger } from '../../utils/logger.js';
import { hmacSha256Hex, maskSecret } from '../../utils/crypto.js';
import { formatQuantity, toNumber } from '../../utils/math.js';
import { GatewayRejectedError, PrecisionError, TransientGatewayError, SafetyError } from '../../utils/errors.js';

// Cursor pagination stops here even if the exchange keeps returning cursors
const MAX_PAGES = 20;

type Method = 'GET' | 'POST';

interface CallOptions {
  signed: boolean;
  limiter: RateLimiter;
}

/**
 * Bybit V5 unified-account gateway for USDT linear perpetuals.
 * Signs with HMAC-SHA256 over timestamp + key + recvWindow + payload.
 */
export class BybitGateway implements IExchangeGateway {
  readonly exchange = EXCHANGES.BYBIT;

  private config: ExchangeConfig;
  private log: Logger;
  private http: RetryClient;
  private apiKey: string;
  private apiSecret: string;
  private readLimiter: RateLimiter;
  private tradeLimiter: RateLimiter;
  private rulesCache: Map<string, InstrumentRules> = new Map();

  constructor(config: ExchangeConfig) {
    if (!config.apiKey || !config.apiSecret) {
      throw new Error('BYBIT_API_KEY and BYBIT_API_SECRET are required');
    }

    this.config = config;
    this.apiKey = config.apiKey;
    this.apiSecret = config.apiSecret;
    this.log = logger('BybitGateway');

    const baseURL = config.host ?? (config.testnet ? BYBIT_ENDPOINTS.TESTNET : BYBIT_ENDPOINTS.MAINNET);
    this.http = new RetryClient({
      service: EXCHANGES.BYBIT,
      baseURL,
      timeout: config.requestTimeoutMs,
      retryOptions: {
        maxAttempts: config.requestRetryAttempts,
        initialDelayMs: 200,
        maxDelayMs: 2000,
      },
    });

    this.readLimiter = new RateLimiter('bybit:read', DEFAULT_RATE_LIMITS.BYBIT_READ);
    this.tradeLimiter = new RateLimiter('bybit:trade', DEFAULT_RATE_LIMITS.BYBIT_TRADE);

    this.log.info('Bybit gateway configured', { baseURL, apiKey: maskSecret(this.apiKey), settleCoin: config.settleCoin });
  }

  // ============================================
  // Account
  // ============================================

  async getMarginBalances(): Promise<MarginBalances> {
    const result = await this.call(
      'GET',
      '/v5/account/wallet-balance',
      { accountType: 'UNIFIED' },
      BybitWalletBalanceSchema,
      { signed: true, limiter: this.readLimiter }
    );

    const account = result.list[0];
    if (!account) {
      throw new GatewayRejectedError('Wallet balance response contained no account');
    }

    return {
      totalEquity: toNumber(account.totalEquity),
      usedInitialMargin: toNumber(account.totalInitialMargin),
      freeMargin: toNumber(account.totalAvailableBalance),
    };
  }

  // ============================================
  // Orders
  // ============================================

  async listOpenOrders(symbol?: string): Promise<OpenOrder[]> {
    const orders: OpenOrder[] = [];
    let cursor = '';

    for (let page = 0; page < MAX_PAGES; page++) {
      const params: Record<string, string> = { category: 'linear', limit: '50', ...this.scope(symbol) };
      if (cursor) params['cursor'] = cursor;

      const result = await this.call('GET', '/v5/order/realtime', params, BybitOrderListSchema, {
        signed: true,
        limiter: this.readLimiter,
      });

      orders.push(...result.list.map((order) => this.normalizeOrder(order)));
      cursor = result.nextPageCursor;
      if (!cursor) break;
    }

    return orders;
  }

  async cancelAllOrders(symbol?: string): Promise<number> {
    const result = await this.call(
      'POST',
      '/v5/order/cancel-all',
      { category: 'linear', ...this.scope(symbol) },
      BybitCancelAllSchema,
      { signed: true, limiter: this.tradeLimiter }
    );

    this.log.info('Cancelled orders', { symbol: symbol ?? 'ALL', count: result.list.length });
    return result.list.length;
  }

  async placeReduceOnlyMarket(
    symbol: string,
    side: OrderSide,
    qty: number,
    options: PlaceOrderOptions = {}
  ): Promise<PlacedOrder> {
    const rules = await this.getInstrumentRules(symbol);
    const clientOrderId = options.clientOrderId ?? uuidv4();

    const body: BybitCreateOrderRequest = {
      category: 'linear',
      symbol,
      side: side === 'buy' ? 'Buy' : 'Sell',
      orderType: 'Market',
      qty: formatQuantity(qty, rules.qtyStep),
      reduceOnly: true,
      timeInForce: 'IOC',
      orderLinkId: clientOrderId,
    };

    try {
      const result = await this.call('POST', '/v5/order/create', body, BybitCreateOrderSchema, {
        signed: true,
        limiter: this.tradeLimiter,
      });

      this.log.info('Reduce-only market order placed', { symbol, side, qty: body.qty, orderId: result.orderId });
      return { orderId: result.orderId, clientOrderId, symbol, side, qty, duplicate: false };
    } catch (error) {
      // A retried submission whose first attempt landed: the close is already in
      if (error instanceof GatewayRejectedError && error.exchangeCode === BYBIT_RET_CODES.DUPLICATE_ORDER_LINK_ID) {
        this.log.warn('Order link id already used, treating as placed', { symbol, clientOrderId });
        return { orderId: '', clientOrderId, symbol, side, qty, duplicate: true };
      }
      throw error;
    }
  }

  // ============================================
  // Positions
  // ============================================

  async listPositions(): Promise<Position[]> {
    const positions: Position[] = [];
    let cursor = '';

    for (let page = 0; page < MAX_PAGES; page++) {
      const params: Record<string, string> = { category: 'linear', limit: '200', settleCoin: this.config.settleCoin };
      if (cursor) params['cursor'] = cursor;

      const result = await this.call('GET', '/v5/position/list', params, BybitPositionListSchema, {
        signed: true,
        limiter: this.readLimiter,
      });

      for (const raw of result.list) {
        const position = this.normalizePosition(raw);
        if (position) positions.push(position);
      }
      cursor = result.nextPageCursor;
      if (!cursor) break;
    }

    return positions;
  }

  // ============================================
  // Market
  // ============================================

  async getInstrumentRules(symbol: string, options: { refresh?: boolean } = {}): Promise<InstrumentRules> {
    const cached = this.rulesCache.get(symbol);
    if (cached && !options.refresh) {
      return cached;
    }

    const result = await this.call(
      'GET',
      '/v5/market/instruments-info',
      { category: 'linear', symbol },
      BybitInstrumentsSchema,
      { signed: false, limiter: this.readLimiter }
    );

    const instrument = result.list.find((item) => item.symbol === symbol);
    if (!instrument) {
      throw new GatewayRejectedError(`Unknown instrument ${symbol}`, undefined, { symbol });
    }

    const rules: InstrumentRules = {
      symbol,
      qtyStep: toNumber(instrument.lotSizeFilter.qtyStep),
      minQty: toNumber(instrument.lotSizeFilter.minOrderQty),
    };
    if (!(rules.qtyStep > 0)) {
      throw new GatewayRejectedError(`Instrument ${symbol} reported no quantity step`, undefined, { symbol });
    }

    this.rulesCache.set(symbol, rules);
    return rules;
  }

  async ping(): Promise<number> {
    const startTime = Date.now();
    await this.call('GET', '/v5/market/time', {}, BybitServerTimeSchema, { signed: false, limiter: this.readLimiter });
    return Date.now() - startTime;
  }

  // ============================================
  // Transport
  // ============================================

  private scope(symbol?: string): Record<string, string> {
    return symbol ? { symbol } : { settleCoin: this.config.settleCoin };
  }

  /**
   * Signed or public V5 call: rate limit, retry, envelope check, result validation
   */
  private async call<S extends z.ZodTypeAny>(
    method: Method,
    path: string,
    payload: Record<string, unknown> | BybitCreateOrderRequest,
    schema: S,
    options: CallOptions
  ): Promise<z.infer<S>> {
    await options.limiter.acquire();

    const query = method === 'GET' ? new URLSearchParams(stringifyValues(payload)).toString() : '';
    const body = method === 'POST' ? JSON.stringify(payload) : undefined;
    const url = query ? `${path}?${query}` : path;

    let data: unknown;
    try {
      const response = await this.http.request<unknown>(() => ({
        method,
        url,
        data: body,
        headers: {
          'Content-Type': 'application/json',
          ...(options.signed ? this.signHeaders(method === 'GET' ? query : (body ?? '')) : {}),
        },
      }));
      data = response.data;
    } catch (error) {
      throw this.toGatewayError(error, path);
    }

    const envelope = BybitEnvelopeSchema.safeParse(data);
    if (!envelope.success) {
      throw new GatewayRejectedError(`Malformed response from ${path}`, undefined, { path });
    }

    const { retCode, retMsg } = envelope.data;
    if (retCode !== BYBIT_RET_CODES.OK) {
      throw this.mapRetCode(retCode, retMsg, path);
    }

    const parsed = schema.safeParse(envelope.data.result);
    if (!parsed.success) {
      throw new GatewayRejectedError(`Unexpected result shape from ${path}`, undefined, {
        path,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return parsed.data;
  }

  private signHeaders(payload: string): Record<string, string> {
    const timestamp = String(Date.now());
    const recvWindow = String(this.config.recvWindowMs);
    const signature = hmacSha256Hex(this.apiSecret, `${timestamp}${this.apiKey}${recvWindow}${payload}`);

    return {
      'X-BAPI-API-KEY': this.apiKey,
      'X-BAPI-TIMESTAMP': timestamp,
      'X-BAPI-RECV-WINDOW': recvWindow,
      'X-BAPI-SIGN': signature,
    };
  }

  /**
   * Map a non-zero retCode onto the error taxonomy
   */
  private mapRetCode(retCode: number, retMsg: string, path: string): SafetyError {
    const context = { path, retCode, retMsg };

    if (BYBIT_TRANSIENT_CODES.has(retCode)) {
      return new TransientGatewayError(`Bybit ${retCode}: ${retMsg}`, context);
    }

    const mentionsQty = /qty|quantity|precision|lot size/i.test(retMsg);
    if (retCode === BYBIT_RET_CODES.MIN_ORDER_VALUE || (retCode === BYBIT_RET_CODES.PARAMS_ERROR && mentionsQty)) {
      return new PrecisionError(`Bybit ${retCode}: ${retMsg}`, context);
    }

    return new GatewayRejectedError(`Bybit ${retCode}: ${retMsg}`, retCode, context);
  }

  private toGatewayError(error: unknown, path: string): SafetyError {
    if (error instanceof SafetyError) {
      return error;
    }
    if (RetryClient.isRetryableError(error)) {
      return new TransientGatewayError(`Bybit request to ${path} failed: ${errorMessage(error)}`, { path });
    }
    const status = axios.isAxiosError(error) ? error.response?.status : undefined;
    return new GatewayRejectedError(`Bybit request to ${path} failed: ${errorMessage(error)}`, undefined, {
      path,
      status,
    });
  }

  // ============================================
  // Normalization
  // ============================================

  private normalizeOrder(order: BybitOrder): OpenOrder {
    const price = toNumber(order.price);
    return {
      orderId: order.orderId,
      symbol: order.symbol,
      side: fromBybitSide(order.side),
      qty: toNumber(order.qty),
      price: Number.isNaN(price) || price === 0 ? null : price,
      reduceOnly: order.reduceOnly,
    };
  }

  private normalizePosition(raw: BybitPosition): Position | null {
    const size = toNumber(raw.size);
    if (!(size > 0) || (raw.side !== 'Buy' && raw.side !== 'Sell')) {
      return null;
    }
    return {
      symbol: raw.symbol,
      side: raw.side === 'Buy' ? 'long' : 'short',
      size,
      entryPrice: toNumber(raw.avgPrice),
    };
  }
}

function fromBybitSide(side: BybitSide): OrderSide {
  return side === 'Buy' ? 'buy' : 'sell';
}

function stringifyValues(payload: Record<string, unknown> | BybitCreateOrderRequest): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (value !== undefined) out[key] = String(value);
  }
  return out;
}
