import type {
  BalanceReq,
  FaucetReq,
  HistoryReq,
  MarketDetailsReq,
  MarketRateReq,
  MarketsListReq,
  OrderCancelReq,
  OrderTrackReq,
  OrderUpdateReq,
  PositionCloseReq,
  PositionMetricsReq,
  PositionOpenReq,
  PositionUpdateSlReq,
  PositionUpdateTpReq,
  PriceReq,
  TraderReq,
} from "../schemas";

export type JsonObject = Record<string, unknown>;

export interface CallContext {
  signal: AbortSignal;
  requestId: string;
}

/**
 * The trading backend as the gateway sees it. Implementations resolve with the
 * backend's payload and reject with whatever the backend raised; translation
 * into gateway errors happens in the dispatcher.
 */
export interface TradingCapability {
  /** Confirms credentials and connectivity. Rejects when either is missing. */
  ping(ctx: CallContext): Promise<void>;

  listMarkets(input: MarketsListReq, ctx: CallContext): Promise<JsonObject>;
  getPrice(input: PriceReq, ctx: CallContext): Promise<JsonObject>;
  getFundingRate(input: MarketRateReq, ctx: CallContext): Promise<JsonObject>;
  getRolloverRate(input: MarketRateReq, ctx: CallContext): Promise<JsonObject>;
  getMarketDetails(input: MarketDetailsReq, ctx: CallContext): Promise<JsonObject>;

  getBalance(input: BalanceReq, ctx: CallContext): Promise<JsonObject>;
  getHistory(input: HistoryReq, ctx: CallContext): Promise<JsonObject>;
  requestFaucet(input: FaucetReq, ctx: CallContext): Promise<JsonObject>;

  listPositions(input: TraderReq, ctx: CallContext): Promise<JsonObject>;
  getPositionMetrics(input: PositionMetricsReq, ctx: CallContext): Promise<JsonObject>;
  openPosition(input: PositionOpenReq, ctx: CallContext): Promise<JsonObject>;
  closePosition(input: PositionCloseReq, ctx: CallContext): Promise<JsonObject>;
  updateStopLoss(input: PositionUpdateSlReq, ctx: CallContext): Promise<JsonObject>;
  updateTakeProfit(input: PositionUpdateTpReq, ctx: CallContext): Promise<JsonObject>;

  listOrders(input: TraderReq, ctx: CallContext): Promise<JsonObject>;
  trackOrder(input: OrderTrackReq, ctx: CallContext): Promise<JsonObject>;
  cancelOrder(input: OrderCancelReq, ctx: CallContext): Promise<JsonObject>;
  updateOrder(input: OrderUpdateReq, ctx: CallContext): Promise<JsonObject>;
}
