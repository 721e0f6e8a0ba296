import type { z } from "zod";
import type { CallContext, JsonObject, TradingCapability } from "../services/capability";
import {
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

/** A validated request, ready to be sent to the capability. */
export interface BoundCall {
  /** Set when the caller supplied an idempotency key for a keyed mutation. */
  idempotencyKey?: string;
  invoke(capability: TradingCapability, ctx: CallContext): Promise<JsonObject>;
}

export interface Operation {
  /** Path under `/v1`. */
  route: string;
  isMutating: boolean;
  bind(body: unknown): { success: true; call: BoundCall } | { success: false; error: z.ZodError };
}

function operation<S extends z.ZodTypeAny>(
  route: string,
  isMutating: boolean,
  schema: S,
  invoke: (capability: TradingCapability, input: z.output<S>, ctx: CallContext) => Promise<JsonObject>,
  keyOf?: (input: z.output<S>) => string | undefined,
): Operation {
  return {
    route,
    isMutating,
    bind(body) {
      const parsed = schema.safeParse(body);
      if (!parsed.success) return { success: false, error: parsed.error };
      const input: z.output<S> = parsed.data;
      return {
        success: true,
        call: { idempotencyKey: keyOf?.(input), invoke: (capability, ctx) => invoke(capability, input, ctx) },
      };
    },
  };
}

const byKey = (input: { idempotencyKey?: string }) => input.idempotencyKey;

/** Every `/v1` route. Exactly one entry per route. */
export const OPERATIONS: readonly Operation[] = [
  // markets
  operation("/markets/list", false, MarketsListReq, (c, i, ctx) => c.listMarkets(i, ctx)),
  operation("/prices/get", false, PriceReq, (c, i, ctx) => c.getPrice(i, ctx)),
  operation("/markets/funding-rate", false, MarketRateReq, (c, i, ctx) => c.getFundingRate(i, ctx)),
  operation("/markets/rollover-rate", false, MarketRateReq, (c, i, ctx) => c.getRolloverRate(i, ctx)),
  operation("/markets/details", false, MarketDetailsReq, (c, i, ctx) => c.getMarketDetails(i, ctx)),
  // accounts
  operation("/accounts/balance", false, BalanceReq, (c, i, ctx) => c.getBalance(i, ctx)),
  operation("/accounts/history", false, HistoryReq, (c, i, ctx) => c.getHistory(i, ctx)),
  operation("/faucet/request", true, FaucetReq, (c, i, ctx) => c.requestFaucet(i, ctx)),
  // positions
  operation("/positions/list", false, TraderReq, (c, i, ctx) => c.listPositions(i, ctx)),
  operation("/positions/metrics", false, PositionMetricsReq, (c, i, ctx) => c.getPositionMetrics(i, ctx)),
  operation("/positions/open", true, PositionOpenReq, (c, i, ctx) => c.openPosition(i, ctx), byKey),
  operation("/positions/close", true, PositionCloseReq, (c, i, ctx) => c.closePosition(i, ctx), byKey),
  operation("/positions/update-sl", true, PositionUpdateSlReq, (c, i, ctx) => c.updateStopLoss(i, ctx)),
  operation("/positions/update-tp", true, PositionUpdateTpReq, (c, i, ctx) => c.updateTakeProfit(i, ctx)),
  // orders
  operation("/orders/list", false, TraderReq, (c, i, ctx) => c.listOrders(i, ctx)),
  operation("/orders/track", false, OrderTrackReq, (c, i, ctx) => c.trackOrder(i, ctx)),
  operation("/orders/cancel", true, OrderCancelReq, (c, i, ctx) => c.cancelOrder(i, ctx), byKey),
  operation("/orders/update", true, OrderUpdateReq, (c, i, ctx) => c.updateOrder(i, ctx)),
];
