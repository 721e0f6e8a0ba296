import { z } from "zod";

/** ---------- Shared fields ---------- */
export const Network = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["testnet", "mainnet"], { errorMap: () => ({ message: "network must be testnet or mainnet" }) }));
export type Network = z.infer<typeof Network>;

const Networked = z.object({ network: Network });
const positive = z.number().positive();
const pairId = z.number().int().nonnegative();
const tradeIndex = z.number().int().nonnegative();
const address = z.string().trim().min(1);
const idempotencyKey = z.string().trim().min(1).max(128).optional();

/** ---------- Markets ---------- */
export const MarketsListReq = Networked;
export const PriceReq = Networked.extend({
  base: z.string().trim().min(1).toUpperCase(),
  quote: z.string().trim().min(1).toUpperCase().default("USD"),
});
export const MarketRateReq = Networked.extend({ pairId, periodHours: z.number().int().positive().default(24) });
export const MarketDetailsReq = Networked.extend({ pairId });

/** ---------- Accounts ---------- */
export const BalanceReq = Networked.extend({ address });
export const TraderReq = Networked.extend({ traderAddress: address });
export const HistoryReq = TraderReq.extend({ limit: z.number().int().positive().max(500).default(20) });
export const FaucetReq = Networked.extend({ traderAddress: address.optional() }).refine((v) => v.network === "testnet", {
  message: "Faucet is testnet only",
  path: ["network"],
});

/** ---------- Positions ---------- */
export const PositionOpenReq = Networked.extend({
  market: z.string().trim().min(1),
  side: z.string().trim().toLowerCase().pipe(z.enum(["long", "short"])),
  collateral: positive,
  leverage: positive,
  orderType: z.string().trim().toLowerCase().pipe(z.enum(["market", "limit", "stop"])).default("market"),
  triggerPrice: positive.optional(),
  slippage: positive.default(2),
  slPrice: positive.optional(),
  tpPrice: positive.optional(),
  traderAddress: address.optional(),
  idempotencyKey,
}).refine((v) => v.orderType === "market" || v.triggerPrice !== undefined, {
  message: "triggerPrice is required for limit and stop orders",
  path: ["triggerPrice"],
});
export const PositionCloseReq = Networked.extend({
  pairId,
  tradeIndex,
  closePercentage: z.number().positive().max(100).default(100),
  slippage: positive.default(2),
  traderAddress: address.optional(),
  idempotencyKey,
});
export const PositionUpdateSlReq = Networked.extend({ pairId, tradeIndex, slPrice: positive, traderAddress: address.optional() });
export const PositionUpdateTpReq = Networked.extend({ pairId, tradeIndex, tpPrice: positive, traderAddress: address.optional() });
export const PositionMetricsReq = Networked.extend({ pairId, tradeIndex, traderAddress: address.optional() });

/** ---------- Orders ---------- */
export const OrderCancelReq = Networked.extend({ pairId, tradeIndex, traderAddress: address.optional(), idempotencyKey });
export const OrderUpdateReq = Networked.extend({
  pairId,
  tradeIndex,
  price: positive.optional(),
  slPrice: positive.optional(),
  tpPrice: positive.optional(),
  traderAddress: address.optional(),
}).refine((v) => v.price !== undefined || v.slPrice !== undefined || v.tpPrice !== undefined, {
  message: "at least one of price, slPrice or tpPrice is required",
});
export const OrderTrackReq = Networked.extend({ orderId: z.string().trim().min(1) });

export type MarketsListReq = z.infer<typeof MarketsListReq>;
export type PriceReq = z.infer<typeof PriceReq>;
export type MarketRateReq = z.infer<typeof MarketRateReq>;
export type MarketDetailsReq = z.infer<typeof MarketDetailsReq>;
export type BalanceReq = z.infer<typeof BalanceReq>;
export type TraderReq = z.infer<typeof TraderReq>;
export type HistoryReq = z.infer<typeof HistoryReq>;
export type FaucetReq = z.infer<typeof FaucetReq>;
export type PositionOpenReq = z.infer<typeof PositionOpenReq>;
export type PositionCloseReq = z.infer<typeof PositionCloseReq>;
export type PositionUpdateSlReq = z.infer<typeof PositionUpdateSlReq>;
export type PositionUpdateTpReq = z.infer<typeof PositionUpdateTpReq>;
export type PositionMetricsReq = z.infer<typeof PositionMetricsReq>;
export type OrderCancelReq = z.infer<typeof OrderCancelReq>;
export type OrderUpdateReq = z.infer<typeof OrderUpdateReq>;
export type OrderTrackReq = z.infer<typeof OrderTrackReq>;
