import express from "express";
import type { Express, NextFunction, Request, Response } from "express";
import helmet from "helmet";
import cors from "cors";
import rateLimit from "express-rate-limit";
import type { Env } from "./config";
import { GatewayError } from "./errors";
import { sendError } from "./envelope";
import type { Logger } from "./logger";
import { hmacAuth, parseJsonBody } from "./middleware/hmacAuth";
import { requestContext } from "./middleware/requestContext";
import buildHealthRouter from "./routes/health";
import buildV1Router from "./routes/v1";
import type { TradingCapability } from "./services/capability";
import { IdempotencyCache } from "./services/idempotency";
import type { ReadinessGate } from "./services/readiness";
import type { ReplayGuard } from "./services/replayGuard";

export interface AppDeps {
  config: Env;
  capability: TradingCapability;
  gate: ReadinessGate;
  guard: ReplayGuard;
  logger: Logger;
  idempotency?: IdempotencyCache;
  now?: () => number;
}

function statusOf(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") return err.status;
  return undefined;
}

export function createApp({ config, capability, gate, guard, logger, idempotency, now = Date.now }: AppDeps): Express {
  const app = express();
  app.use(helmet()); app.use(cors({ origin: config.CORS_ORIGIN, credentials: true }));
  app.use(requestContext);
  app.use("/", buildHealthRouter(gate, config));
  app.use(rateLimit({
    windowMs: config.RATE_LIMIT_WINDOW_SEC * 1000, limit: config.RATE_LIMIT_MAX, standardHeaders: true, legacyHeaders: false,
    handler: (_req, res) => sendError(res, new GatewayError("RATE_LIMITED", "Too many requests", { retryable: true })),
  }));

  app.use(
    "/v1",
    // no inflate: the signature covers the bytes as sent
    express.raw({ type: () => true, limit: config.BODY_LIMIT, inflate: false }),
    hmacAuth({ secret: config.HMAC_SECRET, guard, logger, now }),
    parseJsonBody,
    buildV1Router({
      capability,
      gate,
      idempotency: idempotency ?? new IdempotencyCache(config.IDEMPOTENCY_TTL_MS, now),
      requestTimeoutMs: config.REQUEST_TIMEOUT_MS,
      logger,
    }),
  );

  app.use((_req: Request, res: Response) => sendError(res, new GatewayError("NOT_FOUND", "Route not found")));
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    if (status !== undefined && status >= 400 && status < 500) {
      return sendError(res, new GatewayError("BAD_REQUEST", err instanceof Error ? err.message : "Bad request", { status }));
    }
    logger.error({ err }, "unhandled");
    sendError(res, new GatewayError("INTERNAL_ERROR", "Internal error"));
  });
  return app;
}
