import pino from "pino";
import type { Logger } from "pino";
import { env } from "./config";
export const logger: Logger = pino({ name: "trading-gateway", level: env.LOG_LEVEL, base: { commit: env.COMMIT_SHA ?? "dev" } });
export type { Logger };
