import { createApp } from "./app";
import { env } from "./config";
import { logger } from "./logger";
import { ReadinessGate, configChecks } from "./services/readiness";
import { ReplayGuard } from "./services/replayGuard";
import { HttpTradingBackend } from "./services/tradingBackend";

async function main() {
const capability = new HttpTradingBackend({ baseUrls: { testnet: env.TRADING_TESTNET_URL, mainnet: env.TRADING_MAINNET_URL }, apiKey: env.TRADING_API_KEY, attemptTimeoutMs: env.SDK_CONNECT_TIMEOUT_MS });
const guard = new ReplayGuard({ windowMs: env.HMAC_WINDOW_MS, futureToleranceMs: env.HMAC_FUTURE_TOLERANCE_MS });
const gate = new ReadinessGate({ capability, configChecks: configChecks(env), probeTimeoutMs: env.SDK_CONNECT_TIMEOUT_MS, allowDegradedReads: env.ALLOW_DEGRADED_READS, logger });

const first = await gate.probe();
for (const check of first.checks.filter((c) => !c.ok && c.name.startsWith("config."))) logger.fatal({ check: check.name, detail: check.detail }, "configuration incomplete; gateway stays NOT_READY");

const app = createApp({ config: env, capability, gate, guard, logger });
const server = app.listen(env.PORT, env.HOST, () => logger.info({ state: gate.current }, `gateway up on ${env.HOST}:${env.PORT}`));
const stopPolling = gate.startPolling(env.READINESS_PROBE_INTERVAL_MS);
const sweeper = setInterval(() => guard.sweep(Date.now()), env.HMAC_WINDOW_MS); sweeper.unref();

const shutdown = (signal: string) => {
logger.info({ signal }, "shutting down");
stopPolling(); clearInterval(sweeper);
server.close((err) => { if (err) logger.error({ err }, "close failed"); process.exit(err ? 1 : 0); });
};
process.once("SIGTERM", () => shutdown("SIGTERM")); process.once("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => { logger.fatal({ err }, "startup failed"); process.exit(1); });
