import { Router } from "express";
import type { Env } from "../config";
import type { ReadinessGate } from "../services/readiness";
export default function buildHealthRouter(gate: ReadinessGate, config: Pick<Env, "NODE_ENV" | "COMMIT_SHA">): Router {
const r = Router();
r.get("/health", (_req,res) => res.json({ status:"healthy", service:"trading-gateway", env: config.NODE_ENV, commit: config.COMMIT_SHA ?? "dev", timestamp: new Date().toISOString() }));
r.get("/ready", (_req,res) => {
const snap = gate.snapshot();
const status = snap.state === "READY" ? "ready" : snap.state === "DEGRADED" ? "degraded" : "not_ready";
res.status(snap.state === "READY" ? 200 : 503).json({ status, ...snap, timestamp: new Date().toISOString() });
});
return r;
}
