import { Router } from "express";
import type { HealthResponse } from "@docent/shared";
import { getQARuntimeSingleton } from "../runtime/qaRuntime.js";
import type { LLMServiceLike } from "../services/llmTypes.js";
import type { SessionStoreLike } from "../services/SessionStore.js";

interface CreateHealthRouterOptions {
  sessions?: Pick<SessionStoreLike, "size">;
  llmService?: Pick<LLMServiceLike, "isConfigured">;
  startTime?: number;
}

export function createHealthRouter(options: CreateHealthRouterOptions = {}): Router {
  const runtime = options.sessions && options.llmService ? null : getQARuntimeSingleton();
  const sessions = options.sessions ?? runtime?.sessions;
  const llmService = options.llmService ?? runtime?.llmService;
  if (!sessions || !llmService) {
    throw new Error("Health router requires a session store and an LLM service");
  }
  const startTime = options.startTime ?? runtime?.startedAt ?? Date.now();

  const healthRouter = Router();

  healthRouter.get("/", (_req, res) => {
    const llm: HealthResponse["checks"]["llm"] = llmService.isConfigured() ? "configured" : "not_configured";

    const mem = process.memoryUsage();
    const response: HealthResponse = {
      status: llm === "configured" ? "ok" : "degraded",
      timestamp: new Date().toISOString(),
      uptimeSec: Math.max(0, Math.floor((Date.now() - startTime) / 1000)),
      activeSessions: sessions.size(),
      checks: {
        llm
      },
      memoryUsage: {
        rss: mem.rss,
        heapUsed: mem.heapUsed,
        heapTotal: mem.heapTotal
      }
    };
    res.json(response);
  });

  return healthRouter;
}
