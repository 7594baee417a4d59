import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import { requestLogger } from "./middleware/logger.js";
import { createApiRateLimiter } from "./middleware/rateLimiter.js";
import { createDocumentsRouter } from "./routes/documents.js";
import { createHealthRouter } from "./routes/health.js";
import { createModelsRouter } from "./routes/models.js";
import { createSessionsRouter } from "./routes/sessions.js";
import { createTranscriptsRouter } from "./routes/transcripts.js";
import type { QARuntime } from "./runtime/qaRuntime.js";
import { logger } from "./utils/logger.js";

export function createApp(runtime: QARuntime): express.Express {
  const app = express();
  const { config } = runtime;

  app.use(requestLogger);
  app.use(
    cors({
      origin: config.CORS_ORIGIN
    })
  );
  app.use(express.json({ limit: "2mb" }));
  app.use(express.urlencoded({ extended: true }));
  app.use(createApiRateLimiter(config));

  app.use(
    "/api/documents",
    createDocumentsRouter({ pipeline: runtime.analysisPipeline, maxUploadSize: config.MAX_UPLOAD_SIZE })
  );
  app.use("/api/transcripts", createTranscriptsRouter({ pipeline: runtime.analysisPipeline }));
  app.use(
    "/api/sessions",
    createSessionsRouter({
      sessions: runtime.sessions,
      questionAnswerService: runtime.questionAnswerService
    })
  );
  app.use("/api/models", createModelsRouter({ models: runtime.models }));
  app.use(
    "/api/health",
    createHealthRouter({
      sessions: runtime.sessions,
      llmService: runtime.llmService,
      startTime: runtime.startedAt
    })
  );

  app.use((_req, res) => {
    res.status(404).json({ error: "Route not found" });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error({ err }, "Unhandled error");
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
