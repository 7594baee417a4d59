import { Router } from "express";
import { z } from "zod";
import type { AnalyzeTranscriptRequest } from "@docent/shared";
import { validate } from "../middleware/validator.js";
import type { DocumentAnalysisPipeline } from "../pipeline/DocumentAnalysisPipeline.js";
import { getQARuntimeSingleton } from "../runtime/qaRuntime.js";
import { abortOnClientClose } from "../utils/abortOnClose.js";
import { logger } from "../utils/logger.js";
import { sendAnalysisError, toAnalysisResponse } from "./documents.js";

const transcriptSegmentSchema = z
  .object({
    text: z.string(),
    startSeconds: z.number().finite().min(0),
    endSeconds: z.number().finite().min(0)
  })
  .refine((segment) => segment.endSeconds >= segment.startSeconds, {
    message: "endSeconds must not be before startSeconds",
    path: ["endSeconds"]
  });

const analyzeTranscriptBodySchema = z.object({
  title: z.string().trim().min(1).max(200).optional(),
  segments: z.array(transcriptSegmentSchema).min(1).max(20_000),
  analysisRequest: z.string().trim().max(2000).optional()
});

interface CreateTranscriptsRouterOptions {
  pipeline?: Pick<DocumentAnalysisPipeline, "analyzeTranscript">;
}

export function createTranscriptsRouter(options: CreateTranscriptsRouterOptions = {}): Router {
  const pipeline = options.pipeline ?? getQARuntimeSingleton().analysisPipeline;
  const transcriptsRouter = Router();

  transcriptsRouter.post("/analyze", validate({ body: analyzeTranscriptBodySchema }), async (req, res) => {
    const body: AnalyzeTranscriptRequest = req.body;
    const signal = abortOnClientClose(res, "Client disconnected before the transcript was analyzed");

    try {
      const outcome = await pipeline.analyzeTranscript({
        segments: body.segments,
        signal,
        ...(body.title !== undefined ? { title: body.title } : {}),
        ...(body.analysisRequest ? { analysisRequest: body.analysisRequest } : {})
      });
      if (signal.aborted) {
        logger.info({ sessionId: outcome.session.sessionId }, "Transcript analysis abandoned by client");
        return;
      }
      return res.status(201).json(toAnalysisResponse(outcome));
    } catch (error) {
      if (signal.aborted) {
        logger.info("Transcript analysis abandoned by client");
        return;
      }
      if (sendAnalysisError(res, error)) {
        return;
      }
      logger.error({ err: error }, "Transcript analysis failed");
      return res.status(502).json({ error: "Transcript analysis failed" });
    }
  });

  return transcriptsRouter;
}
