import type { RequestHandler, Response } from "express";
import { Router } from "express";
import multer from "multer";
import { z } from "zod";
import type { DocumentAnalysisResponse } from "@docent/shared";
import { appConfig } from "../config.js";
import {
  DocumentProcessingError,
  FileValidationError,
  supportedFileTypes,
  validateUploadedFile,
  type ValidatedFile
} from "../parsers/index.js";
import type { DocumentAnalysisPipeline } from "../pipeline/DocumentAnalysisPipeline.js";
import type { DocumentAnalysisOutcome } from "../pipeline/types.js";
import { getQARuntimeSingleton } from "../runtime/qaRuntime.js";
import { abortOnClientClose } from "../utils/abortOnClose.js";
import { logger } from "../utils/logger.js";

const analyzeBodySchema = z.object({
  analysisRequest: z.string().trim().max(2000).optional()
});

interface CreateDocumentsRouterOptions {
  pipeline?: Pick<DocumentAnalysisPipeline, "analyzeDocument" | "onStatus">;
  maxUploadSize?: number;
}

export function toAnalysisResponse(outcome: DocumentAnalysisOutcome): DocumentAnalysisResponse {
  return {
    sessionId: outcome.session.sessionId,
    expiresAt: outcome.session.expiresAt,
    summary: outcome.analysis.summary,
    keyPoints: outcome.analysis.keyPoints,
    metadata: outcome.metadata,
    chunkCount: outcome.chunkCount,
    processingTimeMs: outcome.processingTimeMs,
    cached: outcome.cached
  };
}

/** Sends the 4xx for known analysis failures. Returns false when the error is not one of them. */
export function sendAnalysisError(res: Response, error: unknown): boolean {
  if (error instanceof FileValidationError) {
    res.status(error.statusCode).json({ error: error.message, code: "file_validation_failed" });
    return true;
  }
  if (error instanceof DocumentProcessingError) {
    res.status(error.statusCode).json({ error: error.message, code: "document_processing_failed" });
    return true;
  }
  return false;
}

export function createDocumentsRouter(options: CreateDocumentsRouterOptions = {}): Router {
  const pipeline = options.pipeline ?? getQARuntimeSingleton().analysisPipeline;
  const maxUploadSize = options.maxUploadSize ?? appConfig.MAX_UPLOAD_SIZE;

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: maxUploadSize
    }
  });

  pipeline.onStatus((event) => {
    logger.debug(event, "Document analysis status");
  });

  const documentsRouter = Router();

  /** Wrap multer middleware to catch MulterError (e.g. file too large) gracefully */
  const handleUpload: RequestHandler = (req, res, next) => {
    upload.single("file")(req, res, (err: unknown) => {
      if (err) {
        if (err instanceof multer.MulterError && err.code === "LIMIT_FILE_SIZE") {
          return res.status(413).json({
            error: `File too large. Maximum allowed size is ${Math.round(maxUploadSize / 1024 / 1024)}MB`
          });
        }
        const message = err instanceof Error ? err.message : "File upload failed";
        return res.status(400).json({ error: message });
      }
      next();
    });
  };

  documentsRouter.get("/supported-types", (_req, res) => {
    res.json(supportedFileTypes);
  });

  documentsRouter.post("/analyze", handleUpload, async (req, res) => {
    if (!req.file) {
      return res.status(400).json({ error: "No file uploaded" });
    }

    const body = analyzeBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      return res.status(400).json({
        error: "Validation failed",
        details: body.error.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message
        }))
      });
    }

    let validatedFile: ValidatedFile;
    try {
      validatedFile = await validateUploadedFile(req.file, { maxSizeBytes: maxUploadSize });
    } catch (error) {
      if (sendAnalysisError(res, error)) {
        return;
      }
      return res.status(400).json({
        error: error instanceof Error ? error.message : "File validation failed"
      });
    }

    const analysisRequest = body.data.analysisRequest;
    const signal = abortOnClientClose(res, "Client disconnected before the document was analyzed");
    try {
      const outcome = await pipeline.analyzeDocument({
        buffer: req.file.buffer,
        fileName: validatedFile.sanitizedFilename,
        fileType: validatedFile.fileType,
        signal,
        ...(analysisRequest ? { analysisRequest } : {})
      });
      if (signal.aborted) {
        logger.info({ sessionId: outcome.session.sessionId }, "Document analysis abandoned by client");
        return;
      }
      return res.status(201).json(toAnalysisResponse(outcome));
    } catch (error) {
      if (signal.aborted) {
        logger.info({ fileName: validatedFile.sanitizedFilename }, "Document analysis abandoned by client");
        return;
      }
      if (sendAnalysisError(res, error)) {
        return;
      }
      logger.error({ err: error, fileName: validatedFile.sanitizedFilename }, "Document analysis failed");
      return res.status(502).json({ error: "Document analysis failed" });
    }
  });

  return documentsRouter;
}
