import { Router, type Response } from "express";
import { z } from "zod";
import type {
  DiscoverModelsResponse,
  ModelProvidersResponse,
  SwitchModelRequest,
  SwitchModelResponse
} from "@docent/shared";
import { validate } from "../middleware/validator.js";
import { getQARuntimeSingleton } from "../runtime/qaRuntime.js";
import { isLLMProvider, llmProviders } from "../services/llmTypes.js";
import { ModelSelectionError, ProviderUnavailableError, type ModelManager } from "../services/ModelManager.js";
import { abortOnClientClose } from "../utils/abortOnClose.js";
import { logger } from "../utils/logger.js";

const providerParamsSchema = z.object({
  provider: z.enum(llmProviders)
});

const switchModelBodySchema = z.object({
  provider: z.enum(llmProviders),
  model: z.string().trim().min(1, "Model cannot be empty").max(200)
});

interface CreateModelsRouterOptions {
  models?: ModelManager;
}

function sendModelError(res: Response, error: unknown): boolean {
  if (error instanceof ModelSelectionError) {
    res.status(error.statusCode).json({ error: error.message, code: "model_selection_invalid" });
    return true;
  }
  if (error instanceof ProviderUnavailableError) {
    res.status(error.statusCode).json({ error: error.message, code: "provider_unavailable" });
    return true;
  }
  return false;
}

export function createModelsRouter(options: CreateModelsRouterOptions = {}): Router {
  const models = options.models ?? getQARuntimeSingleton().models;
  const modelsRouter = Router();

  modelsRouter.get("/providers", (_req, res) => {
    const response: ModelProvidersResponse = {
      providers: models.listProviders(),
      current: models.current()
    };
    res.json(response);
  });

  modelsRouter.get("/discover/:provider", validate({ params: providerParamsSchema }), async (req, res) => {
    const provider = req.params.provider;
    if (!isLLMProvider(provider)) {
      return res.status(400).json({ error: "Unknown provider" });
    }

    const signal = abortOnClientClose(res, "Client disconnected before discovery finished");

    try {
      const discovered = await models.discover(provider, signal);
      const response: DiscoverModelsResponse = {
        provider,
        models: discovered.models,
        cached: discovered.cached
      };
      return res.json(response);
    } catch (error) {
      if (signal.aborted) {
        logger.info({ provider }, "Model discovery abandoned by client");
        return;
      }
      if (sendModelError(res, error)) {
        return;
      }
      logger.error({ err: error, provider }, "Model discovery failed");
      return res.status(500).json({ error: "Model discovery failed" });
    }
  });

  modelsRouter.post("/switch", validate({ body: switchModelBodySchema }), (req, res) => {
    const body: SwitchModelRequest = req.body;

    try {
      const response: SwitchModelResponse = models.switchTo({ provider: body.provider, model: body.model });
      return res.json(response);
    } catch (error) {
      if (sendModelError(res, error)) {
        return;
      }
      logger.error({ err: error, provider: body.provider }, "Model switch failed");
      return res.status(500).json({ error: "Model switch failed" });
    }
  });

  return modelsRouter;
}
