import rateLimit from "express-rate-limit";
import type { AppConfig } from "../config.js";

export function createApiRateLimiter(config: Pick<AppConfig, "RATE_LIMIT_WINDOW_MS" | "RATE_LIMIT_MAX">) {
  return rateLimit({
    windowMs: config.RATE_LIMIT_WINDOW_MS,
    limit: config.RATE_LIMIT_MAX,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: "Too many requests, please try again later.", code: "http_rate_limited" }
  });
}
