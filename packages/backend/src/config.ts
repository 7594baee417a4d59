import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";
import { z } from "zod";
import { llmProviders } from "./services/llmTypes.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
loadEnv({ path: resolve(__dirname, "../../../.env") });

const envSchema = z
  .object({
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    PORT: z.coerce.number().int().positive().default(3001),
    CORS_ORIGIN: z.string().default("http://localhost:5173"),
    MAX_UPLOAD_SIZE: z.coerce.number().int().positive().default(10 * 1024 * 1024),
    RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
    CHUNK_SIZE: z.coerce.number().int().positive().default(4000),
    CHUNK_OVERLAP: z.coerce.number().int().min(0).default(400),
    SESSION_TTL_MINUTES: z.coerce.number().positive().default(15),
    SESSION_SWEEP_INTERVAL_MS: z.coerce.number().int().min(0).default(60_000),
    QA_MAX_QUESTIONS_PER_SESSION: z.coerce.number().int().positive().default(50),
    QA_MAX_TOKENS_PER_SESSION: z.coerce.number().int().positive().default(100_000),
    QA_ESTIMATED_TOKENS_PER_QUESTION: z.coerce.number().int().min(0).default(200),
    QA_ESTIMATED_TOKENS_PER_ANSWER: z.coerce.number().int().min(0).default(800),
    ANALYSIS_CACHE_TTL_MS: z.coerce.number().int().min(0).default(5 * 60_000),
    LLM_PROVIDER: z.enum(llmProviders).default("openai"),
    OPENAI_API_KEY: z.string().default(""),
    OPENAI_BASE_URL: z.string().default("https://api.openai.com/v1"),
    OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
    OPENROUTER_API_KEY: z.string().default(""),
    OPENROUTER_BASE_URL: z.string().default("https://openrouter.ai/api/v1"),
    OPENROUTER_CHAT_MODEL: z.string().default("openai/gpt-4o-mini"),
    OLLAMA_BASE_URL: z.string().default("http://localhost:11434/v1"),
    OLLAMA_CHAT_MODEL: z.string().default("llama3.1"),
    LLM_MAX_CONCURRENT: z.coerce.number().int().positive().default(5),
    LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
    LLM_RETRY_DELAY_MS: z.coerce.number().int().positive().default(1000),
    LLM_REQUESTS_PER_MINUTE: z.coerce.number().int().positive().default(30),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
    MODEL_DISCOVERY_CACHE_MS: z.coerce.number().int().min(0).default(5 * 60_000)
  })
  .refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
    path: ["CHUNK_OVERLAP"]
  });

export type AppConfig = z.infer<typeof envSchema>;
export const appConfig: AppConfig = envSchema.parse(process.env);

export function sessionTtlMs(config: Pick<AppConfig, "SESSION_TTL_MINUTES"> = appConfig): number {
  return Math.round(config.SESSION_TTL_MINUTES * 60_000);
}
