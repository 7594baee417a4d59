import { z } from "zod";

export interface ExtractedAnswer {
  answer: string;
  relevantChunkIndices: number[];
}

export interface AnswerParseStrategy {
  name: string;
  /** Returns null when the strategy does not apply. Must never throw. */
  apply(raw: string): ExtractedAnswer | null;
}

const answerPayloadSchema = z
  .object({
    answer: z.string(),
    relevantChunks: z.unknown(),
    relevantChunkIndices: z.unknown()
  })
  .refine(
    (payload) => payload.relevantChunks !== undefined || payload.relevantChunkIndices !== undefined,
    { message: "relevantChunks is required" }
  );

const jsonPrefixPattern = /^\s*"?json"?\s*:?\s*/i;
const codeFencePattern = /```(?:json)?/gi;
const htmlCommentPattern = /<!--[\s\S]*?-->/g;

function tryParseJson(input: string): unknown {
  try {
    return JSON.parse(input);
  } catch {
    return undefined;
  }
}

function toChunkIndices(entries: readonly unknown[]): number[] {
  return entries
    .filter((entry): entry is number => typeof entry === "number" && Number.isFinite(entry))
    .map((entry) => Math.trunc(entry));
}

/**
 * Pulls `answer` and the chunk reference list out of a parsed JSON value.
 * `relevantChunkIndices` wins over `relevantChunks` when both are present.
 */
export function readAnswerPayload(value: unknown): ExtractedAnswer | null {
  const parsed = answerPayloadSchema.safeParse(value);
  if (!parsed.success) {
    return null;
  }

  const entries =
    parsed.data.relevantChunkIndices !== undefined ? parsed.data.relevantChunkIndices : parsed.data.relevantChunks;
  return {
    answer: parsed.data.answer,
    // A present but non-array list (e.g. null) means no attribution.
    relevantChunkIndices: Array.isArray(entries) ? toChunkIndices(entries) : []
  };
}

export function cleanModelJson(raw: string): string {
  return raw
    .replace(jsonPrefixPattern, "")
    .replace(codeFencePattern, "")
    .replace(htmlCommentPattern, "")
    .trim();
}

export function sliceOutermostObject(input: string): string | null {
  const start = input.indexOf("{");
  const end = input.lastIndexOf("}");
  if (start < 0 || end <= start) {
    return null;
  }
  return input.slice(start, end + 1);
}

/**
 * Runs `read` over the raw text, then the cleaned text, then the outermost
 * `{...}` slice of the cleaned text. Returns the first non-null reading.
 */
export function readModelJson<T>(raw: string, read: (value: unknown) => T | null): T | null {
  const cleaned = cleanModelJson(raw);
  const candidates = [raw, cleaned, sliceOutermostObject(cleaned)];
  for (const candidate of candidates) {
    if (candidate === null) {
      continue;
    }
    const result = read(tryParseJson(candidate));
    if (result !== null) {
      return result;
    }
  }
  return null;
}

export const strictJsonStrategy: AnswerParseStrategy = {
  name: "strict",
  apply: (raw) => readAnswerPayload(tryParseJson(raw))
};

export const cleanedJsonStrategy: AnswerParseStrategy = {
  name: "cleaned",
  apply: (raw) => readAnswerPayload(tryParseJson(cleanModelJson(raw)))
};

export const outermostObjectStrategy: AnswerParseStrategy = {
  name: "outermost-object",
  apply: (raw) => {
    const candidate = sliceOutermostObject(cleanModelJson(raw));
    return candidate === null ? null : readAnswerPayload(tryParseJson(candidate));
  }
};

export const defaultAnswerStrategies: readonly AnswerParseStrategy[] = [
  strictJsonStrategy,
  cleanedJsonStrategy,
  outermostObjectStrategy
];

export interface AnswerExtraction extends ExtractedAnswer {
  /** Name of the strategy that produced the result, or "literal" for the raw-text fallback. */
  strategy: string;
}

export function extractAnswerWithStrategy(
  rawResponse: string,
  strategies: readonly AnswerParseStrategy[] = defaultAnswerStrategies
): AnswerExtraction {
  for (const strategy of strategies) {
    let result: ExtractedAnswer | null = null;
    try {
      result = strategy.apply(rawResponse);
    } catch {
      result = null;
    }
    if (result) {
      return { ...result, strategy: strategy.name };
    }
  }

  return {
    answer: rawResponse,
    relevantChunkIndices: [],
    strategy: "literal"
  };
}

/**
 * Recovers `{answer, relevantChunkIndices}` from model output. Falls back to
 * the raw text with no chunk attribution; never throws.
 */
export function extractAnswer(rawResponse: string): ExtractedAnswer {
  const { answer, relevantChunkIndices } = extractAnswerWithStrategy(rawResponse);
  return { answer, relevantChunkIndices };
}
