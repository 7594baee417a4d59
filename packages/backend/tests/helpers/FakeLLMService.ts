import type { DocumentAnalysis } from "@docent/shared";
import type {
  AskModelInput,
  LLMServiceLike,
  SummarizeDocumentInput
} from "../../src/services/llmTypes.js";

export type AnswerReply = string | ((input: AskModelInput) => string | Promise<string>);

interface FakeLLMServiceOptions {
  answers?: AnswerReply[];
  analysis?: DocumentAnalysis;
  configured?: boolean;
}

/** Scripted model: replies are consumed in order, the last one repeats. */
export class FakeLLMService implements LLMServiceLike {
  readonly questions: AskModelInput[] = [];
  readonly summaries: SummarizeDocumentInput[] = [];
  summaryError: Error | null = null;

  private readonly answers: AnswerReply[];
  private readonly analysis: DocumentAnalysis;
  private readonly configured: boolean;

  constructor(options: FakeLLMServiceOptions = {}) {
    this.answers = options.answers ?? [
      JSON.stringify({ answer: "Based on the document, it covers testing.", relevantChunks: [0] })
    ];
    this.analysis = options.analysis ?? {
      summary: "A short document about testing.",
      keyPoints: ["Tests run in process", "No network is used"]
    };
    this.configured = options.configured ?? true;
  }

  async answerQuestion(input: AskModelInput): Promise<string> {
    this.questions.push(input);
    const index = Math.min(this.questions.length - 1, this.answers.length - 1);
    const reply = this.answers[index];
    if (reply === undefined) {
      throw new Error("FakeLLMService has no scripted answers");
    }
    return typeof reply === "function" ? reply(input) : reply;
  }

  async summarizeDocument(input: SummarizeDocumentInput): Promise<DocumentAnalysis> {
    this.summaries.push(input);
    if (this.summaryError) {
      throw this.summaryError;
    }
    return { summary: this.analysis.summary, keyPoints: [...this.analysis.keyPoints] };
  }

  isConfigured(): boolean {
    return this.configured;
  }
}
