import type { Chunk, ConversationMessage } from "@docent/shared";

export const QA_SYSTEM_PROMPT =
  "You are a helpful assistant that answers questions about documents based on the provided context.";

export function formatConversationHistory(history: readonly ConversationMessage[]): string {
  return history
    .map((message) => `${message.role === "user" ? "User" : "Assistant"}: ${message.content}`)
    .join("\n");
}

/** Chunks are labelled with their own index so cited numbers map back onto `Chunk.index`. */
export function formatDocumentContext(chunks: readonly Chunk[]): string {
  return chunks.map((chunk) => `Chunk ${chunk.index}:\n${chunk.content}`).join("\n\n");
}

export function buildQuestionPrompt(input: {
  question: string;
  chunks: readonly Chunk[];
  history: readonly ConversationMessage[];
}): string {
  const conversation = formatConversationHistory(input.history);
  const previous = conversation.length > 0 ? `Previous conversation:\n${conversation}\n\n` : "";

  return `
${previous}Document Context:
${formatDocumentContext(input.chunks)}

Question: ${input.question}

Please answer the question based on the document context above. Follow these guidelines:
1. Base your answer primarily on the provided document content.
2. Reference specific parts of the document that support your answer.
3. If the document doesn't contain information to answer the question, state that clearly.
4. Maintain a conversational tone, referencing previous questions when relevant.
5. Include which chunk numbers were most relevant to your answer.

You MUST respond with valid JSON only. No other text, no markdown, no explanations outside the JSON.

Required JSON format:
{
  "answer": "Your detailed answer here",
  "relevantChunks": [0, 3]
}
`.trim();
}
