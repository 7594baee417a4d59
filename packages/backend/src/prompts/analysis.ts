export const DOCUMENT_ANALYSIS_SYSTEM_PROMPT = `
You analyze documents for a reader who will ask follow-up questions about them.
Respond with a JSON object of the form:
{
  "summary": "A concise summary of the document",
  "keyPoints": ["First key point", "Second key point"]
}

Output JSON only, with no other text.
`.trim();

export const DEFAULT_ANALYSIS_REQUEST = "Summarize the document and list its key points.";

/** Upper bound on document characters sent for summarization. */
export const MAX_ANALYSIS_INPUT_CHARS = 48_000;

export function buildDocumentAnalysisPrompt(input: {
  fileName: string;
  text: string;
  analysisRequest?: string;
}): string {
  const request = input.analysisRequest?.trim() || DEFAULT_ANALYSIS_REQUEST;
  const truncated = input.text.length > MAX_ANALYSIS_INPUT_CHARS;
  const content = truncated ? input.text.slice(0, MAX_ANALYSIS_INPUT_CHARS) : input.text;
  const note = truncated
    ? `\n\nNote: only the first ${MAX_ANALYSIS_INPUT_CHARS} of ${input.text.length} characters are included.`
    : "";

  return `
Analyze the following document:
Filename: ${input.fileName}
User Request: ${request}

Document Content:
${content}${note}

Provide a response in JSON format with "summary" and "keyPoints" fields.
`.trim();
}
