export type MessageRole = "user" | "assistant";

export interface Chunk {
  content: string;
  index: number;
  startOffset: number;
  endOffset: number;
  /** Present on chunks cut from a timed transcript. */
  startTimeSeconds?: number;
  endTimeSeconds?: number;
}

export interface ConversationMessage {
  role: MessageRole;
  content: string;
  timestamp: Date;
  chunkReferences?: number[];
}

export interface ConversationThread {
  threadId: string;
  sessionId: string;
  createdAt: Date;
}

export interface DocumentSession {
  sessionId: string;
  createdAt: Date;
  expiresAt: Date;
  documentChunks: readonly Chunk[];
  conversationHistory: ConversationMessage[];
  totalTokensUsed: number;
  metadata?: DocumentMetadata;
  analysis?: DocumentAnalysis;
}

export type DocumentType = "pdf" | "docx" | "md" | "txt" | "transcript";

export interface DocumentMetadata {
  fileName: string;
  fileType: DocumentType;
  fileSizeBytes: number;
  uploadedAt: Date;
  pageCount?: number;
}

export interface DocumentAnalysis {
  summary: string;
  keyPoints: string[];
}
