import { basename, extname } from "node:path";
import { fileTypeFromBuffer } from "file-type";
import { FileValidationError } from "./errors.js";
import type { SupportedFileType } from "./types.js";

export interface UploadedFileLike {
  originalname: string;
  mimetype: string;
  size: number;
  buffer: Buffer;
}

export interface FileValidationOptions {
  maxSizeBytes?: number;
}

export interface ValidatedFile {
  fileType: SupportedFileType;
  sanitizedFilename: string;
  mimeType: string;
  size: number;
}

const DOCX_MIME = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

const extensionToType: Record<string, SupportedFileType> = {
  ".pdf": "pdf",
  ".docx": "docx",
  ".md": "md",
  ".txt": "txt"
};

export const supportedFileTypes: readonly SupportedFileType[] = ["pdf", "docx", "md", "txt"];

const allowedMimeTypes: Record<SupportedFileType, string[]> = {
  pdf: ["application/pdf"],
  // DOCX is a ZIP container; some clients and sniffers report it as such.
  docx: [DOCX_MIME, "application/zip", "application/x-zip-compressed"],
  md: ["text/markdown", "text/x-markdown", "text/plain"],
  txt: ["text/plain"]
};

const extensionFallbackMime: Record<SupportedFileType, string> = {
  pdf: "application/pdf",
  docx: DOCX_MIME,
  md: "text/markdown",
  txt: "text/plain"
};

export async function validateUploadedFile(
  file: UploadedFileLike,
  options: FileValidationOptions = {}
): Promise<ValidatedFile> {
  const extension = extname(file.originalname).toLowerCase();
  const fileType = extensionToType[extension];
  if (!fileType) {
    throw new FileValidationError("Unsupported file extension. Only .pdf, .docx, .md, .txt are allowed.");
  }

  if (file.size === 0 || file.buffer.length === 0) {
    throw new FileValidationError("Uploaded file is empty.");
  }

  if (options.maxSizeBytes !== undefined && file.size > options.maxSizeBytes) {
    throw new FileValidationError(`File is too large. Maximum size is ${options.maxSizeBytes} bytes.`, 413);
  }

  const allowed = allowedMimeTypes[fileType];
  const declaredMime = file.mimetype.toLowerCase();
  const detected = await fileTypeFromBuffer(file.buffer);
  const detectedMime = detected?.mime.toLowerCase();

  // Browsers often send application/octet-stream for text-based files (.md, .txt).
  // Treat it as unknown and fall back to extension-based detection instead of rejecting.
  const effectiveDeclaredMime = declaredMime === "application/octet-stream" ? "" : declaredMime;

  if (effectiveDeclaredMime && !allowed.includes(effectiveDeclaredMime)) {
    throw new FileValidationError(`MIME type mismatch for ${extension}. Received ${declaredMime}.`);
  }

  if (detectedMime && !allowed.includes(detectedMime)) {
    throw new FileValidationError(`Binary signature mismatch for ${extension}. Detected ${detectedMime}.`);
  }

  if (!declaredMime && !detectedMime) {
    throw new FileValidationError("Unable to determine file MIME type.");
  }

  return {
    fileType,
    sanitizedFilename: sanitizeFilename(file.originalname),
    mimeType: detectedMime ?? (effectiveDeclaredMime || extensionFallbackMime[fileType]),
    size: file.size
  };
}

export function sanitizeFilename(filename: string): string {
  const cleanBase = basename(filename).replace(/[^\w.-]/g, "_");
  return cleanBase.length > 0 ? cleanBase : "file";
}
