export class FileValidationError extends Error {
  readonly statusCode: 400 | 413;

  constructor(message: string, statusCode: 400 | 413 = 400) {
    super(message);
    this.name = "FileValidationError";
    this.statusCode = statusCode;
  }
}

/** The upload was accepted but no usable text could be extracted from it. */
export class DocumentProcessingError extends Error {
  readonly statusCode = 422;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DocumentProcessingError";
  }
}
