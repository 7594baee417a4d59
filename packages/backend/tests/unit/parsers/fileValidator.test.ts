import { beforeEach, describe, expect, it, vi } from "vitest";
import { fileTypeFromBuffer } from "file-type";
import { FileValidationError } from "../../../src/parsers/errors.js";
import {
  sanitizeFilename,
  validateUploadedFile,
  type UploadedFileLike
} from "../../../src/parsers/fileValidator.js";

vi.mock("file-type", () => ({
  fileTypeFromBuffer: vi.fn()
}));

const mockedFileTypeFromBuffer = vi.mocked(fileTypeFromBuffer);

function buildFile(overrides: Partial<UploadedFileLike> = {}): UploadedFileLike {
  return {
    originalname: "demo.pdf",
    mimetype: "application/pdf",
    size: 128,
    buffer: Buffer.from("%PDF-1.7"),
    ...overrides
  };
}

describe("fileValidator", () => {
  beforeEach(() => {
    mockedFileTypeFromBuffer.mockReset();
  });

  it("accepts valid extension + mime for PDF", async () => {
    mockedFileTypeFromBuffer.mockResolvedValue({
      ext: "pdf",
      mime: "application/pdf"
    });

    const result = await validateUploadedFile(buildFile());

    expect(result.fileType).toBe("pdf");
    expect(result.mimeType).toBe("application/pdf");
  });

  it("accepts a DOCX file sniffed as a ZIP container", async () => {
    mockedFileTypeFromBuffer.mockResolvedValue({
      ext: "zip",
      mime: "application/zip"
    });

    const result = await validateUploadedFile(
      buildFile({
        originalname: "Board Minutes.docx",
        mimetype: "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
        buffer: Buffer.from("PK\u0003\u0004")
      })
    );

    expect(result.fileType).toBe("docx");
    expect(result.mimeType).toBe("application/zip");
    expect(result.sanitizedFilename).toBe("Board_Minutes.docx");
  });

  it("falls back to the extension for text sent as octet-stream", async () => {
    mockedFileTypeFromBuffer.mockResolvedValue(undefined);

    const result = await validateUploadedFile(
      buildFile({
        originalname: "notes.txt",
        mimetype: "application/octet-stream",
        buffer: Buffer.from("plain words")
      })
    );

    expect(result.fileType).toBe("txt");
    expect(result.mimeType).toBe("text/plain");
  });

  it("rejects unsupported extension", async () => {
    mockedFileTypeFromBuffer.mockResolvedValue(undefined);

    await expect(
      validateUploadedFile(
        buildFile({
          originalname: "evil.exe",
          mimetype: "application/octet-stream"
        })
      )
    ).rejects.toThrow("Unsupported file extension");
  });

  it("rejects an empty file", async () => {
    mockedFileTypeFromBuffer.mockResolvedValue(undefined);

    const error = await validateUploadedFile(
      buildFile({ originalname: "empty.txt", mimetype: "text/plain", size: 0, buffer: Buffer.alloc(0) })
    ).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(FileValidationError);
    expect(error).toMatchObject({ message: "Uploaded file is empty.", statusCode: 400 });
  });

  it("rejects mismatched declared mime", async () => {
    mockedFileTypeFromBuffer.mockResolvedValue({
      ext: "pdf",
      mime: "application/pdf"
    });

    await expect(
      validateUploadedFile(
        buildFile({
          originalname: "notes.md",
          mimetype: "application/pdf"
        })
      )
    ).rejects.toThrow("MIME type mismatch");
  });

  it("rejects a binary signature that does not match the extension", async () => {
    mockedFileTypeFromBuffer.mockResolvedValue({
      ext: "png",
      mime: "image/png"
    });

    await expect(
      validateUploadedFile(buildFile({ originalname: "notes.txt", mimetype: "text/plain" }))
    ).rejects.toThrow("Binary signature mismatch for .txt. Detected image/png.");
  });

  it("rejects file larger than max size with 413", async () => {
    mockedFileTypeFromBuffer.mockResolvedValue(undefined);

    const error = await validateUploadedFile(
      buildFile({
        originalname: "notes.txt",
        mimetype: "text/plain",
        size: 1024
      }),
      { maxSizeBytes: 100 }
    ).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(FileValidationError);
    expect(error).toMatchObject({ statusCode: 413 });
  });

  it("sanitizes path segments and unsafe characters", () => {
    expect(sanitizeFilename("../../etc/pa ss$.txt")).toBe("pa_ss_.txt");
    expect(sanitizeFilename("")).toBe("file");
  });
});
