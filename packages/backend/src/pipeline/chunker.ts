import type { Chunk, TranscriptSegment } from "@docent/shared";

export const DEFAULT_CHUNK_SIZE = 4000;
export const DEFAULT_CHUNK_OVERLAP = 400;

function assertWindow(chunkSize: number, overlapSize: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`Chunk size must be a positive integer. Received ${chunkSize}.`);
  }
  if (!Number.isInteger(overlapSize) || overlapSize < 0) {
    throw new RangeError(`Overlap size must be a non-negative integer. Received ${overlapSize}.`);
  }
  if (overlapSize >= chunkSize) {
    throw new RangeError(
      `Overlap size must be less than chunk size. Chunk size: ${chunkSize}, overlap size: ${overlapSize}.`
    );
  }
}

/**
 * Yields `[start, end)` windows of `chunkSize` characters advancing by
 * `chunkSize - overlapSize` until a window would start at or past the end.
 * Windows running past the end are truncated, never padded.
 */
function* slidingWindows(
  length: number,
  chunkSize: number,
  overlapSize: number
): Generator<[number, number]> {
  if (length === 0) {
    return;
  }

  if (length <= chunkSize) {
    yield [0, length];
    return;
  }

  const stride = chunkSize - overlapSize;
  for (let start = 0; start < length; start += stride) {
    yield [start, Math.min(start + chunkSize, length)];
  }
}

/**
 * Splits text into overlapping, offset-tracked chunks.
 * Empty text yields no chunks; callers treat that as "no content".
 */
export function chunkText(
  text: string,
  chunkSize = DEFAULT_CHUNK_SIZE,
  overlapSize = DEFAULT_CHUNK_OVERLAP
): Chunk[] {
  assertWindow(chunkSize, overlapSize);

  const chunks: Chunk[] = [];
  for (const [start, end] of slidingWindows(text.length, chunkSize, overlapSize)) {
    chunks.push({
      content: text.slice(start, end),
      index: chunks.length,
      startOffset: start,
      endOffset: end
    });
  }

  return chunks;
}

/**
 * Chunks a timed transcript. Segment texts are joined with single spaces and
 * every character is assigned a timestamp interpolated across its segment, so
 * each chunk can report when it starts and ends in the recording.
 */
export function chunkTranscript(
  segments: readonly TranscriptSegment[],
  chunkSize = DEFAULT_CHUNK_SIZE,
  overlapSize = DEFAULT_CHUNK_OVERLAP
): Chunk[] {
  assertWindow(chunkSize, overlapSize);

  const parts: string[] = [];
  const timestamps: number[] = [];

  segments.forEach((segment, segmentIndex) => {
    const length = segment.text.length;
    parts.push(segment.text);

    if (length > 0) {
      const perCharacter = (segment.endSeconds - segment.startSeconds) / length;
      for (let offset = 0; offset < length; offset += 1) {
        timestamps.push(segment.startSeconds + offset * perCharacter);
      }
    }

    // The joining space takes the end time of the segment it follows.
    if (segmentIndex < segments.length - 1) {
      timestamps.push(segment.endSeconds);
    }
  });

  const text = parts.join(" ");
  if (text.trim().length === 0) {
    return [];
  }

  const lastTimestamp = timestamps[timestamps.length - 1] ?? 0;
  const timeAt = (position: number): number => timestamps[position] ?? lastTimestamp;

  return chunkText(text, chunkSize, overlapSize).map((chunk) => ({
    ...chunk,
    startTimeSeconds: timeAt(chunk.startOffset),
    endTimeSeconds: timeAt(chunk.endOffset - 1)
  }));
}
