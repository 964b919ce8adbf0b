import { InvalidConfigError } from "./errors";

/** One chunk-sized window over a document's text. */
export interface ChunkSpan {
  /** Sequence index within the document (0-based). */
  readonly seq: number;
  /** Inclusive start offset (characters). */
  readonly start: number;
  /** Exclusive end offset (characters). */
  readonly end: number;
  readonly text: string;
}

/**
 * Validate chunk sizing. Both values are character counts.
 *
 * @throws {InvalidConfigError} when either value is not an integer, `chunkSize` is not positive,
 * `overlap` is negative or `overlap >= chunkSize`.
 */
export function assertChunkParams(chunkSize: number, overlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new InvalidConfigError(`chunk_size must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new InvalidConfigError(`chunk_overlap must be a non-negative integer, got ${overlap}`);
  }
  if (overlap >= chunkSize) {
    throw new InvalidConfigError(
      `chunk_overlap (=${overlap}) must be smaller than chunk_size (=${chunkSize})`,
    );
  }
}

/**
 * Split text into fixed-size windows where each adjacent pair shares exactly `overlap`
 * characters. The final window may be shorter than `chunkSize`.
 *
 * Sizes count UTF-16 code units. A boundary that would fall inside a surrogate pair moves by one
 * unit, so around such a character a window or overlap can be one unit off.
 *
 * The result is lazy and restartable: every iteration walks the text again from the start.
 * Parameters are validated eagerly, before anything is iterated.
 *
 * @param text Full extracted document text.
 * @param chunkSize Maximum characters per chunk.
 * @param overlap Characters shared with the previous chunk.
 */
export function chunkText(text: string, chunkSize: number, overlap: number): Iterable<ChunkSpan> {
  assertChunkParams(chunkSize, overlap);
  return {
    [Symbol.iterator]: () => spans(text, chunkSize, overlap),
  };
}

/** True when offset `i` sits between the two halves of a surrogate pair. */
function splitsPair(text: string, i: number): boolean {
  if (i <= 0 || i >= text.length) return false;
  const high = text.charCodeAt(i - 1);
  const low = text.charCodeAt(i);
  return high >= 0xd800 && high <= 0xdbff && low >= 0xdc00 && low <= 0xdfff;
}

function* spans(text: string, size: number, overlap: number): Generator<ChunkSpan> {
  let seq = 0;
  let start = 0;
  while (start < text.length) {
    let end = Math.min(start + size, text.length);
    if (splitsPair(text, end)) end = end - 1 > start ? end - 1 : end + 1;
    yield { seq: seq++, start, end, text: text.slice(start, end) };
    if (end === text.length) return;
    let next = Math.max(end - overlap, start + 1);
    if (splitsPair(text, next)) next = next - 1 > start ? next - 1 : next + 1;
    start = next;
  }
}

/**
 * Number of chunks {@link chunkText} yields for a text of `length` characters:
 * `ceil((length - overlap) / (chunkSize - overlap))`, and one chunk for any non-empty text not
 * longer than the overlap.
 */
export function expectedChunkCount(length: number, chunkSize: number, overlap: number): number {
  assertChunkParams(chunkSize, overlap);
  if (length === 0) return 0;
  return Math.max(1, Math.ceil((length - overlap) / (chunkSize - overlap)));
}
