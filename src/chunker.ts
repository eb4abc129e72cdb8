import { InvalidConfigurationError } from "./errors";
import type { Chunk, Document } from "./types";

export interface ChunkerConfig {
  /** Maximum characters per chunk. */
  maxChunkSize: number;
  /** Characters of the previous chunk repeated at the start of the next one. Must be < maxChunkSize. */
  overlap: number;
  /**
   * How far back from the size limit a natural boundary is searched for.
   * Defaults to a quarter of maxChunkSize (clamped so every chunk advances past the overlap).
   */
  boundaryWindow?: number;
}

/** Build the chunk id used throughout the index and in citations. */
export function chunkId(documentId: string, index: number): string {
  return `${documentId}#${index}`;
}

function isWhitespace(ch: string | undefined): boolean {
  return ch !== undefined && /\s/.test(ch);
}

/**
 * Find the preferred cut position in `[from, to]`: after a paragraph break,
 * then a line break, then sentence punctuation, then any whitespace. Returns
 * null when the window holds no natural boundary.
 */
function findBoundary(text: string, from: number, to: number): number | null {
  const para = text.lastIndexOf("\n\n", to - 2);
  if (para >= 0 && para + 2 >= from && para + 2 <= to) return para + 2;

  const line = text.lastIndexOf("\n", to - 1);
  if (line >= 0 && line + 1 >= from) return line + 1;

  for (let i = to - 2; i >= Math.max(0, from - 2); i--) {
    const ch = text[i];
    if ((ch === "." || ch === "!" || ch === "?") && isWhitespace(text[i + 1])) return i + 2;
  }

  for (let i = to - 1; i >= Math.max(0, from - 1); i--) {
    if (isWhitespace(text[i])) return i + 1;
  }
  return null;
}

/** Whether `pos` falls between the two halves of a UTF-16 surrogate pair. */
function splitsSurrogatePair(text: string, pos: number): boolean {
  const high = text.charCodeAt(pos - 1);
  const low = text.charCodeAt(pos);
  return high >= 0xd800 && high <= 0xdbff && low >= 0xdc00 && low <= 0xdfff;
}

/** Start of the next chunk: `overlap` chars before the cut, nudged forward to a word start. */
function overlapStart(text: string, cut: number, overlap: number): number {
  if (overlap === 0) return cut;
  const candidate = cut - overlap;
  for (let i = candidate; i < cut; i++) {
    if (i === 0 || isWhitespace(text[i - 1])) return i;
  }
  return splitsSurrogatePair(text, candidate) ? candidate + 1 : candidate;
}

/** Validate a chunker configuration and resolve its boundary window. */
export function resolveChunkerConfig(config: ChunkerConfig): Required<ChunkerConfig> {
  const { maxChunkSize, overlap } = config;
  if (!Number.isInteger(maxChunkSize) || maxChunkSize < 1) {
    throw new InvalidConfigurationError(
      `maxChunkSize must be a positive integer (got ${maxChunkSize})`,
    );
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new InvalidConfigurationError(`overlap must be a non-negative integer (got ${overlap})`);
  }
  if (overlap >= maxChunkSize) {
    throw new InvalidConfigurationError(
      `overlap (=${overlap}) must be smaller than maxChunkSize (=${maxChunkSize})`,
    );
  }
  const requested = config.boundaryWindow ?? Math.floor(maxChunkSize / 4);
  if (!Number.isInteger(requested) || requested < 0) {
    throw new InvalidConfigurationError(
      `boundaryWindow must be a non-negative integer (got ${requested})`,
    );
  }
  return {
    maxChunkSize,
    overlap,
    boundaryWindow: Math.min(requested, maxChunkSize - overlap - 1),
  };
}

function makeChunk(
  documentId: string,
  index: number,
  text: string,
  start: number,
  end: number,
): Chunk {
  return { id: chunkId(documentId, index), documentId, index, start, end, text: text.slice(start, end) };
}

function* generateChunks(
  documentId: string,
  text: string,
  { maxChunkSize, overlap, boundaryWindow }: Required<ChunkerConfig>,
): Generator<Chunk> {
  const len = text.length;
  let start = 0;
  let prevEnd = 0;
  let index = 0;
  while (start < len) {
    if (len - start <= maxChunkSize) {
      yield makeChunk(documentId, index, text, start, len);
      return;
    }
    const limit = start + maxChunkSize;
    // A cut must move past the previous one, otherwise the next chunk would not advance.
    const minCut = Math.max(prevEnd + 1, start + 1);
    let cut = findBoundary(text, Math.max(limit - boundaryWindow, minCut), limit) ?? limit;
    if (cut > minCut && splitsSurrogatePair(text, cut)) cut--;
    yield makeChunk(documentId, index, text, start, cut);
    index++;
    prevEnd = cut;
    start = overlapStart(text, cut, overlap);
  }
}

/**
 * Split a document into overlapping chunks.
 *
 * The result is lazy and restartable: every iteration re-runs the split from
 * the beginning and yields identical chunks. Configuration is validated
 * eagerly, so an invalid config throws here rather than on first iteration.
 *
 * Cuts prefer paragraph, line, sentence and word boundaries inside the
 * boundary window before the size limit, and fall back to a hard cut at the
 * limit. Chunks cover the text with no gaps; consecutive chunks share at most
 * `overlap` characters.
 */
export function chunkDocument(
  document: Pick<Document, "id" | "text">,
  config: ChunkerConfig,
): Iterable<Chunk> {
  const resolved = resolveChunkerConfig(config);
  return {
    [Symbol.iterator]: () => generateChunks(document.id, document.text, resolved),
  };
}

/**
 * Rebuild the original text from chunks by dropping each chunk's overlap
 * with its predecessor.
 */
export function reconstructText(chunks: Iterable<Chunk>): string {
  let out = "";
  let prevEnd = 0;
  for (const c of chunks) {
    out += c.text.slice(Math.max(0, prevEnd - c.start));
    prevEnd = c.end;
  }
  return out;
}
