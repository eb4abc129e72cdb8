import { DimensionMismatchError, InvalidConfigurationError } from "./errors";
import type { IndexEntry, MetadataFilter, ScoredEntry } from "./types";

/** Stored entry with its vector norm cached at insert time. */
interface Slot {
  readonly entry: IndexEntry;
  readonly norm: number;
}

export interface VectorIndexOptions {
  /** Fixed vector dimensionality. When omitted, the first upsert pins it. */
  dimensions?: number;
}

function l2norm(v: Float32Array): number {
  let s = 0;
  for (let i = 0; i < v.length; i++) s += v[i] * v[i];
  return Math.sqrt(s);
}

/**
 * Cosine similarity between two equal-length vectors. Returns 0 when either
 * vector has zero length, so degenerate vectors rank last instead of
 * producing NaN.
 */
export function cosine(a: Float32Array, b: Float32Array, normA = l2norm(a), normB = l2norm(b)): number {
  if (normA === 0 || normB === 0) return 0;
  let dot = 0;
  for (let i = 0; i < a.length; i++) dot += a[i] * b[i];
  return dot / (normA * normB);
}

/** Deterministic order for equal scores: ascending (documentId, chunkIndex). */
export function compareEntryKeys(
  a: Pick<IndexEntry, "documentId" | "chunkIndex">,
  b: Pick<IndexEntry, "documentId" | "chunkIndex">,
): number {
  if (a.documentId !== b.documentId) return a.documentId < b.documentId ? -1 : 1;
  return a.chunkIndex - b.chunkIndex;
}

/** Descending score, then {@link compareEntryKeys}. */
export function compareScored(a: ScoredEntry, b: ScoredEntry): number {
  if (a.score !== b.score) return b.score - a.score;
  return compareEntryKeys(a.entry, b.entry);
}

/** True when the entry satisfies every equality predicate in `filters`. */
export function matchesFilters(entry: IndexEntry, filters: MetadataFilter | undefined): boolean {
  if (!filters) return true;
  for (const [key, expected] of Object.entries(filters)) {
    const actual =
      key === "documentId"
        ? entry.documentId
        : key === "chunkIndex"
          ? entry.chunkIndex
          : entry.metadata[key];
    if (actual !== expected) return false;
  }
  return true;
}

/**
 * In-memory vector store keyed by chunk id, with a secondary index by
 * document.
 *
 * Similarity convention: vectors are stored exactly as given and compared with
 * full cosine similarity (dot product divided by both norms). The index never
 * normalizes vectors, so normalized and unnormalized inputs rank identically.
 *
 * Every mutating call validates its whole batch before touching state and
 * then applies it synchronously, so a concurrent reader can never observe a
 * half-applied batch.
 */
export class VectorIndex {
  private readonly slots = new Map<string, Slot>();
  private readonly byDocument = new Map<string, Set<string>>();
  private dims: number | undefined;

  public constructor(opts: VectorIndexOptions = {}) {
    if (opts.dimensions !== undefined) {
      if (!Number.isInteger(opts.dimensions) || opts.dimensions < 1) {
        throw new InvalidConfigurationError(
          `Index dimensions must be a positive integer (got ${opts.dimensions})`,
        );
      }
      this.dims = opts.dimensions;
    }
  }

  /** Configured (or pinned) dimensionality; undefined until known. */
  public get dimensions(): number | undefined {
    return this.dims;
  }

  /** Number of stored entries. */
  public get size(): number {
    return this.slots.size;
  }

  /** Stored (frozen) entry for a chunk id. */
  public get(chunkId: string): IndexEntry | undefined {
    return this.slots.get(chunkId)?.entry;
  }

  /** Ids of all documents with at least one entry, sorted. */
  public documentIds(): string[] {
    return [...this.byDocument.keys()].sort();
  }

  /** Entries of one document ordered by chunk index. */
  public entriesFor(documentId: string): IndexEntry[] {
    const ids = this.byDocument.get(documentId);
    if (!ids) return [];
    const out: IndexEntry[] = [];
    for (const id of ids) {
      const slot = this.slots.get(id);
      if (slot) out.push(slot.entry);
    }
    return out.sort(compareEntryKeys);
  }

  /** Every entry, ordered by (documentId, chunkIndex). */
  public entries(): IndexEntry[] {
    return [...this.slots.values()].map((s) => s.entry).sort(compareEntryKeys);
  }

  /**
   * Insert or replace entries. The batch is rejected as a whole (nothing is
   * written) if any vector has the wrong dimensionality or non-finite values.
   *
   * @throws {DimensionMismatchError}
   */
  public upsert(entries: readonly IndexEntry[]): void {
    const prepared = this.prepare(entries);
    for (const slot of prepared) this.insert(slot);
  }

  /**
   * Remove every entry of a document. Absent documents are a no-op.
   * @returns Number of entries removed.
   */
  public deleteDocument(documentId: string): number {
    const ids = this.byDocument.get(documentId);
    if (!ids) return 0;
    for (const id of ids) this.slots.delete(id);
    this.byDocument.delete(documentId);
    return ids.size;
  }

  /**
   * Atomically swap a document's entries: the prior entries are deleted and the
   * new batch inserted in one synchronous step.
   */
  public replaceDocument(documentId: string, entries: readonly IndexEntry[]): void {
    for (const e of entries) {
      if (e.documentId !== documentId) {
        throw new InvalidConfigurationError(
          `Entry ${e.chunkId} belongs to ${e.documentId}, not ${documentId}`,
        );
      }
    }
    const prepared = this.prepare(entries);
    this.deleteDocument(documentId);
    for (const slot of prepared) this.insert(slot);
  }

  /**
   * Return up to `topK` entries ranked by cosine similarity to `vector`,
   * restricted to entries matching `filters`. Equal scores are ordered by
   * ascending (documentId, chunkIndex).
   */
  public query(vector: Float32Array, topK: number, filters?: MetadataFilter): ScoredEntry[] {
    if (!Number.isInteger(topK) || topK < 1) {
      throw new InvalidConfigurationError(`top_k must be a positive integer (got ${topK})`);
    }
    if (this.slots.size === 0) return [];
    if (this.dims !== undefined && vector.length !== this.dims) {
      throw new DimensionMismatchError(this.dims, vector.length, "query vector");
    }
    const qNorm = l2norm(vector);
    const scored: ScoredEntry[] = [];
    for (const slot of this.slots.values()) {
      if (!matchesFilters(slot.entry, filters)) continue;
      scored.push({ entry: slot.entry, score: cosine(vector, slot.entry.vector, qNorm, slot.norm) });
    }
    scored.sort(compareScored);
    return scored.slice(0, topK);
  }

  /** Drop everything (dimensionality stays pinned). */
  public clear(): void {
    this.slots.clear();
    this.byDocument.clear();
  }

  private prepare(entries: readonly IndexEntry[]): Slot[] {
    let dims = this.dims;
    const seen = new Set<string>();
    const out: Slot[] = [];
    for (const e of entries) {
      if (dims === undefined) dims = e.vector.length;
      if (e.vector.length !== dims) {
        throw new DimensionMismatchError(dims, e.vector.length, `chunk ${e.chunkId}`);
      }
      if (!e.vector.every(Number.isFinite)) {
        throw new InvalidConfigurationError(`Vector for chunk ${e.chunkId} has non-finite values`);
      }
      if (seen.has(e.chunkId)) {
        throw new InvalidConfigurationError(`Duplicate chunk id ${e.chunkId} in batch`);
      }
      seen.add(e.chunkId);
      // Own a private copy of the vector so callers cannot mutate stored state.
      const vector = new Float32Array(e.vector);
      const entry: IndexEntry = Object.freeze({
        chunkId: e.chunkId,
        documentId: e.documentId,
        chunkIndex: e.chunkIndex,
        vector,
        text: e.text,
        span: Object.freeze({ start: e.span.start, end: e.span.end }),
        metadata: Object.freeze({ ...e.metadata }),
      });
      out.push({ entry, norm: l2norm(vector) });
    }
    if (this.dims === undefined && dims !== undefined && out.length > 0) this.dims = dims;
    return out;
  }

  private insert(slot: Slot): void {
    const { chunkId, documentId } = slot.entry;
    const previous = this.slots.get(chunkId);
    if (previous && previous.entry.documentId !== documentId) {
      this.byDocument.get(previous.entry.documentId)?.delete(chunkId);
      if (this.byDocument.get(previous.entry.documentId)?.size === 0) {
        this.byDocument.delete(previous.entry.documentId);
      }
    }
    this.slots.set(chunkId, slot);
    let ids = this.byDocument.get(documentId);
    if (!ids) {
      ids = new Set();
      this.byDocument.set(documentId, ids);
    }
    ids.add(chunkId);
  }
}
