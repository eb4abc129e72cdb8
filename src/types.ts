/** Scalar value allowed in chunk / document metadata (flat, filterable). */
export type MetadataValue = string | number | boolean;

/** Flat metadata map attached to documents and index entries. */
export type Metadata = Readonly<Record<string, MetadataValue>>;

/**
 * Equality predicates applied to index entries. The keys `documentId` and
 * `chunkIndex` match the entry fields; every other key matches `metadata`.
 */
export type MetadataFilter = Readonly<Record<string, MetadataValue>>;

/**
 * A source document after text extraction. Immutable once created; a
 * re-ingestion of the same source produces a new Document with the same id.
 */
export interface Document {
  /** Stable identifier derived from the source path. */
  readonly id: string;
  readonly sourcePath: string;
  /** Full extracted text. */
  readonly text: string;
  /** ISO timestamp of the extraction. */
  readonly extractedAt: string;
  readonly metadata: Metadata;
}

/**
 * A bounded span of a document's text. Offsets are half-open `[start, end)`
 * into {@link Document.text}.
 */
export interface Chunk {
  /** `<documentId>#<index>` */
  readonly id: string;
  readonly documentId: string;
  /** Sequence index within the document (0-based). */
  readonly index: number;
  readonly start: number;
  readonly end: number;
  readonly text: string;
}

/** Character span of a chunk inside its source document. */
export interface TextSpan {
  readonly start: number;
  readonly end: number;
}

/**
 * A stored chunk vector plus everything needed to cite it. Owned by the
 * VectorIndex; frozen on insert.
 */
export interface IndexEntry {
  readonly chunkId: string;
  readonly documentId: string;
  readonly chunkIndex: number;
  readonly vector: Float32Array;
  readonly text: string;
  readonly span: TextSpan;
  readonly metadata: Metadata;
}

/** An index entry paired with its cosine similarity to a query vector. */
export interface ScoredEntry {
  readonly entry: IndexEntry;
  readonly score: number;
}

/** A retrieval request. */
export interface Query {
  readonly text: string;
  /** Maximum number of hits returned. */
  readonly topK: number;
  readonly filters?: MetadataFilter;
}

/** Chunk view handed out by retrieval (no vector). */
export interface RetrievedChunk {
  readonly id: string;
  readonly documentId: string;
  readonly index: number;
  readonly text: string;
  readonly metadata: Metadata;
}

export interface RetrievalHit {
  readonly chunk: RetrievedChunk;
  /** Final ranking score (similarity plus any re-rank boost). */
  readonly score: number;
  /** Raw cosine similarity reported by the index. */
  readonly similarity: number;
}

/** Hits ordered by descending score; never longer than the requested top-k. */
export interface RetrievalResult {
  readonly query: string;
  readonly hits: readonly RetrievalHit[];
}

export interface Citation {
  readonly chunkId: string;
  readonly documentId: string;
  readonly chunkIndex: number;
  /** Source path recorded in the chunk metadata, when present. */
  readonly source?: string;
  readonly score: number;
}

export interface Answer {
  readonly question: string;
  readonly text: string;
  /** Chunks actually included in the prompt, in prompt order. */
  readonly citations: readonly Citation[];
  readonly retrieval: RetrievalResult;
  /** False when generation ran with the "no relevant context" marker. */
  readonly usedContext: boolean;
}
