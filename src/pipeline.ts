import { chunkDocument, resolveChunkerConfig, type ChunkerConfig } from "./chunker";
import { KeyedMutex, runPool } from "./concurrency";
import {
  DimensionMismatchError,
  GatewayError,
  InvalidConfigurationError,
  PipelineStateError,
  describeError,
  throwIfAborted,
} from "./errors";
import { describeDocument } from "./extraction/document-info";
import { createDocument, type ExtractorRegistry } from "./extraction/extractor";
import type { EmbeddingGateway } from "./gateways/embedding";
import type { GenerationGateway } from "./gateways/generation";
import { withRetry, type RetryPolicy, type Sleeper } from "./gateways/retry";
import type { IndexStore } from "./persistence";
import type { MetadataBoost } from "./metadata";
import { PromptAssembler } from "./prompt-assembler";
import { Retriever, type MmrOptions } from "./retriever";
import { StatusManager, type PipelineStatus } from "./status";
import type {
  Answer,
  Chunk,
  Citation,
  Document,
  IndexEntry,
  Metadata,
  MetadataFilter,
  MetadataValue,
  RetrievalResult,
} from "./types";
import type { VectorIndex } from "./vector-index";

export interface PipelineSettings {
  chunker: ChunkerConfig;
  /** Default number of passages retrieved per question. */
  topK: number;
  /** Upper bound for the assembled prompt, in the assembler's measure. */
  tokenBudget: number;
  /** Texts sent per embedding request. */
  embedBatchSize: number;
  /** Documents ingested in parallel by {@link Pipeline.ingestSources}. */
  ingestConcurrency: number;
}

export interface RetrievalSettings {
  /** Weight of the question/passage term-overlap boost; 0 or unset disables it. */
  lexicalWeight?: number;
  /** Bonuses for passages whose metadata matches. */
  metadataBoosts?: readonly MetadataBoost[];
  /** Diversify hits with maximal marginal relevance. */
  mmr?: MmrOptions;
}

/** Everything a pipeline works with, passed in explicitly. */
export interface PipelineContext {
  /** Must be empty, or pinned to the embedder's dimensionality. */
  index: VectorIndex;
  embedder: EmbeddingGateway;
  generator: GenerationGateway;
  /** Used by {@link Pipeline.ingestSource} to turn files into text. */
  extractors: ExtractorRegistry;
  /** Persisted index; omit for an in-memory pipeline. */
  store?: IndexStore;
  settings: PipelineSettings;
  /** Applied to every embedding and generation call. */
  retry: RetryPolicy;
  retrieval?: RetrievalSettings;
  /** Defaults to a {@link PromptAssembler} with the default instructions. */
  assembler?: PromptAssembler;
  /** Waits out the backoff between retries. */
  sleeper?: Sleeper;
  /** Log per-batch and per-query detail with the `[RAG][verbose]` prefix. */
  verbose?: boolean;
}

export interface IngestOptions {
  /** Aborting keeps the previous version of the document in the index. */
  signal?: AbortSignal;
}

export interface IngestSourceOptions extends IngestOptions {
  /** Merged over the metadata detected from the file. */
  metadata?: Metadata;
  /** Override the id derived from the path. */
  documentId?: string;
}

export interface IngestReport {
  documentId: string;
  chunks: number;
  /** Entries of the previous version that were replaced. */
  replaced: number;
}

/** Result of one source in {@link Pipeline.ingestSources}. */
export type IngestOutcome =
  | { path: string; ok: true; report: IngestReport }
  | { path: string; ok: false; error: unknown };

export interface QueryOptions {
  /** Overrides the pipeline's default `topK`. */
  topK?: number;
  /** Equality filters on `documentId`, `chunkIndex` or metadata keys. */
  filters?: MetadataFilter;
  signal?: AbortSignal;
}

/** One row of {@link Pipeline.listDocuments}. */
export interface DocumentSummary {
  documentId: string;
  /** Entries currently indexed for the document. */
  chunks: number;
  /** `source` metadata of its first chunk. */
  source?: string;
}

function stringField(metadata: Metadata, key: string): string | undefined {
  const v = metadata[key];
  return typeof v === "string" ? v : undefined;
}

/**
 * Orchestrates ingestion (extract → chunk → embed → index) and question
 * answering (retrieve → assemble → generate) over one vector index.
 *
 * Writes to one document are serialized by a per-document lock; different
 * documents ingest in parallel. Every write lands in the index as a single
 * synchronous batch, so queries never observe a half-ingested document.
 */
export class Pipeline {
  private readonly index: VectorIndex;
  private readonly embedder: EmbeddingGateway;
  private readonly generator: GenerationGateway;
  private readonly extractors: ExtractorRegistry;
  private readonly store?: IndexStore;
  private readonly settings: PipelineSettings;
  private readonly retry: RetryPolicy;
  private readonly sleeper?: Sleeper;
  private readonly verbose: boolean;
  private readonly retriever: Retriever;
  private readonly assembler: PromptAssembler;
  private readonly locks = new KeyedMutex();
  private readonly statusManager: StatusManager;
  /** Calls that must finish before {@link close} saves the index. */
  private readonly inFlight = new Set<Promise<unknown>>();
  private closing?: Promise<void>;
  private opened = false;
  private dirty = false;

  public constructor(ctx: PipelineContext) {
    this.index = ctx.index;
    this.embedder = ctx.embedder;
    this.generator = ctx.generator;
    this.extractors = ctx.extractors;
    this.store = ctx.store;
    this.settings = { ...ctx.settings, chunker: resolveChunkerConfig(ctx.settings.chunker) };
    this.retry = ctx.retry;
    this.sleeper = ctx.sleeper;
    this.verbose = !!ctx.verbose;

    const { topK, tokenBudget, embedBatchSize, ingestConcurrency } = this.settings;
    for (const [name, value] of Object.entries({ topK, tokenBudget, embedBatchSize, ingestConcurrency })) {
      if (!Number.isInteger(value) || value < 1) {
        throw new InvalidConfigurationError(`${name} must be a positive integer (got ${value})`);
      }
    }
    const pinned = this.index.dimensions;
    if (pinned !== undefined && pinned !== this.embedder.dimensions) {
      throw new InvalidConfigurationError(
        `Index dimensionality ${pinned} does not match embedding model ${this.embedder.modelName} (${this.embedder.dimensions})`,
      );
    }

    this.retriever = new Retriever({
      index: this.index,
      embedder: this.embedder,
      retry: this.retry,
      lexicalWeight: ctx.retrieval?.lexicalWeight,
      metadataBoosts: ctx.retrieval?.metadataBoosts,
      mmr: ctx.retrieval?.mmr,
      sleeper: this.sleeper,
      verbose: this.verbose,
    });
    this.assembler = ctx.assembler ?? new PromptAssembler();
    this.statusManager = new StatusManager({
      embeddingModel: this.embedder.modelName,
      generationModel: this.generator.modelName,
      dimensions: this.embedder.dimensions,
      storePath: this.store?.path,
    });
    this.statusManager.setHasContent(this.index.size > 0);
  }

  /**
   * Load the persisted index, if a store is configured and present. Call once;
   * with a store configured, writes are refused until this has succeeded.
   *
   * @returns number of entries loaded
   */
  public async open(): Promise<number> {
    this.assertOpen("open");
    if (this.opened) throw new PipelineStateError("Pipeline is already open");
    if (this.index.size > 0) {
      throw new PipelineStateError("open() must run before anything is ingested");
    }
    if (!this.store) {
      this.opened = true;
      return 0;
    }
    const loaded = await this.store.load(this.index, this.compatibility());
    // Only a successful load unlocks writes.
    this.opened = true;
    this.statusManager.setHasContent(this.index.size > 0);
    return loaded;
  }

  /**
   * Refuse new calls, wait for the ones already running, then save pending
   * changes. Closing again returns the same promise.
   */
  public close(): Promise<void> {
    if (!this.closing) {
      this.statusManager.markClosed();
      this.closing = this.drainAndPersist();
    }
    return this.closing;
  }

  /** Save the index when it changed since the last save. */
  public async flush(): Promise<boolean> {
    this.assertWritable("flush");
    return this.track(() => this.persist());
  }

  public status(): PipelineStatus {
    return this.statusManager.snapshot({
      documents: this.index.documentIds().length,
      chunks: this.index.size,
      dirty: this.dirty,
    });
  }

  /** File extensions `ingestSource` can extract. */
  public supportedExtensions(): string[] {
    return this.extractors.supportedExtensions();
  }

  /** Documents currently indexed, sorted by id. */
  public listDocuments(): DocumentSummary[] {
    return this.index.documentIds().map((documentId) => {
      const entries = this.index.entriesFor(documentId);
      const first = entries[0];
      return {
        documentId,
        chunks: entries.length,
        source: first ? stringField(first.metadata, "source") : undefined,
      };
    });
  }

  /**
   * Chunk, embed and index one document, replacing any previous version with
   * the same id. Ingesting identical content twice leaves the index unchanged.
   *
   * @throws {GatewayError} embedding failed permanently or exhausted its retries
   * @throws {DimensionMismatchError} the gateway returned vectors of the wrong size
   * @throws {CancelledError} `signal` fired; the index keeps the previous version
   */
  public async ingest(document: Document, opts: IngestOptions = {}): Promise<IngestReport> {
    this.assertWritable("ingest");
    return this.track(async () => {
      this.statusManager.beginIngest();
      let succeeded = false;
      try {
        const report = await this.ingestDocument(document, opts.signal);
        succeeded = true;
        return report;
      } finally {
        this.statusManager.endIngest(succeeded);
      }
    });
  }

  /**
   * Extract a source file with the extractor for its type, then ingest it.
   *
   * @throws {ExtractionError} unsupported, unreadable, corrupt or empty source
   */
  public async ingestSource(sourcePath: string, opts: IngestSourceOptions = {}): Promise<IngestReport> {
    this.assertWritable("ingest");
    return this.track(async () => {
      this.statusManager.beginIngest();
      let succeeded = false;
      try {
        throwIfAborted(opts.signal, `ingest ${sourcePath}`);
        const extracted = await this.extractors.extract(sourcePath);
        const detected: Record<string, MetadataValue> = { ...describeDocument(sourcePath, extracted.text) };
        if (extracted.pageCount !== undefined) detected.pages = extracted.pageCount;
        // Caller metadata wins over what is detected from the file.
        const metadata: Metadata = { ...detected, ...opts.metadata };
        const document = createDocument(sourcePath, extracted.text, { id: opts.documentId, metadata });
        const report = await this.ingestDocument(document, opts.signal);
        succeeded = true;
        return report;
      } finally {
        this.statusManager.endIngest(succeeded);
      }
    });
  }

  /**
   * Ingest many sources with a bounded worker pool. Returns one outcome per
   * path, in input order; a failing source never stops its siblings.
   */
  public async ingestSources(
    sourcePaths: readonly string[],
    opts: Omit<IngestSourceOptions, "documentId"> = {},
  ): Promise<IngestOutcome[]> {
    this.assertWritable("ingest");
    const settled = await runPool(sourcePaths, this.settings.ingestConcurrency, (p) =>
      this.ingestSource(p, opts),
    );
    return settled.map((s, i): IngestOutcome => {
      const sourcePath = sourcePaths[i];
      if (s.status === "fulfilled") return { path: sourcePath, ok: true, report: s.value };
      console.error(`[RAG] Failed to ingest ${sourcePath}: ${describeError(s.reason)}`);
      return { path: sourcePath, ok: false, error: s.reason };
    });
  }

  /** Remove a document and all its chunks; returns the number of chunks removed. */
  public async deleteDocument(documentId: string): Promise<number> {
    this.assertWritable("delete");
    return this.track(() =>
      this.locks.runExclusive(documentId, async () => {
        const removed = this.index.deleteDocument(documentId);
        if (removed > 0) {
          this.dirty = true;
          this.statusManager.setHasContent(this.index.size > 0);
          console.error(`[RAG] Deleted ${documentId} (${removed} chunks)`);
        }
        return removed;
      }),
    );
  }

  /** Retrieval only: ranked passages for a question. */
  public async search(question: string, opts: QueryOptions = {}): Promise<RetrievalResult> {
    this.assertOpen("search");
    const text = this.requireQuestion(question);
    this.statusManager.beginQuery();
    try {
      return await this.retriever.retrieve(
        { text, topK: opts.topK ?? this.settings.topK, filters: opts.filters },
        opts.signal,
      );
    } finally {
      this.statusManager.endQuery();
    }
  }

  /**
   * Answer a question from the indexed documents. When no passage fits (or
   * nothing is indexed) generation still runs, with the no-context marker,
   * and the answer carries no citations.
   *
   * @throws {RetrievalUnavailableError} the question could not be embedded
   * @throws {GatewayError} generation failed permanently or exhausted its retries
   * @throws {CancelledError} `signal` fired
   */
  public async answer(question: string, opts: QueryOptions = {}): Promise<Answer> {
    this.assertOpen("answer");
    const text = this.requireQuestion(question);
    this.statusManager.beginQuery();
    try {
      const retrieval = await this.retriever.retrieve(
        { text, topK: opts.topK ?? this.settings.topK, filters: opts.filters },
        opts.signal,
      );
      const assembled = this.assembler.assemble(text, retrieval, this.settings.tokenBudget);
      if (this.verbose) {
        console.error(
          `[RAG][verbose] Prompt uses ${assembled.included.length}/${retrieval.hits.length} passages (${assembled.measuredSize}/${this.settings.tokenBudget})`,
        );
      }
      throwIfAborted(opts.signal, "answer");

      const generated = await withRetry(() => this.generator.generate(assembled.prompt, opts.signal), {
        policy: this.retry,
        signal: opts.signal,
        sleeper: this.sleeper,
        label: "generate answer",
        verbose: this.verbose,
      });
      if (!generated.ok) throw generated.error;

      const citations: Citation[] = assembled.included.map((hit) => ({
        chunkId: hit.chunk.id,
        documentId: hit.chunk.documentId,
        chunkIndex: hit.chunk.index,
        source: stringField(hit.chunk.metadata, "source"),
        score: hit.score,
      }));
      return {
        question: text,
        text: generated.value.trim(),
        citations,
        retrieval,
        usedContext: citations.length > 0,
      };
    } finally {
      this.statusManager.endQuery();
    }
  }

  private async ingestDocument(document: Document, signal: AbortSignal | undefined): Promise<IngestReport> {
    return this.locks.runExclusive(document.id, async () => {
      const operation = `ingest ${document.id}`;
      throwIfAborted(signal, operation);

      const chunks = [...chunkDocument(document, this.settings.chunker)];
      const vectors = await this.embedChunks(document.id, chunks, signal);
      const metadata: Metadata = { source: document.sourcePath, ...document.metadata };
      const entries: IndexEntry[] = chunks.map((chunk, i) => ({
        chunkId: chunk.id,
        documentId: document.id,
        chunkIndex: chunk.index,
        vector: vectors[i],
        text: chunk.text,
        span: { start: chunk.start, end: chunk.end },
        metadata,
      }));
      // Last cancellation point: nothing below awaits, so the commit is all or nothing.
      throwIfAborted(signal, operation);

      const replaced = this.index.entriesFor(document.id).length;
      this.index.replaceDocument(document.id, entries);
      this.dirty = true;
      this.statusManager.setHasContent(this.index.size > 0);
      console.error(`[RAG] Indexed ${document.id}: ${entries.length} chunks`);
      return { documentId: document.id, chunks: entries.length, replaced };
    });
  }

  private async embedChunks(
    documentId: string,
    chunks: readonly Chunk[],
    signal: AbortSignal | undefined,
  ): Promise<Float32Array[]> {
    const dims = this.embedder.dimensions;
    const batchSize = this.settings.embedBatchSize;
    const vectors: Float32Array[] = [];
    for (let i = 0; i < chunks.length; i += batchSize) {
      const batch = chunks.slice(i, i + batchSize);
      const result = await withRetry(() => this.embedder.embed(batch.map((c) => c.text), signal), {
        policy: this.retry,
        signal,
        sleeper: this.sleeper,
        label: `embed ${documentId}`,
        verbose: this.verbose,
      });
      if (!result.ok) throw result.error;
      if (result.value.length !== batch.length) {
        throw new GatewayError(
          "permanent",
          "embed",
          `expected ${batch.length} embeddings for ${documentId}, received ${result.value.length}`,
        );
      }
      result.value.forEach((v, j) => {
        if (v.length !== dims) throw new DimensionMismatchError(dims, v.length, `chunk ${batch[j].id}`);
        vectors.push(Float32Array.from(v));
      });
      if (this.verbose) {
        console.error(
          `[RAG][verbose] Embedded ${Math.min(i + batchSize, chunks.length)}/${chunks.length} chunks of ${documentId}`,
        );
      }
    }
    return vectors;
  }

  private async track<T>(task: () => Promise<T>): Promise<T> {
    const running = task();
    this.inFlight.add(running);
    try {
      return await running;
    } finally {
      this.inFlight.delete(running);
    }
  }

  private async drainAndPersist(): Promise<void> {
    // Failures belong to the callers that started those calls.
    await Promise.allSettled([...this.inFlight]);
    await this.persist();
  }

  private async persist(): Promise<boolean> {
    if (!this.store || !this.dirty) return false;
    // Cleared before the await so writes landing during the save mark it dirty again.
    this.dirty = false;
    try {
      await this.store.save(this.index, this.compatibility());
    } catch (e) {
      this.dirty = true;
      throw e;
    }
    return true;
  }

  private compatibility() {
    return { dimensions: this.embedder.dimensions, embeddingModel: this.embedder.modelName };
  }

  private requireQuestion(question: string): string {
    const text = question.trim();
    if (!text) throw new InvalidConfigurationError("question must not be empty");
    return text;
  }

  private assertOpen(operation: string): void {
    if (this.statusManager.state === "closed") {
      throw new PipelineStateError(`Cannot ${operation}: pipeline is closed`);
    }
  }

  /** Writes to a persisted index need it loaded first, or the next save would drop it. */
  private assertWritable(operation: string): void {
    this.assertOpen(operation);
    if (this.store && !this.opened) {
      throw new PipelineStateError(`Cannot ${operation}: call open() to load ${this.store.path} first`);
    }
  }
}
