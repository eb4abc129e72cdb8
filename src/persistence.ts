import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { DimensionMismatchError, IndexStoreError, InvalidConfigurationError } from "./errors";
import type { IndexEntry } from "./types";
import type { VectorIndex } from "./vector-index";

/** Current on-disk format version. */
export const STORE_VERSION = 1;

/**
 * Values the persisted index must agree with. `embeddingModel` and
 * `dimensions` are stored in the file's `meta` block and compared on load.
 */
export interface StoreCompatibility {
  dimensions: number;
  embeddingModel: string;
}

const MetadataSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

const StoredEntrySchema = z.object({
  documentId: z.string().min(1),
  chunkIndex: z.number().int().min(0),
  /** base64 little-endian float32 */
  vector: z.string(),
  text: z.string(),
  span: z.object({ start: z.number().int().min(0), end: z.number().int().min(0) }),
  metadata: MetadataSchema.default({}),
});

const StoreFileSchema = z.object({
  version: z.literal(STORE_VERSION),
  meta: z.object({
    dimensions: z.number().int().positive(),
    embeddingModel: z.string(),
    savedAt: z.string(),
    embEncoding: z.literal("f32-base64"),
  }),
  entries: z.record(StoredEntrySchema),
});

type StoreFile = z.infer<typeof StoreFileSchema>;

/** Encode a vector as base64 of its raw little-endian float32 bytes. */
export function encodeVector(v: Float32Array): string {
  return Buffer.from(v.buffer, v.byteOffset, v.byteLength).toString("base64");
}

/** Inverse of {@link encodeVector}; returns null when the payload is not whole float32s. */
export function decodeVector(encoded: string): Float32Array | null {
  const buf = Buffer.from(encoded, "base64");
  if (buf.byteLength % 4 !== 0) return null;
  // copy: the Buffer may share a pooled ArrayBuffer with unaligned offset
  const bytes = new Uint8Array(buf);
  return new Float32Array(bytes.buffer, 0, bytes.byteLength / 4);
}

/**
 * Load / save the whole vector index as one JSON file.
 *
 * Layout: `{ version, meta, entries: { [chunkId]: { documentId, chunkIndex, vector, text, span, metadata } } }`.
 * Saves are atomic (temp file + rename), so a crash never leaves a truncated store.
 */
export class IndexStore {
  /** Pending saves, run one after another so they never share the temp file. */
  private saveChain: Promise<void> = Promise.resolve();

  public constructor(
    private readonly storePath: string,
    private readonly verbose = false,
  ) {}

  public get path(): string {
    return this.storePath;
  }

  /** Whether a store file exists at the configured path. */
  public async exists(): Promise<boolean> {
    try {
      await fs.access(this.storePath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Read the store into `index` (which is cleared first). Returns the number of
   * entries loaded, or 0 when no store exists yet.
   *
   * @throws {IndexStoreError} unreadable or malformed file
   * @throws {DimensionMismatchError} store built with a different dimensionality
   * @throws {InvalidConfigurationError} store built with a different embedding model
   */
  public async load(index: VectorIndex, expected: StoreCompatibility): Promise<number> {
    if (!(await this.exists())) return 0;
    let parsed: StoreFile;
    try {
      const raw = await fs.readFile(this.storePath, "utf8");
      const result = StoreFileSchema.safeParse(JSON.parse(raw));
      if (!result.success) {
        throw new IndexStoreError(this.storePath, `malformed store (${result.error.issues[0]?.message})`);
      }
      parsed = result.data;
    } catch (e) {
      if (e instanceof IndexStoreError) throw e;
      throw new IndexStoreError(this.storePath, "cannot read store", { cause: e });
    }

    const { meta } = parsed;
    if (meta.dimensions !== expected.dimensions) {
      throw new DimensionMismatchError(expected.dimensions, meta.dimensions, `index store ${this.storePath}`);
    }
    if (meta.embeddingModel !== expected.embeddingModel) {
      throw new InvalidConfigurationError(
        `Index store ${this.storePath} was built with embedding model "${meta.embeddingModel}" but "${expected.embeddingModel}" is configured. Delete the store or switch models.`,
      );
    }

    const entries: IndexEntry[] = [];
    for (const [chunkId, stored] of Object.entries(parsed.entries)) {
      const vector = decodeVector(stored.vector);
      if (!vector) {
        throw new IndexStoreError(this.storePath, `entry ${chunkId} has a corrupt vector`);
      }
      entries.push({
        chunkId,
        documentId: stored.documentId,
        chunkIndex: stored.chunkIndex,
        vector,
        text: stored.text,
        span: stored.span,
        metadata: stored.metadata,
      });
    }
    index.clear();
    index.upsert(entries);
    console.error(`[RAG] Loaded persisted index: ${entries.length} chunks.`);
    if (this.verbose) console.error(`[RAG][verbose] Loaded from ${this.storePath}`);
    return entries.length;
  }

  /**
   * Persist every entry of `index`. Overlapping calls are queued; each one
   * writes the index as it stands when its turn comes.
   *
   * @throws {IndexStoreError} the file cannot be written
   */
  public save(index: VectorIndex, meta: StoreCompatibility): Promise<void> {
    const run = this.saveChain.then(() => this.write(index, meta));
    // A failed save rejects `run` for its caller; later saves still run.
    this.saveChain = run.catch(() => undefined);
    return run;
  }

  private async write(index: VectorIndex, meta: StoreCompatibility): Promise<void> {
    const out: StoreFile = {
      version: STORE_VERSION,
      meta: {
        dimensions: meta.dimensions,
        embeddingModel: meta.embeddingModel,
        savedAt: new Date().toISOString(),
        embEncoding: "f32-base64",
      },
      entries: {},
    };
    for (const e of index.entries()) {
      out.entries[e.chunkId] = {
        documentId: e.documentId,
        chunkIndex: e.chunkIndex,
        vector: encodeVector(e.vector),
        text: e.text,
        span: { start: e.span.start, end: e.span.end },
        metadata: { ...e.metadata },
      };
    }
    const tmp = `${this.storePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.storePath), { recursive: true });
      await fs.writeFile(tmp, JSON.stringify(out));
      await fs.rename(tmp, this.storePath);
    } catch (e) {
      await fs.rm(tmp, { force: true });
      throw new IndexStoreError(this.storePath, "cannot write store", { cause: e });
    }
    if (this.verbose) console.error(`[RAG][verbose] Persisted index to ${this.storePath}`);
  }
}
