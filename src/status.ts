import { APP_VERSION } from "./config";

/**
 * Lifecycle state of a pipeline. `ingesting` and `querying` are derived from
 * in-flight work; `ingesting` wins when both kinds run at once.
 */
export type PipelineState = "idle" | "ingesting" | "ready" | "querying" | "closed";

/** Counters describing the current index contents and ingestion history. */
export interface IndexingStatus {
  /** Documents currently present in the index. */
  documents: number;
  /** Chunks (index entries) currently present in the index. */
  chunks: number;
  /** Documents successfully ingested since open. */
  documentsIngested: number;
  /** Documents whose ingestion failed since open. */
  documentsFailed: number;
}

/**
 * Snapshot returned by `Pipeline.status()`. Plain data: safe to JSON encode.
 */
export interface PipelineStatus {
  /** Package version (kept in sync with package.json). */
  version: string;
  state: PipelineState;
  embeddingModel: string;
  generationModel: string;
  dimensions: number;
  /** Path of the persisted index, when persistence is enabled. */
  storePath?: string;
  /** True when the index changed since it was last saved. */
  dirty: boolean;
  /** ISO timestamp when the pipeline was created. */
  startedAt: string;
  indexing: IndexingStatus;
}

export interface StatusManagerInit {
  embeddingModel: string;
  generationModel: string;
  dimensions: number;
  storePath?: string;
}

/**
 * Owns the mutable lifecycle bookkeeping of one pipeline: in-flight work
 * counters, ingestion tallies and the closed flag.
 */
export class StatusManager {
  private readonly startedAt = new Date().toISOString();
  private ingestsInFlight = 0;
  private queriesInFlight = 0;
  private hasContent = false;
  private closed = false;
  private ingested = 0;
  private failed = 0;

  public constructor(private readonly init: StatusManagerInit) {}

  public get state(): PipelineState {
    if (this.closed) return "closed";
    if (this.ingestsInFlight > 0) return "ingesting";
    if (this.queriesInFlight > 0) return "querying";
    return this.hasContent ? "ready" : "idle";
  }

  public beginIngest(): void {
    this.ingestsInFlight++;
  }

  /** End one ingestion; `succeeded` feeds the tallies. */
  public endIngest(succeeded: boolean): void {
    this.ingestsInFlight = Math.max(0, this.ingestsInFlight - 1);
    if (succeeded) this.ingested++;
    else this.failed++;
  }

  public beginQuery(): void {
    this.queriesInFlight++;
  }

  public endQuery(): void {
    this.queriesInFlight = Math.max(0, this.queriesInFlight - 1);
  }

  /** Record whether the index holds any entries (`ready` vs `idle`). */
  public setHasContent(value: boolean): void {
    this.hasContent = value;
  }

  public markClosed(): void {
    this.closed = true;
  }

  public snapshot(counts: { documents: number; chunks: number; dirty: boolean }): PipelineStatus {
    return {
      version: APP_VERSION,
      state: this.state,
      embeddingModel: this.init.embeddingModel,
      generationModel: this.init.generationModel,
      dimensions: this.init.dimensions,
      storePath: this.init.storePath,
      dirty: counts.dirty,
      startedAt: this.startedAt,
      indexing: {
        documents: counts.documents,
        chunks: counts.chunks,
        documentsIngested: this.ingested,
        documentsFailed: this.failed,
      },
    };
  }
}
