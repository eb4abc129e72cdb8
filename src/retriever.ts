import { InvalidConfigurationError, RetrievalUnavailableError } from "./errors";
import type { EmbeddingGateway } from "./gateways/embedding";
import { withRetry, type RetryPolicy, type Sleeper } from "./gateways/retry";
import { termOverlap, tokenize } from "./lexical";
import { metadataBonus, type MetadataBoost } from "./metadata";
import type {
  IndexEntry,
  Query,
  RetrievalHit,
  RetrievalResult,
  ScoredEntry,
} from "./types";
import { compareEntryKeys, cosine, type VectorIndex } from "./vector-index";

export interface MmrOptions {
  /** Relevance vs. diversity trade-off in [0, 1]; 1 is pure relevance. */
  lambda: number;
  /** Candidates fetched from the index before diversification. */
  fetchK: number;
}

export interface RetrieverOptions {
  index: VectorIndex;
  embedder: EmbeddingGateway;
  retry: RetryPolicy;
  /** Weight of the lexical overlap boost; 0 disables re-ranking. */
  lexicalWeight?: number;
  /** Bonuses added to the score of candidates whose metadata matches. */
  metadataBoosts?: readonly MetadataBoost[];
  /** Candidates fetched for re-ranking (default 3 × topK). */
  rerankFetchK?: number;
  /** Enable maximal-marginal-relevance diversification. */
  mmr?: MmrOptions;
  sleeper?: Sleeper;
  verbose?: boolean;
}

interface Candidate {
  entry: IndexEntry;
  similarity: number;
  score: number;
}

function byScore(a: Candidate, b: Candidate): number {
  if (a.score !== b.score) return b.score - a.score;
  return compareEntryKeys(a.entry, b.entry);
}

function toHit(c: Candidate): RetrievalHit {
  return {
    chunk: {
      id: c.entry.chunkId,
      documentId: c.entry.documentId,
      index: c.entry.chunkIndex,
      text: c.entry.text,
      metadata: c.entry.metadata,
    },
    score: c.score,
    similarity: c.similarity,
  };
}

/**
 * Greedy maximal marginal relevance: repeatedly pick the candidate maximizing
 * `lambda * score - (1 - lambda) * max similarity to already picked ones`.
 */
function selectMmr(candidates: readonly Candidate[], k: number, lambda: number): Candidate[] {
  const pool = [...candidates].sort(byScore);
  const picked: Candidate[] = [];
  while (picked.length < k && pool.length > 0) {
    let bestIdx = 0;
    let bestValue = -Infinity;
    for (let i = 0; i < pool.length; i++) {
      const c = pool[i];
      let redundancy = 0;
      for (const p of picked) redundancy = Math.max(redundancy, cosine(c.entry.vector, p.entry.vector));
      const value = lambda * c.score - (1 - lambda) * redundancy;
      // strict > keeps the earlier (better ranked) candidate on ties
      if (value > bestValue) {
        bestValue = value;
        bestIdx = i;
      }
    }
    picked.push(pool[bestIdx]);
    pool.splice(bestIdx, 1);
  }
  return picked;
}

/**
 * Query-side retrieval: embeds the question, pulls nearest neighbours from the
 * index, optionally re-ranks (lexical and metadata boosts, MMR), and
 * truncates to top-k.
 */
export class Retriever {
  private readonly index: VectorIndex;
  private readonly embedder: EmbeddingGateway;
  private readonly retry: RetryPolicy;
  private readonly lexicalWeight: number;
  private readonly metadataBoosts: readonly MetadataBoost[];
  private readonly rerankFetchK?: number;
  private readonly mmr?: MmrOptions;
  private readonly sleeper?: Sleeper;
  private readonly verbose: boolean;

  public constructor(opts: RetrieverOptions) {
    this.index = opts.index;
    this.embedder = opts.embedder;
    this.retry = opts.retry;
    this.lexicalWeight = opts.lexicalWeight ?? 0;
    this.metadataBoosts = opts.metadataBoosts ?? [];
    this.rerankFetchK = opts.rerankFetchK;
    this.mmr = opts.mmr;
    this.sleeper = opts.sleeper;
    this.verbose = !!opts.verbose;
    if (this.lexicalWeight < 0) {
      throw new InvalidConfigurationError(`lexicalWeight must be >= 0 (got ${this.lexicalWeight})`);
    }
    if (this.mmr && (this.mmr.lambda < 0 || this.mmr.lambda > 1)) {
      throw new InvalidConfigurationError(`MMR lambda must be within [0, 1] (got ${this.mmr.lambda})`);
    }
  }

  /**
   * @throws {RetrievalUnavailableError} the embedding gateway failed permanently or exhausted its retries
   * @throws {InvalidConfigurationError} topK is not a positive integer
   */
  public async retrieve(query: Query, signal?: AbortSignal): Promise<RetrievalResult> {
    const { text: queryText, topK, filters } = query;
    if (!Number.isInteger(topK) || topK < 1) {
      throw new InvalidConfigurationError(`top_k must be a positive integer (got ${topK})`);
    }
    if (this.index.size === 0) return { query: queryText, hits: [] };

    const embedded = await withRetry(() => this.embedder.embed([queryText], signal), {
      policy: this.retry,
      signal,
      sleeper: this.sleeper,
      label: "embed query",
      verbose: this.verbose,
    });
    if (!embedded.ok) throw new RetrievalUnavailableError(queryText, embedded.error);
    const vector = Float32Array.from(embedded.value[0] ?? []);

    const reranking = this.lexicalWeight > 0 || this.metadataBoosts.length > 0 || this.mmr !== undefined;
    const fetchK = reranking
      ? Math.max(topK, this.mmr?.fetchK ?? 0, this.rerankFetchK ?? topK * 3)
      : topK;
    const scored: ScoredEntry[] = this.index.query(vector, fetchK, filters);

    const queryTerms = this.lexicalWeight > 0 ? tokenize(queryText) : [];
    let candidates: Candidate[] = scored.map(({ entry, score }) => {
      let boosted = score + metadataBonus(entry.metadata, this.metadataBoosts);
      if (this.lexicalWeight > 0) boosted += this.lexicalWeight * termOverlap(queryTerms, entry.text);
      return { entry, similarity: score, score: boosted };
    });

    if (this.mmr) candidates = selectMmr(candidates, topK, this.mmr.lambda);
    const hits = candidates.sort(byScore).slice(0, topK).map(toHit);
    if (this.verbose) {
      console.error(
        `[RAG][verbose] Retrieved ${hits.length}/${scored.length} candidates for "${queryText}"`,
      );
    }
    return { query: queryText, hits };
  }
}
