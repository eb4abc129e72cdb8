#!/usr/bin/env node
/**
 * Command-line entry point.
 *
 * High-level flow:
 * 1. Load environment configuration (.env in the project root, else the working directory).
 * 2. Parse and validate every runtime knob (see below).
 * 3. Build the pipeline: OpenAI-compatible embedding + generation gateways,
 *    PDF / plain-text extractors, in-memory vector index persisted to INDEX_STORE_PATH.
 * 4. Run one CLI command, save the index if it changed, exit with the command's code.
 *
 * ENVIRONMENT VARIABLES (all optional unless marked required):
 *  - OPENAI_API_KEY        API key for the gateways (required by ingest / ask / search).
 *  - OPENAI_BASE_URL       OpenAI-compatible endpoint (default https://api.openai.com/v1).
 *  - EMBED_MODEL           Embedding model (default text-embedding-3-small).
 *  - EMBED_DIMENSIONS      Vector dimensionality (default 1536).
 *  - EMBED_BATCH_SIZE      Chunks per embedding request (default 64).
 *  - LLM_MODEL             Chat model used for answers (default gpt-4o-mini).
 *  - LLM_TEMPERATURE       Sampling temperature (default 0.2).
 *  - MAX_CHUNK_SIZE        Max characters per chunk (default 1000).
 *  - CHUNK_OVERLAP         Overlap characters between adjacent chunks (default 200).
 *  - TOP_K                 Passages retrieved per question (default 6).
 *  - TOKEN_BUDGET          Prompt budget in estimated tokens (default 3000).
 *  - LEXICAL_WEIGHT        Keyword-overlap boost added to similarity (default 0.1, 0 disables).
 *  - METADATA_BOOSTS       Score bonuses by chunk metadata, e.g. importance=high:0.2,year>=2019:0.1.
 *  - RETRIEVAL_MODE        'similarity' (default) or 'mmr' for diversified results.
 *  - MMR_LAMBDA            Relevance / diversity balance for mmr (default 0.7).
 *  - MMR_FETCH_K           Candidates considered by mmr (default 10).
 *  - INDEX_STORE_PATH      Persisted index file (default .docqa/index.json).
 *  - INGEST_CONCURRENCY    Documents ingested in parallel (default 2).
 *  - GATEWAY_TIMEOUT_MS    Per-request timeout (default 60000).
 *  - GATEWAY_MAX_ATTEMPTS  Attempts per gateway call, including the first (default 4).
 *  - GATEWAY_BACKOFF_MS    Delay before the first retry, doubled each time (default 500).
 *  - VERBOSE               If '1'/'true'/etc enables extra logging.
 */
import path from "node:path";
import { needsGateways, runCli, type CliCommand } from "./cli";
import { getConfig, loadEnvironment, requireApiKey, type Config } from "./config";
import { ExtractorRegistry } from "./extraction/extractor";
import { PdfExtractor } from "./extraction/pdf-extractor";
import { PlainTextExtractor } from "./extraction/text-extractor";
import { OpenAIEmbeddingGateway } from "./gateways/embedding";
import { OpenAIGenerationGateway } from "./gateways/generation";
import { DEFAULT_RETRY_POLICY } from "./gateways/retry";
import { IndexStore } from "./persistence";
import { Pipeline } from "./pipeline";
import { VectorIndex } from "./vector-index";

function buildPipeline(config: Config, command: CliCommand): Pipeline {
  const apiKey = needsGateways(command) ? requireApiKey(config) : config.OPENAI_API_KEY;
  const client = { apiKey, baseUrl: config.OPENAI_BASE_URL, timeoutMs: config.GATEWAY_TIMEOUT_MS };
  const storePath = path.resolve(config.INDEX_STORE_PATH);

  return new Pipeline({
    index: new VectorIndex({ dimensions: config.EMBED_DIMENSIONS }),
    embedder: new OpenAIEmbeddingGateway({
      ...client,
      model: config.EMBED_MODEL,
      dimensions: config.EMBED_DIMENSIONS,
    }),
    generator: new OpenAIGenerationGateway({
      ...client,
      model: config.LLM_MODEL,
      temperature: config.LLM_TEMPERATURE,
    }),
    extractors: new ExtractorRegistry([
      new PdfExtractor({ cacheDir: path.dirname(storePath), verbose: config.VERBOSE }),
      new PlainTextExtractor(),
    ]),
    store: new IndexStore(storePath, config.VERBOSE),
    settings: {
      chunker: { maxChunkSize: config.MAX_CHUNK_SIZE, overlap: config.CHUNK_OVERLAP },
      topK: config.TOP_K,
      tokenBudget: config.TOKEN_BUDGET,
      embedBatchSize: config.EMBED_BATCH_SIZE,
      ingestConcurrency: config.INGEST_CONCURRENCY,
    },
    retry: {
      ...DEFAULT_RETRY_POLICY,
      maxAttempts: config.GATEWAY_MAX_ATTEMPTS,
      baseDelayMs: config.GATEWAY_BACKOFF_MS,
    },
    retrieval: {
      lexicalWeight: config.LEXICAL_WEIGHT,
      metadataBoosts: config.METADATA_BOOSTS,
      mmr:
        config.RETRIEVAL_MODE === "mmr"
          ? { lambda: config.MMR_LAMBDA, fetchK: config.MMR_FETCH_K }
          : undefined,
    },
    verbose: config.VERBOSE,
  });
}

async function main(): Promise<void> {
  loadEnvironment();
  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.error("[RAG] Interrupted; cancelling...");
    controller.abort();
  });

  process.exitCode = await runCli(process.argv.slice(2), {
    signal: controller.signal,
    openPipeline: async (command) => {
      const config = getConfig();
      if (config.VERBOSE) console.error(`[RAG][verbose] Index store: ${path.resolve(config.INDEX_STORE_PATH)}`);
      const pipeline = buildPipeline(config, command);
      await pipeline.open();
      return pipeline;
    },
  });
}

main().catch((err) => {
  console.error("[RAG] Fatal:", err);
  process.exit(1);
});
