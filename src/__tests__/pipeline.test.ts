import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  CancelledError,
  DimensionMismatchError,
  ExtractionError,
  GatewayError,
  InvalidConfigurationError,
  PipelineStateError,
  RetrievalUnavailableError,
} from "../errors";
import {
  createDocument,
  documentIdFor,
  ExtractorRegistry,
  type ExtractedText,
  type Extractor,
} from "../extraction/extractor";
import { PlainTextExtractor } from "../extraction/text-extractor";
import type { RetryPolicy } from "../gateways/retry";
import { IndexStore } from "../persistence";
import { Pipeline, type PipelineSettings } from "../pipeline";
import { NO_CONTEXT_MARKER } from "../prompt-assembler";
import { VectorIndex } from "../vector-index";
import { KeywordEmbedder, ScriptedGenerator } from "./helpers/fakes";

const VOCAB = ["photosynthesis", "volcano", "glacier"];

const PARAGRAPHS = [
  "Photosynthesis turns sunlight into sugar inside plant leaves.",
  "A volcano erupts when magma rises through the crust.",
  "A glacier is a slow river of ice carved into valleys.",
];
const NATURE_TEXT = PARAGRAPHS.join("\n\n");

const SETTINGS: PipelineSettings = {
  chunker: { maxChunkSize: 80, overlap: 0, boundaryWindow: 40 },
  topK: 1,
  tokenBudget: 3000,
  embedBatchSize: 64,
  ingestConcurrency: 2,
};

const RETRY: RetryPolicy = { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1 };
const noSleep = async () => undefined;

/** Counts overlapping extractions; every call yields twice before returning. */
class CountingExtractor implements Extractor {
  public readonly extensions = ["txt"];
  public active = 0;
  public peak = 0;

  public async extract(sourcePath: string): Promise<ExtractedText> {
    this.active++;
    this.peak = Math.max(this.peak, this.active);
    await tick();
    await tick();
    this.active--;
    return { text: `The glacier of ${path.basename(sourcePath)}.` };
  }
}

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

function makePipeline(
  opts: { settings?: Partial<PipelineSettings>; store?: IndexStore; extractors?: ExtractorRegistry } = {},
) {
  const embedder = new KeywordEmbedder(VOCAB);
  const generator = new ScriptedGenerator();
  const index = new VectorIndex({ dimensions: embedder.dimensions });
  const pipeline = new Pipeline({
    index,
    embedder,
    generator,
    extractors: opts.extractors ?? new ExtractorRegistry([new PlainTextExtractor()]),
    store: opts.store,
    settings: { ...SETTINGS, ...opts.settings },
    retry: RETRY,
    sleeper: noSleep,
  });
  return { pipeline, embedder, generator, index };
}

const natureDoc = (text = NATURE_TEXT) => createDocument("docs/nature.txt", text);

function snapshot(index: VectorIndex) {
  return index.entries().map((e) => ({ ...e, vector: Array.from(e.vector) }));
}

let errorSpy: jest.SpyInstance;
beforeEach(() => {
  errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
});
afterEach(() => errorSpy.mockRestore());

describe("Pipeline ingestion", () => {
  it("splits a document into chunks and indexes one entry per chunk", async () => {
    const { pipeline, index } = makePipeline();
    await expect(pipeline.ingest(natureDoc())).resolves.toEqual({
      documentId: "docs/nature.txt",
      chunks: 3,
      replaced: 0,
    });
    expect(index.entriesFor("docs/nature.txt").map((e) => [e.chunkId, e.text, e.span.start, e.span.end])).toEqual([
      ["docs/nature.txt#0", `${PARAGRAPHS[0]}\n\n`, 0, 63],
      ["docs/nature.txt#1", `${PARAGRAPHS[1]}\n\n`, 63, 117],
      ["docs/nature.txt#2", PARAGRAPHS[2], 117, 170],
    ]);
    expect(index.get("docs/nature.txt#1")?.metadata).toEqual({ source: "docs/nature.txt" });
  });

  it("embeds chunks in batches", async () => {
    const { pipeline, embedder } = makePipeline({ settings: { embedBatchSize: 2 } });
    await pipeline.ingest(natureDoc());
    expect(embedder.calls.map((c) => c.length)).toEqual([2, 1]);
  });

  it("is idempotent for identical content", async () => {
    const { pipeline, index } = makePipeline();
    await pipeline.ingest(natureDoc());
    const first = snapshot(index);
    await expect(pipeline.ingest(natureDoc())).resolves.toMatchObject({ chunks: 3, replaced: 3 });
    expect(snapshot(index)).toEqual(first);
    expect(index.size).toBe(3);
  });

  it("replaces the previous version of a document", async () => {
    const { pipeline, index } = makePipeline();
    await pipeline.ingest(natureDoc());
    await pipeline.ingest(natureDoc("Only a volcano now."));
    expect(index.entriesFor("docs/nature.txt").map((e) => e.text)).toEqual(["Only a volcano now."]);
  });

  it("leaves the index untouched when cancelled before the call", async () => {
    const { pipeline, index, embedder } = makePipeline();
    const controller = new AbortController();
    controller.abort();
    await expect(pipeline.ingest(natureDoc(), { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
    expect(index.size).toBe(0);
    expect(embedder.calls).toEqual([]);
  });

  it("keeps the previous version when cancelled during embedding", async () => {
    const { pipeline, index, embedder } = makePipeline();
    await pipeline.ingest(natureDoc());
    const before = snapshot(index);

    const controller = new AbortController();
    embedder.onEmbed = () => controller.abort();
    await expect(
      pipeline.ingest(natureDoc("A completely different glacier text."), { signal: controller.signal }),
    ).rejects.toThrow("ingest docs/nature.txt was cancelled");
    expect(snapshot(index)).toEqual(before);
    expect(pipeline.status().indexing).toMatchObject({ documentsIngested: 1, documentsFailed: 1 });
  });

  it("rejects vectors of the wrong dimensionality and indexes nothing", async () => {
    const { pipeline, index, embedder } = makePipeline();
    embedder.padding = 1;
    await expect(pipeline.ingest(natureDoc())).rejects.toThrow(
      new DimensionMismatchError(4, 5, "chunk docs/nature.txt#0"),
    );
    expect(index.size).toBe(0);
  });

  it("surfaces embedding failures after exhausting retries", async () => {
    const { pipeline, index, embedder } = makePipeline();
    for (let i = 0; i < 3; i++) embedder.failures.push(new GatewayError("transient", "embed", "HTTP 503"));
    const failure = pipeline.ingest(natureDoc());
    await expect(failure).rejects.toBeInstanceOf(GatewayError);
    await expect(failure).rejects.toMatchObject({ attempts: 3, kind: "transient" });
    expect(index.size).toBe(0);
  });

  it("isolates extraction failures to their own source", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "docqa-ingest-"));
    try {
      const good = path.join(dir, "good.txt");
      const unsupported = path.join(dir, "slides.docx");
      const missing = path.join(dir, "missing.txt");
      await fs.writeFile(good, "The glacier carved the valley.");
      await fs.writeFile(unsupported, "binary");

      const { pipeline, index } = makePipeline();
      const outcomes = await pipeline.ingestSources([good, unsupported, missing], { metadata: { lang: "en" } });

      expect(outcomes.map((o) => [o.path, o.ok])).toEqual([
        [good, true],
        [unsupported, false],
        [missing, false],
      ]);
      for (const o of outcomes.slice(1)) {
        if (!o.ok) expect(o.error).toBeInstanceOf(ExtractionError);
      }
      expect(index.documentIds()).toEqual([documentIdFor(good)]);
      expect(index.entriesFor(documentIdFor(good))[0].metadata).toEqual({ source: good, title: "good", lang: "en" });
      expect(pipeline.status().indexing).toMatchObject({ documentsIngested: 1, documentsFailed: 2 });
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});

describe("Pipeline answering", () => {
  it("cites exactly the chunk about the asked topic", async () => {
    const { pipeline, generator } = makePipeline();
    await pipeline.ingest(natureDoc());

    const answer = await pipeline.answer("What is photosynthesis?");
    expect(answer.text).toBe("Scripted answer.");
    expect(answer.usedContext).toBe(true);
    expect(answer.citations).toEqual([
      {
        chunkId: "docs/nature.txt#0",
        documentId: "docs/nature.txt",
        chunkIndex: 0,
        source: "docs/nature.txt",
        score: expect.closeTo(1, 6),
      },
    ]);

    expect(generator.prompts).toHaveLength(1);
    const prompt = generator.prompts[0];
    expect(prompt).toContain("----- [1] docs/nature.txt#0 (docs/nature.txt, chunk 0) -----");
    expect(prompt).toContain(PARAGRAPHS[0]);
    expect(prompt).not.toContain("volcano");
    expect(prompt).toContain("Question: What is photosynthesis?");
  });

  it("answers from an empty index with no citations", async () => {
    const { pipeline, generator, embedder } = makePipeline();
    const answer = await pipeline.answer("What is photosynthesis?");
    expect(answer.citations).toEqual([]);
    expect(answer.usedContext).toBe(false);
    expect(answer.retrieval.hits).toEqual([]);
    expect(generator.prompts[0]).toContain(NO_CONTEXT_MARKER);
    expect(embedder.calls).toEqual([]);
  });

  it("forgets deleted documents, also under a filter on their id", async () => {
    const { pipeline } = makePipeline({ settings: { topK: 5 } });
    await pipeline.ingest(natureDoc());
    await pipeline.ingest(createDocument("docs/ice.txt", "Glacier ice moves slowly."));

    await expect(pipeline.deleteDocument("docs/nature.txt")).resolves.toBe(3);
    await expect(pipeline.deleteDocument("docs/nature.txt")).resolves.toBe(0);

    const filtered = await pipeline.search("What is photosynthesis?", { filters: { documentId: "docs/nature.txt" } });
    expect(filtered.hits).toEqual([]);
    const all = await pipeline.search("What is photosynthesis?");
    expect(all.hits.map((h) => h.chunk.id)).toEqual(["docs/ice.txt#0"]);
    expect(pipeline.listDocuments()).toEqual([{ documentId: "docs/ice.txt", chunks: 1, source: "docs/ice.txt" }]);
  });

  it("reports the querying state while generating", async () => {
    const { pipeline, generator } = makePipeline();
    expect(pipeline.status().state).toBe("idle");
    await pipeline.ingest(natureDoc());
    expect(pipeline.status().state).toBe("ready");

    const seen: string[] = [];
    generator.onGenerate = () => seen.push(pipeline.status().state);
    await pipeline.answer("What is a volcano?");
    expect(seen).toEqual(["querying"]);
    expect(pipeline.status().state).toBe("ready");
  });

  it("fails without generating when the question cannot be embedded", async () => {
    const { pipeline, embedder, generator } = makePipeline();
    await pipeline.ingest(natureDoc());
    embedder.failures.push(new GatewayError("permanent", "embed", "HTTP 400"));
    await expect(pipeline.answer("What is photosynthesis?")).rejects.toBeInstanceOf(RetrievalUnavailableError);
    expect(generator.prompts).toEqual([]);
  });

  it("surfaces a permanent generation failure at once", async () => {
    const { pipeline, generator } = makePipeline();
    await pipeline.ingest(natureDoc());
    generator.failures.push(new GatewayError("permanent", "generate", "HTTP 400"));
    await expect(pipeline.answer("What is photosynthesis?")).rejects.toThrow(
      "generate gateway permanent failure: HTTP 400",
    );
    expect(generator.prompts).toHaveLength(1);
  });

  it("retries transient generation failures", async () => {
    const { pipeline, generator } = makePipeline();
    await pipeline.ingest(natureDoc());
    generator.failures.push(new GatewayError("transient", "generate", "HTTP 503"));
    await expect(pipeline.answer("What is photosynthesis?")).resolves.toMatchObject({ text: "Scripted answer." });
    expect(generator.prompts).toHaveLength(2);
  });

  it("rejects an empty question", async () => {
    const { pipeline } = makePipeline();
    await expect(pipeline.answer("   ")).rejects.toBeInstanceOf(InvalidConfigurationError);
  });
});

describe("Pipeline concurrency", () => {
  it("applies concurrent ingests of one document in call order", async () => {
    const { pipeline, embedder, index } = makePipeline();
    const gate = deferred();
    const order: string[] = [];
    embedder.onEmbed = (texts) => {
      order.push(texts[0]);
      return texts[0].startsWith("First") ? gate.promise : undefined;
    };

    const first = pipeline.ingest(natureDoc("First glacier draft."));
    const second = pipeline.ingest(natureDoc("Second glacier draft."));
    await tick();
    expect(order).toEqual(["First glacier draft."]);

    gate.resolve();
    await expect(first).resolves.toEqual({ documentId: "docs/nature.txt", chunks: 1, replaced: 0 });
    await expect(second).resolves.toEqual({ documentId: "docs/nature.txt", chunks: 1, replaced: 1 });
    expect(order).toEqual(["First glacier draft.", "Second glacier draft."]);
    expect(index.entriesFor("docs/nature.txt").map((e) => e.text)).toEqual(["Second glacier draft."]);
  });

  it("hides a document from searches until all its chunks are indexed", async () => {
    const { pipeline, embedder } = makePipeline({ settings: { topK: 5 } });
    await pipeline.ingest(createDocument("docs/ice.txt", "Glacier ice moves slowly."));
    const gate = deferred();
    embedder.onEmbed = (texts) => (texts.length === 3 ? gate.promise : undefined);

    const ingesting = pipeline.ingest(natureDoc());
    await tick();
    const during = await pipeline.search("Tell me about the glacier");
    expect(during.hits.map((h) => h.chunk.id)).toEqual(["docs/ice.txt#0"]);

    gate.resolve();
    await ingesting;
    const after = await pipeline.search("Tell me about the glacier");
    expect(after.hits.map((h) => h.chunk.id)).toEqual([
      "docs/ice.txt#0",
      "docs/nature.txt#2",
      "docs/nature.txt#0",
      "docs/nature.txt#1",
    ]);
  });

  it("keeps at most ingestConcurrency extractions in flight", async () => {
    const extractor = new CountingExtractor();
    const { pipeline, index } = makePipeline({ extractors: new ExtractorRegistry([extractor]) });
    const sources = ["a.txt", "b.txt", "c.txt", "d.txt", "e.txt"].map((name) => path.join("docs", name));

    const outcomes = await pipeline.ingestSources(sources);
    expect(outcomes.map((o) => o.ok)).toEqual([true, true, true, true, true]);
    expect(extractor.peak).toBe(2);
    expect(extractor.active).toBe(0);
    expect(index.documentIds()).toHaveLength(5);
  });
});

describe("Pipeline lifecycle", () => {
  let dir: string;
  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "docqa-pipeline-"));
  });
  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("persists the index and reloads it on open", async () => {
    const storePath = path.join(dir, "index.json");
    const first = makePipeline({ store: new IndexStore(storePath) });
    await expect(first.pipeline.open()).resolves.toBe(0);
    await first.pipeline.ingest(natureDoc());
    expect(first.pipeline.status().dirty).toBe(true);
    await expect(first.pipeline.flush()).resolves.toBe(true);
    await expect(first.pipeline.flush()).resolves.toBe(false);
    await first.pipeline.close();

    const second = makePipeline({ store: new IndexStore(storePath) });
    await expect(second.pipeline.open()).resolves.toBe(3);
    expect(second.pipeline.status()).toMatchObject({
      state: "ready",
      dirty: false,
      indexing: { documents: 1, chunks: 3 },
    });
    const answer = await second.pipeline.answer("Tell me about the glacier");
    expect(answer.citations.map((c) => c.chunkId)).toEqual(["docs/nature.txt#2"]);
  });

  it("saves pending changes on close and refuses calls afterwards", async () => {
    const storePath = path.join(dir, "index.json");
    const { pipeline } = makePipeline({ store: new IndexStore(storePath) });
    await pipeline.open();
    await pipeline.ingest(natureDoc());
    await pipeline.close();
    await expect(fs.access(storePath)).resolves.toBeUndefined();

    expect(pipeline.status().state).toBe("closed");
    await expect(pipeline.answer("anything?")).rejects.toBeInstanceOf(PipelineStateError);
    await expect(pipeline.ingest(natureDoc())).rejects.toBeInstanceOf(PipelineStateError);
    await expect(pipeline.close()).resolves.toBeUndefined();
  });

  it("waits for a running ingest before saving on close", async () => {
    const storePath = path.join(dir, "index.json");
    const { pipeline, embedder } = makePipeline({ store: new IndexStore(storePath) });
    await pipeline.open();
    const gate = deferred();
    embedder.onEmbed = () => gate.promise;

    const pending = pipeline.ingest(natureDoc());
    await tick();
    expect(embedder.calls).toHaveLength(1);
    const closed = pipeline.close();
    expect(pipeline.status().state).toBe("closed");
    await expect(pipeline.ingest(natureDoc())).rejects.toBeInstanceOf(PipelineStateError);

    gate.resolve();
    await expect(pending).resolves.toEqual({ documentId: "docs/nature.txt", chunks: 3, replaced: 0 });
    await expect(closed).resolves.toBeUndefined();
    expect(pipeline.status().dirty).toBe(false);

    const reopened = makePipeline({ store: new IndexStore(storePath) });
    await expect(reopened.pipeline.open()).resolves.toBe(3);
  });

  it("refuses writes to a persisted index until it is opened", async () => {
    const storePath = path.join(dir, "index.json");
    const first = makePipeline({ store: new IndexStore(storePath) });
    await first.pipeline.open();
    await first.pipeline.ingest(natureDoc());
    await first.pipeline.close();

    const second = makePipeline({ store: new IndexStore(storePath) });
    await expect(second.pipeline.ingest(createDocument("docs/ice.txt", "Glacier ice."))).rejects.toThrow(
      new PipelineStateError(`Cannot ingest: call open() to load ${storePath} first`),
    );
    await expect(second.pipeline.deleteDocument("docs/nature.txt")).rejects.toBeInstanceOf(PipelineStateError);
    await expect(second.pipeline.flush()).rejects.toBeInstanceOf(PipelineStateError);
    await second.pipeline.close();

    const third = makePipeline({ store: new IndexStore(storePath) });
    await expect(third.pipeline.open()).resolves.toBe(3);
  });

  it("opens only once", async () => {
    const { pipeline } = makePipeline();
    await pipeline.open();
    await expect(pipeline.open()).rejects.toBeInstanceOf(PipelineStateError);
  });

  it("validates its settings", () => {
    expect(() => makePipeline({ settings: { topK: 0 } })).toThrow(InvalidConfigurationError);
    expect(() => makePipeline({ settings: { chunker: { maxChunkSize: 10, overlap: 10 } } })).toThrow(
      InvalidConfigurationError,
    );
  });
});
