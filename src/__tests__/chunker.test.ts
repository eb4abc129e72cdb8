import { chunkDocument, chunkId, reconstructText, resolveChunkerConfig } from "../chunker";
import { InvalidConfigurationError } from "../errors";

const ALPHABET = "abcdefghijklmnopqrstuvwxyz";

function chunksOf(text: string, maxChunkSize: number, overlap: number) {
  return [...chunkDocument({ id: "doc.txt", text }, { maxChunkSize, overlap })];
}

describe("chunkDocument", () => {
  it("returns nothing for empty text", () => {
    expect(chunksOf("", 10, 0)).toEqual([]);
  });

  it("returns a single chunk when the text fits", () => {
    const chunks = chunksOf("short text", 100, 10);
    expect(chunks).toEqual([
      { id: "doc.txt#0", documentId: "doc.txt", index: 0, start: 0, end: 10, text: "short text" },
    ]);
  });

  it("cuts after a paragraph break inside the boundary window", () => {
    const text = "Alpha beta gamma. Delta epsilon zeta.\n\nEta theta iota.";
    const chunks = chunksOf(text, 40, 0);
    expect(chunks.map((c) => c.text)).toEqual([
      "Alpha beta gamma. Delta epsilon zeta.\n\n",
      "Eta theta iota.",
    ]);
    expect(chunks.map((c) => [c.start, c.end])).toEqual([
      [0, 39],
      [39, 54],
    ]);
  });

  it("prefers sentence ends, then whitespace", () => {
    const chunks = chunksOf("One two three. Four five six seven eight.", 20, 0);
    expect(chunks.map((c) => c.text)).toEqual(["One two three. ", "Four five six seven ", "eight."]);
  });

  it("hard-cuts at the size limit when no boundary exists", () => {
    expect(chunksOf(ALPHABET, 10, 0).map((c) => c.text)).toEqual(["abcdefghij", "klmnopqrst", "uvwxyz"]);
  });

  it("repeats the overlap at the start of the next chunk", () => {
    const chunks = chunksOf(ALPHABET, 10, 3);
    expect(chunks.map((c) => c.text)).toEqual(["abcdefghij", "hijklmnopq", "opqrstuvwx", "vwxyz"]);
    expect(chunks.map((c) => c.start)).toEqual([0, 7, 14, 21]);
  });

  it("moves the overlap start forward to a word start", () => {
    const chunks = chunksOf("aa bb cc dd ee ff gg", 9, 4);
    expect(chunks.map((c) => c.text)).toEqual(["aa bb cc ", "cc dd ee ", "ee ff gg"]);
  });

  it("never splits a surrogate pair at a hard cut", () => {
    const text = "ab\u{1F600}cd";
    const chunks = chunksOf(text, 3, 0);
    expect(chunks.map((c) => c.text)).toEqual(["ab", "\u{1F600}c", "d"]);
    expect(reconstructText(chunks)).toBe(text);
  });

  it("never starts an overlap inside a surrogate pair", () => {
    const chunks = chunksOf("ab\u{1F600}cdef", 4, 1);
    expect(chunks.map((c) => [c.start, c.end, c.text])).toEqual([
      [0, 4, "ab\u{1F600}"],
      [4, 8, "cdef"],
    ]);
  });

  it("reconstructs the original text from its chunks", () => {
    const text = [
      "Retrieval pipelines split documents into passages.",
      "Each passage is embedded separately, so boundaries matter.\nShort lines stay together.",
      "A final paragraph closes the sample without trailing whitespace.",
    ].join("\n\n");
    for (const [max, overlap] of [
      [40, 0],
      [40, 10],
      [64, 16],
      [25, 24],
    ]) {
      const chunks = chunksOf(text, max, overlap);
      expect(reconstructText(chunks)).toBe(text);
      for (const c of chunks) expect(c.text.length).toBeLessThanOrEqual(max);
      for (let i = 1; i < chunks.length; i++) {
        expect(chunks[i].start).toBeGreaterThan(chunks[i - 1].start);
        expect(chunks[i].end).toBeGreaterThan(chunks[i - 1].end);
        expect(chunks[i].start).toBeLessThanOrEqual(chunks[i - 1].end);
        expect(chunks[i - 1].end - chunks[i].start).toBeLessThanOrEqual(overlap);
      }
    }
  });

  it("is restartable and deterministic", () => {
    const iterable = chunkDocument({ id: "a", text: ALPHABET }, { maxChunkSize: 10, overlap: 3 });
    expect([...iterable]).toEqual([...iterable]);
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() => chunkDocument({ id: "a", text: ALPHABET }, { maxChunkSize: 10, overlap: 10 })).toThrow(
      InvalidConfigurationError,
    );
    expect(() => chunkDocument({ id: "a", text: ALPHABET }, { maxChunkSize: 10, overlap: 12 })).toThrow(
      InvalidConfigurationError,
    );
  });

  it("rejects non-positive chunk sizes and negative overlaps", () => {
    expect(() => resolveChunkerConfig({ maxChunkSize: 0, overlap: 0 })).toThrow(InvalidConfigurationError);
    expect(() => resolveChunkerConfig({ maxChunkSize: 1.5, overlap: 0 })).toThrow(InvalidConfigurationError);
    expect(() => resolveChunkerConfig({ maxChunkSize: 10, overlap: -1 })).toThrow(InvalidConfigurationError);
  });
});

describe("resolveChunkerConfig", () => {
  it("defaults the boundary window to a quarter of the chunk size", () => {
    expect(resolveChunkerConfig({ maxChunkSize: 1000, overlap: 200 })).toEqual({
      maxChunkSize: 1000,
      overlap: 200,
      boundaryWindow: 250,
    });
  });

  it("clamps the window so every chunk advances past the overlap", () => {
    expect(resolveChunkerConfig({ maxChunkSize: 10, overlap: 8 }).boundaryWindow).toBe(1);
  });
});

describe("chunkId", () => {
  it("joins document id and index", () => {
    expect(chunkId("docs/a.md", 3)).toBe("docs/a.md#3");
  });
});
