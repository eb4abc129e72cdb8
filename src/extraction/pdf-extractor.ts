/**
 * PDF text extraction with a persistent text cache.
 *
 * Extracted text is stored in a single `pdf-text-cache.json` next to the index
 * store, so unchanged PDFs are not re-parsed on the next ingestion:
 *
 *   {
 *     "version": 1,
 *     "entries": {
 *       "/absolute/path/to/file.pdf": {
 *         "pdfSize": 12345,
 *         "extractedAt": "2024-01-01T00:00:00.000Z",
 *         "text": "extracted text content...",
 *         "pageCount": 10
 *       }
 *     }
 *   }
 *
 * A cache entry is stale when the PDF size changed. A missing or corrupt
 * cache file is treated as empty.
 *
 * pdf-parse is the single extractor for PDFs; there is no fallback parser.
 */
import fs from "node:fs/promises";
import path from "node:path";
import { PDFParse } from "pdf-parse";
import { z } from "zod";
import { ExtractionError } from "../errors";
import { normalizeExtractedText, type ExtractedText, type Extractor } from "./extractor";

const PdfCacheEntrySchema = z.object({
  pdfSize: z.number(),
  extractedAt: z.string(),
  text: z.string(),
  pageCount: z.number(),
});

export type PdfCacheEntry = z.infer<typeof PdfCacheEntrySchema>;

const PdfCacheStoreSchema = z.object({
  version: z.literal(1),
  entries: z.record(PdfCacheEntrySchema),
});

type PdfCacheStore = z.infer<typeof PdfCacheStoreSchema>;

export const PDF_CACHE_FILE = "pdf-text-cache.json";

/** Raw text and page count of a PDF's bytes. */
export type PdfTextParser = (data: Buffer) => Promise<{ text: string; pageCount: number }>;

export const parseWithPdfParse: PdfTextParser = async (data) => {
  const parser = new PDFParse({ data });
  try {
    const result = await parser.getText();
    return { text: result.text, pageCount: result.pages.length };
  } finally {
    await parser.destroy();
  }
};

export interface PdfExtractorOptions {
  /** Directory holding the cache file; omit to disable caching. */
  cacheDir?: string;
  /** Defaults to {@link parseWithPdfParse}. */
  parser?: PdfTextParser;
  verbose?: boolean;
}

export class PdfExtractor implements Extractor {
  public readonly extensions = ["pdf"] as const;
  private readonly cacheFilePath: string | undefined;
  private readonly parser: PdfTextParser;
  private readonly verbose: boolean;
  private cacheStore: Promise<PdfCacheStore> | null = null;
  // Saves are chained so parallel extractions never interleave writes.
  private saveChain: Promise<void> = Promise.resolve();

  public constructor(opts: PdfExtractorOptions = {}) {
    this.cacheFilePath = opts.cacheDir ? path.join(opts.cacheDir, PDF_CACHE_FILE) : undefined;
    this.parser = opts.parser ?? parseWithPdfParse;
    this.verbose = opts.verbose ?? false;
  }

  private loadCacheStore(): Promise<PdfCacheStore> {
    if (!this.cacheStore) {
      this.cacheStore = (async () => {
        if (!this.cacheFilePath) return { version: 1 as const, entries: {} };
        try {
          const parsed = PdfCacheStoreSchema.safeParse(
            JSON.parse(await fs.readFile(this.cacheFilePath, "utf8")),
          );
          if (parsed.success) return parsed.data;
          console.error(`[PDF] Ignoring malformed cache at ${this.cacheFilePath}`);
        } catch {
          // missing cache file: start fresh
        }
        return { version: 1 as const, entries: {} };
      })();
    }
    return this.cacheStore;
  }

  private saveCacheStore(store: PdfCacheStore): Promise<void> {
    const file = this.cacheFilePath;
    if (!file) return Promise.resolve();
    this.saveChain = this.saveChain.then(async () => {
      try {
        await fs.mkdir(path.dirname(file), { recursive: true });
        await fs.writeFile(file, JSON.stringify(store, null, 2), "utf8");
      } catch (e) {
        // The cache is an optimisation; extraction already succeeded.
        console.error(`[PDF] Failed to save cache store:`, e);
      }
    });
    return this.saveChain;
  }

  /**
   * Cached text for a PDF if the entry matches the current file size.
   */
  public async getFromCache(pdfAbsPath: string, pdfSize: number): Promise<PdfCacheEntry | null> {
    const store = await this.loadCacheStore();
    const entry = store.entries[pdfAbsPath];
    if (!entry) {
      if (this.verbose) console.error(`[PDF] Cache miss for ${path.basename(pdfAbsPath)}`);
      return null;
    }
    if (entry.pdfSize === pdfSize && entry.text) {
      if (this.verbose) console.error(`[PDF] Cache hit for ${path.basename(pdfAbsPath)}`);
      return entry;
    }
    if (this.verbose) {
      console.error(`[PDF] Cache stale for ${path.basename(pdfAbsPath)} (size mismatch)`);
    }
    return null;
  }

  public async extract(sourcePath: string): Promise<ExtractedText> {
    const abs = path.resolve(sourcePath);
    let size: number;
    try {
      size = (await fs.stat(abs)).size;
    } catch (e) {
      throw new ExtractionError(sourcePath, "file is not readable", { cause: e });
    }

    const cached = await this.getFromCache(abs, size);
    if (cached) return { text: cached.text, pageCount: cached.pageCount };

    if (this.verbose) console.error(`[PDF] Extracting text from ${path.basename(abs)}...`);
    let rawText: string;
    let pageCount: number;
    try {
      ({ text: rawText, pageCount } = await this.parser(await fs.readFile(abs)));
    } catch (e) {
      throw new ExtractionError(sourcePath, `corrupt or unreadable PDF (${String(e)})`, { cause: e });
    }

    const text = normalizeExtractedText(rawText);
    if (!text) {
      throw new ExtractionError(sourcePath, "PDF contains no extractable text (scanned image?)");
    }

    const store = await this.loadCacheStore();
    store.entries[abs] = { pdfSize: size, extractedAt: new Date().toISOString(), text, pageCount };
    await this.saveCacheStore(store);
    if (this.verbose) console.error(`[PDF] Cached text for ${path.basename(abs)}`);
    return { text, pageCount };
  }
}
