import path from "node:path";
import { ExtractionError } from "../errors";
import type { Document, Metadata } from "../types";

export interface ExtractedText {
  text: string;
  /** Page count for paginated formats. */
  pageCount?: number;
}

/** Turns one source file into plain text. */
export interface Extractor {
  /** Lower-case extensions without the leading dot. */
  readonly extensions: readonly string[];
  /**
   * @throws {ExtractionError} unreadable, corrupt or empty input
   */
  extract(sourcePath: string): Promise<ExtractedText>;
}

/**
 * Normalize extracted text: drop control characters, collapse runs of spaces
 * and tabs, trim line ends, and cap blank-line runs at one, so paragraph
 * breaks survive for the chunker.
 */
export function normalizeExtractedText(raw: string): string {
  return raw
    .replace(/\r\n?/g, "\n")
    .replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F]/g, "")
    .replace(/[ \t\u00A0]+/g, " ")
    .replace(/ *\n */g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/** Lower-case extension of a path without the dot ("" when none). */
export function extensionOf(filePath: string): string {
  return path.extname(filePath).slice(1).toLowerCase();
}

/**
 * Closed set of extractors selected by file extension. The first extractor
 * registered for an extension wins.
 */
export class ExtractorRegistry {
  private readonly byExt = new Map<string, Extractor>();

  public constructor(extractors: readonly Extractor[]) {
    for (const ex of extractors) {
      for (const ext of ex.extensions) {
        if (!this.byExt.has(ext)) this.byExt.set(ext, ex);
      }
    }
  }

  /** Extensions that have an extractor, sorted. */
  public supportedExtensions(): string[] {
    return [...this.byExt.keys()].sort();
  }

  /** @throws {ExtractionError} when no extractor handles the file type */
  public select(filePath: string): Extractor {
    const ext = extensionOf(filePath);
    const ex = this.byExt.get(ext);
    if (!ex) {
      throw new ExtractionError(
        filePath,
        `unsupported file type "${ext || "(none)"}" (supported: ${this.supportedExtensions().join(", ")})`,
      );
    }
    return ex;
  }

  /**
   * Extract with the extractor registered for the file's extension.
   *
   * @throws {ExtractionError} unsupported type, or the extractor's own failure
   */
  public extract(filePath: string): Promise<ExtractedText> {
    return this.select(filePath).extract(filePath);
  }
}

/**
 * Stable document id for a source path: the path relative to `root` with
 * forward slashes, so re-ingesting a file replaces its previous version.
 */
export function documentIdFor(sourcePath: string, root = process.cwd()): string {
  const rel = path.relative(root, path.resolve(root, sourcePath));
  const id = rel && !rel.startsWith("..") && !path.isAbsolute(rel) ? rel : path.resolve(root, sourcePath);
  return id.split(path.sep).join("/");
}

export interface CreateDocumentOptions {
  id?: string;
  metadata?: Metadata;
  extractedAt?: Date;
}

/** Build an immutable {@link Document}. */
export function createDocument(
  sourcePath: string,
  text: string,
  opts: CreateDocumentOptions = {},
): Document {
  return Object.freeze({
    id: opts.id ?? documentIdFor(sourcePath),
    sourcePath,
    text,
    extractedAt: (opts.extractedAt ?? new Date()).toISOString(),
    metadata: Object.freeze({ ...opts.metadata }),
  });
}
