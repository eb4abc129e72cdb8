import fs from "node:fs/promises";
import { ExtractionError } from "../errors";
import { normalizeExtractedText, type ExtractedText, type Extractor } from "./extractor";

/** UTF-8 plain text and Markdown files. */
export class PlainTextExtractor implements Extractor {
  public readonly extensions = ["txt", "md", "markdown"] as const;

  public async extract(sourcePath: string): Promise<ExtractedText> {
    let raw: string;
    try {
      raw = await fs.readFile(sourcePath, "utf8");
    } catch (e) {
      throw new ExtractionError(sourcePath, "file is not readable", { cause: e });
    }
    const text = normalizeExtractedText(raw);
    if (!text) throw new ExtractionError(sourcePath, "file contains no text");
    return { text };
  }
}
