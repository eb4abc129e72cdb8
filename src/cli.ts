import fg from "fast-glob";
import fs from "node:fs/promises";
import path from "node:path";
import { parseArgs } from "node:util";
import { describeError } from "./errors";
import { parseMetadataValue } from "./metadata";
import type { Pipeline } from "./pipeline";
import type { Answer, Metadata, MetadataValue, RetrievalResult } from "./types";

export const USAGE = `Usage: docqa <command> [options]

Commands:
  ingest <path> [--meta key=value]...       Index a file, or every supported file under a directory
  ask "<question>" [--top-k n] [--filter key=value]...
                                            Answer a question from the indexed documents
  search "<query>" [--top-k n] [--filter key=value]...
                                            Show the passages retrieval would use
  delete <documentId>                       Remove a document from the index
  list                                      List indexed documents
  status                                    Print pipeline status as JSON
  help                                      Show this message`;

export type CliCommand = "ingest" | "ask" | "search" | "delete" | "list" | "status";

const COMMANDS: readonly CliCommand[] = ["ingest", "ask", "search", "delete", "list", "status"];

/** Commands that call the embedding or generation service. */
export function needsGateways(command: CliCommand): boolean {
  return command === "ingest" || command === "ask" || command === "search";
}

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export interface CliDeps {
  /** Build and open the pipeline for a command; called after arguments are validated. */
  openPipeline(command: CliCommand): Promise<Pipeline>;
  io?: CliIO;
  signal?: AbortSignal;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

class UsageError extends Error {}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function isCommand(value: string | undefined): value is CliCommand {
  return COMMANDS.some((c) => c === value);
}

/** Parse repeated `key=value` flags into a flat map. */
export function parsePairs(pairs: readonly string[] | undefined, flag: string): Metadata {
  const out: Record<string, MetadataValue> = {};
  for (const pair of pairs ?? []) {
    const eq = pair.indexOf("=");
    if (eq <= 0) throw new UsageError(`${flag} expects key=value (got "${pair}")`);
    out[pair.slice(0, eq).trim()] = parseMetadataValue(pair.slice(eq + 1).trim());
  }
  return out;
}

function parseTopK(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) throw new UsageError(`--top-k expects a positive integer (got "${raw}")`);
  return n;
}

function parse(command: CliCommand, args: string[]) {
  try {
    return parseArgs({
      args,
      allowPositionals: true,
      strict: true,
      options: {
        meta: { type: "string", multiple: true },
        filter: { type: "string", multiple: true },
        "top-k": { type: "string" },
      },
    });
  } catch (e) {
    throw new UsageError(`${command}: ${describeError(e)}`);
  }
}

function requireText(command: CliCommand, positionals: string[], what: string): string {
  const text = positionals.join(" ").trim();
  if (!text) throw new UsageError(`${command} requires ${what}`);
  return text;
}

/** Files to ingest for a path: the file itself, or supported files under a directory. */
export async function collectSources(target: string, extensions: readonly string[]): Promise<string[]> {
  const stat = await fs.stat(target);
  if (!stat.isDirectory()) return [target];
  const pattern = extensions.length === 1 ? `**/*.${extensions[0]}` : `**/*.{${extensions.join(",")}}`;
  const files = await fg(pattern, { cwd: target, dot: false, onlyFiles: true, caseSensitiveMatch: false });
  return files.sort().map((f) => path.join(target, f));
}

function snippet(text: string, max = 160): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max - 1)}…` : flat;
}

export function formatAnswer(answer: Answer): string[] {
  const lines = [answer.text, ""];
  if (answer.citations.length === 0) {
    lines.push("Sources: none (no relevant context found)");
    return lines;
  }
  lines.push("Sources:");
  answer.citations.forEach((c, i) => {
    lines.push(`  [${i + 1}] ${c.chunkId} (${c.source ?? c.documentId}, score ${c.score.toFixed(3)})`);
  });
  return lines;
}

export function formatSearch(result: RetrievalResult): string[] {
  if (result.hits.length === 0) return ["No matching passages."];
  return result.hits.flatMap((hit, i) => [
    `[${i + 1}] ${hit.score.toFixed(4)} ${hit.chunk.id}`,
    `    ${snippet(hit.chunk.text)}`,
  ]);
}

async function execute(
  command: CliCommand,
  args: string[],
  deps: CliDeps,
  io: CliIO,
): Promise<number> {
  const { values, positionals } = parse(command, args);
  const topK = parseTopK(values["top-k"]);
  const filters = parsePairs(values.filter, "--filter");
  const metadata = parsePairs(values.meta, "--meta");

  let target = "";
  let question = "";
  let documentId = "";
  switch (command) {
    case "ingest":
      if (positionals.length !== 1) throw new UsageError("ingest requires exactly one <path>");
      target = positionals[0];
      break;
    case "ask":
      question = requireText(command, positionals, "a question");
      break;
    case "search":
      question = requireText(command, positionals, "a query");
      break;
    case "delete":
      if (positionals.length !== 1) throw new UsageError("delete requires exactly one <documentId>");
      documentId = positionals[0];
      break;
    case "list":
    case "status":
      if (positionals.length > 0) throw new UsageError(`${command} takes no arguments`);
      break;
  }

  const pipeline = await deps.openPipeline(command);
  try {
    switch (command) {
      case "ingest": {
        let sources: string[];
        try {
          sources = await collectSources(target, pipeline.supportedExtensions());
        } catch (e) {
          io.err(`[RAG] Cannot read ${target}: ${describeError(e)}`);
          return EXIT_FAILURE;
        }
        if (sources.length === 0) {
          io.err(`[RAG] No supported files under ${target} (${pipeline.supportedExtensions().join(", ")})`);
          return EXIT_FAILURE;
        }
        const outcomes = await pipeline.ingestSources(sources, { metadata, signal: deps.signal });
        let failed = 0;
        for (const o of outcomes) {
          if (o.ok) io.out(`Ingested ${o.report.documentId} (${o.report.chunks} chunks)`);
          else failed++;
        }
        io.out(`${outcomes.length - failed} of ${outcomes.length} documents ingested.`);
        return failed === 0 ? EXIT_OK : EXIT_FAILURE;
      }
      case "ask": {
        const answer = await pipeline.answer(question, { topK, filters, signal: deps.signal });
        formatAnswer(answer).forEach((l) => io.out(l));
        return EXIT_OK;
      }
      case "search": {
        const result = await pipeline.search(question, { topK, filters, signal: deps.signal });
        formatSearch(result).forEach((l) => io.out(l));
        return EXIT_OK;
      }
      case "delete": {
        const removed = await pipeline.deleteDocument(documentId);
        if (removed === 0) {
          io.err(`[RAG] No document with id ${documentId}`);
          return EXIT_FAILURE;
        }
        io.out(`Deleted ${documentId} (${removed} chunks)`);
        return EXIT_OK;
      }
      case "list": {
        const docs = pipeline.listDocuments();
        if (docs.length === 0) io.out("No documents indexed.");
        for (const d of docs) io.out(`${d.documentId}\t${d.chunks} chunks`);
        return EXIT_OK;
      }
      case "status":
        io.out(JSON.stringify(pipeline.status(), null, 2));
        return EXIT_OK;
    }
  } finally {
    await pipeline.close();
  }
}

/**
 * Run one CLI command. Returns the process exit code: 0 on success, 1 when
 * the command failed, 2 on a usage error.
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  const io = deps.io ?? consoleIO;
  const [first, ...rest] = argv;
  if (first === undefined) {
    io.err(USAGE);
    return EXIT_USAGE;
  }
  if (first === "help" || first === "--help" || first === "-h") {
    io.out(USAGE);
    return EXIT_OK;
  }
  if (!isCommand(first)) {
    io.err(`Unknown command "${first}"\n\n${USAGE}`);
    return EXIT_USAGE;
  }
  try {
    return await execute(first, rest, deps, io);
  } catch (e) {
    if (e instanceof UsageError) {
      io.err(`${e.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    io.err(`[RAG] ${first} failed: ${describeError(e)}`);
    return EXIT_FAILURE;
  }
}
