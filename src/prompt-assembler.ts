import { InvalidConfigurationError } from "./errors";
import type { RetrievalHit, RetrievalResult } from "./types";

/** Rough token estimate: 1 token ≈ 4 characters of English text. */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/** Character count, for budgets expressed in characters. */
export function countCharacters(text: string): number {
  return text.length;
}

export const NO_CONTEXT_MARKER = "[no relevant context found]";

export const DEFAULT_INSTRUCTIONS = [
  "You are an assistant that answers questions using only the numbered context passages below.",
  "Cite the passages you rely on by their number, e.g. [1].",
  "If the passages do not contain the answer, say that the documents do not cover it instead of guessing.",
].join("\n");

export interface PromptAssemblerOptions {
  /** Size function the budget is expressed in (default: {@link estimateTokens}). */
  measure?: (text: string) => number;
  instructions?: string;
}

export interface AssembledPrompt {
  prompt: string;
  /** Hits placed in the prompt, in ranked order (a prefix of the retrieval result). */
  included: readonly RetrievalHit[];
  includedChunkIds: readonly string[];
  /** Hits left out because the next one would have exceeded the budget. */
  omitted: number;
  /** `measure(prompt)` */
  measuredSize: number;
}

function describeSource(hit: RetrievalHit): string {
  const source = hit.chunk.metadata["source"];
  const where = typeof source === "string" ? source : hit.chunk.documentId;
  return `${where}, chunk ${hit.chunk.index}`;
}

/**
 * Builds the generation prompt from a question and ranked retrieval hits,
 * keeping the whole prompt within a size budget.
 */
export class PromptAssembler {
  private readonly measure: (text: string) => number;
  private readonly instructions: string;

  public constructor(opts: PromptAssemblerOptions = {}) {
    this.measure = opts.measure ?? estimateTokens;
    this.instructions = opts.instructions ?? DEFAULT_INSTRUCTIONS;
  }

  /** Render the prompt for a given set of passages (no budget applied). */
  public render(question: string, hits: readonly RetrievalHit[]): string {
    const lines: string[] = [this.instructions, "", "Context:"];
    if (hits.length === 0) {
      lines.push(NO_CONTEXT_MARKER);
    } else {
      hits.forEach((hit, i) => {
        lines.push(`----- [${i + 1}] ${hit.chunk.id} (${describeSource(hit)}) -----`);
        lines.push(hit.chunk.text.trim());
        lines.push(`----- end [${i + 1}] -----`);
      });
    }
    lines.push("", `Question: ${question.trim()}`, "", "Answer:");
    return lines.join("\n");
  }

  /**
   * Select the longest ranked prefix of `retrieval.hits` whose rendered prompt
   * fits `tokenBudget`. Selection stops at the first hit that does not fit, even
   * when it is the best match, in which case the prompt carries the
   * no-context marker instead of any passage.
   *
   * @throws {InvalidConfigurationError} the budget cannot hold even the question
   */
  public assemble(question: string, retrieval: RetrievalResult, tokenBudget: number): AssembledPrompt {
    if (!Number.isFinite(tokenBudget) || tokenBudget < 1) {
      throw new InvalidConfigurationError(`token budget must be positive (got ${tokenBudget})`);
    }
    let prompt = this.render(question, []);
    let size = this.measure(prompt);
    if (size > tokenBudget) {
      throw new InvalidConfigurationError(
        `token budget ${tokenBudget} is too small for the question alone (needs ${size})`,
      );
    }

    const included: RetrievalHit[] = [];
    for (const hit of retrieval.hits) {
      const candidate = this.render(question, [...included, hit]);
      const candidateSize = this.measure(candidate);
      if (candidateSize > tokenBudget) break;
      included.push(hit);
      prompt = candidate;
      size = candidateSize;
    }

    return {
      prompt,
      included,
      includedChunkIds: included.map((h) => h.chunk.id),
      omitted: retrieval.hits.length - included.length,
      measuredSize: size,
    };
  }
}
