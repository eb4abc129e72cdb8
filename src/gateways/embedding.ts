import { z } from "zod";
import { GatewayError } from "../errors";
import { OpenAIClient, type OpenAIClientOptions } from "./openai-client";
import { fail, ok, type GatewayResult } from "./retry";

/**
 * Converts texts into fixed-dimension vectors: one vector per input, same
 * order. Failures are returned, never thrown (except caller cancellation).
 */
export interface EmbeddingGateway {
  /** Identifier recorded in the persisted index to detect model switches. */
  readonly modelName: string;
  readonly dimensions: number;
  embed(texts: readonly string[], signal?: AbortSignal): Promise<GatewayResult<number[][]>>;
}

const EmbeddingResponseSchema = z.object({
  data: z.array(z.object({ index: z.number().int(), embedding: z.array(z.number()) })),
});

export interface OpenAIEmbeddingOptions extends OpenAIClientOptions {
  model: string;
  dimensions: number;
}

/** Embedding gateway backed by an OpenAI-compatible `/embeddings` endpoint. */
export class OpenAIEmbeddingGateway implements EmbeddingGateway {
  private readonly client: OpenAIClient;
  public readonly modelName: string;
  public readonly dimensions: number;

  public constructor(opts: OpenAIEmbeddingOptions) {
    this.client = new OpenAIClient(opts);
    this.modelName = opts.model;
    this.dimensions = opts.dimensions;
  }

  /**
   * One request for the whole batch. Vectors come back in input order even
   * when the server reorders `data`; a count mismatch is a permanent failure.
   */
  public async embed(
    texts: readonly string[],
    signal?: AbortSignal,
  ): Promise<GatewayResult<number[][]>> {
    if (texts.length === 0) return ok([]);
    const body: Record<string, unknown> = { model: this.modelName, input: texts };
    // Only the text-embedding-3 family accepts a dimensions override.
    if (this.modelName.startsWith("text-embedding-3")) body.dimensions = this.dimensions;

    const result = await this.client.post("embed", "/embeddings", body, EmbeddingResponseSchema, signal);
    if (!result.ok) return result;

    const data = [...result.value.data].sort((a, b) => a.index - b.index);
    if (data.length !== texts.length) {
      return fail(
        new GatewayError(
          "permanent",
          "embed",
          `expected ${texts.length} embeddings, received ${data.length}`,
        ),
      );
    }
    return ok(data.map((d) => d.embedding));
  }
}
