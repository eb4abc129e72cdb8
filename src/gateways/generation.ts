import { z } from "zod";
import { GatewayError } from "../errors";
import { OpenAIClient, type OpenAIClientOptions } from "./openai-client";
import { fail, ok, type GatewayResult } from "./retry";

/** Produces answer text from an assembled prompt. */
export interface GenerationGateway {
  readonly modelName: string;
  generate(prompt: string, signal?: AbortSignal): Promise<GatewayResult<string>>;
}

const ContentSchema = z.union([
  z.string(),
  z.array(z.object({ type: z.string().optional(), text: z.string().optional() })),
  z.null(),
]);

const ChatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        index: z.number().optional(),
        message: z.object({ role: z.string().optional(), content: ContentSchema.optional() }).optional(),
      }),
    )
    .optional(),
});

type ChatContent = z.infer<typeof ContentSchema>;

/** Flatten string or content-part message content to plain text. */
function extractMessageContent(content: ChatContent | undefined): string {
  if (typeof content === "string") return content;
  if (Array.isArray(content)) return content.map((part) => part.text ?? "").join("");
  return "";
}

export interface OpenAIGenerationOptions extends OpenAIClientOptions {
  model: string;
  temperature?: number;
}

/** Generation gateway backed by an OpenAI-compatible `/chat/completions` endpoint. */
export class OpenAIGenerationGateway implements GenerationGateway {
  private readonly client: OpenAIClient;
  public readonly modelName: string;
  private readonly temperature: number;

  public constructor(opts: OpenAIGenerationOptions) {
    this.client = new OpenAIClient(opts);
    this.modelName = opts.model;
    this.temperature = opts.temperature ?? 0.2;
  }

  public async generate(prompt: string, signal?: AbortSignal): Promise<GatewayResult<string>> {
    const result = await this.client.post(
      "generate",
      "/chat/completions",
      {
        model: this.modelName,
        temperature: this.temperature,
        messages: [{ role: "user", content: prompt }],
      },
      ChatCompletionSchema,
      signal,
    );
    if (!result.ok) return result;
    const text = extractMessageContent(result.value.choices?.[0]?.message?.content);
    if (!text.trim()) {
      return fail(new GatewayError("permanent", "generate", "completion contained no text"));
    }
    return ok(text);
  }
}
