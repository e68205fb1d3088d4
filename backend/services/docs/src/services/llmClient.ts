// backend/services/docs/src/services/llmClient.ts
import axios, { type AxiosAdapter, type AxiosInstance, isAxiosError } from "axios";
import { z } from "zod";
import { badGateway } from "../../../shared/http/errors";
import { DEFAULT_LLM_MODEL, type LlmModel } from "../config";

export interface GenerateTextRequest {
  model: LlmModel;
  system: string;
  prompt: string;
  maxTokens?: number;
  temperature?: number;
}

export interface LlmClient {
  generateText(req: GenerateTextRequest): Promise<string>;
}

export interface ChatCompletionsOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
}

const zCompletion = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }),
      })
    )
    .min(1),
});

/**
 * OpenAI-compatible `/chat/completions` endpoint (Anyscale, OpenAI, vLLM, ...).
 */
export class ChatCompletionsClient implements LlmClient {
  private readonly http: AxiosInstance;

  constructor(opts: ChatCompletionsOptions) {
    this.http = axios.create({
      baseURL: opts.baseUrl,
      timeout: opts.timeoutMs ?? 60_000,
      adapter: opts.adapter,
      headers: {
        Authorization: `Bearer ${opts.apiKey}`,
        "Content-Type": "application/json",
      },
    });
  }

  async generateText(req: GenerateTextRequest): Promise<string> {
    let data: unknown;
    try {
      ({ data } = await this.http.post("/chat/completions", {
        model: req.model,
        messages: [
          { role: "system", content: req.system },
          { role: "user", content: req.prompt },
        ],
        max_tokens: req.maxTokens,
        temperature: req.temperature,
      }));
    } catch (err) {
      if (isAxiosError(err)) {
        const status = err.response?.status;
        throw badGateway(
          `LLM request failed${status ? ` (${status})` : ""}: ${err.message}`,
          { cause: err }
        );
      }
      throw err;
    }

    const parsed = zCompletion.safeParse(data);
    if (!parsed.success) {
      throw badGateway("Unexpected LLM response", { cause: parsed.error });
    }
    const content = parsed.data.choices[0].message.content?.trim();
    if (!content) throw badGateway("LLM returned an empty completion");
    return content;
  }
}

/** `repodocs run <this module> <prompt...>` prints one completion. */
export async function main(args: string[]): Promise<void> {
  const apiKey = process.env.LLM_API_KEY?.trim();
  if (!apiKey) throw new Error("Missing required env var: LLM_API_KEY");
  const client = new ChatCompletionsClient({
    baseUrl:
      process.env.LLM_BASE_URL?.trim() || "https://api.endpoints.anyscale.com/v1",
    apiKey,
  });
  const text = await client.generateText({
    model: DEFAULT_LLM_MODEL,
    system: "You are a helpful assistant.",
    prompt: args.join(" ") || "Say hello.",
  });
  process.stdout.write(text + "\n");
}
