// apps/backend/src/lib/openai.ts
import OpenAI from "openai";
import type { AppConfig } from "./config.js";
import { LlmError, logLlmError, logLlmRequest, logLlmResponse } from "./llm.js";
import type { LlmClient, LlmGenerateArgs, LlmResult } from "./llm.js";
import { resolveModel } from "./models.js";

const REQUEST_TIMEOUT_MS = 90_000;

export class OpenAiLlmClient implements LlmClient {
  readonly provider = "openai" as const;

  constructor(
    private readonly client: OpenAI,
    readonly model: string,
    private readonly trace = false,
  ) {}

  async generate(args: LlmGenerateArgs): Promise<LlmResult> {
    const messages: OpenAI.Chat.Completions.ChatCompletionMessageParam[] = [];
    if (args.systemPrompt) messages.push({ role: "system", content: args.systemPrompt });
    messages.push({ role: "user", content: args.prompt });

    if (this.trace) {
      console.log("[openai] model=%s temp=%s max=%s", this.model, args.temperature, args.maxTokens);
    }

    const start = Date.now();
    logLlmRequest(this, args);

    try {
      const r = await this.client.chat.completions.create({
        model: this.model,
        temperature: args.temperature,
        max_tokens: args.maxTokens,
        messages,
      });
      const content = r.choices[0]?.message?.content ?? "";
      if (this.trace) {
        console.log("[openai] received %d chars", content.length);
      }
      const result: LlmResult = {
        content: content.trim(),
        usage: { totalTokens: r.usage?.total_tokens ?? null },
        model: r.model || this.model,
        provider: this.provider,
      };
      logLlmResponse(this, args, result, Date.now() - start);
      return result;
    } catch (err) {
      logLlmError(this, args, err, Date.now() - start);
      throw new LlmError(this.provider, err instanceof Error ? err.message : String(err), { cause: err });
    }
  }
}

export function createOpenAiClient(config: AppConfig): OpenAiLlmClient {
  if (!config.openaiApiKey) {
    throw new LlmError("openai", "OPENAI_API_KEY is not configured.");
  }
  const client = new OpenAI({ apiKey: config.openaiApiKey, timeout: REQUEST_TIMEOUT_MS });
  const model = config.blueprint.provider === "openai" ? config.blueprint.model : resolveModel("openai");
  return new OpenAiLlmClient(client, model, config.trace);
}
