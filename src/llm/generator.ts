import { GenerationError, describeError } from "../errors.js";
import { moduleLogger } from "../logger.js";
import { Err, Ok, type Result } from "../result.js";
import { withRetry, type RetryOptions } from "./retry.js";

const log = moduleLogger("generator");

// ── Generator contract ───────────────────────────────────

export interface Generation {
  text: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
}

/** prompt → text. Any retrying happens inside; a returned error is final. */
export interface Generator {
  generate(prompt: string): Promise<Result<Generation, GenerationError>>;
}

// ── OpenAI-compatible chat client (structural) ───────────

export interface CompletionRequest {
  model: string;
  temperature?: number;
  max_tokens?: number;
  messages: { role: "system" | "user"; content: string }[];
}

export interface CompletionResponse {
  choices: { message: { content: string | null } }[];
  usage?: { prompt_tokens: number; completion_tokens: number } | null;
}

/** The slice of the OpenAI SDK client the generator uses. */
export interface ChatClient {
  chat: {
    completions: {
      create(body: CompletionRequest): Promise<CompletionResponse>;
    };
  };
}

export interface ChatGeneratorOptions {
  model: string;
  /** Tried once the primary model has exhausted its retries. */
  fallbackModel?: string;
  temperature?: number;
  maxTokens?: number;
  retry?: RetryOptions;
}

/** Generator over an OpenAI-compatible chat completions endpoint (OpenRouter). */
export class ChatGenerator implements Generator {
  constructor(
    private readonly client: ChatClient,
    private readonly opts: ChatGeneratorOptions,
  ) {}

  async generate(prompt: string): Promise<Result<Generation, GenerationError>> {
    const models = [this.opts.model];
    if (this.opts.fallbackModel && this.opts.fallbackModel !== this.opts.model) {
      models.push(this.opts.fallbackModel);
    }

    let lastError: unknown;
    for (const [i, model] of models.entries()) {
      if (i > 0) {
        log.warn({ fallbackModel: model }, "🔄 Trying fallback model");
      }
      try {
        return Ok(await this.complete(model, prompt));
      } catch (err) {
        lastError = err;
        log.warn({ model, err: describeError(err) }, "⚠️ Generation failed");
      }
    }

    return Err(
      new GenerationError(`Generation failed: ${describeError(lastError)}`, {
        cause: lastError,
        model: models[models.length - 1],
      }),
    );
  }

  private async complete(model: string, prompt: string): Promise<Generation> {
    const response = await withRetry(
      () =>
        this.client.chat.completions.create({
          model,
          temperature: this.opts.temperature,
          max_tokens: this.opts.maxTokens ?? 1024,
          messages: [{ role: "user", content: prompt }],
        }),
      { label: `LLM (${model})`, ...this.opts.retry },
    );

    const text = response.choices[0]?.message.content?.trim() ?? "";
    if (!text) throw new Error(`Empty response from ${model}`);

    return {
      text,
      model,
      inputTokens: response.usage?.prompt_tokens ?? 0,
      outputTokens: response.usage?.completion_tokens ?? 0,
    };
  }
}
