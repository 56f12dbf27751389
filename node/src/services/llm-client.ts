// src/services/llm-client.ts — language-model collaborator used for answer synthesis
import OpenAI from 'openai';

export interface CompleteOptions {
  signal?: AbortSignal;
}

export interface LanguageModel {
  readonly model: string;
  complete(prompt: string, options?: CompleteOptions): Promise<string>;
}

export interface OpenAiLanguageModelOptions {
  apiKey: string;
  model: string;
  timeoutMs?: number;
  temperature?: number;
  /** Pre-built client, mainly for tests. */
  client?: OpenAI;
}

const SYSTEM_PROMPT = 'You are an assistant for a sustainable fashion brand.';

export class OpenAiLanguageModel implements LanguageModel {
  readonly model: string;
  private readonly client: OpenAI;
  private readonly temperature: number;

  constructor(options: OpenAiLanguageModelOptions) {
    this.model = options.model;
    this.temperature = options.temperature ?? 0.2;
    // No automatic retries.
    this.client =
      options.client ?? new OpenAI({ apiKey: options.apiKey, timeout: options.timeoutMs ?? 30_000, maxRetries: 0 });
  }

  async complete(prompt: string, options: CompleteOptions = {}): Promise<string> {
    const res = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: prompt },
        ],
        temperature: this.temperature,
      },
      { signal: options.signal },
    );
    return res.choices[0]?.message?.content ?? '';
  }
}

/** null when no API key is configured; the pipeline then answers extractively. */
export function createLanguageModel(cfg: { apiKey: string | undefined; model: string; timeoutMs: number }): LanguageModel | null {
  if (!cfg.apiKey) return null;
  return new OpenAiLanguageModel({ apiKey: cfg.apiKey, model: cfg.model, timeoutMs: cfg.timeoutMs });
}
