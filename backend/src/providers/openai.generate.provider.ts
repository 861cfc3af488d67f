import { GENERATION_MAX_TOKENS, GENERATION_TEMPERATURE } from "../config/generation.config.js";
import type { GenerateTextOptions, TextGenerationProvider } from "./gemini.generate.provider.js";
import { ProviderRequestError } from "./provider.errors.js";

type ChatCompletionResponse = {
  choices?: Array<{
    message?: {
      content?: string | Array<{ type?: string; text?: string }> | null;
    };
  }>;
};

function resolveCompletionsUrl(baseUrl: string): string {
  const trimmed = baseUrl.replace(/\/+$/, "");
  if (/\/chat\/completions$/i.test(trimmed)) {
    return trimmed;
  }
  return `${trimmed}/chat/completions`;
}

function extractContent(data: ChatCompletionResponse): string {
  const content = data.choices?.[0]?.message?.content;
  if (typeof content === "string" && content.trim()) {
    return content.trim();
  }
  if (Array.isArray(content)) {
    const text = content
      .map((part) => (part && typeof part.text === "string" ? part.text : ""))
      .join("")
      .trim();
    if (text) return text;
  }
  throw new Error("Chat completion returned no text.");
}

export class OpenAITextGenerationProvider implements TextGenerationProvider {
  readonly name = "openai";
  private apiKey: string;
  private model: string;
  private completionsUrl: string;

  constructor(apiKey: string, model: string, baseUrl = "https://api.openai.com/v1") {
    this.apiKey = apiKey;
    this.model = model;
    this.completionsUrl = resolveCompletionsUrl(baseUrl);
  }

  async generateText(prompt: string, system?: string, options?: GenerateTextOptions): Promise<string> {
    const res = await fetch(this.completionsUrl, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`,
      },
      signal: options?.signal,
      body: JSON.stringify({
        model: this.model,
        temperature: GENERATION_TEMPERATURE,
        max_tokens: options?.maxTokens ?? GENERATION_MAX_TOKENS,
        messages: [
          ...(system ? [{ role: "system", content: system }] : []),
          { role: "user", content: prompt },
        ],
      }),
    });

    if (!res.ok) {
      const msg = await res.text();
      throw new ProviderRequestError(`Chat completion failed (${res.status}): ${msg}`, res.status);
    }

    const data = (await res.json()) as ChatCompletionResponse;
    return extractContent(data);
  }
}
