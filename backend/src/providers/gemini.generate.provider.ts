import { GENERATION_MAX_TOKENS, GENERATION_TEMPERATURE } from "../config/generation.config.js";
import { ProviderRequestError } from "./provider.errors.js";

export interface GenerateTextOptions {
  signal?: AbortSignal;
  maxTokens?: number;
}

export interface TextGenerationProvider {
  readonly name: string;
  generateText(prompt: string, system?: string, options?: GenerateTextOptions): Promise<string>;
}

type GeminiGenerateResponse = {
  candidates?: Array<{ content?: { parts?: Array<{ text?: string }> } }>;
};

export class GeminiTextGenerationProvider implements TextGenerationProvider {
  readonly name = "gemini";
  private apiKey: string;
  private model: string;

  constructor(apiKey: string, model: string) {
    this.apiKey = apiKey;
    this.model = model.replace(/^models\//, "");
  }

  async generateText(prompt: string, system?: string, options?: GenerateTextOptions): Promise<string> {
    const url = `https://generativelanguage.googleapis.com/v1beta/models/${this.model}:generateContent`;
    const res = await fetch(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "x-goog-api-key": this.apiKey,
      },
      signal: options?.signal,
      body: JSON.stringify({
        system_instruction: system ? { parts: [{ text: system }] } : undefined,
        contents: [
          {
            role: "user",
            parts: [{ text: prompt }],
          },
        ],
        generationConfig: {
          temperature: GENERATION_TEMPERATURE,
          maxOutputTokens: options?.maxTokens ?? GENERATION_MAX_TOKENS,
        },
      }),
    });
    if (!res.ok) {
      const msg = await res.text();
      throw new ProviderRequestError(`Gemini generateContent failed (${res.status}): ${msg}`, res.status);
    }
    const data = (await res.json()) as GeminiGenerateResponse;
    const text = data.candidates?.[0]?.content?.parts?.[0]?.text;
    if (!text) {
      throw new Error("Gemini generateContent returned no text.");
    }
    return text.trim();
  }
}
