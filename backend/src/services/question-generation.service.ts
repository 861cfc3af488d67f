import type { AppConfig } from "../config/app.config.js";
import {
  GeminiTextGenerationProvider,
  type TextGenerationProvider,
} from "../providers/gemini.generate.provider.js";
import { OpenAITextGenerationProvider } from "../providers/openai.generate.provider.js";
import { ProviderRequestError } from "../providers/provider.errors.js";
import { buildQuestionPrompt, type GenerationRequest } from "./prompt-builder.service.js";

export type GenerationErrorKind = "quota" | "auth" | "timeout" | "failed";

export type GenerationResult =
  | { success: true; content: string; error: null }
  | { success: false; content: null; error: string; errorKind: GenerationErrorKind };

export interface QuestionGenerator {
  generateQuestions(request: GenerationRequest): Promise<GenerationResult>;
}

export type GenerationBackend =
  | { state: "ready"; client: QuestionGenerator }
  | { state: "unavailable"; reason: string };

function isTimeout(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "name" in err &&
    (err.name === "TimeoutError" || err.name === "AbortError")
  );
}

export function classifyGenerationError(err: unknown, timeoutMs: number): GenerationResult {
  const message = err instanceof Error ? err.message : String(err);
  const status = err instanceof ProviderRequestError ? err.status : null;
  const fail = (errorKind: GenerationErrorKind, error: string): GenerationResult => ({
    success: false,
    content: null,
    error,
    errorKind,
  });

  if (isTimeout(err)) {
    return fail("timeout", `Generation timed out after ${Math.round(timeoutMs / 1000)} seconds.`);
  }
  if (status === 429 || message.includes("429") || message.toLowerCase().includes("quota")) {
    return fail("quota", "Quota exceeded (429). Please add credits to your account and try again.");
  }
  if (status === 401 || status === 403 || message.includes("401")) {
    return fail("auth", "Invalid API key. Please check your API key configuration.");
  }
  return fail("failed", `API Error: ${message}`);
}

export class QuestionGenerationClient implements QuestionGenerator {
  private provider: TextGenerationProvider;
  private timeoutMs: number;

  constructor(provider: TextGenerationProvider, timeoutMs: number) {
    this.provider = provider;
    this.timeoutMs = timeoutMs;
  }

  async generateQuestions(request: GenerationRequest): Promise<GenerationResult> {
    const { system, prompt } = buildQuestionPrompt(request);
    try {
      const content = await this.provider.generateText(prompt, system, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      return { success: true, content, error: null };
    } catch (err) {
      const result = classifyGenerationError(err, this.timeoutMs);
      if (!result.success) {
        console.error(`[generation] ${this.provider.name} call failed (${result.errorKind}): ${result.error}`);
      }
      return result;
    }
  }

  async validateApiKey(): Promise<GenerationResult> {
    try {
      await this.provider.generateText("Test", undefined, {
        signal: AbortSignal.timeout(this.timeoutMs),
        maxTokens: 5,
      });
      return { success: true, content: "", error: null };
    } catch (err) {
      return classifyGenerationError(err, this.timeoutMs);
    }
  }
}

export function createTextProvider(config: AppConfig): TextGenerationProvider | string {
  if (config.provider === "gemini") {
    if (!config.gemini.apiKey) return "GEMINI_API_KEY is required for GENERATION_PROVIDER=gemini.";
    return new GeminiTextGenerationProvider(config.gemini.apiKey, config.gemini.model);
  }
  if (!config.openai.apiKey) return "OPENAI_API_KEY is required for GENERATION_PROVIDER=openai.";
  return new OpenAITextGenerationProvider(
    config.openai.apiKey,
    config.openai.model,
    config.openai.baseUrl
  );
}

export function createGenerationBackend(
  config: AppConfig
): { backend: GenerationBackend; client: QuestionGenerationClient | null } {
  const provider = createTextProvider(config);
  if (typeof provider === "string") {
    return { backend: { state: "unavailable", reason: provider }, client: null };
  }
  const client = new QuestionGenerationClient(provider, config.generationTimeoutMs);
  return { backend: { state: "ready", client }, client };
}
