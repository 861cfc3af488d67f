export type GenerationProviderName = "openai" | "gemini";

export interface AppConfig {
  port: number | null;
  uploadDir: string;
  generatedDir: string;
  provider: GenerationProviderName;
  openai: { apiKey: string | null; model: string; baseUrl: string };
  gemini: { apiKey: string | null; model: string };
  generationTimeoutMs: number;
  maxConcurrentJobs: number;
  maxQueuedJobs: number;
  jobTtlMs: number;
  evictionIntervalMs: number;
  shutdownGraceMs: number;
  maxUploadBytes: number;
  validateApiKeyOnStart: boolean;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string, fallback: string): string {
  const value = env[key]?.trim();
  return value ? value : fallback;
}

function readOptional(env: Env, key: string): string | null {
  const value = env[key]?.trim();
  return value ? value : null;
}

function readNumber(env: Env, key: string, fallback: number, min = 0): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min) {
    throw new Error(`${key} must be a number >= ${min}, got "${raw}".`);
  }
  return value;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  throw new Error(`${key} must be a boolean, got "${raw}".`);
}

function readProvider(env: Env): GenerationProviderName {
  const raw = readString(env, "GENERATION_PROVIDER", "openai").toLowerCase();
  if (raw === "openai" || raw === "gemini") return raw;
  throw new Error(`GENERATION_PROVIDER must be "openai" or "gemini", got "${raw}".`);
}

export function loadAppConfig(env: Env = process.env): AppConfig {
  const port = readOptional(env, "PORT");
  return {
    port: port === null ? null : readNumber(env, "PORT", 0, 1),
    uploadDir: readString(env, "UPLOAD_DIR", "uploads"),
    generatedDir: readString(env, "GENERATED_DIR", "generated"),
    provider: readProvider(env),
    openai: {
      apiKey: readOptional(env, "OPENAI_API_KEY"),
      model: readString(env, "OPENAI_MODEL", "gpt-3.5-turbo"),
      baseUrl: readString(env, "OPENAI_BASE_URL", "https://api.openai.com/v1"),
    },
    gemini: {
      apiKey: readOptional(env, "GEMINI_API_KEY"),
      model: readString(env, "GEMINI_GENERATION_MODEL", "gemini-2.5-flash"),
    },
    generationTimeoutMs: readNumber(env, "GENERATION_TIMEOUT_SECONDS", 120, 1) * 1000,
    maxConcurrentJobs: readNumber(env, "MAX_CONCURRENT_JOBS", 2, 1),
    maxQueuedJobs: readNumber(env, "MAX_QUEUED_JOBS", 20),
    jobTtlMs: readNumber(env, "JOB_TTL_MINUTES", 1440) * 60 * 1000,
    evictionIntervalMs: readNumber(env, "EVICTION_INTERVAL_SECONDS", 300, 1) * 1000,
    shutdownGraceMs: readNumber(env, "SHUTDOWN_GRACE_SECONDS", 5) * 1000,
    maxUploadBytes: readNumber(env, "MAX_UPLOAD_MB", 100, 1) * 1024 * 1024,
    validateApiKeyOnStart: readBoolean(env, "VALIDATE_API_KEY_ON_START", false),
  };
}
