import dotenv from "dotenv";

dotenv.config();

export type ClassifierProvider = "keyword" | "llm" | "none";

type Env = Record<string, string | undefined>;

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  if (value.toLowerCase() === "true") {
    return true;
  }
  if (value.toLowerCase() === "false") {
    return false;
  }
  return fallback;
}

function parseEnum<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T {
  if (!value) {
    return fallback;
  }
  const normalized = value.toLowerCase();
  const match = allowed.find((candidate) => candidate === normalized);
  return match ?? fallback;
}

function optionalString(value: string | undefined): string | undefined {
  if (value === undefined || value.trim().length === 0) {
    return undefined;
  }
  return value.trim();
}

export function loadConfig(env: Env = process.env) {
  const openAiApiKey = optionalString(env.OPENAI_API_KEY);
  return {
    port: parseNumber(env.PORT, 3010),
    serviceName: env.SERVICE_NAME ?? "decision-service",
    serviceVersion: env.SERVICE_VERSION ?? "0.1.0",
    logLevel: env.LOG_LEVEL ?? "info",
    logPretty: parseBoolean(env.LOG_PRETTY, false),
    telemetryEnabled: parseBoolean(env.TELEMETRY_ENABLED, false),
    useInMemoryStore: parseBoolean(env.USE_INMEMORY_STORE, false),
    classifierProvider: parseEnum<ClassifierProvider>(
      env.CLASSIFIER_PROVIDER,
      ["keyword", "llm", "none"],
      openAiApiKey ? "llm" : "keyword"
    ),
    llm: {
      apiKey: openAiApiKey,
      baseUrl: optionalString(env.OPENAI_BASE_URL),
      model: env.OPENAI_MODEL ?? "gpt-4o-mini",
      timeoutMs: parseNumber(env.OPENAI_TIMEOUT_MS, 30_000),
      maxTokens: parseNumber(env.OPENAI_MAX_TOKENS, 1024),
      retry: {
        maxAttempts: parseNumber(env.LLM_RETRY_MAX_ATTEMPTS, 3),
        initialBackoffMs: parseNumber(env.LLM_RETRY_INITIAL_BACKOFF_MS, 1000),
        backoffMultiplier: 2,
        maxBackoffMs: parseNumber(env.LLM_RETRY_MAX_BACKOFF_MS, 30_000)
      }
    },
    db: {
      enabled: parseBoolean(env.DB_ENABLED, true),
      host: env.DB_HOST ?? "localhost",
      port: parseNumber(env.DB_PORT, 5432),
      user: env.DB_USER ?? "decisions",
      password: env.DB_PASSWORD ?? "decisions",
      database: env.DB_NAME ?? "decisions"
    }
  };
}

export type ServiceConfig = ReturnType<typeof loadConfig>;
export type LlmConfig = ServiceConfig["llm"];
export type RetryConfig = LlmConfig["retry"];

export const config: ServiceConfig = loadConfig();
