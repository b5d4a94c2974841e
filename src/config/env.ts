import { config as loadDotenv } from "dotenv";

loadDotenv();

type Env = Record<string, string | undefined>;

function getStringEnv(env: Env, name: string, fallback: string): string {
  const raw = env[name];
  if (!raw || !raw.trim()) {
    return fallback;
  }
  return raw.trim();
}

function getNumberEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw || !raw.trim()) {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

function getListEnv(env: Env, name: string, fallback: string[]): string[] {
  const raw = env[name];
  if (!raw || !raw.trim()) {
    return fallback;
  }
  const values = raw
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
  return values.length > 0 ? values : fallback;
}

export interface AppConfig {
  appEnv: string;
  host: string;
  port: number;
  corsOrigins: string[];
  logLevel: string;
  /** Without a key every answer comes from the offline mock client. */
  openaiApiKey?: string;
  openaiBaseUrl: string;
  openaiModel: string;
  openaiTemperature: number;
  /** 0 disables the outbound request timeout. */
  llmTimeoutMs: number;
  mockSeed: string;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    appEnv: getStringEnv(env, "APP_ENV", "development"),
    host: getStringEnv(env, "HOST", "0.0.0.0"),
    port: Math.floor(getNumberEnv(env, "PORT", 3001)),
    corsOrigins: getListEnv(env, "CORS_ORIGINS", ["http://localhost:3000"]),
    logLevel: getStringEnv(env, "LOG_LEVEL", "info").toLowerCase(),
    openaiApiKey: env.OPENAI_API_KEY?.trim() || undefined,
    openaiBaseUrl: getStringEnv(env, "OPENAI_BASE_URL", "https://api.openai.com/v1"),
    openaiModel: getStringEnv(env, "OPENAI_MODEL", "gpt-4o-mini"),
    openaiTemperature: getNumberEnv(env, "OPENAI_TEMPERATURE", 0.2),
    llmTimeoutMs: Math.floor(getNumberEnv(env, "LLM_TIMEOUT_MS", 0)),
    mockSeed: getStringEnv(env, "MOCK_DETERMINISTIC_SEED", "academic-query-assistant"),
  };
}
