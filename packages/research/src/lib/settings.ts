import "dotenv/config";
import { ConfigError } from "./errors";

export type StoreKind = "supabase" | "memory";

export type GenerationSettings = {
  model: string;
  temperature: number;
};

const DEFAULT_PORT = 8000;
const DEFAULT_MODEL = "gpt-4";
const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_RECORD_LIMIT = 100;

const coercePositiveInt = (value: string | undefined) => {
  if (!value) {
    return null;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return null;
  }
  return Math.floor(parsed);
};

const coerceTemperature = (value: string | undefined) => {
  if (!value) {
    return null;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 2) {
    return null;
  }
  return parsed;
};

export const requireEnv = (key: string): string => {
  const value = process.env[key]?.trim();
  if (!value) {
    throw new ConfigError(`Missing required env var: ${key}`);
  }
  return value;
};

export const getPort = (): number => coercePositiveInt(process.env.PORT) ?? DEFAULT_PORT;

export const getOpenAiApiKey = (): string => requireEnv("OPENAI_API_KEY");

export const getOpenAiTimeoutMs = (): number =>
  coercePositiveInt(process.env.OPENAI_TIMEOUT_MS) ?? DEFAULT_TIMEOUT_MS;

export const getGenerationSettings = (): GenerationSettings => ({
  model: process.env.OPENAI_MODEL?.trim() || DEFAULT_MODEL,
  temperature: coerceTemperature(process.env.OPENAI_TEMPERATURE) ?? DEFAULT_TEMPERATURE,
});

export const getStoreKind = (): StoreKind => {
  const raw = process.env.RESEARCH_STORE?.toLowerCase();
  if (raw === "memory") {
    return raw;
  }
  return "supabase";
};

export const getSupabaseCredentials = () => ({
  url: requireEnv("SUPABASE_URL"),
  key: requireEnv("SUPABASE_KEY"),
});

export const getRecordLimit = (): number =>
  coercePositiveInt(process.env.RESEARCH_RECORD_LIMIT) ?? DEFAULT_RECORD_LIMIT;
