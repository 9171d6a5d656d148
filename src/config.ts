import { z } from "zod";
import { ConfigurationError } from "./errors";

export const HOLIDAYS_URL = "https://date.nager.at/api/v3";
export const ANTHROPIC_URL = "https://api.anthropic.com";
export const DEFAULT_COUNTRY = "PL";
export const HOLIDAYS_TIMEOUT_MS = 5000;
export const LLM_TIMEOUT_MS = 30000;

const flag = z
  .enum(["true", "false", "1", "0", ""])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const EnvSchema = z.object({
  HOST: z.string().min(1).default("127.0.0.1"),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  ANTHROPIC_API_KEY: z.string().default(""),
  ANTHROPIC_BASE_URL: z.string().url().default(ANTHROPIC_URL),
  ANTHROPIC_MODEL: z.string().min(1).default("claude-sonnet-4-5"),
  // API version, not a model snapshot date
  ANTHROPIC_VERSION: z.string().min(1).default("2023-06-01"),
  ANTHROPIC_MAX_TOKENS: z.coerce.number().int().positive().default(400),
  LLM_CLIENT: z.enum(["sdk", "http"]).default("sdk"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(LLM_TIMEOUT_MS),
  HOLIDAYS_API_URL: z.string().url().default(HOLIDAYS_URL),
  HOLIDAYS_TIMEOUT_MS: z.coerce.number().int().positive().default(HOLIDAYS_TIMEOUT_MS),
  DEFAULT_COUNTRY: z.string().min(2).default(DEFAULT_COUNTRY),
  ALLOW_MOCKS: flag,
  LAST_RESPONSE_FILE: z.string().min(1).default("last_response.txt")
});

export type LlmClientKind = "sdk" | "http";

export interface AnthropicSettings {
  apiKey: string;
  baseUrl: string;
  model: string;
  version: string;
  maxTokens: number;
  timeoutMs: number;
}

export interface AppConfig {
  host: string;
  port: number;
  llmClient: LlmClientKind;
  anthropic: AnthropicSettings;
  holidays: {
    baseUrl: string;
    timeoutMs: number;
  };
  defaultCountry: string;
  allowMocks: boolean;
  lastResponseFile: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration (${fields.join("; ")})`, { cause: parsed.error });
  }
  const vars = parsed.data;

  return {
    host: vars.HOST,
    port: vars.PORT,
    llmClient: vars.LLM_CLIENT,
    anthropic: {
      apiKey: vars.ANTHROPIC_API_KEY.trim(),
      baseUrl: vars.ANTHROPIC_BASE_URL,
      model: vars.ANTHROPIC_MODEL,
      version: vars.ANTHROPIC_VERSION,
      maxTokens: vars.ANTHROPIC_MAX_TOKENS,
      timeoutMs: vars.LLM_TIMEOUT_MS
    },
    holidays: {
      baseUrl: vars.HOLIDAYS_API_URL,
      timeoutMs: vars.HOLIDAYS_TIMEOUT_MS
    },
    defaultCountry: vars.DEFAULT_COUNTRY.toUpperCase(),
    allowMocks: vars.ALLOW_MOCKS,
    lastResponseFile: vars.LAST_RESPONSE_FILE
  };
}

// Printed by the server and the CLI on startup
export function describeConfig(config: AppConfig): string {
  return [
    "=== DIAGNOSTICS ===",
    `ANTHROPIC_API_KEY: ${config.anthropic.apiKey ? "YES" : "NO"}`,
    `ANTHROPIC_BASE_URL: ${config.anthropic.baseUrl}`,
    `ANTHROPIC_MODEL: ${config.anthropic.model}`,
    `LLM_CLIENT: ${config.llmClient}`,
    `ALLOW_MOCKS: ${config.allowMocks}`,
    "==================="
  ].join("\n");
}
