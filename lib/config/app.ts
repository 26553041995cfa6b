/**
 * Application configuration.
 *
 * Everything comes from environment variables. `.env.local` is loaded before
 * `.env`; variables already set in the process environment win over both.
 * Selections (provider, engine, tool manager, prompt store) are checked
 * against the known implementations when the workflow is built.
 */

import { config as loadDotenv } from "dotenv";
import { resolve } from "path";
import { z } from "zod";
import { DEFAULT_CONFIDENCE_THRESHOLD } from "@/lib/purchaseOrders/fieldValidator";
import { WorkflowConfigError } from "@/lib/utils/error";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : null));

// Treat VAR= (set but empty) the same as an unset variable
const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const envSchema = z.object({
  LLM_PROVIDER: z.preprocess(blankToUndefined, z.string().default("openai")),
  LLM_MODEL: optionalString,
  OPENAI_MODEL_NAME: optionalString,
  LLM_BASE_URL: optionalString,
  OPENAI_API_KEY: optionalString,
  LLM_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(60_000)),
  LLM_MAX_RETRIES: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(2)),

  OCR_ENGINE: z.preprocess(blankToUndefined, z.string().default("pdf-text")),

  TOOL_MANAGER: z.preprocess(blankToUndefined, z.string().default("google")),
  GOOGLE_CLIENT_ID: optionalString,
  GOOGLE_CLIENT_SECRET: optionalString,
  GOOGLE_REFRESH_TOKEN: optionalString,
  GOOGLE_ACCESS_TOKEN: optionalString,

  PROMPT_STORE: z.preprocess(blankToUndefined, z.string().default("local")),
  PROMPTS_DIR: z.preprocess(blankToUndefined, z.string().default("prompts")),
  PROMPT_LANGUAGE: z.preprocess(blankToUndefined, z.string().default("en")),
  PROMPT_FALLBACK_LANGUAGE: z.preprocess(blankToUndefined, z.string().default("en")),

  CONFIDENCE_THRESHOLD: z.preprocess(
    blankToUndefined,
    z.coerce.number().min(0).max(1).default(DEFAULT_CONFIDENCE_THRESHOLD)
  ),

  SPREADSHEET_ID: z.string().default(""),
  SHEET_NAME: z.preprocess(blankToUndefined, z.string().default("Sheet1")),
});

export type AppConfig = {
  llmProvider: string;
  llmModel: string;
  llmBaseUrl: string | null;
  openaiApiKey: string | null;
  llmTimeoutMs: number;
  llmMaxRetries: number;

  ocrEngine: string;

  toolManager: string;
  google: {
    clientId: string | null;
    clientSecret: string | null;
    refreshToken: string | null;
    accessToken: string | null;
  };

  promptStore: string;
  promptsDir: string;
  promptLanguage: string;
  promptFallbackLanguage: string;

  confidenceThreshold: number;

  spreadsheetId: string;
  sheetName: string;
};

/**
 * Load `.env.local` then `.env` from the working directory into process.env.
 */
export function loadEnvFiles(cwd: string = process.cwd()): void {
  loadDotenv({ path: resolve(cwd, ".env.local") });
  loadDotenv({ path: resolve(cwd, ".env") });
}

/**
 * Parse configuration from an environment map. Throws WorkflowConfigError
 * listing every invalid variable.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new WorkflowConfigError(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;
  return {
    llmProvider: e.LLM_PROVIDER,
    llmModel: e.LLM_MODEL ?? e.OPENAI_MODEL_NAME ?? "gpt-4o-mini",
    llmBaseUrl: e.LLM_BASE_URL,
    openaiApiKey: e.OPENAI_API_KEY,
    llmTimeoutMs: e.LLM_TIMEOUT_MS,
    llmMaxRetries: e.LLM_MAX_RETRIES,

    ocrEngine: e.OCR_ENGINE,

    toolManager: e.TOOL_MANAGER,
    google: {
      clientId: e.GOOGLE_CLIENT_ID,
      clientSecret: e.GOOGLE_CLIENT_SECRET,
      refreshToken: e.GOOGLE_REFRESH_TOKEN,
      accessToken: e.GOOGLE_ACCESS_TOKEN,
    },

    promptStore: e.PROMPT_STORE,
    promptsDir: e.PROMPTS_DIR,
    promptLanguage: e.PROMPT_LANGUAGE,
    promptFallbackLanguage: e.PROMPT_FALLBACK_LANGUAGE,

    confidenceThreshold: e.CONFIDENCE_THRESHOLD,

    spreadsheetId: e.SPREADSHEET_ID,
    sheetName: e.SHEET_NAME,
  };
}

/**
 * Configuration for evaluation runs: mock tools, real language model.
 */
export function evalConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return { ...loadAppConfig(env), toolManager: "mock" };
}
