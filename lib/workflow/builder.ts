/**
 * Wires capabilities and stages from configuration.
 *
 * Each capability role has a closed set of implementations chosen by a
 * config value. Unknown selections and missing settings throw
 * WorkflowConfigError here, before any run can start.
 */

import { loadAppConfig, loadEnvFiles, type AppConfig } from "@/lib/config/app";
import { createGoogleAuth } from "@/lib/google/gmail";
import { OpenAiLlmService } from "@/lib/services/llm/openaiLlm";
import type { LlmService } from "@/lib/services/llm/types";
import { PdfTextExtractor } from "@/lib/services/ocr/pdfTextExtractor";
import type { DocumentTextExtractor } from "@/lib/services/ocr/types";
import { LocalPromptStore } from "@/lib/services/prompts/localPromptStore";
import type { PromptStore } from "@/lib/services/prompts/types";
import { GoogleToolManager } from "@/lib/services/tools/googleToolManager";
import { MockToolManager } from "@/lib/services/tools/mockToolManager";
import type { ToolManager } from "@/lib/services/tools/types";
import { getErrorMessage, WorkflowConfigError } from "@/lib/utils/error";
import { compileWorkflow, type CompiledWorkflow, type WorkflowStages } from "./graph";
import { createClassifyStage } from "./stages/classify";
import { createExtractStage } from "./stages/extract";
import { createNotifyStage } from "./stages/notify";
import { createReportStage } from "./stages/report";
import { createTrackStage } from "./stages/track";
import { createValidateStage } from "./stages/validate";

export type WorkflowServices = {
  llm: LlmService;
  textExtractor: DocumentTextExtractor;
  tools: ToolManager;
  prompts: PromptStore;
};

export type WorkflowSettings = {
  confidenceThreshold: number;
  spreadsheetId: string;
};

export function buildLlm(config: AppConfig): LlmService {
  if (config.llmProvider === "openai") {
    if (!config.openaiApiKey) {
      throw new WorkflowConfigError("OPENAI_API_KEY is required for LLM_PROVIDER=openai");
    }
    return new OpenAiLlmService({
      apiKey: config.openaiApiKey,
      model: config.llmModel,
      baseUrl: config.llmBaseUrl,
      timeoutMs: config.llmTimeoutMs,
      maxRetries: config.llmMaxRetries,
    });
  }
  throw new WorkflowConfigError(`Unknown LLM provider: ${config.llmProvider}`);
}

export function buildTextExtractor(config: AppConfig): DocumentTextExtractor {
  if (config.ocrEngine === "pdf-text") {
    return new PdfTextExtractor();
  }
  throw new WorkflowConfigError(`Unknown OCR engine: ${config.ocrEngine}`);
}

export function buildToolManager(config: AppConfig): ToolManager {
  if (config.toolManager === "mock") {
    return new MockToolManager();
  }
  if (config.toolManager === "google") {
    const { clientId, clientSecret, refreshToken, accessToken } = config.google;
    const canRefresh = Boolean(clientId && clientSecret && refreshToken);
    if (!canRefresh && !accessToken) {
      throw new WorkflowConfigError(
        "TOOL_MANAGER=google needs GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET and GOOGLE_REFRESH_TOKEN (or GOOGLE_ACCESS_TOKEN)"
      );
    }
    if (!config.spreadsheetId) {
      throw new WorkflowConfigError("SPREADSHEET_ID is required for TOOL_MANAGER=google");
    }
    return new GoogleToolManager({
      auth: createGoogleAuth(config.google),
      sheetName: config.sheetName,
    });
  }
  throw new WorkflowConfigError(`Unknown tool manager: ${config.toolManager}`);
}

export function buildPromptStore(config: AppConfig): PromptStore {
  if (config.promptStore === "local") {
    try {
      return new LocalPromptStore({
        promptsDir: config.promptsDir,
        language: config.promptLanguage,
        fallbackLanguage: config.promptFallbackLanguage,
      });
    } catch (error) {
      throw new WorkflowConfigError(getErrorMessage(error));
    }
  }
  throw new WorkflowConfigError(`Unknown prompt store: ${config.promptStore}`);
}

export function buildStages(services: WorkflowServices, settings: WorkflowSettings): WorkflowStages {
  const { llm, textExtractor, tools, prompts } = services;
  return {
    classify: createClassifyStage({ llm, prompts }),
    extract: createExtractStage({ textExtractor, llm, prompts }),
    validate: createValidateStage({ confidenceThreshold: settings.confidenceThreshold }),
    track: createTrackStage({ tools, spreadsheetId: settings.spreadsheetId }),
    notify: createNotifyStage({ llm, tools, prompts }),
    report: createReportStage(),
  };
}

export type BuiltWorkflow = {
  workflow: CompiledWorkflow;
  services: WorkflowServices;
  config: AppConfig;
};

/**
 * Build the workflow from configuration. Pass `overrides` to substitute
 * individual capabilities (tests, evaluation harnesses).
 */
export function buildWorkflow(
  config: AppConfig,
  overrides: Partial<WorkflowServices> = {}
): BuiltWorkflow {
  const services: WorkflowServices = {
    llm: overrides.llm ?? buildLlm(config),
    textExtractor: overrides.textExtractor ?? buildTextExtractor(config),
    tools: overrides.tools ?? buildToolManager(config),
    prompts: overrides.prompts ?? buildPromptStore(config),
  };

  const stages = buildStages(services, {
    confidenceThreshold: config.confidenceThreshold,
    spreadsheetId: config.spreadsheetId,
  });

  return { workflow: compileWorkflow(stages), services, config };
}

/**
 * Load env files, parse configuration and build the workflow.
 */
export function buildWorkflowFromEnv(): BuiltWorkflow {
  loadEnvFiles();
  return buildWorkflow(loadAppConfig());
}
