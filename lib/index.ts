/**
 * PO intake workflow - public entry point.
 *
 * Host usage:
 *   const { workflow, services } = buildWorkflowFromEnv();
 *   const finalState = await processInboundEmail(payload, { workflow, tools: services.tools });
 */

// Workflow
export { buildWorkflow, buildWorkflowFromEnv, buildStages } from "./workflow/builder";
export type { BuiltWorkflow, WorkflowServices, WorkflowSettings } from "./workflow/builder";
export {
  runWorkflow,
  compileWorkflow,
  routeAfterClassify,
  routeAfterValidate,
  END,
} from "./workflow/graph";
export type { CompiledWorkflow, WorkflowStages } from "./workflow/graph";
export { createInitialState, mergeState, STAGE_NAMES } from "./workflow/state";
export type {
  FinalStatus,
  StageName,
  WorkflowInput,
  WorkflowState,
  WorkflowUpdate,
} from "./workflow/state";
export { defineStage, STAGE_LABELS } from "./workflow/stage";
export type { Stage, StageDefinition } from "./workflow/stage";
export { computeFinalStatus } from "./workflow/stages/report";

// Purchase orders
export { PO_FIELDS } from "./purchaseOrders/fields";
export type { PoField, ExtractedFields, FieldConfidences } from "./purchaseOrders/fields";
export {
  validateExtractedFields,
  DEFAULT_CONFIDENCE_THRESHOLD,
} from "./purchaseOrders/fieldValidator";
export type { FieldValidationResult } from "./purchaseOrders/fieldValidator";

// Intake
export {
  parseInboundEmailPayload,
  processInboundEmail,
  InboundPayloadError,
} from "./intake/inboundEmail";
export type { InboundEmail } from "./intake/inboundEmail";

// Configuration
export { loadAppConfig, loadEnvFiles, evalConfig } from "./config/app";
export type { AppConfig } from "./config/app";
export { WorkflowConfigError } from "./utils/error";

// Capabilities
export type { LlmService, ChatMessage } from "./services/llm/types";
export type { DocumentTextExtractor } from "./services/ocr/types";
export type { ToolManager, ToolAck, EmailMessage } from "./services/tools/types";
export type { PromptStore, PromptTemplate } from "./services/prompts/types";
export { MockToolManager } from "./services/tools/mockToolManager";

// Evaluation
export {
  gradeClassification,
  gradeEmailQuality,
  gradeExtraction,
  gradeRun,
  gradeTrajectory,
  gradeValidation,
} from "./evals/graders";
export type { EvalExpectation, EvalObservation, GradeResult, GraderName } from "./evals/graders";
export { loadEvalScenarios, parseEvalScenarios } from "./evals/scenarios";
export type { EvalScenario } from "./evals/scenarios";
export {
  averageScores,
  createEvalHarness,
  runEvaluation,
  runEvaluationFromEnv,
  runScenario,
} from "./evals/runner";
export type { EvalHarness, EvalReport, ScenarioResult } from "./evals/runner";
