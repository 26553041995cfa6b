/**
 * Evaluation runner.
 *
 * Runs each scenario through the workflow with the in-memory tool manager,
 * grades the outcome and averages every grader across the run. Scenarios
 * run one at a time because they share one tool manager, which is reset
 * before each.
 */

import fs from "fs";
import path from "path";
import { evalConfig, loadEnvFiles } from "@/lib/config/app";
import { MockToolManager } from "@/lib/services/tools/mockToolManager";
import { buildWorkflow, type WorkflowServices } from "@/lib/workflow/builder";
import type { CompiledWorkflow } from "@/lib/workflow/graph";
import { createInitialState, type FinalStatus } from "@/lib/workflow/state";
import { gradeRun, type EvalObservation, type GradeResult, type GraderName } from "./graders";
import { loadEvalScenarios, type EvalScenario } from "./scenarios";

export type EvalHarness = {
  workflow: CompiledWorkflow;
  tools: MockToolManager;
};

export type ScenarioResult = {
  scenarioId: string;
  category: string;
  finalStatus: FinalStatus | null;
  observation: EvalObservation;
  scores: GradeResult[];
};

export type EvalReport = {
  results: ScenarioResult[];
  /** Mean score per grader across all scenarios */
  averages: Partial<Record<GraderName, number>>;
};

export type RunEvaluationOptions = {
  /** Directory that `pdfFixture` names are resolved against */
  fixturesDir?: string;
};

/**
 * Build a workflow on the evaluation configuration. The tool manager is
 * always a fresh MockToolManager; other capabilities can be overridden.
 */
export function createEvalHarness(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<Omit<WorkflowServices, "tools">> = {}
): EvalHarness {
  const tools = new MockToolManager();
  const { workflow } = buildWorkflow(evalConfig(env), { ...overrides, tools });
  return { workflow, tools };
}

function loadPdfFixture(scenario: EvalScenario, fixturesDir: string | undefined): Buffer | null {
  const { pdfFixture } = scenario.input;
  if (!pdfFixture || !fixturesDir) return null;

  const filePath = path.join(fixturesDir, pdfFixture);
  if (!fs.existsSync(filePath)) {
    console.warn(`[Eval] PDF fixture not found for ${scenario.id}: ${filePath}`);
    return null;
  }
  return fs.readFileSync(filePath);
}

export async function runScenario(
  harness: EvalHarness,
  scenario: EvalScenario,
  options: RunEvaluationOptions = {}
): Promise<ScenarioResult> {
  const { workflow, tools } = harness;
  tools.reset();

  const state = createInitialState({
    emailSubject: scenario.input.emailSubject,
    emailBody: scenario.input.emailBody,
    emailSender: scenario.input.emailSender,
    emailMessageId: scenario.input.emailMessageId,
    hasAttachment: scenario.input.hasAttachment,
    pdfBytes: loadPdfFixture(scenario, options.fixturesDir),
  });

  const result = await workflow.run(state);

  const observation: EvalObservation = {
    isValidPo: result.isValidPo ?? false,
    extractedData: result.extractedData ?? null,
    trajectory: [...result.trajectory],
    missingFields: [...(result.missingFields ?? [])],
    finalStatus: result.finalStatus ?? "error",
    emailBody: tools.emailsSent[0]?.body ?? null,
  };

  const scores = gradeRun(observation, scenario.expected);
  const summary = scores.map((s) => `${s.name}=${s.value.toFixed(2)}`).join(" ");
  console.log(`[Eval] ${scenario.id} (${result.finalStatus ?? "no status"}): ${summary}`);

  return {
    scenarioId: scenario.id,
    category: scenario.category,
    finalStatus: result.finalStatus ?? null,
    observation,
    scores,
  };
}

export function averageScores(results: ScenarioResult[]): Partial<Record<GraderName, number>> {
  const totals = new Map<GraderName, { sum: number; count: number }>();
  for (const { scores } of results) {
    for (const score of scores) {
      const entry = totals.get(score.name) ?? { sum: 0, count: 0 };
      entry.sum += score.value;
      entry.count++;
      totals.set(score.name, entry);
    }
  }

  const averages: Partial<Record<GraderName, number>> = {};
  for (const [name, { sum, count }] of totals) {
    averages[name] = sum / count;
  }
  return averages;
}

export async function runEvaluation(
  harness: EvalHarness,
  scenarios: EvalScenario[],
  options: RunEvaluationOptions = {}
): Promise<EvalReport> {
  console.log(`[Eval] Running ${scenarios.length} scenario(s)`);

  const results: ScenarioResult[] = [];
  for (const scenario of scenarios) {
    results.push(await runScenario(harness, scenario, options));
  }

  const averages = averageScores(results);
  for (const [name, value] of Object.entries(averages)) {
    if (value === undefined) continue;
    console.log(`[Eval] ${name}: ${value.toFixed(2)}`);
  }

  return { results, averages };
}

/**
 * Load env files and scenarios from disk and run them against the
 * configured language model.
 */
export async function runEvaluationFromEnv(
  options: { scenariosDir?: string; fixturesDir?: string; category?: string } = {}
): Promise<EvalReport> {
  loadEnvFiles();
  const scenarios = loadEvalScenarios(options.scenariosDir ?? "evals/scenarios", options.category);
  return runEvaluation(createEvalHarness(), scenarios, {
    fixturesDir: options.fixturesDir ?? "evals/fixtures",
  });
}
