/**
 * PO workflow graph.
 *
 *   classify -> (valid PO?) -> extract -> validate -> (missing fields?) -> track -> notify -> report
 *                                                                    \-> notify -> report
 *            \-> (not a PO) -> report
 *
 * Two kinds of "skip" exist and both are intentional to the observable
 * behaviour:
 * - routing: a stage the graph never reaches is absent from the trajectory
 *   (extract..notify for a non-PO, track when fields are missing);
 * - declining: a reached stage that does nothing (after an error, or
 *   extract/track/notify without a valid PO) still appears in it.
 */

import { mergeState, STAGE_NAMES, type StageName, type WorkflowState } from "./state";
import type { Stage } from "./stage";

export const END = "__end__" as const;

export type NextStep = StageName | typeof END;

export type WorkflowStages = Record<StageName, Stage>;

export const ENTRY_STAGE: StageName = "classify";

export function routeAfterClassify(state: WorkflowState): "extract" | "report" {
  return state.isValidPo ? "extract" : "report";
}

export function routeAfterValidate(state: WorkflowState): "track" | "notify" {
  return (state.missingFields ?? []).length > 0 ? "notify" : "track";
}

export const TRANSITIONS: Record<StageName, (state: WorkflowState) => NextStep> = {
  classify: routeAfterClassify,
  extract: () => "validate",
  validate: routeAfterValidate,
  track: () => "notify",
  notify: () => "report",
  report: () => END,
};

/**
 * Drive one run from the entry stage to the end, merging each stage's update
 * into a new state record. The caller's state is never mutated.
 */
export async function runWorkflow(
  stages: WorkflowStages,
  initialState: WorkflowState
): Promise<WorkflowState> {
  let state = initialState;
  let step: NextStep = ENTRY_STAGE;
  let invocations = 0;

  while (step !== END) {
    // The graph is acyclic, so no run can visit more stages than exist.
    if (invocations >= STAGE_NAMES.length) {
      throw new Error(`Workflow exceeded ${STAGE_NAMES.length} stage invocations at "${step}"`);
    }
    invocations++;

    const update = await stages[step](state);
    state = mergeState(state, update);
    step = TRANSITIONS[step](state);
  }

  return state;
}

export type CompiledWorkflow = {
  run(initialState: WorkflowState): Promise<WorkflowState>;
};

export function compileWorkflow(stages: WorkflowStages): CompiledWorkflow {
  return {
    run: (initialState) => runWorkflow(stages, initialState),
  };
}
