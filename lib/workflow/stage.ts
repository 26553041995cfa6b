/**
 * Stage contract shared by every pipeline stage.
 *
 * 1. If an earlier stage failed (finalStatus "error"), do nothing but record
 *    the visit in the trajectory.
 * 2. Stages that act on a purchase order (extract, track, notify) also do
 *    nothing when the email was not classified as a valid PO.
 * 3. Otherwise run the stage body and return its fields plus the trajectory
 *    entry.
 * 4. A fault in the body becomes an explicit error outcome at this boundary
 *    and is recorded as `finalStatus: "error"` with
 *    `"<Label> failed: <cause>"`. It never reaches the graph driver.
 */

import { attempt } from "@/lib/utils/error";
import type { StageName, WorkflowState, WorkflowUpdate } from "./state";

export type Stage = (state: WorkflowState) => Promise<WorkflowUpdate>;

/**
 * Fields a stage body may produce. The trajectory and error fields are
 * written by the contract only.
 */
export type StageFields = Omit<WorkflowUpdate, "trajectory" | "errorMessage">;

export type StageDefinition = {
  name: StageName;
  /** Used in error messages and log tags, e.g. "ExtractStage" */
  label: string;
  /** Decline to act unless the email was classified as a valid PO */
  requiresValidPo: boolean;
  run: (state: WorkflowState) => Promise<StageFields>;
};

export const STAGE_LABELS: Record<StageName, string> = {
  classify: "ClassifyStage",
  extract: "ExtractStage",
  validate: "ValidateStage",
  track: "TrackStage",
  notify: "NotifyStage",
  report: "ReportStage",
};

export function defineStage(definition: StageDefinition): Stage {
  const { name, label, requiresValidPo, run } = definition;

  return async (state) => {
    const trajectory = [...state.trajectory, name];

    if (state.finalStatus === "error") {
      return { trajectory };
    }

    if (requiresValidPo && !state.isValidPo) {
      return { trajectory };
    }

    const outcome = await attempt(() => run(state));

    if (!outcome.ok) {
      console.error(`[${label}] failed:`, {
        messageId: state.emailMessageId,
        error: outcome.error,
      });
      return {
        finalStatus: "error",
        errorMessage: `${label} failed: ${outcome.error}`,
        trajectory,
      };
    }

    return { ...outcome.value, trajectory };
  };
}
