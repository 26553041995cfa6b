import type { FinalStatus, WorkflowState } from "../state";
import { defineStage, STAGE_LABELS, type Stage } from "../stage";

/**
 * Final status of a run. Error wins over everything, including missing
 * fields.
 */
export function computeFinalStatus(
  state: Pick<WorkflowState, "errorMessage" | "isValidPo" | "missingFields">
): FinalStatus {
  if (state.errorMessage) return "error";
  if (!state.isValidPo) return "skipped";
  if ((state.missingFields ?? []).length > 0) return "missing_info";
  return "completed";
}

export function createReportStage(): Stage {
  return defineStage({
    name: "report",
    label: STAGE_LABELS.report,
    requiresValidPo: false,
    run: async (state) => {
      const finalStatus = computeFinalStatus(state);
      console.log(`[${STAGE_LABELS.report}] ${finalStatus}`, {
        messageId: state.emailMessageId,
        poId: state.poId ?? null,
        missingFields: state.missingFields ?? [],
        actions: state.actionsLog,
      });
      return { finalStatus };
    },
  });
}
