import { PO_FIELDS } from "@/lib/purchaseOrders/fields";
import type { ToolManager } from "@/lib/services/tools/types";
import type { WorkflowState } from "../state";
import { defineStage, STAGE_LABELS, type Stage } from "../stage";

export type TrackStageDeps = {
  tools: ToolManager;
  spreadsheetId: string;
};

export type RowStatus = "complete" | "pending_info";

/**
 * Tracking-sheet row: PO id, the six remaining canonical fields, status.
 */
export function buildTrackingRow(state: WorkflowState): string[] {
  const data = state.extractedData ?? {};
  const status: RowStatus = (state.missingFields ?? []).length === 0 ? "complete" : "pending_info";
  const fieldValues = PO_FIELDS.filter((field) => field !== "order_id").map(
    (field) => data[field] ?? ""
  );
  return [state.poId ?? "", ...fieldValues, status];
}

export function createTrackStage({ tools, spreadsheetId }: TrackStageDeps): Stage {
  return defineStage({
    name: "track",
    label: STAGE_LABELS.track,
    requiresValidPo: true,
    run: async (state) => {
      await tools.appendSheetRow(spreadsheetId, buildTrackingRow(state));
      return {
        sheetRowAdded: true,
        actionsLog: [...state.actionsLog, `sheet_row_appended:${spreadsheetId}`],
      };
    },
  });
}
