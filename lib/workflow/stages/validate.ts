import {
  DEFAULT_CONFIDENCE_THRESHOLD,
  isValidThreshold,
  validateExtractedFields,
} from "@/lib/purchaseOrders/fieldValidator";
import { WorkflowConfigError } from "@/lib/utils/error";
import { defineStage, STAGE_LABELS, type Stage } from "../stage";

export type ValidateStageOptions = {
  confidenceThreshold?: number;
};

export function createValidateStage(options: ValidateStageOptions = {}): Stage {
  const threshold = options.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
  if (!isValidThreshold(threshold)) {
    throw new WorkflowConfigError(`Confidence threshold must be between 0 and 1, got ${threshold}`);
  }

  return defineStage({
    name: "validate",
    label: STAGE_LABELS.validate,
    requiresValidPo: false,
    run: async (state) => {
      const { missingFields, validationErrors } = validateExtractedFields(
        state.extractedData,
        state.fieldConfidences,
        threshold
      );
      return { missingFields, validationErrors };
    },
  });
}
