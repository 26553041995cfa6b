/**
 * Field-level validation of an extracted purchase order.
 *
 * A field is unusable when its value is missing (absent, null or empty) or,
 * failing that, when its confidence is strictly below the threshold. A field
 * with no confidence entry is scored 0.
 */

import { PO_FIELDS, type ExtractedFields, type FieldConfidences, type PoField } from "./fields";

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.5;

export type FieldIssueKind = "missing" | "low_confidence";

export type FieldIssue = {
  field: PoField;
  kind: FieldIssueKind;
  reason: string;
};

export type FieldValidationResult = {
  /** Unusable fields, in PO_FIELDS order */
  missingFields: PoField[];
  /** One message per entry of missingFields, same order */
  validationErrors: string[];
  issues: FieldIssue[];
};

export function isValidThreshold(threshold: number): boolean {
  return Number.isFinite(threshold) && threshold >= 0 && threshold <= 1;
}

export function validateExtractedFields(
  fields: ExtractedFields | null | undefined,
  confidences: FieldConfidences | null | undefined,
  threshold: number = DEFAULT_CONFIDENCE_THRESHOLD
): FieldValidationResult {
  const issues: FieldIssue[] = [];

  for (const field of PO_FIELDS) {
    const value = fields?.[field];
    const confidence = confidences?.[field] ?? 0;

    if (value == null || value === "") {
      issues.push({
        field,
        kind: "missing",
        reason: `Missing required field: ${field}`,
      });
    } else if (confidence < threshold) {
      issues.push({
        field,
        kind: "low_confidence",
        reason: `Low confidence for ${field}: ${confidence.toFixed(2)} < ${threshold.toFixed(2)}`,
      });
    }
  }

  return {
    missingFields: issues.map((issue) => issue.field),
    validationErrors: issues.map((issue) => issue.reason),
    issues,
  };
}
