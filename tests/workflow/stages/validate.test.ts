/**
 * Unit tests for the validate stage
 */

import { describe, it, expect } from "vitest";
import { WorkflowConfigError } from "@/lib/utils/error";
import { createValidateStage } from "@/lib/workflow/stages/validate";
import { FULL_CONFIDENCES, FULL_DATA, poEmailState } from "../../helpers/fixtures";

describe("validate stage", () => {
  it("passes a complete, confident extraction", async () => {
    const stage = createValidateStage();

    const update = await stage(
      poEmailState({
        isValidPo: true,
        extractedData: FULL_DATA,
        fieldConfidences: FULL_CONFIDENCES,
        trajectory: ["classify", "extract"],
      })
    );

    expect(update).toEqual({
      missingFields: [],
      validationErrors: [],
      trajectory: ["classify", "extract", "validate"],
    });
  });

  it("flags missing and low-confidence fields in canonical order", async () => {
    const stage = createValidateStage();

    const update = await stage(
      poEmailState({
        isValidPo: true,
        extractedData: { ...FULL_DATA, driver_phone: null },
        fieldConfidences: { ...FULL_CONFIDENCES, customer: 0.2 },
      })
    );

    expect(update.missingFields).toEqual(["customer", "driver_phone"]);
    expect(update.validationErrors).toEqual([
      "Low confidence for customer: 0.20 < 0.50",
      "Missing required field: driver_phone",
    ]);
  });

  it("uses the configured threshold", async () => {
    const stage = createValidateStage({ confidenceThreshold: 0.8 });

    const update = await stage(
      poEmailState({ isValidPo: true, extractedData: FULL_DATA, fieldConfidences: FULL_CONFIDENCES })
    );

    expect(update.missingFields).toEqual(["delivery_datetime", "driver_name", "driver_phone"]);
  });

  it("reports every field missing when nothing was extracted", async () => {
    const stage = createValidateStage();

    const update = await stage(poEmailState({ isValidPo: true, extractedData: null }));

    expect(update.missingFields).toHaveLength(7);
    expect(update.validationErrors?.[0]).toBe("Missing required field: order_id");
  });

  it("rejects a threshold outside [0, 1] at construction", () => {
    expect(() => createValidateStage({ confidenceThreshold: 1.5 })).toThrow(WorkflowConfigError);
    expect(() => createValidateStage({ confidenceThreshold: -0.1 })).toThrow(
      "Confidence threshold must be between 0 and 1, got -0.1"
    );
  });

  it("does nothing after an earlier error", async () => {
    const stage = createValidateStage();

    const update = await stage(
      poEmailState({ isValidPo: true, finalStatus: "error", trajectory: ["classify", "extract"] })
    );

    expect(update).toEqual({ trajectory: ["classify", "extract", "validate"] });
  });
});
