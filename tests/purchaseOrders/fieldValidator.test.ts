/**
 * Unit tests for purchase order field validation
 */

import { describe, it, expect } from "vitest";
import { PO_FIELDS } from "@/lib/purchaseOrders/fields";
import {
  DEFAULT_CONFIDENCE_THRESHOLD,
  isValidThreshold,
  validateExtractedFields,
} from "@/lib/purchaseOrders/fieldValidator";
import { FULL_DATA } from "../helpers/fixtures";

const HIGH_CONFIDENCES = Object.fromEntries(PO_FIELDS.map((field) => [field, 0.9]));

describe("validateExtractedFields", () => {
  it("accepts a complete, confident extraction", () => {
    const result = validateExtractedFields(FULL_DATA, HIGH_CONFIDENCES);

    expect(result.missingFields).toEqual([]);
    expect(result.validationErrors).toEqual([]);
    expect(result.issues).toEqual([]);
  });

  it("defaults the threshold to 0.5", () => {
    expect(DEFAULT_CONFIDENCE_THRESHOLD).toBe(0.5);
  });

  it("flags null and empty values as missing", () => {
    const result = validateExtractedFields(
      { ...FULL_DATA, driver_phone: null, customer: "" },
      HIGH_CONFIDENCES
    );

    expect(result.missingFields).toEqual(["customer", "driver_phone"]);
    expect(result.validationErrors).toEqual([
      "Missing required field: customer",
      "Missing required field: driver_phone",
    ]);
  });

  it("flags a field absent from the map as missing", () => {
    const { driver_phone: _omitted, ...withoutPhone } = FULL_DATA;

    const result = validateExtractedFields(withoutPhone, HIGH_CONFIDENCES);

    expect(result.missingFields).toEqual(["driver_phone"]);
  });

  it("flags low confidence with a reason distinct from missing", () => {
    const result = validateExtractedFields(
      FULL_DATA,
      { ...HIGH_CONFIDENCES, customer: 0.2 },
      0.5
    );

    expect(result.missingFields).toEqual(["customer"]);
    expect(result.validationErrors).toEqual(["Low confidence for customer: 0.20 < 0.50"]);
    expect(result.issues[0].kind).toBe("low_confidence");
  });

  it("does not flag a confidence equal to the threshold", () => {
    const result = validateExtractedFields(FULL_DATA, { ...HIGH_CONFIDENCES, driver_name: 0.5 }, 0.5);

    expect(result.missingFields).toEqual([]);
  });

  it("scores a field without a confidence entry as 0", () => {
    const { customer: _omitted, ...partialConfidences } = HIGH_CONFIDENCES;

    const result = validateExtractedFields(FULL_DATA, partialConfidences, 0.5);

    expect(result.missingFields).toEqual(["customer"]);
    expect(result.validationErrors).toEqual(["Low confidence for customer: 0.00 < 0.50"]);
  });

  it("reports a missing field once, not also as low confidence", () => {
    const result = validateExtractedFields({ ...FULL_DATA, order_id: null }, { ...HIGH_CONFIDENCES, order_id: 0 });

    expect(result.issues).toEqual([
      { field: "order_id", kind: "missing", reason: "Missing required field: order_id" },
    ]);
  });

  it("keeps canonical field order regardless of map order", () => {
    const reversedData = Object.fromEntries(
      [...PO_FIELDS].reverse().map((field) => [field, null])
    );

    const result = validateExtractedFields(reversedData, {});

    expect(result.missingFields).toEqual([...PO_FIELDS]);
  });

  it("treats missing extraction data as all fields missing", () => {
    const result = validateExtractedFields(null, undefined);

    expect(result.missingFields).toEqual([...PO_FIELDS]);
    expect(result.validationErrors).toHaveLength(PO_FIELDS.length);
  });

  it("honours a custom threshold", () => {
    const result = validateExtractedFields(FULL_DATA, { ...HIGH_CONFIDENCES, driver_name: 0.6 }, 0.7);

    expect(result.missingFields).toEqual(["driver_name"]);
    expect(result.validationErrors).toEqual(["Low confidence for driver_name: 0.60 < 0.70"]);
  });
});

describe("isValidThreshold", () => {
  it("accepts values in [0, 1]", () => {
    expect(isValidThreshold(0)).toBe(true);
    expect(isValidThreshold(0.5)).toBe(true);
    expect(isValidThreshold(1)).toBe(true);
  });

  it("rejects values outside [0, 1] and NaN", () => {
    expect(isValidThreshold(-0.1)).toBe(false);
    expect(isValidThreshold(1.5)).toBe(false);
    expect(isValidThreshold(Number.NaN)).toBe(false);
  });
});
