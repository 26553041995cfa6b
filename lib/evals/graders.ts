/**
 * Deterministic graders for evaluation runs.
 *
 * Each grader scores one aspect of a finished run against the expected
 * outcome of its scenario, on a 0..1 scale, with a short reason.
 */

import { PO_FIELDS, type ExtractedFields } from "@/lib/purchaseOrders/fields";
import type { FinalStatus } from "@/lib/workflow/state";

export type GradeResult = {
  name: GraderName;
  value: number;
  reason: string;
};

export type GraderName =
  | "classification_accuracy"
  | "extraction_accuracy"
  | "trajectory_correctness"
  | "validation_correctness"
  | "email_quality";

/** What a run produced, reduced to the graded fields */
export type EvalObservation = {
  isValidPo: boolean;
  extractedData: ExtractedFields | null;
  trajectory: string[];
  missingFields: string[];
  finalStatus: FinalStatus;
  emailBody: string | null;
};

export type EvalExpectation = {
  isValidPo: boolean;
  /** null when no extraction should happen (not a PO) */
  extractedData: ExtractedFields | null;
  trajectory: string[];
  missingFields: string[];
};

export function gradeClassification(isValidPo: boolean, expected: boolean): GradeResult {
  return {
    name: "classification_accuracy",
    value: isValidPo === expected ? 1 : 0,
    reason: `Expected ${expected}, got ${isValidPo}`,
  };
}

export function gradeTrajectory(trajectory: string[], expected: string[]): GradeResult {
  const matches =
    trajectory.length === expected.length && trajectory.every((stage, i) => stage === expected[i]);
  return {
    name: "trajectory_correctness",
    value: matches ? 1 : 0,
    reason: `Expected [${expected.join(", ")}], got [${trajectory.join(", ")}]`,
  };
}

/**
 * F1 of the flagged fields against the expected set. Order is ignored.
 */
export function gradeValidation(missingFields: string[], expected: string[]): GradeResult {
  const expectedSet = new Set(expected);
  const actualSet = new Set(missingFields);

  if (expectedSet.size === 0 && actualSet.size === 0) {
    return { name: "validation_correctness", value: 1, reason: "No missing fields expected or found" };
  }

  const hits = [...actualSet].filter((field) => expectedSet.has(field)).length;
  const precision = actualSet.size > 0 ? hits / actualSet.size : 0;
  const recall = expectedSet.size > 0 ? hits / expectedSet.size : 1;
  const f1 = precision + recall > 0 ? (2 * precision * recall) / (precision + recall) : 0;

  return {
    name: "validation_correctness",
    value: f1,
    reason: `P=${precision.toFixed(2)} R=${recall.toFixed(2)} F1=${f1.toFixed(2)}`,
  };
}

function normalizeValue(value: string | null | undefined): string | null {
  return value == null ? null : value.trim().toLowerCase();
}

/**
 * Share of expected field values reproduced, compared trimmed and
 * lowercased. Fields the expectation leaves null are not counted.
 */
export function gradeExtraction(
  extractedData: ExtractedFields | null,
  expected: ExtractedFields | null
): GradeResult {
  if (expected === null) {
    return {
      name: "extraction_accuracy",
      value: extractedData === null ? 1 : 0,
      reason: extractedData === null ? "No extraction expected" : "Extraction ran for a non-PO",
    };
  }
  if (extractedData === null) {
    return { name: "extraction_accuracy", value: 0, reason: "No data extracted" };
  }

  let correct = 0;
  let total = 0;
  const mismatches: string[] = [];

  for (const field of PO_FIELDS) {
    const want = expected[field];
    if (want == null) continue;
    total++;

    const got = extractedData[field];
    if (normalizeValue(got) === normalizeValue(want)) {
      correct++;
    } else {
      mismatches.push(`${field}: expected '${want}', got '${got ?? "null"}'`);
    }
  }

  const summary = `${correct}/${total} fields correct`;
  return {
    name: "extraction_accuracy",
    value: total > 0 ? correct / total : 1,
    reason: mismatches.length > 0 ? `${summary}. Mismatches: ${mismatches.join("; ")}` : summary,
  };
}

const CONFIRMATION_WORDS = ["confirm", "received", "processing", "recibido", "procesando"];

/**
 * Heuristic quality checks on the sent email, 0.25 each: length, PO id,
 * confirmation wording, customer name.
 */
export function gradeEmailQuality(
  emailBody: string | null,
  expectedData: ExtractedFields | null,
  finalStatus: FinalStatus
): GradeResult {
  if (finalStatus === "skipped") {
    return emailBody === null
      ? { name: "email_quality", value: 1, reason: "No email for skipped scenario" }
      : { name: "email_quality", value: 0, reason: "Email sent for skipped scenario" };
  }
  if (emailBody === null) {
    return { name: "email_quality", value: 0, reason: "No email sent" };
  }

  const lowerBody = emailBody.toLowerCase();
  const poId = expectedData?.order_id ?? "";
  const customer = expectedData?.customer ?? "";

  const checks: string[] = [];
  if (emailBody.length > 50) checks.push("sufficient_length");
  if (poId && emailBody.includes(poId)) checks.push("mentions_po_id");
  if (CONFIRMATION_WORDS.some((word) => lowerBody.includes(word))) checks.push("confirmation_language");
  if (customer && lowerBody.includes(customer.toLowerCase())) checks.push("mentions_customer");

  return {
    name: "email_quality",
    value: checks.length * 0.25,
    reason: `Checks passed: ${checks.join(", ") || "none"}`,
  };
}

export function gradeRun(observation: EvalObservation, expected: EvalExpectation): GradeResult[] {
  return [
    gradeClassification(observation.isValidPo, expected.isValidPo),
    gradeExtraction(observation.extractedData, expected.extractedData),
    gradeTrajectory(observation.trajectory, expected.trajectory),
    gradeValidation(observation.missingFields, expected.missingFields),
    gradeEmailQuality(observation.emailBody, expected.extractedData, observation.finalStatus),
  ];
}
