/**
 * Evaluation scenarios: an inbound email plus the outcome the workflow
 * should reach for it. Stored as JSON files of the form
 * { "scenarios": [ ... ] } under one directory.
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import { PO_FIELDS } from "@/lib/purchaseOrders/fields";
import { STAGE_NAMES } from "@/lib/workflow/state";
import type { EvalExpectation } from "./graders";

const scenarioSchema = z.object({
  id: z.string().min(1),
  category: z.string().min(1),
  description: z.string().default(""),
  input: z.object({
    email_subject: z.string(),
    email_body: z.string(),
    email_sender: z.string(),
    email_message_id: z.string().default("eval-message"),
    has_attachment: z.boolean().default(false),
    pdf_fixture: z.string().nullish(),
  }),
  expected: z.object({
    is_valid_po: z.boolean(),
    extracted_data: z.record(z.enum(PO_FIELDS), z.string().nullable()).nullish(),
    expected_trajectory: z.array(z.enum(STAGE_NAMES)),
    missing_fields: z.array(z.enum(PO_FIELDS)).default([]),
  }),
});

const scenarioFileSchema = z.object({ scenarios: z.array(scenarioSchema) });

export type EvalScenario = {
  id: string;
  category: string;
  description: string;
  input: {
    emailSubject: string;
    emailBody: string;
    emailSender: string;
    emailMessageId: string;
    hasAttachment: boolean;
    /** PDF file name, resolved against the fixtures directory */
    pdfFixture: string | null;
  };
  expected: EvalExpectation;
};

function toScenario(raw: z.infer<typeof scenarioSchema>): EvalScenario {
  return {
    id: raw.id,
    category: raw.category,
    description: raw.description,
    input: {
      emailSubject: raw.input.email_subject,
      emailBody: raw.input.email_body,
      emailSender: raw.input.email_sender,
      emailMessageId: raw.input.email_message_id,
      hasAttachment: raw.input.has_attachment,
      pdfFixture: raw.input.pdf_fixture ?? null,
    },
    expected: {
      isValidPo: raw.expected.is_valid_po,
      extractedData: raw.expected.extracted_data ?? null,
      trajectory: raw.expected.expected_trajectory,
      missingFields: raw.expected.missing_fields,
    },
  };
}

export function parseEvalScenarios(raw: unknown, source: string): EvalScenario[] {
  const parsed = scenarioFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid scenario file ${source}: ${parsed.error.message}`);
  }
  return parsed.data.scenarios.map(toScenario);
}

/**
 * Read every *.json file in `dir`, in file name order. Pass `category` to
 * keep only that category's scenarios.
 */
export function loadEvalScenarios(dir: string, category?: string): EvalScenario[] {
  if (!fs.existsSync(dir)) {
    throw new Error(`Scenario directory not found: ${dir}`);
  }

  const files = fs
    .readdirSync(dir)
    .filter((name) => name.endsWith(".json"))
    .sort();

  const scenarios = files.flatMap((name) => {
    const filePath = path.join(dir, name);
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
    return parseEvalScenarios(raw, filePath);
  });

  return category ? scenarios.filter((s) => s.category === category) : scenarios;
}
