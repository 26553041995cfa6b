import { PO_FIELDS, type ExtractedFields, type FieldConfidences } from "@/lib/purchaseOrders/fields";
import { extractionResponseSchema } from "@/lib/purchaseOrders/schemas";
import type { LlmService } from "@/lib/services/llm/types";
import type { DocumentTextExtractor } from "@/lib/services/ocr/types";
import type { PromptStore } from "@/lib/services/prompts/types";
import { defineStage, STAGE_LABELS, type Stage } from "../stage";

export type ExtractStageDeps = {
  textExtractor: DocumentTextExtractor;
  llm: LlmService;
  prompts: PromptStore;
};

export const MAX_EXTRACTION_TEXT_CHARS = 8000;

export const NO_ATTACHMENT_WARNING = "No PDF attachment; extracted from email body";

export const EMPTY_DOCUMENT_WARNING = "No text extracted from PDF attachment; extracted from email body";

function clampConfidence(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Read the attached document and extract the canonical PO fields from it.
 */
export function createExtractStage({ textExtractor, llm, prompts }: ExtractStageDeps): Stage {
  return defineStage({
    name: "extract",
    label: STAGE_LABELS.extract,
    requiresValidPo: true,
    run: async (state) => {
      const warnings: string[] = [];
      let rawText: string;

      if (state.pdfBytes && state.pdfBytes.length > 0) {
        rawText = await textExtractor.extractText(state.pdfBytes);
        // Image-only PDFs have no text layer
        if (!rawText.trim()) {
          rawText = state.emailBody;
          warnings.push(EMPTY_DOCUMENT_WARNING);
        }
      } else {
        rawText = state.emailBody;
        warnings.push(NO_ATTACHMENT_WARNING);
      }

      const response = await llm.structuredOutput(
        [
          { role: "system", content: prompts.getAndRender("extract", "system") },
          {
            role: "user",
            content: prompts.getAndRender("extract", "user", {
              ocr_text: rawText.slice(0, MAX_EXTRACTION_TEXT_CHARS),
            }),
          },
        ],
        extractionResponseSchema,
        "po_extraction"
      );

      const extractedData: ExtractedFields = {};
      const fieldConfidences: FieldConfidences = {};
      for (const field of PO_FIELDS) {
        extractedData[field] = response.data[field];
        fieldConfidences[field] = clampConfidence(response.field_confidences[field]);
      }

      return {
        rawText,
        extractedData,
        fieldConfidences,
        extractionWarnings: [...warnings, ...response.warnings],
      };
    },
  });
}
