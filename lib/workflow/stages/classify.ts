import { classificationResultSchema } from "@/lib/purchaseOrders/schemas";
import type { ChatMessage, LlmService } from "@/lib/services/llm/types";
import type { PromptStore } from "@/lib/services/prompts/types";
import { defineStage, STAGE_LABELS, type Stage } from "../stage";

export type ClassifyStageDeps = {
  llm: LlmService;
  prompts: PromptStore;
};

/**
 * Decide whether the email is a purchase order worth processing.
 */
export function createClassifyStage({ llm, prompts }: ClassifyStageDeps): Stage {
  return defineStage({
    name: "classify",
    label: STAGE_LABELS.classify,
    requiresValidPo: false,
    run: async (state) => {
      const messages: ChatMessage[] = [
        { role: "system", content: prompts.getAndRender("classify", "system") },
        {
          role: "user",
          content: prompts.getAndRender("classify", "user", {
            subject: state.emailSubject,
            sender: state.emailSender,
            body: state.emailBody,
            has_attachment: state.hasAttachment ? "yes" : "no",
          }),
        },
      ];

      const result = await llm.structuredOutput(
        messages,
        classificationResultSchema,
        "classification_result"
      );

      console.log(`[${STAGE_LABELS.classify}] ${result.is_valid_po ? "PO" : "not a PO"}`, {
        messageId: state.emailMessageId,
        poId: result.po_id,
      });

      return {
        isValidPo: result.is_valid_po,
        poId: result.is_valid_po ? result.po_id : null,
        classificationReason: result.reason,
      };
    },
  });
}
