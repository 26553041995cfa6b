import type { LlmService } from "@/lib/services/llm/types";
import type { PromptStore } from "@/lib/services/prompts/types";
import type { ToolManager } from "@/lib/services/tools/types";
import type { WorkflowState } from "../state";
import { defineStage, STAGE_LABELS, type Stage } from "../stage";

export type NotifyStageDeps = {
  llm: LlmService;
  tools: ToolManager;
  prompts: PromptStore;
};

export type NotificationKind = "confirmation" | "missing_info";

type NotificationDraft = {
  kind: NotificationKind;
  subject: string;
  prompt: string;
};

function draftNotification(state: WorkflowState, prompts: PromptStore): NotificationDraft {
  const poId = state.poId ?? "";
  const missingFields = state.missingFields ?? [];

  if (missingFields.length > 0) {
    return {
      kind: "missing_info",
      subject: `Action Required: Missing info for ${poId}`,
      prompt: prompts.getAndRender("notify", "missing_info", {
        order_id: poId,
        missing_fields_description: missingFields.join(", "),
      }),
    };
  }

  const data = state.extractedData ?? {};
  return {
    kind: "confirmation",
    subject: `Order Confirmation: ${poId}`,
    prompt: prompts.getAndRender("notify", "confirmation", {
      order_id: poId,
      customer: data.customer,
      pickup_location: data.pickup_location,
      delivery_location: data.delivery_location,
      delivery_datetime: data.delivery_datetime,
      driver_name: data.driver_name,
    }),
  };
}

export function replySubject(subject: string): string {
  return /^re:/i.test(subject.trim()) ? subject.trim() : `Re: ${subject.trim()}`;
}

/**
 * Gmail threads a reply only when the thread id, the In-Reply-To/References
 * headers and the subject all line up. Without the inbound Message-ID the
 * email goes out under its own subject.
 */
function replyOptions(state: WorkflowState, draftSubject: string) {
  if (state.threadId && state.rfc822MessageId && state.emailSubject.trim()) {
    return {
      subject: replySubject(state.emailSubject),
      threadId: state.threadId,
      inReplyTo: state.rfc822MessageId,
    };
  }
  return { subject: draftSubject, threadId: state.threadId, inReplyTo: null };
}

/**
 * Reply to the sender: a confirmation when the PO is complete, otherwise a
 * request for the missing information. Exactly one email per run.
 */
export function createNotifyStage({ llm, tools, prompts }: NotifyStageDeps): Stage {
  return defineStage({
    name: "notify",
    label: STAGE_LABELS.notify,
    requiresValidPo: true,
    run: async (state) => {
      const draft = draftNotification(state, prompts);

      const body = await llm.generateText([
        { role: "system", content: prompts.getAndRender("notify", "system") },
        { role: "user", content: draft.prompt },
      ]);

      await tools.sendEmail({
        to: state.emailSender,
        body,
        ...replyOptions(state, draft.subject),
      });

      const actionsLog = [...state.actionsLog, `email_sent:${draft.kind}:${state.emailSender}`];
      return draft.kind === "missing_info"
        ? { missingInfoEmailSent: true, actionsLog }
        : { confirmationEmailSent: true, actionsLog };
    },
  });
}
