/**
 * Inbound email intake.
 *
 * Turns a "new Gmail message" trigger payload into the initial workflow
 * state and runs the workflow. The trigger carries only a snippet, so the
 * full message and the first attachment are fetched through the tool
 * manager; when a fetch fails the payload's own values are used instead.
 */

import { z } from "zod";
import { extractSenderAddress } from "@/lib/google/gmail";
import type { ToolManager } from "@/lib/services/tools/types";
import { getErrorMessage } from "@/lib/utils/error";
import type { CompiledWorkflow } from "@/lib/workflow/graph";
import { createInitialState, type WorkflowState } from "@/lib/workflow/state";

const attachmentSchema = z.object({
  attachmentId: z.string().min(1),
  filename: z.string().nullish(),
  mimeType: z.string().nullish(),
});

export const inboundEmailPayloadSchema = z.object({
  metadata: z.object({ trigger_slug: z.string().nullish() }).nullish(),
  data: z.object({
    message_id: z.string().min(1),
    thread_id: z.string().nullish(),
    subject: z.string().default(""),
    sender: z.string().default(""),
    message_text: z.string().default(""),
    attachment_list: z.array(attachmentSchema).default([]),
  }),
});

export type InboundEmail = {
  messageId: string;
  threadId: string | null;
  subject: string;
  body: string;
  sender: string;
  hasAttachment: boolean;
  attachmentIds: string[];
  attachmentFilenames: string[];
};

export class InboundPayloadError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid inbound email payload: ${issues.join("; ")}`);
    this.name = "InboundPayloadError";
    this.issues = issues;
  }
}

export function parseInboundEmailPayload(payload: unknown): InboundEmail {
  const parsed = inboundEmailPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new InboundPayloadError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }

  const { data } = parsed.data;
  return {
    messageId: data.message_id,
    threadId: data.thread_id ?? null,
    subject: data.subject,
    body: data.message_text,
    sender: data.sender ? extractSenderAddress(data.sender) : "",
    hasAttachment: data.attachment_list.length > 0,
    attachmentIds: data.attachment_list.map((a) => a.attachmentId),
    attachmentFilenames: data.attachment_list.map((a) => a.filename || "attachment"),
  };
}

/**
 * Fetch the full message and first attachment, and build the initial state.
 */
export async function buildInitialStateForEmail(
  email: InboundEmail,
  tools: ToolManager
): Promise<WorkflowState> {
  let subject = email.subject;
  let body = email.body;
  let sender = email.sender;
  let threadId = email.threadId;
  let rfc822MessageId: string | null = null;

  try {
    const full = await tools.getEmailMessage(email.messageId);
    subject = full.subject || subject;
    body = full.text || body;
    sender = full.sender || sender;
    threadId = threadId ?? full.threadId;
    rfc822MessageId = full.rfc822MessageId;
  } catch (error) {
    console.warn(`[Intake] Failed to fetch full message ${email.messageId}, using trigger data:`, getErrorMessage(error));
  }

  let pdfBytes: Buffer | null = null;
  const firstAttachmentId = email.attachmentIds[0];
  if (firstAttachmentId) {
    try {
      pdfBytes = await tools.getEmailAttachment(email.messageId, firstAttachmentId);
    } catch (error) {
      console.warn(`[Intake] Failed to fetch attachment from ${email.messageId}:`, getErrorMessage(error));
    }
  }

  return createInitialState({
    emailSubject: subject,
    emailBody: body,
    emailSender: sender,
    emailMessageId: email.messageId,
    hasAttachment: email.hasAttachment,
    pdfBytes,
    threadId,
    rfc822MessageId,
  });
}

export type ProcessInboundEmailDeps = {
  workflow: CompiledWorkflow;
  tools: ToolManager;
};

/**
 * Validate a trigger payload, seed the state and run the workflow.
 */
export async function processInboundEmail(
  payload: unknown,
  { workflow, tools }: ProcessInboundEmailDeps
): Promise<WorkflowState> {
  const email = parseInboundEmailPayload(payload);
  console.log(`[Intake] Received message ${email.messageId}`, {
    attachments: email.attachmentFilenames,
  });

  const initialState = await buildInitialStateForEmail(email, tools);
  const result = await workflow.run(initialState);

  console.log(`[Intake] Workflow completed: status=${result.finalStatus}, po_id=${result.poId ?? null}`, {
    messageId: email.messageId,
    trajectory: result.trajectory,
    ...(result.errorMessage ? { error: result.errorMessage } : {}),
  });
  return result;
}
