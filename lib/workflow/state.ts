/**
 * Workflow state for a single inbound email.
 *
 * One record is created per email and threaded through every stage. Stages
 * never mutate it: each returns a partial update, and the graph driver merges
 * that update into a fresh record.
 */

import type { ExtractedFields, FieldConfidences, PoField } from "@/lib/purchaseOrders/fields";

export const STAGE_NAMES = [
  "classify",
  "extract",
  "validate",
  "track",
  "notify",
  "report",
] as const;

export type StageName = (typeof STAGE_NAMES)[number];

export type FinalStatus = "completed" | "missing_info" | "skipped" | "error";

/**
 * Fields populated from the inbound email before the graph runs.
 */
export type WorkflowInput = {
  emailSubject: string;
  emailBody: string;
  emailSender: string;
  emailMessageId: string;
  hasAttachment: boolean;
  pdfBytes: Buffer | null;
  threadId: string | null;
  /** Message-ID header of the inbound email, when known */
  rfc822MessageId: string | null;
};

export type WorkflowState = Readonly<WorkflowInput> & {
  // Classification
  isValidPo?: boolean;
  poId?: string | null;
  classificationReason?: string;

  // Extraction
  rawText?: string;
  extractedData?: ExtractedFields | null;
  fieldConfidences?: FieldConfidences;
  extractionWarnings?: string[];

  // Validation
  missingFields?: PoField[];
  validationErrors?: string[];

  // Actions
  sheetRowAdded?: boolean;
  confirmationEmailSent?: boolean;
  missingInfoEmailSent?: boolean;
  actionsLog: string[];

  // Control
  trajectory: StageName[];
  finalStatus?: FinalStatus;
  errorMessage?: string;
};

type InputKey = keyof WorkflowInput;

/**
 * Delta returned by a stage. Input fields are never part of an update.
 */
export type WorkflowUpdate = Partial<Omit<WorkflowState, InputKey>>;

export type InitialStateInput = Pick<WorkflowInput, "emailSubject" | "emailBody" | "emailSender"> &
  Partial<WorkflowInput>;

export function createInitialState(input: InitialStateInput): WorkflowState {
  const pdfBytes = input.pdfBytes ?? null;
  return {
    emailSubject: input.emailSubject,
    emailBody: input.emailBody,
    emailSender: input.emailSender,
    emailMessageId: input.emailMessageId ?? "",
    hasAttachment: input.hasAttachment ?? (pdfBytes !== null && pdfBytes.length > 0),
    pdfBytes,
    threadId: input.threadId ?? null,
    rfc822MessageId: input.rfc822MessageId ?? null,
    actionsLog: [],
    trajectory: [],
  };
}

/**
 * Merge a stage update into the state. Later updates overwrite earlier
 * values key by key; nothing is removed.
 */
export function mergeState(state: WorkflowState, update: WorkflowUpdate): WorkflowState {
  return { ...state, ...update };
}
