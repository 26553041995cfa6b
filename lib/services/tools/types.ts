export type ToolAck = {
  status: "ok";
  /** Provider reference for the action (sent message id, updated range) */
  ref?: string | null;
  mock?: boolean;
};

export type SendEmailInput = {
  to: string;
  subject: string;
  body: string;
  threadId?: string | null;
  /** Message-ID header of the message being answered */
  inReplyTo?: string | null;
};

export type EmailMessage = {
  text: string;
  subject: string;
  sender: string;
  threadId: string | null;
  rfc822MessageId: string | null;
};

/**
 * Delivery and fetch actions: outbound email, tracking-sheet rows, and the
 * inbound message and attachment used to seed a run.
 */
export interface ToolManager {
  sendEmail(input: SendEmailInput): Promise<ToolAck>;
  appendSheetRow(spreadsheetId: string, values: string[]): Promise<ToolAck>;
  getEmailMessage(messageId: string): Promise<EmailMessage>;
  getEmailAttachment(messageId: string, attachmentId: string): Promise<Buffer>;
}
