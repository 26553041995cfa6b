/**
 * In-memory tool manager. Performs no delivery; records every call so runs
 * can be inspected afterwards. Used for evaluation and tests.
 */

import type { EmailMessage, SendEmailInput, ToolAck, ToolManager } from "./types";

export type ToolCall =
  | {
      action: "send_email";
      to: string;
      subject: string;
      body: string;
      threadId: string | null;
      inReplyTo: string | null;
    }
  | { action: "append_sheet_row"; spreadsheetId: string; values: string[] }
  | { action: "get_email_message"; messageId: string }
  | { action: "get_email_attachment"; messageId: string; attachmentId: string };

export type MockToolManagerOptions = {
  attachmentBytes?: Buffer;
  message?: Partial<EmailMessage>;
};

export class MockToolManager implements ToolManager {
  private readonly calls: ToolCall[] = [];
  private readonly attachmentBytes: Buffer;
  private readonly message: Partial<EmailMessage>;

  constructor(options: MockToolManagerOptions = {}) {
    this.attachmentBytes = options.attachmentBytes ?? Buffer.alloc(0);
    this.message = options.message ?? {};
  }

  async sendEmail(input: SendEmailInput): Promise<ToolAck> {
    this.calls.push({
      action: "send_email",
      to: input.to,
      subject: input.subject,
      body: input.body,
      threadId: input.threadId ?? null,
      inReplyTo: input.inReplyTo ?? null,
    });
    return { status: "ok", mock: true };
  }

  async appendSheetRow(spreadsheetId: string, values: string[]): Promise<ToolAck> {
    this.calls.push({ action: "append_sheet_row", spreadsheetId, values: [...values] });
    return { status: "ok", mock: true };
  }

  async getEmailMessage(messageId: string): Promise<EmailMessage> {
    this.calls.push({ action: "get_email_message", messageId });
    return {
      text: this.message.text ?? "",
      subject: this.message.subject ?? "",
      sender: this.message.sender ?? "",
      threadId: this.message.threadId ?? null,
      rfc822MessageId: this.message.rfc822MessageId ?? null,
    };
  }

  async getEmailAttachment(messageId: string, attachmentId: string): Promise<Buffer> {
    this.calls.push({ action: "get_email_attachment", messageId, attachmentId });
    return this.attachmentBytes;
  }

  get emailsSent() {
    return this.calls.filter(
      (call): call is Extract<ToolCall, { action: "send_email" }> => call.action === "send_email"
    );
  }

  get sheetRowsAdded() {
    return this.calls.filter(
      (call): call is Extract<ToolCall, { action: "append_sheet_row" }> =>
        call.action === "append_sheet_row"
    );
  }

  get allCalls(): ToolCall[] {
    return [...this.calls];
  }

  reset(): void {
    this.calls.length = 0;
  }
}
