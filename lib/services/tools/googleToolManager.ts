import type { Auth, gmail_v1, sheets_v4 } from "googleapis";
import {
  createGmailClient,
  getAttachmentBytes,
  getMessageContent,
  sendEmail,
} from "@/lib/google/gmail";
import { appendRow, createSheetsClient, ensureHeaderRow } from "@/lib/google/sheets";
import type { EmailMessage, SendEmailInput, ToolAck, ToolManager } from "./types";

export type GoogleToolManagerOptions = {
  auth: Auth.OAuth2Client;
  sheetName?: string;
};

/**
 * Tool manager on Gmail and Google Sheets.
 */
export class GoogleToolManager implements ToolManager {
  readonly sheetName: string;
  private readonly gmail: gmail_v1.Gmail;
  private readonly sheets: sheets_v4.Sheets;
  // Spreadsheets whose header row has been checked by this process
  private readonly headerChecked = new Set<string>();

  constructor(options: GoogleToolManagerOptions) {
    this.sheetName = options.sheetName || "Sheet1";
    this.gmail = createGmailClient(options.auth);
    this.sheets = createSheetsClient(options.auth);
  }

  async sendEmail(input: SendEmailInput): Promise<ToolAck> {
    const id = await sendEmail(this.gmail, input);
    return { status: "ok", ref: id };
  }

  async appendSheetRow(spreadsheetId: string, values: string[]): Promise<ToolAck> {
    if (!this.headerChecked.has(spreadsheetId)) {
      await ensureHeaderRow(this.sheets, spreadsheetId, this.sheetName);
      this.headerChecked.add(spreadsheetId);
    }
    const updatedRange = await appendRow(this.sheets, spreadsheetId, this.sheetName, values);
    return { status: "ok", ref: updatedRange };
  }

  async getEmailMessage(messageId: string): Promise<EmailMessage> {
    const message = await getMessageContent(this.gmail, messageId);
    return {
      text: message.text,
      subject: message.subject,
      sender: message.sender,
      threadId: message.threadId,
      rfc822MessageId: message.rfc822MessageId,
    };
  }

  async getEmailAttachment(messageId: string, attachmentId: string): Promise<Buffer> {
    return getAttachmentBytes(this.gmail, messageId, attachmentId);
  }
}
