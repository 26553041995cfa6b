/**
 * Gmail API client helpers.
 *
 * All functions take an authorised client and are stateless.
 */

import { google, type Auth, type gmail_v1 } from "googleapis";

export type GoogleCredentials = {
  clientId?: string | null;
  clientSecret?: string | null;
  refreshToken?: string | null;
  accessToken?: string | null;
};

/**
 * Create an OAuth2 client. With a refresh token the client renews access
 * tokens by itself; an access token alone works until it expires.
 */
export function createGoogleAuth(credentials: GoogleCredentials): Auth.OAuth2Client {
  const auth = new google.auth.OAuth2(
    credentials.clientId ?? undefined,
    credentials.clientSecret ?? undefined
  );
  auth.setCredentials({
    refresh_token: credentials.refreshToken ?? undefined,
    access_token: credentials.accessToken ?? undefined,
  });
  return auth;
}

/**
 * Create a Gmail API client.
 */
export function createGmailClient(auth: Auth.OAuth2Client): gmail_v1.Gmail {
  return google.gmail({ version: "v1", auth });
}

export type GmailMessageContent = {
  id: string;
  threadId: string | null;
  /** Message-ID header, used for In-Reply-To/References on replies */
  rfc822MessageId: string | null;
  subject: string;
  sender: string;
  text: string;
};

/**
 * Pull the bare address out of a From header
 * ('"Acme Orders" <orders@acme.test>' -> 'orders@acme.test').
 */
export function extractSenderAddress(from: string): string {
  const angle = from.match(/<([^<>\s]+@[^<>\s]+)>/);
  if (angle) return angle[1];
  const bare = from.match(/[^\s<>"]+@[^\s<>"]+/);
  return bare ? bare[0] : from.trim();
}

function decodeBase64Url(data: string): string {
  return Buffer.from(data, "base64url").toString("utf8");
}

/**
 * Find the first text/plain body in a (possibly nested) message payload.
 * Falls back to text/html with tags stripped.
 */
export function extractPlainTextBody(payload: gmail_v1.Schema$MessagePart | undefined): string {
  const bodies: { plain: string | null; html: string | null } = { plain: null, html: null };

  function walk(part: gmail_v1.Schema$MessagePart): void {
    const mimeType = (part.mimeType ?? "").toLowerCase();
    const data = part.body?.data;
    const isAttachment = Boolean(part.filename) || Boolean(part.body?.attachmentId);

    if (data && !isAttachment) {
      if (mimeType === "text/plain" && bodies.plain === null) bodies.plain = decodeBase64Url(data);
      if (mimeType === "text/html" && bodies.html === null) bodies.html = decodeBase64Url(data);
    }

    for (const child of part.parts ?? []) {
      walk(child);
    }
  }

  if (payload) walk(payload);

  if (bodies.plain !== null) return bodies.plain.trim();
  if (bodies.html === null) return "";
  return bodies.html
    .replace(/<[^>]+>/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function getHeader(headers: gmail_v1.Schema$MessagePartHeader[], name: string): string {
  return headers.find((h) => h.name?.toLowerCase() === name.toLowerCase())?.value ?? "";
}

/**
 * Fetch a message and return its subject, sender address and plain text body.
 */
export async function getMessageContent(
  gmail: gmail_v1.Gmail,
  messageId: string
): Promise<GmailMessageContent> {
  const res = await gmail.users.messages.get({
    userId: "me",
    id: messageId,
    format: "full",
  });

  const payload = res.data.payload;
  const headers = payload?.headers ?? [];

  return {
    id: messageId,
    threadId: res.data.threadId ?? null,
    rfc822MessageId: getHeader(headers, "Message-ID") || null,
    subject: getHeader(headers, "Subject"),
    sender: extractSenderAddress(getHeader(headers, "From")),
    text: extractPlainTextBody(payload),
  };
}

/**
 * Download one attachment as raw bytes.
 */
export async function getAttachmentBytes(
  gmail: gmail_v1.Gmail,
  messageId: string,
  attachmentId: string
): Promise<Buffer> {
  const res = await gmail.users.messages.attachments.get({
    userId: "me",
    messageId,
    id: attachmentId,
  });

  const data = res.data.data;
  if (!data) {
    throw new Error(`Attachment ${attachmentId} on message ${messageId} has no data`);
  }
  return Buffer.from(data, "base64url");
}

export type OutgoingEmail = {
  to: string;
  subject: string;
  body: string;
  threadId?: string | null;
  inReplyTo?: string | null;
};

function encodeHeaderValue(value: string): string {
  // RFC 2047 encoded-word for anything outside printable ASCII
  return /^[\x20-\x7e]*$/.test(value)
    ? value
    : `=?UTF-8?B?${Buffer.from(value, "utf8").toString("base64")}?=`;
}

/**
 * Build the base64url RFC 822 message expected by users.messages.send.
 * Gmail keeps a reply in its thread only when In-Reply-To and References
 * name the original Message-ID and the subject matches.
 */
export function buildRawEmail(email: OutgoingEmail): string {
  const replyHeaders = email.inReplyTo
    ? [`In-Reply-To: ${email.inReplyTo}`, `References: ${email.inReplyTo}`]
    : [];
  const lines = [
    `To: ${email.to}`,
    `Subject: ${encodeHeaderValue(email.subject)}`,
    ...replyHeaders,
    "MIME-Version: 1.0",
    'Content-Type: text/plain; charset="UTF-8"',
    "Content-Transfer-Encoding: 8bit",
    "",
    email.body,
  ];
  return Buffer.from(lines.join("\r\n"), "utf8").toString("base64url");
}

/**
 * Send a plain text email, in the given thread when one is set.
 * Returns the id of the sent message.
 */
export async function sendEmail(gmail: gmail_v1.Gmail, email: OutgoingEmail): Promise<string> {
  const res = await gmail.users.messages.send({
    userId: "me",
    requestBody: {
      raw: buildRawEmail(email),
      ...(email.threadId ? { threadId: email.threadId } : {}),
    },
  });

  const id = res.data.id ?? "";
  console.log(`[Gmail] Sent "${email.subject}" to ${email.to}`, { id, threadId: email.threadId ?? null });
  return id;
}
