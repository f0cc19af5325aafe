import { google, gmail_v1 } from "googleapis";
import addressparser from "nodemailer/lib/addressparser";
import type { AppConfig } from "../utils/config";
import { logger } from "../utils/logger";
import type {
  Envelope,
  MailAddress,
  MailboxReader,
  MimePart,
  RawMessage,
} from "../types";

const log = logger.child("gmail");

/**
 * The slice of `gmail.users.messages` the reader needs. The real resource
 * satisfies it; tests hand in a fake.
 */
export interface GmailMessagesApi {
  list(
    params: gmail_v1.Params$Resource$Users$Messages$List
  ): Promise<{ data: gmail_v1.Schema$ListMessagesResponse }>;
  get(
    params: gmail_v1.Params$Resource$Users$Messages$Get
  ): Promise<{ data: gmail_v1.Schema$Message }>;
  attachments: {
    get(
      params: gmail_v1.Params$Resource$Users$Messages$Attachments$Get
    ): Promise<{ data: gmail_v1.Schema$MessagePartBody }>;
  };
}

export function createGmailMessagesApi(
  gmailConfig: AppConfig["gmail"]
): GmailMessagesApi {
  const oauth2Client = new google.auth.OAuth2(
    gmailConfig.clientId,
    gmailConfig.clientSecret,
    gmailConfig.redirectUri
  );
  oauth2Client.setCredentials({ refresh_token: gmailConfig.refreshToken });

  return google.gmail({ version: "v1", auth: oauth2Client }).users.messages;
}

function toMailAddresses(entries: addressparser.AddressOrGroup[]): MailAddress[] {
  return entries.flatMap((entry): MailAddress[] => {
    if ("group" in entry) return toMailAddresses(entry.group);

    const at = entry.address.lastIndexOf("@");
    if (at <= 0 || at === entry.address.length - 1) return [];
    return [
      {
        mailbox: entry.address.slice(0, at),
        host: entry.address.slice(at + 1),
        ...(entry.name ? { name: entry.name } : {}),
      },
    ];
  });
}

// "Acme Careers <jobs@acme.com>, other@host" -> [{mailbox, host, name}, ...]
export function parseAddressList(header: string): MailAddress[] {
  return toMailAddresses(addressparser(header));
}

function decodeBase64(data: string): Buffer {
  return Buffer.from(data, "base64url");
}

export class GmailMailboxReader implements MailboxReader {
  constructor(
    private readonly messages: GmailMessagesApi,
    private readonly label = "INBOX"
  ) {}

  async search(since: Date): Promise<string[]> {
    const after = Math.floor(since.getTime() / 1000);
    log.info("Searching mailbox", { label: this.label, after: since.toISOString() });

    const ids: string[] = [];
    let pageToken: string | undefined;

    do {
      const response = await this.messages.list({
        userId: "me",
        q: `after:${after}`,
        labelIds: [this.label],
        maxResults: 100,
        pageToken,
      });

      for (const msg of response.data.messages ?? []) {
        if (msg.id) ids.push(msg.id);
      }

      pageToken = response.data.nextPageToken ?? undefined;
    } while (pageToken);

    return ids;
  }

  async *fetch(ids: string[]): AsyncIterable<RawMessage> {
    for (const id of ids) {
      const message = await this.loadMessage(id);
      if (message) yield message;
    }
  }

  private async loadMessage(messageId: string): Promise<RawMessage | null> {
    try {
      const response = await this.messages.get({
        userId: "me",
        id: messageId,
        format: "full",
      });
      const message = response.data;

      return {
        id: messageId,
        envelope: toEnvelope(message),
        parts: await this.collectParts(messageId, message.payload),
      };
    } catch (error) {
      log.error(`Failed to load message ${messageId}`, error);
      return null;
    }
  }

  // Depth-first walk of the payload tree, keeping leaf parts in order.
  private async collectParts(
    messageId: string,
    part: gmail_v1.Schema$MessagePart | undefined
  ): Promise<MimePart[]> {
    if (!part) return [];

    if (part.parts && part.parts.length > 0) {
      const nested: MimePart[] = [];
      for (const child of part.parts) {
        nested.push(...(await this.collectParts(messageId, child)));
      }
      return nested;
    }

    const contentType =
      headerValue(part.headers, "Content-Type") || part.mimeType || undefined;

    return [{ contentType, body: await this.partBody(messageId, part) }];
  }

  private async partBody(
    messageId: string,
    part: gmail_v1.Schema$MessagePart
  ): Promise<Buffer> {
    if (part.body?.data) {
      return decodeBase64(part.body.data);
    }

    // Large text parts arrive as attachments; binary attachments are skipped.
    const attachmentId = part.body?.attachmentId;
    if (attachmentId && part.mimeType?.startsWith("text/")) {
      const response = await this.messages.attachments.get({
        userId: "me",
        messageId,
        id: attachmentId,
      });
      return response.data.data ? decodeBase64(response.data.data) : Buffer.alloc(0);
    }

    return Buffer.alloc(0);
  }
}

function headerValue(
  headers: gmail_v1.Schema$MessagePartHeader[] | undefined,
  name: string
): string | undefined {
  return (
    headers?.find((h) => h.name?.toLowerCase() === name.toLowerCase())
      ?.value ?? undefined
  );
}

function toEnvelope(message: gmail_v1.Schema$Message): Envelope | undefined {
  const headers = message.payload?.headers;
  if (!headers || headers.length === 0) return undefined;

  const dateHeader = headerValue(headers, "Date");
  let date = dateHeader ? new Date(dateHeader) : new Date(NaN);
  if (Number.isNaN(date.getTime()) && message.internalDate) {
    date = new Date(Number(message.internalDate));
  }

  return {
    subject: headerValue(headers, "Subject") ?? "",
    from: parseAddressList(headerValue(headers, "From") ?? ""),
    date,
  };
}
