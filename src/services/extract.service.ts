import type { RawMessage } from "../types";
import { logger } from "../utils/logger";

const log = logger.child("extract");

// RFC 2045 tokens: printable ASCII minus tspecials.
const MEDIA_TYPE = /^[a-z0-9!#$%&'*+.^_`{|}~-]+\/[a-z0-9!#$%&'*+.^_`{|}~-]+$/;

/**
 * Lower-cased `type/subtype` of a Content-Type header, or null when the
 * header does not hold a valid media type.
 */
export function parseMediaType(header: string): string | null {
  const mediaType = header.split(";")[0].trim().toLowerCase();
  return MEDIA_TYPE.test(mediaType) ? mediaType : null;
}

export function stripHtmlTags(html: string): string {
  return html
    .replace(/<[^>]*>/g, "")
    .replace(/&nbsp;/g, " ")
    .trim();
}

/**
 * Plain-text body of a message. The first text/plain part wins outright;
 * otherwise the last text/html part seen is stripped of markup.
 */
export function extractBody(raw: RawMessage): string {
  let htmlBody = "";

  for (const part of raw.parts) {
    if (!part.contentType) {
      log.debug(`Missing Content-Type header in part of ${raw.id}`);
      continue;
    }

    const mediaType = parseMediaType(part.contentType);
    if (!mediaType) {
      log.debug(`Unparsable media type "${part.contentType}" in ${raw.id}`);
      continue;
    }

    if (mediaType.startsWith("text/plain")) {
      const body = part.body.toString("utf-8");
      log.debug(`Extracted plain text body (length: ${body.length})`);
      return body;
    }

    if (mediaType.startsWith("text/html")) {
      htmlBody = part.body.toString("utf-8");
    }
  }

  if (htmlBody) {
    log.debug(`No text/plain part in ${raw.id}, using HTML fallback`);
    return stripHtmlTags(htmlBody);
  }

  log.debug(`No text/plain or usable HTML body in ${raw.id}`);
  return "";
}

export function extractSender(raw: RawMessage): string {
  const from = raw.envelope?.from[0];
  if (!from) {
    log.debug(`No sender info in ${raw.id}`);
    return "";
  }
  return `${from.mailbox}@${from.host}`;
}
