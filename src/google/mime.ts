import { randomBytes } from "node:crypto";
import type { OutgoingMessage } from "./types.js";

/** RFC 2047 encoded-word for header values that are not plain ASCII. */
export function encodeHeader(value: string): string {
  // eslint-disable-next-line no-control-regex
  if (/^[\x20-\x7e]*$/.test(value)) return value;
  return `=?UTF-8?B?${Buffer.from(value, "utf8").toString("base64")}?=`;
}

function wrapBase64(text: string): string {
  const encoded = Buffer.from(text, "utf8").toString("base64");
  return encoded.match(/.{1,76}/g)?.join("\r\n") ?? "";
}

function part(contentType: string, body: string): string[] {
  return [
    `Content-Type: ${contentType}; charset="UTF-8"`,
    "Content-Transfer-Encoding: base64",
    "",
    wrapBase64(body),
  ];
}

/** Strip tags for the plain-text alternative of an HTML body. */
export function htmlToText(html: string): string {
  return html
    .replace(/<(br|\/p|\/div|\/h[1-6]|\/li)\s*\/?>/gi, "\n")
    .replace(/<[^>]+>/g, "")
    .replace(/&nbsp;/g, " ")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, "&")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export function buildMimeMessage(
  message: OutgoingMessage,
  boundary = `=_${randomBytes(12).toString("hex")}`
): string {
  const headers = [`To: ${message.to}`];
  if (message.cc) headers.push(`Cc: ${message.cc}`);
  if (message.bcc) headers.push(`Bcc: ${message.bcc}`);
  headers.push(`Subject: ${encodeHeader(message.subject)}`, "MIME-Version: 1.0");

  if (!message.html) {
    return [...headers, ...part("text/plain", message.body)].join("\r\n");
  }

  return [
    ...headers,
    `Content-Type: multipart/alternative; boundary="${boundary}"`,
    "",
    `--${boundary}`,
    ...part("text/plain", htmlToText(message.body)),
    `--${boundary}`,
    ...part("text/html", message.body),
    `--${boundary}--`,
    "",
  ].join("\r\n");
}

/** Gmail's `raw` field: the whole message, base64url without padding. */
export function encodeRaw(mime: string): string {
  return Buffer.from(mime, "utf8").toString("base64url");
}
