import type { gmail_v1 } from "googleapis";
import { UpstreamError, ValidationError } from "../errors.js";
import { buildMimeMessage, encodeRaw } from "./mime.js";
import { callGoogle, inBatches, opt } from "./request.js";
import type {
  Attachment,
  GmailGateway,
  Label,
  MessageDetail,
  MessageSummary,
  OutgoingMessage,
} from "./types.js";

const SUMMARY_HEADERS = ["From", "To", "Subject", "Date"];
const METADATA_BATCH = 10;

function header(message: gmail_v1.Schema$Message, name: string): string | undefined {
  const found = message.payload?.headers?.find(
    (h) => h.name?.toLowerCase() === name.toLowerCase()
  );
  return opt(found?.value);
}

export function summarize(message: gmail_v1.Schema$Message): MessageSummary {
  return {
    id: message.id ?? "",
    threadId: opt(message.threadId),
    from: header(message, "From"),
    to: header(message, "To"),
    subject: header(message, "Subject"),
    date: header(message, "Date"),
    snippet: opt(message.snippet),
    labelIds: message.labelIds ?? [],
  };
}

interface Bodies {
  text?: string;
  html?: string;
  attachments: Attachment[];
}

/** Walk the MIME tree, keeping the first text and HTML bodies and listing attachments. */
export function extractBodies(
  part: gmail_v1.Schema$MessagePart | null | undefined,
  into: Bodies = { attachments: [] }
): Bodies {
  if (!part) return into;

  if (part.filename) {
    into.attachments.push({
      filename: part.filename,
      mimeType: part.mimeType ?? "application/octet-stream",
      size: part.body?.size ?? 0,
    });
  } else if (part.body?.data) {
    const decoded = Buffer.from(part.body.data, "base64url").toString("utf8");
    if (part.mimeType === "text/plain" && into.text === undefined) into.text = decoded;
    if (part.mimeType === "text/html" && into.html === undefined) into.html = decoded;
  }

  for (const child of part.parts ?? []) {
    extractBodies(child, into);
  }
  return into;
}

/**
 * Map label names (case-insensitive) or IDs to label IDs. System labels such
 * as INBOX match by ID.
 */
export function resolveLabelIds(names: string[], labels: Label[]): string[] {
  return names.map((name) => {
    const match =
      labels.find((l) => l.id === name) ??
      labels.find((l) => l.name.toLowerCase() === name.toLowerCase());
    if (!match) throw new ValidationError(`Unknown label: ${name}`);
    return match.id;
  });
}

export class GmailApi implements GmailGateway {
  constructor(private readonly gmail: gmail_v1.Gmail) {}

  async send(message: OutgoingMessage): Promise<{ id: string; threadId?: string }> {
    const raw = encodeRaw(buildMimeMessage(message));
    const res = await callGoogle("Gmail send", () =>
      this.gmail.users.messages.send({ userId: "me", requestBody: { raw } })
    );
    if (!res.data.id) throw new UpstreamError("Gmail did not return a message ID");
    return { id: res.data.id, threadId: opt(res.data.threadId) };
  }

  async list(options: { query?: string; limit: number }): Promise<MessageSummary[]> {
    const res = await callGoogle("Gmail list", () =>
      this.gmail.users.messages.list({
        userId: "me",
        q: options.query,
        maxResults: options.limit,
      })
    );
    const ids = (res.data.messages ?? []).flatMap((m) => (m.id ? [m.id] : []));
    return inBatches(ids, METADATA_BATCH, (id) => this.metadata(id));
  }

  async read(id: string): Promise<MessageDetail> {
    const res = await callGoogle("Gmail read", () =>
      this.gmail.users.messages.get({ userId: "me", id, format: "full" })
    );
    const bodies = extractBodies(res.data.payload);
    return {
      ...summarize(res.data),
      cc: header(res.data, "Cc"),
      textBody: bodies.text,
      htmlBody: bodies.html,
      attachments: bodies.attachments,
    };
  }

  async modifyLabels(
    id: string,
    add: string[],
    remove: string[]
  ): Promise<{ id: string; labelIds: string[] }> {
    const labels = await this.labels();
    const res = await callGoogle("Gmail modify", () =>
      this.gmail.users.messages.modify({
        userId: "me",
        id,
        requestBody: {
          addLabelIds: resolveLabelIds(add, labels),
          removeLabelIds: resolveLabelIds(remove, labels),
        },
      })
    );
    return { id, labelIds: res.data.labelIds ?? [] };
  }

  async trash(id: string): Promise<{ id: string }> {
    await callGoogle("Gmail trash", () => this.gmail.users.messages.trash({ userId: "me", id }));
    return { id };
  }

  async labels(): Promise<Label[]> {
    const res = await callGoogle("Gmail labels", () =>
      this.gmail.users.labels.list({ userId: "me" })
    );
    return (res.data.labels ?? []).flatMap((l) =>
      l.id && l.name ? [{ id: l.id, name: l.name, type: opt(l.type) }] : []
    );
  }

  private async metadata(id: string): Promise<MessageSummary> {
    const res = await callGoogle("Gmail read", () =>
      this.gmail.users.messages.get({
        userId: "me",
        id,
        format: "metadata",
        metadataHeaders: SUMMARY_HEADERS,
      })
    );
    return summarize(res.data);
  }
}
