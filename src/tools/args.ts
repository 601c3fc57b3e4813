import { z } from "zod";
import { cellData } from "./cells.js";

// Argument shapes shared by the gogcli and API tool sets, so both backends
// expose the same tool signatures.

export const account = z
  .string()
  .min(1)
  .optional()
  .describe("Google account to use (defaults to the configured account)");

export const limit = (fallback: number) =>
  z
    .number()
    .int()
    .min(1)
    .max(500)
    .default(fallback)
    .describe(`Maximum number of results (default: ${fallback})`);

const id = (what: string) => z.string().min(1).describe(`${what} ID or URL`);

export const gmail = {
  send: {
    to: z.string().min(1).describe("Recipient email(s), comma-separated"),
    subject: z.string().describe("Email subject"),
    body: z.string().describe("Email body (plain text or HTML)"),
    html: z.boolean().default(false).describe("Treat body as HTML (default: false)"),
    cc: z.string().optional().describe("Cc recipients, comma-separated"),
    bcc: z.string().optional().describe("Bcc recipients, comma-separated"),
    account,
  },
  list: {
    limit: limit(10),
    account,
  },
  search: {
    query: z.string().min(1).describe('Gmail search query (e.g. "from:alice@example.com is:unread")'),
    limit: limit(10),
    account,
  },
  message: {
    message_id: z.string().min(1).describe("Gmail message ID"),
    account,
  },
  label: {
    message_id: z.string().min(1).describe("Gmail message ID"),
    labels: z.string().optional().describe("Labels to add (comma-separated)"),
    remove: z.string().optional().describe("Labels to remove (comma-separated)"),
    account,
  },
  labels: {
    account,
  },
};

const dataAlias = cellData.optional().describe("Alias for values");

export const sheets = {
  create: {
    title: z.string().min(1).describe("Spreadsheet title"),
    values: cellData
      .optional()
      .describe("Initial rows written at A1 (2-D array, JSON array of arrays, or CSV)"),
    data: dataAlias,
    account,
  },
  read: {
    spreadsheet_id: id("Spreadsheet"),
    range: z.string().default("A1").describe("Cell range (e.g. Sheet1!A1:D10)"),
    account,
  },
  write: {
    spreadsheet_id: id("Spreadsheet"),
    range: z.string().min(1).describe("Cell range (e.g. Sheet1!A1:D10)"),
    values: cellData
      .optional()
      .describe("Rows to write (2-D array, JSON array of arrays, or CSV)"),
    data: dataAlias,
    account,
  },
  append: {
    spreadsheet_id: id("Spreadsheet"),
    range: z.string().default("A1").describe("Range to append to"),
    values: cellData
      .optional()
      .describe("Rows to append (2-D array, JSON array of arrays, or CSV)"),
    data: dataAlias,
    account,
  },
  remove: {
    spreadsheet_id: id("Spreadsheet"),
    account,
  },
};

export const docs = {
  create: {
    title: z.string().min(1).describe("Document title"),
    content: z.string().optional().describe("Initial content"),
    account,
  },
  document: {
    doc_id: id("Document"),
    account,
  },
  append: {
    doc_id: id("Document"),
    text: z.string().min(1).describe("Text to append"),
    account,
  },
  export: {
    doc_id: id("Document"),
    format: z.enum(["pdf", "docx", "txt"]).default("pdf").describe("Export format"),
    account,
  },
};

export const slides = {
  create: {
    title: z.string().min(1).describe("Presentation title"),
    account,
  },
  presentation: {
    presentation_id: id("Presentation"),
    account,
  },
};

export const calendar = {
  create: {
    title: z.string().min(1).describe("Event title"),
    start: z.string().min(1).describe("Start time (RFC 3339, or YYYY-MM-DD for all-day)"),
    end: z.string().min(1).describe("End time (RFC 3339, or YYYY-MM-DD for all-day)"),
    description: z.string().optional().describe("Event description"),
    location: z.string().optional().describe("Event location"),
    attendees: z.string().optional().describe("Attendees (comma-separated emails)"),
    calendar_id: z.string().default("primary").describe("Calendar ID (default: primary)"),
    account,
  },
  list: {
    start: z.string().optional().describe("Start of the window (default: now)"),
    end: z.string().optional().describe("End of the window"),
    limit: limit(10),
    calendar_id: z.string().default("primary").describe("Calendar ID (default: primary)"),
    account,
  },
  update: {
    event_id: z.string().min(1).describe("Event ID"),
    title: z.string().optional().describe("New title"),
    start: z.string().optional().describe("New start time"),
    end: z.string().optional().describe("New end time"),
    description: z.string().optional().describe("New description"),
    location: z.string().optional().describe("New location"),
    calendar_id: z.string().default("primary").describe("Calendar ID (default: primary)"),
    account,
  },
  event: {
    event_id: z.string().min(1).describe("Event ID"),
    calendar_id: z.string().default("primary").describe("Calendar ID (default: primary)"),
    account,
  },
  calendars: {
    account,
  },
};

export const drive = {
  list: {
    query: z
      .string()
      .optional()
      .describe("Drive query expression (e.g. name contains 'report')"),
    folder_id: z.string().optional().describe("Only list files in this folder"),
    limit: limit(20),
    account,
  },
  createFile: {
    name: z.string().min(1).describe("File name"),
    content: z.string().optional().describe("Text content of the file"),
    mime_type: z
      .string()
      .default("text/plain")
      .describe("MIME type (a Google type such as application/vnd.google-apps.document converts the content)"),
    folder_id: z.string().optional().describe("Parent folder ID"),
    account,
  },
  createFolder: {
    name: z.string().min(1).describe("Folder name"),
    parent_id: z.string().optional().describe("Parent folder ID"),
    account,
  },
  share: {
    file_id: id("File"),
    email: z.string().email().describe("Email address to share with"),
    role: z
      .enum(["reader", "commenter", "writer", "owner"])
      .default("reader")
      .describe("Permission role (default: reader)"),
    account,
  },
};

export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((v) => v.trim())
    .filter((v) => v !== "");
}

/** Accept a bare ID or a Docs/Sheets/Slides/Drive URL containing `/d/<id>`. */
export function resolveId(value: string): string {
  const match = value.match(/\/d\/([a-zA-Z0-9_-]+)/);
  if (match) return match[1];
  const query = value.match(/[?&]id=([a-zA-Z0-9_-]+)/);
  if (query) return query[1];
  return value.trim();
}
