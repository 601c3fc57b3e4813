import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { ValidationError } from "../errors.js";
import { normalizeAllDayEnd, parseEventTime, parseTimeBound } from "../google/calendar.js";
import type { EventInput, GatewayFactory } from "../google/types.js";
import * as args from "./args.js";
import { optionalRows, requiredRows } from "./cells.js";
import { defineTool } from "./registry.js";
import type { Tool } from "./registry.js";

export interface WorkspaceToolOptions {
  /** Where binary exports (pdf, docx) are written. */
  exportDir: string;
}

const EXPORT_TYPES = {
  pdf: "application/pdf",
  docx: "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  txt: "text/plain",
} as const;

/** Tools backed by the Google REST APIs; same names and arguments as the gogcli set, plus Drive. */
export function workspaceTools(gateway: GatewayFactory, options: WorkspaceToolOptions): Tool[] {
  return [
    // Gmail
    defineTool({
      name: "gmail_send_email",
      description: "Send an email via Gmail (set html: true to send the body as HTML)",
      args: args.gmail.send,
      run: async ({ to, subject, body, html, cc, bcc, account }) => {
        const { gmail } = await gateway(account);
        const sent = await gmail.send({ to, subject, body, html, cc, bcc });
        return { sent: true, to, subject, ...sent };
      },
    }),
    defineTool({
      name: "gmail_list_emails",
      description: "List recent emails from Gmail",
      args: args.gmail.list,
      run: async ({ limit, account }) => {
        const { gmail } = await gateway(account);
        return gmail.list({ limit });
      },
    }),
    defineTool({
      name: "gmail_search_emails",
      description: "Search for emails in Gmail",
      args: args.gmail.search,
      run: async ({ query, limit, account }) => {
        const { gmail } = await gateway(account);
        return gmail.list({ query, limit });
      },
    }),
    defineTool({
      name: "gmail_read_email",
      description: "Read a full email by message ID",
      args: args.gmail.message,
      run: async ({ message_id, account }) => {
        const { gmail } = await gateway(account);
        return gmail.read(message_id);
      },
    }),
    defineTool({
      name: "gmail_label_email",
      description: "Add or remove labels on an email",
      args: args.gmail.label,
      run: async ({ message_id, labels, remove, account }) => {
        if (!labels && !remove) {
          throw new ValidationError("Must specify either 'labels' or 'remove'");
        }
        const { gmail } = await gateway(account);
        return gmail.modifyLabels(message_id, args.splitList(labels), args.splitList(remove));
      },
    }),
    defineTool({
      name: "gmail_archive_email",
      description: "Archive an email (remove it from the inbox)",
      args: args.gmail.message,
      run: async ({ message_id, account }) => {
        const { gmail } = await gateway(account);
        return gmail.modifyLabels(message_id, [], ["INBOX"]);
      },
    }),
    defineTool({
      name: "gmail_delete_email",
      description: "Delete an email (moves it to the trash)",
      args: args.gmail.message,
      run: async ({ message_id, account }) => {
        const { gmail } = await gateway(account);
        return { ...(await gmail.trash(message_id)), trashed: true };
      },
    }),
    defineTool({
      name: "gmail_list_labels",
      description: "List Gmail labels",
      args: args.gmail.labels,
      run: async ({ account }) => {
        const { gmail } = await gateway(account);
        return gmail.labels();
      },
    }),

    // Sheets
    defineTool({
      name: "sheets_create",
      description: "Create a new Google Sheets spreadsheet, optionally seeded with rows at A1",
      args: args.sheets.create,
      run: async ({ title, values, data, account }) => {
        const rows = optionalRows({ values, data });
        const { sheets } = await gateway(account);
        const created = await sheets.create(title);
        if (!rows || rows.length === 0) return created;
        await sheets.write(created.spreadsheetId, "A1", rows);
        return { ...created, rowsWritten: rows.length };
      },
    }),
    defineTool({
      name: "sheets_read",
      description: "Read data from a spreadsheet",
      args: args.sheets.read,
      run: async ({ spreadsheet_id, range, account }) => {
        const { sheets } = await gateway(account);
        return sheets.read(args.resolveId(spreadsheet_id), range);
      },
    }),
    defineTool({
      name: "sheets_write",
      description: "Write rows to a spreadsheet range",
      args: args.sheets.write,
      run: async ({ spreadsheet_id, range, values, data, account }) => {
        const rows = requiredRows({ values, data });
        const { sheets } = await gateway(account);
        return sheets.write(args.resolveId(spreadsheet_id), range, rows);
      },
    }),
    defineTool({
      name: "sheets_append",
      description: "Append rows to a spreadsheet",
      args: args.sheets.append,
      run: async ({ spreadsheet_id, range, values, data, account }) => {
        const rows = requiredRows({ values, data });
        const { sheets } = await gateway(account);
        return sheets.append(args.resolveId(spreadsheet_id), range, rows);
      },
    }),
    defineTool({
      name: "sheets_delete",
      description: "Delete a spreadsheet",
      args: args.sheets.remove,
      run: async ({ spreadsheet_id, account }) => {
        const id = args.resolveId(spreadsheet_id);
        const { drive } = await gateway(account);
        await drive.remove(id);
        return { deleted: true, spreadsheetId: id };
      },
    }),

    // Docs
    defineTool({
      name: "docs_create",
      description: "Create a new Google Doc",
      args: args.docs.create,
      run: async ({ title, content, account }) => {
        const { docs } = await gateway(account);
        return docs.create(title, content);
      },
    }),
    defineTool({
      name: "docs_read",
      description: "Read a Google Doc",
      args: args.docs.document,
      run: async ({ doc_id, account }) => {
        const { docs } = await gateway(account);
        return docs.read(args.resolveId(doc_id));
      },
    }),
    defineTool({
      name: "docs_append",
      description: "Append text to a Google Doc",
      args: args.docs.append,
      run: async ({ doc_id, text, account }) => {
        const { docs } = await gateway(account);
        return docs.append(args.resolveId(doc_id), text);
      },
    }),
    defineTool({
      name: "docs_delete",
      description: "Delete a Google Doc",
      args: args.docs.document,
      run: async ({ doc_id, account }) => {
        const id = args.resolveId(doc_id);
        const { drive } = await gateway(account);
        await drive.remove(id);
        return { deleted: true, documentId: id };
      },
    }),
    defineTool({
      name: "docs_export",
      description: "Export a Google Doc as pdf, docx or txt (binary formats are saved to a local file)",
      args: args.docs.export,
      run: async ({ doc_id, format, account }) => {
        const id = args.resolveId(doc_id);
        const { drive } = await gateway(account);
        const bytes = await drive.export(id, EXPORT_TYPES[format]);
        if (format === "txt") {
          return { documentId: id, format, content: bytes.toString("utf8") };
        }
        await mkdir(options.exportDir, { recursive: true });
        const file = path.join(options.exportDir, `${id}.${format}`);
        await writeFile(file, bytes);
        return { documentId: id, format, path: file, bytes: bytes.length };
      },
    }),

    // Slides
    defineTool({
      name: "slides_create",
      description: "Create a new Google Slides presentation",
      args: args.slides.create,
      run: async ({ title, account }) => {
        const { slides } = await gateway(account);
        return slides.create(title);
      },
    }),
    defineTool({
      name: "slides_read",
      description: "Read a Google Slides presentation",
      args: args.slides.presentation,
      run: async ({ presentation_id, account }) => {
        const { slides } = await gateway(account);
        return slides.read(args.resolveId(presentation_id));
      },
    }),
    defineTool({
      name: "slides_delete",
      description: "Delete a Google Slides presentation",
      args: args.slides.presentation,
      run: async ({ presentation_id, account }) => {
        const id = args.resolveId(presentation_id);
        const { drive } = await gateway(account);
        await drive.remove(id);
        return { deleted: true, presentationId: id };
      },
    }),

    // Drive
    defineTool({
      name: "drive_list_files",
      description: "List Google Drive files, newest first",
      args: args.drive.list,
      run: async ({ query, folder_id, limit, account }) => {
        const { drive } = await gateway(account);
        return drive.list({ query, folderId: folder_id, limit });
      },
    }),
    defineTool({
      name: "drive_create_file",
      description: "Create a file in Google Drive",
      args: args.drive.createFile,
      run: async ({ name, content, mime_type, folder_id, account }) => {
        const { drive } = await gateway(account);
        return drive.createFile({ name, content, mimeType: mime_type, folderId: folder_id });
      },
    }),
    defineTool({
      name: "drive_create_folder",
      description: "Create a folder in Google Drive",
      args: args.drive.createFolder,
      run: async ({ name, parent_id, account }) => {
        const { drive } = await gateway(account);
        return drive.createFolder(name, parent_id);
      },
    }),
    defineTool({
      name: "drive_share_file",
      description: "Share a Drive file with a user (no notification email is sent)",
      args: args.drive.share,
      run: async ({ file_id, email, role, account }) => {
        const id = args.resolveId(file_id);
        const { drive } = await gateway(account);
        const shared = await drive.share(id, email, role);
        return { fileId: id, email, role, ...shared };
      },
    }),

    // Calendar
    defineTool({
      name: "calendar_create_event",
      description: "Create a calendar event (start/end in RFC 3339, or YYYY-MM-DD for all-day)",
      args: args.calendar.create,
      run: async ({ title, start, end, description, location, attendees, calendar_id, account }) => {
        const startTime = parseEventTime(start);
        const event: EventInput = {
          summary: title,
          start: startTime,
          end: normalizeAllDayEnd(startTime, parseEventTime(end)),
          description,
          location,
          attendees: attendees === undefined ? undefined : args.splitList(attendees),
        };
        const { calendar } = await gateway(account);
        return calendar.createEvent(calendar_id, event);
      },
    }),
    defineTool({
      name: "calendar_list_events",
      description: "List upcoming calendar events",
      args: args.calendar.list,
      run: async ({ start, end, limit, calendar_id, account }) => {
        const timeMin = start === undefined ? undefined : parseTimeBound(start);
        const timeMax = end === undefined ? undefined : parseTimeBound(end);
        const { calendar } = await gateway(account);
        return calendar.listEvents({ calendarId: calendar_id, timeMin, timeMax, limit });
      },
    }),
    defineTool({
      name: "calendar_update_event",
      description: "Update a calendar event; only the given fields change",
      args: args.calendar.update,
      run: async ({ event_id, title, start, end, description, location, calendar_id, account }) => {
        const patch: Partial<EventInput> = {};
        if (title !== undefined) patch.summary = title;
        if (start !== undefined) patch.start = parseEventTime(start);
        if (end !== undefined) {
          const parsed = parseEventTime(end);
          patch.end = patch.start ? normalizeAllDayEnd(patch.start, parsed) : parsed;
        }
        if (description !== undefined) patch.description = description;
        if (location !== undefined) patch.location = location;
        if (Object.keys(patch).length === 0) {
          throw new ValidationError("Nothing to update: give at least one field to change");
        }
        const { calendar } = await gateway(account);
        return calendar.updateEvent(calendar_id, event_id, patch);
      },
    }),
    defineTool({
      name: "calendar_delete_event",
      description: "Delete a calendar event",
      args: args.calendar.event,
      run: async ({ event_id, calendar_id, account }) => {
        const { calendar } = await gateway(account);
        await calendar.deleteEvent(calendar_id, event_id);
        return { deleted: true, eventId: event_id };
      },
    }),
    defineTool({
      name: "calendar_list_calendars",
      description: "List all calendars",
      args: args.calendar.calendars,
      run: async ({ account }) => {
        const { calendar } = await gateway(account);
        return calendar.listCalendars();
      },
    }),
  ];
}
