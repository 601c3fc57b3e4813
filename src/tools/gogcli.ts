import type { GogRunner } from "../gogcli/runner.js";
import { UpstreamError, ValidationError } from "../errors.js";
import * as args from "./args.js";
import { optionalRows, requiredRows, toCsv } from "./cells.js";
import { defineTool } from "./registry.js";
import type { Tool } from "./registry.js";

function flag(name: string, value: string | undefined): string[] {
  return value ? [`--${name}`, value] : [];
}

// gogcli has no calendar selector on these commands; it always uses primary.
const { calendar_id: _createCalendar, ...createEventArgs } = args.calendar.create;
const { calendar_id: _listCalendar, ...listEventsArgs } = args.calendar.list;
const { calendar_id: _updateCalendar, ...updateEventArgs } = args.calendar.update;
const { calendar_id: _eventCalendar, ...eventArgs } = args.calendar.event;

/** Tools backed by the gogcli binary, one CLI invocation per call. */
export function gogcliTools(gog: GogRunner): Tool[] {
  return [
    // Gmail
    defineTool({
      name: "gmail_send_email",
      description: "Send an email via Gmail (set html: true to send the body as HTML)",
      args: args.gmail.send,
      run: async ({ to, subject, body, html, cc, bcc, account }) => {
        const cli = ["--to", to, "--subject", subject, ...flag("cc", cc), ...flag("bcc", bcc)];
        if (html) {
          cli.push(`--body-html=${body}`);
        } else {
          cli.push("--body", body);
        }
        const result = await gog.run("gmail", "send", cli, { account });
        return { sent: true, to, subject, result };
      },
    }),
    defineTool({
      name: "gmail_list_emails",
      description: "List recent emails from Gmail",
      args: args.gmail.list,
      run: ({ limit, account }) =>
        gog.run("gmail", "list", ["--limit", String(limit)], { account }),
    }),
    defineTool({
      name: "gmail_search_emails",
      description: "Search for emails in Gmail",
      args: args.gmail.search,
      run: ({ query, limit, account }) =>
        gog.run("gmail", "search", ["--query", query, "--limit", String(limit)], { account }),
    }),
    defineTool({
      name: "gmail_read_email",
      description: "Read a full email by message ID",
      args: args.gmail.message,
      run: ({ message_id, account }) =>
        gog.run("gmail", "read", ["--id", message_id], { account }),
    }),
    defineTool({
      name: "gmail_label_email",
      description: "Add or remove labels on an email",
      args: args.gmail.label,
      run: async ({ message_id, labels, remove, account }) => {
        if (!labels && !remove) {
          throw new ValidationError("Must specify either 'labels' or 'remove'");
        }
        return gog.run(
          "gmail",
          "label",
          ["--id", message_id, ...flag("add", labels), ...flag("remove", remove)],
          { account }
        );
      },
    }),
    defineTool({
      name: "gmail_archive_email",
      description: "Archive an email (remove it from the inbox)",
      args: args.gmail.message,
      run: ({ message_id, account }) =>
        gog.run("gmail", "archive", ["--id", message_id], { account }),
    }),
    defineTool({
      name: "gmail_delete_email",
      description: "Delete an email",
      args: args.gmail.message,
      run: ({ message_id, account }) =>
        gog.run("gmail", "delete", ["--id", message_id], { account }),
    }),
    defineTool({
      name: "gmail_list_labels",
      description: "List Gmail labels",
      args: args.gmail.labels,
      run: ({ account }) => gog.run("gmail", "labels", [], { account }),
    }),

    // Sheets
    defineTool({
      name: "sheets_create",
      description: "Create a new Google Sheets spreadsheet, optionally seeded with rows at A1",
      args: args.sheets.create,
      run: async ({ title, values, data, account }) => {
        const rows = optionalRows({ values, data });
        const created = await gog.run("sheets", "create", ["--title", title], { account });
        if (!rows || rows.length === 0) return created;

        const id = spreadsheetIdOf(created);
        if (!id) {
          throw new UpstreamError(
            "Spreadsheet was created but gogcli did not report its ID; write the rows with sheets_write"
          );
        }
        await gog.run("sheets", "update", ["--id", id, "--range", "A1", "--data", toCsv(rows)], {
          account,
        });
        return { spreadsheetId: id, created, rowsWritten: rows.length };
      },
    }),
    defineTool({
      name: "sheets_read",
      description: "Read data from a spreadsheet",
      args: args.sheets.read,
      run: ({ spreadsheet_id, range, account }) =>
        gog.run("sheets", "get", ["--id", args.resolveId(spreadsheet_id), "--range", range], {
          account,
        }),
    }),
    defineTool({
      name: "sheets_write",
      description: "Write rows to a spreadsheet range",
      args: args.sheets.write,
      run: ({ spreadsheet_id, range, values, data, account }) =>
        gog.run(
          "sheets",
          "update",
          ["--id", args.resolveId(spreadsheet_id), "--range", range, "--data", toCsv(requiredRows({ values, data }))],
          { account }
        ),
    }),
    defineTool({
      name: "sheets_append",
      description: "Append rows to a spreadsheet",
      args: args.sheets.append,
      run: ({ spreadsheet_id, range, values, data, account }) =>
        gog.run(
          "sheets",
          "append",
          ["--id", args.resolveId(spreadsheet_id), "--range", range, "--data", toCsv(requiredRows({ values, data }))],
          { account }
        ),
    }),
    defineTool({
      name: "sheets_delete",
      description: "Delete a spreadsheet",
      args: args.sheets.remove,
      run: ({ spreadsheet_id, account }) =>
        gog.run("sheets", "delete", ["--id", args.resolveId(spreadsheet_id)], { account }),
    }),

    // Docs
    defineTool({
      name: "docs_create",
      description: "Create a new Google Doc",
      args: args.docs.create,
      run: ({ title, content, account }) =>
        gog.run("docs", "create", ["--title", title, ...flag("content", content)], { account }),
    }),
    defineTool({
      name: "docs_read",
      description: "Read a Google Doc",
      args: args.docs.document,
      run: ({ doc_id, account }) =>
        gog.run("docs", "get", ["--id", args.resolveId(doc_id)], { account }),
    }),
    defineTool({
      name: "docs_append",
      description: "Append text to a Google Doc",
      args: args.docs.append,
      run: ({ doc_id, text, account }) =>
        gog.run("docs", "append", ["--id", args.resolveId(doc_id), "--text", text], { account }),
    }),
    defineTool({
      name: "docs_delete",
      description: "Delete a Google Doc",
      args: args.docs.document,
      run: ({ doc_id, account }) =>
        gog.run("docs", "delete", ["--id", args.resolveId(doc_id)], { account }),
    }),
    defineTool({
      name: "docs_export",
      description: "Export a Google Doc as pdf, docx or txt",
      args: args.docs.export,
      run: ({ doc_id, format, account }) =>
        gog.run("docs", "export", ["--id", args.resolveId(doc_id), "--format", format], {
          account,
        }),
    }),

    // Slides
    defineTool({
      name: "slides_create",
      description: "Create a new Google Slides presentation",
      args: args.slides.create,
      run: ({ title, account }) => gog.run("slides", "create", ["--title", title], { account }),
    }),
    defineTool({
      name: "slides_read",
      description: "Read a Google Slides presentation",
      args: args.slides.presentation,
      run: ({ presentation_id, account }) =>
        gog.run("slides", "get", ["--id", args.resolveId(presentation_id)], { account }),
    }),
    defineTool({
      name: "slides_delete",
      description: "Delete a Google Slides presentation",
      args: args.slides.presentation,
      run: ({ presentation_id, account }) =>
        gog.run("slides", "delete", ["--id", args.resolveId(presentation_id)], { account }),
    }),

    // Calendar
    defineTool({
      name: "calendar_create_event",
      description: "Create a calendar event (start/end accept RFC 3339 or phrases like 'tomorrow 10am')",
      args: createEventArgs,
      run: ({ title, start, end, description, location, attendees, account }) =>
        gog.run(
          "calendar",
          "create",
          [
            "--title", title,
            "--start", start,
            "--end", end,
            ...flag("description", description),
            ...flag("location", location),
            ...flag("attendees", attendees),
          ],
          { account }
        ),
    }),
    defineTool({
      name: "calendar_list_events",
      description: "List calendar events",
      args: listEventsArgs,
      run: ({ start, end, limit, account }) =>
        gog.run(
          "calendar",
          "list",
          ["--limit", String(limit), ...flag("start", start), ...flag("end", end)],
          { account }
        ),
    }),
    defineTool({
      name: "calendar_update_event",
      description: "Update a calendar event; only the given fields change",
      args: updateEventArgs,
      run: ({ event_id, title, start, end, description, location, account }) =>
        gog.run(
          "calendar",
          "update",
          [
            "--id", event_id,
            ...flag("title", title),
            ...flag("start", start),
            ...flag("end", end),
            ...flag("description", description),
            ...flag("location", location),
          ],
          { account }
        ),
    }),
    defineTool({
      name: "calendar_delete_event",
      description: "Delete a calendar event",
      args: eventArgs,
      run: ({ event_id, account }) =>
        gog.run("calendar", "delete", ["--id", event_id], { account }),
    }),
    defineTool({
      name: "calendar_list_calendars",
      description: "List all calendars",
      args: args.calendar.calendars,
      run: ({ account }) => gog.run("calendar", "calendars", [], { account }),
    }),
  ];
}

function spreadsheetIdOf(output: unknown): string | undefined {
  if (output === null || typeof output !== "object" || Array.isArray(output)) {
    return undefined;
  }
  for (const key of ["spreadsheetId", "spreadsheet_id", "id"]) {
    const value: unknown = Reflect.get(output, key);
    if (typeof value === "string" && value !== "") return value;
  }
  if ("output" in output && typeof output.output === "string") {
    const match = output.output.match(/spreadsheets\/d\/([a-zA-Z0-9_-]+)|\bID:\s*([a-zA-Z0-9_-]+)/);
    if (match) return match[1] ?? match[2];
  }
  return undefined;
}
