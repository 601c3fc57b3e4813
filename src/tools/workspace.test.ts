import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { AuthenticationError } from "../errors.js";
import { createFakeWorkspace, fakeGatewayFactory } from "../testing/fake-gateway.js";
import type { FakeWorkspace } from "../testing/fake-gateway.js";
import { ToolRegistry } from "./registry.js";
import { workspaceTools } from "./workspace.js";

let tmpDir: string;
let workspace: FakeWorkspace;
let gateway: ReturnType<typeof fakeGatewayFactory>;
let registry: ToolRegistry;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "workspace-tools-test-"));
  workspace = createFakeWorkspace();
  gateway = fakeGatewayFactory(workspace);
  registry = new ToolRegistry().add(...workspaceTools(gateway, { exportDir: tmpDir }));
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

function dataOf(response: Awaited<ReturnType<ToolRegistry["call"]>>): unknown {
  if (!response.success) throw new Error(`expected success, got: ${response.error}`);
  return response.data;
}

describe("workspace tools", () => {
  it("exposes the gogcli tool names plus Drive", () => {
    const names = registry.names();
    expect(names).toHaveLength(30);
    expect(names).toContain("gmail_send_email");
    expect(names).toContain("calendar_list_calendars");
    expect(names.filter((n) => n.startsWith("drive_"))).toEqual([
      "drive_create_file",
      "drive_create_folder",
      "drive_list_files",
      "drive_share_file",
    ]);
  });

  it("does not resolve a gateway when arguments are invalid", async () => {
    const response = await registry.call("sheets_read", {});
    expect(response).toEqual({
      success: false,
      error: "Missing required argument: spreadsheet_id",
      code: "validation",
    });
    expect(gateway.accounts).toEqual([]);
  });

  it("passes the account to the gateway factory", async () => {
    await registry.call("gmail_list_labels", { account: "work@example.com" });
    expect(gateway.accounts).toEqual(["work@example.com"]);
  });

  it("reports authentication problems as error objects", async () => {
    const failing = new ToolRegistry().add(
      ...workspaceTools(
        async () => {
          throw new AuthenticationError("No Google token found. Run 'workspace-mcp auth' first");
        },
        { exportDir: tmpDir }
      )
    );
    expect(await failing.call("gmail_list_emails", {})).toEqual({
      success: false,
      error: "No Google token found. Run 'workspace-mcp auth' first",
      code: "authentication",
    });
  });

  describe("sheets", () => {
    it("reads back the rows a new spreadsheet was seeded with", async () => {
      const created = dataOf(
        await registry.call("sheets_create", {
          title: "Sales Data",
          values: [["Product", "Revenue"]],
        })
      );
      expect(created).toEqual({
        spreadsheetId: "sheet-1",
        title: "Sales Data",
        url: "https://docs.google.com/spreadsheets/d/sheet-1/edit",
        rowsWritten: 1,
      });

      const read = dataOf(
        await registry.call("sheets_read", { spreadsheet_id: "sheet-1", range: "A1:B1" })
      );
      expect(read).toEqual({ range: "A1:B1", values: [["Product", "Revenue"]] });
    });

    it("creates without values", async () => {
      const created = dataOf(await registry.call("sheets_create", { title: "Empty" }));
      expect(created).toEqual({
        spreadsheetId: "sheet-1",
        title: "Empty",
        url: "https://docs.google.com/spreadsheets/d/sheet-1/edit",
      });
    });

    it("writes CSV and appends JSON rows", async () => {
      await registry.call("sheets_create", { title: "Log" });
      await registry.call("sheets_write", {
        spreadsheet_id: "sheet-1",
        range: "A1",
        values: "when,what\nmon,start",
      });
      const appended = dataOf(
        await registry.call("sheets_append", { spreadsheet_id: "sheet-1", values: '[["tue", "stop"]]' })
      );
      expect(appended).toEqual({ updatedRows: 1, updatedCells: 2 });

      const read = dataOf(
        await registry.call("sheets_read", { spreadsheet_id: "sheet-1", range: "Sheet1!A1:B3" })
      );
      expect(read).toEqual({
        range: "Sheet1!A1:B3",
        values: [
          ["when", "what"],
          ["mon", "start"],
          ["tue", "stop"],
        ],
      });
    });

    it("takes data as an alias for values", async () => {
      await registry.call("sheets_create", { title: "Alias", data: "a,b" });
      const read = dataOf(await registry.call("sheets_read", { spreadsheet_id: "sheet-1", range: "A1:B1" }));
      expect(read).toEqual({ range: "A1:B1", values: [["a", "b"]] });
    });

    it("refuses values and data together", async () => {
      const response = await registry.call("sheets_append", {
        spreadsheet_id: "sheet-1",
        values: "a",
        data: "b",
      });
      expect(response).toEqual({
        success: false,
        error: "Give either values or data, not both",
        code: "validation",
      });
    });

    it("deletes through Drive", async () => {
      await registry.call("sheets_create", { title: "Old" });
      const deleted = dataOf(
        await registry.call("sheets_delete", {
          spreadsheet_id: "https://docs.google.com/spreadsheets/d/sheet-1/edit",
        })
      );
      expect(deleted).toEqual({ deleted: true, spreadsheetId: "sheet-1" });
      expect(workspace.sheets.grids.has("sheet-1")).toBe(false);
    });

    it("reports upstream errors", async () => {
      const response = await registry.call("sheets_read", { spreadsheet_id: "nope" });
      expect(response).toMatchObject({ success: false, code: "upstream" });
    });
  });

  describe("gmail", () => {
    it("sends and reads back a message", async () => {
      const sent = dataOf(
        await registry.call("gmail_send_email", {
          to: "a@example.com",
          subject: "Hi",
          body: "<b>Hello</b>",
          html: true,
        })
      );
      expect(sent).toEqual({ sent: true, to: "a@example.com", subject: "Hi", id: "msg-1", threadId: "msg-1" });
      expect(workspace.gmail.sent[0]).toEqual({
        to: "a@example.com",
        subject: "Hi",
        body: "<b>Hello</b>",
        html: true,
        cc: undefined,
        bcc: undefined,
      });
    });

    it("labels by name and archives", async () => {
      await registry.call("gmail_send_email", { to: "a@example.com", subject: "S", body: "B" });
      workspace.gmail.messages.get("msg-1")?.labelIds.push("INBOX");

      const labelled = dataOf(
        await registry.call("gmail_label_email", { message_id: "msg-1", labels: "receipts, STARRED" })
      );
      expect(labelled).toEqual({ id: "msg-1", labelIds: ["SENT", "INBOX", "Label_1", "STARRED"] });

      const archived = dataOf(await registry.call("gmail_archive_email", { message_id: "msg-1" }));
      expect(archived).toEqual({ id: "msg-1", labelIds: ["SENT", "Label_1", "STARRED"] });
    });

    it("rejects unknown label names", async () => {
      await registry.call("gmail_send_email", { to: "a@example.com", subject: "S", body: "B" });
      const response = await registry.call("gmail_label_email", { message_id: "msg-1", labels: "Nope" });
      expect(response).toEqual({ success: false, error: "Unknown label: Nope", code: "validation" });
    });

    it("moves deleted mail to the trash", async () => {
      await registry.call("gmail_send_email", { to: "a@example.com", subject: "S", body: "B" });
      const deleted = dataOf(await registry.call("gmail_delete_email", { message_id: "msg-1" }));
      expect(deleted).toEqual({ id: "msg-1", trashed: true });
      expect(workspace.gmail.messages.get("msg-1")?.labelIds).toContain("TRASH");
    });
  });

  describe("docs", () => {
    it("creates, appends and reads", async () => {
      await registry.call("docs_create", { title: "Notes", content: "One. " });
      await registry.call("docs_append", { doc_id: "doc-1", text: "Two." });
      const doc = dataOf(await registry.call("docs_read", { doc_id: "doc-1" }));
      expect(doc).toEqual({
        documentId: "doc-1",
        title: "Notes",
        url: "https://docs.google.com/document/d/doc-1/edit",
        text: "One. Two.",
      });
    });

    it("returns txt exports inline", async () => {
      workspace.drive.exports.set("doc-9", Buffer.from("plain text"));
      const exported = dataOf(await registry.call("docs_export", { doc_id: "doc-9", format: "txt" }));
      expect(exported).toEqual({ documentId: "doc-9", format: "txt", content: "plain text" });
    });

    it("writes binary exports to the export directory", async () => {
      workspace.drive.exports.set("doc-9", Buffer.from("%PDF-1.7"));
      const exported = dataOf(await registry.call("docs_export", { doc_id: "doc-9" }));
      const file = path.join(tmpDir, "doc-9.pdf");
      expect(exported).toEqual({ documentId: "doc-9", format: "pdf", path: file, bytes: 8 });
      expect(await fs.readFile(file, "utf8")).toBe("%PDF-1.7");
    });
  });

  describe("drive", () => {
    it("creates a folder and a file inside it, then lists the folder", async () => {
      const folder = dataOf(await registry.call("drive_create_folder", { name: "Reports" }));
      expect(folder).toEqual({
        id: "file-1",
        name: "Reports",
        mimeType: "application/vnd.google-apps.folder",
      });
      await registry.call("drive_create_file", { name: "q1.txt", content: "numbers", folder_id: "file-1" });
      await registry.call("drive_create_file", { name: "elsewhere.txt" });

      const listed = dataOf(await registry.call("drive_list_files", { folder_id: "file-1" }));
      expect(listed).toEqual([{ id: "file-2", name: "q1.txt", mimeType: "text/plain" }]);
    });

    it("shares with the requested role", async () => {
      const shared = dataOf(
        await registry.call("drive_share_file", { file_id: "file-7", email: "b@example.com", role: "writer" })
      );
      expect(shared).toEqual({ fileId: "file-7", email: "b@example.com", role: "writer", permissionId: "perm-1" });
    });

    it("validates the email address", async () => {
      const response = await registry.call("drive_share_file", { file_id: "f", email: "not-an-email" });
      expect(response).toMatchObject({ success: false, code: "validation" });
    });
  });

  describe("calendar", () => {
    it("creates a timed event", async () => {
      const event = dataOf(
        await registry.call("calendar_create_event", {
          title: "Review",
          start: "2025-03-03T10:00:00+01:00",
          end: "2025-03-03T11:00:00+01:00",
          attendees: "a@example.com, b@example.com",
        })
      );
      expect(event).toEqual({
        id: "evt-1",
        summary: "Review",
        start: "2025-03-03T10:00:00+01:00",
        end: "2025-03-03T11:00:00+01:00",
        description: undefined,
        location: undefined,
        attendees: ["a@example.com", "b@example.com"],
      });
    });

    it("moves a same-day all-day end to the next day", async () => {
      const event = dataOf(
        await registry.call("calendar_create_event", { title: "Offsite", start: "2025-02-28", end: "2025-02-28" })
      );
      expect(event).toMatchObject({ start: "2025-02-28", end: "2025-03-01" });
    });

    it("rejects free-form times", async () => {
      const response = await registry.call("calendar_create_event", {
        title: "Lunch",
        start: "tomorrow noon",
        end: "2025-03-03T13:00:00Z",
      });
      expect(response).toEqual({
        success: false,
        error: "Invalid time 'tomorrow noon': use RFC 3339 (2025-01-31T09:00:00Z) or YYYY-MM-DD",
        code: "validation",
      });
      expect(gateway.accounts).toEqual([]);
    });

    it("updates only the given fields", async () => {
      await registry.call("calendar_create_event", {
        title: "Sync",
        start: "2025-03-03T10:00:00Z",
        end: "2025-03-03T10:30:00Z",
      });
      const updated = dataOf(
        await registry.call("calendar_update_event", { event_id: "evt-1", location: "Room 5" })
      );
      expect(updated).toMatchObject({ summary: "Sync", location: "Room 5" });
    });

    it("moves a same-day all-day end to the next day on update", async () => {
      await registry.call("calendar_create_event", { title: "Offsite", start: "2025-02-27", end: "2025-02-28" });
      const updated = dataOf(
        await registry.call("calendar_update_event", { event_id: "evt-1", start: "2025-03-10", end: "2025-03-10" })
      );
      expect(updated).toMatchObject({ start: "2025-03-10", end: "2025-03-11" });
    });

    it("refuses an update with nothing to change", async () => {
      const response = await registry.call("calendar_update_event", { event_id: "evt-1" });
      expect(response).toEqual({
        success: false,
        error: "Nothing to update: give at least one field to change",
        code: "validation",
      });
    });

    it("lists and deletes events", async () => {
      await registry.call("calendar_create_event", {
        title: "A",
        start: "2025-03-03T10:00:00Z",
        end: "2025-03-03T10:30:00Z",
      });
      const listed = dataOf(await registry.call("calendar_list_events", { start: "2025-03-01" }));
      expect(listed).toHaveLength(1);
      expect(dataOf(await registry.call("calendar_delete_event", { event_id: "evt-1" }))).toEqual({
        deleted: true,
        eventId: "evt-1",
      });
      expect(dataOf(await registry.call("calendar_list_calendars", {}))).toEqual([
        { id: "primary", summary: "Primary", primary: true, accessRole: "owner" },
      ]);
    });
  });
});
