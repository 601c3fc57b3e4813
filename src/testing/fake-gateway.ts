import { UpstreamError } from "../errors.js";
import { resolveLabelIds } from "../google/gmail.js";
import type {
  CalendarEvent,
  CalendarGateway,
  CalendarInfo,
  DocsGateway,
  DriveFile,
  DriveGateway,
  EventInput,
  EventTime,
  GatewayFactory,
  GmailGateway,
  Label,
  MessageDetail,
  OutgoingMessage,
  SheetsGateway,
  ShareRole,
  SlidesGateway,
  WorkspaceGateway,
} from "../google/types.js";

interface CellRef {
  row: number;
  col: number;
}

function columnIndex(letters: string): number {
  let n = 0;
  for (const ch of letters.toUpperCase()) n = n * 26 + (ch.charCodeAt(0) - 64);
  return n - 1;
}

function parseCell(ref: string): CellRef | undefined {
  const match = ref.match(/^([A-Za-z]+)(\d+)$/);
  if (!match) return undefined;
  return { row: Number(match[2]) - 1, col: columnIndex(match[1]) };
}

/** A1 notation, optionally sheet-qualified. A bare sheet name covers the whole grid. */
function parseRange(range: string): { start: CellRef; end?: CellRef } {
  const ref = range.includes("!") ? range.slice(range.indexOf("!") + 1) : range;
  const [first, second] = ref.split(":");
  const start = parseCell(first);
  if (!start) return { start: { row: 0, col: 0 } };
  return { start, end: second === undefined ? start : parseCell(second) };
}

class FakeSheets implements SheetsGateway {
  readonly grids = new Map<string, { title: string; grid: string[][] }>();
  private next = 1;

  async create(title: string) {
    const spreadsheetId = `sheet-${this.next++}`;
    this.grids.set(spreadsheetId, { title, grid: [] });
    return { spreadsheetId, title, url: `https://docs.google.com/spreadsheets/d/${spreadsheetId}/edit` };
  }

  async read(spreadsheetId: string, range: string) {
    const { grid } = this.sheet(spreadsheetId);
    const { start, end } = parseRange(range);
    const lastRow = end ? end.row : grid.length - 1;
    const values: string[][] = [];
    for (let r = start.row; r <= lastRow && r < grid.length; r++) {
      const row = grid[r] ?? [];
      const lastCol = end ? end.col : row.length - 1;
      values.push(row.slice(start.col, lastCol + 1));
    }
    while (values.length > 0 && values[values.length - 1].length === 0) values.pop();
    return { range, values };
  }

  async write(spreadsheetId: string, range: string, rows: string[][]) {
    const { grid } = this.sheet(spreadsheetId);
    const { start } = parseRange(range);
    rows.forEach((row, i) => {
      const target = (grid[start.row + i] ??= []);
      row.forEach((value, j) => {
        for (let c = target.length; c < start.col + j; c++) target[c] = "";
        target[start.col + j] = value;
      });
    });
    return {
      updatedRange: range,
      updatedRows: rows.length,
      updatedCells: rows.reduce((n, row) => n + row.length, 0),
    };
  }

  async append(spreadsheetId: string, _range: string, rows: string[][]) {
    const { grid } = this.sheet(spreadsheetId);
    grid.push(...rows.map((row) => [...row]));
    return {
      updatedRows: rows.length,
      updatedCells: rows.reduce((n, row) => n + row.length, 0),
    };
  }

  private sheet(id: string) {
    const sheet = this.grids.get(id);
    if (!sheet) throw new UpstreamError(`Sheets read failed: Requested entity was not found.`, 404);
    return sheet;
  }
}

class FakeDocs implements DocsGateway {
  readonly documents = new Map<string, { title: string; text: string }>();
  private next = 1;

  async create(title: string, content?: string) {
    const documentId = `doc-${this.next++}`;
    this.documents.set(documentId, { title, text: content ?? "" });
    return { documentId, title, url: `https://docs.google.com/document/d/${documentId}/edit` };
  }

  async read(documentId: string) {
    const doc = this.get(documentId);
    return {
      documentId,
      title: doc.title,
      url: `https://docs.google.com/document/d/${documentId}/edit`,
      text: doc.text,
    };
  }

  async append(documentId: string, text: string) {
    this.get(documentId).text += text;
    return { documentId, inserted: text.length };
  }

  private get(id: string) {
    const doc = this.documents.get(id);
    if (!doc) throw new UpstreamError("Docs read failed: Requested entity was not found.", 404);
    return doc;
  }
}

class FakeSlides implements SlidesGateway {
  readonly presentations = new Map<string, { title: string; slides: string[][] }>();
  private next = 1;

  async create(title: string) {
    const presentationId = `deck-${this.next++}`;
    this.presentations.set(presentationId, { title, slides: [[]] });
    return {
      presentationId,
      title,
      url: `https://docs.google.com/presentation/d/${presentationId}/edit`,
    };
  }

  async read(presentationId: string) {
    const deck = this.presentations.get(presentationId);
    if (!deck) throw new UpstreamError("Slides read failed: Requested entity was not found.", 404);
    return {
      presentationId,
      title: deck.title,
      url: `https://docs.google.com/presentation/d/${presentationId}/edit`,
      slides: deck.slides.map((text, i) => ({ objectId: `p${i + 1}`, text })),
    };
  }
}

class FakeDrive implements DriveGateway {
  readonly files = new Map<string, DriveFile & { content?: string; parent?: string }>();
  readonly permissions: Array<{ fileId: string; email: string; role: ShareRole }> = [];
  readonly exports = new Map<string, Buffer>();
  private next = 1;

  constructor(private readonly stores: { remove(id: string): boolean }) {}

  async list(options: { query?: string; folderId?: string; limit: number }) {
    return [...this.files.values()]
      .filter((f) => options.folderId === undefined || f.parent === options.folderId)
      .slice(0, options.limit)
      .map(({ id, name, mimeType }) => ({ id, name, mimeType }));
  }

  async createFile(options: { name: string; mimeType: string; content?: string; folderId?: string }) {
    const id = `file-${this.next++}`;
    this.files.set(id, {
      id,
      name: options.name,
      mimeType: options.mimeType,
      content: options.content,
      parent: options.folderId,
    });
    return { id, name: options.name, mimeType: options.mimeType };
  }

  createFolder(name: string, parentId?: string) {
    return this.createFile({ name, mimeType: "application/vnd.google-apps.folder", folderId: parentId });
  }

  async share(fileId: string, email: string, role: ShareRole) {
    this.permissions.push({ fileId, email, role });
    return { permissionId: `perm-${this.permissions.length}` };
  }

  async remove(fileId: string) {
    if (this.files.delete(fileId) || this.stores.remove(fileId)) return;
    throw new UpstreamError("Drive delete failed: File not found.", 404);
  }

  async export(fileId: string, _mimeType: string) {
    const bytes = this.exports.get(fileId);
    if (!bytes) throw new UpstreamError("Drive export failed: File not found.", 404);
    return bytes;
  }
}

const SYSTEM_LABELS: Label[] = [
  { id: "INBOX", name: "INBOX", type: "system" },
  { id: "UNREAD", name: "UNREAD", type: "system" },
  { id: "STARRED", name: "STARRED", type: "system" },
  { id: "TRASH", name: "TRASH", type: "system" },
];

class FakeGmail implements GmailGateway {
  readonly messages = new Map<string, MessageDetail>();
  readonly sent: OutgoingMessage[] = [];
  readonly userLabels: Label[] = [{ id: "Label_1", name: "Receipts", type: "user" }];

  async send(message: OutgoingMessage) {
    this.sent.push(message);
    const id = `msg-${this.sent.length}`;
    this.messages.set(id, {
      id,
      threadId: id,
      to: message.to,
      subject: message.subject,
      labelIds: ["SENT"],
      textBody: message.html ? undefined : message.body,
      htmlBody: message.html ? message.body : undefined,
      attachments: [],
    });
    return { id, threadId: id };
  }

  async list(options: { query?: string; limit: number }) {
    return [...this.messages.values()]
      .filter((m) => !options.query || `${m.subject ?? ""} ${m.from ?? ""}`.includes(options.query))
      .slice(0, options.limit)
      .map(({ textBody: _t, htmlBody: _h, attachments: _a, cc: _c, ...summary }) => summary);
  }

  async read(id: string) {
    const message = this.messages.get(id);
    if (!message) throw new UpstreamError("Gmail read failed: Requested entity was not found.", 404);
    return message;
  }

  async modifyLabels(id: string, add: string[], remove: string[]) {
    const message = await this.read(id);
    const labels = await this.labels();
    const removeIds = new Set(resolveLabelIds(remove, labels));
    const next = message.labelIds.filter((l) => !removeIds.has(l));
    for (const label of resolveLabelIds(add, labels)) {
      if (!next.includes(label)) next.push(label);
    }
    message.labelIds = next;
    return { id, labelIds: next };
  }

  async trash(id: string) {
    await this.modifyLabels(id, ["TRASH"], ["INBOX"]);
    return { id };
  }

  async labels() {
    return [...SYSTEM_LABELS, ...this.userLabels];
  }
}

function timeText(time: EventTime | undefined): string | undefined {
  if (!time) return undefined;
  return "date" in time ? time.date : time.dateTime;
}

class FakeCalendar implements CalendarGateway {
  readonly events = new Map<string, { calendarId: string; input: EventInput }>();
  private next = 1;

  async listEvents(options: { calendarId: string; timeMin?: string; timeMax?: string; limit: number }) {
    return [...this.events.entries()]
      .filter(([, e]) => e.calendarId === options.calendarId)
      .slice(0, options.limit)
      .map(([id, e]) => this.toEvent(id, e.input));
  }

  async createEvent(calendarId: string, input: EventInput) {
    const id = `evt-${this.next++}`;
    this.events.set(id, { calendarId, input });
    return this.toEvent(id, input);
  }

  async updateEvent(calendarId: string, eventId: string, patch: Partial<EventInput>) {
    const existing = this.events.get(eventId);
    if (!existing || existing.calendarId !== calendarId) {
      throw new UpstreamError("Calendar update failed: Not Found", 404);
    }
    existing.input = { ...existing.input, ...patch };
    return this.toEvent(eventId, existing.input);
  }

  async deleteEvent(_calendarId: string, eventId: string) {
    if (!this.events.delete(eventId)) {
      throw new UpstreamError("Calendar delete failed: Not Found", 404);
    }
  }

  async listCalendars(): Promise<CalendarInfo[]> {
    return [{ id: "primary", summary: "Primary", primary: true, accessRole: "owner" }];
  }

  private toEvent(id: string, input: EventInput): CalendarEvent {
    return {
      id,
      summary: input.summary,
      start: timeText(input.start),
      end: timeText(input.end),
      description: input.description,
      location: input.location,
      attendees: input.attendees ?? [],
    };
  }
}

export interface FakeWorkspace extends WorkspaceGateway {
  gmail: FakeGmail;
  sheets: FakeSheets;
  docs: FakeDocs;
  drive: FakeDrive;
  slides: FakeSlides;
  calendar: FakeCalendar;
}

/** In-memory Workspace: documents written through one service are visible to the others. */
export function createFakeWorkspace(): FakeWorkspace {
  const sheets = new FakeSheets();
  const docs = new FakeDocs();
  const slides = new FakeSlides();
  const drive = new FakeDrive({
    remove: (id) =>
      sheets.grids.delete(id) || docs.documents.delete(id) || slides.presentations.delete(id),
  });
  return {
    gmail: new FakeGmail(),
    sheets,
    docs,
    drive,
    slides,
    calendar: new FakeCalendar(),
  };
}

/** Factory that hands out one fake per account and records which accounts were asked for. */
export function fakeGatewayFactory(workspace: FakeWorkspace = createFakeWorkspace()): GatewayFactory & {
  workspace: FakeWorkspace;
  accounts: Array<string | undefined>;
} {
  const accounts: Array<string | undefined> = [];
  const factory = async (account?: string) => {
    accounts.push(account);
    return workspace;
  };
  return Object.assign(factory, { workspace, accounts });
}
