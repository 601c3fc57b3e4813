// Plain-JSON views of Workspace resources. The googleapis implementations
// reshape API responses into these; tests substitute in-memory gateways.

export interface MessageSummary {
  id: string;
  threadId?: string;
  from?: string;
  to?: string;
  subject?: string;
  date?: string;
  snippet?: string;
  labelIds: string[];
}

export interface Attachment {
  filename: string;
  mimeType: string;
  size: number;
}

export interface MessageDetail extends MessageSummary {
  cc?: string;
  textBody?: string;
  htmlBody?: string;
  attachments: Attachment[];
}

export interface OutgoingMessage {
  to: string;
  subject: string;
  body: string;
  html: boolean;
  cc?: string;
  bcc?: string;
}

export interface Label {
  id: string;
  name: string;
  type?: string;
}

export interface GmailGateway {
  send(message: OutgoingMessage): Promise<{ id: string; threadId?: string }>;
  list(options: { query?: string; limit: number }): Promise<MessageSummary[]>;
  read(id: string): Promise<MessageDetail>;
  /** Label names are resolved to IDs; system labels (INBOX, UNREAD, ...) pass as-is. */
  modifyLabels(id: string, add: string[], remove: string[]): Promise<{ id: string; labelIds: string[] }>;
  trash(id: string): Promise<{ id: string }>;
  labels(): Promise<Label[]>;
}

export interface SpreadsheetRef {
  spreadsheetId: string;
  title: string;
  url: string;
}

export interface RangeValues {
  range: string;
  values: string[][];
}

export interface UpdateSummary {
  updatedRange?: string;
  updatedRows: number;
  updatedCells: number;
}

export interface SheetsGateway {
  create(title: string): Promise<SpreadsheetRef>;
  read(spreadsheetId: string, range: string): Promise<RangeValues>;
  write(spreadsheetId: string, range: string, rows: string[][]): Promise<UpdateSummary>;
  append(spreadsheetId: string, range: string, rows: string[][]): Promise<UpdateSummary>;
}

export interface DocumentRef {
  documentId: string;
  title: string;
  url: string;
}

export interface DocumentText extends DocumentRef {
  text: string;
}

export interface DocsGateway {
  create(title: string, content?: string): Promise<DocumentRef>;
  read(documentId: string): Promise<DocumentText>;
  append(documentId: string, text: string): Promise<{ documentId: string; inserted: number }>;
}

export interface DriveFile {
  id: string;
  name: string;
  mimeType: string;
  modifiedTime?: string;
  webViewLink?: string;
}

export type ShareRole = "reader" | "commenter" | "writer" | "owner";

export interface DriveGateway {
  list(options: { query?: string; folderId?: string; limit: number }): Promise<DriveFile[]>;
  createFile(options: {
    name: string;
    mimeType: string;
    content?: string;
    folderId?: string;
  }): Promise<DriveFile>;
  createFolder(name: string, parentId?: string): Promise<DriveFile>;
  share(fileId: string, email: string, role: ShareRole): Promise<{ permissionId: string }>;
  remove(fileId: string): Promise<void>;
  export(fileId: string, mimeType: string): Promise<Buffer>;
}

export interface PresentationRef {
  presentationId: string;
  title: string;
  url: string;
}

export interface SlideText {
  objectId: string;
  text: string[];
}

export interface PresentationDetail extends PresentationRef {
  slides: SlideText[];
}

export interface SlidesGateway {
  create(title: string): Promise<PresentationRef>;
  read(presentationId: string): Promise<PresentationDetail>;
}

export type EventTime = { dateTime: string } | { date: string };

export interface EventInput {
  summary: string;
  start: EventTime;
  end: EventTime;
  description?: string;
  location?: string;
  attendees?: string[];
}

export interface CalendarEvent {
  id: string;
  summary?: string;
  start?: string;
  end?: string;
  description?: string;
  location?: string;
  attendees: string[];
  htmlLink?: string;
  status?: string;
}

export interface CalendarInfo {
  id: string;
  summary?: string;
  primary: boolean;
  accessRole?: string;
  timeZone?: string;
}

export interface CalendarGateway {
  listEvents(options: {
    calendarId: string;
    timeMin?: string;
    timeMax?: string;
    limit: number;
  }): Promise<CalendarEvent[]>;
  createEvent(calendarId: string, event: EventInput): Promise<CalendarEvent>;
  updateEvent(calendarId: string, eventId: string, patch: Partial<EventInput>): Promise<CalendarEvent>;
  deleteEvent(calendarId: string, eventId: string): Promise<void>;
  listCalendars(): Promise<CalendarInfo[]>;
}

export interface WorkspaceGateway {
  gmail: GmailGateway;
  sheets: SheetsGateway;
  docs: DocsGateway;
  drive: DriveGateway;
  slides: SlidesGateway;
  calendar: CalendarGateway;
}

/** Resolves the gateway for an account (or the default account). */
export type GatewayFactory = (account?: string) => Promise<WorkspaceGateway>;
