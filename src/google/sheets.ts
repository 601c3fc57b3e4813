import type { sheets_v4 } from "googleapis";
import { UpstreamError } from "../errors.js";
import { callGoogle, opt } from "./request.js";
import type { RangeValues, SheetsGateway, SpreadsheetRef, UpdateSummary } from "./types.js";

function cellText(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value);
}

export function spreadsheetUrl(id: string): string {
  return `https://docs.google.com/spreadsheets/d/${id}/edit`;
}

export class SheetsApi implements SheetsGateway {
  constructor(private readonly sheets: sheets_v4.Sheets) {}

  async create(title: string): Promise<SpreadsheetRef> {
    const res = await callGoogle("Sheets create", () =>
      this.sheets.spreadsheets.create({
        requestBody: { properties: { title } },
        fields: "spreadsheetId,properties.title,spreadsheetUrl",
      })
    );
    const id = res.data.spreadsheetId;
    if (!id) throw new UpstreamError("Sheets did not return a spreadsheet ID");
    return {
      spreadsheetId: id,
      title: res.data.properties?.title ?? title,
      url: res.data.spreadsheetUrl ?? spreadsheetUrl(id),
    };
  }

  async read(spreadsheetId: string, range: string): Promise<RangeValues> {
    const res = await callGoogle("Sheets read", () =>
      this.sheets.spreadsheets.values.get({ spreadsheetId, range })
    );
    const values: unknown[][] = res.data.values ?? [];
    return {
      range: res.data.range ?? range,
      values: values.map((row) => row.map(cellText)),
    };
  }

  async write(spreadsheetId: string, range: string, rows: string[][]): Promise<UpdateSummary> {
    const res = await callGoogle("Sheets write", () =>
      this.sheets.spreadsheets.values.update({
        spreadsheetId,
        range,
        valueInputOption: "RAW",
        requestBody: { values: rows },
      })
    );
    return {
      updatedRange: opt(res.data.updatedRange),
      updatedRows: res.data.updatedRows ?? 0,
      updatedCells: res.data.updatedCells ?? 0,
    };
  }

  async append(spreadsheetId: string, range: string, rows: string[][]): Promise<UpdateSummary> {
    const res = await callGoogle("Sheets append", () =>
      this.sheets.spreadsheets.values.append({
        spreadsheetId,
        range,
        valueInputOption: "RAW",
        insertDataOption: "INSERT_ROWS",
        requestBody: { values: rows },
      })
    );
    const updates = res.data.updates;
    return {
      updatedRange: opt(updates?.updatedRange),
      updatedRows: updates?.updatedRows ?? 0,
      updatedCells: updates?.updatedCells ?? 0,
    };
  }
}
