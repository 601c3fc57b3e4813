import { z } from "zod";
import { ValidationError } from "../errors.js";

export type Rows = string[][];

const cell = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const jsonRows = z.array(z.array(cell));

/**
 * Cell data as accepted by the sheet tools: a 2-D array, or a string holding
 * either a JSON array of arrays or CSV text.
 */
export const cellData = z.union([z.array(z.array(z.string())), z.string()]);

export type CellData = z.infer<typeof cellData>;

function stringifyCell(value: z.infer<typeof cell>): string {
  return value === null ? "" : String(value);
}

export function parseCsv(text: string): Rows {
  const rows: Rows = [];
  let row: string[] = [];
  let field = "";
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"' && field === "") {
      quoted = true;
    } else if (ch === ",") {
      row.push(field);
      field = "";
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && text[i + 1] === "\n") i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
    } else {
      field += ch;
    }
  }

  if (quoted) {
    throw new ValidationError("Unterminated quoted field in CSV data");
  }
  if (field !== "" || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}

export function toRows(data: CellData): Rows {
  if (Array.isArray(data)) return data;

  const text = data.trim();
  if (text === "") {
    throw new ValidationError("Cell data is empty");
  }

  if (text.startsWith("[")) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      return parseCsv(text);
    }
    const rows = jsonRows.safeParse(parsed);
    if (!rows.success) {
      throw new ValidationError("JSON cell data must be an array of arrays");
    }
    return rows.data.map((r) => r.map(stringifyCell));
  }

  return parseCsv(text);
}

function quoteField(value: string): string {
  return /[",\r\n]/.test(value) || value !== value.trim()
    ? `"${value.replace(/"/g, '""')}"`
    : value;
}

export function toCsv(rows: Rows): string {
  return rows.map((row) => row.map(quoteField).join(",")).join("\n");
}

/** Rows from `values` or its `data` alias; undefined when neither is given. */
export function optionalRows(input: { values?: CellData; data?: CellData }): Rows | undefined {
  if (input.values !== undefined && input.data !== undefined) {
    throw new ValidationError("Give either values or data, not both");
  }
  const given = input.values ?? input.data;
  return given === undefined ? undefined : toRows(given);
}

export function requiredRows(input: { values?: CellData; data?: CellData }): Rows {
  const rows = optionalRows(input);
  if (rows === undefined) {
    throw new ValidationError("Missing cell data: give values (or data)");
  }
  return rows;
}
