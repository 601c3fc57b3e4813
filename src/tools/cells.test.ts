import { describe, it, expect } from "vitest";
import { parseCsv, toCsv, toRows } from "./cells.js";

describe("parseCsv", () => {
  it("splits rows and fields", () => {
    expect(parseCsv("a,b\nc,d")).toEqual([
      ["a", "b"],
      ["c", "d"],
    ]);
  });

  it("handles quoted commas, quotes and newlines", () => {
    expect(parseCsv('"x, y","say ""hi""","line\nbreak"')).toEqual([
      ["x, y", 'say "hi"', "line\nbreak"],
    ]);
  });

  it("accepts CRLF line endings", () => {
    expect(parseCsv("a,b\r\nc,d\r\n")).toEqual([
      ["a", "b"],
      ["c", "d"],
    ]);
  });

  it("keeps empty fields", () => {
    expect(parseCsv("a,,c")).toEqual([["a", "", "c"]]);
  });

  it("rejects an unterminated quote", () => {
    expect(() => parseCsv('"open')).toThrow("Unterminated quoted field in CSV data");
  });
});

describe("toRows", () => {
  it("passes arrays through", () => {
    const rows = [["Product", "Revenue"]];
    expect(toRows(rows)).toBe(rows);
  });

  it("parses a JSON array of arrays and stringifies cells", () => {
    expect(toRows('[["Widget", 12.5, true, null]]')).toEqual([["Widget", "12.5", "true", ""]]);
  });

  it("rejects JSON that is not an array of arrays", () => {
    expect(() => toRows('["a", "b"]')).toThrow("JSON cell data must be an array of arrays");
  });

  it("falls back to CSV when a leading bracket is not JSON", () => {
    expect(toRows("[draft],notes")).toEqual([["[draft]", "notes"]]);
  });

  it("parses CSV text", () => {
    expect(toRows("Product,Revenue\nWidget,10")).toEqual([
      ["Product", "Revenue"],
      ["Widget", "10"],
    ]);
  });

  it("rejects empty data", () => {
    expect(() => toRows("   ")).toThrow("Cell data is empty");
  });
});

describe("toCsv", () => {
  it("quotes only fields that need it", () => {
    expect(toCsv([["plain", "a,b", 'q"uote', " padded"]])).toBe(
      'plain,"a,b","q""uote"," padded"'
    );
  });

  it("joins rows with newlines", () => {
    expect(toCsv([["a"], ["b"]])).toBe("a\nb");
  });

  it("is read back unchanged by parseCsv", () => {
    const rows = [["multi\nline", "x"], ["", "y"]];
    expect(parseCsv(toCsv(rows))).toEqual(rows);
  });
});
