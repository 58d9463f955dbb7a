/**
 * CSV Serialization Tests
 */

import { describe, it, expect } from "vitest";
import { escapeCSVField, toCSV } from "../export/csv.js";

/**
 * Minimal RFC 4180 reader used to check that output parses back
 */
function parseCSV(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"' && text[i + 1] === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        field += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === ",") {
      row.push(field);
      field = "";
    } else if (ch === "\r" && text[i + 1] === "\n") {
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
      i++;
    } else {
      field += ch;
    }
  }

  if (field !== "" || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}

describe("escapeCSVField", () => {
  it("leaves plain values alone", () => {
    expect(escapeCSVField("https://example.com/health")).toBe("https://example.com/health");
  });

  it("quotes values containing a comma", () => {
    expect(escapeCSVField("a,b")).toBe('"a,b"');
  });

  it("doubles embedded quotes", () => {
    expect(escapeCSVField('say "hi"')).toBe('"say ""hi"""');
  });

  it("quotes values containing line breaks", () => {
    expect(escapeCSVField("line1\nline2")).toBe('"line1\nline2"');
    expect(escapeCSVField("line1\r\nline2")).toBe('"line1\r\nline2"');
  });

  it("keeps the empty string empty", () => {
    expect(escapeCSVField("")).toBe("");
  });
});

describe("toCSV", () => {
  it("emits only the header when there are no rows", () => {
    expect(toCSV(["id", "status"], [])).toBe("id,status\r\n");
  });

  it("writes rows in the given order with CRLF line endings", () => {
    const csv = toCSV(
      ["id", "message"],
      [
        { id: "a1", message: "down" },
        { id: "a2", message: "x,y" },
      ]
    );

    expect(csv).toBe('id,message\r\na1,down\r\na2,"x,y"\r\n');
  });

  it("follows the column order, not the object key order", () => {
    expect(toCSV(["b", "a"], [{ a: "1", b: "2" }])).toBe("b,a\r\n2,1\r\n");
  });

  it("round-trips a field with a comma, a quote and a newline", () => {
    const message = 'Timeout, status "504"\nretrying from tokyo';
    const csv = toCSV(["id", "message"], [{ id: "a1", message }]);

    expect(parseCSV(csv)).toEqual([
      ["id", "message"],
      ["a1", message],
    ]);
  });
});
