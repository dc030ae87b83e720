import { describe, it, expect } from "vitest";

import { ParseError } from "../../../src/errors.js";
import { parseDelimited, splitLines } from "../../../src/parser/delimited.js";
import { DATA_FILE } from "../../fixtures/cpi.js";

describe("parser/delimited", () => {
  describe("parseDelimited", () => {
    it("should trim header tokens and field values", () => {
      const result = parseDelimited(DATA_FILE);

      expect(result.ok).toBe(true);
      if (!result.ok) return;

      expect(result.value.columns).toEqual([
        "series_id",
        "year",
        "period",
        "value",
        "footnote_codes",
      ]);
      expect(result.value.rows).toHaveLength(3);
      expect(result.value.rows[0]).toEqual({
        series_id: "CUSR0000SA0",
        year: "2023",
        period: "M01",
        value: "300.100",
        footnote_codes: "",
      });
      expect(result.value.rows[2]?.footnote_codes).toBe("P");
    });

    it("should use the given delimiter", () => {
      const result = parseDelimited("a,b\n1,2\n", ",");

      expect(result.ok && result.value.rows).toEqual([{ a: "1", b: "2" }]);
    });

    it("should accept CRLF line endings", () => {
      const result = parseDelimited("a\tb\r\n1\t2\r\n");

      expect(result.ok && result.value.rows).toEqual([{ a: "1", b: "2" }]);
    });

    it("should skip lines holding only whitespace", () => {
      const result = parseDelimited("a\tb\n1\t2\n   \n \t \n3\t4\n");

      expect(result.ok && result.value.rows).toEqual([
        { a: "1", b: "2" },
        { a: "3", b: "4" },
      ]);
    });

    it("should return no rows for a header-only file", () => {
      const result = parseDelimited("a\tb\n");

      expect(result.ok && result.value).toEqual({ columns: ["a", "b"], rows: [] });
    });

    it("should fail on empty input", () => {
      const result = parseDelimited("  \n ");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(ParseError);
      expect(result.error.message).toBe("Input is empty");
    });

    it("should fail when a row is wider than the header", () => {
      const result = parseDelimited("a\tb\n1\t2\t3\n", "\t", "cu.test");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(ParseError);
      expect(result.error.source).toBe("cu.test");
    });
  });

  describe("splitLines", () => {
    it("should trim the header but leave fields untouched", () => {
      const result = splitLines("code \t name\n01\t Padded \n");

      expect(result.ok && result.value).toEqual({
        header: ["code", "name"],
        rows: [{ line: 2, fields: ["01", " Padded"] }],
      });
    });

    it("should skip blank lines and keep source line numbers", () => {
      const result = splitLines("h1\th2\n\na\tb\r\nc\td\n");

      expect(result.ok && result.value.rows).toEqual([
        { line: 3, fields: ["a", "b"] },
        { line: 4, fields: ["c", "d"] },
      ]);
    });

    it("should fail on empty input", () => {
      const result = splitLines("\n\n");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(ParseError);
    });
  });
});
