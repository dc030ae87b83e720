/**
 * Delimited text parsing for the BLS flat files.
 *
 * The files are tab separated, carry a header line and never quote fields.
 * Header tokens and values are padded with spaces in some files
 * (cu.data.*), so both are trimmed on the typed path.
 */

import { parse } from "csv-parse/sync";

import { ParseError, err, ok, type Result } from "../errors.js";

import type { ParsedTable, RawTable } from "../types/index.js";

export const DEFAULT_DELIMITER = "\t";

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === "object" &&
    value !== null &&
    Object.values(value).every((field) => typeof field === "string")
  );
}

/**
 * Parse delimited text into rows keyed by the trimmed header tokens.
 *
 * Fails on empty input, a blank header, or any row whose field count
 * differs from the header.
 */
export function parseDelimited(
  text: string,
  delimiter: string = DEFAULT_DELIMITER,
  source = "<text>"
): Result<ParsedTable, ParseError> {
  if (text.trim() === "") {
    return err(new ParseError("Input is empty", source));
  }

  let columns: string[] = [];
  let records: unknown;

  // skip_empty_lines only drops zero-length lines
  const body = text
    .split("\n")
    .filter((line) => line.trim() !== "")
    .join("\n");

  try {
    records = parse(body, {
      delimiter,
      quote: false,
      skip_empty_lines: true,
      columns: (header: string[]) => {
        columns = header.map((name) => name.trim());
        return columns;
      },
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(new ParseError(`Could not parse ${source}: ${message}`, source));
  }

  if (columns.length === 0 || columns.every((name) => name === "")) {
    return err(new ParseError("Header line is blank", source));
  }

  if (!Array.isArray(records)) {
    return err(new ParseError(`Unexpected parse result for ${source}`, source));
  }

  const rows: Record<string, string>[] = [];
  for (const record of records) {
    if (!isStringRecord(record)) {
      return err(new ParseError(`Non-text record in ${source}`, source));
    }
    const row: Record<string, string> = {};
    for (const [key, value] of Object.entries(record)) {
      row[key] = value.trim();
    }
    rows.push(row);
  }

  return ok({ columns, rows });
}

/**
 * Split text into a trimmed header and untyped field lists, one per
 * non-blank line. Used for dimension files, which are inserted as-is.
 */
export function splitLines(
  text: string,
  delimiter: string = DEFAULT_DELIMITER,
  source = "<text>"
): Result<RawTable, ParseError> {
  const lines = text
    .trim()
    .split("\n")
    .map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));

  const [headerLine, ...body] = lines;
  if (headerLine === undefined || headerLine.trim() === "") {
    return err(new ParseError("Input is empty", source));
  }

  const header = headerLine.split(delimiter).map((name) => name.trim());

  const rows: RawTable["rows"] = [];
  body.forEach((line, index) => {
    if (line.trim() === "") {
      return;
    }
    // header is line 1
    rows.push({ line: index + 2, fields: line.split(delimiter) });
  });

  return ok({ header, rows });
}
