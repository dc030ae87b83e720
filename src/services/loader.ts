/**
 * Loader - moves fetched CPI-U files into the SQLite tables
 *
 * Dimension files are inserted as raw strings under their header names.
 * The data file is parsed, its series ids decomposed into dimension keys,
 * and its values reordered to the requested column order.
 *
 * Both paths insert with ON CONFLICT DO NOTHING inside one transaction per
 * call, so re-running a load never fails on keys that are already present
 * and a failing batch leaves the table untouched.
 */

import { sql, type Kysely } from "kysely";

import {
  MalformedRowError,
  ParseError,
  err,
  ok,
  toPipelineError,
  type Result,
} from "../errors.js";
import { pipelineLogger } from "../logger.js";
import {
  DEFAULT_DELIMITER,
  parseDelimited,
  splitLines,
} from "../parser/delimited.js";
import { decomposeSeriesId } from "./decompose.js";
import {
  DATA_COLUMNS,
  DIMENSION_COLUMNS,
  type DataTable,
  type Database,
  type DimensionTable,
  type ObservationColumn,
} from "../db/schema.js";

import type { StepOutcome, TextFetcher } from "../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface DimensionSource {
  url: string;
  table: DimensionTable;
  delimiter?: string;
}

export interface ObservationSource {
  url: string;
  table: "data";
  /** Order in which values are bound; defaults to the DDL column order */
  columnOrder?: readonly ObservationColumn[];
  delimiter?: string;
}

// Well under SQLite's bound-parameter limit for the widest table (11 columns)
const ROWS_PER_CHUNK = 500;

const DECIMAL = /^[-+]?(\d+(\.\d*)?|\.\d+)$/;

const REQUIRED_DATA_FIELDS = ["series_id", "year", "period", "value"] as const;

// ============================================================================
// Bulk Insert
// ============================================================================

/**
 * Insert rows positionally into `table`, ignoring rows that hit a
 * uniqueness constraint. Returns the number of rows actually inserted.
 */
export async function bulkInsertOrIgnore(
  db: Kysely<Database>,
  table: string,
  columns: readonly string[],
  rows: readonly (readonly unknown[])[]
): Promise<number> {
  let inserted = 0;

  for (let start = 0; start < rows.length; start += ROWS_PER_CHUNK) {
    const chunk = rows.slice(start, start + ROWS_PER_CHUNK);
    const result = await sql`
      INSERT INTO ${sql.table(table)} (${sql.join(columns.map((c) => sql.ref(c)))})
      VALUES ${sql.join(chunk.map((row) => sql`(${sql.join(row)})`))}
      ON CONFLICT DO NOTHING
    `.execute(db);
    inserted += Number(result.numAffectedRows ?? 0n);
  }

  return inserted;
}

// ============================================================================
// Dimension Tables
// ============================================================================

function validateDimensionHeader(
  header: string[],
  table: DimensionTable,
  source: string
): ParseError | null {
  const known: readonly string[] = DIMENSION_COLUMNS[table];

  if (header.length > known.length) {
    return new ParseError(
      `Header has ${String(header.length)} columns but ${table} has ${String(known.length)}`,
      source
    );
  }

  const unexpected = header.filter((name) => !known.includes(name));
  if (unexpected.length > 0) {
    return new ParseError(
      `Header names columns not in ${table}: ${unexpected.join(", ")}`,
      source
    );
  }

  return null;
}

/**
 * Fetch a dimension file and insert-or-ignore every row into its table.
 */
export async function loadDimension(
  db: Kysely<Database>,
  source: DimensionSource,
  fetcher: TextFetcher
): Promise<StepOutcome> {
  const { url, table } = source;
  const delimiter = source.delimiter ?? DEFAULT_DELIMITER;
  const log = pipelineLogger.child({ table, url });

  const fetched = await fetcher(url);
  if (!fetched.ok) {
    log.error(
      { error: fetched.error.message },
      "Unable to read the source file"
    );
    return { step: table, ok: false, error: fetched.error };
  }

  const split = splitLines(fetched.value, delimiter, url);
  if (!split.ok) {
    log.error(
      { error: split.error.message },
      "Unable to parse the source file"
    );
    return { step: table, ok: false, error: split.error };
  }

  const { header, rows } = split.value;

  const headerError = validateDimensionHeader(header, table, url);
  if (headerError !== null) {
    log.error({ header, error: headerError.message }, "Unexpected header");
    return { step: table, ok: false, error: headerError };
  }

  const malformed = rows.find((row) => row.fields.length !== header.length);
  if (malformed !== undefined) {
    const error = new MalformedRowError(
      url,
      malformed.line,
      header.length,
      malformed.fields.length
    );
    log.error({ error: error.message }, "Rejected batch with malformed row");
    return { step: table, ok: false, error };
  }

  try {
    const inserted = await db
      .transaction()
      .execute((trx) =>
        bulkInsertOrIgnore(
          trx,
          table,
          header,
          rows.map((row) => row.fields)
        )
      );

    log.info(
      { inserted, total: rows.length },
      `Inserted ${String(inserted)} records to the table`
    );
    return {
      step: table,
      ok: true,
      rows: inserted,
      skipped: rows.length - inserted,
    };
  } catch (error) {
    const mapped = toPipelineError(error, table);
    log.error({ error: mapped.message }, "Dimension insert failed");
    return { step: table, ok: false, error: mapped };
  }
}

// ============================================================================
// Fact Table
// ============================================================================

function parseValue(raw: string): number | null | undefined {
  // BLS marks unavailable values with "-" or leaves them blank
  if (raw === "" || raw === "-") {
    return null;
  }
  return DECIMAL.test(raw) ? Number(raw) : undefined;
}

/**
 * Build one observation from a parsed data-file row.
 */
export function toObservation(
  row: Record<string, string>,
  id: number,
  source = "<text>"
): Result<DataTable, ParseError> {
  const seriesId = row.series_id ?? "";
  const period = row.period ?? "";
  const rawYear = row.year ?? "";
  const rawValue = row.value ?? "";

  const year = /^-?\d+$/.test(rawYear) ? Number.parseInt(rawYear, 10) : NaN;
  if (Number.isNaN(year)) {
    return err(
      new ParseError(`Invalid year "${rawYear}" for ${seriesId}`, source)
    );
  }

  const value = parseValue(rawValue);
  if (value === undefined) {
    return err(
      new ParseError(`Invalid value "${rawValue}" for ${seriesId}`, source)
    );
  }

  const key = decomposeSeriesId(seriesId);
  const footnotes = row.footnote_codes ?? "";

  return ok({
    id,
    series_id: seriesId,
    prefix: key.prefix,
    seasonal: key.seasonal,
    periodicity: key.periodicity,
    area_code: key.areaCode,
    item_code: key.itemCode,
    year,
    period,
    value,
    footnote_codes: footnotes === "" ? null : footnotes,
  });
}

/**
 * Values of an observation in the given column order
 */
export function arrangeColumns(
  observation: DataTable,
  columnOrder: readonly ObservationColumn[]
): (string | number | null)[] {
  return columnOrder.map((column) => observation[column]);
}

async function currentMaxId(db: Kysely<Database>): Promise<number> {
  const row = await db
    .selectFrom("data")
    .select((eb) => eb.fn.max<number | null>("id").as("max_id"))
    .executeTakeFirst();
  return row?.max_id ?? 0;
}

/**
 * Fetch the data file, decompose its series ids and append the rows.
 *
 * Surrogate ids are 1-based in source order, offset by the highest id
 * already stored. Rows repeating a stored (series_id, year, period) are
 * skipped.
 */
export async function loadObservations(
  db: Kysely<Database>,
  source: ObservationSource,
  fetcher: TextFetcher
): Promise<StepOutcome> {
  const { url, table } = source;
  const delimiter = source.delimiter ?? DEFAULT_DELIMITER;
  const columnOrder = source.columnOrder ?? DATA_COLUMNS;
  const log = pipelineLogger.child({ table, url });

  const fetched = await fetcher(url);
  if (!fetched.ok) {
    log.error(
      { error: fetched.error.message },
      "Unable to read the source file"
    );
    return { step: table, ok: false, error: fetched.error };
  }

  const parsed = parseDelimited(fetched.value, delimiter, url);
  if (!parsed.ok) {
    log.error(
      { error: parsed.error.message },
      "Unable to parse the source file"
    );
    return { step: table, ok: false, error: parsed.error };
  }

  const missing = REQUIRED_DATA_FIELDS.filter(
    (name) => !parsed.value.columns.includes(name)
  );
  if (missing.length > 0) {
    const error = new ParseError(
      `Data file is missing columns: ${missing.join(", ")}`,
      url
    );
    log.error({ columns: parsed.value.columns }, error.message);
    return { step: table, ok: false, error };
  }

  try {
    const result = await db.transaction().execute(async (trx) => {
      const baseId = await currentMaxId(trx);
      const values: (string | number | null)[][] = [];

      for (const [index, row] of parsed.value.rows.entries()) {
        const observation = toObservation(row, baseId + index + 1, url);
        if (!observation.ok) {
          throw observation.error;
        }
        values.push(arrangeColumns(observation.value, columnOrder));
      }

      const inserted = await bulkInsertOrIgnore(
        trx,
        table,
        columnOrder,
        values
      );
      return { inserted, total: values.length };
    });

    log.info(
      { inserted: result.inserted, total: result.total },
      `Inserted ${String(result.inserted)} records to the table`
    );
    return {
      step: table,
      ok: true,
      rows: result.inserted,
      skipped: result.total - result.inserted,
    };
  } catch (error) {
    const mapped = toPipelineError(error, table);
    log.error({ error: mapped.message }, "Observation insert failed");
    return { step: table, ok: false, error: mapped };
  }
}
