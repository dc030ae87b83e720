import type { PipelineError, Result, TransportError } from "../errors.js";

// ============================================================================
// Source Files
// ============================================================================

/** One raw CPI-U file, fetched as text */
export type TextFetcher = (
  url: string
) => Promise<Result<string, TransportError>>;

export interface ParsedTable {
  /** Header tokens, whitespace trimmed */
  columns: string[];
  /** Rows keyed by column name, field values trimmed */
  rows: Record<string, string>[];
}

export interface RawTable {
  header: string[];
  /** Fields exactly as split from each line, with the 1-based line number */
  rows: { line: number; fields: string[] }[];
}

// ============================================================================
// Series Identifiers
// ============================================================================

/**
 * Sub-fields of a CPI series id, e.g. "CUSR0000SA0":
 * CU / S / R / 0000 / SA0
 */
export interface SeriesKey {
  prefix: string;
  seasonal: string;
  periodicity: string;
  areaCode: string;
  itemCode: string;
}

// ============================================================================
// Pipeline
// ============================================================================

export type StepName = "schema" | "areas" | "periods" | "items" | "data" | "view";

export type StepOutcome =
  | { step: StepName; ok: true; rows: number; skipped?: number }
  | { step: StepName; ok: false; error: PipelineError };

export interface OrphanReport {
  /** Observations whose area_code has no row in areas */
  areas: number;
  /** Observations whose item_code has no row in items */
  items: number;
  /** Observations whose period has no row in periods */
  periods: number;
}

export interface RunSummary {
  startedAt: Date;
  durationMs: number;
  steps: StepOutcome[];
  failed: number;
  orphans: OrphanReport | null;
}
