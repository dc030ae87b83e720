
// ============================================================================
// Table Types
// ============================================================================

export interface AreasTable {
  area_code: string;
  area_name: string | null;
  display_level: number | null;
  selectable: string | null; // "T" / "F"
  sort_sequence: number | null;
}

export interface ItemsTable {
  item_code: string;
  item_name: string | null;
  display_level: number | null;
  selectable: string | null; // "T" / "F"
  sort_sequence: number | null;
}

export interface PeriodsTable {
  period: string;
  period_abbr: string | null;
  period_name: string | null;
}

export interface DataTable {
  id: number;
  series_id: string;
  prefix: string;
  seasonal: string;
  periodicity: string;
  area_code: string; // advisory FK -> areas
  item_code: string; // advisory FK -> items
  year: number;
  period: string; // advisory FK -> periods
  value: number | null;
  footnote_codes: string | null;
}

/** Read-only; dropped and recreated on every update run */
export interface DataView {
  series_id: string;
  area_code: string;
  area_name: string | null;
  item_code: string;
  item_name: string | null;
  year: number;
  period: string;
  period_name: string | null;
  value: number | null;
}

// ============================================================================
// Database Interface
// ============================================================================

export interface Database {
  areas: AreasTable;
  items: ItemsTable;
  periods: PeriodsTable;
  data: DataTable;
  data_view: DataView;
}

export type DimensionTable = "areas" | "items" | "periods";

/** Column order of each dimension table, as declared in the DDL */
export const DIMENSION_COLUMNS = {
  areas: [
    "area_code",
    "area_name",
    "display_level",
    "selectable",
    "sort_sequence",
  ],
  items: [
    "item_code",
    "item_name",
    "display_level",
    "selectable",
    "sort_sequence",
  ],
  periods: ["period", "period_abbr", "period_name"],
} as const satisfies {
  [T in DimensionTable]: readonly (keyof Database[T] & string)[];
};

export type ObservationColumn = keyof DataTable & string;

/** Column order of the data table, as declared in the DDL */
export const DATA_COLUMNS: readonly ObservationColumn[] = [
  "id",
  "series_id",
  "prefix",
  "seasonal",
  "periodicity",
  "area_code",
  "item_code",
  "year",
  "period",
  "value",
  "footnote_codes",
];

export const VIEW_NAME = "data_view";
