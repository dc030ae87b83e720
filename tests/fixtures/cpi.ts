/**
 * CPI-U flat file fixtures for testing
 *
 * Same layout as the BLS files (tab separated, padded data columns),
 * with made-up values.
 */

export const BASE_URL = "https://example.test/pub/time.series/cu/";

export const AREA_FILE = [
  "area_code\tarea_name\tdisplay_level\tselectable\tsort_sequence",
  "0000\tU.S. city average\t0\tT\t1",
  "0100\tNortheast\t0\tT\t5",
].join("\n");

export const PERIOD_FILE = [
  "period\tperiod_abbr\tperiod_name",
  "M01\tJAN\tJanuary",
  "M02\tFEB\tFebruary",
  "M13\tAN AV\tAnnual Average",
].join("\n");

export const ITEM_FILE = [
  "item_code\titem_name\tdisplay_level\tselectable\tsort_sequence",
  "SA0\tAll items\t0\tT\t2",
  "SAF\tFood and beverages\t1\tT\t3",
].join("\n");

export const DATA_FILE = [
  "series_id        \tyear\tperiod\t       value\tfootnote_codes",
  "CUSR0000SA0      \t2023\tM01\t     300.100\t",
  "CUSR0000SA0      \t2023\tM02\t     301.200\t",
  "CUUR0100SAF      \t2023\tM01\t     280.500\tP",
  "",
].join("\n");

/** Observation whose area code is not in AREA_FILE */
export const DATA_FILE_UNKNOWN_AREA = [
  "series_id        \tyear\tperiod\t       value\tfootnote_codes",
  "CUSR0000SA0      \t2023\tM01\t     300.100\t",
  "CUUR9999SA0      \t2023\tM01\t     111.000\t",
  "",
].join("\n");

export const FILES: Record<string, string> = {
  [`${BASE_URL}cu.area`]: AREA_FILE,
  [`${BASE_URL}cu.period`]: PERIOD_FILE,
  [`${BASE_URL}cu.item`]: ITEM_FILE,
  [`${BASE_URL}cu.data.0.Current`]: DATA_FILE,
};
