import type { SeriesKey } from "../types/index.js";

/**
 * Split a CPI series id into its fixed-offset parts.
 *
 *   CUSR0000SA0  ->  CU | S | R | 0000 | SA0
 *
 * Offsets are positional only; nothing is validated. Ids shorter than
 * eight characters yield short or empty parts.
 */
export function decomposeSeriesId(seriesId: string): SeriesKey {
  return {
    prefix: seriesId.slice(0, 2),
    seasonal: seriesId.slice(2, 3),
    periodicity: seriesId.slice(3, 4),
    areaCode: seriesId.slice(4, 8),
    itemCode: seriesId.slice(8).trim(),
  };
}
