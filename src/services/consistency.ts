import { pipelineLogger } from "../logger.js";

import type { Database } from "../db/schema.js";
import type { OrphanReport } from "../types/index.js";
import type { Kysely } from "kysely";

/**
 * Count observations whose dimension keys have no matching dimension row.
 *
 * Foreign keys are not enforced on write, so this is the only place
 * referential integrity is looked at. Non-zero counts are warnings.
 */
export async function checkReferences(
  db: Kysely<Database>
): Promise<OrphanReport> {
  const row = await db
    .selectFrom("data as d")
    .leftJoin("areas as a", "a.area_code", "d.area_code")
    .leftJoin("items as i", "i.item_code", "d.item_code")
    .leftJoin("periods as p", "p.period", "d.period")
    .select((eb) => [
      eb.fn
        .count<number>("d.id")
        .filterWhere("a.area_code", "is", null)
        .as("areas"),
      eb.fn
        .count<number>("d.id")
        .filterWhere("i.item_code", "is", null)
        .as("items"),
      eb.fn
        .count<number>("d.id")
        .filterWhere("p.period", "is", null)
        .as("periods"),
    ])
    .executeTakeFirstOrThrow();

  const report: OrphanReport = {
    areas: row.areas,
    items: row.items,
    periods: row.periods,
  };

  if (report.areas > 0 || report.items > 0 || report.periods > 0) {
    pipelineLogger.warn(
      { orphans: report },
      "Observations reference codes missing from dimension tables"
    );
  }

  return report;
}
