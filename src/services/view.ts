import {
  SchemaError,
  err,
  ok,
  toPipelineError,
  type Result,
} from "../errors.js";
import { dbLogger } from "../logger.js";
import { VIEW_NAME, type Database } from "../db/schema.js";

import type { Kysely } from "kysely";

/**
 * Drop and recreate data_view, then count its rows.
 *
 * Every join is a left join so observations whose codes have no dimension
 * row still show up, with null names. Run after all loads of a cycle: the
 * view reads whatever the tables hold at query time.
 */
export async function rebuildView(
  db: Kysely<Database>
): Promise<Result<number, SchemaError>> {
  try {
    const count = await db.transaction().execute(async (trx) => {
      await trx.schema.dropView(VIEW_NAME).ifExists().execute();

      await trx.schema
        .createView(VIEW_NAME)
        .as(
          trx
            .selectFrom("data as d")
            .leftJoin("areas as a", "a.area_code", "d.area_code")
            .leftJoin("items as i", "i.item_code", "d.item_code")
            .leftJoin("periods as p", "p.period", "d.period")
            .select([
              "d.series_id",
              "d.area_code",
              "a.area_name",
              "d.item_code",
              "i.item_name",
              "d.year",
              "d.period",
              "p.period_name",
              "d.value",
            ])
        )
        .execute();

      const row = await trx
        .selectFrom("data_view")
        .select((eb) => eb.fn.countAll<number>().as("count"))
        .executeTakeFirstOrThrow();
      return row.count;
    });

    dbLogger.info(
      { view: VIEW_NAME, rows: count },
      `Created view with ${String(count)} records`
    );
    return ok(count);
  } catch (error) {
    const mapped = toPipelineError(error, VIEW_NAME);
    const schemaError =
      mapped instanceof SchemaError
        ? mapped
        : new SchemaError(mapped.message, VIEW_NAME);
    dbLogger.error(
      { view: VIEW_NAME, error: schemaError.message },
      "Failed to rebuild view"
    );
    return err(schemaError);
  }
}
