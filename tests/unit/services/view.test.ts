import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { closeDatabase } from "../../../src/db/connection.js";
import { ensureSchema } from "../../../src/db/migrate.js";
import { SchemaError } from "../../../src/errors.js";
import { checkReferences } from "../../../src/services/consistency.js";
import {
  loadDimension,
  loadObservations,
} from "../../../src/services/loader.js";
import { rebuildView } from "../../../src/services/view.js";
import {
  AREA_FILE,
  DATA_FILE_UNKNOWN_AREA,
  ITEM_FILE,
  PERIOD_FILE,
} from "../../fixtures/cpi.js";
import { openMemoryDatabase } from "../../mocks/database.js";
import { createFakeFetcher } from "../../mocks/fetcher.js";

import type { Database } from "../../../src/db/schema.js";
import type { Kysely } from "kysely";

const fetcher = createFakeFetcher({
  "mem://cu.area": AREA_FILE,
  "mem://cu.item": ITEM_FILE,
  "mem://cu.period": PERIOD_FILE,
  "mem://cu.data": DATA_FILE_UNKNOWN_AREA,
});

async function loadAll(db: Kysely<Database>): Promise<void> {
  await loadDimension(db, { url: "mem://cu.area", table: "areas" }, fetcher);
  await loadDimension(db, { url: "mem://cu.item", table: "items" }, fetcher);
  await loadDimension(
    db,
    { url: "mem://cu.period", table: "periods" },
    fetcher
  );
  await loadObservations(db, { url: "mem://cu.data", table: "data" }, fetcher);
}

describe("services/view", () => {
  let db: Kysely<Database>;

  beforeEach(async () => {
    db = openMemoryDatabase();
    await ensureSchema(db);
  });

  afterEach(async () => {
    await closeDatabase(db);
  });

  describe("rebuildView", () => {
    it("should keep every observation, even with unknown codes", async () => {
      await loadAll(db);

      const result = await rebuildView(db);

      expect(result).toEqual({ ok: true, value: 2 });
      const rows = await db
        .selectFrom("data_view")
        .selectAll()
        .orderBy("area_code")
        .execute();
      expect(rows).toEqual([
        {
          series_id: "CUSR0000SA0",
          area_code: "0000",
          area_name: "U.S. city average",
          item_code: "SA0",
          item_name: "All items",
          year: 2023,
          period: "M01",
          period_name: "January",
          value: 300.1,
        },
        {
          series_id: "CUUR9999SA0",
          area_code: "9999",
          area_name: null,
          item_code: "SA0",
          item_name: "All items",
          year: 2023,
          period: "M01",
          period_name: "January",
          value: 111,
        },
      ]);
    });

    it("should reflect rows added since the last rebuild", async () => {
      expect(await rebuildView(db)).toEqual({ ok: true, value: 0 });

      await loadAll(db);

      expect(await rebuildView(db)).toEqual({ ok: true, value: 2 });
    });

    it("should fail with a SchemaError when the tables are missing", async () => {
      const bare = openMemoryDatabase();

      try {
        const result = await rebuildView(bare);

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error).toBeInstanceOf(SchemaError);
        expect(result.error.target).toBe("data_view");
      } finally {
        await closeDatabase(bare);
      }
    });
  });

  describe("checkReferences", () => {
    it("should count observations with unknown codes", async () => {
      await loadAll(db);

      expect(await checkReferences(db)).toEqual({
        areas: 1,
        items: 0,
        periods: 0,
      });
    });

    it("should count every observation when no dimensions are loaded", async () => {
      await loadObservations(
        db,
        { url: "mem://cu.data", table: "data" },
        fetcher
      );

      expect(await checkReferences(db)).toEqual({
        areas: 2,
        items: 2,
        periods: 2,
      });
    });
  });
});
