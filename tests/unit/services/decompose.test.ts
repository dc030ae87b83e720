import { describe, it, expect } from "vitest";

import { decomposeSeriesId } from "../../../src/services/decompose.js";

describe("services/decompose", () => {
  describe("decomposeSeriesId", () => {
    it("should split a seasonally adjusted U.S. city average series", () => {
      expect(decomposeSeriesId("CUSR0000SA0")).toEqual({
        prefix: "CU",
        seasonal: "S",
        periodicity: "R",
        areaCode: "0000",
        itemCode: "SA0",
      });
    });

    it("should trim the padding the data files put after series ids", () => {
      expect(decomposeSeriesId("CUUR0100SAF      ").itemCode).toBe("SAF");
    });

    it("should keep longer item codes whole", () => {
      const key = decomposeSeriesId("CUUS0200SEHA01");
      expect(key.areaCode).toBe("0200");
      expect(key.itemCode).toBe("SEHA01");
    });

    it("should rebuild the first eight characters from the fixed parts", () => {
      const ids = ["CUSR0000SA0", "CUUR0100SAF", "CWUR0000SA0L1E", "ABCDEFGH"];

      for (const id of ids) {
        const key = decomposeSeriesId(id);
        expect(key.prefix).toHaveLength(2);
        expect(key.seasonal).toHaveLength(1);
        expect(key.periodicity).toHaveLength(1);
        expect(key.areaCode).toHaveLength(4);
        expect(
          key.prefix + key.seasonal + key.periodicity + key.areaCode
        ).toBe(id.slice(0, 8));
        expect(key.itemCode).toBe(id.slice(8).trim());
      }
    });

    it("should return an empty item code for an eight character id", () => {
      expect(decomposeSeriesId("ABCDEFGH").itemCode).toBe("");
    });

    it("should not validate short ids", () => {
      expect(decomposeSeriesId("CUS")).toEqual({
        prefix: "CU",
        seasonal: "S",
        periodicity: "",
        areaCode: "",
        itemCode: "",
      });
    });
  });
});
