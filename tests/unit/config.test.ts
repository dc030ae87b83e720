import { describe, it, expect } from "vitest";

import {
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_SOURCE_BASE_URL,
  DEFAULT_USER_AGENT,
  loadConfig,
} from "../../src/config.js";
import { ConfigurationError } from "../../src/errors.js";

describe("config", () => {
  describe("loadConfig", () => {
    it("should apply defaults when only DATABASE_URL is set", () => {
      expect(loadConfig({ DATABASE_URL: "./data/cpi-u.db" })).toEqual({
        databasePath: "./data/cpi-u.db",
        sourceBaseUrl: DEFAULT_SOURCE_BASE_URL,
        fetchTimeoutMs: DEFAULT_FETCH_TIMEOUT_MS,
        userAgent: DEFAULT_USER_AGENT,
      });
    });

    it("should read overrides", () => {
      const config = loadConfig({
        DATABASE_URL: "cpi.db",
        CPI_SOURCE_BASE_URL: "https://mirror.example.test/cu",
        CPI_FETCH_TIMEOUT_MS: "1500",
        CPI_USER_AGENT: "test-agent/1.0",
      });

      expect(config.sourceBaseUrl).toBe("https://mirror.example.test/cu/");
      expect(config.fetchTimeoutMs).toBe(1500);
      expect(config.userAgent).toBe("test-agent/1.0");
    });

    it("should ignore unrelated variables", () => {
      expect(
        loadConfig({ DATABASE_URL: "cpi.db", HOME: "/root" }).databasePath
      ).toBe("cpi.db");
    });

    it("should throw a ConfigurationError when DATABASE_URL is missing", () => {
      expect(() => loadConfig({})).toThrow(ConfigurationError);
      expect(() => loadConfig({ DATABASE_URL: "" })).toThrow(
        "DATABASE_URL is not set; point it at the SQLite file to update"
      );
    });

    it("should name the invalid variable", () => {
      expect(() =>
        loadConfig({ DATABASE_URL: "cpi.db", CPI_FETCH_TIMEOUT_MS: "soon" })
      ).toThrow(/CPI_FETCH_TIMEOUT_MS/);
    });
  });
});
