/**
 * Tests for .pyperfscan.yml loading.
 */

import * as path from "path";
import {
  createDefaultConfig,
  loadConfig,
  loadConfigFile,
  loadConfigFromString,
} from "../src/config/loader";
import { DEFAULT_CATALOG, getAsyncAlternative, isBlockingIo } from "../src/catalog";
import { DEFAULT_RULE_CONFIG } from "../src/checker/rules";
import { UsageError } from "../src/errors";

const FIXTURES_DIR = path.join(__dirname, "fixtures/config");

describe(".pyperfscan.yml", () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  describe("Config Loading", () => {
    describe("loadConfig", () => {
      it("should load config from .pyperfscan.yml file", () => {
        const config = loadConfig(FIXTURES_DIR);

        expect(config.raw.version).toBe(1);
        expect(config.raw.rules?.["exception-in-loop"]?.enabled).toBe(true);
        expect(config.raw.rules?.["memory-load"]?.severity).toBe("low");
      });

      it("should drop unknown rules with a warning", () => {
        const config = loadConfig(FIXTURES_DIR);

        expect(Object.keys(config.raw.rules ?? {})).toEqual(["exception-in-loop", "memory-load"]);
        expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining("Ignoring unknown rule"));
      });

      it("should return defaults when no config file exists", () => {
        const config = loadConfig("/nonexistent/path");

        expect(config.raw.version).toBe(1);
        expect(config.catalog).toBe(DEFAULT_CATALOG);
        expect(config.getRuleConfig("global-mutation")).toEqual({ enabled: false, severity: "medium" });
      });

      it("should merge defaults with config file values", () => {
        const config = loadConfig(FIXTURES_DIR);

        expect(config.getRuleConfig("memory-load")).toEqual({ enabled: true, severity: "low" });
        expect(config.getRuleConfig("exception-in-loop")).toEqual({ enabled: true, severity: "medium" });
        expect(config.getRuleConfig("blocking-io-in-async")).toEqual(DEFAULT_RULE_CONFIG["blocking-io-in-async"]);
      });
    });

    describe("loadConfigFile", () => {
      it("should load an explicitly named file", () => {
        const config = loadConfigFile(path.join(FIXTURES_DIR, ".pyperfscan.yml"));

        expect(config.isFileIgnored("migrations/0001_initial.py")).toBe(true);
      });

      it("should throw a usage error for a missing file", () => {
        const missing = path.join(FIXTURES_DIR, "missing.yml");

        expect(() => loadConfigFile(missing)).toThrow(UsageError);
        expect(() => loadConfigFile(missing)).toThrow(`Config file not found: ${missing}`);
      });
    });

    describe("createDefaultConfig", () => {
      it("should return default configuration", () => {
        const config = createDefaultConfig();

        expect(config.raw.version).toBe(1);
        expect(config.raw.overrides).toEqual([]);
        expect(config.getRuleConfig("repeated-query-in-loop")).toEqual({ enabled: true, severity: "high" });
      });
    });

    describe("loadConfigFromString", () => {
      it("should parse YAML config string", () => {
        const yaml = `
version: 1
rules:
  inefficient-loop:
    enabled: false
  blocking-io-in-async:
    severity: high
`;
        const config = loadConfigFromString(yaml);

        expect(config.getRuleConfig("inefficient-loop").enabled).toBe(false);
        expect(config.getRuleConfig("blocking-io-in-async")).toEqual({ enabled: true, severity: "high" });
      });

      it("should ignore invalid rule fields", () => {
        const yaml = `
rules:
  memory-load:
    enabled: "yes"
    severity: extreme
`;
        const config = loadConfigFromString(yaml);

        expect(config.getRuleConfig("memory-load")).toEqual({ enabled: true, severity: "medium" });
        expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining("Ignoring unknown severity"));
      });

      it("should fall back to defaults on invalid YAML", () => {
        const config = loadConfigFromString("rules: [unclosed");

        expect(config.raw.rules).toEqual({});
        expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining("Failed to parse config, using defaults"));
      });

      it("should fall back to defaults when the document is not a mapping", () => {
        const config = loadConfigFromString("- one\n- two\n");

        expect(config.raw.version).toBe(1);
        expect(config.raw.rules).toEqual({});
      });

      it("should treat an empty document as defaults", () => {
        const config = loadConfigFromString("");

        expect(config.getRuleConfig("inefficient-loop")).toEqual({ enabled: true, severity: "medium" });
        expect(errorSpy).not.toHaveBeenCalled();
      });
    });
  });

  describe("File Filtering", () => {
    describe("isFileIgnored", () => {
      it("should match ignore patterns", () => {
        const config = loadConfig(FIXTURES_DIR);

        expect(config.isFileIgnored("migrations/0001_initial.py")).toBe(true);
        expect(config.isFileIgnored("app/models.py")).toBe(false);
      });

      it("should normalize Windows separators", () => {
        const config = loadConfig(FIXTURES_DIR);

        expect(config.isFileIgnored("migrations\\0002_users.py")).toBe(true);
      });

      it("should work with default config (no ignores)", () => {
        const config = createDefaultConfig();

        expect(config.isFileIgnored("migrations/0001_initial.py")).toBe(false);
      });
    });
  });

  describe("Rule Configuration", () => {
    it("should apply path-specific overrides", () => {
      const config = loadConfig(FIXTURES_DIR);

      expect(config.getRuleConfig("repeated-query-in-loop", "scripts/seed.py").enabled).toBe(false);
      expect(config.getRuleConfig("repeated-query-in-loop", "app/views.py").enabled).toBe(true);
      expect(config.getRuleConfig("repeated-query-in-loop").enabled).toBe(true);
    });

    it("should apply later overrides last", () => {
      const yaml = `
overrides:
  - patterns: ["jobs/**"]
    rules:
      memory-load:
        severity: low
  - patterns: ["jobs/nightly/**"]
    rules:
      memory-load:
        severity: critical
`;
      const config = loadConfigFromString(yaml);

      expect(config.getRuleConfig("memory-load", "jobs/nightly/export.py").severity).toBe("critical");
      expect(config.getRuleConfig("memory-load", "jobs/hourly.py").severity).toBe("low");
    });
  });

  describe("Catalog Extension", () => {
    it("should add catalog entries from the config file", () => {
      const config = loadConfig(FIXTURES_DIR);

      expect(isBlockingIo("client.fetch_sync", undefined, config.catalog)).toBe(true);
      expect(getAsyncAlternative("client.fetch_sync", undefined, config.catalog)).toBe("client.fetch");
    });

    it("should skip invalid catalog entries", () => {
      const config = loadConfig(FIXTURES_DIR);

      expect(config.catalog.ormQueries).toEqual(DEFAULT_CATALOG.ormQueries);
      expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining("Skipping invalid catalog entry"));
    });
  });
});
