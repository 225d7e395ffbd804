/**
 * Unit tests for configuration loader
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { loadFormatter, loadFormatterConfig } from "../../src/config/loader.js";
import { STANDARD_FIELDS } from "../../src/formatter/types.js";

describe("loadFormatterConfig", () => {
  let dir: string;
  let savedIndent: string | undefined;

  beforeEach(() => {
    dir = join(tmpdir(), "record-formatter-test-" + Date.now() + "-" + Math.random().toString(36).slice(2));
    mkdirSync(dir, { recursive: true });
    savedIndent = process.env.LOG_JSON_INDENT;
    delete process.env.LOG_JSON_INDENT;
    delete process.env.TEST_TIMESTAMP_KEY;
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    if (savedIndent === undefined) {
      delete process.env.LOG_JSON_INDENT;
    } else {
      process.env.LOG_JSON_INDENT = savedIndent;
    }
    delete process.env.TEST_TIMESTAMP_KEY;
  });

  function writeConfig(content: string): string {
    const path = join(dir, "log-format.yml");
    writeFileSync(path, content);
    return path;
  }

  describe("defaults", () => {
    it("uses defaults when no config file exists", async () => {
      const { config, warnings } = await loadFormatterConfig("/nonexistent/path/log-format.yml");

      expect(config.fields).toEqual([...STANDARD_FIELDS]);
      expect(config.jsonIndent).toBeUndefined();
      expect(config.timestampKey).toBe("timestamp");
      expect(config.ensureAscii).toBe(false);
      expect(warnings).toEqual([]);
    });

    it("uses defaults for an empty file", async () => {
      const { config } = await loadFormatterConfig(writeConfig(""));

      expect(config.fields).toEqual([...STANDARD_FIELDS]);
    });
  });

  describe("file values", () => {
    it("reads every option", async () => {
      const path = writeConfig(
        ["fields: [timestamp, level, message]", "json_indent: 2", "timestamp_key: ts", "ensure_ascii: true"].join("\n")
      );

      const { config, warnings } = await loadFormatterConfig(path);

      expect(config).toEqual({
        fields: ["timestamp", "level", "message"],
        jsonIndent: 2,
        timestampKey: "ts",
        ensureAscii: true,
      });
      expect(warnings).toEqual([]);
    });

    it("warns about unknown field names", async () => {
      const { config, warnings } = await loadFormatterConfig(writeConfig("fields: [level, hostname]"));

      expect(config.fields).toEqual(["level", "hostname"]);
      expect(warnings).toEqual([
        'Unknown field "hostname" ignored. Must be one of: timestamp, level, logger, message, module, function, line',
      ]);
    });

    it("expands environment variables with defaults", async () => {
      const { config } = await loadFormatterConfig(writeConfig('timestamp_key: "${TEST_TIMESTAMP_KEY:-@timestamp}"'));

      expect(config.timestampKey).toBe("@timestamp");
    });

    it("expands environment variables that are set", async () => {
      process.env.TEST_TIMESTAMP_KEY = "time";

      const { config } = await loadFormatterConfig(writeConfig('timestamp_key: "${TEST_TIMESTAMP_KEY:-@timestamp}"'));

      expect(config.timestampKey).toBe("time");
    });

    it("lets LOG_JSON_INDENT override the file", async () => {
      process.env.LOG_JSON_INDENT = "4";

      const { config } = await loadFormatterConfig(writeConfig("json_indent: 2"));

      expect(config.jsonIndent).toBe(4);
    });

    it("accepts a quoted indent", async () => {
      const { config } = await loadFormatterConfig(writeConfig('json_indent: "3"'));

      expect(config.jsonIndent).toBe(3);
    });
  });

  describe("validation", () => {
    it("rejects a negative indent", async () => {
      await expect(loadFormatterConfig(writeConfig("json_indent: -1"))).rejects.toThrow(
        "Invalid json_indent: -1. Must be a non-negative integer."
      );
    });

    it("rejects a non-numeric LOG_JSON_INDENT", async () => {
      process.env.LOG_JSON_INDENT = "wide";

      await expect(loadFormatterConfig("/nonexistent/path/log-format.yml")).rejects.toThrow(
        "Invalid LOG_JSON_INDENT: wide. Must be a non-negative integer."
      );
    });

    it("rejects fields that are not a list", async () => {
      await expect(loadFormatterConfig(writeConfig("fields: level"))).rejects.toThrow(
        "Invalid fields: must be a list of field names, got string"
      );
    });

    it("rejects non-string field entries", async () => {
      await expect(loadFormatterConfig(writeConfig("fields: [level, 3]"))).rejects.toThrow(
        "Invalid field at index 1: must be a string"
      );
    });

    it("rejects an empty timestamp key", async () => {
      await expect(loadFormatterConfig(writeConfig('timestamp_key: ""'))).rejects.toThrow(
        "Invalid timestamp_key: must be a non-empty string."
      );
    });

    it("rejects a timestamp key that collides with another output field", async () => {
      await expect(loadFormatterConfig(writeConfig("timestamp_key: exception"))).rejects.toThrow(
        'Invalid timestamp_key: "exception" collides with another output field.'
      );
    });

    it("rejects a colliding timestamp key produced by expansion", async () => {
      process.env.TEST_TIMESTAMP_KEY = "level";

      await expect(loadFormatterConfig(writeConfig('timestamp_key: "${TEST_TIMESTAMP_KEY}"'))).rejects.toThrow(
        'Invalid timestamp_key: "level" collides with another output field.'
      );
    });

    it("rejects a non-boolean ensure_ascii", async () => {
      await expect(loadFormatterConfig(writeConfig("ensure_ascii: sometimes"))).rejects.toThrow(
        "Invalid ensure_ascii: sometimes. Must be true or false."
      );
    });

    it("reports unparseable YAML", async () => {
      const path = writeConfig("fields: [level, message");

      await expect(loadFormatterConfig(path)).rejects.toThrow(`Failed to parse config file at ${path}`);
    });
  });
});

describe("loadFormatter", () => {
  it("builds a formatter from the file", async () => {
    const dir = join(tmpdir(), "record-formatter-build-" + Date.now());
    mkdirSync(dir, { recursive: true });
    const path = join(dir, "log-format.yml");
    writeFileSync(path, "fields: [level, message, hostname]\n");

    try {
      const { formatter, warnings } = await loadFormatter(path);

      expect(formatter.fields).toEqual(["level", "message"]);
      expect(formatter.unknownFields).toEqual(["hostname"]);
      expect(warnings).toHaveLength(1);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
