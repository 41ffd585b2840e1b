import { afterEach, describe, expect, it } from "vitest";
import { BACKGROUND } from "../../attr/context.ts";
import { intoStruct } from "../../reflect/into.ts";
import {
  PersonShape,
  personType,
  personWire,
} from "../../reflect/test/reflect_test_utils.ts";
import {
  configureLogging,
  createLogger,
  LOG_ENV_VAR,
  LogLevel,
  logLevelFromEnv,
  MemoryTransport,
  parseLogLevel,
  resetLoggingConfig,
} from "../logging.ts";

describe("logging", () => {
  afterEach(() => {
    resetLoggingConfig();
  });

  describe("parseLogLevel", () => {
    it("parses level names case-insensitively", () => {
      expect(parseLogLevel("debug")).toBe(LogLevel.DEBUG);
      expect(parseLogLevel(" WARN ")).toBe(LogLevel.WARN);
    });

    it("returns undefined for anything else", () => {
      expect(parseLogLevel(undefined)).toBeUndefined();
      expect(parseLogLevel("verbose")).toBeUndefined();
      expect(parseLogLevel("toString")).toBeUndefined();
    });
  });

  describe("logLevelFromEnv", () => {
    it("defaults to silent", () => {
      expect(logLevelFromEnv({})).toBe(LogLevel.SILENT);
      expect(logLevelFromEnv({ [LOG_ENV_VAR]: "loud" })).toBe(LogLevel.SILENT);
    });

    it("reads the configured level", () => {
      expect(logLevelFromEnv({ [LOG_ENV_VAR]: "info" })).toBe(LogLevel.INFO);
    });
  });

  describe("Logger", () => {
    it("drops entries below the configured level", () => {
      const transport = new MemoryTransport();
      const log = createLogger("test", {
        level: LogLevel.WARN,
        transports: [transport],
      });
      log.info("ignored");
      log.error("kept", { code: 7 });
      expect(transport.entries.map((e) => [e.levelName, e.message])).toEqual([
        ["ERROR", "kept"],
      ]);
      expect(transport.entries[0].context).toEqual({ code: 7 });
      expect(transport.entries[0].package).toBe("test");
    });

    it("never writes at the silent level", () => {
      const log = createLogger("test", { level: LogLevel.SILENT });
      expect(log.isEnabled(LogLevel.ERROR)).toBe(false);
      expect(log.isEnabled(LogLevel.SILENT)).toBe(false);
    });

    it("picks up global configuration after creation", () => {
      const transport = new MemoryTransport();
      const log = createLogger("late");
      configureLogging({ level: LogLevel.DEBUG, transports: [transport] });
      log.debug("hello");
      expect(transport.entries.map((e) => e.message)).toEqual(["hello"]);
    });
  });

  describe("conversions", () => {
    it("log struct decoding at debug level", () => {
      const transport = new MemoryTransport();
      configureLogging({ level: LogLevel.DEBUG, transports: [transport] });
      intoStruct(BACKGROUND, personType(), personWire("Ana", 30), PersonShape);
      expect(transport.entries.map((e) => [e.package, e.message])).toEqual([
        ["reflect:struct", "decoding struct"],
      ]);
      expect(transport.entries[0].context).toEqual({
        struct: "Person",
        path: "",
        fields: 2,
      });
    });
  });
});
