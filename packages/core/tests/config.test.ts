/**
 * Tests for the configuration system
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { config, defineConfig } from "../src/index.js";

describe("config", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    config.reset();
  });

  describe("defaults", () => {
    it("should start with debug off and an 80 character excerpt", () => {
      expect(config.get("debug")).toBe(false);
      expect(config.get("excerptLength")).toBe(80);
    });

    it("should return every value from getAll", () => {
      expect(config.getAll()).toEqual({ debug: false, excerptLength: 80 });
    });
  });

  describe("set", () => {
    it("should override loaded values", () => {
      config.set({ excerptLength: 12, debug: true });
      expect(config.get("excerptLength")).toBe(12);
      expect(config.get("debug")).toBe(true);
    });

    it("should ignore values of the wrong shape", () => {
      config.set({ excerptLength: -1 });
      config.set({ excerptLength: 2.5 });
      expect(config.get("excerptLength")).toBe(80);
    });

    it("should be undone by reset", () => {
      config.set({ debug: true });
      config.reset();
      expect(config.get("debug")).toBe(false);
    });
  });

  describe("environment variables", () => {
    it("should read LINESHAPE_* variables", () => {
      vi.stubEnv("LINESHAPE_DEBUG", "1");
      vi.stubEnv("LINESHAPE_EXCERPT_LENGTH", "40");
      config.reset();

      expect(config.get("debug")).toBe(true);
      expect(config.get("excerptLength")).toBe(40);
    });

    it("should treat 0 and false as off", () => {
      vi.stubEnv("LINESHAPE_DEBUG", "false");
      config.reset();
      expect(config.get("debug")).toBe(false);
    });

    it("should ignore values that do not parse", () => {
      vi.stubEnv("LINESHAPE_EXCERPT_LENGTH", "wide");
      config.reset();
      expect(config.get("excerptLength")).toBe(80);
    });

    it("should lose to programmatic values", () => {
      vi.stubEnv("LINESHAPE_EXCERPT_LENGTH", "40");
      config.reset();
      config.set({ excerptLength: 10 });
      expect(config.get("excerptLength")).toBe(10);
    });
  });

  describe("config files", () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), "lineshape-config-"));
      vi.spyOn(process, "cwd").mockReturnValue(dir);
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it("should load .lineshaperc.json from the working directory", () => {
      fs.writeFileSync(
        path.join(dir, ".lineshaperc.json"),
        JSON.stringify({ excerptLength: 12, debug: true })
      );

      expect(config.get("excerptLength")).toBe(12);
      expect(config.get("debug")).toBe(true);
      expect(config.getConfigFilePath()).toBe(
        path.join(dir, ".lineshaperc.json")
      );
    });

    it("should let environment variables override the file", () => {
      fs.writeFileSync(
        path.join(dir, ".lineshaperc.json"),
        JSON.stringify({ excerptLength: 12 })
      );
      vi.stubEnv("LINESHAPE_EXCERPT_LENGTH", "30");

      expect(config.get("excerptLength")).toBe(30);
    });

    it("should report no file when none exists", () => {
      expect(config.getConfigFilePath()).toBeUndefined();
      expect(config.get("excerptLength")).toBe(80);
    });
  });

  describe("defineConfig", () => {
    it("should return its argument unchanged", () => {
      const cfg = { debug: true };
      expect(defineConfig(cfg)).toBe(cfg);
    });
  });
});
