/**
 * Tests for configuration loading and resolution
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { findConfig, loadConfig, resolveConfig } from "./config.js";
import type { ProplensConfig } from "./types.js";

const makeTempDir = (): string =>
  fs.mkdtempSync(path.join(os.tmpdir(), "proplens-test-"));

describe("Config", () => {
  describe("resolveConfig", () => {
    it("should resolve file paths against the project root", () => {
      const config: ProplensConfig = {
        descriptors: ["descriptors"],
        sources: ["src/user.ts"],
        canBypassVisibility: true,
      };

      const result = resolveConfig(config, {}, "/project", "/elsewhere");
      expect(result.descriptors).to.deep.equal(["/project/descriptors"]);
      expect(result.sources).to.deep.equal(["/project/src/user.ts"]);
      expect(result.canBypassVisibility).to.equal(true);
    });

    it("should append CLI inputs resolved against cwd", () => {
      const config: ProplensConfig = { descriptors: ["base.descriptors.json"] };

      const result = resolveConfig(
        config,
        { descriptors: ["extra.descriptors.json"], sources: ["/abs/model.ts"] },
        "/project",
        "/work"
      );
      expect(result.descriptors).to.deep.equal([
        "/project/base.descriptors.json",
        "/work/extra.descriptors.json",
      ]);
      expect(result.sources).to.deep.equal(["/abs/model.ts"]);
    });

    it("should let CLI flags override the file", () => {
      const result = resolveConfig(
        { canBypassVisibility: true },
        { bypassVisibility: false, json: true, quiet: true },
        "/project",
        "/project"
      );
      expect(result.canBypassVisibility).to.equal(false);
      expect(result.json).to.equal(true);
      expect(result.quiet).to.equal(true);
      expect(result.verbose).to.equal(false);
    });

    it("should default everything", () => {
      const result = resolveConfig({}, {}, "/project", "/project");
      expect(result).to.deep.equal({
        projectRoot: "/project",
        descriptors: [],
        sources: [],
        canBypassVisibility: true,
        json: false,
        verbose: false,
        quiet: false,
      });
    });
  });

  describe("loadConfig", () => {
    it("should load a valid config file", () => {
      const tmpDir = makeTempDir();
      const configPath = path.join(tmpDir, "proplens.json");
      fs.writeFileSync(
        configPath,
        JSON.stringify({ descriptors: ["descriptors"], canBypassVisibility: true })
      );

      const result = loadConfig(configPath);
      fs.rmSync(tmpDir, { recursive: true, force: true });

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.descriptors).to.deep.equal(["descriptors"]);
        expect(result.value.sources).to.equal(undefined);
        expect(result.value.canBypassVisibility).to.equal(true);
      }
    });

    it("should reject invalid fields", () => {
      const tmpDir = makeTempDir();
      const configPath = path.join(tmpDir, "proplens.json");
      fs.writeFileSync(configPath, JSON.stringify({ sources: "src/user.ts" }));

      const result = loadConfig(configPath);
      fs.rmSync(tmpDir, { recursive: true, force: true });

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error).to.equal(
          "proplens.json: 'sources' must be an array of paths"
        );
      }
    });

    it("should report invalid JSON", () => {
      const tmpDir = makeTempDir();
      const configPath = path.join(tmpDir, "proplens.json");
      fs.writeFileSync(configPath, "{");

      const result = loadConfig(configPath);
      fs.rmSync(tmpDir, { recursive: true, force: true });

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.startsWith("Failed to parse proplens.json:")).to.equal(true);
      }
    });

    it("should report a missing file", () => {
      const result = loadConfig("/nonexistent/proplens.json");
      expect(result).to.deep.equal({
        ok: false,
        error: "Config file not found: /nonexistent/proplens.json",
      });
    });
  });

  describe("findConfig", () => {
    it("should find proplens.json in a parent directory", () => {
      const tmpDir = makeTempDir();
      const nested = path.join(tmpDir, "a", "b");
      fs.mkdirSync(nested, { recursive: true });
      fs.writeFileSync(path.join(tmpDir, "proplens.json"), "{}");

      const found = findConfig(nested);
      fs.rmSync(tmpDir, { recursive: true, force: true });

      expect(found).to.equal(path.join(tmpDir, "proplens.json"));
    });
  });
});
