import type * as fsType from "fs";

import { Validators } from "../src/text-validator.js";
import {
  CONFIG_JSON_FILEPATH,
  CONFIG_YAML_FILEPATH,
  loadConfig,
  presetPattern,
  resolveInputValidator,
  toSessionOptions,
} from "../src/utils/config.js";
import { tmpdir } from "os";
import { join } from "path";
import { test, expect, beforeEach, afterEach, vi } from "vitest";

// In‑memory FS store
let memfs: Record<string, string> = {};

// Mock out the parts of "fs" that our config module uses:
vi.mock("fs", async () => {
  const real = await vi.importActual<typeof fsType>("fs");
  return {
    ...real,
    existsSync: (path: string) => memfs[path] !== undefined,
    readFileSync: (path: string) => {
      const contents = memfs[path];
      if (contents === undefined) {
        throw new Error("ENOENT");
      }
      return contents;
    },
  };
});

let testConfigPath: string;

beforeEach(() => {
  memfs = {};
  testConfigPath = join(tmpdir(), "config.json");
});

afterEach(() => {
  memfs = {};
});

test("returns an empty config when no file exists", () => {
  expect(loadConfig(testConfigPath)).toEqual({});
  expect(loadConfig()).toEqual({});
});

test("loads a JSON config and resolves presets", () => {
  memfs[testConfigPath] = JSON.stringify({
    maxChars: 3,
    inputValidator: "UInt",
    alignment: "right",
  });
  const config = loadConfig(testConfigPath);
  expect(config).toEqual({
    maxChars: 3,
    inputValidator: "UInt",
    alignment: "right",
  });
  expect(toSessionOptions(config)).toEqual({
    maxChars: 3,
    inputValidator: "[0-9]*",
    alignment: "right",
  });
});

test("falls back to YAML next to the default JSON path", () => {
  memfs[CONFIG_YAML_FILEPATH] = 'maxChars: 4\nlimitWidth: "true"\n';
  expect(loadConfig()).toEqual({ maxChars: 4, limitWidth: true });
});

test("does not fall back to YAML for an explicit path", () => {
  memfs[CONFIG_YAML_FILEPATH] = "maxChars: 4\n";
  expect(loadConfig(testConfigPath)).toEqual({});
  expect(CONFIG_JSON_FILEPATH).not.toBe(testConfigPath);
});

test("drops invalid fields and keeps the rest", () => {
  memfs[testConfigPath] = JSON.stringify({
    maxChars: -1,
    alignment: "justify",
    suffix: "kg",
  });
  expect(toSessionOptions(loadConfig(testConfigPath))).toEqual({
    suffix: "kg",
  });
});

test("ignores files that do not parse or hold no object", () => {
  memfs[testConfigPath] = "{ not json";
  expect(loadConfig(testConfigPath)).toEqual({});

  const yamlPath = join(tmpdir(), "config.yaml");
  memfs[yamlPath] = "just a string\n";
  expect(loadConfig(yamlPath)).toEqual({});
});

test("resolveInputValidator maps preset names case‑insensitively", () => {
  expect(resolveInputValidator("INT")).toBe(Validators.Int);
  expect(resolveInputValidator("float")).toBe(Validators.Float);
  expect(resolveInputValidator("[a-z]+")).toBe("[a-z]+");
});

test("presetPattern only knows the preset names", () => {
  expect(presetPattern("UInt")).toBe(Validators.UInt);
  expect(presetPattern("all")).toBe(Validators.All);
  expect(presetPattern("foo")).toBeUndefined();
  expect(presetPattern("[0-9]+")).toBeUndefined();
  expect(presetPattern("constructor")).toBeUndefined();
});
