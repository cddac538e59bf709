import type { EditSessionOptions } from "../edit-session.js";

import { Validators } from "../text-validator.js";
import { log } from "./logger/log.js";
import { existsSync, readFileSync } from "fs";
import { load as loadYaml } from "js-yaml";
import { homedir } from "os";
import { extname, join } from "path";
import { z } from "zod";

export const CONFIG_DIR = join(homedir(), ".lineedit");
export const CONFIG_JSON_FILEPATH = join(CONFIG_DIR, "config.json");
export const CONFIG_YAML_FILEPATH = join(CONFIG_DIR, "config.yaml");
export const CONFIG_YML_FILEPATH = join(CONFIG_DIR, "config.yml");

// A field that fails validation is dropped on its own rather than taking the
// rest of the file down with it.
function dropInvalid(field: string) {
  return ({ input }: { input: unknown }): undefined => {
    log(
      `[lineedit] Warning: '${field}' in config is invalid (got ${JSON.stringify(input)}). Ignoring this value.`,
    );
    return undefined;
  };
}

// YAML users write `limitWidth: "true"` surprisingly often.
const booleanish = z.union([
  z.boolean(),
  z.enum(["true", "false"]).transform((v) => v === "true"),
]);

export const StoredConfigSchema = z.object({
  maxChars: z
    .number()
    .int()
    .nonnegative()
    .optional()
    .catch(dropInvalid("maxChars")),
  /** Preset name (all, int, uint, float) or a regular expression. */
  inputValidator: z.string().optional().catch(dropInvalid("inputValidator")),
  passwordChar: z.string().optional().catch(dropInvalid("passwordChar")),
  limitWidth: booleanish.optional().catch(dropInvalid("limitWidth")),
  alignment: z
    .enum(["left", "center", "right"])
    .optional()
    .catch(dropInvalid("alignment")),
  readOnly: booleanish.optional().catch(dropInvalid("readOnly")),
  suffix: z.string().optional().catch(dropInvalid("suffix")),
  defaultText: z.string().optional().catch(dropInvalid("defaultText")),
  doubleClickTime: z
    .number()
    .nonnegative()
    .optional()
    .catch(dropInvalid("doubleClickTime")),
  /** Columns used by the terminal widget. */
  width: z.number().int().positive().optional().catch(dropInvalid("width")),
});

// Represents config as persisted in config.json / config.yaml.
export type StoredConfig = z.infer<typeof StoredConfigSchema>;

const PRESETS = new Map<string, string>([
  ["all", Validators.All],
  ["int", Validators.Int],
  ["uint", Validators.UInt],
  ["float", Validators.Float],
]);

/** Pattern of a named preset (case-insensitive), or undefined. */
export function presetPattern(name: string): string | undefined {
  return PRESETS.get(name.toLowerCase());
}

/** Map a preset name to its pattern; anything else is taken as a pattern. */
export function resolveInputValidator(value: string): string {
  return presetPattern(value) ?? value;
}

export const loadConfig = (
  configPath: string = CONFIG_JSON_FILEPATH,
): StoredConfig => {
  // If the provided path doesn't exist and the caller passed the default
  // JSON path, automatically fall back to YAML variants.
  let actualConfigPath = configPath;
  if (!existsSync(actualConfigPath) && configPath === CONFIG_JSON_FILEPATH) {
    if (existsSync(CONFIG_YAML_FILEPATH)) {
      actualConfigPath = CONFIG_YAML_FILEPATH;
    } else if (existsSync(CONFIG_YML_FILEPATH)) {
      actualConfigPath = CONFIG_YML_FILEPATH;
    }
  }

  if (!existsSync(actualConfigPath)) {
    return {};
  }

  const raw = readFileSync(actualConfigPath, "utf-8");
  const ext = extname(actualConfigPath).toLowerCase();
  let parsed: unknown;
  try {
    parsed = ext === ".yaml" || ext === ".yml" ? loadYaml(raw) : JSON.parse(raw);
  } catch (err) {
    log(
      `[lineedit] Warning: could not parse ${actualConfigPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
    return {};
  }

  const result = StoredConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    log(
      `[lineedit] Warning: ${actualConfigPath} does not hold a config object. Ignoring it.`,
    );
    return {};
  }
  log(`[lineedit] Loaded config from ${actualConfigPath}`);
  return result.data;
};

/** Session options described by a stored config. */
export function toSessionOptions(config: StoredConfig): EditSessionOptions {
  const options: EditSessionOptions = {};
  if (config.maxChars !== undefined) {
    options.maxChars = config.maxChars;
  }
  if (config.inputValidator !== undefined) {
    options.inputValidator = resolveInputValidator(config.inputValidator);
  }
  if (config.passwordChar !== undefined) {
    options.passwordChar = config.passwordChar;
  }
  if (config.limitWidth !== undefined) {
    options.limitWidth = config.limitWidth;
  }
  if (config.alignment !== undefined) {
    options.alignment = config.alignment;
  }
  if (config.readOnly !== undefined) {
    options.readOnly = config.readOnly;
  }
  if (config.suffix !== undefined) {
    options.suffix = config.suffix;
  }
  if (config.defaultText !== undefined) {
    options.defaultText = config.defaultText;
  }
  if (config.doubleClickTime !== undefined) {
    options.doubleClickTime = config.doubleClickTime;
  }
  return options;
}
