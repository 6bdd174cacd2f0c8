import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";

export const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

export const ENV_PREFIX = "DISTCTL_";

type Layer = Record<string, unknown>;

function isLayer(value: unknown): value is Layer {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: Layer, override: Layer): Layer {
  const result: Layer = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isLayer(val) && isLayer(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): Layer {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isLayer(parsed)) throw new Error(`Config file is not a mapping: ${filePath}`);
  return parsed;
}

function coerce(value: string): unknown {
  if (value === "true") return true;
  if (value === "false") return false;
  if (value === "null") return null;
  if (/^-?\d+(\.\d+)?$/.test(value)) return Number(value);
  return value;
}

/**
 * Apply DISTCTL_ prefixed environment variable overrides.
 * `__` separates nesting levels: DISTCTL_VERIFY__PARITY__FATAL → verify.parity.fatal.
 * Only keys that already exist are overridden, so unrelated variables are ignored.
 */
export function applyEnvOverrides(config: Layer, env: NodeJS.ProcessEnv = process.env): Layer {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__");
    if (!hasPath(result, segments)) continue;
    result = deepMerge(result, nest(segments, coerce(value)));
  }
  return result;
}

function hasPath(obj: Layer, segments: string[]): boolean {
  let cur: unknown = obj;
  for (const seg of segments) {
    if (!isLayer(cur) || !(seg in cur)) return false;
    cur = cur[seg];
  }
  return true;
}

function nest(segments: string[], value: unknown): Layer {
  const [head, ...rest] = segments;
  return { [head]: rest.length === 0 ? value : nest(rest, value) };
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← environment variables.
 * The result is unvalidated; pass it through `validateConfig`.
 *
 * @param envName - Optional environment name (e.g., "ci"). Loads `{configDir}/{envName}.yaml` as override layer.
 */
export function loadConfigLayers(envName?: string, configDir: string = CONFIG_DIR, env: NodeJS.ProcessEnv = process.env): Layer {
  let merged = loadYaml(path.join(configDir, "base.yaml"));

  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(configDir, `${envName}.yaml`)));
  }

  return applyEnvOverrides(merged, env);
}
