import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { DistctlConfig } from "../types/config.js";
import { loadConfigLayers } from "./loader.js";

export type ConfigValidationResult =
  | { valid: true; config: DistctlConfig; errors: null }
  | { valid: false; errors: string };

/**
 * Validate loaded config layers against `config.schema.json`, then the
 * rules a schema cannot express.
 */
export function validateConfig(raw: unknown, registry: SchemaRegistry = createRegistry()): ConfigValidationResult {
  if (!registry.is<DistctlConfig>("config", raw)) {
    return { valid: false, errors: registry.validate("config", raw).errors ?? "invalid config" };
  }

  const problems = crossFieldProblems(raw);
  if (problems.length > 0) return { valid: false, errors: problems.join("; ") };

  return { valid: true, config: raw, errors: null };
}

function crossFieldProblems(config: DistctlConfig): string[] {
  const problems: string[] = [];

  const seen = new Set<string>();
  for (const v of config.variants) {
    if (seen.has(v.name)) problems.push(`duplicate variant name '${v.name}'`);
    seen.add(v.name);
  }

  if (config.dist.archive_pattern === config.dist.package_pattern) {
    problems.push("dist.archive_pattern and dist.package_pattern must differ");
  }

  if (config.ui.output_dir !== null && config.ui.dir === null) {
    problems.push("ui.output_dir is set but ui.dir is null");
  }

  return problems;
}

/** Load and validate in one go; throws with the validation errors. */
export function loadConfig(envName?: string, configDir?: string, env?: NodeJS.ProcessEnv): DistctlConfig {
  const res = validateConfig(loadConfigLayers(envName, configDir, env));
  if (!res.valid) throw new Error(`Invalid configuration: ${res.errors}`);
  return res.config;
}
