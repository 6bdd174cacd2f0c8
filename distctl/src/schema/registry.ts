import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { ValidateFunction } from "ajv";
import { loadAjv, type AjvInstance } from "./ajv.js";

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: Record<string, unknown>;
};

export const SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

/**
 * Discovers and loads every JSON Schema in a directory.
 * Provides compile-on-demand validation functions.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private validators = new Map<string, ValidateFunction>();
  private readonly ajv: AjvInstance = loadAjv();

  constructor(private readonly schemaDir: string) {}

  /** Discover all *.schema.json files in the schema directory. */
  load(): void {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json")).sort();

    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
      if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
        throw new Error(`Schema is not a JSON object: ${filePath}`);
      }
      const schema = Object.fromEntries(Object.entries(parsed));

      // "job-state.schema.json" → "job-state"
      const name = file.replace(/\.schema\.json$/, "");
      const version = extractVersion(schema) ?? "1.0.0";

      this.entries.set(name, { name, version, filePath, schema });
    }
  }

  /** Get a schema entry by name. */
  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  /** List all registered schema names. */
  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  /** Get the version registry map (name → version). */
  versions(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, entry] of this.entries) {
      result[name] = entry.version;
    }
    return result;
  }

  /** Compile and cache a validator for the given schema name. */
  getValidator(name: string): ValidateFunction {
    const cached = this.validators.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name}`);
    }

    const validate = this.ajv.compile(entry.schema);
    this.validators.set(name, validate);
    return validate;
  }

  /** Validate data against a named schema. Returns errors or null. */
  validate(name: string, data: unknown): { valid: boolean; errors: string | null } {
    const validate = this.getValidator(name);
    const valid = validate(data);
    return {
      valid,
      errors: valid ? null : this.ajv.errorsText(validate.errors),
    };
  }

  /**
   * Type guard over a named schema. The caller names the type the schema
   * describes; keeping the two in step is what the schema tests are for.
   */
  is<T>(name: string, data: unknown): data is T {
    return this.getValidator(name)(data);
  }
}

/** Extract a semver-like version from schema metadata. */
function extractVersion(schema: Record<string, unknown>): string | null {
  if (typeof schema.version === "string") return schema.version;

  // "...@1.0.0" at the end of $id
  if (typeof schema.$id === "string") {
    const m = /@(\d+\.\d+\.\d+)/.exec(schema.$id);
    if (m) return m[1];
  }

  return null;
}

/** Create and load a registry from the default schemas directory. */
export function createRegistry(schemaDir: string = SCHEMA_DIR): SchemaRegistry {
  const registry = new SchemaRegistry(schemaDir);
  registry.load();
  return registry;
}
