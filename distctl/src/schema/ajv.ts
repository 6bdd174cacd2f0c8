import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

// Both packages are CommonJS; under NodeNext the default import is the
// module object and the class/plugin sits on `.default`.
export type AjvInstance = InstanceType<typeof Ajv2020.default>;

export function loadAjv(): AjvInstance {
  const ajv = new Ajv2020.default({ allErrors: true, strict: true, allowUnionTypes: true });
  addFormats.default(ajv);
  return ajv;
}
