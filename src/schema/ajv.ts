import Ajv2020Module from "ajv/dist/2020.js";
import type { ErrorObject, ValidateFunction } from "ajv";

// CommonJS package; under NodeNext the class sits on `.default`.
const Ajv2020 = Ajv2020Module.default;

export type AjvInstance = InstanceType<typeof Ajv2020>;
export type AjvValidateFn<T = unknown> = ValidateFunction<T>;
export type AjvError = ErrorObject;

export function loadAjv(): AjvInstance {
  return new Ajv2020({ allErrors: true, strict: true });
}
