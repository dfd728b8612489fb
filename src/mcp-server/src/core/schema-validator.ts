import fs from "node:fs";
import path from "node:path";

import AjvModule, { type ValidateFunction } from "ajv";
import addFormatsModule from "ajv-formats";

import { httpError, isPlainObject } from "./utils.js";

// Both packages are CommonJS; under NodeNext their classes sit on `.default`.
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

export function loadPayloadShapes(repoRoot: string): Record<string, unknown> {
  const filePath = path.join(repoRoot, "registry", "payload-shapes.json");
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  return isPlainObject(parsed) ? parsed : {};
}

/**
 * Structural check of caller-shaped edit payloads: which entity keys may appear, object versus
 * list, and date formats. Business rules stay with the remote service.
 */
export class PayloadShapeValidator {
  private readonly ajv: InstanceType<typeof Ajv>;

  private readonly shapes: Record<string, unknown>;

  private readonly cache = new Map<string, ValidateFunction | null>();

  constructor(shapes: Record<string, unknown>) {
    this.shapes = shapes;
    this.ajv = new Ajv({
      allErrors: true,
      strict: false,
      allowUnionTypes: true,
    });
    addFormats(this.ajv);
  }

  validate(shapeName: string, payload: unknown): string[] {
    const validator = this.getOrCompileValidator(shapeName);
    if (!validator) return [];
    if (validator(payload)) return [];

    return (validator.errors ?? []).map((err) => {
      const where = err.instancePath && err.instancePath.length > 0 ? `$payload${err.instancePath}` : "$payload";
      return `${where}: ${err.message ?? "invalid value"}`;
    });
  }

  assertValid(shapeName: string, payload: unknown, context: string): void {
    const errors = this.validate(shapeName, payload);
    if (errors.length > 0) {
      throw httpError(400, `Payload shape validation failed for '${context}'.`, errors.slice(0, 25));
    }
  }

  private getOrCompileValidator(shapeName: string): ValidateFunction | null {
    if (this.cache.has(shapeName)) {
      return this.cache.get(shapeName) ?? null;
    }

    const schema = this.shapes[shapeName];
    if (!isPlainObject(schema)) {
      this.cache.set(shapeName, null);
      return null;
    }

    const validator = this.ajv.compile(schema);
    this.cache.set(shapeName, validator);
    return validator;
  }
}
