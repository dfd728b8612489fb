import { JsonObject } from "./types.js";
import { httpError, isPlainObject, isSet } from "./utils.js";

/** Entity name (Invoice, InvoiceItem, Client, ...) to its object or list. */
export type EntityPayload = Record<string, unknown>;

export type FieldSpec = {
  /** Argument name as the caller supplies it. */
  input: string;
  /** Wire key; defaults to the input name. */
  output?: string;
  /** Whether the argument counts as supplied; defaults to isSet. */
  present?: (value: unknown) => boolean;
  transform?: (value: unknown) => unknown;
};

export type FieldSchema = readonly FieldSpec[];

/** Argument carrying a ready-made sub-object, attached verbatim under its own entity key. */
export type NestedEntitySpec = {
  input: string;
  entity: string;
};

export type PayloadSchema = {
  /** Always emitted; the operation fills defaults before building. */
  required?: FieldSchema;
  optional: FieldSchema;
  nested?: readonly NestedEntitySpec[];
};

function outputKey(spec: FieldSpec): string {
  return spec.output ?? spec.input;
}

function mapValue(spec: FieldSpec, value: unknown): unknown {
  return spec.transform ? spec.transform(value) : value;
}

export function mapFields(entityName: string, input: JsonObject, schema: PayloadSchema): JsonObject {
  const entity: JsonObject = {};

  for (const spec of schema.required ?? []) {
    const value = input[spec.input];
    if (!isSet(value)) {
      throw httpError(400, `Missing required field '${spec.input}' for ${entityName}.`);
    }
    entity[outputKey(spec)] = mapValue(spec, value);
  }

  for (const spec of schema.optional) {
    const value = input[spec.input];
    const present = spec.present ?? isSet;
    if (!present(value)) continue;
    entity[outputKey(spec)] = mapValue(spec, value);
  }

  return entity;
}

function nestedEntities(input: JsonObject, schema: PayloadSchema): EntityPayload {
  const out: EntityPayload = {};
  for (const spec of schema.nested ?? []) {
    const value = input[spec.input];
    if (isSet(value)) out[spec.entity] = value;
  }
  return out;
}

function definedEntries(extra: EntityPayload): EntityPayload {
  const out: EntityPayload = {};
  for (const [key, value] of Object.entries(extra)) {
    if (isSet(value)) out[key] = value;
  }
  return out;
}

/**
 * Build a create-style payload: the mapped scalar fields under `entityName`, then nested
 * sub-objects from the input, then `extraEntities` computed by the operation.
 */
export function buildPayload(
  entityName: string,
  input: JsonObject,
  schema: PayloadSchema,
  extraEntities: EntityPayload = {},
): EntityPayload {
  return {
    [entityName]: mapFields(entityName, input, schema),
    ...nestedEntities(input, schema),
    ...definedEntries(extraEntities),
  };
}

/**
 * Build an edit payload on top of a caller-shaped partial payload. Mapped scalars and `id` are
 * merged into the primary entity; nested inputs and extras only fill entity keys the caller left
 * out, so caller-supplied item lists and settings survive.
 */
export function buildEditPayload(
  entityName: string,
  id: number,
  input: JsonObject,
  schema: PayloadSchema,
  partial: EntityPayload = {},
  extraEntities: EntityPayload = {},
): EntityPayload {
  const existing = partial[entityName];
  if (existing !== undefined && !isPlainObject(existing)) {
    throw httpError(400, `Payload key '${entityName}' must be an object.`);
  }

  const out: EntityPayload = { ...partial };
  out[entityName] = { ...(existing ?? {}), ...mapFields(entityName, input, schema), id };

  const supplements = { ...nestedEntities(input, schema), ...definedEntries(extraEntities) };
  for (const [key, value] of Object.entries(supplements)) {
    if (!(key in out)) out[key] = value;
  }
  return out;
}
