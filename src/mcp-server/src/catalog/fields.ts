import * as z from "zod/v4";

import { ListQueryParams, RangeBounds, ResourceListSpec } from "../core/list-query.js";
import { FieldSpec } from "../core/payload.js";
import { JsonObject, SortDirection } from "../core/types.js";
import { httpError, isFilled } from "../core/utils.js";

/** A payload field plus the argument schema it is exposed with. */
export type FieldDef = FieldSpec & {
  schema: z.ZodType;
  description: string;
};

export const isoDate = () => z.iso.date();

export const positiveId = () => z.number().int().positive();

export function text(input: string, description: string, output?: string): FieldDef {
  return { input, output, description, schema: z.string() };
}

export function num(input: string, description: string, output?: string): FieldDef {
  return { input, output, description, schema: z.number() };
}

export function int(input: string, description: string, output?: string): FieldDef {
  return { input, output, description, schema: z.number().int() };
}

/** 0/1 flags; 0 is a real value and is always sent when given. */
export function flag(input: string, description: string, output?: string): FieldDef {
  return { input, output, description, schema: z.union([z.literal(0), z.literal(1)]) };
}

export function date(input: string, description: string, output?: string): FieldDef {
  return { input, output, description, schema: isoDate() };
}

export function fieldShape(defs: readonly FieldDef[]): Record<string, z.ZodType> {
  const shape: Record<string, z.ZodType> = {};
  for (const def of defs) {
    shape[def.input] = def.schema.optional().describe(def.description);
  }
  return shape;
}

export const entityObject = () => z.record(z.string(), z.unknown());

// Shapes built with fieldShape() carry an index signature, so parsed args come back as
// Record<string, unknown>; these read the known keys back out.

export function filledString(value: unknown): string | undefined {
  return typeof value === "string" && isFilled(value) ? value : undefined;
}

export function idArg(value: unknown, name: string): number {
  if (typeof value === "number" && Number.isInteger(value) && value > 0) return value;
  throw httpError(400, `Argument '${name}' must be a positive integer.`);
}

export function idListArg(value: unknown): number[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is number => typeof v === "number");
}

export type ListFilterDef = {
  key: string;
  schema: z.ZodType;
  description: string;
};

export type ListResourceDef = {
  spec: ResourceListSpec;
  filters: readonly ListFilterDef[];
};

export function defineListResource(input: {
  resource: string;
  maxPerPage: number;
  defaultPerPage: number;
  defaultSort: string;
  defaultDirection: SortDirection;
  filters: readonly ListFilterDef[];
  rangeFields: readonly string[];
}): ListResourceDef {
  return {
    spec: {
      resource: input.resource,
      maxPerPage: input.maxPerPage,
      defaultPerPage: input.defaultPerPage,
      defaultSort: input.defaultSort,
      defaultDirection: input.defaultDirection,
      filters: input.filters.map((f) => f.key),
      rangeFields: input.rangeFields,
    },
    filters: input.filters,
  };
}

export function listInputShape(def: ListResourceDef): Record<string, z.ZodType> {
  const { spec } = def;
  const shape: Record<string, z.ZodType> = {
    page: z.number().int().positive().default(1).describe("Page number, starting at 1"),
    per_page: z
      .number()
      .int()
      .positive()
      .default(spec.defaultPerPage)
      .describe(`Results per page (default ${spec.defaultPerPage}). Values above ${spec.maxPerPage} are reduced to ${spec.maxPerPage}.`),
    listinfo: z.boolean().default(true).describe("Include pagination metadata in the response"),
    direction: z.enum(["ASC", "DESC"]).optional().describe(`Sort direction (default ${spec.defaultDirection})`),
    sort: z.string().min(1).optional().describe(`Sort field (default ${spec.defaultSort})`),
  };

  for (const filter of def.filters) {
    shape[filter.key] = filter.schema.optional().describe(filter.description);
  }

  for (const field of spec.rangeFields) {
    shape[`${field}_since`] = z.string().min(1).optional().describe(`Lower bound for ${field} (YYYY-MM-DD)`);
    shape[`${field}_to`] = z.string().min(1).optional().describe(`Upper bound for ${field} (YYYY-MM-DD)`);
  }

  return shape;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/** Split flat tool arguments into paging, scalar filters and range bounds. */
export function toListQueryParams(def: ListResourceDef, args: JsonObject): ListQueryParams {
  const filters: Record<string, string | number | undefined> = {};
  for (const filter of def.filters) {
    const value = args[filter.key];
    if (typeof value === "string" || typeof value === "number") filters[filter.key] = value;
  }

  const ranges: Record<string, RangeBounds> = {};
  for (const field of def.spec.rangeFields) {
    ranges[field] = {
      since: optionalString(args[`${field}_since`]),
      to: optionalString(args[`${field}_to`]),
    };
  }

  const direction = args.direction === "ASC" || args.direction === "DESC" ? args.direction : undefined;

  return {
    page: typeof args.page === "number" ? args.page : undefined,
    perPage: typeof args.per_page === "number" ? args.per_page : undefined,
    listinfo: typeof args.listinfo === "boolean" ? args.listinfo : undefined,
    direction,
    sort: optionalString(args.sort),
    filters,
    ranges,
  };
}
