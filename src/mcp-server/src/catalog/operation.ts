/**
 * Operation definitions shared by the catalog modules.
 * Each operation pairs a strict zod input schema with a run function over the core builders.
 */
import * as z from "zod/v4";

import { PayloadShapeValidator } from "../core/schema-validator.js";
import { ClientConfig, HttpMethod, ResultEnvelope } from "../core/types.js";
import { httpError } from "../core/utils.js";

export type ToolGroup = "invoices" | "clients" | "expenses";

/** What a running operation may touch: its resolved client and the shared request path. */
export type OperationContext = {
  client: ClientConfig;
  request: (method: HttpMethod, endpoint: string, body?: unknown) => Promise<ResultEnvelope>;
  /** Local calendar date, YYYY-MM-DD. */
  today: () => string;
  shapes: PayloadShapeValidator;
};

export type Operation = {
  name: string;
  description: string;
  group: ToolGroup;
  /** True for view/list tools; no remote mutation. */
  readOnly: boolean;
  destructive: boolean;
  method: HttpMethod;
  inputSchema: z.ZodObject;
  execute: (ctx: OperationContext, rawArgs: unknown) => Promise<ResultEnvelope>;
};

export type OperationSpec<S extends z.ZodObject> = {
  name: string;
  description: string;
  group: ToolGroup;
  method: HttpMethod;
  readOnly: boolean;
  destructive?: boolean;
  inputSchema: S;
  run: (ctx: OperationContext, args: z.output<S>) => Promise<ResultEnvelope>;
};

export function parseArgs<S extends z.ZodObject>(toolName: string, schema: S, rawArgs: unknown): z.output<S> {
  const parsed = schema.safeParse(rawArgs ?? {});
  if (!parsed.success) {
    throw httpError(400, `Invalid arguments for '${toolName}': ${z.prettifyError(parsed.error)}`, parsed.error.issues);
  }
  return parsed.data;
}

export function defineOperation<S extends z.ZodObject>(spec: OperationSpec<S>): Operation {
  return {
    name: spec.name,
    description: spec.description,
    group: spec.group,
    readOnly: spec.readOnly,
    destructive: spec.destructive ?? false,
    method: spec.method,
    inputSchema: spec.inputSchema,
    execute: async (ctx, rawArgs) => spec.run(ctx, parseArgs(spec.name, spec.inputSchema, rawArgs)),
  };
}
