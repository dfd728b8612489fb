import * as z from "zod/v4";

import { encodeListQuery, listEndpoint, viewEndpoint } from "../core/list-query.js";
import { PayloadSchema, buildEditPayload, buildPayload } from "../core/payload.js";
import { isPlainObject } from "../core/utils.js";
import {
  FieldDef,
  defineListResource,
  entityObject,
  fieldShape,
  idArg,
  int,
  listInputShape,
  num,
  positiveId,
  text,
  toListQueryParams,
} from "./fields.js";
import { Operation, defineOperation } from "./operation.js";

export const CLIENT_LIST = defineListResource({
  resource: "clients",
  maxPerPage: 100,
  defaultPerPage: 50,
  defaultSort: "name",
  defaultDirection: "ASC",
  filters: [
    { key: "search", schema: z.string().min(1), description: "Full-text search, base64-encoded by the caller" },
    { key: "char_filter", schema: z.string().min(1), description: "First letter of the client name" },
    { key: "tag", schema: positiveId(), description: "Tag ID" },
  ],
  rangeFields: ["created", "modified"],
});

const CLIENT_FIELDS: FieldDef[] = [
  text("email", "Contact e-mail"),
  text("phone", "Phone number"),
  text("address", "Street address"),
  text("city", "City"),
  text("zip_code", "Postal code", "zip"),
  text("country", "Country name"),
  int("country_id", "Country ID from the SuperFaktura country list"),
  text("ico", "Company registration number (IČO)"),
  text("dic", "Tax ID (DIČ)"),
  text("ic_dph", "VAT ID (IČ DPH)"),
  text("fax", "Fax number"),
  text("bank_account", "Bank account number"),
  text("iban", "IBAN"),
  text("swift", "SWIFT/BIC"),
  text("currency", "Default currency, e.g. EUR"),
  text("default_variable", "Default variable symbol"),
  num("discount", "Default discount in percent"),
  int("due_date", "Default due period in days"),
  text("comment", "Internal comment"),
  text("delivery_name", "Delivery name"),
  text("delivery_address", "Delivery street address"),
  text("delivery_city", "Delivery city"),
  text("delivery_zip", "Delivery postal code"),
  text("delivery_country", "Delivery country"),
  text("delivery_phone", "Delivery phone"),
];

const CREATE_CLIENT_SCHEMA: PayloadSchema = {
  required: [{ input: "name" }],
  optional: CLIENT_FIELDS,
};

const UPDATE_CLIENT_FIELDS: FieldDef[] = [text("name", "Client name"), ...CLIENT_FIELDS];

export const createClient = defineOperation({
  name: "create_client",
  description: "Create a new client (customer).",
  group: "clients",
  method: "POST",
  readOnly: false,
  inputSchema: z.strictObject({
    name: z.string().min(1).describe("Client or company name"),
    ...fieldShape(CLIENT_FIELDS),
  }),
  run: async (ctx, args) => ctx.request("POST", "clients/create", buildPayload("Client", args, CREATE_CLIENT_SCHEMA)),
});

export const listClients = defineOperation({
  name: "list_clients",
  description: "List clients with paging, sorting and filters.",
  group: "clients",
  method: "GET",
  readOnly: true,
  inputSchema: z.strictObject(listInputShape(CLIENT_LIST)),
  run: async (ctx, args) => {
    const segments = encodeListQuery(CLIENT_LIST.spec, toListQueryParams(CLIENT_LIST, args));
    return ctx.request("GET", listEndpoint(CLIENT_LIST.spec.resource, segments));
  },
});

export const getClient = defineOperation({
  name: "get_client",
  description: "Get a client's details.",
  group: "clients",
  method: "GET",
  readOnly: true,
  inputSchema: z.strictObject({
    client_id: positiveId().describe("Client ID"),
  }),
  run: async (ctx, args) => ctx.request("GET", viewEndpoint("clients", args.client_id)),
});

export const updateClient = defineOperation({
  name: "update_client",
  description:
    "Update a client. Pass changed fields as arguments and/or as an `updates` object in wire format (e.g. zip, not zip_code).",
  group: "clients",
  method: "PATCH",
  readOnly: false,
  inputSchema: z.strictObject({
    client_id: positiveId().describe("Client ID"),
    updates: entityObject().optional().describe("Client fields to change, keyed as the API names them"),
    ...fieldShape(UPDATE_CLIENT_FIELDS),
  }),
  run: async (ctx, args) => {
    const clientId = idArg(args.client_id, "client_id");
    const updates = isPlainObject(args.updates) ? args.updates : {};
    ctx.shapes.assertValid("client", updates, "update_client");

    const payload = buildEditPayload("Client", clientId, args, { optional: UPDATE_CLIENT_FIELDS }, { Client: updates });
    return ctx.request("PATCH", `clients/edit/${clientId}`, payload);
  },
});

export const deleteClient = defineOperation({
  name: "delete_client",
  description: "Delete a client.",
  group: "clients",
  method: "DELETE",
  readOnly: false,
  destructive: true,
  inputSchema: z.strictObject({
    client_id: positiveId().describe("Client ID"),
  }),
  run: async (ctx, args) => ctx.request("DELETE", `clients/delete/${args.client_id}`),
});

export const CLIENT_OPERATIONS: Operation[] = [createClient, listClients, getClient, updateClient, deleteClient];
