import * as z from "zod/v4";

import { joinUrl } from "../core/http-client.js";
import { encodeListQuery, listEndpoint, viewEndpoint } from "../core/list-query.js";
import { EntityPayload, PayloadSchema, buildEditPayload, buildPayload } from "../core/payload.js";
import { failureEnvelope, isFailureEnvelope, isFilled, isPlainObject } from "../core/utils.js";
import {
  FieldDef,
  date,
  defineListResource,
  entityObject,
  fieldShape,
  filledString,
  flag,
  idArg,
  idListArg,
  int,
  isoDate,
  listInputShape,
  num,
  positiveId,
  text,
  toListQueryParams,
} from "./fields.js";
import { Operation, defineOperation } from "./operation.js";

export const INVOICE_LANGUAGES = [
  "cze", "deu", "eng", "esp", "fra", "hrv", "hun", "ita", "nld", "pol", "rom", "rus", "slo", "slv", "ukr",
] as const;

export const INVOICE_LIST = defineListResource({
  resource: "invoices",
  maxPerPage: 200,
  defaultPerPage: 50,
  defaultSort: "regular_count",
  defaultDirection: "DESC",
  filters: [
    { key: "status", schema: z.string().min(1), description: "Status; several as a pipe list, e.g. '1|2' (1=draft, 2=sent, 3=paid, 99=cancelled)" },
    { key: "client_id", schema: positiveId(), description: "Only invoices of this client" },
    { key: "type", schema: z.string().min(1), description: "Invoice type(s), pipe-separated: regular, proforma, estimate, cancel, order, delivery" },
    { key: "delivery_type", schema: z.string().min(1), description: "Delivery type(s), pipe-separated" },
    { key: "payment_type", schema: z.string().min(1), description: "Payment type(s), pipe-separated" },
    { key: "amount_from", schema: z.number(), description: "Minimum total amount" },
    { key: "amount_to", schema: z.number(), description: "Maximum total amount" },
    { key: "invoice_no_formatted", schema: z.string().min(1), description: "Exact formatted invoice number" },
    { key: "order_no", schema: z.string().min(1), description: "Order number" },
    { key: "variable", schema: z.string().min(1), description: "Variable symbol" },
    { key: "tag", schema: positiveId(), description: "Tag ID" },
    { key: "search", schema: z.string().min(1), description: "Full-text search, base64-encoded by the caller" },
  ],
  rangeFields: ["created", "delivery", "due", "paydate", "modified"],
});

const INVOICE_FIELDS: FieldDef[] = [
  text("variable_symbol", "Variable symbol for payment identification", "variable"),
  text("constant_symbol", "Constant symbol", "constant"),
  text("specific_symbol", "Specific symbol", "specific"),
  flag("already_paid", "1 if the invoice is already paid, 0 if not"),
  text("comment", "Comment printed below the items"),
  text("header_comment", "Comment printed above the items"),
  date("delivery_date", "Delivery date (YYYY-MM-DD)", "delivery"),
  text("delivery_type", "Delivery type, e.g. mail, courier, personal"),
  text("payment_type", "Payment type, e.g. transfer, cash, card"),
  num("discount", "Discount on the whole invoice, in percent"),
  num("deposit", "Deposit already received"),
  text("invoice_currency", "Currency code, e.g. EUR"),
  // A blank number would switch off numbering for the document.
  { ...text("invoice_no_formatted", "Invoice number to use instead of the generated one"), present: isFilled },
  text("order_no", "Order number"),
  text("issued_by", "Name of the person issuing the invoice"),
  text("issued_by_email", "E-mail of the issuer"),
  text("issued_by_phone", "Phone of the issuer"),
  text("issued_by_web", "Website of the issuer"),
  text("rounding", "Rounding mode: document, item or item_ext"),
  int("sequence_id", "Number sequence ID"),
  text("type", "Invoice type: regular, proforma, estimate, order, delivery"),
  flag("tax_document", "1 to issue a tax document for a received deposit"),
  flag("vat_transfer", "1 for reverse-charge VAT"),
];

const INVOICE_NESTED = [
  { input: "invoice_items", entity: "InvoiceItem" },
  { input: "invoice_setting", entity: "InvoiceSetting" },
  { input: "invoice_extras", entity: "InvoiceExtra" },
  { input: "my_data", entity: "MyData" },
];

const INVOICE_HEADER_FIELDS = [
  { input: "client_id" },
  { input: "name" },
  { input: "issued_date", output: "created" },
  { input: "due_date", output: "due" },
];

const CREATE_INVOICE_SCHEMA: PayloadSchema = {
  required: INVOICE_HEADER_FIELDS,
  optional: INVOICE_FIELDS,
  nested: INVOICE_NESTED,
};

const EDIT_INVOICE_FIELDS: FieldDef[] = [
  int("client_id", "Client ID"),
  text("name", "Invoice name"),
  date("issued_date", "Issue date (YYYY-MM-DD)", "created"),
  date("due_date", "Due date (YYYY-MM-DD)", "due"),
  ...INVOICE_FIELDS,
];

const EDIT_INVOICE_SCHEMA: PayloadSchema = {
  optional: EDIT_INVOICE_FIELDS,
  nested: INVOICE_NESTED,
};

const invoiceItemSchema = z
  .looseObject({
    name: z.string().min(1).describe("Item name"),
    description: z.string().optional().describe("Item description"),
    quantity: z.number().optional().describe("Quantity (default 1)"),
    unit: z.string().optional().describe("Unit, e.g. pcs, h"),
    unit_price: z.number().describe("Unit price without VAT"),
    tax: z.number().optional().describe("VAT rate in percent"),
    discount: z.number().optional().describe("Item discount in percent"),
  })
  .describe("Invoice line item; extra keys are passed through unchanged");

const nestedShape = {
  invoice_setting: entityObject().optional().describe("InvoiceSetting object, sent as given"),
  invoice_extras: entityObject().optional().describe("InvoiceExtra object, sent as given"),
  my_data: entityObject().optional().describe("MyData object (issuer details), sent as given"),
  tag_ids: z.array(positiveId()).optional().describe("Tag IDs to attach"),
};

function tagEntity(value: unknown): EntityPayload {
  const tagIds = idListArg(value);
  return tagIds.length > 0 ? { Tag: { tag_id: tagIds } } : {};
}

const languageSchema = z.enum(INVOICE_LANGUAGES);

export const createInvoice = defineOperation({
  name: "create_invoice",
  description: "Create a new invoice. Issue date defaults to today and the due date to the issue date.",
  group: "invoices",
  method: "POST",
  readOnly: false,
  inputSchema: z.strictObject({
    client_id: positiveId().describe("ID of the client to invoice"),
    name: z.string().min(1).describe("Invoice name/description"),
    invoice_items: z.array(invoiceItemSchema).describe("Line items"),
    issued_date: isoDate().optional().describe("Issue date (YYYY-MM-DD), defaults to today"),
    due_date: isoDate().optional().describe("Due date (YYYY-MM-DD), defaults to the issue date"),
    ...fieldShape(INVOICE_FIELDS),
    ...nestedShape,
  }),
  run: async (ctx, args) => {
    const issued = filledString(args.issued_date) ?? ctx.today();
    const due = filledString(args.due_date) ?? issued;
    const payload = buildPayload(
      "Invoice",
      { ...args, issued_date: issued, due_date: due },
      CREATE_INVOICE_SCHEMA,
      tagEntity(args.tag_ids),
    );
    return ctx.request("POST", "invoices/create", payload);
  },
});

export const listInvoices = defineOperation({
  name: "list_invoices",
  description: "List invoices with paging, sorting and filters. Range filters (created, due, ...) take _since/_to bounds.",
  group: "invoices",
  method: "GET",
  readOnly: true,
  inputSchema: z.strictObject(listInputShape(INVOICE_LIST)),
  run: async (ctx, args) => {
    const segments = encodeListQuery(INVOICE_LIST.spec, toListQueryParams(INVOICE_LIST, args));
    return ctx.request("GET", listEndpoint(INVOICE_LIST.spec.resource, segments));
  },
});

export const getInvoice = defineOperation({
  name: "get_invoice",
  description: "Get an invoice with its items, client and payment status.",
  group: "invoices",
  method: "GET",
  readOnly: true,
  inputSchema: z.strictObject({
    invoice_id: positiveId().describe("Invoice ID"),
  }),
  run: async (ctx, args) => ctx.request("GET", viewEndpoint("invoices", args.invoice_id)),
});

export const sendInvoice = defineOperation({
  name: "send_invoice",
  description: "Send an invoice by e-mail, to the client's address unless another is given.",
  group: "invoices",
  method: "POST",
  readOnly: false,
  inputSchema: z.strictObject({
    invoice_id: positiveId().describe("Invoice ID"),
    email: z.email().optional().describe("Recipient override"),
  }),
  run: async (ctx, args) => {
    const payload = buildPayload("Invoice", args, {
      required: [{ input: "invoice_id", output: "id" }],
      optional: [{ input: "email" }],
    });
    return ctx.request("POST", "invoices/send", payload);
  },
});

export const editInvoice = defineOperation({
  name: "edit_invoice",
  description:
    "Edit an invoice. Pass changed fields as arguments and/or a payload keyed by entity (Invoice, InvoiceItem, InvoiceSetting, ...). Item lists and settings in the payload win over the matching arguments.",
  group: "invoices",
  method: "POST",
  readOnly: false,
  inputSchema: z.strictObject({
    invoice_id: positiveId().describe("Invoice ID"),
    payload: entityObject().optional().describe("Partial payload keyed by entity name"),
    invoice_items: z.array(invoiceItemSchema).optional().describe("Replacement line items"),
    ...fieldShape(EDIT_INVOICE_FIELDS),
    ...nestedShape,
  }),
  run: async (ctx, args) => {
    const partial = isPlainObject(args.payload) ? args.payload : {};
    ctx.shapes.assertValid("invoice", partial, "edit_invoice");
    const invoiceId = idArg(args.invoice_id, "invoice_id");
    const payload = buildEditPayload("Invoice", invoiceId, args, EDIT_INVOICE_SCHEMA, partial, tagEntity(args.tag_ids));
    return ctx.request("POST", "invoices/edit", payload);
  },
});

export const deleteInvoice = defineOperation({
  name: "delete_invoice",
  description: "Delete an invoice.",
  group: "invoices",
  method: "DELETE",
  readOnly: false,
  destructive: true,
  inputSchema: z.strictObject({
    invoice_id: positiveId().describe("Invoice ID"),
  }),
  run: async (ctx, args) => ctx.request("DELETE", `invoices/delete/${args.invoice_id}`),
});

export const markInvoicePaid = defineOperation({
  name: "mark_invoice_paid",
  description: "Record a payment on an invoice. Payment date defaults to today, payment type to transfer.",
  group: "invoices",
  method: "POST",
  readOnly: false,
  inputSchema: z.strictObject({
    invoice_id: positiveId().describe("Invoice ID"),
    amount: z.number().describe("Payment amount"),
    payment_date: isoDate().optional().describe("Payment date (YYYY-MM-DD), defaults to today"),
    payment_type: z.string().min(1).optional().describe("Payment type, defaults to transfer"),
    currency: z.string().min(1).optional().describe("Payment currency, e.g. EUR"),
  }),
  run: async (ctx, args) => {
    const payload = buildPayload(
      "InvoicePayment",
      {
        ...args,
        payment_type: args.payment_type ?? "transfer",
        payment_date: args.payment_date ?? ctx.today(),
      },
      {
        required: [{ input: "invoice_id" }, { input: "amount" }, { input: "payment_type" }, { input: "payment_date", output: "created" }],
        optional: [{ input: "currency" }],
      },
    );
    return ctx.request("POST", "invoice_payments/add", payload);
  },
});

export const setInvoiceLanguage = defineOperation({
  name: "set_invoice_language",
  description: "Set the language an invoice is rendered and sent in.",
  group: "invoices",
  method: "GET",
  readOnly: false,
  inputSchema: z.strictObject({
    invoice_id: positiveId().describe("Invoice ID"),
    language: languageSchema.describe("Three-letter language code, e.g. slo, cze, eng"),
  }),
  run: async (ctx, args) => ctx.request("GET", `invoices/setinvoicelanguage/${args.invoice_id}/lang:${args.language}`),
});

function readInvoiceToken(response: unknown): string | undefined {
  if (!isPlainObject(response) || !isPlainObject(response.Invoice)) return undefined;
  const token = response.Invoice.token;
  return typeof token === "string" && token ? token : undefined;
}

export const getInvoicePdf = defineOperation({
  name: "get_invoice_pdf",
  description: "Get the download URL of an invoice PDF.",
  group: "invoices",
  method: "GET",
  readOnly: true,
  inputSchema: z.strictObject({
    invoice_id: positiveId().describe("Invoice ID"),
    language: languageSchema.default("slo").describe("PDF language (default slo)"),
  }),
  run: async (ctx, args) => {
    const invoice = await ctx.request("GET", viewEndpoint("invoices", args.invoice_id));
    if (isFailureEnvelope(invoice)) return invoice;

    const token = readInvoiceToken(invoice);
    if (!token) return failureEnvelope(`Invoice ${args.invoice_id} response did not include a PDF token.`);

    return {
      invoice_id: args.invoice_id,
      token,
      pdf_url: joinUrl(ctx.client.baseUrl, `${args.language}/invoices/pdf/${args.invoice_id}/token:${token}`),
    };
  },
});

export const INVOICE_OPERATIONS: Operation[] = [
  createInvoice,
  listInvoices,
  getInvoice,
  sendInvoice,
  editInvoice,
  deleteInvoice,
  markInvoicePaid,
  setInvoiceLanguage,
  getInvoicePdf,
];
