import * as z from "zod/v4";

import { encodeListQuery, listEndpoint, viewEndpoint } from "../core/list-query.js";
import { PayloadSchema, buildEditPayload, buildPayload } from "../core/payload.js";
import { isPlainObject } from "../core/utils.js";
import {
  FieldDef,
  date,
  defineListResource,
  entityObject,
  fieldShape,
  filledString,
  flag,
  idArg,
  int,
  isoDate,
  listInputShape,
  num,
  positiveId,
  text,
  toListQueryParams,
} from "./fields.js";
import { Operation, defineOperation } from "./operation.js";

export const EXPENSE_LIST = defineListResource({
  resource: "expenses",
  maxPerPage: 100,
  defaultPerPage: 50,
  defaultSort: "created",
  defaultDirection: "DESC",
  filters: [
    { key: "status", schema: z.string().min(1), description: "Status; several as a pipe list, e.g. '1|3'" },
    { key: "client_id", schema: positiveId(), description: "Only expenses of this supplier" },
    { key: "category", schema: positiveId(), description: "Expense category ID" },
    { key: "type", schema: z.string().min(1), description: "Expense type(s), pipe-separated" },
    { key: "amount_from", schema: z.number(), description: "Minimum amount" },
    { key: "amount_to", schema: z.number(), description: "Maximum amount" },
    { key: "search", schema: z.string().min(1), description: "Full-text search, base64-encoded by the caller" },
  ],
  rangeFields: ["created", "delivery", "due", "paydate", "modified"],
});

const EXPENSE_FIELDS: FieldDef[] = [
  int("category", "Expense category ID"),
  text("description", "Description / comment"),
  text("variable_symbol", "Variable symbol", "variable"),
  text("constant_symbol", "Constant symbol", "constant"),
  text("specific_symbol", "Specific symbol", "specific"),
  text("currency", "Currency code, e.g. EUR"),
  num("vat", "VAT rate in percent"),
  flag("already_paid", "1 if already paid, 0 if not"),
  date("due_date", "Due date (YYYY-MM-DD)", "due"),
  date("delivery_date", "Delivery date (YYYY-MM-DD)", "delivery"),
  int("client_id", "Supplier (client) ID"),
  text("payment_type", "Payment type, e.g. transfer, cash, card"),
  text("type", "Expense type: invoice, bill, internal, contribution"),
  text("document_number", "Supplier's document number"),
];

const EXPENSE_NESTED = [
  { input: "expense_items", entity: "ExpenseItem" },
  { input: "expense_extras", entity: "ExpenseExtra" },
];

const CREATE_EXPENSE_SCHEMA: PayloadSchema = {
  required: [{ input: "name" }, { input: "amount" }, { input: "expense_date", output: "date" }],
  optional: EXPENSE_FIELDS,
  nested: EXPENSE_NESTED,
};

const EDIT_EXPENSE_FIELDS: FieldDef[] = [
  text("name", "Expense name"),
  num("amount", "Amount without VAT"),
  date("expense_date", "Expense date (YYYY-MM-DD)", "date"),
  ...EXPENSE_FIELDS,
];

const EDIT_EXPENSE_SCHEMA: PayloadSchema = {
  optional: EDIT_EXPENSE_FIELDS,
  nested: EXPENSE_NESTED,
};

const expenseItemSchema = z
  .looseObject({
    name: z.string().min(1).describe("Item name"),
    quantity: z.number().optional().describe("Quantity (default 1)"),
    unit_price: z.number().describe("Unit price without VAT"),
    tax: z.number().optional().describe("VAT rate in percent"),
  })
  .describe("Expense line item; extra keys are passed through unchanged");

const nestedShape = {
  expense_items: z.array(expenseItemSchema).optional().describe("Line items"),
  expense_extras: entityObject().optional().describe("ExpenseExtra object, sent as given"),
};

export const createExpense = defineOperation({
  name: "create_expense",
  description: "Record a new expense. The expense date defaults to today.",
  group: "expenses",
  method: "POST",
  readOnly: false,
  inputSchema: z.strictObject({
    name: z.string().min(1).describe("Expense name"),
    amount: z.number().describe("Amount without VAT"),
    expense_date: isoDate().optional().describe("Expense date (YYYY-MM-DD), defaults to today"),
    ...fieldShape(EXPENSE_FIELDS),
    ...nestedShape,
  }),
  run: async (ctx, args) => {
    const payload = buildPayload(
      "Expense",
      { ...args, expense_date: filledString(args.expense_date) ?? ctx.today() },
      CREATE_EXPENSE_SCHEMA,
    );
    return ctx.request("POST", "expenses/add", payload);
  },
});

export const listExpenses = defineOperation({
  name: "list_expenses",
  description: "List expenses with paging, sorting and filters. Range filters take _since/_to bounds.",
  group: "expenses",
  method: "GET",
  readOnly: true,
  inputSchema: z.strictObject(listInputShape(EXPENSE_LIST)),
  run: async (ctx, args) => {
    const segments = encodeListQuery(EXPENSE_LIST.spec, toListQueryParams(EXPENSE_LIST, args));
    return ctx.request("GET", listEndpoint(EXPENSE_LIST.spec.resource, segments));
  },
});

export const getExpense = defineOperation({
  name: "get_expense",
  description: "Get an expense with its items.",
  group: "expenses",
  method: "GET",
  readOnly: true,
  inputSchema: z.strictObject({
    expense_id: positiveId().describe("Expense ID"),
  }),
  run: async (ctx, args) => ctx.request("GET", viewEndpoint("expenses", args.expense_id)),
});

export const editExpense = defineOperation({
  name: "edit_expense",
  description:
    "Edit an expense. Pass changed fields as arguments and/or a payload keyed by entity (Expense, ExpenseItem, ExpenseExtra).",
  group: "expenses",
  method: "POST",
  readOnly: false,
  inputSchema: z.strictObject({
    expense_id: positiveId().describe("Expense ID"),
    payload: entityObject().optional().describe("Partial payload keyed by entity name"),
    ...fieldShape(EDIT_EXPENSE_FIELDS),
    ...nestedShape,
  }),
  run: async (ctx, args) => {
    const partial = isPlainObject(args.payload) ? args.payload : {};
    ctx.shapes.assertValid("expense", partial, "edit_expense");
    const expenseId = idArg(args.expense_id, "expense_id");
    return ctx.request("POST", "expenses/edit", buildEditPayload("Expense", expenseId, args, EDIT_EXPENSE_SCHEMA, partial));
  },
});

export const deleteExpense = defineOperation({
  name: "delete_expense",
  description: "Delete an expense.",
  group: "expenses",
  method: "DELETE",
  readOnly: false,
  destructive: true,
  inputSchema: z.strictObject({
    expense_id: positiveId().describe("Expense ID"),
  }),
  run: async (ctx, args) => ctx.request("DELETE", `expenses/delete/${args.expense_id}`),
});

export const EXPENSE_OPERATIONS: Operation[] = [createExpense, listExpenses, getExpense, editExpense, deleteExpense];
