import { CLIENT_OPERATIONS } from "./clients.js";
import { EXPENSE_OPERATIONS } from "./expenses.js";
import { INVOICE_OPERATIONS } from "./invoices.js";
import { Operation } from "./operation.js";

export type { Operation, OperationContext, ToolGroup } from "./operation.js";

export const OPERATIONS: readonly Operation[] = [...INVOICE_OPERATIONS, ...CLIENT_OPERATIONS, ...EXPENSE_OPERATIONS];

const byName = new Map(OPERATIONS.map((op) => [op.name, op]));

export function getOperation(name: string): Operation | undefined {
  return byName.get(name);
}
