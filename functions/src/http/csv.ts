import type { ProcessedOrder } from "../orders/tracker";

export function csvEscape(value: string | number | null | undefined): string {
  if (value == null) return "";
  const str = String(value);
  if (/[",\n\r]/.test(str)) return `"${str.replace(/"/g, '""')}"`;
  return str;
}

const COLUMNS: ReadonlyArray<[string, keyof ProcessedOrder]> = [
  ["Order_ID", "orderId"],
  ["Project_Name", "projectName"],
  ["Tender_Reference", "tenderReference"],
  ["Date_Processed", "processedAt"],
  ["Materials", "materials"],
  ["Total_Suppliers", "totalSuppliers"],
  ["Emails_Sent", "emailsSent"],
  ["Supplier_Categories", "supplierCategories"],
  ["Quote_Deadline", "quoteDeadline"],
  ["Status", "status"],
  ["Follow_Up_Date", "followUpDate"],
  ["Notes", "notes"],
];

export function ordersToCsv(orders: readonly ProcessedOrder[]): string {
  const lines = [COLUMNS.map(([header]) => header).join(",")];
  for (const order of orders) {
    lines.push(COLUMNS.map(([, key]) => csvEscape(order[key])).join(","));
  }
  return lines.join("\n");
}
