import { z } from "zod";
import { diffDays, isCalendarDate, type CalendarDate } from "../intel/dates";
import { followUpDate } from "../deadlines/policy";
import { SupplierContact } from "../suppliers/directory";

export const ORDER_STATUSES = [
  "Pending Response",
  "Follow Up Required",
  "Responded",
  "Closed",
] as const;

export type OrderStatus = (typeof ORDER_STATUSES)[number];

const PENDING: readonly OrderStatus[] = [
  "Pending Response",
  "Follow Up Required",
];

const calendarDate = z
  .string()
  .refine(isCalendarDate, { message: "expected a YYYY-MM-DD date" });

export const OrderInput = z.object({
  projectName: z.string().trim().max(200).default(""),
  tenderReference: z.string().trim().max(100).default(""),
  materials: z.array(z.string()).max(20).default([]),
  // defaults to the number of suppliers contacted
  totalSuppliers: z.number().int().min(0).optional(),
  emailsSent: z.number().int().min(0).default(0),
  suppliers: z.array(SupplierContact).max(500).default([]),
  quoteDeadline: calendarDate,
  followUpDate: calendarDate.optional(),
  notes: z.string().max(2000).default(""),
});

export type OrderInput = z.infer<typeof OrderInput>;

/** Shape of a stored order; also used to read documents back. */
export const ProcessedOrder = z.object({
  orderId: z.string(),
  projectName: z.string(),
  tenderReference: z.string(),
  processedAt: z.string(), // YYYY-MM-DD HH:MM:SS, UTC
  materials: z.string(),
  totalSuppliers: z.number(),
  emailsSent: z.number(),
  supplierCategories: z.string(),
  quoteDeadline: calendarDate,
  followUpDate: calendarDate,
  status: z.enum(ORDER_STATUSES),
  notes: z.string(),
});

export type ProcessedOrder = z.infer<typeof ProcessedOrder>;

export const OrderStatusUpdate = z.object({
  orderId: z.string().min(1),
  status: z.enum(ORDER_STATUSES),
  notes: z.string().max(2000).optional(),
});

export type OrderStatusUpdate = z.infer<typeof OrderStatusUpdate>;

function stamp(now: Date) {
  const iso = now.toISOString();
  return { date: iso.slice(0, 10), time: iso.slice(11, 19) };
}

export function orderIdFor(now: Date): string {
  const { date, time } = stamp(now);
  return `ORD-${date.replace(/-/g, "")}-${time.replace(/:/g, "")}`;
}

export function buildOrderRecord(
  input: OrderInput,
  now: Date = new Date()
): ProcessedOrder {
  const { date, time } = stamp(now);
  return {
    orderId: orderIdFor(now),
    projectName: input.projectName,
    tenderReference: input.tenderReference,
    processedAt: `${date} ${time}`,
    materials: input.materials.join(", "),
    totalSuppliers: input.totalSuppliers ?? input.suppliers.length,
    emailsSent: input.emailsSent,
    supplierCategories: summarizeSupplierCategories(input.suppliers),
    quoteDeadline: input.quoteDeadline,
    followUpDate: input.followUpDate ?? followUpDate(input.quoteDeadline),
    status: "Pending Response",
    notes: input.notes,
  };
}

export function isPending(order: Pick<ProcessedOrder, "status">): boolean {
  return PENDING.includes(order.status);
}

export function pendingOrders<T extends Pick<ProcessedOrder, "status">>(
  orders: readonly T[]
): T[] {
  return orders.filter(isPending);
}

/** Pending orders whose follow-up day has come. */
export function ordersDueForFollowUp<
  T extends Pick<ProcessedOrder, "status" | "followUpDate">
>(orders: readonly T[], today: CalendarDate): T[] {
  return orders.filter(
    (o) => isPending(o) && diffDays(o.followUpDate, today) >= 0
  );
}

const SUPPLIER_MATERIALS = [
  "piping",
  "pipes",
  "valves",
  "flanges",
  "fittings",
  "bolts",
  "gaskets",
  "finned tubes",
];

function demonym(country: string) {
  switch (country.toLowerCase()) {
    case "china":
      return "Chinese";
    case "uae":
      return "Emirati";
    default:
      return country;
  }
}

/**
 * One-line summary of who was contacted, e.g.
 * `Chinese: 2 suppliers (flanges, valves); Germany: 1 suppliers`.
 */
export function summarizeSupplierCategories(
  suppliers: readonly SupplierContact[]
): string {
  const byCountry = new Map<
    string,
    { count: number; materials: Set<string> }
  >();
  for (const s of suppliers) {
    const country = s.country || "Unknown";
    const entry = byCountry.get(country) ?? {
      count: 0,
      materials: new Set<string>(),
    };
    entry.count += 1;
    const lower = (s.materials ?? "").toLowerCase();
    for (const m of SUPPLIER_MATERIALS) {
      if (lower.includes(m)) entry.materials.add(m);
    }
    byCountry.set(country, entry);
  }

  return [...byCountry]
    .map(([country, { count, materials }]) => {
      const head = `${demonym(country)}: ${count} suppliers`;
      if (!materials.size) return head;
      return `${head} (${[...materials].sort().join(", ")})`;
    })
    .join("; ");
}
