import { ZodError } from "zod";
import * as logger from "firebase-functions/logger";
import {
  analyzeDocument,
  documentForFile,
  type ExtractedDocument,
} from "../intel/analyzer";
import type { CalendarDate } from "../intel/dates";
import {
  decideDeadlines,
  deadlineStatus,
  optimalSupplierDeadline,
  type DeadlineDecision,
  type DeadlineStatus,
} from "../deadlines/policy";
import {
  buildOrderRecord,
  OrderInput,
  OrderStatusUpdate,
  ordersDueForFollowUp,
  pendingOrders,
  type ProcessedOrder,
} from "../orders/tracker";
import {
  filterSuppliers,
  searchSuppliers,
  Supplier,
  supplierContact,
  supplierStatistics,
  type SupplierContact,
  type SupplierStatistics,
} from "../suppliers/directory";
import type { DeadlineConfig } from "../lib/config";
import {
  DeadlineInputError,
  errorMessage,
  RequestBodyError,
} from "../lib/errors";
import type { ProcurementStore } from "../lib/types";
import { ordersToCsv } from "./csv";
import {
  AnalyzeRequest,
  DeadlineRequest,
  StatusQuery,
  SuppliersMatchRequest,
} from "./schemas";

/* ---------------- Plumbing ---------------- */

export type HttpRequest = {
  method: string;
  body?: unknown;
  query?: Record<string, unknown>;
};

export type ErrorBody = { error: string; issues?: string[] };

type ErrorStatus = 400 | 404 | 405 | 409 | 413 | 422 | 500;

export type Reply<T> =
  | { status: 200; body: T; headers?: Record<string, string> }
  | { status: 201; body: T; headers?: Record<string, string> }
  | { status: 204; body: "" }
  | { status: ErrorStatus; body: ErrorBody };

export type HandlerDeps = {
  store: ProcurementStore;
  config: DeadlineConfig;
  now?: () => Date;
};

const ok = <T>(
  body: T,
  status: 200 | 201 = 200,
  headers?: Record<string, string>
): Reply<T> => ({ status, body, headers });

const fail = (
  status: ErrorStatus,
  error: string,
  issues?: string[]
): Reply<never> => ({ status, body: issues ? { error, issues } : { error } });

function parseJsonBody(body: unknown): unknown {
  if (!body) return {};
  if (typeof body === "string") {
    try {
      return JSON.parse(body);
    } catch {
      throw new RequestBodyError("Invalid JSON body");
    }
  }
  return body;
}

function preflight(req: HttpRequest, method: string): Reply<never> | null {
  if (req.method === "OPTIONS") return { status: 204, body: "" };
  if (req.method !== method) return fail(405, "Method not allowed");
  return null;
}

const flag = (v: unknown) => v === "1" || v === "true";

async function guarded<T>(
  name: string,
  fn: () => Promise<Reply<T>>
): Promise<Reply<T>> {
  try {
    return await fn();
  } catch (e) {
    if (e instanceof ZodError) {
      const issues = e.issues.map(
        (i) => `${i.path.join(".") || "body"}: ${i.message}`
      );
      logger.warn(`${name}: invalid request`, { issues });
      return fail(400, "Invalid request", issues);
    }
    if (e instanceof RequestBodyError) {
      logger.warn(`${name}: ${e.message}`);
      return fail(400, e.message);
    }
    if (e instanceof DeadlineInputError) {
      logger.warn(`${name}: ${e.message}`);
      return fail(400, e.message);
    }
    logger.error(`${name} ERROR:`, e);
    return fail(500, errorMessage(e) || "Server error");
  }
}

/* ---------------- Documents ---------------- */

export type AnalyzeResponse = {
  analysisId: string;
  document: ExtractedDocument;
  decision: DeadlineDecision;
  optimalSupplierDeadline: CalendarDate;
  /** "default" when no deadline was found and today was substituted. */
  deadlineSource: "extracted" | "default";
};

export function handleAnalyze(
  req: HttpRequest,
  { store, config }: HandlerDeps
): Promise<Reply<AnalyzeResponse>> {
  return guarded<AnalyzeResponse>("documentAnalyze", async () => {
    const early = preflight(req, "POST");
    if (early) return early;

    const input = AnalyzeRequest.parse(parseJsonBody(req.body));
    if (input.text.length > config.maxTextLength) {
      return fail(413, `text exceeds ${config.maxTextLength} characters`);
    }

    const today = await store.serverToday();
    const document = input.fileName
      ? documentForFile(input.fileName, input.text, { today })
      : analyzeDocument(input.text, { today });
    if (document.error) return fail(422, document.error);

    const bufferDays = input.bufferDays ?? config.bufferDays;
    const clientDeadline = document.deadline ?? today;
    const decision = decideDeadlines(clientDeadline, { bufferDays, today });
    const optimal = optimalSupplierDeadline(
      clientDeadline,
      input.complexityFactor,
      { bufferDays, today }
    );
    const deadlineSource = document.deadline ? "extracted" : "default";

    const analysisId = await store.saveAnalysis({
      fileName: input.fileName ?? null,
      textLength: input.text.length,
      projectName: document.projectName,
      tenderReference: document.tenderReference,
      materials: [...document.materials],
      specifications: [...document.specifications],
      clientDeadline: document.deadline,
      supplierDeadline: decision.supplierDeadline,
      deadlineSource,
      analyzedOn: today,
    });

    return ok({
      analysisId,
      document,
      decision,
      optimalSupplierDeadline: optimal,
      deadlineSource,
    });
  });
}

/* ---------------- Deadlines ---------------- */

export type DeadlineResponse = {
  decision: DeadlineDecision;
  optimalSupplierDeadline: CalendarDate;
};

export function handleDeadlineCalculate(
  req: HttpRequest,
  { store, config }: HandlerDeps
): Promise<Reply<DeadlineResponse>> {
  return guarded<DeadlineResponse>("deadlineCalculate", async () => {
    const early = preflight(req, "POST");
    if (early) return early;

    const input = DeadlineRequest.parse(parseJsonBody(req.body));
    const today = await store.serverToday();
    const bufferDays = input.bufferDays ?? config.bufferDays;
    const decision = decideDeadlines(input.clientDeadline, {
      bufferDays,
      today,
    });

    await store.logDeadlineCalculation({
      clientDeadline: decision.clientDeadline,
      supplierDeadline: decision.supplierDeadline,
      bufferDays,
      status: decision.status,
      urgency: decision.urgency,
      calculatedOn: today,
    });

    return ok({
      decision,
      optimalSupplierDeadline: optimalSupplierDeadline(
        input.clientDeadline,
        input.complexityFactor,
        { bufferDays, today }
      ),
    });
  });
}

export function handleDeadlineStatus(
  req: HttpRequest,
  { store }: HandlerDeps
): Promise<Reply<DeadlineStatus>> {
  return guarded<DeadlineStatus>("deadlineStatus", async () => {
    const early = preflight(req, "GET");
    if (early) return early;

    const { deadline } = StatusQuery.parse(req.query ?? {});
    return ok(deadlineStatus(deadline, await store.serverToday()));
  });
}

/* ---------------- Orders ---------------- */

export function handleOrdersCreate(
  req: HttpRequest,
  { store, now = () => new Date() }: HandlerDeps
): Promise<Reply<ProcessedOrder>> {
  return guarded<ProcessedOrder>("ordersCreate", async () => {
    const early = preflight(req, "POST");
    if (early) return early;

    const order = buildOrderRecord(
      OrderInput.parse(parseJsonBody(req.body)),
      now()
    );
    await store.saveOrder(order);
    logger.info("order recorded", {
      orderId: order.orderId,
      followUp: order.followUpDate,
    });
    return ok(order, 201);
  });
}

export function handleOrdersList(
  req: HttpRequest,
  { store }: HandlerDeps
): Promise<Reply<{ orders: ProcessedOrder[] }>> {
  return guarded<{ orders: ProcessedOrder[] }>("ordersList", async () => {
    const early = preflight(req, "GET");
    if (early) return early;

    const all = await store.listOrders();
    if (flag(req.query?.due)) {
      const today = await store.serverToday();
      return ok({ orders: ordersDueForFollowUp(all, today) });
    }
    return ok({ orders: flag(req.query?.pending) ? pendingOrders(all) : all });
  });
}

export function handleOrdersUpdateStatus(
  req: HttpRequest,
  { store }: HandlerDeps
): Promise<Reply<{ ok: true }>> {
  return guarded<{ ok: true }>("ordersUpdateStatus", async () => {
    const early = preflight(req, "POST");
    if (early) return early;

    const update = OrderStatusUpdate.parse(parseJsonBody(req.body));
    const found = await store.updateOrderStatus(update);
    if (!found) return fail(404, `Order ${update.orderId} not found`);
    return ok({ ok: true as const });
  });
}

export function handleOrdersExport(
  req: HttpRequest,
  { store }: HandlerDeps
): Promise<Reply<string>> {
  return guarded<string>("ordersExportCsv", async () => {
    const early = preflight(req, "GET");
    if (early) return early;

    const csv = ordersToCsv(await store.listOrders());
    return ok(csv, 200, {
      "Content-Type": "text/csv; charset=utf-8",
      "Content-Disposition": `attachment; filename="processed_orders.csv"`,
    });
  });
}

/* ---------------- Suppliers ---------------- */

export type SuppliersMatchResponse = {
  suppliers: Supplier[];
  /** Ready to pass as `suppliers` when recording the order. */
  contacts: SupplierContact[];
  statistics: SupplierStatistics;
};

export function handleSuppliersMatch(
  req: HttpRequest,
  { store }: HandlerDeps
): Promise<Reply<SuppliersMatchResponse>> {
  return guarded<SuppliersMatchResponse>("suppliersMatch", async () => {
    const early = preflight(req, "POST");
    if (early) return early;

    const { materials, excludeOrigins, search } = SuppliersMatchRequest.parse(
      parseJsonBody(req.body)
    );
    const suppliers = searchSuppliers(
      filterSuppliers(await store.listSuppliers(), materials, excludeOrigins),
      search
    );
    return ok({
      suppliers,
      contacts: suppliers.map(supplierContact),
      statistics: supplierStatistics(suppliers),
    });
  });
}

export function handleSuppliersAdd(
  req: HttpRequest,
  { store }: HandlerDeps
): Promise<Reply<Supplier>> {
  return guarded<Supplier>("suppliersAdd", async () => {
    const early = preflight(req, "POST");
    if (early) return early;

    const supplier = Supplier.parse(parseJsonBody(req.body));
    if (!(await store.addSupplier(supplier))) {
      return fail(409, `Supplier ${supplier.companyName} already exists`);
    }
    logger.info("supplier added", { companyName: supplier.companyName });
    return ok(supplier, 201);
  });
}
