import type { CalendarDate } from "../intel/dates";
import type { MaterialCategory } from "../intel/patterns";
import type { DeadlineState, Urgency } from "../deadlines/policy";
import type { OrderStatusUpdate, ProcessedOrder } from "../orders/tracker";
import type { Supplier } from "../suppliers/directory";

export type AnalysisRecord = {
  fileName: string | null;
  textLength: number;
  projectName: string | null;
  tenderReference: string | null;
  materials: MaterialCategory[];
  specifications: string[];
  clientDeadline: CalendarDate | null;
  supplierDeadline: CalendarDate;
  deadlineSource: "extracted" | "default";
  analyzedOn: CalendarDate;
};

export type DeadlineLogEntry = {
  clientDeadline: CalendarDate;
  supplierDeadline: CalendarDate;
  bufferDays: number;
  status: DeadlineState;
  urgency: Urgency;
  calculatedOn: CalendarDate;
};

/** Everything the HTTP handlers need from storage. */
export type ProcurementStore = {
  serverToday(): Promise<CalendarDate>;
  saveAnalysis(record: AnalysisRecord): Promise<string>;
  logDeadlineCalculation(entry: DeadlineLogEntry): Promise<void>;
  saveOrder(order: ProcessedOrder): Promise<void>;
  listOrders(): Promise<ProcessedOrder[]>;
  updateOrderStatus(update: OrderStatusUpdate): Promise<boolean>;
  listSuppliers(): Promise<Supplier[]>;
  /** `false` when a supplier with the same company name exists. */
  addSupplier(supplier: Supplier): Promise<boolean>;
};
