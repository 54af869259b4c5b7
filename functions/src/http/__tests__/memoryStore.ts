import type { CalendarDate } from "../../intel/dates";
import type { OrderStatusUpdate, ProcessedOrder } from "../../orders/tracker";
import type { Supplier } from "../../suppliers/directory";
import type {
  AnalysisRecord,
  DeadlineLogEntry,
  ProcurementStore,
} from "../../lib/types";

/** In-process stand-in for the Firestore store. */
export class MemoryStore implements ProcurementStore {
  analyses: AnalysisRecord[] = [];
  deadlineLog: DeadlineLogEntry[] = [];
  orders = new Map<string, ProcessedOrder>();
  suppliers: Supplier[] = [];

  constructor(private today: CalendarDate) {}

  async serverToday() {
    return this.today;
  }

  async saveAnalysis(record: AnalysisRecord) {
    this.analyses.push(record);
    return `analysis-${this.analyses.length}`;
  }

  async logDeadlineCalculation(entry: DeadlineLogEntry) {
    this.deadlineLog.push(entry);
  }

  async saveOrder(order: ProcessedOrder) {
    this.orders.set(order.orderId, order);
  }

  async listOrders() {
    return [...this.orders.values()];
  }

  async updateOrderStatus({ orderId, status, notes }: OrderStatusUpdate) {
    const current = this.orders.get(orderId);
    if (!current) return false;
    this.orders.set(orderId, {
      ...current,
      status,
      notes: notes ?? current.notes,
    });
    return true;
  }

  async listSuppliers() {
    return [...this.suppliers];
  }

  async addSupplier(supplier: Supplier) {
    if (this.suppliers.some((s) => s.companyName === supplier.companyName)) {
      return false;
    }
    this.suppliers.push(supplier);
    return true;
  }
}
