import * as admin from "firebase-admin";
import { getFirestore, FieldValue, Timestamp } from "firebase-admin/firestore";
import * as logger from "firebase-functions/logger";
import { todayISO, type CalendarDate } from "../intel/dates";
import { ProcessedOrder } from "../orders/tracker";
import { Supplier } from "../suppliers/directory";
import type { ProcurementStore } from "./types";

if (!admin.apps.length) {
  admin.initializeApp();
}
export const db = getFirestore();
db.settings({ ignoreUndefinedProperties: true });

export const serverTimestamp = () => FieldValue.serverTimestamp();

export const analysesCol = () => db.collection("document_analyses");
export const deadlineLogCol = () => db.collection("deadline_calculations");
export const ordersCol = () => db.collection("processed_orders");
export const suppliersCol = () => db.collection("suppliers");

/* --------- Firestore server date (ISO YYYY-MM-DD) --------- */
export async function getServerDateISO(): Promise<CalendarDate> {
  const ref = db.collection("_meta").doc("now");
  await ref.set({ now: serverTimestamp() }, { merge: true });
  const snap = await ref.get();
  const ts: unknown = snap.get("now");
  return todayISO(ts instanceof Timestamp ? ts.toDate() : new Date());
}

export const firestoreStore: ProcurementStore = {
  serverToday: getServerDateISO,

  async saveAnalysis(record) {
    const ref = await analysesCol().add({
      ...record,
      createdAt: serverTimestamp(),
    });
    logger.info("analysis stored", {
      id: ref.id,
      deadline: record.clientDeadline,
    });
    return ref.id;
  },

  async logDeadlineCalculation(entry) {
    await deadlineLogCol().add({ ...entry, createdAt: serverTimestamp() });
    logger.info("deadline calculated", {
      client: entry.clientDeadline,
      supplier: entry.supplierDeadline,
      status: entry.status,
    });
  },

  async saveOrder(order) {
    await ordersCol()
      .doc(order.orderId)
      .set(
        {
          ...order,
          createdAt: serverTimestamp(),
          updatedAt: serverTimestamp(),
        },
        { merge: true }
      );
  },

  async listOrders() {
    const snap = await ordersCol().orderBy("processedAt", "desc").get();
    const orders: ProcessedOrder[] = [];
    for (const d of snap.docs) {
      const parsed = ProcessedOrder.safeParse(d.data());
      if (parsed.success) orders.push(parsed.data);
      else logger.warn("skipping malformed order", { id: d.id });
    }
    return orders;
  },

  async updateOrderStatus({ orderId, status, notes }) {
    const ref = ordersCol().doc(orderId);
    const snap = await ref.get();
    if (!snap.exists) return false;
    await ref.set(
      notes
        ? { status, notes, updatedAt: serverTimestamp() }
        : { status, updatedAt: serverTimestamp() },
      { merge: true }
    );
    return true;
  },

  async listSuppliers() {
    const snap = await suppliersCol().orderBy("companyName").get();
    const suppliers: Supplier[] = [];
    for (const d of snap.docs) {
      const parsed = Supplier.safeParse(d.data());
      if (parsed.success) suppliers.push(parsed.data);
      else logger.warn("skipping malformed supplier", { id: d.id });
    }
    return suppliers;
  },

  async addSupplier(supplier) {
    return db.runTransaction(async (tx) => {
      const existing = await tx.get(
        suppliersCol().where("companyName", "==", supplier.companyName).limit(1)
      );
      if (!existing.empty) return false;
      tx.set(suppliersCol().doc(), {
        ...supplier,
        createdAt: serverTimestamp(),
      });
      return true;
    });
  },
};
