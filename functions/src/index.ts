import {
  handleAnalyze,
  handleDeadlineCalculate,
  handleDeadlineStatus,
  handleOrdersCreate,
  handleOrdersList,
  handleOrdersUpdateStatus,
  handleSuppliersAdd,
  handleSuppliersMatch,
} from "./http/handlers";
import { endpoint } from "./http/endpoint";
import { ordersExportCsv } from "./index.export";
export { ordersExportCsv };

/* ---------------- Endpoints ---------------- */

// Analyze decoded tender text and propose a supplier deadline
export const documentAnalyze = endpoint(handleAnalyze);

// Supplier deadline for a client deadline typed in by hand
export const deadlineCalculate = endpoint(handleDeadlineCalculate);

// Urgency badge for a single date
export const deadlineStatusGet = endpoint(handleDeadlineStatus);

export const ordersCreate = endpoint(handleOrdersCreate);
export const ordersList = endpoint(handleOrdersList);
export const ordersUpdateStatus = endpoint(handleOrdersUpdateStatus);

// Suppliers carrying the extracted materials, minus excluded origins
export const suppliersMatch = endpoint(handleSuppliersMatch);
export const suppliersAdd = endpoint(handleSuppliersAdd);
