import { endpoint } from "./http/endpoint";
import { handleOrdersExport } from "./http/handlers";

export const ordersExportCsv = endpoint(handleOrdersExport);
