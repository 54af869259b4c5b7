import { db } from "./firestore";
import { resolveDeadlineConfig, type DeadlineConfig } from "./config";

let cache: { at: number; data: DeadlineConfig } | null = null;
const TTL_MS = 60_000; // 1 minute cache

export async function getRuntimeDeadlineConfig(): Promise<DeadlineConfig> {
  const now = Date.now();
  if (cache && now - cache.at < TTL_MS) return cache.data;

  const snap = await db.doc("config/runtime/deadlines/current").get();
  const data = resolveDeadlineConfig(snap.exists ? snap.data() : undefined);
  cache = { at: now, data };
  return data;
}
