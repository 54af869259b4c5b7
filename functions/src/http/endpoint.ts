import { onRequest } from "firebase-functions/v2/https";
import * as logger from "firebase-functions/logger";
import { firestoreStore } from "../lib/firestore";
import { getRuntimeDeadlineConfig } from "../lib/runtimeConfig";
import { errorMessage } from "../lib/errors";
import type { HandlerDeps, HttpRequest, Reply } from "./handlers";

export const REGION = "europe-west1";

type Handler<T> = (req: HttpRequest, deps: HandlerDeps) => Promise<Reply<T>>;

/* ---------------- CORS ---------------- */
function setCors(res: { set(field: string, value: string): unknown }) {
  res.set("Access-Control-Allow-Origin", "*");
  res.set("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
  res.set("Access-Control-Allow-Headers", "Content-Type, Authorization");
}

/** Wraps a plain handler as an HTTPS function backed by Firestore. */
export function endpoint<T>(handler: Handler<T>) {
  return onRequest(
    { region: REGION, cors: true, timeoutSeconds: 60, memory: "256MiB" },
    async (req, res): Promise<void> => {
      setCors(res);
      try {
        const deps: HandlerDeps = {
          store: firestoreStore,
          config: await getRuntimeDeadlineConfig(),
        };
        const reply = await handler(
          { method: req.method, body: req.body, query: req.query },
          deps
        );
        if ("headers" in reply && reply.headers) {
          for (const [k, v] of Object.entries(reply.headers)) {
            res.setHeader(k, v);
          }
        }
        if (typeof reply.body === "string") {
          res.status(reply.status).send(reply.body);
          return;
        }
        res.status(reply.status).json(reply.body);
      } catch (e) {
        logger.error("endpoint ERROR:", e);
        res.status(500).json({ error: errorMessage(e) || "Server error" });
      }
    }
  );
}
