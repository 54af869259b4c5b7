import { z } from "zod";

export type DeadlineConfig = {
  bufferDays: number;
  maxTextLength: number;
};

export const DEFAULT_DEADLINE_CONFIG: Readonly<DeadlineConfig> =
  Object.freeze({
    bufferDays: 2,
    maxTextLength: 200_000,
  });

const Overrides = z
  .object({
    bufferDays: z.coerce.number().int().min(0).max(60),
    maxTextLength: z.coerce.number().int().min(1_000).max(5_000_000),
  })
  .partial();

type Overrides = z.infer<typeof Overrides>;

// invalid sources are skipped as a whole rather than half-applied
function overrides(raw: unknown): Overrides {
  const parsed = Overrides.safeParse(raw ?? {});
  if (!parsed.success) return {};
  const out: Overrides = {};
  if (parsed.data.bufferDays !== undefined) {
    out.bufferDays = parsed.data.bufferDays;
  }
  if (parsed.data.maxTextLength !== undefined) {
    out.maxTextLength = parsed.data.maxTextLength;
  }
  return out;
}

/**
 * Built-in defaults, then `SUPPLIER_BUFFER_DAYS` / `MAX_TEXT_LENGTH` from the
 * environment, then the runtime document stored in Firestore.
 */
export function resolveDeadlineConfig(
  runtime: unknown,
  env: NodeJS.ProcessEnv = process.env
): DeadlineConfig {
  const fromEnv = overrides({
    bufferDays: env.SUPPLIER_BUFFER_DAYS || undefined,
    maxTextLength: env.MAX_TEXT_LENGTH || undefined,
  });
  return {
    ...DEFAULT_DEADLINE_CONFIG,
    ...fromEnv,
    ...overrides(runtime),
  };
}
