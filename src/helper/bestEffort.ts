import { recordFetchEvent } from "./fetchTelemetry";
import { formatError } from "./formatError";

export type BestEffort<T, F = T> =
  | { ok: true; value: T }
  | { ok: false; fallback: F; error: unknown };

/**
 * Run an optional enrichment step. A failure is logged and reported through
 * the result with `fallback` instead of aborting the surrounding report.
 * `operation` names the step in telemetry; per-call context goes in `detail`.
 */
export async function bestEffort<T, F = T>(
  operation: string,
  run: () => Promise<T>,
  fallback: F,
  detail?: string
): Promise<BestEffort<T, F>> {
  try {
    return { ok: true, value: await run() };
  } catch (err) {
    const context = detail ? ` ${detail}` : "";
    console.warn(`[best-effort] ${operation}${context} failed, using fallback error=${formatError(err)}`);
    recordFetchEvent({ namespace: "best-effort", operation, source: "fallback", detail });
    return { ok: false, fallback, error: err };
  }
}

export function valueOrFallback<T>(result: BestEffort<T, T>): T {
  return result.ok ? result.value : result.fallback;
}
