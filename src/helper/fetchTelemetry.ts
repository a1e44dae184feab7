import { AsyncLocalStorage } from "node:async_hooks";

export type FetchSource = "api" | "refetch" | "fallback";

type FetchEvent = {
  namespace: string;
  operation: string;
  source: FetchSource;
  detail?: string;
};

type Totals = Record<FetchSource, number>;

type Batch = {
  job: string;
  startedAtMs: number;
  operationTotals: Map<string, Totals>;
};

const operationTotals = new Map<string, Totals>();
const telemetryBatchStorage = new AsyncLocalStorage<Batch>();

function makeEmptyTotals(): Totals {
  return { api: 0, refetch: 0, fallback: 0 };
}

function formatTotals(totals: Totals): string {
  return `api=${totals.api}, refetch=${totals.refetch}, fallback=${totals.fallback}`;
}

function getOrCreateTotals(map: Map<string, Totals>, key: string): Totals {
  const existing = map.get(key);
  if (existing) return existing;
  const created = makeEmptyTotals();
  map.set(key, created);
  return created;
}

/**
 * Run `run` with upstream fetch events grouped under `job`; one summary line is
 * logged when it settles instead of one line per call.
 */
export async function runFetchTelemetryBatch<T>(job: string, run: () => Promise<T>): Promise<T> {
  if (telemetryBatchStorage.getStore()) return run();

  const store: Batch = { job, startedAtMs: Date.now(), operationTotals: new Map() };
  return telemetryBatchStorage.run(store, async () => {
    try {
      return await run();
    } finally {
      if (store.operationTotals.size > 0) {
        const overall = makeEmptyTotals();
        const details = [...store.operationTotals.entries()]
          .sort(([a], [b]) => a.localeCompare(b))
          .map(([opKey, totals]) => {
            overall.api += totals.api;
            overall.refetch += totals.refetch;
            overall.fallback += totals.fallback;
            return `${opKey}{${formatTotals(totals)}}`;
          });
        console.info(
          `[telemetry-job] job=${store.job} duration_ms=${Date.now() - store.startedAtMs} totals(${formatTotals(
            overall
          )}) details=${details.join("; ")}`
        );
      }
    }
  });
}

export function recordFetchEvent(event: FetchEvent): void {
  const opKey = `${event.namespace}:${event.operation}`;
  const totals = getOrCreateTotals(operationTotals, opKey);
  totals[event.source] += 1;

  const batch = telemetryBatchStorage.getStore();
  if (batch) {
    getOrCreateTotals(batch.operationTotals, opKey)[event.source] += 1;
    return;
  }

  const suffix = event.detail ? ` ${event.detail}` : "";
  console.info(
    `[telemetry] ns=${event.namespace} op=${event.operation} source=${event.source} totals(${formatTotals(
      totals
    )})${suffix}`
  );
}

/** Snapshot of the process-wide counters for one operation. */
export function getFetchTotals(namespace: string, operation: string): Totals {
  return { ...(operationTotals.get(`${namespace}:${operation}`) ?? makeEmptyTotals()) };
}
