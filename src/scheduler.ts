import { executeRequest } from './executor.js';
import { Transport } from './http-client.js';
import { MetricsCollector } from './metrics.js';
import { LoadTestOptions, RequestSpec, RunResult, SleepFunction } from './types.js';

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export const sleep: SleepFunction = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export function plannedRequests(qps: number, duration: number): number {
  return Math.floor(qps * duration);
}

/**
 * Drives a paced run: one dispatch every 1/qps seconds, at most
 * `concurrency` attempts unfinished at any time.
 *
 * Pacing is a fixed delay per dispatch, independent of response time, so
 * the achieved rate drops below `qps` once latency exceeds concurrency/qps.
 * The returned RunResult holds one outcome per dispatched attempt, in
 * completion order. Aborting `signal` stops dispatching; attempts already
 * in flight still finish and are reported. Pass `metrics` to read the
 * run's wall-clock time afterwards.
 */
export async function runLoadTest(transport: Transport, options: LoadTestOptions): Promise<RunResult> {
  const {
    qps,
    duration,
    concurrency,
    strategy = 'batch',
    signal,
    onOutcome,
    sleep: pause = sleep,
    metrics = new MetricsCollector(),
  } = options;
  const request: RequestSpec = {
    url: options.url,
    method: options.method,
    headers: options.headers,
    payload: options.payload,
  };

  const total = plannedRequests(qps, duration);
  metrics.start();
  if (total === 0) {
    return metrics.getRunResult();
  }

  const interval = 1000 / qps;
  // window: attempts still running; batch: every attempt since the last barrier
  const inFlight = new Set<Promise<void>>();
  let batch: Promise<void>[] = [];

  const dispatch = () => {
    const p = executeRequest(transport, request).then((outcome) => {
      metrics.record(outcome);
      inFlight.delete(p);
      try {
        onOutcome?.(outcome, metrics.completed, total);
      } catch (error) {
        console.error(`Progress callback failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    });
    inFlight.add(p);
    batch.push(p);
  };

  for (let i = 0; i < total; i++) {
    if (signal?.aborted) break;

    if (strategy === 'window' && inFlight.size >= concurrency) {
      await Promise.race(inFlight);
      if (signal?.aborted) break;
    } else if (strategy === 'batch' && batch.length >= concurrency) {
      // Barrier: the whole batch drains before the next one starts
      await Promise.all(batch);
      batch = [];
      if (signal?.aborted) break;
    }

    dispatch();
    await pause(interval, signal);
  }

  await Promise.all(inFlight);
  return metrics.getRunResult();
}
