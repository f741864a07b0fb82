import { DetailedErrors, LatencyReport, LatencyStats, RequestOutcome, RunResult, SummaryReport } from './types.js';

export const NO_SUCCESS_MESSAGE = 'No successful requests.';
export const EXCEPTIONS_CATEGORY = 'exceptions';

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Nearest-rank 90th percentile: the value at sorted index floor(0.9 * n),
 * never interpolated.
 */
export function percentile90(sorted: readonly number[]): number {
  return sorted[Math.floor(sorted.length * 0.9)];
}

export function median(sorted: readonly number[]): number {
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) {
    return sorted[mid];
  }
  return (sorted[mid - 1] + sorted[mid]) / 2;
}

/** Sample standard deviation (n - 1). A single sample has no spread and reports 0. */
export function sampleStddev(values: readonly number[], mean: number): number {
  if (values.length < 2) {
    return 0;
  }
  const squares = values.reduce((acc, v) => acc + (v - mean) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}

export function calculateLatencyStats(latencies: readonly number[]): LatencyStats {
  if (latencies.length === 0) {
    throw new RangeError('Latency statistics need at least one sample');
  }

  const sorted = [...latencies].sort((a, b) => a - b);
  const mean = sorted.reduce((a, b) => a + b, 0) / sorted.length;

  return {
    mean,
    median: median(sorted),
    stddev: sampleStddev(sorted, mean),
    max: sorted[sorted.length - 1],
    min: sorted[0],
    p90: percentile90(sorted),
  };
}

export function summarize(run: RunResult): SummaryReport {
  const latencies: number[] = [];
  const detailed = new Map<string, string[]>();
  let failed = 0;

  for (const outcome of run) {
    if (outcome.kind === 'success') {
      latencies.push(outcome.latency);
      continue;
    }
    failed++;
    const [key, detail] = outcome.kind === 'error-status'
      ? [String(outcome.status), outcome.body]
      : [EXCEPTIONS_CATEGORY, outcome.message];
    const entries = detailed.get(key);
    if (entries) {
      entries.push(detail);
    } else {
      detailed.set(key, [detail]);
    }
  }

  const detailedErrors: DetailedErrors = Object.fromEntries(detailed);
  const counts = {
    total_requests: run.length,
    successful_requests: latencies.length,
    failed_requests: failed,
  };

  if (latencies.length === 0) {
    return Object.freeze({
      ...counts,
      message: NO_SUCCESS_MESSAGE,
      detailed_errors: detailedErrors,
    });
  }

  const stats = calculateLatencyStats(latencies);
  return Object.freeze({
    ...counts,
    mean_latency: roundTo(stats.mean, 4),
    median_latency: roundTo(stats.median, 4),
    stddev_latency: roundTo(stats.stddev, 4),
    max_latency: roundTo(stats.max, 4),
    min_latency: roundTo(stats.min, 4),
    '90th_percentile_latency': roundTo(stats.p90, 4),
    detailed_errors: detailedErrors,
  });
}

export function hasLatencyStats(report: SummaryReport): report is LatencyReport {
  return 'mean_latency' in report;
}

/** Sole owner of a run's outcomes; executors hand results back, only the driver records them. */
export class MetricsCollector {
  private outcomes: RequestOutcome[] = [];
  private startTime: number = 0;

  start(): void {
    this.startTime = performance.now();
  }

  elapsedMs(): number {
    return performance.now() - this.startTime;
  }

  record(outcome: RequestOutcome): void {
    this.outcomes.push(outcome);
  }

  get completed(): number {
    return this.outcomes.length;
  }

  getRunResult(): RunResult {
    return [...this.outcomes];
  }
}
