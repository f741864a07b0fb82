import type { MetricsCollector } from './metrics.js';

export interface SuccessOutcome {
  kind: 'success';
  /** Seconds between dispatch and response headers. */
  latency: number;
  status: number;
}

export interface ErrorStatusOutcome {
  kind: 'error-status';
  latency: number;
  status: number;
  /** Response body, kept for diagnostics. */
  body: string;
}

export interface ExceptionOutcome {
  kind: 'exception';
  message: string;
}

export type RequestOutcome = Readonly<SuccessOutcome | ErrorStatusOutcome | ExceptionOutcome>;

/** Outcomes of one run, in completion order. */
export type RunResult = readonly RequestOutcome[];

export interface RequestSpec {
  url: string;
  method: string;
  headers: Record<string, string>;
  payload: unknown;
}

export type ConcurrencyStrategy = 'batch' | 'window';

export type SleepFunction = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface LoadTestOptions extends RequestSpec {
  qps: number;
  duration: number;
  concurrency: number;
  strategy?: ConcurrencyStrategy;
  signal?: AbortSignal;
  onOutcome?: (outcome: RequestOutcome, completed: number, total: number) => void;
  sleep?: SleepFunction;
  metrics?: MetricsCollector;
}

export interface LatencyStats {
  mean: number;
  median: number;
  stddev: number;
  max: number;
  min: number;
  p90: number;
}

export type DetailedErrors = Record<string, string[]>;

interface ReportCounts {
  total_requests: number;
  successful_requests: number;
  failed_requests: number;
}

export interface LatencyReport extends ReportCounts {
  mean_latency: number;
  median_latency: number;
  stddev_latency: number;
  max_latency: number;
  min_latency: number;
  '90th_percentile_latency': number;
  detailed_errors: DetailedErrors;
}

export interface NoSuccessReport extends ReportCounts {
  message: string;
  detailed_errors: DetailedErrors;
}

export type SummaryReport = LatencyReport | NoSuccessReport;
