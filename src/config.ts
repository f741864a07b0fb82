import { config } from 'dotenv';
import { ConcurrencyStrategy } from './types.js';

config();

export type OutputFormat = 'pretty' | 'json';

export interface EnvConfig {
  output: string;
  timeoutMs?: string;
}

/** Raw option strings as they arrive from the command line. */
export interface RawRunOptions {
  qps: string;
  duration: string;
  method: string;
  headers: string;
  payload: string;
  output: string;
  concurrency: string;
  timeout?: string;
  strategy: string;
  format: string;
}

export interface RunConfig {
  url: string;
  qps: number;
  duration: number;
  method: string;
  headers: Record<string, string>;
  payload: unknown;
  output: string;
  concurrency: number;
  timeoutMs?: number;
  strategy: ConcurrencyStrategy;
  format: OutputFormat;
}

export class ConfigError extends Error {
  option?: string;

  constructor(message: string, option?: string) {
    super(message);
    this.name = 'ConfigError';
    this.option = option;
  }
}

export function loadConfig(): EnvConfig {
  return {
    output: process.env.LOAD_TEST_OUTPUT || 'results.json',
    timeoutMs: process.env.LOAD_TEST_TIMEOUT_MS || undefined,
  };
}

function parseUrl(value: string): string {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new ConfigError(`Invalid URL: ${value}`, 'url');
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigError(`Unsupported protocol ${parsed.protocol} (use http or https)`, 'url');
  }
  return value;
}

function parseNumber(value: string, option: string): number {
  const n = Number(value.trim());
  if (value.trim() === '' || !Number.isFinite(n)) {
    throw new ConfigError(`--${option} must be a number, got "${value}"`, option);
  }
  return n;
}

function parseInteger(value: string, option: string, min: number): number {
  const n = parseNumber(value, option);
  if (!Number.isInteger(n) || n < min) {
    throw new ConfigError(`--${option} must be an integer >= ${min}, got "${value}"`, option);
  }
  return n;
}

function parseJson(value: string, option: string): unknown {
  try {
    return JSON.parse(value);
  } catch (error) {
    throw new ConfigError(`--${option} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`, option);
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseHeaders(value: string): Record<string, string> {
  const parsed = parseJson(value, 'headers');
  if (!isPlainObject(parsed)) {
    throw new ConfigError('--headers must be a JSON object', 'headers');
  }

  const headers: Record<string, string> = {};
  for (const [name, v] of Object.entries(parsed)) {
    if (typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean') {
      headers[name] = String(v);
    } else {
      throw new ConfigError(`Header "${name}" must be a string, number or boolean`, 'headers');
    }
  }
  return headers;
}

function parseMethod(value: string): string {
  const method = value.trim().toUpperCase();
  if (!/^[A-Z]+$/.test(method)) {
    throw new ConfigError(`Invalid HTTP method: ${value}`, 'method');
  }
  return method;
}

function parseChoice<T extends string>(value: string, option: string, choices: readonly T[]): T {
  const match = choices.find((c) => c === value);
  if (!match) {
    throw new ConfigError(`--${option} must be one of ${choices.join(', ')}, got "${value}"`, option);
  }
  return match;
}

/** Validates everything up front; a bad option aborts before any request is sent. */
export function parseRunConfig(url: string, raw: RawRunOptions): RunConfig {
  const qps = parseNumber(raw.qps, 'qps');
  if (qps <= 0) {
    throw new ConfigError(`--qps must be greater than 0, got "${raw.qps}"`, 'qps');
  }

  return {
    url: parseUrl(url),
    qps,
    duration: parseInteger(raw.duration, 'duration', 1),
    method: parseMethod(raw.method),
    headers: parseHeaders(raw.headers),
    payload: parseJson(raw.payload, 'payload'),
    output: raw.output,
    concurrency: parseInteger(raw.concurrency, 'concurrency', 1),
    timeoutMs: raw.timeout === undefined ? undefined : parseInteger(raw.timeout, 'timeout', 1),
    strategy: parseChoice(raw.strategy, 'strategy', ['batch', 'window'] as const),
    format: parseChoice(raw.format, 'format', ['pretty', 'json'] as const),
  };
}
