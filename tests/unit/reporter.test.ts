/**
 * Unit Tests: report file format and console output.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { summarize } from '../../src/metrics.js';
import { printResults, serializeReport, throughput, writeReport } from '../../src/reporter.js';
import { RequestOutcome } from '../../src/types.js';

const run: RequestOutcome[] = [
  { kind: 'success', latency: 0.25, status: 200 },
  { kind: 'success', latency: 0.75, status: 200 },
  { kind: 'error-status', latency: 0.1, status: 404, body: 'not here' },
];

describe('serializeReport', () => {
  it('indents with 4 spaces and keeps the snake_case keys', () => {
    const text = serializeReport(summarize(run));

    expect(text.split('\n').slice(0, 5)).toEqual([
      '{',
      '    "total_requests": 3,',
      '    "successful_requests": 2,',
      '    "failed_requests": 1,',
      '    "mean_latency": 0.5,',
    ]);
    expect(text).toContain('    "90th_percentile_latency": 0.75,');
    expect(text.endsWith('}\n')).toBe(true);
  });
});

describe('writeReport', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'http-load-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the report as JSON, creating parent directories', async () => {
    const report = summarize(run);
    const path = join(dir, 'nested', 'results.json');

    await writeReport(report, path);

    const text = await readFile(path, 'utf8');
    expect(text).toBe(serializeReport(report));
    expect(JSON.parse(text)).toEqual({
      total_requests: 3,
      successful_requests: 2,
      failed_requests: 1,
      mean_latency: 0.5,
      median_latency: 0.5,
      stddev_latency: 0.3536,
      max_latency: 0.75,
      min_latency: 0.25,
      '90th_percentile_latency': 0.75,
      detailed_errors: { '404': ['not here'] },
    });
  });
});

describe('throughput', () => {
  it('divides total requests by elapsed seconds', () => {
    expect(throughput(summarize(run), 1500)).toBe(2);
    expect(throughput(summarize(run), 0)).toBe(0);
  });
});

describe('printResults', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the report as JSON', () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const report = summarize(run);

    printResults(report, { url: 'http://localhost:8080/', duration: 1000 }, { format: 'json' });

    expect(write).toHaveBeenCalledWith(serializeReport(report));
  });

  it('prints a readable summary', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    printResults(summarize(run), { url: 'http://localhost:8080/', duration: 1500 });

    const lines = log.mock.calls.map(([line]) => String(line));
    expect(lines).toContain('  Total:        3');
    expect(lines).toContain('  Min:          250.0');
    expect(lines).toContain('  p90:          750.0');
    expect(lines.some((l) => l.includes('Target:') && l.endsWith('http://localhost:8080/'))).toBe(true);
  });

  it('prints the no-success message instead of latencies', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    printResults(summarize([{ kind: 'exception', message: 'fetch failed' }]), { url: 'http://localhost:8080/', duration: 10 });

    const lines = log.mock.calls.map(([line]) => String(line));
    expect(lines.some((l) => l.includes('No successful requests.'))).toBe(true);
    expect(lines.some((l) => l.includes('Latency (ms):'))).toBe(false);
  });
});
