import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import chalk from 'chalk';
import { OutputFormat } from './config.js';
import { hasLatencyStats } from './metrics.js';
import { SummaryReport } from './types.js';

export interface ReporterOptions {
  format: OutputFormat;
}

export interface RunInfo {
  url: string;
  /** Wall-clock run time in milliseconds. */
  duration: number;
}

export function serializeReport(report: SummaryReport): string {
  return `${JSON.stringify(report, null, 4)}\n`;
}

export async function writeReport(report: SummaryReport, path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, serializeReport(report), 'utf8');
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function formatLatency(seconds: number): string {
  return (seconds * 1000).toFixed(1);
}

export function throughput(report: SummaryReport, durationMs: number): number {
  return durationMs > 0 ? report.total_requests / (durationMs / 1000) : 0;
}

export function printResults(report: SummaryReport, info: RunInfo, options: ReporterOptions = { format: 'pretty' }): void {
  switch (options.format) {
    case 'json':
      process.stdout.write(serializeReport(report));
      break;
    default:
      printPretty(report, info);
  }
}

function printPretty(report: SummaryReport, info: RunInfo): void {
  const successRate = report.total_requests > 0
    ? ((report.successful_requests / report.total_requests) * 100).toFixed(1)
    : '0';

  console.log('');
  console.log(chalk.bold('HTTP Load Test Results'));
  console.log(chalk.gray('══════════════════════════════════════'));
  console.log(`${chalk.cyan('Target:')}        ${info.url}`);
  console.log(`${chalk.cyan('Duration:')}      ${formatDuration(info.duration)}`);
  console.log('');

  console.log(chalk.bold('Requests:'));
  console.log(`  Total:        ${report.total_requests}`);
  console.log(`  Succeeded:    ${chalk.green(report.successful_requests)} (${successRate}%)`);
  console.log(`  Failed:       ${chalk.red(report.failed_requests)}`);
  console.log('');

  if (hasLatencyStats(report)) {
    console.log(chalk.bold('Latency (ms):'));
    console.log(`  Min:          ${formatLatency(report.min_latency)}`);
    console.log(`  Max:          ${formatLatency(report.max_latency)}`);
    console.log(`  Mean:         ${formatLatency(report.mean_latency)}`);
    console.log(`  Median:       ${formatLatency(report.median_latency)}`);
    console.log(`  Stddev:       ${formatLatency(report.stddev_latency)}`);
    console.log(`  p90:          ${formatLatency(report['90th_percentile_latency'])}`);
    console.log('');
  } else {
    console.log(chalk.yellow(report.message));
    console.log('');
  }

  const categories = Object.entries(report.detailed_errors);
  if (categories.length > 0) {
    console.log(chalk.bold('Errors:'));
    for (const [category, details] of categories) {
      console.log(`  ${chalk.red(category)}:  ${details.length}`);
    }
    console.log('');
  }

  console.log(`${chalk.cyan('Throughput:')}   ${chalk.bold(throughput(report, info.duration).toFixed(1))} req/s`);
  console.log(chalk.gray('══════════════════════════════════════'));
  console.log('');
}
