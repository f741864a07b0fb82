#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, parseRunConfig, RawRunOptions, RunConfig } from './config.js';
import { HttpClient } from './http-client.js';
import { MetricsCollector, summarize } from './metrics.js';
import { printResults, writeReport } from './reporter.js';
import { plannedRequests, runLoadTest } from './scheduler.js';

const env = loadConfig();

async function run(url: string, options: RawRunOptions): Promise<void> {
  const cfg: RunConfig = parseRunConfig(url, {
    ...options,
    timeout: options.timeout ?? env.timeoutMs,
  });
  const quiet = cfg.format === 'json';
  const log = (message: string) => {
    if (!quiet) console.log(message);
  };

  const total = plannedRequests(cfg.qps, cfg.duration);
  log(`Starting load test for ${cfg.url}: ${total} requests @ ${cfg.qps} QPS for ${cfg.duration}s (concurrency ${cfg.concurrency})`);

  const controller = new AbortController();
  const onSigint = () => {
    log(chalk.yellow('\nInterrupted, waiting for in-flight requests...'));
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  const transport = new HttpClient({ timeoutMs: cfg.timeoutMs });
  const metrics = new MetricsCollector();
  const outcomes = await runLoadTest(transport, {
    url: cfg.url,
    method: cfg.method,
    headers: cfg.headers,
    payload: cfg.payload,
    qps: cfg.qps,
    duration: cfg.duration,
    concurrency: cfg.concurrency,
    strategy: cfg.strategy,
    signal: controller.signal,
    metrics,
    onOutcome: (_, completed) => {
      if (!quiet && (completed % 10 === 0 || completed === total)) {
        process.stdout.write(`\rProgress: ${completed}/${total}`);
      }
    },
  });
  const elapsed = metrics.elapsedMs();
  process.removeListener('SIGINT', onSigint);

  if (total > 0) log(''); // New line after progress
  log('Test complete.');

  const report = summarize(outcomes);
  await writeReport(report, cfg.output);
  printResults(report, { url: cfg.url, duration: elapsed }, { format: cfg.format });
  log(`Results written to ${cfg.output}`);
}

const program = new Command();

program
  .name('http-load')
  .description('Rate-controlled HTTP load generator')
  .version('1.0.0')
  .argument('<url>', 'URL to load test')
  .option('--qps <number>', 'Queries per second', '1')
  .option('--duration <seconds>', 'Duration of the test in seconds', '10')
  .option('--method <method>', 'HTTP method to use', 'GET')
  .option('--headers <json>', 'HTTP headers as JSON string', '{}')
  .option('--payload <json>', 'HTTP payload as JSON string', '{}')
  .option('--output <file>', 'Output file for results', env.output)
  .option('--concurrency <number>', 'Number of concurrent requests', '1')
  .option('--timeout <ms>', 'Per-request timeout in milliseconds (default: none)')
  .option('--strategy <strategy>', 'Concurrency bound: batch or window', 'batch')
  .option('--format <format>', 'Console output format: pretty, json', 'pretty')
  .action(async (url: string, options: RawRunOptions) => {
    try {
      await run(url, options);
      process.exit(0);
    } catch (error) {
      console.error(`Error: ${error instanceof Error ? error.message : 'An unknown error occurred'}`);
      process.exit(2);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(2);
});
