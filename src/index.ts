import chalk from 'chalk';
import Table from 'cli-table3';
import { promises as fs } from 'fs';
import ora from 'ora';
import path from 'path';
import { performance } from 'perf_hooks';

import type { LoadTestConfig, LoadTestConfigInput } from './config';
import { loadConfig, resolveRequestSettings } from './config';
import { Distribution } from './distribution';
import { InvalidConfigurationError } from './errors';
import { exportDataFiles, writeJsonReport } from './exporter';
import type { HttpClient } from './http-client';
import type { OutcomeRecorder } from './recorder';
import { Runner } from './runner';
import { getStatusCodeDistributionByCategory } from './stats';
import type { TestSummary } from './summarizer';
import {
  generateMarkdownReport,
  generateSummary,
  toReportJson,
} from './summarizer';
import { getErrorMessage, getSafeDirectoryName } from './utils';

export type {
  HttpMethod,
  LoadTestConfig,
  LoadTestConfigInput,
  RequestSettings,
} from './config';
export {
  HTTP_METHODS,
  loadConfig,
  LoadTestConfigSchema,
  parseConfig,
  resolveRequestSettings,
} from './config';
export { InvalidConfigurationError } from './errors';
export type { HttpClient, HttpRequest, HttpResponse } from './http-client';
export { UndiciHttpClient } from './http-client';
export { RateLimiter } from './rate-limiter';
export type { RunSummary } from './recorder';
export { OutcomeRecorder } from './recorder';
export type { RunnerOptions } from './runner';
export { Runner } from './runner';
export { buildConfigJsonSchema } from './schema';
export type { Outcome, OutcomeResult } from './stats';
export { classifyOutcome, percentile } from './stats';
export type { TestSummary } from './summarizer';
export { generateSummary, toReportJson } from './summarizer';

/**
 * Defines the options for a load test run.
 */
export interface RunOptions {
  /** The configuration for the test. Can be a path to a file, a URL, or a configuration object. */
  config: string | LoadTestConfigInput;
  /** Suppress spinners and summary tables. Defaults to false. */
  quiet?: boolean;
  /** Sends the requests. Defaults to an undici client created for the run. */
  httpClient?: HttpClient;
}

const ms = (seconds: number): string => `${Math.ceil(seconds * 1000)}ms`;

function printRunConfiguration(config: LoadTestConfig): void {
  const configTable = new Table({
    head: ['Option', 'Setting'],
    colWidths: [20, 50],
  });
  configTable.push(
    ['Target', `${config.method} ${config.url}`],
    ['Target Req/s', config.qps],
    ['Duration', `${config.duration}s`],
    ['Concurrency', config.concurrency],
    ['Timeout', `${config.timeout}s`],
    ['Expected Status', config.expectedStatus],
  );

  // eslint-disable-next-line no-console
  console.log('\n' + chalk.bold('Run Configuration'));
  // eslint-disable-next-line no-console
  console.log(configTable.toString());
}

function printRunSummary(testSummary: TestSummary): void {
  const { summary: s, details: d } = testSummary;

  const summaryTable = new Table({
    head: ['Stat', 'Value'],
    colWidths: [30, 20],
  });
  summaryTable.push(
    ['Duration', `${d.duration.toFixed(1)}s`],
    ['Total Requests', `${s.totalRequests} / ${d.targetRequests}`],
    [chalk.green('Successful'), s.successfulRequests],
    [chalk.red('Failed'), d.failedRequests],
    ['Success Rate', `${(s.successRate * 100).toFixed(1)}%`],
    ['Error Rate', `${(s.errorRate * 100).toFixed(1)}%`],
    ['Req/s (Actual/Target)', `${d.actualRps.toFixed(1)} / ${d.targetRps}`],
    ['Avg Latency', ms(s.averageLatency)],
    ['Min Latency', ms(d.minLatency)],
    ['Max Latency', ms(d.maxLatency)],
    ['p50 Latency', ms(s.p50)],
    ['p90 Latency', ms(s.p90)],
    ['p95 Latency', ms(s.p95)],
    ['p99 Latency', ms(s.p99)],
  );

  // eslint-disable-next-line no-console
  console.log('\n' + chalk.bold('Summary'));
  // eslint-disable-next-line no-console
  console.log(summaryTable.toString());
}

function printOutcomeBreakdown(recorder: OutcomeRecorder): void {
  if (recorder.getErrorCount() === 0) return;

  const breakdownTable = new Table({
    head: ['Outcome', 'Count'],
    colWidths: [50, 10],
  });
  breakdownTable.push(
    [chalk.green('Success'), recorder.getSuccessCount()],
    [chalk.yellow('Status Mismatch'), recorder.getStatusMismatchCount()],
    [chalk.red('Transport Error'), recorder.getTransportErrorCount()],
  );
  for (const [message, count] of recorder.getErrorMessageMap()) {
    breakdownTable.push([chalk.gray(`  ${message}`), count]);
  }

  // eslint-disable-next-line no-console
  console.log('\n' + chalk.bold('Outcome Breakdown'));
  // eslint-disable-next-line no-console
  console.log(breakdownTable.toString());
}

function printStatusCodeDistribution(recorder: OutcomeRecorder): void {
  const statusCodeMap = recorder.getStatusCodeMap();
  if (Object.keys(statusCodeMap).length === 0) return;

  const distribution = getStatusCodeDistributionByCategory(statusCodeMap);
  const distributionTable = new Table({
    head: ['Status Code', 'Count'],
    colWidths: [15, 10],
  });
  for (const [code, count] of Object.entries(distribution)) {
    distributionTable.push([code, count]);
  }

  // eslint-disable-next-line no-console
  console.log('\n' + chalk.bold('Status Code Distribution'));
  // eslint-disable-next-line no-console
  console.log(distributionTable.toString());
}

function printLatencyDistribution(recorder: OutcomeRecorder): void {
  const distribution = new Distribution(recorder.getLatencies());
  if (distribution.getTotalCount() === 0) return;

  const distributionTable = new Table({
    head: ['Range (ms)', 'Count', '% of Total', 'Cumulative %', 'Chart'],
    colWidths: [15, 10, 15, 15, 25],
  });
  for (const bucket of distribution.getLatencyDistribution({
    count: 8,
    chartWidth: 20,
  })) {
    if (bucket.count === 0) continue;
    distributionTable.push([
      bucket.latency,
      bucket.count,
      bucket.percent,
      bucket.cumulative,
      chalk.green(bucket.chart),
    ]);
  }

  // eslint-disable-next-line no-console
  console.log('\n' + chalk.bold('Latency Distribution'));
  // eslint-disable-next-line no-console
  console.log(distributionTable.toString());
}

/**
 * Formats the one-line progress readout shown while a run is in flight.
 */
export function formatProgress(
  runner: Runner,
  config: LoadTestConfig,
  now: number = performance.now(),
): string {
  const startTime = runner.getStartTime();
  const elapsedSec = startTime > 0 ? (now - startTime) / 1000 : 0;
  const recorder = runner.getRecorder();
  const done = recorder?.totalCount ?? 0;
  const ok = recorder?.getSuccessCount() ?? 0;
  const failed = recorder?.getErrorCount() ?? 0;
  const histogram = recorder?.getLiveHistogram();
  const hasSamples = histogram !== undefined && histogram.totalCount > 0;
  const avg = hasSamples ? histogram.mean : 0;
  const p95 = hasSamples ? histogram.getValueAtPercentile(95) : 0;
  const p99 = hasSamples ? histogram.getValueAtPercentile(99) : 0;

  const failDisplay = failed > 0 ? chalk.red(failed) : chalk.gray(0);

  return `[${elapsedSec.toFixed(0)}s/${config.duration}s] Req: ${done}/${runner.getTargetRequestCount()} | Req/s: ${
    recorder?.getCurrentRps() ?? 0
  }/${config.qps} | OK/Fail: ${chalk.green(ok)}/${failDisplay} | Avg: ${avg.toFixed(
    0,
  )}ms | p95: ${p95.toFixed(0)}ms | p99: ${p99.toFixed(0)}ms`;
}

async function writeReports(
  testSummary: TestSummary,
  config: LoadTestConfig,
  recorder: OutcomeRecorder,
  quiet: boolean,
): Promise<void> {
  if (config.output) {
    try {
      await writeJsonReport(config.output, testSummary);
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error(
        chalk.red(`Failed to write report: ${getErrorMessage(err)}`),
      );
    }
  }

  if (!config.export) return;

  const exportSpinner = ora({
    text: 'Exporting results...',
    isSilent: quiet,
  }).start();
  try {
    const runDate = new Date();
    const reportDir = path.resolve(
      process.cwd(),
      getSafeDirectoryName(`${config.export}-${runDate.toISOString()}`),
    );
    await fs.mkdir(reportDir, { recursive: true });

    const markdownReport = generateMarkdownReport(testSummary, config, recorder, {
      exportName: config.export,
      runDate,
    });
    await fs.writeFile(path.join(reportDir, 'report.md'), markdownReport);
    await exportDataFiles(testSummary, recorder, reportDir, { quiet });

    exportSpinner.succeed(`Successfully exported results to ${reportDir}`);
  } catch (err) {
    exportSpinner.fail(
      chalk.red(`Failed to export results: ${getErrorMessage(err)}`),
    );
  }
}

/**
 * Runs a load test end to end: loads and validates the configuration, runs
 * the workers for the configured duration while showing progress, then
 * writes the requested reports and prints a summary.
 * @returns The summary of the run.
 * @throws InvalidConfigurationError when the configuration is invalid.
 */
export async function runLoadTest(options: RunOptions): Promise<TestSummary> {
  const quiet = options.quiet ?? false;
  const spinner = ora({ text: 'Loading config...', isSilent: quiet }).start();

  let config: LoadTestConfig;
  try {
    config = await loadConfig(options.config);
    const { method, url } = resolveRequestSettings(config);
    spinner.succeed(`Loaded config for ${method} ${url}`);
  } catch (err) {
    if (err instanceof InvalidConfigurationError) {
      spinner.fail('Config validation failed:');
      // eslint-disable-next-line no-console
      console.error(JSON.stringify(err.issues, null, 2));
    } else {
      spinner.fail(`Failed to load config: ${getErrorMessage(err)}`);
    }
    throw err;
  }

  const runner = new Runner(config, { httpClient: options.httpClient });

  const progressSpinner = ora({
    text: 'Test starting...',
    isSilent: quiet,
  }).start();
  const progressInterval = setInterval(() => {
    progressSpinner.text = formatProgress(runner, config);
  }, 1000);
  const handleInterrupt = (): void => {
    runner.stop();
  };
  process.on('SIGINT', handleInterrupt);
  runner.on('stop', () => {
    progressSpinner.text = 'Waiting for in-flight requests...';
  });

  let recorder: OutcomeRecorder;
  try {
    recorder = await runner.run();
  } catch (err) {
    progressSpinner.fail(chalk.red(`Test failed: ${getErrorMessage(err)}`));
    throw err;
  } finally {
    clearInterval(progressInterval);
    process.removeListener('SIGINT', handleInterrupt);
  }
  progressSpinner.succeed('Test finished. Generating summary...');

  const actualDurationSec = (performance.now() - runner.getStartTime()) / 1000;
  const testSummary = generateSummary(recorder, config, actualDurationSec);

  if (config.verbose) {
    // eslint-disable-next-line no-console
    console.log(JSON.stringify(toReportJson(testSummary.summary), null, 4));
  }

  await writeReports(testSummary, config, recorder, quiet);

  if (!quiet) {
    printRunConfiguration(config);
    printRunSummary(testSummary);
    printOutcomeBreakdown(recorder);
    printStatusCodeDistribution(recorder);
    printLatencyDistribution(recorder);
  }

  return testSummary;
}
