import pkg from '../package.json';
import type { LoadTestConfig } from './config';
import { Distribution } from './distribution';
import type { OutcomeRecorder, RunSummary } from './recorder';
import { getStatusCodeDistributionByCategory } from './stats';

export interface ReportMetadata {
  exportName?: string;
  runDate?: Date;
}

/**
 * Figures derived for display alongside the {@link RunSummary}. Latencies are
 * in seconds.
 */
export interface RunDetails {
  failedRequests: number;
  statusMismatches: number;
  transportErrors: number;
  minLatency: number;
  maxLatency: number;
  actualRps: number;
  targetRps: number;
  targetRequests: number;
  /** Wall-clock length of the run, in seconds. */
  duration: number;
}

export interface TestSummary {
  version: string;
  summary: RunSummary;
  details: RunDetails;
}

/**
 * The summary report in its on-disk JSON shape.
 */
export interface SummaryReport {
  total_requests: number;
  successful_requests: number;
  average_latency: number;
  error_rate: number;
  success_rate: number;
  '50th_percentile': number;
  '90th_percentile': number;
  '95th_percentile': number;
  '99th_percentile': number;
}

const toMs = (seconds: number): string => `${(seconds * 1000).toFixed(0)}ms`;

function minMax(values: readonly number[]): { min: number; max: number } {
  if (values.length === 0) return { min: 0, max: 0 };
  let min = Infinity;
  let max = -Infinity;
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return { min, max };
}

/**
 * Builds the summary of a finished run.
 * @param recorder The recorder returned by the run.
 * @param config The configuration the run used.
 * @param actualDurationSec Measured length of the run; defaults to the configured duration.
 */
export function generateSummary(
  recorder: OutcomeRecorder,
  config: LoadTestConfig,
  actualDurationSec?: number,
): TestSummary {
  const summary = recorder.summarize();
  const { min, max } = minMax(recorder.getLatencies());
  const duration = actualDurationSec ?? config.duration;

  return {
    version: pkg.version || 'unknown',
    summary,
    details: {
      failedRequests: recorder.getErrorCount(),
      statusMismatches: recorder.getStatusMismatchCount(),
      transportErrors: recorder.getTransportErrorCount(),
      minLatency: min,
      maxLatency: max,
      actualRps: duration > 0 ? summary.totalRequests / duration : 0,
      targetRps: config.qps,
      targetRequests: Math.round(config.qps * config.duration),
      duration,
    },
  };
}

/**
 * Maps a run summary onto the keys of the JSON summary report.
 */
export function toReportJson(summary: RunSummary): SummaryReport {
  return {
    total_requests: summary.totalRequests,
    successful_requests: summary.successfulRequests,
    average_latency: summary.averageLatency,
    error_rate: summary.errorRate,
    success_rate: summary.successRate,
    '50th_percentile': summary.p50,
    '90th_percentile': summary.p90,
    '95th_percentile': summary.p95,
    '99th_percentile': summary.p99,
  };
}

/**
 * Generates a Markdown report from a summary object.
 * @param testSummary The `TestSummary` object.
 * @param config The configuration the run used.
 * @param recorder The recorder returned by the run.
 * @param metadata Additional metadata for the report.
 */
export function generateMarkdownReport(
  testSummary: TestSummary,
  config: LoadTestConfig,
  recorder: OutcomeRecorder,
  metadata?: ReportMetadata,
): string {
  const { summary: s, details: d } = testSummary;

  let md = `# Load Test Report\n\n`;

  md += `| Metric | Value |\n`;
  md += `|---|---|\n`;
  md += `| Version | ${testSummary.version} |\n`;
  md += `| Target | ${config.method} ${config.url} |\n`;
  if (metadata?.exportName) {
    md += `| Export Name | ${metadata.exportName} |\n`;
  }
  if (metadata?.runDate) {
    md += `| Test Time | ${metadata.runDate.toLocaleString()} |\n`;
  }
  md += `\n`;

  const warnings: string[] = [];
  if (s.totalRequests > 0 && d.actualRps < config.qps * 0.8) {
    warnings.push(
      `**Target Rate Unreachable**: ${config.qps} req/s was requested but the run achieved ~${d.actualRps.toFixed(
        1,
      )} req/s. With an average latency of ${toMs(
        s.averageLatency,
      )}, ${config.concurrency} worker(s) may be too few.`,
    );
  }
  if (s.errorRate > 0.1) {
    warnings.push(
      `**High Error Rate**: ${(s.errorRate * 100).toFixed(
        1,
      )}% of requests did not return status ${config.expectedStatus}.`,
    );
  }
  if (warnings.length > 0) {
    md += `## Analysis & Warnings\n\n`;
    for (const warning of warnings) {
      md += `* ${warning}\n`;
    }
    md += `\n`;
  }

  md += `## Run Configuration\n\n`;
  md += `| Option | Setting |\n`;
  md += `|---|---|\n`;
  md += `| Method | ${config.method} |\n`;
  md += `| Target Req/s | ${config.qps} |\n`;
  md += `| Duration | ${config.duration}s |\n`;
  md += `| Concurrency | ${config.concurrency} |\n`;
  md += `| Timeout | ${config.timeout}s |\n`;
  md += `| Expected Status | ${config.expectedStatus} |\n\n`;

  md += `## Summary\n\n`;
  md += `| Stat | Value |\n`;
  md += `|---|---|\n`;
  md += `| Duration | ${d.duration.toFixed(1)}s |\n`;
  md += `| Total Requests | ${s.totalRequests} / ${d.targetRequests} |\n`;
  md += `| Successful | ${s.successfulRequests} |\n`;
  md += `| Failed | ${d.failedRequests} |\n`;
  md += `| Success Rate | ${(s.successRate * 100).toFixed(1)}% |\n`;
  md += `| Error Rate | ${(s.errorRate * 100).toFixed(1)}% |\n`;
  md += `| Req/s (Actual/Target) | ${d.actualRps.toFixed(1)} / ${d.targetRps} |\n`;
  md += `| Avg Latency | ${toMs(s.averageLatency)} |\n`;
  md += `| Min Latency | ${toMs(d.minLatency)} |\n`;
  md += `| Max Latency | ${toMs(d.maxLatency)} |\n`;
  md += `| p50 Latency | ${toMs(s.p50)} |\n`;
  md += `| p90 Latency | ${toMs(s.p90)} |\n`;
  md += `| p95 Latency | ${toMs(s.p95)} |\n`;
  md += `| p99 Latency | ${toMs(s.p99)} |\n\n`;

  const distribution = new Distribution(recorder.getLatencies());
  if (distribution.getTotalCount() > 0) {
    md += `## Latency Distribution\n\n`;
    md += `| Range (ms) | Count | % of Total | Cumulative % | Chart |\n`;
    md += `|---|---|---|---|---|\n`;
    for (const bucket of distribution.getLatencyDistribution({
      count: 8,
      chartWidth: 20,
    })) {
      if (bucket.count === 0) continue;
      md += `| ${bucket.latency} | ${bucket.count} | ${bucket.percent} | ${bucket.cumulative} | ${bucket.chart} |\n`;
    }
    md += `\n`;
  }

  const statusCodeMap = recorder.getStatusCodeMap();
  if (Object.keys(statusCodeMap).length > 0) {
    md += `## Responses by Status Code\n\n`;
    md += `| Status Code | Count |\n`;
    md += `|---|---|\n`;
    for (const [code, count] of Object.entries(statusCodeMap)) {
      md += `| ${code} | ${count} |\n`;
    }
    md += `\n`;
    md += `| Status Code Category | Count |\n`;
    md += `|---|---|\n`;
    for (const [category, count] of Object.entries(
      getStatusCodeDistributionByCategory(statusCodeMap),
    )) {
      md += `| ${category} | ${count} |\n`;
    }
    md += `\n`;
  }

  if (d.transportErrors > 0) {
    md += `## Transport Errors\n\n`;
    md += `| Error | Count |\n`;
    md += `|---|---|\n`;
    for (const [message, count] of recorder.getErrorMessageMap()) {
      md += `| ${message.replace(/\|/g, '\\|')} | ${count} |\n`;
    }
    md += `\n`;
  }

  return md;
}
