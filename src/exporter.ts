import chalk from 'chalk';
import { writeFile } from 'fs/promises';
import ora from 'ora';
import { join } from 'path';
import * as xlsx from 'xlsx';

import type { OutcomeRecorder } from './recorder';
import type { Outcome } from './stats';
import { getStatusCodeDistributionByCategory } from './stats';
import type { TestSummary } from './summarizer';
import { toReportJson } from './summarizer';
import { getErrorMessage } from './utils';

/**
 * Writes the JSON summary report (4-space indentation).
 */
export async function writeJsonReport(
  path: string,
  testSummary: TestSummary,
): Promise<void> {
  const report = toReportJson(testSummary.summary);
  await writeFile(path, JSON.stringify(report, null, 4), 'utf-8');
}

const csvField = (value: string): string => `"${value.replace(/"/g, '""')}"`;

async function exportRawLog(
  path: string,
  outcomes: readonly Outcome[],
): Promise<void> {
  const headers = ['timestamp', 'result', 'status', 'latencyMs', 'error'];
  const rows = outcomes.map((o) =>
    [
      o.timestamp,
      o.result,
      o.statusCode ?? '',
      (o.latencySeconds * 1000).toFixed(0),
      csvField(o.error ?? ''),
    ].join(','),
  );
  const csv = [headers.join(','), ...rows].join('\n');
  await writeFile(path, csv, 'utf-8');
}

async function exportXlsx(
  path: string,
  testSummary: TestSummary,
  recorder: OutcomeRecorder,
): Promise<void> {
  const { summary, details } = testSummary;
  const wb = xlsx.utils.book_new();

  const summaryRows: { Stat: string; Value: number | string }[] = [
    { Stat: 'Version', Value: testSummary.version },
    ...Object.entries(toReportJson(summary)).map(([key, value]) => ({
      Stat: key,
      Value: value,
    })),
    ...Object.entries(details).map(([key, value]) => ({
      Stat: key,
      Value: value,
    })),
  ];
  xlsx.utils.book_append_sheet(
    wb,
    xlsx.utils.json_to_sheet(summaryRows),
    'Summary',
  );

  const statusCodeMap = recorder.getStatusCodeMap();
  const statusRows = [
    ...Object.entries(statusCodeMap).map(([code, count]) => ({
      'Status Code': code,
      Count: count,
    })),
    ...Object.entries(getStatusCodeDistributionByCategory(statusCodeMap)).map(
      ([category, count]) => ({ 'Status Code': category, Count: count }),
    ),
  ];
  xlsx.utils.book_append_sheet(
    wb,
    xlsx.utils.json_to_sheet(statusRows),
    'Status Codes',
  );

  const errorRows = Array.from(recorder.getErrorMessageMap()).map(
    ([message, count]) => ({ Error: message, Count: count }),
  );
  if (errorRows.length > 0) {
    xlsx.utils.book_append_sheet(
      wb,
      xlsx.utils.json_to_sheet(errorRows),
      'Transport Errors',
    );
  }

  const buffer: Buffer = xlsx.write(wb, { type: 'buffer', bookType: 'xlsx' });
  await writeFile(path, buffer);
}

/**
 * Exports the outcomes of a run to `results.csv` and `report.xlsx` in
 * `directory`. Failures are reported on the spinner, not thrown.
 */
export async function exportDataFiles(
  testSummary: TestSummary,
  recorder: OutcomeRecorder,
  directory: string,
  options: { quiet?: boolean } = {},
): Promise<void> {
  const exportSpinner = ora({
    text: 'Exporting data files (CSV, XLSX)...',
    isSilent: options.quiet,
  }).start();
  try {
    await Promise.all([
      exportRawLog(join(directory, 'results.csv'), recorder.getOutcomes()),
      exportXlsx(join(directory, 'report.xlsx'), testSummary, recorder),
    ]);
    exportSpinner.succeed('Successfully exported raw log (CSV & XLSX)');
  } catch (err) {
    exportSpinner.fail(
      chalk.red(`Failed to save data files: ${getErrorMessage(err)}`),
    );
  }
}
