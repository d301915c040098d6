/**
 * CLI output formatters for the word-count job.
 *
 * Pure functions turning use-case results into what goes to stdout/stderr.
 */

import type { WcError } from "../../domain/entities/errors.js";
import type { WordCountReport } from "../../domain/entities/report.js";

export interface ReportJson {
  readonly records: ReadonlyArray<{ name: string; words: number }>;
  readonly total: number;
  readonly report: string;
}

// Two spaces after the colon.
export function formatTotal(report: WordCountReport): string {
  return `Total word count:  ${report.total}`;
}

export function toReportJson(report: WordCountReport): ReportJson {
  return {
    records: report.records.map((r) => ({ name: r.name, words: r.words })),
    total: report.total,
    report: report.reportPath,
  };
}

export function formatError(error: WcError): string {
  return `error: ${error.message}`;
}
