// Report entities for a single word-count run

/** Default name of the report file written to the output directory */
export const DEFAULT_REPORT_NAME = "count.txt";

/** Word count of one input entry */
export interface WordCountRecord {
  readonly name: string;
  readonly words: number;
}

/** Result of a complete run, records in enumeration order */
export interface WordCountReport {
  readonly records: readonly WordCountRecord[];
  readonly total: number;
  readonly reportPath: string;
}

/**
 * Line written to the report file for one entry.
 * Includes the trailing newline.
 */
export function formatRecordLine(record: WordCountRecord): string {
  return `${record.name} has ${record.words} words\n`;
}
