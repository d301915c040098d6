// RunWordCountUseCase - count words in every entry of an input directory

import { join } from "node:path";
import { WcError } from "../entities/errors.js";
import {
  DEFAULT_REPORT_NAME,
  formatRecordLine,
  type WordCountRecord,
  type WordCountReport,
} from "../entities/report.js";
import type { FileSystem } from "../ports/filesystem.js";
import { countWords } from "./scan-words.js";

export interface RunWordCountInput {
  readonly inputDir: string;
  readonly outputDir: string;
  readonly reportName?: string;
}

export class RunWordCountUseCase {
  constructor(private readonly fs: FileSystem) {}

  /**
   * Count the words of each entry of `inputDir`, one report line per entry
   * in `outputDir`. The first failure aborts the run; lines already
   * appended stay in the report file.
   */
  async execute(input: RunWordCountInput): Promise<WordCountReport> {
    const { inputDir, outputDir } = input;
    const reportName = input.reportName ?? DEFAULT_REPORT_NAME;

    const entries: string[] = [];
    for await (const name of this.fs.readDir(inputDir)) {
      entries.push(name);
    }
    if (entries.length === 0) {
      throw new WcError("empty_input", `No files found in ${inputDir}`);
    }

    const reportPath = join(outputDir, reportName);
    const writer = await this.fs.createWriter(reportPath);

    const records: WordCountRecord[] = [];
    let total = 0;
    let failed = false;
    let failure: unknown;
    try {
      for (const name of entries) {
        const words = await countWords(
          this.fs.readStream(join(inputDir, name)),
        );
        const record = { name, words };
        await writer.append(formatRecordLine(record));
        records.push(record);
        total += words;
      }
    } catch (e) {
      failed = true;
      failure = e;
    }

    // A close error is reported only when the run itself succeeded.
    try {
      await writer.close();
    } catch (closeError) {
      if (!failed) throw closeError;
    }
    if (failed) throw failure;

    return { records, total, reportPath };
  }
}
