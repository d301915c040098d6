/**
 * Port: FileSystem
 *
 * Abstracts the file system operations the word counter needs so the
 * domain can be tested without touching the disk.
 *
 * Dependencies: none.
 */

/** Append-only handle on a newly created file */
export interface ReportWriter {
  /** Append UTF-8 text at the end of the file */
  append(text: string): Promise<void>;

  /** Release the handle. Safe to call once per writer. */
  close(): Promise<void>;
}

export interface FileSystem {
  /**
   * List the direct entries of a directory, in the order the file system
   * returns them. Throws io_error when the directory cannot be opened or read.
   */
  readDir(path: string): AsyncIterable<string>;

  /**
   * Stream a file as UTF-8 text chunks. The file is opened lazily and
   * released when iteration ends, including early exit and failure.
   */
  readStream(path: string): AsyncIterable<string>;

  /** Create (or truncate) a file and return a writer on it. */
  createWriter(path: string): Promise<ReportWriter>;
}
