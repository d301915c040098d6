/**
 * Adapter: InMemoryFileSystem
 *
 * In-memory FileSystem implementation for testing.
 * Files live in a Map<string, string>, directories in a Set<string>.
 * Streams are served in fixed-size chunks so words can straddle chunk
 * boundaries.
 *
 * Dependencies: domain ports only.
 */

import { dirname } from "node:path";
import type {
  FileSystem,
  ReportWriter,
} from "../../domain/ports/filesystem.js";
import { WcError } from "../../domain/entities/errors.js";

export class InMemoryFileSystem implements FileSystem {
  private files = new Map<string, string>();
  private dirs = new Set<string>(["/"]);
  private unreadable = new Set<string>();
  private openStreams = new Set<string>();
  private openWriters = new Set<string>();

  constructor(private readonly chunkSize = 4) {}

  // --- FileSystem interface ---

  async *readDir(path: string): AsyncIterable<string> {
    if (!this.dirs.has(path) || this.unreadable.has(path)) {
      throw new WcError("io_error", `Failed to open directory: ${path}`);
    }
    const prefix = path.endsWith("/") ? path : path + "/";

    // Files first, then directories, each in insertion order
    for (const entryPath of [...this.files.keys(), ...this.dirs]) {
      if (entryPath.startsWith(prefix)) {
        const rest = entryPath.slice(prefix.length);
        if (rest !== "" && !rest.includes("/")) {
          yield rest;
        }
      }
    }
  }

  async *readStream(path: string): AsyncIterable<string> {
    const content = this.files.get(path);
    if (content === undefined || this.unreadable.has(path)) {
      throw new WcError("io_error", `Failed to read file: ${path}`);
    }

    this.openStreams.add(path);
    try {
      for (let i = 0; i < content.length; i += this.chunkSize) {
        yield content.slice(i, i + this.chunkSize);
      }
    } finally {
      this.openStreams.delete(path);
    }
  }

  createWriter(path: string): Promise<ReportWriter> {
    if (!this.dirs.has(dirname(path))) {
      return Promise.reject(
        new WcError("io_error", `Failed to create file: ${path}`),
      );
    }

    this.files.set(path, "");
    this.openWriters.add(path);
    const writer: ReportWriter = {
      append: (text) => {
        this.files.set(path, (this.files.get(path) ?? "") + text);
        return Promise.resolve();
      },
      close: () => {
        this.openWriters.delete(path);
        return Promise.resolve();
      },
    };
    return Promise.resolve(writer);
  }

  // --- Test helpers ---

  /** Create a directory and its parents */
  addDir(path: string): void {
    let current = path;
    while (!this.dirs.has(current)) {
      this.dirs.add(current);
      current = dirname(current);
    }
  }

  /** Set a file directly, creating its parent directories */
  setFile(path: string, content: string): void {
    this.addDir(dirname(path));
    this.files.set(path, content);
  }

  /** Make a file or directory fail on open */
  markUnreadable(path: string): void {
    this.unreadable.add(path);
  }

  /** Read back a stored file */
  getFile(path: string): string | undefined {
    return this.files.get(path);
  }

  /** Paths with a stream or writer still open */
  get openHandles(): string[] {
    return [...this.openStreams, ...this.openWriters];
  }
}
