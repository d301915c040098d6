/**
 * Adapter: NodeFileSystem
 *
 * Concrete FileSystem implementation backed by node:fs. Node errors are
 * wrapped into WcError("io_error") naming the path and the system code.
 *
 * Dependencies: node:fs, node:fs/promises.
 */

import { createReadStream } from "node:fs";
import { type FileHandle, open, opendir } from "node:fs/promises";
import type { Dir } from "node:fs";
import type {
  FileSystem,
  ReportWriter,
} from "../../domain/ports/filesystem.js";
import { WcError } from "../../domain/entities/errors.js";

function ioError(action: string, path: string, cause: unknown): WcError {
  const code = cause instanceof Error && "code" in cause &&
      typeof cause.code === "string"
    ? ` (${cause.code})`
    : "";
  return new WcError("io_error", `Failed to ${action}: ${path}${code}`, {
    cause,
  });
}

class NodeReportWriter implements ReportWriter {
  constructor(
    private readonly handle: FileHandle,
    private readonly path: string,
  ) {}

  async append(text: string): Promise<void> {
    try {
      await this.handle.write(text);
    } catch (e) {
      throw ioError("write file", this.path, e);
    }
  }

  async close(): Promise<void> {
    try {
      await this.handle.close();
    } catch (e) {
      throw ioError("close file", this.path, e);
    }
  }
}

export class NodeFileSystem implements FileSystem {
  async *readDir(path: string): AsyncIterable<string> {
    let dir: Dir;
    try {
      dir = await opendir(path);
    } catch (e) {
      throw ioError("open directory", path, e);
    }

    // for await closes the handle when the loop ends or throws
    try {
      for await (const entry of dir) {
        yield entry.name;
      }
    } catch (e) {
      throw ioError("read directory", path, e);
    }
  }

  async *readStream(path: string): AsyncIterable<string> {
    const stream = createReadStream(path, { encoding: "utf8" });
    try {
      for await (const chunk of stream) {
        if (typeof chunk === "string") {
          yield chunk;
        }
      }
    } catch (e) {
      throw ioError("read file", path, e);
    } finally {
      stream.destroy();
    }
  }

  async createWriter(path: string): Promise<ReportWriter> {
    let handle: FileHandle;
    try {
      handle = await open(path, "w");
    } catch (e) {
      throw ioError("create file", path, e);
    }
    return new NodeReportWriter(handle, path);
  }
}
