import { beforeEach, expect, test } from "vitest";
import { RunWordCountUseCase } from "./run-word-count.js";
import { InMemoryFileSystem } from "../../adapters/filesystem/in-memory-fs.js";
import { WcError } from "../entities/errors.js";
import type { ReportWriter } from "../ports/filesystem.js";

class FailingCloseFileSystem extends InMemoryFileSystem {
  override async createWriter(path: string): Promise<ReportWriter> {
    const writer = await super.createWriter(path);
    return {
      append: (text) => writer.append(text),
      close: async () => {
        await writer.close();
        throw new WcError("io_error", `Failed to close file: ${path}`);
      },
    };
  }
}

let fs: InMemoryFileSystem;
let useCase: RunWordCountUseCase;

beforeEach(() => {
  fs = new InMemoryFileSystem();
  fs.addDir("/outputs");
  useCase = new RunWordCountUseCase(fs);
});

async function rejection(promise: Promise<unknown>): Promise<WcError> {
  try {
    await promise;
  } catch (e) {
    if (e instanceof WcError) return e;
    throw e;
  }
  throw new Error("expected the run to fail");
}

const dirs = { inputDir: "/inputs", outputDir: "/outputs" };

test("run - writes one line per file and returns the total", async () => {
  fs.setFile("/inputs/file1.txt", "the quick fox");
  fs.setFile("/inputs/file2.txt", "a\nb\tc  d");

  const report = await useCase.execute(dirs);

  expect(report.records).toEqual([
    { name: "file1.txt", words: 3 },
    { name: "file2.txt", words: 4 },
  ]);
  expect(report.total).toBe(7);
  expect(report.reportPath).toBe("/outputs/count.txt");
  expect(fs.getFile("/outputs/count.txt")).toBe(
    "file1.txt has 3 words\nfile2.txt has 4 words\n",
  );
});

test("run - empty file counts zero words", async () => {
  fs.setFile("/inputs/empty.txt", "");

  const report = await useCase.execute(dirs);

  expect(report.total).toBe(0);
  expect(fs.getFile("/outputs/count.txt")).toBe("empty.txt has 0 words\n");
});

test("run - whitespace-only file counts zero words", async () => {
  fs.setFile("/inputs/blank.txt", "  \n\t\r\n  ");
  fs.setFile("/inputs/words.txt", "one two");

  const report = await useCase.execute(dirs);

  expect(report.records).toEqual([
    { name: "blank.txt", words: 0 },
    { name: "words.txt", words: 2 },
  ]);
  expect(report.total).toBe(2);
});

test("run - total is the sum of per-file counts", async () => {
  const contents = ["alpha", "beta gamma", "", " delta  epsilon zeta ", "\n"];
  contents.forEach((content, i) => fs.setFile(`/inputs/f${i}.txt`, content));

  const report = await useCase.execute(dirs);

  expect(report.records.map((r) => r.words)).toEqual([1, 2, 0, 3, 0]);
  expect(report.total).toBe(6);
});

test("run - keeps enumeration order instead of sorting", async () => {
  fs.setFile("/inputs/zeta.txt", "z");
  fs.setFile("/inputs/alpha.txt", "a a");

  const report = await useCase.execute(dirs);

  expect(report.records.map((r) => r.name)).toEqual(["zeta.txt", "alpha.txt"]);
});

test("run - uses the given report name", async () => {
  fs.setFile("/inputs/a.txt", "x y");

  const report = await useCase.execute({ ...dirs, reportName: "words.txt" });

  expect(report.reportPath).toBe("/outputs/words.txt");
  expect(fs.getFile("/outputs/words.txt")).toBe("a.txt has 2 words\n");
  expect(fs.getFile("/outputs/count.txt")).toBeUndefined();
});

test("run - running twice gives the same counts", async () => {
  fs.setFile("/inputs/a.txt", "one two three");
  fs.setFile("/inputs/b.txt", "four");

  const first = await useCase.execute(dirs);
  const second = await useCase.execute(dirs);

  expect(second.records).toEqual(first.records);
  expect(second.total).toBe(first.total);
  expect(fs.getFile("/outputs/count.txt")).toBe(
    "a.txt has 3 words\nb.txt has 1 words\n",
  );
});

test("run - empty input directory fails without creating a report", async () => {
  fs.addDir("/inputs");

  const error = await rejection(useCase.execute(dirs));

  expect(error.code).toBe("empty_input");
  expect(error.message).toBe("No files found in /inputs");
  expect(fs.getFile("/outputs/count.txt")).toBeUndefined();
});

test("run - missing input directory fails without creating a report", async () => {
  const error = await rejection(useCase.execute(dirs));

  expect(error.code).toBe("io_error");
  expect(error.message).toBe("Failed to open directory: /inputs");
  expect(fs.getFile("/outputs/count.txt")).toBeUndefined();
});

test("run - missing output directory fails before reading files", async () => {
  fs.setFile("/inputs/a.txt", "x");

  const error = await rejection(
    useCase.execute({ inputDir: "/inputs", outputDir: "/missing" }),
  );

  expect(error.code).toBe("io_error");
  expect(error.message).toBe("Failed to create file: /missing/count.txt");
});

test("run - unreadable file aborts the run and releases handles", async () => {
  fs.setFile("/inputs/a.txt", "one two");
  fs.setFile("/inputs/b.txt", "three");
  fs.setFile("/inputs/c.txt", "four five six");
  fs.markUnreadable("/inputs/b.txt");

  const error = await rejection(useCase.execute(dirs));

  expect(error.code).toBe("io_error");
  expect(error.message).toBe("Failed to read file: /inputs/b.txt");
  expect(fs.getFile("/outputs/count.txt")).toBe("a.txt has 2 words\n");
  expect(fs.openHandles).toEqual([]);
});

test("run - subdirectory entry fails like an unreadable file", async () => {
  fs.setFile("/inputs/a.txt", "one");
  fs.addDir("/inputs/nested");

  const error = await rejection(useCase.execute(dirs));

  expect(error.code).toBe("io_error");
  expect(error.message).toBe("Failed to read file: /inputs/nested");
  expect(fs.getFile("/outputs/count.txt")).toBe("a.txt has 1 words\n");
});

test("run - releases every handle after success", async () => {
  fs.setFile("/inputs/a.txt", "one two three four five");

  await useCase.execute(dirs);

  expect(fs.openHandles).toEqual([]);
});

test("run - read failure is reported even when closing the report fails", async () => {
  const failing = new FailingCloseFileSystem();
  failing.addDir("/outputs");
  failing.setFile("/inputs/a.txt", "one two");
  failing.markUnreadable("/inputs/a.txt");

  const error = await rejection(
    new RunWordCountUseCase(failing).execute(dirs),
  );

  expect(error.code).toBe("io_error");
  expect(error.message).toBe("Failed to read file: /inputs/a.txt");
  expect(failing.openHandles).toEqual([]);
});

test("run - close failure is reported when every file was counted", async () => {
  const failing = new FailingCloseFileSystem();
  failing.addDir("/outputs");
  failing.setFile("/inputs/a.txt", "one two");

  const error = await rejection(
    new RunWordCountUseCase(failing).execute(dirs),
  );

  expect(error.code).toBe("io_error");
  expect(error.message).toBe("Failed to close file: /outputs/count.txt");
  expect(failing.getFile("/outputs/count.txt")).toBe("a.txt has 2 words\n");
});
