#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import yargs from "yargs";
import { WcError } from "./domain/entities/errors.js";
import { DEFAULT_REPORT_NAME } from "./domain/entities/report.js";
import type { FileSystem } from "./domain/ports/filesystem.js";
import { RunWordCountUseCase } from "./domain/use-cases/run-word-count.js";
import { NodeFileSystem } from "./adapters/filesystem/node-fs.js";
import {
  formatError,
  formatTotal,
  toReportJson,
} from "./adapters/cli/formatter.js";
import {
  DEFAULT_INPUT_DIR,
  DEFAULT_OUTPUT_DIR,
  ENV_INPUT_DIR,
  ENV_OUTPUT_DIR,
  ENV_REPORT_NAME,
  type Env,
  resolveConfig,
} from "./config.js";

// ============================================================================
// Version
// ============================================================================

const VERSION = "0.1.0";

// ============================================================================
// Job
// ============================================================================

/** Collaborators main() runs against; tests swap them out */
export interface CliDeps {
  readonly fs?: FileSystem;
  readonly env?: Env;
}

interface JobOptions {
  readonly input?: string;
  readonly output?: string;
  readonly report?: string;
  readonly json: boolean;
}

function handleError(e: unknown, json: boolean): number {
  if (e instanceof WcError) {
    if (json) {
      console.error(JSON.stringify(e.toJSON()));
    } else {
      console.error(formatError(e));
    }
    return 1;
  }
  throw e;
}

async function runJob(options: JobOptions, deps: CliDeps): Promise<number> {
  try {
    const config = resolveConfig(
      {
        inputDir: options.input,
        outputDir: options.output,
        reportName: options.report,
      },
      deps.env ?? process.env,
    );
    const useCase = new RunWordCountUseCase(deps.fs ?? new NodeFileSystem());
    const report = await useCase.execute(config);
    console.log(
      options.json ? JSON.stringify(toReportJson(report)) : formatTotal(report),
    );
    return 0;
  } catch (e) {
    return handleError(e, options.json);
  }
}

// ============================================================================
// CLI with yargs
// ============================================================================

/**
 * Run the CLI and resolve to the process exit code.
 */
export async function main(
  args: string[],
  deps: CliDeps = {},
): Promise<number> {
  let exitCode = 0;

  const parser = yargs(args)
    .scriptName("wc-job")
    .command(
      "$0",
      "Count the words of every file in the input directory",
      (y) =>
        y
          .option("input", {
            alias: "i",
            type: "string",
            description:
              `Input directory (env ${ENV_INPUT_DIR}, default ${DEFAULT_INPUT_DIR})`,
          })
          .option("output", {
            alias: "o",
            type: "string",
            description:
              `Output directory (env ${ENV_OUTPUT_DIR}, default ${DEFAULT_OUTPUT_DIR})`,
          })
          .option("report", {
            type: "string",
            description:
              `Report file name (env ${ENV_REPORT_NAME}, default ${DEFAULT_REPORT_NAME})`,
          })
          .option("json", {
            type: "boolean",
            default: false,
            description: "Output the report as JSON",
          }),
      async (argv) => {
        exitCode = await runJob(argv, deps);
      },
    )
    .version(VERSION)
    .help()
    .strict()
    .exitProcess(false)
    .fail((msg, err) => {
      throw err ?? new WcError("invalid_args", msg);
    });

  try {
    await parser.parseAsync();
  } catch (e) {
    const json = args.some((arg) => /^--json(=true)?$/.test(arg));
    return handleError(e, json);
  }
  return exitCode;
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      console.error(e);
      process.exitCode = 1;
    },
  );
}
