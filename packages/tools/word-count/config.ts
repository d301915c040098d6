// Job configuration: flags, then environment, then defaults

import { z } from "zod/mini";
import { WcError } from "./domain/entities/errors.js";
import { DEFAULT_REPORT_NAME } from "./domain/entities/report.js";

export const DEFAULT_INPUT_DIR = "/inputs";
export const DEFAULT_OUTPUT_DIR = "/outputs";

export const ENV_INPUT_DIR = "WC_INPUT_DIR";
export const ENV_OUTPUT_DIR = "WC_OUTPUT_DIR";
export const ENV_REPORT_NAME = "WC_REPORT_NAME";

const ConfigSchema = z.object({
  inputDir: z.string().check(
    z.minLength(1, "input directory must not be empty"),
  ),
  outputDir: z.string().check(
    z.minLength(1, "output directory must not be empty"),
  ),
  reportName: z.string().check(
    z.minLength(1, "report name must not be empty"),
    z.regex(/^(?!\.\.?$)[^/\\]+$/, "report name must be a plain file name"),
  ),
});

export type JobConfig = z.infer<typeof ConfigSchema>;

export interface ConfigOverrides {
  readonly inputDir?: string;
  readonly outputDir?: string;
  readonly reportName?: string;
}

export type Env = Readonly<Record<string, string | undefined>>;

/**
 * Resolve the job configuration.
 * Throws WcError("invalid_args") listing every rejected setting.
 */
export function resolveConfig(
  overrides: ConfigOverrides,
  env: Env = process.env,
): JobConfig {
  const result = ConfigSchema.safeParse({
    inputDir: overrides.inputDir ?? env[ENV_INPUT_DIR] ?? DEFAULT_INPUT_DIR,
    outputDir: overrides.outputDir ?? env[ENV_OUTPUT_DIR] ??
      DEFAULT_OUTPUT_DIR,
    reportName: overrides.reportName ?? env[ENV_REPORT_NAME] ??
      DEFAULT_REPORT_NAME,
  });
  if (!result.success) {
    const reasons = result.error.issues.map((issue) => issue.message);
    throw new WcError("invalid_args", reasons.join("; "));
  }
  return result.data;
}
