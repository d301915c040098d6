// Main module exports for word-count

// ============================================================================
// Domain entities
// ============================================================================

export type { WcErrorCode } from "./domain/entities/errors.js";
export { WcError } from "./domain/entities/errors.js";
export type {
  WordCountRecord,
  WordCountReport,
} from "./domain/entities/report.js";
export {
  DEFAULT_REPORT_NAME,
  formatRecordLine,
} from "./domain/entities/report.js";

// ============================================================================
// Domain ports (interfaces)
// ============================================================================

export type { FileSystem, ReportWriter } from "./domain/ports/filesystem.js";

// ============================================================================
// Use cases
// ============================================================================

export {
  countWords,
  isSpace,
  scanWords,
} from "./domain/use-cases/scan-words.js";
export {
  type RunWordCountInput,
  RunWordCountUseCase,
} from "./domain/use-cases/run-word-count.js";

// ============================================================================
// Adapters
// ============================================================================

export { NodeFileSystem } from "./adapters/filesystem/node-fs.js";
export { InMemoryFileSystem } from "./adapters/filesystem/in-memory-fs.js";

// ============================================================================
// Configuration
// ============================================================================

export {
  type ConfigOverrides,
  type JobConfig,
  resolveConfig,
} from "./config.js";
