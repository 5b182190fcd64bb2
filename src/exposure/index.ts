/**
 * Exposure module — barrel exports.
 *
 * @module exposure
 */

export type {
  ExposureSet,
  Problem,
  ProblemKind,
  ProblemSeverity,
  SourceProblem,
  UnexposedTestsProblem,
  MissingModuleDeclarationProblem,
  OpenFailedProblem,
  ReadFailedProblem,
  ParseErrorProblem,
  CheckResult,
  ReadExposingResult,
} from './types.js';

export {
  stripComments,
  stripCommentLines,
  LINE_COMMENT,
  BLOCK_COMMENT_OPEN,
  BLOCK_COMMENT_CLOSE,
} from './comment-stripper.js';
export type { StrippedLine } from './comment-stripper.js';

export {
  initialScanState,
  advanceHeaderScan,
  finishHeaderScan,
  parseExposingClause,
  isModuleLine,
  scanHeader,
  WILDCARD_TOKEN,
} from './header-scanner.js';
export type { ScanState, ScanStep, ScanOutcome } from './header-scanner.js';

export {
  readSourceLines,
  sourceProblemFromError,
  SourceOpenError,
  SourceReadError,
} from './source-reader.js';

export { readExposing, reconcileExposure, filterExposing } from './exposure-checker.js';

export {
  discoverTestNames,
  findTestNames,
  TestAnnotationMatcher,
  DEFAULT_TEST_TYPES,
} from './test-discovery.js';
export type { DiscoveryResult } from './test-discovery.js';

export { moduleNameFromPath } from './module-name.js';

export { findModuleFiles } from './module-finder.js';
export type { ModuleFile, FindOptions, FindResult } from './module-finder.js';

export {
  checkModules,
  mapWithConcurrency,
  summarizeChecks,
  DEFAULT_CONCURRENCY,
} from './batch-checker.js';
export type {
  ModuleTarget,
  ModuleCheck,
  BatchOptions,
  BatchProgress,
  BatchReport,
  BatchStats,
} from './batch-checker.js';

export {
  problemSeverity,
  describeProblem,
  formatBatchReport,
  toJSON,
} from './problem-formatter.js';
export type {
  ReportFormatOptions,
  ModuleCheckJSON,
  BatchReportJSON,
} from './problem-formatter.js';
