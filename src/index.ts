// Exposure checking
export type {
  ExposureSet,
  Problem,
  ProblemKind,
  ProblemSeverity,
  CheckResult,
  ReadExposingResult,
  ScanState,
  ScanStep,
  ScanOutcome,
  StrippedLine,
  DiscoveryResult,
  ModuleTarget,
  ModuleCheck,
  BatchOptions,
  BatchProgress,
  BatchReport,
  BatchStats,
  ModuleFile,
  ReportFormatOptions,
  BatchReportJSON,
} from './exposure/index.js';

export {
  stripComments,
  stripCommentLines,
  initialScanState,
  advanceHeaderScan,
  finishHeaderScan,
  parseExposingClause,
  scanHeader,
  readSourceLines,
  SourceOpenError,
  SourceReadError,
  readExposing,
  reconcileExposure,
  filterExposing,
  discoverTestNames,
  findTestNames,
  moduleNameFromPath,
  findModuleFiles,
  checkModules,
  problemSeverity,
  describeProblem,
  formatBatchReport,
  toJSON,
} from './exposure/index.js';

// Configuration
export type { ExposedTestsConfig } from './config/index.js';
export {
  ExposedTestsConfigSchema,
  DEFAULT_EXPOSED_TESTS_CONFIG,
  readExposedTestsConfig,
  validateExposedTestsConfig,
  ExposedTestsConfigError,
} from './config/index.js';
