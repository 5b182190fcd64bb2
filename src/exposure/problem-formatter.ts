/**
 * Formatting for exposure problems and batch reports.
 *
 * Provides one-line descriptions, severity policy, a colored terminal
 * report and a JSON-serializable form of a batch run.
 */

import pc from 'picocolors';
import type { BatchReport, ModuleCheck } from './batch-checker.js';
import type { Problem, ProblemSeverity } from './types.js';

/**
 * Options for formatting a batch report.
 */
export interface ReportFormatOptions {
  /** List modules that passed, not only problems (default: false) */
  verbose?: boolean;
}

/**
 * Serializable form of one module check.
 */
export interface ModuleCheckJSON {
  path: string;
  moduleName: string;
  status: 'passed' | ProblemSeverity;
  accepted?: string[];
  problem?: {
    kind: Problem['kind'];
    message: string;
    unexposed?: string[];
    code?: string;
  };
}

export interface BatchReportJSON {
  stats: BatchReport['stats'];
  duration: number;
  modules: ModuleCheckJSON[];
}

function sorted(names: ReadonlySet<string>): string[] {
  return [...names].sort();
}

/**
 * Severity of a problem when aggregating a run.
 *
 * Unexposed tests are user-actionable and default to a warning; every
 * other kind means the module could not be checked at all.
 */
export function problemSeverity(
  problem: Problem,
  unexposedSeverity: ProblemSeverity = 'warning',
): ProblemSeverity {
  return problem.kind === 'unexposed-tests' ? unexposedSeverity : 'error';
}

/**
 * Human-readable one-line description of a problem.
 */
export function describeProblem(problem: Problem): string {
  switch (problem.kind) {
    case 'unexposed-tests': {
      const names = sorted(problem.unexposed).join(', ');
      const noun = problem.unexposed.size === 1 ? 'test is' : 'tests are';
      return `${problem.moduleName}: ${noun} not exposed: ${names}`;
    }
    case 'missing-module-declaration':
      return `${problem.path}: file does not start with a module declaration`;
    case 'open-failed':
      return `${problem.path}: could not open file (${problem.error.message})`;
    case 'read-failed':
      return `${problem.path}: could not read file (${problem.error.message})`;
    case 'parse-error':
      return `${problem.path}: could not parse the module's exposing clause`;
  }
}

function formatCheck(check: ModuleCheck): string {
  if (check.result.success) {
    const count = check.result.accepted.size;
    return `${pc.green('PASS')}  ${check.result.moduleName} ${pc.dim(`(${count} exposed)`)}`;
  }
  const marker = check.severity === 'warning' ? pc.yellow('WARN') : pc.red('FAIL');
  return `${marker}  ${describeProblem(check.result.problem)}`;
}

/**
 * Format a batch report for terminal display.
 */
export function formatBatchReport(report: BatchReport, options: ReportFormatOptions = {}): string {
  const { verbose = false } = options;
  const lines: string[] = [];

  for (const check of report.results) {
    if (check.result.success && !verbose) continue;
    lines.push(formatCheck(check));
  }

  if (lines.length > 0) {
    lines.push('');
  }

  const { total, passed, warnings, errors } = report.stats;
  lines.push(
    `${pc.bold('Modules:')} ${total}  ` +
      `${pc.green(`${passed} passed`)}  ` +
      `${pc.yellow(`${warnings} warnings`)}  ` +
      `${pc.red(`${errors} errors`)}`,
  );

  return lines.join('\n');
}

function checkToJSON(check: ModuleCheck): ModuleCheckJSON {
  const { result, target } = check;
  if (result.success) {
    return {
      path: target.path,
      moduleName: target.moduleName,
      status: 'passed',
      accepted: sorted(result.accepted),
    };
  }

  const { problem } = result;
  const problemJSON: NonNullable<ModuleCheckJSON['problem']> = {
    kind: problem.kind,
    message: describeProblem(problem),
  };
  if (problem.kind === 'unexposed-tests') {
    problemJSON.unexposed = sorted(problem.unexposed);
  }
  if ((problem.kind === 'open-failed' || problem.kind === 'read-failed') && problem.error.code) {
    problemJSON.code = problem.error.code;
  }

  return {
    path: target.path,
    moduleName: target.moduleName,
    status: check.severity ?? 'error',
    problem: problemJSON,
  };
}

/**
 * Convert a batch report to a JSON-serializable object.
 */
export function toJSON(report: BatchReport): BatchReportJSON {
  return {
    stats: report.stats,
    duration: report.duration,
    modules: report.results.map(checkToJSON),
  };
}
