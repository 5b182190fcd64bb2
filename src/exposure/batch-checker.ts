/**
 * Check many modules at once.
 *
 * Modules share no state, so checks run on a bounded pool of concurrent
 * workers. One module's failure is recorded in its own slot and never
 * stops the rest of the batch. Results keep the order of the targets.
 *
 * @module exposure/batch-checker
 */

import { filterExposing } from './exposure-checker.js';
import { problemSeverity } from './problem-formatter.js';
import type { CheckResult, ProblemSeverity } from './types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * One module to check.
 */
export interface ModuleTarget {
  /** Path to the module source */
  path: string;
  /** Dotted module name used in reports */
  moduleName: string;
  /** Test names discovered in the module */
  candidates: ReadonlySet<string>;
}

/**
 * Progress information during a batch run.
 */
export interface BatchProgress {
  /** Modules finished so far */
  current: number;
  /** Total modules in the batch */
  total: number;
  /** Percentage complete (0-100) */
  percent: number;
  /** Path of the module that just finished */
  path: string;
}

export interface BatchOptions {
  /** Maximum concurrent checks (default 8) */
  concurrency?: number;
  /** Severity for unexposed tests (default 'warning') */
  unexposedSeverity?: ProblemSeverity;
  /** Called after each module finishes */
  onProgress?: (progress: BatchProgress) => void;
}

/**
 * Outcome for one target.
 */
export interface ModuleCheck {
  target: ModuleTarget;
  result: CheckResult;
  /** Severity of the problem, or null on success */
  severity: ProblemSeverity | null;
}

export interface BatchStats {
  total: number;
  passed: number;
  warnings: number;
  errors: number;
}

export interface BatchReport {
  results: ModuleCheck[];
  stats: BatchStats;
  /** Time taken in milliseconds */
  duration: number;
}

export const DEFAULT_CONCURRENCY = 8;

// ============================================================================
// Batch run
// ============================================================================

async function checkOne(target: ModuleTarget): Promise<CheckResult> {
  try {
    return await filterExposing(target.path, target.candidates, target.moduleName);
  } catch (err) {
    // filterExposing returns every expected failure; anything thrown is unexpected
    const error: NodeJS.ErrnoException = err instanceof Error ? err : new Error(String(err));
    return { success: false, problem: { kind: 'read-failed', path: target.path, error } };
  }
}

/**
 * Map `items` through `task` with at most `concurrency` calls in flight.
 * Results keep the order of `items`; `onSettled` fires as each one ends.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T) => Promise<R>,
  onSettled?: (item: T, finished: number) => void,
): Promise<R[]> {
  const results: R[] = [];
  let next = 0;
  let finished = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      results[index] = await task(item);
      finished++;
      onSettled?.(item, finished);
    }
  };

  const workers = Array.from({ length: Math.min(Math.max(1, concurrency), items.length) }, () =>
    worker(),
  );
  await Promise.all(workers);

  return results;
}

/**
 * Check every target and aggregate the results.
 */
export async function checkModules(
  targets: readonly ModuleTarget[],
  options: BatchOptions = {},
): Promise<BatchReport> {
  const startTime = Date.now();
  const unexposedSeverity = options.unexposedSeverity ?? 'warning';

  const results = await mapWithConcurrency(
    targets,
    options.concurrency ?? DEFAULT_CONCURRENCY,
    async (target): Promise<ModuleCheck> => {
      const result = await checkOne(target);
      return {
        target,
        result,
        severity: result.success ? null : problemSeverity(result.problem, unexposedSeverity),
      };
    },
    (target, finished) =>
      options.onProgress?.({
        current: finished,
        total: targets.length,
        percent: Math.round((finished / targets.length) * 100),
        path: target.path,
      }),
  );

  return {
    results,
    stats: summarizeChecks(results),
    duration: Date.now() - startTime,
  };
}

/**
 * Count passed, warning and error checks.
 */
export function summarizeChecks(results: readonly ModuleCheck[]): BatchStats {
  const stats: BatchStats = { total: results.length, passed: 0, warnings: 0, errors: 0 };
  for (const check of results) {
    if (check.severity === null) stats.passed++;
    else if (check.severity === 'warning') stats.warnings++;
    else stats.errors++;
  }
  return stats;
}
