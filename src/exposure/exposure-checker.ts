/**
 * Export surface checking for a single module.
 *
 * Streams a module source through the comment stripper and header
 * scanner, then reconciles the exported names against the candidate
 * tests found elsewhere. A candidate that exists but is not exported
 * would never be run, so it is reported as an `unexposed-tests` problem.
 *
 * Nothing here logs or throws for expected failures; every outcome is
 * returned as a CheckResult for the caller to aggregate.
 *
 * @module exposure/exposure-checker
 */

import { stripComments } from './comment-stripper.js';
import {
  advanceHeaderScan,
  finishHeaderScan,
  initialScanState,
} from './header-scanner.js';
import type { ScanOutcome } from './header-scanner.js';
import { readSourceLines, sourceProblemFromError } from './source-reader.js';
import type { CheckResult, ExposureSet, ReadExposingResult } from './types.js';

async function scanSource(filePath: string): Promise<ScanOutcome> {
  let state = initialScanState();
  let insideBlockComment = false;

  for await (const raw of readSourceLines(filePath)) {
    const stripped = stripComments(raw, insideBlockComment);
    insideBlockComment = stripped.insideBlockComment;

    const step = advanceHeaderScan(state, stripped.line);
    if (step.done) {
      return step.outcome;
    }
    state = step.state;
  }

  return finishHeaderScan(state);
}

/**
 * Read a module's header and return its export surface.
 *
 * Reading stops as soon as the exposing clause is complete.
 */
export async function readExposing(filePath: string): Promise<ReadExposingResult> {
  let outcome: ScanOutcome;
  try {
    outcome = await scanSource(filePath);
  } catch (err) {
    return { success: false, problem: sourceProblemFromError(err) };
  }

  switch (outcome.kind) {
    case 'exposure':
      return { success: true, exposure: outcome.exposure };
    case 'missing-module-declaration':
      return { success: false, problem: { kind: 'missing-module-declaration', path: filePath } };
    case 'parse-error':
      return { success: false, problem: { kind: 'parse-error', path: filePath } };
  }
}

/**
 * Keep the candidates a module exports; report the ones it does not.
 *
 * - Wildcard exposure accepts every candidate.
 * - Enumerated exposure accepts `exposed ∩ candidates`.
 * - Any shortfall fails with exactly `candidates − accepted`.
 */
export function reconcileExposure(
  exposure: ExposureSet,
  candidates: ReadonlySet<string>,
  moduleName: string,
): CheckResult {
  if (exposure.kind === 'wildcard') {
    return { success: true, moduleName, accepted: new Set(candidates) };
  }

  const accepted = new Set<string>();
  const unexposed = new Set<string>();
  for (const name of candidates) {
    if (exposure.names.has(name)) {
      accepted.add(name);
    } else {
      unexposed.add(name);
    }
  }

  if (unexposed.size > 0) {
    return {
      success: false,
      problem: { kind: 'unexposed-tests', moduleName, unexposed },
    };
  }

  return { success: true, moduleName, accepted };
}

/**
 * Check which candidate tests a module file actually exports.
 *
 * @param filePath - Path to the module source
 * @param candidates - Test names discovered in the module
 * @param moduleName - Dotted display name used when reporting
 */
export async function filterExposing(
  filePath: string,
  candidates: ReadonlySet<string>,
  moduleName: string,
): Promise<CheckResult> {
  const read = await readExposing(filePath);
  if (!read.success) {
    return read;
  }
  return reconcileExposure(read.exposure, candidates, moduleName);
}
