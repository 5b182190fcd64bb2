/**
 * CLI command: `exposed-tests check`
 *
 * Finds test modules, discovers the tests each one defines, and reports
 * tests that exist in source but are missing from the module's exposing
 * clause (a test runner would never see them).
 *
 * Exit codes:
 * - 0: No error-level problems (unexposed tests may appear as warnings)
 * - 1: At least one module failed, or unexposed tests under --strict
 * - 2: Usage or configuration error
 *
 * @module cli/commands/check
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { basename, extname, resolve } from 'path';
import {
  readExposedTestsConfig,
  ExposedTestsConfigError,
  DEFAULT_CONFIG_PATH,
} from '../../config/index.js';
import type { ExposedTestsConfig } from '../../config/index.js';
import {
  checkModules,
  discoverTestNames,
  findModuleFiles,
  formatBatchReport,
  mapWithConcurrency,
  moduleNameFromPath,
  summarizeChecks,
  toJSON,
} from '../../exposure/index.js';
import type {
  BatchReport,
  ModuleCheck,
  ModuleFile,
  ModuleTarget,
} from '../../exposure/index.js';

// ============================================================================
// Argument parsing
// ============================================================================

interface CheckOptions {
  json: boolean;
  strict: boolean;
  verbose: boolean;
  configPath: string;
  concurrency?: number;
  paths: string[];
}

function parseArgs(args: string[]): CheckOptions | string {
  const options: CheckOptions = {
    json: args.includes('--json'),
    strict: args.includes('--strict'),
    verbose: args.includes('--verbose') || args.includes('-v'),
    configPath: DEFAULT_CONFIG_PATH,
    paths: [],
  };

  for (const arg of args) {
    if (arg.startsWith('--config=')) {
      options.configPath = arg.slice('--config='.length);
    } else if (arg.startsWith('--concurrency=')) {
      const value = Number(arg.slice('--concurrency='.length));
      if (!Number.isInteger(value) || value < 1) {
        return `Invalid --concurrency value: ${arg.slice('--concurrency='.length)}`;
      }
      options.concurrency = value;
    } else if (!arg.startsWith('-')) {
      options.paths.push(arg);
    }
  }

  return options;
}

// ============================================================================
// Targets
// ============================================================================

/**
 * Module name for a file: relative to the configured source dir holding
 * it, else to the root it was found under, else the bare file name.
 * Relative source dirs resolve against the working directory.
 */
function resolveModuleName(file: ModuleFile, config: ExposedTestsConfig): string {
  for (const dir of config.source_dirs) {
    const fromConfig = moduleNameFromPath(file.path, resolve(dir));
    if (fromConfig !== null) return fromConfig;
  }

  return moduleNameFromPath(file.path, file.sourceDir) ?? basename(file.path, extname(file.path));
}

/**
 * Discover tests in every file. Files without tests are dropped; files
 * that cannot be read become failed checks straight away.
 */
async function prepareTargets(
  files: readonly ModuleFile[],
  config: ExposedTestsConfig,
  concurrency: number,
): Promise<{ targets: ModuleTarget[]; failures: ModuleCheck[] }> {
  const discovered = await mapWithConcurrency(files, concurrency, async (file) => ({
    file,
    moduleName: resolveModuleName(file, config),
    result: await discoverTestNames(file.path, config.test_types),
  }));

  const targets: ModuleTarget[] = [];
  const failures: ModuleCheck[] = [];

  for (const { file, moduleName, result } of discovered) {
    if (!result.success) {
      failures.push({
        target: { path: file.path, moduleName, candidates: new Set() },
        result,
        severity: 'error',
      });
    } else if (result.names.size > 0) {
      targets.push({ path: file.path, moduleName, candidates: result.names });
    }
  }

  return { targets, failures };
}

// ============================================================================
// Command
// ============================================================================

/**
 * Execute the `check` CLI command.
 *
 * @param args - CLI arguments after `check`
 * @returns Exit code
 */
export async function checkCommand(args: string[]): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    showHelp();
    return 0;
  }

  const parsed = parseArgs(args);
  if (typeof parsed === 'string') {
    p.log.error(parsed);
    return 2;
  }
  const options = parsed;

  let config: ExposedTestsConfig;
  try {
    config = await readExposedTestsConfig(options.configPath);
  } catch (err) {
    if (err instanceof ExposedTestsConfigError) {
      if (options.json) {
        console.log(JSON.stringify({ error: err.message, field: err.field }, null, 2));
      } else {
        p.log.error(err.message);
      }
      return 2;
    }
    throw err;
  }

  const roots = options.paths.length > 0 ? options.paths : config.source_dirs;
  const found = await findModuleFiles(roots, {
    extensions: config.extensions,
    ignoreDirs: config.ignore_dirs,
  });

  if (!options.json) {
    p.intro(pc.bgCyan(pc.black(' exposed-tests ')));
    for (const root of found.missing) {
      p.log.warn(`Path not found: ${root}`);
    }
  }

  const concurrency = options.concurrency ?? config.concurrency;
  const { targets, failures } = await prepareTargets(found.files, config, concurrency);
  const unexposedSeverity = options.strict ? 'error' : config.unexposed_severity;

  const batch = await checkModules(targets, {
    concurrency,
    unexposedSeverity,
  });

  const results = [...failures, ...batch.results];
  const report: BatchReport = {
    results,
    stats: summarizeChecks(results),
    duration: batch.duration,
  };

  if (options.json) {
    console.log(JSON.stringify(toJSON(report), null, 2));
  } else {
    p.log.message(formatBatchReport(report, { verbose: options.verbose }));
    if (report.stats.errors > 0) {
      p.outro(pc.red('Some test modules need attention.'));
    } else if (report.stats.warnings > 0) {
      p.outro(pc.yellow('Some tests are not exposed and will not run.'));
    } else {
      p.outro(pc.green('All discovered tests are exposed.'));
    }
  }

  return report.stats.errors > 0 ? 1 : 0;
}

function showHelp(): void {
  console.log(`
exposed-tests check - Report tests that their module does not expose

Usage:
  exposed-tests check [paths...] [options]

Paths may be module files or directories. Defaults to source_dirs from
the config file.

Options:
  --config=PATH       Config file (default: ${DEFAULT_CONFIG_PATH})
  --concurrency=N     Modules read at once (default: from config)
  --strict            Treat unexposed tests as errors
  --json              Print the report as JSON
  --verbose, -v       List passing modules too
  --help, -h          Show this help message

Exit codes:
  0  No errors (unexposed tests are warnings unless --strict)
  1  Errors found
  2  Invalid arguments or config
`);
}
