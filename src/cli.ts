#!/usr/bin/env node
import { createRequire } from 'node:module';
import * as p from '@clack/prompts';
import { checkCommand } from './cli/commands/check.js';

async function printVersion(): Promise<void> {
  const require = createRequire(import.meta.url);
  const pkg = require('../package.json') as { version: string; name: string };

  console.log(`${pkg.name}  v${pkg.version}`);
  console.log(`Node.js        ${process.version}`);
  console.log(`Platform       ${process.platform} ${process.arch}`);
}

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (command === '--version' || command === '-V') {
    await printVersion();
    return;
  }

  switch (command) {
    case 'check':
    case 'c': {
      const exitCode = await checkCommand(args.slice(1));
      if (exitCode !== 0) process.exit(exitCode);
      break;
    }

    case 'help':
    case '-h':
    case '--help':
      showHelp();
      break;

    default:
      if (command) {
        p.log.error(`Unknown command: ${command}`);
      }
      showHelp();
      process.exit(command ? 2 : 0);
  }
}

function showHelp() {
  console.log(`
exposed-tests - Find tests that their module never exposes

Usage:
  exposed-tests <command> [options]

Commands:
  check, c          Check test modules' exposing clauses against their tests
  help              Show this help message

Options:
  --version, -V     Show version information

Run 'exposed-tests check --help' for check options.
`);
}

main().catch((err) => {
  p.log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
