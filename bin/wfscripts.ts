#!/usr/bin/env node
import { program } from 'commander';
import chalk from 'chalk';
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { GitHubApiError, MissingResultsError, ScriptError } from '../src/errors.js';
import { isDebug } from '../src/config.js';

import { register as registerBench } from '../src/commands/bench.js';
import { register as registerFetch } from '../src/commands/fetch.js';
import { register as registerList } from '../src/commands/list.js';

function loadCliVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  // bin/ when run from source, dist/bin/ once built
  for (const packagePath of [join(here, '..', 'package.json'), join(here, '..', '..', 'package.json')]) {
    try {
      const packageJson: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));
      if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson
        && typeof packageJson.version === 'string' && packageJson.version.length > 0) {
        return packageJson.version;
      }
    } catch {
      // Try the next location.
    }
  }
  return '0.1.0';
}

// Global error handler
function handleError(err: unknown): never {
  const jsonMode = Boolean(program.opts().json) || !process.stdout.isTTY;

  if (err instanceof GitHubApiError) {
    if (jsonMode) {
      console.error(JSON.stringify({ error: true, status: err.statusCode, type: 'api_error', message: err.message, url: err.url }));
    } else {
      console.error(err.display());
    }
    process.exit(err.exitCode);
  }
  if (err instanceof ScriptError) {
    if (jsonMode) {
      console.error(JSON.stringify({ error: true, status: err.status, type: 'script_error', message: err.message }));
    } else {
      console.error(err.display());
    }
    process.exit(err.exitCode);
  }
  if (err instanceof MissingResultsError) {
    if (jsonMode) {
      console.error(JSON.stringify({ error: true, type: 'missing_results', message: err.message }));
    } else {
      console.error(err.display());
    }
    process.exit(err.exitCode);
  }
  if (err instanceof Error) {
    if (jsonMode) {
      console.error(JSON.stringify({ error: true, type: 'unknown_error', message: err.message }));
    } else {
      console.error(chalk.red(`Error: ${err.message}`));
      if (isDebug(Boolean(program.opts().debug))) {
        console.error(err.stack);
      }
    }
  } else {
    if (jsonMode) {
      console.error(JSON.stringify({ error: true, type: 'unknown_error', message: 'An unexpected error occurred' }));
    } else {
      console.error(chalk.red('An unexpected error occurred'));
    }
  }
  process.exit(1);
}

program
  .name('wfscripts')
  .version(loadCliVersion())
  .description('Workflow maintenance scripts: osascript benchmarks and GitHub topic search.')
  .option('--json', 'Force JSON output')
  .option('--table', 'Force table output')
  .option('--csv', 'Force CSV output')
  .option('-q, --quiet', 'Only output URLs')
  .option('--no-color', 'Disable colors')
  .option('--debug', 'Print request details and settings to stderr');

if (process.argv.includes('--no-color')) {
  process.env.NO_COLOR = '1';
}

registerBench(program);
registerFetch(program);
registerList(program);

program.parseAsync(process.argv).catch(handleError);

process.on('uncaughtException', handleError);
process.on('unhandledRejection', (reason) => handleError(reason));
