import { Command } from 'commander';
import chalk from 'chalk';
import { platform } from 'os';
import { formatSummary, runBenchmark } from '../bench.js';
import { DEFAULT_BENCH_SETTINGS, isDebug } from '../config.js';
import type { GlobalOptions } from '../types.js';

export function register(program: Command): void {
  program
    .command('bench')
    .description('Time single vs batched osascript calls that set workflow configuration')
    .action(function (this: Command) {
      const opts = this.optsWithGlobals<GlobalOptions>();

      if (platform() !== 'darwin') {
        throw new Error('The scripting bridge benchmark needs macOS (/usr/bin/osascript)');
      }

      const settings = { ...DEFAULT_BENCH_SETTINGS };
      if (isDebug(opts.debug)) {
        console.error(chalk.dim(`settings: ${JSON.stringify(settings)}`));
      }

      const summary = formatSummary(runBenchmark(settings));
      if (summary) {
        console.error(summary);
      }
    });
}
