import { Command } from 'commander';
import { GitHubClient } from '../client.js';
import { isDebug, OUTPUT_PATH } from '../config.js';
import { fetchAndSave } from '../repos.js';
import type { GlobalOptions } from '../types.js';

export function register(program: Command): void {
  program
    .command('fetch')
    .description('Download every GitHub repo tagged "alfred-workflow" to workflows.json')
    .action(async function (this: Command) {
      const opts = this.optsWithGlobals<GlobalOptions>();
      const client = new GitHubClient(isDebug(opts.debug));
      await fetchAndSave(client, OUTPUT_PATH);
    });
}
