import { Command } from 'commander';
import { OUTPUT_PATH } from '../config.js';
import { detectFormat, outputList, type OutputFormat } from '../output.js';
import { filterRecords, loadRecords } from '../repos.js';
import type { GlobalOptions } from '../types.js';

function parseLimit(value: unknown): number | undefined {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) return undefined;
  return Math.floor(parsed);
}

type ListOptions = GlobalOptions & {
  file: string;
  limit?: string;
};

export function register(program: Command): void {
  program
    .command('list [query]')
    .description('Show saved workflow repos, most starred first')
    .option('--file <path>', 'Results file written by `fetch`', OUTPUT_PATH)
    .option('--limit <n>', 'Show at most N repos')
    .action(function (this: Command, query: string | undefined) {
      const opts = this.optsWithGlobals<ListOptions>();
      const format: OutputFormat = detectFormat(opts);

      const records = filterRecords(loadRecords(opts.file), query ?? '')
        .slice()
        .sort((a, b) => b.stars - a.stars);
      const limit = parseLimit(opts.limit);
      const shown = limit === undefined ? records : records.slice(0, limit);

      outputList(shown, {
        format,
        columns: ['name', 'owner', 'stars', 'lang', 'description'],
        idField: 'url',
      });
    });
}
