import chalk from 'chalk';
import Table from 'cli-table3';
import type { OutputOptions } from './types.js';

export type OutputFormat = 'json' | 'table' | 'csv' | 'quiet';

export function detectFormat(opts: OutputOptions): OutputFormat {
  if (opts.quiet) return 'quiet';
  if (opts.json) return 'json';
  if (opts.csv) return 'csv';
  if (opts.table) return 'table';
  return process.stdout.isTTY ? 'table' : 'json';
}

function cellText(value: unknown): string {
  if (Array.isArray(value)) return value.join(' ');
  if (value === null || value === undefined) return '';
  return String(value);
}

export function outputList(items: Record<string, unknown>[], opts: {
  format: OutputFormat;
  columns?: string[];
  idField?: string;
}): void {
  const format = opts.format;
  const idField = opts.idField || 'id';

  if (format === 'quiet') {
    for (const item of items) {
      const id = cellText(item[idField]);
      if (id) console.log(id);
    }
    return;
  }

  if (format === 'json') {
    console.log(JSON.stringify(items, null, 2));
    return;
  }

  if (items.length === 0) {
    if (format === 'table') console.log(chalk.dim('No results.'));
    return;
  }

  const columns = opts.columns || Object.keys(items[0]).slice(0, 8);

  if (format === 'csv') {
    console.log(columns.join(','));
    for (const row of items) {
      console.log(columns.map(c => {
        const v = cellText(row[c]);
        return v.includes(',') || v.includes('"') || v.includes('\n') ? `"${v.replace(/"/g, '""')}"` : v;
      }).join(','));
    }
    return;
  }

  // table
  const table = new Table({
    head: columns.map(c => chalk.cyan(c)),
    style: { head: [], border: [] },
    wordWrap: true,
  });
  for (const row of items) {
    table.push(columns.map(c => {
      const v = cellText(row[c]);
      return v.length > 60 ? v.slice(0, 57) + '...' : v;
    }));
  }
  console.log(table.toString());
}
