import chalk from 'chalk';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import type { GitHubClient } from './client.js';
import { PAGE_SIZE, SEARCH_QUERY } from './config.js';
import { MissingResultsError } from './errors.js';
import { paginateByCount } from './pagination.js';
import type { RepoRecord, SearchItem } from './types.js';

export function toRepoRecord(item: SearchItem): RepoRecord {
  return {
    name: item.name,
    description: item.description ?? null,
    owner: item.owner.login,
    url: item.html_url,
    stars: item.stargazers_count,
    topics: item.topics ?? [],
    lang: item.language || '',
  };
}

export async function fetchRepos(client: GitHubClient, query: string = SEARCH_QUERY): Promise<RepoRecord[]> {
  const items = await paginateByCount(async (page) => {
    const data = await client.searchRepositories(query, page);
    return { items: data.items ?? [], total: data.total_count };
  }, PAGE_SIZE);
  return items.map(toRepoRecord);
}

function sortKeys(_key: string, value: unknown): unknown {
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return Object.fromEntries(entries);
  }
  return value;
}

export function serializeRecords(records: RepoRecord[]): string {
  return JSON.stringify(records, sortKeys, 2);
}

export function saveRecords(path: string, records: RepoRecord[]): void {
  writeFileSync(path, serializeRecords(records));
}

/**
 * Fetch every page, then write the results in one go. Nothing is written
 * unless all pages were retrieved.
 */
export async function fetchAndSave(client: GitHubClient, outputPath: string): Promise<RepoRecord[]> {
  const records = await fetchRepos(client);
  saveRecords(outputPath, records);
  console.error(chalk.green(`saved ${records.length} workflows to ${outputPath}`));
  return records;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isRepoRecord(value: unknown): value is RepoRecord {
  if (typeof value !== 'object' || value === null) return false;
  const r: Record<string, unknown> = { ...value };
  return typeof r.name === 'string'
    && (typeof r.description === 'string' || r.description === null)
    && typeof r.owner === 'string'
    && typeof r.url === 'string'
    && typeof r.stars === 'number'
    && isStringArray(r.topics)
    && typeof r.lang === 'string';
}

export function loadRecords(path: string): RepoRecord[] {
  if (!existsSync(path)) {
    throw new MissingResultsError(path);
  }
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (!Array.isArray(parsed)) {
    throw new Error(`Expected a JSON array in ${path}`);
  }
  const records: RepoRecord[] = [];
  for (const [i, entry] of parsed.entries()) {
    if (!isRepoRecord(entry)) {
      throw new Error(`Malformed record at index ${i} in ${path}`);
    }
    records.push(entry);
  }
  return records;
}

export function filterRecords(records: RepoRecord[], query: string): RepoRecord[] {
  const needle = query.trim().toLowerCase();
  if (!needle) return records;
  return records.filter((r) =>
    [r.name, r.owner, r.description ?? '', ...r.topics].some((field) => field.toLowerCase().includes(needle))
  );
}
