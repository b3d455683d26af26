import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import * as dotenv from 'dotenv';

dotenv.config();

const PACKAGE_ROOT = join(dirname(fileURLToPath(import.meta.url)), '..');

// GitHub search
export const API_URL = 'https://api.github.com/search/repositories?per_page=100';
export const PAGE_SIZE = 100;
export const SEARCH_QUERY = 'topic:alfred-workflow';
// Topics are still a preview feature of the search API
export const SEARCH_ACCEPT = 'application/vnd.github.mercy-preview+json';
export const REQUEST_TIMEOUT_MS = 60_000;
export const OUTPUT_PATH = join(PACKAGE_ROOT, 'workflows.json');

// Scripting bridge
export const OSASCRIPT = '/usr/bin/osascript';
export const ALFRED_APP_ID = 'com.runningwithcrayons.Alfred';

export interface BenchSettings {
  /** How many times each strategy is repeated. */
  reps: number;
  /** How many configuration values each repetition sets. */
  values: number;
  single: boolean;
  multi: boolean;
  multiAlt: boolean;
  bundleId: string;
}

export const DEFAULT_BENCH_SETTINGS: Readonly<BenchSettings> = {
  reps: 5,
  values: 5,
  single: true,
  multi: true,
  multiAlt: true,
  bundleId: 'net.wfscripts.bench',
};

/**
 * Debug output is on when:
 * 1. --debug flag is passed
 * 2. WFSCRIPTS_DEBUG is set (environment or .env)
 */
export function isDebug(flagValue?: boolean): boolean {
  return Boolean(flagValue) || Boolean(process.env.WFSCRIPTS_DEBUG);
}
