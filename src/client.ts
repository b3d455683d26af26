import chalk from 'chalk';
import { API_URL, REQUEST_TIMEOUT_MS, SEARCH_ACCEPT } from './config.js';
import { GitHubApiError } from './errors.js';
import type { SearchResponse } from './types.js';

export class GitHubClient {
  private debug: boolean;

  constructor(debug?: boolean) {
    this.debug = debug ?? false;
  }

  private async request<T>(url: string): Promise<T> {
    if (this.debug) {
      console.error(chalk.dim(`→ GET ${url}`));
    }

    const headers: Record<string, string> = {
      'Accept': SEARCH_ACCEPT,
    };

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);
    let response: Response;
    try {
      response = await fetch(url, { method: 'GET', headers, signal: controller.signal });
    } catch (err: unknown) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new Error(`Request timed out after ${REQUEST_TIMEOUT_MS / 1000}s: GET ${url}`);
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }

    console.error(chalk.dim(`[${response.status}] ${url}`));

    if (!response.ok) {
      throw new GitHubApiError(response.status, response.statusText, url);
    }

    return (await response.json()) as T;
  }

  async searchRepositories(query: string, page: number): Promise<SearchResponse> {
    const url = new URL(API_URL);
    url.searchParams.set('q', query);
    url.searchParams.set('page', String(page));
    return this.request<SearchResponse>(url.toString());
  }
}
