import chalk from 'chalk';

export interface Page<T> {
  items: T[];
  /** Total result count as reported by the API; absent means a single page. */
  total?: number;
}

export function pageCountFor(total: number, pageSize: number): number {
  return Math.ceil(total / pageSize);
}

/**
 * Walks numbered pages starting at 1. The page count is derived from the
 * first response only; totals reported by later pages are ignored.
 */
export async function paginateByCount<T>(
  fetchPage: (page: number) => Promise<Page<T>>,
  pageSize: number
): Promise<T[]> {
  const allResults: T[] = [];
  let pageCount: number | undefined;
  let page = 1;

  while (pageCount === undefined || page <= pageCount) {
    console.error(chalk.dim(`fetching page ${page} ...`));
    const result = await fetchPage(page);

    if (pageCount === undefined) {
      const total = result.total ?? pageSize;
      pageCount = pageCountFor(total, pageSize);
      console.error(chalk.dim(`${total} results on ${pageCount} pages`));
    }

    allResults.push(...result.items);
    page++;
  }

  return allResults;
}
