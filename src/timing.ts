import chalk from 'chalk';

export function elapsedSeconds(startMs: number): number {
  return (performance.now() - startMs) / 1000;
}

/** Run `fn` and log how long it took, whether it returns or throws. */
export function timed<T>(title: string, fn: () => T): T {
  const start = performance.now();
  try {
    return fn();
  } finally {
    console.error(chalk.dim(`${title} took ${elapsedSeconds(start).toFixed(3)}s`));
  }
}
