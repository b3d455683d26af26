import chalk from 'chalk';

export class GitHubApiError extends Error {
  constructor(
    public statusCode: number,
    public statusText: string,
    public url: string
  ) {
    super(`GitHub API Error: ${statusCode} ${statusText}`.trim());
  }

  display(): string {
    return [
      chalk.red(`Error: GitHub returned ${this.statusCode} ${this.statusText}`.trim()),
      chalk.dim(`  URL: ${this.url}`),
    ].join('\n');
  }

  get exitCode(): number {
    if (this.statusCode === 401 || this.statusCode === 403) return 2;
    if (this.statusCode === 404) return 3;
    if (this.statusCode === 422) return 4;
    if (this.statusCode === 429) return 5;
    return 1;
  }
}

export class ScriptError extends Error {
  constructor(
    public status: number | null,
    public stderr: string
  ) {
    super(status === null
      ? `osascript failed to run${stderr ? `: ${stderr}` : ''}`
      : `osascript exited with status ${status}${stderr ? `: ${stderr}` : ''}`);
  }

  display(): string {
    const lines = [chalk.red(`Error: ${this.status === null ? 'osascript failed to run' : `osascript exited with status ${this.status}`}`)];
    if (this.stderr) {
      lines.push(chalk.dim(`  ${this.stderr}`));
    }
    return lines.join('\n');
  }

  get exitCode(): number { return 6; }
}

export class MissingResultsError extends Error {
  constructor(public path: string) {
    super(`No saved results at ${path}`);
  }

  display(): string {
    return [
      chalk.red(`Error: No saved results at ${this.path}`),
      '',
      `  Run ${chalk.cyan('wfscripts fetch')} first.`,
    ].join('\n');
  }

  get exitCode(): number { return 3; }
}
