import { execFileSync } from 'child_process';
import { ALFRED_APP_ID, OSASCRIPT } from './config.js';
import { ScriptError } from './errors.js';

export interface BenchEntry {
  key: string;
  value: string;
}

export type ScriptRunner = (script: string) => void;

const APP = `Application(${JSON.stringify(ALFRED_APP_ID)})`;
const HANDLE = 'alfred';
const PREAMBLE = `var ${HANDLE} = ${APP};\n`;

export function benchEntries(count: number): BenchEntry[] {
  return Array.from({ length: count }, (_, i) => ({ key: `BENCH_${i}`, value: `VAL_SINGLE_${i}` }));
}

export function setConfigurationStatement(target: string, entry: BenchEntry, bundleId: string): string {
  return [
    `${target}.setConfiguration(${JSON.stringify(entry.key)}, {`,
    `  toValue: ${JSON.stringify(entry.value)},`,
    `  inWorkflow: ${JSON.stringify(bundleId)}`,
    '});',
    '',
  ].join('\n');
}

/** One script per value, each resolving the application itself. */
export function singleScripts(count: number, bundleId: string): string[] {
  return benchEntries(count).map((entry) => setConfigurationStatement(APP, entry, bundleId));
}

/** One script that binds the application once and reuses the handle. */
export function multiScript(count: number, bundleId: string): string {
  const lines = benchEntries(count).map((entry) => setConfigurationStatement(HANDLE, entry, bundleId));
  return [PREAMBLE, ...lines].join('\n');
}

/** The single-value scripts concatenated into one. */
export function multiAltScript(count: number, bundleId: string): string {
  return singleScripts(count, bundleId).join('\n');
}

/** Execute JXA via osascript. Throws ScriptError on non-zero exit. */
export function runJxa(script: string): void {
  try {
    execFileSync(OSASCRIPT, ['-l', 'JavaScript', '-e', script], {
      stdio: ['ignore', 'pipe', 'pipe'],
      encoding: 'utf-8',
    });
  } catch (err: unknown) {
    let status: number | null = null;
    let stderr = '';
    if (typeof err === 'object' && err !== null) {
      if ('status' in err && typeof err.status === 'number') status = err.status;
      if ('stderr' in err && typeof err.stderr === 'string') stderr = err.stderr.trim();
      if (!stderr && err instanceof Error) stderr = err.message;
    }
    throw new ScriptError(status, stderr);
  }
}
