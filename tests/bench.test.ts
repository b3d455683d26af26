import assert from 'node:assert/strict';
import test from 'node:test';
import { register as registerBench } from '../src/commands/bench.js';
import { formatSummary, runBenchmark, type StrategyResult } from '../src/bench.js';
import type { BenchSettings } from '../src/config.js';
import { ScriptError } from '../src/errors.js';
import { timed } from '../src/timing.js';
import { captureConsole, createProgram, runCli } from './cli-test-helpers.js';

const SETTINGS: BenchSettings = {
  reps: 2,
  values: 3,
  single: true,
  multi: true,
  multiAlt: true,
  bundleId: 'test.bundle',
};

async function bench(settings: BenchSettings, failOnCall?: number) {
  const scripts: string[] = [];
  let results: StrategyResult[] = [];
  let error: unknown;
  const { stderr } = await captureConsole(() => {
    try {
      results = runBenchmark(settings, (script) => {
        scripts.push(script);
        if (scripts.length === failOnCall) {
          throw new ScriptError(1, 'execution error');
        }
      });
    } catch (err) {
      error = err;
    }
  });
  return { scripts, results, stderr, error };
}

test('single strategy runs once per value per rep, batches once per rep', async () => {
  const { scripts, results } = await bench(SETTINGS);

  assert.equal(scripts.length, 6 + 2 + 2);
  assert.ok(scripts.slice(0, 6).every((s) => s.startsWith('Application(')));
  assert.ok(scripts.slice(6, 8).every((s) => s.startsWith('var alfred = ')));
  assert.ok(scripts.slice(8).every((s) => s.startsWith('Application(') && s.includes('"BENCH_2"')));
  assert.deepEqual(results.map((r) => r.strategy), ['single', 'multi', 'multi-alt']);
  for (const r of results) {
    assert.equal(r.reps, 2);
    assert.ok(r.totalSeconds >= 0);
  }
});

test('batch strategies invoke once per rep regardless of value count', async () => {
  const { scripts } = await bench({ ...SETTINGS, single: false, values: 50 });
  assert.equal(scripts.length, 4);
});

test('each repetition is timed under its strategy title', async () => {
  const { stderr } = await bench(SETTINGS);
  assert.equal(stderr.length, 6);
  assert.match(stderr[0], /^single \(3 values\) took \d+\.\d{3}s$/);
  assert.match(stderr[2], /^multiple \(3 values\) took \d+\.\d{3}s$/);
  assert.match(stderr[5], /^multi-alt \(3 values\) took \d+\.\d{3}s$/);
});

test('disabled strategies are skipped and left out of the summary', async () => {
  const { scripts, results } = await bench({ ...SETTINGS, single: false, multiAlt: false });
  assert.equal(scripts.length, 2);
  assert.deepEqual(results.map((r) => r.strategy), ['multi']);
  assert.match(formatSummary(results), /^multi: \d+\.\ds \(\d+\.\d{3}s\/rep\)$/);
});

test('no enabled strategy runs nothing', async () => {
  const { scripts, results } = await bench({ ...SETTINGS, single: false, multi: false, multiAlt: false });
  assert.equal(scripts.length, 0);
  assert.equal(formatSummary(results), '');
});

test('the first script failure aborts the run', async () => {
  const { scripts, results, stderr, error } = await bench(SETTINGS, 2);
  assert.ok(error instanceof ScriptError);
  assert.equal(scripts.length, 2);
  assert.deepEqual(results, []);
  assert.equal(stderr.length, 1);
  assert.match(stderr[0], /^single \(3 values\) took /);
});

test('formatSummary reports totals and per-rep averages', () => {
  assert.equal(
    formatSummary([
      { strategy: 'single', totalSeconds: 2.5, reps: 5 },
      { strategy: 'multi-alt', totalSeconds: 0.5, reps: 2 },
    ]),
    'single: 2.5s (0.500s/rep), multi-alt: 0.5s (0.250s/rep)',
  );
});

test('timed returns the result and logs the duration', async () => {
  let value = 0;
  const { stderr } = await captureConsole(() => {
    value = timed('work', () => 42);
  });
  assert.equal(value, 42);
  assert.equal(stderr.length, 1);
  assert.match(stderr[0], /^work took \d+\.\d{3}s$/);
});

test('timed still logs when the timed code throws', async () => {
  const { stderr } = await captureConsole(() => {
    assert.throws(() => timed('broken', () => {
      throw new Error('boom');
    }), /boom/);
  });
  assert.equal(stderr.length, 1);
  assert.match(stderr[0], /^broken took \d+\.\d{3}s$/);
});

test('bench command refuses to run without osascript', { skip: process.platform === 'darwin' }, async () => {
  await assert.rejects(runCli(createProgram([registerBench]), ['bench']), /needs macOS/);
});
