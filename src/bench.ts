import type { BenchSettings } from './config.js';
import { multiAltScript, multiScript, runJxa, singleScripts, type ScriptRunner } from './scripts.js';
import { elapsedSeconds, timed } from './timing.js';

export type Strategy = 'single' | 'multi' | 'multi-alt';

export interface StrategyResult {
  strategy: Strategy;
  totalSeconds: number;
  reps: number;
}

interface StrategyPlan {
  strategy: Strategy;
  enabled: boolean;
  title: string;
  run: () => void;
}

function plans(settings: BenchSettings, runScript: ScriptRunner): StrategyPlan[] {
  const { values, bundleId } = settings;
  return [
    {
      strategy: 'single',
      enabled: settings.single,
      title: `single (${values} values)`,
      run: () => {
        for (const script of singleScripts(values, bundleId)) {
          runScript(script);
        }
      },
    },
    {
      strategy: 'multi',
      enabled: settings.multi,
      title: `multiple (${values} values)`,
      run: () => runScript(multiScript(values, bundleId)),
    },
    {
      strategy: 'multi-alt',
      enabled: settings.multiAlt,
      title: `multi-alt (${values} values)`,
      run: () => runScript(multiAltScript(values, bundleId)),
    },
  ];
}

/**
 * Run every enabled strategy `settings.reps` times, in order. The first
 * failing script invocation aborts the whole run.
 */
export function runBenchmark(settings: BenchSettings, runScript: ScriptRunner = runJxa): StrategyResult[] {
  const results: StrategyResult[] = [];

  for (const plan of plans(settings, runScript)) {
    if (!plan.enabled) continue;

    let totalSeconds = 0;
    for (let rep = 0; rep < settings.reps; rep++) {
      const start = performance.now();
      timed(plan.title, plan.run);
      totalSeconds += elapsedSeconds(start);
    }
    results.push({ strategy: plan.strategy, totalSeconds, reps: settings.reps });
  }

  return results;
}

export function formatSummary(results: StrategyResult[]): string {
  return results
    .map((r) => {
      const perRep = r.reps > 0 ? r.totalSeconds / r.reps : 0;
      return `${r.strategy}: ${r.totalSeconds.toFixed(1)}s (${perRep.toFixed(3)}s/rep)`;
    })
    .join(', ');
}
