/**
 * Benchmark suite for the preflop advisor.
 * Measures: evaluator evaluations/second, Monte Carlo equity trials/second,
 * and end-to-end recommendation latency on a facing line.
 *
 * Usage: npx tsx scripts/benchmark.ts
 * Exit 0 = all targets met, non-zero = some target missed.
 */

import { createDeck, createSeededRng, parseCards, sampleCards, scoreHand, type Card } from '@preflop-advisor/poker-engine';
import { decide, rangeFor, simulateEquity, type DecisionInput } from '@preflop-advisor/preflop-core';

// ── Targets ──────────────────────────────────────────────────
// scoreHand walks C(7,5) = 21 five-card subsets per seven-card hand.
const TARGET_EVALS_PER_SEC = 40_000;
const TARGET_TRIALS_PER_SEC = 10_000;
const TARGET_DECISION_MS = 250;

// ── Helpers ──────────────────────────────────────────────────

function formatNumber(n: number): string {
  return n.toLocaleString('en-US');
}

// ── Benchmark 1: Evaluator evaluations/second ────────────────

function benchmarkEvaluator(): { evalsPerSec: number; totalEvals: number; elapsedMs: number } {
  const WARMUP = 500;
  const DURATION_MS = 3_000;

  const rng = createSeededRng(99999);
  const deck = createDeck();
  const testCases: Card[][] = [];
  for (let i = 0; i < 10_000; i++) {
    testCases.push(sampleCards(deck, 7, rng));
  }

  for (let i = 0; i < WARMUP; i++) {
    scoreHand(testCases[i % testCases.length]);
  }

  let count = 0;
  const start = performance.now();
  while (performance.now() - start < DURATION_MS) {
    scoreHand(testCases[count % testCases.length]);
    count++;
  }
  const elapsed = performance.now() - start;
  return {
    evalsPerSec: Math.round((count / elapsed) * 1000),
    totalEvals: count,
    elapsedMs: Math.round(elapsed),
  };
}

// ── Benchmark 2: Equity trials/second ────────────────────────

function benchmarkEquity(): { trialsPerSec: number; totalTrials: number; elapsedMs: number; equity: number } {
  const TRIALS = 20_000;
  const hero = parseCards(['Ah', 'Kd']);
  const range = rangeFor('BTN', 'open');

  // Warmup
  simulateEquity(hero, range, 500, 1, { maxEnumeration: 0 });

  const start = performance.now();
  const result = simulateEquity(hero, range, TRIALS, 42, { maxEnumeration: 0 });
  const elapsed = performance.now() - start;
  return {
    trialsPerSec: Math.round((TRIALS / elapsed) * 1000),
    totalTrials: TRIALS,
    elapsedMs: Math.round(elapsed),
    equity: Math.round(result.equity * 10) / 10,
  };
}

// ── Benchmark 3: Recommendation latency ──────────────────────

function benchmarkDecision(): { avgLatencyMs: number; p50Ms: number; p99Ms: number; total: number } {
  const RUNS = 50;
  const latencies: number[] = [];
  const rng = createSeededRng(7);
  const deck = createDeck();

  for (let i = 0; i < RUNS; i++) {
    const input: DecisionInput = {
      heroCards: sampleCards(deck, 2, rng),
      position: 'BTN',
      stackBB: 100,
      lineType: 'facing-open',
      opponentProfile: 'reg',
      aggressorPosition: 'CO',
    };
    const start = performance.now();
    decide(input, { seed: i, trials: 1000 });
    latencies.push(performance.now() - start);
  }

  latencies.sort((a, b) => a - b);
  const avg = latencies.reduce((s, v) => s + v, 0) / latencies.length;
  const p50 = latencies[Math.floor(latencies.length * 0.5)];
  const p99 = latencies[Math.floor(latencies.length * 0.99)];

  return {
    avgLatencyMs: Math.round(avg * 1000) / 1000,
    p50Ms: Math.round(p50 * 1000) / 1000,
    p99Ms: Math.round(p99 * 1000) / 1000,
    total: latencies.length,
  };
}

// ── Main ─────────────────────────────────────────────────────

async function main() {
  console.log('=== Preflop Advisor Benchmark Suite ===\n');

  console.log('--- Evaluator: Evaluations/second ---');
  const evaluator = benchmarkEvaluator();
  console.log(`  Total evals:   ${formatNumber(evaluator.totalEvals)}`);
  console.log(`  Elapsed:       ${evaluator.elapsedMs}ms`);
  console.log(`  Evals/sec:     ${formatNumber(evaluator.evalsPerSec)}`);
  console.log(`  Target:        >=${formatNumber(TARGET_EVALS_PER_SEC)}`);
  const evalPass = evaluator.evalsPerSec >= TARGET_EVALS_PER_SEC;
  console.log(`  Result:        ${evalPass ? 'PASS' : 'FAIL'}\n`);

  console.log('--- Equity: Monte Carlo trials/second (AKo vs BTN open) ---');
  const equity = benchmarkEquity();
  console.log(`  Total trials:  ${formatNumber(equity.totalTrials)}`);
  console.log(`  Elapsed:       ${equity.elapsedMs}ms`);
  console.log(`  Trials/sec:    ${formatNumber(equity.trialsPerSec)}`);
  console.log(`  Equity:        ${equity.equity}%`);
  console.log(`  Target:        >=${formatNumber(TARGET_TRIALS_PER_SEC)}`);
  const equityPass = equity.trialsPerSec >= TARGET_TRIALS_PER_SEC;
  console.log(`  Result:        ${equityPass ? 'PASS' : 'FAIL'}\n`);

  console.log('--- Recommendation latency (facing-open, 1000 trials) ---');
  const decision = benchmarkDecision();
  console.log(`  Decisions:     ${decision.total}`);
  console.log(`  Avg latency:   ${decision.avgLatencyMs}ms`);
  console.log(`  P50 latency:   ${decision.p50Ms}ms`);
  console.log(`  P99 latency:   ${decision.p99Ms}ms`);
  console.log(`  Target (avg):  <${TARGET_DECISION_MS}ms`);
  const decisionPass = decision.avgLatencyMs < TARGET_DECISION_MS;
  console.log(`  Result:        ${decisionPass ? 'PASS' : 'FAIL'}\n`);

  console.log('=== Summary ===');
  console.log(`  Evaluator:  ${evalPass ? 'PASS' : 'FAIL'} (${formatNumber(evaluator.evalsPerSec)} evals/sec)`);
  console.log(`  Equity:     ${equityPass ? 'PASS' : 'FAIL'} (${formatNumber(equity.trialsPerSec)} trials/sec)`);
  console.log(`  Decision:   ${decisionPass ? 'PASS' : 'FAIL'} (${decision.avgLatencyMs}ms avg)`);

  const allPass = evalPass && equityPass && decisionPass;
  console.log(`\n${allPass ? '*** ALL BENCHMARKS PASSED ***' : '*** SOME BENCHMARKS FAILED ***'}`);
  process.exit(allPass ? 0 : 1);
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
