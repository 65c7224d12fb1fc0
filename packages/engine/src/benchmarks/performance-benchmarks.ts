/**
 * Performance Benchmarking Utilities
 *
 * Measures the hot paths of a settlement view:
 * - Balance aggregation over a game's transactions
 * - Settlement plan generation
 * - Reconciliation of stored settlement records against a plan
 *
 * Usage:
 *   import { runAllBenchmarks } from './performance-benchmarks';
 *   await runAllBenchmarks();  // Run all benchmarks and log results
 */

import { computeBalances } from '../domain/calculations/ledger';
import { generateSettlementPlan } from '../domain/calculations/settlement-planner';
import { reconcileSettlements } from '../domain/settlements/reconciler';
import type { SettlementRecord, Transaction } from '@chipledger/shared';

// ==================== Types ====================

export interface BenchmarkResult {
  name: string;
  iterations: number;
  totalMs: number;
  avgMs: number;
  minMs: number;
  maxMs: number;
  opsPerSecond: number;
}

export interface BenchmarkSuite {
  balances: BenchmarkResult[];
  settlementPlan: BenchmarkResult[];
  reconciliation: BenchmarkResult[];
}

export interface BenchmarkScale {
  players: number;
  rebuys: number;
  iterations: number;
}

const DEFAULT_SCALES: BenchmarkScale[] = [
  { players: 6, rebuys: 10, iterations: 500 },
  { players: 10, rebuys: 100, iterations: 100 },
  { players: 50, rebuys: 2000, iterations: 10 },
];

// ==================== Utilities ====================

function formatMs(ms: number): string {
  if (ms < 1) return `${(ms * 1000).toFixed(2)}µs`;
  if (ms < 1000) return `${ms.toFixed(2)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

function formatOps(ops: number): string {
  if (ops >= 1000000) return `${(ops / 1000000).toFixed(1)}M ops/s`;
  if (ops >= 1000) return `${(ops / 1000).toFixed(1)}K ops/s`;
  return `${ops.toFixed(0)} ops/s`;
}

async function measure<T>(
  name: string,
  fn: () => Promise<T> | T,
  iterations: number = 100
): Promise<BenchmarkResult> {
  const times: number[] = [];

  // Warmup (10% of iterations, min 1)
  const warmupCount = Math.max(1, Math.floor(iterations * 0.1));
  for (let i = 0; i < warmupCount; i++) {
    await fn();
  }

  for (let i = 0; i < iterations; i++) {
    const start = performance.now();
    await fn();
    times.push(performance.now() - start);
  }

  const totalMs = times.reduce((a, b) => a + b, 0);
  const avgMs = totalMs / times.length;

  return {
    name,
    iterations,
    totalMs,
    avgMs,
    minMs: Math.min(...times),
    maxMs: Math.max(...times),
    opsPerSecond: avgMs > 0 ? 1000 / avgMs : Number.POSITIVE_INFINITY,
  };
}

function logResult(result: BenchmarkResult): void {
  console.log(
    `  ${result.name}: avg=${formatMs(result.avgMs)}, ` +
      `min=${formatMs(result.minMs)}, max=${formatMs(result.maxMs)}, ` +
      `${formatOps(result.opsPerSecond)}`
  );
}

// ==================== Test Data Generators ====================

export function generatePlayers(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `player-${i}`);
}

/**
 * A balanced game: every player buys in, even-indexed players win and
 * odd-indexed players lose the same amounts. Rebuys are cashed out again
 * by the same player so the books stay balanced.
 */
export function generateGameTransactions(players: string[], rebuys: number): Transaction[] {
  const gameId = 'bench-game';
  const transactions: Transaction[] = [];
  let timestamp = 0;

  const push = (userId: string, type: Transaction['type'], amount: number): void => {
    transactions.push({
      id: `tx-${transactions.length}`,
      gameId,
      userId,
      type,
      amount,
      timestamp: timestamp++,
    });
  };

  players.forEach((userId, i) => push(userId, 'buyin', 200 + i));

  for (let i = 0; i < rebuys; i++) {
    const userId = players[i % players.length];
    if (userId === undefined) break;
    push(userId, 'buyin', 20);
    push(userId, 'cashout', 20);
  }

  players.forEach((userId, i) => {
    const swing = (Math.floor(i / 2) + 1) * 5;
    const isLastOdd = i === players.length - 1 && players.length % 2 === 1;
    const delta = isLastOdd ? 0 : i % 2 === 0 ? swing : -swing;
    push(userId, 'cashout', 200 + i + delta);
  });

  return transactions;
}

// ==================== Benchmarks ====================

export async function benchmarkBalances(
  scales: BenchmarkScale[] = DEFAULT_SCALES
): Promise<BenchmarkResult[]> {
  console.log('\n📊 Balance Calculation Benchmarks');
  console.log('==================================');

  const results: BenchmarkResult[] = [];
  for (const { players, rebuys, iterations } of scales) {
    const participants = generatePlayers(players);
    const transactions = generateGameTransactions(participants, rebuys);

    const result = await measure(
      `balance-${players}players-${transactions.length}transactions`,
      () => computeBalances(participants, transactions),
      iterations
    );
    results.push(result);
    logResult(result);
  }

  return results;
}

export async function benchmarkSettlementPlan(
  scales: BenchmarkScale[] = DEFAULT_SCALES
): Promise<BenchmarkResult[]> {
  console.log('\n📊 Settlement Plan Generation Benchmarks');
  console.log('=========================================');

  const results: BenchmarkResult[] = [];
  for (const { players, rebuys, iterations } of scales) {
    const participants = generatePlayers(players);
    const balances = computeBalances(participants, generateGameTransactions(participants, rebuys));

    const result = await measure(
      `settlement-${players}players`,
      () => generateSettlementPlan(balances),
      iterations
    );
    results.push(result);
    logResult(result);
  }

  return results;
}

export async function benchmarkReconciliation(
  scales: BenchmarkScale[] = DEFAULT_SCALES
): Promise<BenchmarkResult[]> {
  console.log('\n📊 Settlement Reconciliation Benchmarks');
  console.log('========================================');

  const results: BenchmarkResult[] = [];
  for (const { players, rebuys, iterations } of scales) {
    const participants = generatePlayers(players);
    const balances = computeBalances(participants, generateGameTransactions(participants, rebuys));
    const { transfers } = generateSettlementPlan(balances);

    // Half the records match the plan, half carry a stale amount
    const records: SettlementRecord[] = transfers.map((transfer, i) => ({
      gameId: 'bench-game',
      fromUserId: transfer.from,
      toUserId: transfer.to,
      amount: i % 2 === 0 ? transfer.amount : transfer.amount + 1,
      paymentMethod: 'cash',
      settledAt: i,
    }));

    const result = await measure(
      `reconcile-${transfers.length}transfers`,
      () => reconcileSettlements(transfers, records),
      iterations
    );
    results.push(result);
    logResult(result);
  }

  return results;
}

// ==================== Main Runner ====================

export async function runAllBenchmarks(
  scales: BenchmarkScale[] = DEFAULT_SCALES
): Promise<BenchmarkSuite> {
  console.log('🚀 Starting Performance Benchmarks');
  console.log('===================================\n');
  console.log('Date:', new Date().toISOString());

  const suite: BenchmarkSuite = {
    balances: await benchmarkBalances(scales),
    settlementPlan: await benchmarkSettlementPlan(scales),
    reconciliation: await benchmarkReconciliation(scales),
  };

  console.log('\n✅ All benchmarks complete!');
  return suite;
}
