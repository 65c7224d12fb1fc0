/**
 * Performance Benchmark Tests
 *
 * Small scales keep these fast under `npm test`; call `runAllBenchmarks()`
 * with the default scales for real numbers.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  generateGameTransactions,
  generatePlayers,
  runAllBenchmarks,
  type BenchmarkScale,
} from './performance-benchmarks';
import { computeBalances } from '../domain/calculations/ledger';
import { isBalanced } from '../domain/calculations/balance-validator';
import { generateSettlementPlan, isPlanComplete } from '../domain/calculations/settlement-planner';

const SMALL_SCALES: BenchmarkScale[] = [
  { players: 3, rebuys: 4, iterations: 5 },
  { players: 8, rebuys: 40, iterations: 5 },
];

describe('Performance Benchmarks', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  describe('test data', () => {
    it('should generate balanced games', () => {
      const players = generatePlayers(7);
      const transactions = generateGameTransactions(players, 25);
      const balances = computeBalances(players, transactions);

      expect(transactions).toHaveLength(7 + 2 * 25 + 7);
      expect(isBalanced(balances).balanced).toBe(true);
    });

    it('should produce plans that settle every player', () => {
      const players = generatePlayers(50);
      const balances = computeBalances(players, generateGameTransactions(players, 200));
      const plan = generateSettlementPlan(balances);

      expect(plan.totalTransfers).toBeLessThanOrEqual(49);
      expect(isPlanComplete(balances, plan.transfers)).toBe(true);
    });
  });

  it('should time every suite at every scale', async () => {
    const suite = await runAllBenchmarks(SMALL_SCALES);

    expect(suite.balances.map((r) => r.name)).toEqual([
      'balance-3players-14transactions',
      'balance-8players-96transactions',
    ]);
    expect(suite.settlementPlan.map((r) => r.name)).toEqual([
      'settlement-3players',
      'settlement-8players',
    ]);
    expect(suite.reconciliation).toHaveLength(2);

    for (const result of [...suite.balances, ...suite.settlementPlan, ...suite.reconciliation]) {
      expect(result.iterations).toBe(5);
      expect(result.minMs).toBeLessThanOrEqual(result.maxMs);
      expect(result.avgMs).toBeGreaterThanOrEqual(0);
    }
  });
});
