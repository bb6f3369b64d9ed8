import { describe, it, expect } from 'vitest';
import { buildMoneyFlowGraph, currentMonth, groupByDay, loanPosition, shiftMonth } from '../src/domain/computations';
import type { Transaction } from '../src/domain/types';

describe('months', () => {
  it('formats the current month', () => {
    expect(currentMonth(new Date(2024, 0, 5))).toBe('2024-01');
  });

  it('shifts across year boundaries', () => {
    expect(shiftMonth('2024-01', -1)).toBe('2023-12');
    expect(shiftMonth('2024-12', 1)).toBe('2025-01');
  });
});

describe('buildMoneyFlowGraph', () => {
  it('lays out income, vaults and spending in columns', () => {
    const graph = buildMoneyFlowGraph([
      { vault: 'Main', category: 'Salary', direction: 'in', amount: 10000 },
      { vault: 'Savings', category: 'Gift', direction: 'in', amount: 2000 },
      { vault: 'Main', category: 'Food', direction: 'out', amount: 3000 },
      { vault: 'Main', category: 'Food', direction: 'out', amount: 500 },
      { vault: 'Savings', category: 'Rent', direction: 'out', amount: 3500 },
      { vault: 'Main', category: 'Fees', direction: 'out', amount: 0 },
    ]);

    expect(graph.nodes).toEqual([
      { id: 'in:Salary', name: 'Salary', kind: 'source' },
      { id: 'in:Gift', name: 'Gift', kind: 'source' },
      { id: 'vault:Main', name: 'Main', kind: 'vault' },
      { id: 'vault:Savings', name: 'Savings', kind: 'vault' },
      { id: 'out:Food', name: 'Food', kind: 'sink' },
      { id: 'out:Rent', name: 'Rent', kind: 'sink' },
    ]);
    expect(graph.links).toEqual([
      { source: 0, target: 2, value: 10000 },
      { source: 1, target: 3, value: 2000 },
      { source: 2, target: 4, value: 3500 },
      { source: 3, target: 5, value: 3500 },
    ]);
  });

  it('is empty without flows', () => {
    expect(buildMoneyFlowGraph([])).toEqual({ nodes: [], links: [] });
  });
});

describe('loanPosition', () => {
  it('nets what the user lent against what they borrowed', () => {
    const loans = [
      { fromUser: 'Alice', toUser: 'Bob', amount: 1200 },
      { fromUser: 'Carol', toUser: 'Alice', amount: 500 },
      { fromUser: 'Bob', toUser: 'Carol', amount: 99 },
    ];
    expect(loanPosition(loans, 'Alice')).toEqual({ lent: 1200, borrowed: 500, net: 700 });
  });
});

describe('groupByDay', () => {
  const txn = (id: number, date: string): Transaction => ({
    id,
    vault: 'Main',
    type: 'deposit',
    amount: 100,
    category: 'Salary',
    description: 'pay',
    quantity: null,
    unit: null,
    date,
    counterpartyUser: null,
    counterpartyVault: null,
  });

  it('puts the newest day first and keeps order within a day', () => {
    const a = txn(1, '2024-01-03 10:00:00');
    const b = txn(2, '2024-01-05 09:00:00');
    const c = txn(3, '2024-01-03 08:00:00');

    expect(groupByDay([a, b, c])).toEqual([
      { day: '2024-01-05', transactions: [b] },
      { day: '2024-01-03', transactions: [a, c] },
    ]);
  });
});
