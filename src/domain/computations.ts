/**
 * Pure domain computations used by the screens.
 */
import type { Loan, Month, MoneyFlow, Transaction } from './types';

/** Current month as YYYY-MM (local time) */
export function currentMonth(now: Date = new Date()): Month {
  return `${now.getFullYear()}-${String(now.getMonth() + 1).padStart(2, '0')}`;
}

export function shiftMonth(month: Month, delta: number): Month {
  const [year, mon] = month.split('-').map(Number);
  return currentMonth(new Date(year, mon - 1 + delta, 1));
}

export type FlowNodeKind = 'source' | 'vault' | 'sink';

export interface FlowNode {
  id: string;
  name: string;
  kind: FlowNodeKind;
}

export interface FlowLink {
  source: number;   // index into nodes
  target: number;
  value: number;    // minor units
}

export interface FlowGraph {
  nodes: FlowNode[];
  links: FlowLink[];
}

function byTotalThenName(totals: Map<string, number>): string[] {
  return [...totals.entries()]
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
    .map(([name]) => name);
}

function addTo(map: Map<string, number>, key: string, value: number): void {
  map.set(key, (map.get(key) ?? 0) + value);
}

/**
 * Three-column money-flow graph for the Sankey diagram:
 * income categories → vaults → spending categories.
 *
 * Sources and sinks are ordered by total (largest first, then name),
 * vaults by name; links by source then target index.
 */
export function buildMoneyFlowGraph(flows: MoneyFlow[]): FlowGraph {
  const sourceTotals = new Map<string, number>();
  const sinkTotals = new Map<string, number>();
  const vaults = new Set<string>();

  for (const flow of flows) {
    if (flow.amount <= 0) continue;
    vaults.add(flow.vault);
    addTo(flow.direction === 'in' ? sourceTotals : sinkTotals, flow.category, flow.amount);
  }

  const nodes: FlowNode[] = [
    ...byTotalThenName(sourceTotals).map((name): FlowNode => ({ id: `in:${name}`, name, kind: 'source' })),
    ...[...vaults].sort((a, b) => a.localeCompare(b)).map((name): FlowNode => ({ id: `vault:${name}`, name, kind: 'vault' })),
    ...byTotalThenName(sinkTotals).map((name): FlowNode => ({ id: `out:${name}`, name, kind: 'sink' })),
  ];
  const indexOf = new Map(nodes.map((n, i) => [n.id, i]));

  const linkValues = new Map<string, FlowLink>();
  for (const flow of flows) {
    if (flow.amount <= 0) continue;
    const vault = indexOf.get(`vault:${flow.vault}`);
    const category = indexOf.get(`${flow.direction}:${flow.category}`);
    if (vault === undefined || category === undefined) continue;

    const [source, target] = flow.direction === 'in' ? [category, vault] : [vault, category];
    const key = `${source}->${target}`;
    const existing = linkValues.get(key);
    if (existing) {
      existing.value += flow.amount;
    } else {
      linkValues.set(key, { source, target, value: flow.amount });
    }
  }

  const links = [...linkValues.values()].sort((a, b) => a.source - b.source || a.target - b.target);
  return { nodes, links };
}

export interface LoanPosition {
  lent: number;
  borrowed: number;
  /** positive when others owe the user */
  net: number;
}

export function loanPosition(loans: Loan[], username: string): LoanPosition {
  let lent = 0;
  let borrowed = 0;
  for (const loan of loans) {
    if (loan.fromUser === username) lent += loan.amount;
    if (loan.toUser === username) borrowed += loan.amount;
  }
  return { lent, borrowed, net: lent - borrowed };
}

/** Group transactions by calendar day (YYYY-MM-DD), newest day first. */
export function groupByDay(txns: Transaction[]): { day: string; transactions: Transaction[] }[] {
  const days = new Map<string, Transaction[]>();
  for (const t of txns) {
    const day = t.date.slice(0, 10);
    const list = days.get(day);
    if (list) {
      list.push(t);
    } else {
      days.set(day, [t]);
    }
  }
  return [...days.entries()]
    .sort((a, b) => b[0].localeCompare(a[0]))
    .map(([day, transactions]) => ({ day, transactions }));
}
