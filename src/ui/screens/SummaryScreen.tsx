import { useEffect, useState } from 'react';
import * as api from '../../api/client';
import { loanPosition } from '../../domain/computations';
import { formatMoney } from '../../domain/money';
import type { Summary } from '../../domain/types';
import { MoneyFlowDiagram } from '../components/MoneyFlowDiagram';
import { Notice } from '../components/Notice';
import { ScreenHeader } from '../components/ScreenHeader';
import { VaultCard } from '../components/VaultCard';
import { errorMessage } from '../errors';

interface SummaryScreenProps {
  refreshKey: number;
  onBack: () => void;
}

export function SummaryScreen({ refreshKey, onBack }: SummaryScreenProps) {
  const [summary, setSummary] = useState<Summary | null>(null);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    let mounted = true;
    api
      .getSummary()
      .then((data) => {
        if (mounted) setSummary(data);
      })
      .catch((err: unknown) => {
        console.error('[API] Failed to load summary', err);
        if (mounted) setError(errorMessage(err));
      });
    return () => {
      mounted = false;
    };
  }, [refreshKey]);

  if (error) {
    return (
      <div className="screen">
        <ScreenHeader title="Summary" onBack={onBack} />
        <Notice notice={{ kind: 'error', text: error }} />
      </div>
    );
  }

  if (!summary) {
    return (
      <div className="screen">
        <ScreenHeader title="Summary" onBack={onBack} />
        <p className="loading">Loading…</p>
      </div>
    );
  }

  const { currency } = summary;
  const position = loanPosition(summary.loans, summary.username);

  return (
    <div className="screen screen-wide">
      <ScreenHeader title="Summary" onBack={onBack} />

      <section className="card total-card">
        <span className="total-label">Total balance</span>
        <span className="total-amount">{formatMoney(summary.totalBalance, currency)}</span>
      </section>

      <section className="vault-grid">
        {summary.vaults.map((vault) => (
          <VaultCard
            key={vault.name}
            vault={vault}
            currency={currency}
            share={summary.totalBalance > 0 ? Math.max(0, vault.balance) / summary.totalBalance : 0}
          />
        ))}
      </section>

      <section className="card">
        <h2>Money flow</h2>
        <MoneyFlowDiagram flows={summary.flows} currency={currency} />
      </section>

      <section className="card">
        <h2>By category</h2>
        {summary.categoryTotals.length === 0 ? (
          <p className="no-data">No categorised transactions yet</p>
        ) : (
          <table className="data-table">
            <thead>
              <tr>
                <th>Category</th>
                <th className="num">In</th>
                <th className="num">Out</th>
              </tr>
            </thead>
            <tbody>
              {summary.categoryTotals.map((row) => (
                <tr key={row.category}>
                  <td>{row.category}</td>
                  <td className="num positive">{formatMoney(row.deposited, currency)}</td>
                  <td className="num negative">{formatMoney(row.withdrawn, currency)}</td>
                </tr>
              ))}
            </tbody>
          </table>
        )}
      </section>

      <section className="card">
        <h2>Loans</h2>
        {summary.loans.length === 0 ? (
          <p className="no-data">No loans recorded</p>
        ) : (
          <>
            <table className="data-table">
              <thead>
                <tr>
                  <th>From</th>
                  <th>To</th>
                  <th className="num">Amount</th>
                </tr>
              </thead>
              <tbody>
                {summary.loans.map((loan) => (
                  <tr key={`${loan.fromUser}->${loan.toUser}`}>
                    <td>{loan.fromUser}</td>
                    <td>{loan.toUser}</td>
                    <td className="num">{formatMoney(loan.amount, currency)}</td>
                  </tr>
                ))}
              </tbody>
            </table>
            <p className="loan-position">
              Lent {formatMoney(position.lent, currency)} · Borrowed {formatMoney(position.borrowed, currency)} ·{' '}
              <strong className={position.net >= 0 ? 'positive' : 'negative'}>
                Net {formatMoney(position.net, currency)}
              </strong>
            </p>
          </>
        )}
      </section>
    </div>
  );
}
