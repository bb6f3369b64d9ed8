import { useEffect, useState } from 'react';
import * as api from '../../api/client';
import { currentMonth, groupByDay, shiftMonth } from '../../domain/computations';
import { formatMoney } from '../../domain/money';
import type { Month, Transaction, TransactionType } from '../../domain/types';
import { Notice } from '../components/Notice';
import { ScreenHeader } from '../components/ScreenHeader';
import { errorMessage } from '../errors';
import { useLookups } from '../useLookups';

const TYPE_FILTERS: { value: TransactionType | ''; label: string }[] = [
  { value: '', label: 'All types' },
  { value: 'deposit', label: 'Deposits' },
  { value: 'withdraw', label: 'Withdrawals' },
  { value: 'transfer', label: 'Transfers' },
  { value: 'loan', label: 'Loans' },
];

function isTypeFilter(value: string): value is TransactionType | '' {
  return TYPE_FILTERS.some((f) => f.value === value);
}

function counterpartyLabel(t: Transaction): string | null {
  if (!t.counterpartyUser) return null;
  const where = t.counterpartyVault ? ` / ${t.counterpartyVault}` : '';
  return `${t.amount < 0 ? 'to' : 'from'} ${t.counterpartyUser}${where}`;
}

interface HistoryScreenProps {
  currency: string;
  refreshKey: number;
  onBack: () => void;
}

export function HistoryScreen({ currency, refreshKey, onBack }: HistoryScreenProps) {
  const { vaults } = useLookups(refreshKey);
  const [month, setMonth] = useState<Month | null>(currentMonth());
  const [vault, setVault] = useState('');
  const [type, setType] = useState<TransactionType | ''>('');
  const [transactions, setTransactions] = useState<Transaction[]>([]);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    let mounted = true;
    setLoading(true);
    api
      .getTransactions({ month: month ?? undefined, vault: vault || undefined, type: type || undefined })
      .then((data) => {
        if (!mounted) return;
        setTransactions(data);
        setError(null);
      })
      .catch((err: unknown) => {
        console.error('[API] Failed to load transactions', err);
        if (mounted) setError(errorMessage(err));
      })
      .finally(() => {
        if (mounted) setLoading(false);
      });
    return () => {
      mounted = false;
    };
  }, [month, vault, type, refreshKey]);

  const net = transactions.reduce((sum, t) => sum + t.amount, 0);

  return (
    <div className="screen screen-wide">
      <ScreenHeader title="History" onBack={onBack} />

      <div className="toolbar">
        <div className="month-filter">
          <button type="button" className="btn btn-ghost" disabled={!month} onClick={() => month && setMonth(shiftMonth(month, -1))}>
            ◀
          </button>
          <span className="month-label">{month ?? 'All months'}</span>
          <button type="button" className="btn btn-ghost" disabled={!month} onClick={() => month && setMonth(shiftMonth(month, 1))}>
            ▶
          </button>
          <button type="button" className="btn btn-ghost" onClick={() => setMonth(month ? null : currentMonth())}>
            {month ? 'Show all' : 'This month'}
          </button>
        </div>
        <select aria-label="Vault" value={vault} onChange={(e) => setVault(e.target.value)}>
          <option value="">All vaults</option>
          {vaults.map((v) => (
            <option key={v.name} value={v.name}>
              {v.name}
            </option>
          ))}
        </select>
        <select
          aria-label="Type"
          value={type}
          onChange={(e) => {
            const value = e.target.value;
            if (isTypeFilter(value)) setType(value);
          }}
        >
          {TYPE_FILTERS.map((f) => (
            <option key={f.value} value={f.value}>
              {f.label}
            </option>
          ))}
        </select>
      </div>

      {error && <Notice notice={{ kind: 'error', text: error }} />}

      {loading ? (
        <p className="loading">Loading…</p>
      ) : transactions.length === 0 ? (
        <p className="no-data">No transactions</p>
      ) : (
        <>
          <p className="history-total">
            {transactions.length} transactions, net{' '}
            <span className={net >= 0 ? 'positive' : 'negative'}>{formatMoney(net, currency)}</span>
          </p>
          {groupByDay(transactions).map(({ day, transactions: dayTxns }) => (
            <section key={day} className="day-group">
              <h3 className="day-heading">{day}</h3>
              <ul className="transaction-list">
                {dayTxns.map((t) => (
                  <li key={t.id} className="transaction-item">
                    <div className="transaction-main">
                      <span className="transaction-description">{t.description}</span>
                      <span className={t.amount >= 0 ? 'amount positive' : 'amount negative'}>
                        {formatMoney(t.amount, currency)}
                      </span>
                    </div>
                    <div className="transaction-meta">
                      <span className={`badge badge-${t.type}`}>{t.type}</span>
                      <span>{t.vault}</span>
                      {t.category && <span>{t.category}</span>}
                      {t.quantity !== null && (
                        <span>
                          {t.quantity} {t.unit ?? ''}
                        </span>
                      )}
                      {counterpartyLabel(t) && <span>{counterpartyLabel(t)}</span>}
                      <span className="transaction-time">{t.date.slice(11, 16)}</span>
                    </div>
                  </li>
                ))}
              </ul>
            </section>
          ))}
        </>
      )}
    </div>
  );
}
