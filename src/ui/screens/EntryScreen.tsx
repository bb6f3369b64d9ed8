import { useEffect, useState, type FormEvent } from 'react';
import * as api from '../../api/client';
import { formatMoney, toMinorUnits } from '../../domain/money';
import { Notice, type NoticeState } from '../components/Notice';
import { ScreenHeader } from '../components/ScreenHeader';
import { errorMessage } from '../errors';
import { useLookups } from '../useLookups';

export type EntryMode = 'deposit' | 'withdraw';

interface EntryScreenProps {
  mode: EntryMode;
  currency: string;
  refreshKey: number;
  onBack: () => void;
}

export function EntryScreen({ mode, currency, refreshKey, onBack }: EntryScreenProps) {
  const { vaults, categories, units, error: loadError, reload } = useLookups(refreshKey);

  const [vault, setVault] = useState('');
  const [amount, setAmount] = useState('');
  const [category, setCategory] = useState('');
  const [description, setDescription] = useState('');
  const [quantity, setQuantity] = useState('');
  const [unit, setUnit] = useState('');
  const [date, setDate] = useState('');
  const [saving, setSaving] = useState(false);
  const [notice, setNotice] = useState<NoticeState | null>(null);

  useEffect(() => {
    if (!vault && vaults.length > 0) setVault(vaults[0].name);
  }, [vaults, vault]);

  const selected = vaults.find((v) => v.name === vault);

  const handleSubmit = async (e: FormEvent) => {
    e.preventDefault();

    const minor = toMinorUnits(amount);
    if (minor === null || minor <= 0) {
      setNotice({ kind: 'error', text: 'Amount must be a positive number with at most two decimals' });
      return;
    }
    const qty = quantity.trim() === '' ? null : Number(quantity);
    if (qty !== null && Number.isNaN(qty)) {
      setNotice({ kind: 'error', text: 'Quantity must be a number' });
      return;
    }

    setSaving(true);
    setNotice(null);
    try {
      const input: api.EntryInput = {
        vault,
        amount: minor,
        category,
        description,
        quantity: qty,
        unit: unit || null,
        date: date || null,
      };
      const receipt = mode === 'deposit' ? await api.deposit(input) : await api.withdraw(input);
      setNotice({ kind: 'success', text: `${receipt.message}: ${formatMoney(receipt.amount, currency)}` });
      setAmount('');
      setDescription('');
      setQuantity('');
      setUnit('');
      reload();
    } catch (err) {
      setNotice({ kind: 'error', text: errorMessage(err) });
    } finally {
      setSaving(false);
    }
  };

  const title = mode === 'deposit' ? 'Deposit' : 'Withdraw';

  return (
    <div className="screen">
      <ScreenHeader title={title} onBack={onBack} />
      {loadError && <Notice notice={{ kind: 'error', text: loadError }} />}

      <form className="card form" onSubmit={handleSubmit}>
        <div className="form-row">
          <label htmlFor="entry-vault">Vault</label>
          <select id="entry-vault" value={vault} onChange={(e) => setVault(e.target.value)}>
            {vaults.map((v) => (
              <option key={v.name} value={v.name}>
                {v.name}
              </option>
            ))}
          </select>
          {selected && <span className="field-hint">Balance: {formatMoney(selected.balance, currency)}</span>}
        </div>
        <div className="form-row">
          <label htmlFor="entry-amount">Amount ({currency})</label>
          <input
            id="entry-amount"
            inputMode="decimal"
            autoFocus
            value={amount}
            onChange={(e) => setAmount(e.target.value)}
            placeholder="e.g. 250.00"
          />
        </div>
        <div className="form-row">
          <label htmlFor="entry-category">Category</label>
          <select id="entry-category" value={category} onChange={(e) => setCategory(e.target.value)}>
            <option value="">Choose a category</option>
            {categories.map((c) => (
              <option key={c} value={c}>
                {c}
              </option>
            ))}
          </select>
        </div>
        <div className="form-row">
          <label htmlFor="entry-description">Description</label>
          <input id="entry-description" value={description} onChange={(e) => setDescription(e.target.value)} />
        </div>
        <div className="form-row form-row-split">
          <div>
            <label htmlFor="entry-quantity">Quantity</label>
            <input
              id="entry-quantity"
              inputMode="decimal"
              value={quantity}
              onChange={(e) => setQuantity(e.target.value)}
            />
          </div>
          <div>
            <label htmlFor="entry-unit">Unit</label>
            <select id="entry-unit" value={unit} onChange={(e) => setUnit(e.target.value)}>
              <option value="">None</option>
              {units.map((u) => (
                <option key={u} value={u}>
                  {u}
                </option>
              ))}
            </select>
          </div>
        </div>
        <div className="form-row">
          <label htmlFor="entry-date">Date</label>
          <input id="entry-date" type="date" value={date} onChange={(e) => setDate(e.target.value)} />
          <span className="field-hint">Leave empty for now</span>
        </div>
        <Notice notice={notice} onDismiss={() => setNotice(null)} />
        <button type="submit" className="btn btn-primary" disabled={saving || !vault}>
          {saving ? 'Saving…' : title}
        </button>
      </form>
    </div>
  );
}
