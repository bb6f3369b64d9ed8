import { useEffect, useState, type FormEvent } from 'react';
import * as api from '../../api/client';
import { formatMoney, toMinorUnits } from '../../domain/money';
import { Notice, type NoticeState } from '../components/Notice';
import { ScreenHeader } from '../components/ScreenHeader';
import { errorMessage } from '../errors';
import { useLookups } from '../useLookups';

interface TransferScreenProps {
  username: string;
  currency: string;
  refreshKey: number;
  onBack: () => void;
}

export function TransferScreen({ username, currency, refreshKey, onBack }: TransferScreenProps) {
  const { vaults, error: loadError, reload } = useLookups(refreshKey);

  const [users, setUsers] = useState<string[]>([]);
  const [fromVault, setFromVault] = useState('');
  const [toUser, setToUser] = useState(username);
  const [toVaults, setToVaults] = useState<string[]>([]);
  const [toVault, setToVault] = useState('');
  const [amount, setAmount] = useState('');
  const [description, setDescription] = useState('');
  const [date, setDate] = useState('');
  const [asLoan, setAsLoan] = useState(false);
  const [saving, setSaving] = useState(false);
  const [notice, setNotice] = useState<NoticeState | null>(null);

  useEffect(() => {
    api
      .getUsers()
      .then(setUsers)
      .catch((err: unknown) => setNotice({ kind: 'error', text: errorMessage(err) }));
  }, [refreshKey]);

  useEffect(() => {
    if (!fromVault && vaults.length > 0) setFromVault(vaults[0].name);
  }, [vaults, fromVault]);

  // Vault choices follow the destination user; a loan counterpart may not be a user yet.
  useEffect(() => {
    let mounted = true;
    const name = toUser.trim();
    if (!name || !users.some((u) => u.toLowerCase() === name.toLowerCase())) {
      setToVaults([]);
      setToVault('');
      return;
    }

    api
      .getUserVaults(name)
      .then((names) => {
        if (!mounted) return;
        setToVaults(names);
        setToVault((current) => (names.includes(current) ? current : (names[0] ?? '')));
      })
      .catch((err: unknown) => {
        if (mounted) setNotice({ kind: 'error', text: errorMessage(err) });
      });

    return () => {
      mounted = false;
    };
  }, [toUser, users]);

  const source = vaults.find((v) => v.name === fromVault);

  const handleSubmit = async (e: FormEvent) => {
    e.preventDefault();

    const minor = toMinorUnits(amount);
    if (minor === null || minor <= 0) {
      setNotice({ kind: 'error', text: 'Amount must be a positive number with at most two decimals' });
      return;
    }

    setSaving(true);
    setNotice(null);
    try {
      const input: api.TransferInput = {
        fromVault,
        toUser,
        toVault,
        amount: minor,
        description: description || null,
        date: date || null,
      };
      const receipt = asLoan ? await api.lend(input) : await api.transfer(input);
      setNotice({ kind: 'success', text: `${receipt.message}: ${formatMoney(receipt.amount, currency)}` });
      setAmount('');
      setDescription('');
      reload();
    } catch (err) {
      setNotice({ kind: 'error', text: errorMessage(err) });
    } finally {
      setSaving(false);
    }
  };

  return (
    <div className="screen">
      <ScreenHeader title={asLoan ? 'Lend money' : 'Transfer'} onBack={onBack} />
      {loadError && <Notice notice={{ kind: 'error', text: loadError }} />}

      <form className="card form" onSubmit={handleSubmit}>
        <label className="switch">
          <input type="checkbox" checked={asLoan} onChange={(e) => setAsLoan(e.target.checked)} />
          Record as a loan
        </label>

        <div className="form-row">
          <label htmlFor="transfer-from">From vault</label>
          <select id="transfer-from" value={fromVault} onChange={(e) => setFromVault(e.target.value)}>
            {vaults.map((v) => (
              <option key={v.name} value={v.name}>
                {v.name}
              </option>
            ))}
          </select>
          {source && <span className="field-hint">Balance: {formatMoney(source.balance, currency)}</span>}
        </div>

        <div className="form-row">
          <label htmlFor="transfer-user">{asLoan ? 'Lend to' : 'To user'}</label>
          {asLoan ? (
            <>
              <input
                id="transfer-user"
                list="transfer-users"
                value={toUser}
                onChange={(e) => setToUser(e.target.value)}
                placeholder="Anyone, even without an account"
              />
              <datalist id="transfer-users">
                {users
                  .filter((u) => u !== username)
                  .map((u) => (
                    <option key={u} value={u} />
                  ))}
              </datalist>
            </>
          ) : (
            <select id="transfer-user" value={toUser} onChange={(e) => setToUser(e.target.value)}>
              {users.map((u) => (
                <option key={u} value={u}>
                  {u === username ? `${u} (you)` : u}
                </option>
              ))}
            </select>
          )}
        </div>

        <div className="form-row">
          <label htmlFor="transfer-to-vault">To vault</label>
          <select
            id="transfer-to-vault"
            value={toVault}
            onChange={(e) => setToVault(e.target.value)}
            disabled={toVaults.length === 0}
          >
            {asLoan && <option value="">Their default vault</option>}
            {toVaults.map((name) => (
              <option key={name} value={name}>
                {name}
              </option>
            ))}
          </select>
        </div>

        <div className="form-row">
          <label htmlFor="transfer-amount">Amount ({currency})</label>
          <input id="transfer-amount" inputMode="decimal" value={amount} onChange={(e) => setAmount(e.target.value)} />
        </div>
        <div className="form-row">
          <label htmlFor="transfer-description">Description</label>
          <input
            id="transfer-description"
            value={description}
            onChange={(e) => setDescription(e.target.value)}
            placeholder={asLoan ? 'lending money' : 'transferring money'}
          />
        </div>
        <div className="form-row">
          <label htmlFor="transfer-date">Date</label>
          <input id="transfer-date" type="date" value={date} onChange={(e) => setDate(e.target.value)} />
        </div>

        <Notice notice={notice} onDismiss={() => setNotice(null)} />
        <button type="submit" className="btn btn-primary" disabled={saving || !fromVault}>
          {saving ? 'Saving…' : asLoan ? 'Record loan' : 'Transfer'}
        </button>
      </form>
    </div>
  );
}
