import { useState, type FormEvent } from 'react';
import * as api from '../../api/client';
import { formatMoney } from '../../domain/money';
import { useSessionStore } from '../../stores/sessionStore';
import { Notice, type NoticeState } from '../components/Notice';
import { ScreenHeader } from '../components/ScreenHeader';
import { errorMessage } from '../errors';
import { useLookups } from '../useLookups';

interface AccountScreenProps {
  username: string;
  currency: string;
  defaultVault: string;
  refreshKey: number;
  onBack: () => void;
}

export function AccountScreen({ username, currency, defaultVault, refreshKey, onBack }: AccountScreenProps) {
  const logout = useSessionStore((s) => s.logout);
  const { vaults, reload } = useLookups(refreshKey);

  const [vaultName, setVaultName] = useState('');
  const [currentPassword, setCurrentPassword] = useState('');
  const [newPassword, setNewPassword] = useState('');
  const [confirmPassword, setConfirmPassword] = useState('');
  const [busy, setBusy] = useState(false);
  const [notice, setNotice] = useState<NoticeState | null>(null);

  const run = async (action: () => Promise<string>) => {
    setBusy(true);
    setNotice(null);
    try {
      setNotice({ kind: 'success', text: await action() });
    } catch (err) {
      setNotice({ kind: 'error', text: errorMessage(err) });
    } finally {
      setBusy(false);
    }
  };

  const handleAddVault = (e: FormEvent) => {
    e.preventDefault();
    void run(async () => {
      const vault = await api.addVault(vaultName);
      setVaultName('');
      reload();
      return `Vault '${vault.name}' created`;
    });
  };

  const handleRemoveVault = (name: string) => {
    if (!window.confirm(`Remove '${name}'? Its balance and history move to ${defaultVault}.`)) return;
    void run(async () => {
      const target = await api.removeVault(name);
      reload();
      return `Vault '${name}' removed. ${target.name} now holds ${formatMoney(target.balance, currency)}`;
    });
  };

  const handleChangePassword = (e: FormEvent) => {
    e.preventDefault();
    void run(async () => {
      await api.changePassword(currentPassword, newPassword, confirmPassword);
      setCurrentPassword('');
      setNewPassword('');
      setConfirmPassword('');
      return 'Password changed. Other sessions were signed out.';
    });
  };

  const handleExport = () => {
    void run(async () => {
      const { blob, filename } = await api.downloadExport();
      const url = URL.createObjectURL(blob);
      const link = document.createElement('a');
      link.href = url;
      link.download = filename;
      link.click();
      URL.revokeObjectURL(url);
      return `Downloaded ${filename}`;
    });
  };

  return (
    <div className="screen">
      <ScreenHeader title={`Account: ${username}`} onBack={onBack} />
      <Notice notice={notice} onDismiss={() => setNotice(null)} />

      <section className="card">
        <h2>Vaults</h2>
        <ul className="vault-list">
          {vaults.map((v) => (
            <li key={v.name}>
              <span>{v.name}</span>
              <span className="num">{formatMoney(v.balance, currency)}</span>
              {v.name !== defaultVault && (
                <button type="button" className="btn btn-ghost" disabled={busy} onClick={() => handleRemoveVault(v.name)}>
                  Remove
                </button>
              )}
            </li>
          ))}
        </ul>
        <form className="inline-form" onSubmit={handleAddVault}>
          <input aria-label="New vault name" value={vaultName} onChange={(e) => setVaultName(e.target.value)} placeholder="New vault" />
          <button type="submit" className="btn" disabled={busy || !vaultName.trim()}>
            Add vault
          </button>
        </form>
      </section>

      <section className="card">
        <h2>Change password</h2>
        <form className="form" onSubmit={handleChangePassword}>
          <div className="form-row">
            <label htmlFor="account-current">Current password</label>
            <input
              id="account-current"
              type="password"
              autoComplete="current-password"
              value={currentPassword}
              onChange={(e) => setCurrentPassword(e.target.value)}
            />
          </div>
          <div className="form-row">
            <label htmlFor="account-new">New password</label>
            <input
              id="account-new"
              type="password"
              autoComplete="new-password"
              value={newPassword}
              onChange={(e) => setNewPassword(e.target.value)}
            />
          </div>
          <div className="form-row">
            <label htmlFor="account-confirm">Confirm new password</label>
            <input
              id="account-confirm"
              type="password"
              autoComplete="new-password"
              value={confirmPassword}
              onChange={(e) => setConfirmPassword(e.target.value)}
            />
          </div>
          <button type="submit" className="btn" disabled={busy}>
            Change password
          </button>
        </form>
      </section>

      <section className="card">
        <h2>Data</h2>
        <button type="button" className="btn" disabled={busy} onClick={handleExport}>
          Export to Excel
        </button>
      </section>

      <button type="button" className="btn btn-danger" onClick={() => void logout()}>
        Log out
      </button>
    </div>
  );
}
