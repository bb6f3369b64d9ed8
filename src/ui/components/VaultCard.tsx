import { formatMoney } from '../../domain/money';
import type { Vault } from '../../domain/types';

interface VaultCardProps {
  vault: Vault;
  currency: string;
  /** share of the total balance, 0..1 */
  share: number;
}

export function VaultCard({ vault, currency, share }: VaultCardProps) {
  const percent = Math.round(share * 100);

  return (
    <div className="vault-card">
      <div className="vault-card-header">
        <span className="vault-name">{vault.name}</span>
        <span className="vault-share">{percent}%</span>
      </div>
      <div className="vault-balance">{formatMoney(vault.balance, currency)}</div>
      <div className="vault-bar" aria-hidden="true">
        <div className="vault-bar-fill" style={{ width: `${percent}%` }} />
      </div>
    </div>
  );
}
