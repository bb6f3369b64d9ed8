import { useSessionStore } from '../../stores/sessionStore';
import { useMenuNavigation } from '../useMenuNavigation';

export type MenuTarget = 'deposit' | 'withdraw' | 'transfer' | 'bulk' | 'summary' | 'history' | 'account';

const ITEMS: { target: MenuTarget; label: string }[] = [
  { target: 'deposit', label: 'Deposit' },
  { target: 'withdraw', label: 'Withdraw' },
  { target: 'transfer', label: 'Transfer' },
  { target: 'bulk', label: 'Bulk Add Transactions' },
  { target: 'summary', label: 'Summary' },
  { target: 'history', label: 'History' },
  { target: 'account', label: 'Account' },
];

interface MenuScreenProps {
  onOpen: (target: MenuTarget) => void;
}

export function MenuScreen({ onOpen }: MenuScreenProps) {
  const username = useSessionStore((s) => s.session?.username ?? '');
  const { focused, setFocused } = useMenuNavigation(ITEMS.length, (index) => onOpen(ITEMS[index].target));

  return (
    <div className="menu-screen">
      <h1 className="page-title">Welcome, {username}</h1>
      <ul className="menu" role="menu">
        {ITEMS.map((item, index) => (
          <li key={item.target} role="none">
            <button
              type="button"
              role="menuitem"
              className={index === focused ? 'menu-item focused' : 'menu-item'}
              onMouseEnter={() => setFocused(index)}
              onClick={() => onOpen(item.target)}
            >
              {item.label}
            </button>
          </li>
        ))}
      </ul>
      <p className="hint">↑/↓ to move, Enter to open, F1 for help</p>
    </div>
  );
}
