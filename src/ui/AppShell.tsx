import { useEffect, useState } from 'react';
import { useSessionStore } from '../stores/sessionStore';
import { HelpOverlay } from './components/HelpOverlay';
import { useKeyBindings } from './keyBindings';
import { AccountScreen } from './screens/AccountScreen';
import { AuthScreen } from './screens/AuthScreen';
import { BulkScreen } from './screens/BulkScreen';
import { EntryScreen } from './screens/EntryScreen';
import { HistoryScreen } from './screens/HistoryScreen';
import { MenuScreen, type MenuTarget } from './screens/MenuScreen';
import { SummaryScreen } from './screens/SummaryScreen';
import { TransferScreen } from './screens/TransferScreen';

type View = 'menu' | MenuTarget;

export function AppShell() {
  const session = useSessionStore((s) => s.session);
  const [view, setView] = useState<View>('menu');
  const [showHelp, setShowHelp] = useState(false);
  const [refreshKey, setRefreshKey] = useState(0);

  // every new session starts on the menu
  useEffect(() => {
    setView('menu');
    setShowHelp(false);
  }, [session?.token]);

  const toMenu = () => setView('menu');

  useKeyBindings({
    help: () => setShowHelp((shown) => !shown),
    cancel: showHelp ? () => setShowHelp(false) : view !== 'menu' ? toMenu : undefined,
    back: view !== 'menu' ? toMenu : undefined,
    refresh: session ? () => setRefreshKey((k) => k + 1) : undefined,
  });

  if (!session) {
    return (
      <div className="app-shell">
        <AuthScreen />
        {showHelp && <HelpOverlay onClose={() => setShowHelp(false)} />}
      </div>
    );
  }

  const { username, currency, defaultVault } = session;
  const screenProps = { refreshKey, onBack: toMenu };

  const screen = (() => {
    switch (view) {
      case 'menu':
        return <MenuScreen onOpen={setView} />;
      case 'deposit':
      case 'withdraw':
        return <EntryScreen key={view} mode={view} currency={currency} {...screenProps} />;
      case 'transfer':
        return <TransferScreen username={username} currency={currency} {...screenProps} />;
      case 'bulk':
        return <BulkScreen {...screenProps} />;
      case 'summary':
        return <SummaryScreen {...screenProps} />;
      case 'history':
        return <HistoryScreen currency={currency} {...screenProps} />;
      case 'account':
        return <AccountScreen username={username} currency={currency} defaultVault={defaultVault} {...screenProps} />;
    }
  })();

  return (
    <div className="app-shell">
      <main className="app-main">{screen}</main>
      {showHelp && <HelpOverlay onClose={() => setShowHelp(false)} />}
    </div>
  );
}
