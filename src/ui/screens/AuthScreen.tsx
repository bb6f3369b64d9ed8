import { useState, type FormEvent } from 'react';
import { useSessionStore } from '../../stores/sessionStore';
import { Notice, type NoticeState } from '../components/Notice';
import { errorMessage } from '../errors';

type Mode = 'login' | 'signup';

export function AuthScreen() {
  const login = useSessionStore((s) => s.login);
  const signup = useSessionStore((s) => s.signup);

  const [mode, setMode] = useState<Mode>('login');
  const [username, setUsername] = useState('');
  const [password, setPassword] = useState('');
  const [confirmPassword, setConfirmPassword] = useState('');
  const [busy, setBusy] = useState(false);
  const [notice, setNotice] = useState<NoticeState | null>(null);

  const switchMode = (next: Mode) => {
    setMode(next);
    setNotice(null);
    setConfirmPassword('');
  };

  const handleSubmit = async (e: FormEvent) => {
    e.preventDefault();
    if (!username.trim() || !password) {
      setNotice({ kind: 'error', text: 'Username and password are required' });
      return;
    }

    setBusy(true);
    setNotice(null);
    try {
      if (mode === 'login') {
        await login(username, password);
      } else {
        await signup(username, password, confirmPassword);
      }
    } catch (err) {
      setNotice({ kind: 'error', text: errorMessage(err) });
      setPassword('');
      setConfirmPassword('');
    } finally {
      setBusy(false);
    }
  };

  return (
    <div className="auth-screen">
      <h1 className="app-title">Vaultbook</h1>
      <div className="tabs" role="tablist">
        <button
          type="button"
          role="tab"
          aria-selected={mode === 'login'}
          className={mode === 'login' ? 'tab active' : 'tab'}
          onClick={() => switchMode('login')}
        >
          Log in
        </button>
        <button
          type="button"
          role="tab"
          aria-selected={mode === 'signup'}
          className={mode === 'signup' ? 'tab active' : 'tab'}
          onClick={() => switchMode('signup')}
        >
          Sign up
        </button>
      </div>

      <form className="card form" onSubmit={handleSubmit}>
        <div className="form-row">
          <label htmlFor="auth-username">Username</label>
          <input
            id="auth-username"
            autoFocus
            autoComplete="username"
            value={username}
            onChange={(e) => setUsername(e.target.value)}
          />
        </div>
        <div className="form-row">
          <label htmlFor="auth-password">Password</label>
          <input
            id="auth-password"
            type="password"
            autoComplete={mode === 'login' ? 'current-password' : 'new-password'}
            value={password}
            onChange={(e) => setPassword(e.target.value)}
          />
        </div>
        {mode === 'signup' && (
          <div className="form-row">
            <label htmlFor="auth-confirm">Confirm password</label>
            <input
              id="auth-confirm"
              type="password"
              autoComplete="new-password"
              value={confirmPassword}
              onChange={(e) => setConfirmPassword(e.target.value)}
            />
          </div>
        )}
        <Notice notice={notice} />
        <button type="submit" className="btn btn-primary" disabled={busy}>
          {busy ? 'Please wait…' : mode === 'login' ? 'Log in' : 'Create account'}
        </button>
      </form>
    </div>
  );
}
