import { create } from 'zustand';
import * as api from '../api/client';
import type { Session } from '../domain/types';

type SessionState = {
  session: Session | null;

  login(username: string, password: string): Promise<void>;
  signup(username: string, password: string, confirmPassword: string): Promise<void>;
  logout(): Promise<void>;
  /** Forget the session locally, e.g. after the server answered 401 */
  expire(): void;
};

export const useSessionStore = create<SessionState>((set, get) => ({
  session: null,

  async login(username: string, password: string) {
    const session = await api.login(username, password);
    api.setAuthToken(session.token);
    set({ session });
  },

  async signup(username: string, password: string, confirmPassword: string) {
    const session = await api.signup(username, password, confirmPassword);
    api.setAuthToken(session.token);
    set({ session });
  },

  async logout() {
    if (!get().session) return;
    try {
      await api.logout();
    } catch (error) {
      console.warn('[Session] Logout request failed', error);
    } finally {
      api.setAuthToken(null);
      set({ session: null });
    }
  },

  expire() {
    api.setAuthToken(null);
    set({ session: null });
  },
}));

api.setUnauthorizedHandler(() => {
  console.warn('[Session] Session expired');
  useSessionStore.getState().expire();
});
