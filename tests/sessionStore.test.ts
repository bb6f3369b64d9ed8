import { describe, it, expect, vi, afterEach } from 'vitest';
import { useSessionStore } from '../src/stores/sessionStore';
import * as api from '../src/api/client';

const SESSION = { token: 'test-token', username: 'Alice', currency: 'EGP', defaultVault: 'Main' };

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

afterEach(() => {
  useSessionStore.getState().expire();
  vi.unstubAllGlobals();
});

describe('useSessionStore', () => {
  it('keeps the session after logging in', async () => {
    const fetchMock = vi.fn().mockResolvedValueOnce(jsonResponse(200, SESSION)).mockResolvedValueOnce(jsonResponse(200, []));
    vi.stubGlobal('fetch', fetchMock);

    await useSessionStore.getState().login('alice', 'test-secret');
    expect(useSessionStore.getState().session).toEqual(SESSION);

    await api.getVaults();
    expect(fetchMock.mock.calls[1][1]).toMatchObject({ headers: { Authorization: 'Bearer test-token' } });
  });

  it('stays signed out when login fails', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValueOnce(jsonResponse(401, { error: 'Incorrect password' })));

    await expect(useSessionStore.getState().login('alice', 'wrong')).rejects.toThrow('Incorrect password');
    expect(useSessionStore.getState().session).toBeNull();
  });

  it('forgets the session when the server answers 401', async () => {
    vi.stubGlobal(
      'fetch',
      vi
        .fn()
        .mockResolvedValueOnce(jsonResponse(201, SESSION))
        .mockResolvedValueOnce(jsonResponse(401, { error: 'Session expired or invalid' })),
    );
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    await useSessionStore.getState().signup('alice', 'test-secret', 'test-secret');
    await expect(api.getVaults()).rejects.toThrow('Session expired or invalid');

    expect(useSessionStore.getState().session).toBeNull();
    expect(warn).toHaveBeenCalledWith('[Session] Session expired');
    warn.mockRestore();
  });

  it('signs out locally even if the server is unreachable', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValueOnce(jsonResponse(200, SESSION)).mockRejectedValueOnce(new TypeError('fetch failed')),
    );
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    await useSessionStore.getState().login('alice', 'test-secret');
    await useSessionStore.getState().logout();

    expect(useSessionStore.getState().session).toBeNull();
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });
});
