/**
 * API smoke test against a running server.
 * Run with: npm run smoke (requires `npm run server` on API_BASE)
 */

const API_BASE = process.env.API_BASE ?? 'http://localhost:8787';

interface TestResult {
  name: string;
  passed: boolean;
  error?: string;
}

const results: TestResult[] = [];
let token = '';

async function test(name: string, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
    results.push({ name, passed: true });
    console.log(`✓ ${name}`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    results.push({ name, passed: false, error: message });
    console.log(`✗ ${name}: ${message}`);
  }
}

async function fetchJson(path: string, options?: RequestInit): Promise<{ status: number; body: unknown }> {
  const response = await fetch(`${API_BASE}${path}`, {
    ...options,
    headers: {
      'Content-Type': 'application/json',
      ...(token ? { Authorization: `Bearer ${token}` } : {}),
      ...options?.headers,
    },
  });
  return { status: response.status, body: await response.json() };
}

function expectStatus(actual: number, expected: number): void {
  if (actual !== expected) throw new Error(`Expected status ${expected}, got ${actual}`);
}

async function runTests(): Promise<void> {
  console.log('\n=== API Smoke Tests ===\n');

  const username = `smoke${Date.now()}`;
  const password = 'smoke-password';

  await test('GET /health returns ok:true', async () => {
    const { body } = await fetchJson('/health');
    if (typeof body !== 'object' || body === null || !('ok' in body) || body.ok !== true) {
      throw new Error('Expected ok:true');
    }
  });

  await test('POST /auth/signup issues a session token', async () => {
    const { status, body } = await fetchJson('/auth/signup', {
      method: 'POST',
      body: JSON.stringify({ username, password, confirmPassword: password }),
    });
    expectStatus(status, 201);
    if (typeof body !== 'object' || body === null || !('token' in body) || typeof body.token !== 'string') {
      throw new Error('Expected a token');
    }
    token = body.token;
  });

  await test('POST /transactions/deposit credits the Main vault', async () => {
    const { status } = await fetchJson('/transactions/deposit', {
      method: 'POST',
      body: JSON.stringify({ vault: 'Main', amount: 10000, category: 'Salary', description: 'smoke deposit' }),
    });
    expectStatus(status, 201);
  });

  await test('POST /transactions/withdraw refuses overdrafts', async () => {
    const { status } = await fetchJson('/transactions/withdraw', {
      method: 'POST',
      body: JSON.stringify({ vault: 'Main', amount: 999999, category: 'Food', description: 'too much' }),
    });
    expectStatus(status, 422);
  });

  await test('POST /transactions/bulk/validate reports every row', async () => {
    const { status, body } = await fetchJson('/transactions/bulk/validate', {
      method: 'POST',
      body: JSON.stringify({
        rows: [
          { rowNumber: 1, type: 'withdraw', vault: 'Main', amount: 2500, category: 'Food', description: 'groceries' },
          { rowNumber: 2, type: 'withdraw', vault: 'Nowhere', amount: 100, category: 'Food', description: 'bad vault' },
        ],
      }),
    });
    expectStatus(status, 200);
    if (typeof body !== 'object' || body === null || !('validCount' in body) || body.validCount !== 1) {
      throw new Error('Expected exactly one valid row');
    }
  });

  await test('GET /summary returns the total balance', async () => {
    const { status, body } = await fetchJson('/summary');
    expectStatus(status, 200);
    if (typeof body !== 'object' || body === null || !('totalBalance' in body) || body.totalBalance !== 10000) {
      throw new Error('Expected totalBalance 10000');
    }
  });

  console.log('\n=== Summary ===');
  const passed = results.filter(r => r.passed).length;
  const failed = results.filter(r => !r.passed).length;
  console.log(`Passed: ${passed}, Failed: ${failed}`);

  if (failed > 0) {
    process.exit(1);
  }
}

async function checkApiReachable(): Promise<boolean> {
  try {
    const response = await fetch(`${API_BASE}/health`);
    return response.ok;
  } catch {
    return false;
  }
}

async function main(): Promise<void> {
  console.log('Checking if API server is running...');

  const reachable = await checkApiReachable();
  if (!reachable) {
    console.error(`\nError: API server not reachable at ${API_BASE}`);
    console.error('Please start the server with: npm run server\n');
    process.exit(1);
  }

  await runTests();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
