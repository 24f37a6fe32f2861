/**
 * Minimal API smoke test script
 * Run with: npm run smoke (requires API server running, PORT or 8787)
 */
import { z } from 'zod';

const API_BASE = `http://localhost:${process.env.PORT ?? 8787}`;

interface TestResult {
  name: string;
  passed: boolean;
  error?: string;
}

const results: TestResult[] = [];

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

async function fetchJson<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, url: string, options?: RequestInit): Promise<T> {
  const response = await fetch(url, {
    ...options,
    headers: {
      'Content-Type': 'application/json',
      ...options?.headers,
    },
  });
  const body: unknown = await response.json();
  return schema.parse(body);
}

const Health = z.object({ ok: z.literal(true) });
const Planner = z.object({ isNew: z.boolean(), incomes: z.array(z.object({ amount: z.number() })) });
const Created = z.object({ incomeId: z.string() });
const ErrorBody = z.object({ error: z.string() });
const Recorded = z.discriminatedUnion('status', [
  z.object({ status: z.literal('ok'), remaining: z.number() }),
  z.object({
    status: z.literal('over_budget'),
    overage: z.number(),
    episode: z.object({ step: z.string() }).nullable(),
  }),
]);
const Resolved = z.object({ status: z.string(), remainingPending: z.number().optional() });
const Plans = z.object({ avalanche: z.object({ text: z.string() }), snowball: z.object({ text: z.string() }) });

async function runTests(): Promise<void> {
  console.log('\n=== API Smoke Tests ===\n');
  const userId = `smoke-${Date.now()}`;
  const base = `${API_BASE}/users/${userId}`;

  await test('GET /health returns ok:true', async () => {
    await fetchJson(Health, `${API_BASE}/health`);
  });

  await test('GET planner for an unknown user asks for onboarding', async () => {
    const planner = await fetchJson(Planner, `${base}/planner`);
    if (!planner.isNew) throw new Error('Expected isNew: true');
  });

  await test('POST onboarding stores profile and main income', async () => {
    await fetchJson(Created, `${base}/onboarding`, {
      method: 'POST',
      body: JSON.stringify({ displayName: 'Smoke', goal: 'Ahorrar para una meta', income: 1000 }),
    });
    const planner = await fetchJson(Planner, `${base}/planner`);
    if (planner.incomes.length !== 1 || planner.incomes[0].amount !== 1000) {
      throw new Error(`Unexpected incomes: ${JSON.stringify(planner.incomes)}`);
    }
  });

  await test('POST onboarding twice is refused', async () => {
    const body = await fetchJson(ErrorBody, `${base}/onboarding`, {
      method: 'POST',
      body: JSON.stringify({ displayName: 'Smoke', income: 1000 }),
    });
    if (body.error !== 'Ya tienes un perfil registrado.') throw new Error(`Unexpected error: ${body.error}`);
  });

  await test('POST transaction within budget is ok', async () => {
    const result = await fetchJson(Recorded, `${base}/transactions`, {
      method: 'POST',
      body: JSON.stringify({ amount: 100, category: 'Comida', spendType: 'Deseos', description: 'cena' }),
    });
    if (result.status !== 'ok' || result.remaining !== 200) {
      throw new Error(`Expected ok with 200 remaining, got ${JSON.stringify(result)}`);
    }
  });

  await test('POST transaction over budget opens an episode', async () => {
    const result = await fetchJson(Recorded, `${base}/transactions`, {
      method: 'POST',
      body: JSON.stringify({ amount: 250, category: 'Entretenimiento', spendType: 'Deseos', description: 'concierto' }),
    });
    if (result.status !== 'over_budget' || result.overage !== 50 || result.episode?.step !== 'choosing_source') {
      throw new Error(`Expected over_budget by 50, got ${JSON.stringify(result)}`);
    }
  });

  await test('Moving 50 from Necesidades resolves the overspend', async () => {
    await fetchJson(Resolved, `${base}/overspend`, {
      method: 'POST',
      body: JSON.stringify({ action: 'move_from', source: 'Necesidades' }),
    });
    const result = await fetchJson(Resolved, `${base}/overspend`, {
      method: 'POST',
      body: JSON.stringify({ action: 'amount', amount: 50 }),
    });
    if (result.status !== 'resolved' || result.remainingPending !== 0) {
      throw new Error(`Expected resolved, got ${JSON.stringify(result)}`);
    }
  });

  await test('POST debt-plans renders both strategies', async () => {
    await fetch(`${base}/debts`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ name: 'Tarjeta', balance: 500, annualRate: 40, minimumPayment: 25 }),
    });
    const plans = await fetchJson(Plans, `${base}/debt-plans`, {
      method: 'POST',
      body: JSON.stringify({ extraMonthly: 100 }),
    });
    if (!plans.avalanche.text.includes('Prioridad #1: Tarjeta')) {
      throw new Error(`Unexpected plan text: ${plans.avalanche.text}`);
    }
  });

  // Summary
  console.log('\n=== Summary ===');
  const passed = results.filter(r => r.passed).length;
  const failed = results.filter(r => !r.passed).length;
  console.log(`Passed: ${passed}, Failed: ${failed}`);

  if (failed > 0) {
    process.exit(1);
  }
}

// Check if API is reachable before running tests
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
    console.error('Please start the server with: npm run dev\n');
    process.exit(1);
  }

  await runTests();
}

main().catch((error: unknown) => {
  console.error('Error running smoke tests:', error);
  process.exit(1);
});
