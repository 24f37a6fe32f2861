import express, { type Request, type RequestHandler, type Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import { fromCents, parseAmount } from '../../src/domain/money.js';
import {
  parseNonNegativeAmount,
  parsePercentages,
  parsePositiveAmount,
  parseRate,
} from '../../src/domain/input.js';
import { EXPENSE_CATEGORIES, GOALS, SPEND_TYPES } from '../../src/domain/types.js';
import type { OverspendChoice, ReconciliationEpisode } from '../../src/planner/reconciliation.js';
import { SAVE_FAILED_MESSAGE, type PlannerService, type RecordOutcome } from '../../src/planner/service.js';
import {
  debtPlansJson,
  monthStatusJson,
  recordOutcomeJson,
  reportJson,
  resolveOutcomeJson,
  snapshotJson,
  statusRowJson,
} from './present.js';

// --- Request bodies ---

const NumberLike = z.union([z.number(), z.string()]);

function amountField(parse: (input: string | number) => number | null, message: string) {
  return NumberLike.transform((value, ctx) => {
    const parsed = parse(value);
    if (parsed === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message });
      return z.NEVER;
    }
    return parsed;
  });
}

const PositiveAmount = amountField(parsePositiveAmount, 'Monto inválido. Ingresa un número positivo.');
const NonNegativeAmount = amountField(parseNonNegativeAmount, 'Monto inválido. Ingresa un número positivo o cero.');
const Rate = amountField(parseRate, 'Tasa inválida. Ingresa un número realista (ej. 25 para 25%).');
const SpendTypeField = z.enum(SPEND_TYPES, {
  errorMap: () => ({ message: `Tipo de gasto inválido. Usa ${SPEND_TYPES.join(', ')}.` }),
});
const Name = z.string().trim().min(1, 'El nombre no puede estar vacío.');

const PercentagesBody = z
  .object({ necesidades: NumberLike, deseos: NumberLike, inversion: NumberLike })
  .transform((body, ctx) => {
    const percentages = parsePercentages(body.necesidades, body.deseos, body.inversion);
    if (!percentages) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Porcentajes inválidos. Cada uno debe estar entre 0 y 100 y sumar 100.',
      });
      return z.NEVER;
    }
    return percentages;
  });

const OnboardingBody = z.object({
  displayName: Name,
  goal: z.string().trim().default(''),
  income: PositiveAmount,
  percentages: PercentagesBody.optional(),
});

const ExpenseBody = z.object({
  amount: PositiveAmount,
  category: z.string().trim().min(1, 'Elige una categoría.'),
  spendType: SpendTypeField,
  description: z.string().trim().default(''),
});

const ContributionBody = z.object({
  amount: PositiveAmount,
  description: z.string().trim().min(1, 'Escribe una descripción.'),
});

const IncomeBody = z.object({ name: Name, amount: PositiveAmount });

const DebtBody = z.object({
  name: Name,
  balance: NonNegativeAmount,
  annualRate: Rate,
  minimumPayment: NonNegativeAmount,
});

const ShortcutBody = z.object({
  name: Name,
  amount: PositiveAmount,
  category: z.string().trim().min(1, 'Elige una categoría.'),
  spendType: SpendTypeField,
});

const OverspendBody = z.discriminatedUnion('action', [
  z.object({ action: z.literal('leave') }),
  z.object({ action: z.literal('move_from'), source: SpendTypeField }),
  z.object({ action: z.literal('amount'), amount: NumberLike }),
]);

const DebtPlanBody = z.object({ extraMonthly: NonNegativeAmount });

const NO_OPEN_EPISODE = 'No hay un sobregiro pendiente de resolver.';
const NEEDS_ONBOARDING_MESSAGE = 'Primero completa tu registro.';
const ALREADY_ONBOARDED_MESSAGE = 'Ya tienes un perfil registrado.';

function rejectionMessage(reason: string, available: number | undefined): string {
  switch (reason) {
    case 'source_unavailable':
      return 'Esa categoría ya no tiene fondos disponibles para mover.';
    case 'unexpected_choice':
      return 'Primero elige de qué categoría mover los fondos.';
    default:
      return available === undefined
        ? 'Monto inválido. Debe ser un número positivo.'
        : `Monto inválido. Debe ser un número positivo y no mayor a $${fromCents(available).toFixed(2)}.`;
  }
}

// --- Helpers ---

type Handler = (req: Request, res: Response) => Promise<void>;

/** Wraps an async handler; unexpected errors are logged and answered with 500 */
function route(label: string, handler: Handler): RequestHandler {
  return (req, res) => {
    handler(req, res).catch((error: unknown) => {
      console.error(`Error ${label}:`, error);
      if (!res.headersSent) {
        res.status(500).json({ error: `Failed to ${label}` });
      }
    });
  };
}

/** Validated body, or undefined after answering 400 with the first message */
function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, req: Request, res: Response): T | undefined {
  const result = schema.safeParse(req.body);
  if (!result.success) {
    const first = result.error.issues[0];
    res.status(400).json({ error: first ? first.message : 'Invalid request body' });
    return undefined;
  }
  return result.data;
}

function saveFailed(res: Response): void {
  res.status(503).json({ error: SAVE_FAILED_MESSAGE });
}

function needsOnboarding(res: Response): void {
  res.status(409).json({ error: NEEDS_ONBOARDING_MESSAGE });
}

function toChoice(body: z.infer<typeof OverspendBody>): OverspendChoice | null {
  switch (body.action) {
    case 'leave':
      return { kind: 'leave' };
    case 'move_from':
      return { kind: 'move_from', source: body.source };
    case 'amount': {
      // Sign and upper bound are checked against fresh availability by the service
      const amount = parseAmount(body.amount);
      return amount === null ? null : { kind: 'amount', amount };
    }
  }
}

export function createApp(service: PlannerService): express.Express {
  const app = express();
  // Open reconciliation episodes, one per user
  const episodes = new Map<string, ReconciliationEpisode>();

  // An expense that opens no episode supersedes whatever episode was open
  function trackEpisode(userId: string, outcome: RecordOutcome): void {
    if (outcome.status === 'over_budget' && outcome.episode) {
      episodes.set(userId, outcome.episode);
    } else {
      episodes.delete(userId);
    }
  }

  app.use(cors());
  app.use(express.json());

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.get('/catalog', (_req, res) => {
    res.json({ spendTypes: SPEND_TYPES, goals: GOALS, categories: EXPENSE_CATEGORIES });
  });

  app.get(
    '/users/:userId/planner',
    route('loading planner', async (req, res) => {
      const snapshot = await service.loadPlanner(req.params.userId);
      const episode = episodes.get(req.params.userId);
      res.json({ ...snapshotJson(snapshot), openEpisode: episode ? episode.step : null });
    }),
  );

  app.post(
    '/users/:userId/onboarding',
    route('saving onboarding', async (req, res) => {
      const body = parseBody(OnboardingBody, req, res);
      if (!body) return;
      const result = await service.onboard(req.params.userId, body);
      if (result.status === 'already_onboarded') {
        res.status(409).json({ error: ALREADY_ONBOARDED_MESSAGE });
        return;
      }
      if (result.status !== 'ok') return saveFailed(res);
      res.status(201).json({ incomeId: result.value });
    }),
  );

  app.get(
    '/users/:userId/status',
    route('fetching status', async (req, res) => {
      res.json(monthStatusJson(await service.monthStatus(req.params.userId)));
    }),
  );

  app.get(
    '/users/:userId/summary',
    route('fetching monthly summary', async (req, res) => {
      const rows = await service.quickStatus(req.params.userId);
      res.json(rows.map(statusRowJson));
    }),
  );

  app.get(
    '/users/:userId/report',
    route('building report', async (req, res) => {
      res.json(reportJson(await service.fullReport(req.params.userId)));
    }),
  );

  app.put(
    '/users/:userId/budget',
    route('updating budget', async (req, res) => {
      const percentages = parseBody(PercentagesBody, req, res);
      if (!percentages) return;
      const result = await service.setBudgetPercentages(req.params.userId, percentages);
      if (result.status === 'needs_onboarding') return needsOnboarding(res);
      if (result.status !== 'ok') return saveFailed(res);
      res.json({ budgetPercentages: result.value });
    }),
  );

  // --- Transactions and reconciliation ---

  app.post(
    '/users/:userId/transactions',
    route('creating transaction', async (req, res) => {
      const body = parseBody(ExpenseBody, req, res);
      if (!body) return;
      const { userId } = req.params;
      const outcome = await service.recordTransaction(userId, body);
      if (outcome.status === 'save_failed') return saveFailed(res);
      if (outcome.status === 'needs_onboarding') return needsOnboarding(res);
      trackEpisode(userId, outcome);
      res.status(201).json(recordOutcomeJson(outcome));
    }),
  );

  app.post(
    '/users/:userId/contributions',
    route('recording contribution', async (req, res) => {
      const body = parseBody(ContributionBody, req, res);
      if (!body) return;
      const { userId } = req.params;
      const outcome = await service.recordContribution(userId, body.amount, body.description);
      if (outcome.status === 'save_failed') return saveFailed(res);
      if (outcome.status === 'needs_onboarding') return needsOnboarding(res);
      trackEpisode(userId, outcome);
      res.status(201).json(recordOutcomeJson(outcome));
    }),
  );

  app.post(
    '/users/:userId/shortcuts/:id/use',
    route('using shortcut', async (req, res) => {
      const { userId, id } = req.params;
      const outcome = await service.recordShortcutExpense(userId, id);
      if (outcome.status === 'not_found') {
        res.status(404).json({ error: 'Shortcut not found' });
        return;
      }
      if (outcome.status === 'save_failed') return saveFailed(res);
      if (outcome.status === 'needs_onboarding') return needsOnboarding(res);
      trackEpisode(userId, outcome);
      res.status(201).json(recordOutcomeJson(outcome));
    }),
  );

  app.post(
    '/users/:userId/overspend',
    route('resolving overspend', async (req, res) => {
      const { userId } = req.params;
      const episode = episodes.get(userId);
      if (!episode) {
        res.status(409).json({ error: NO_OPEN_EPISODE });
        return;
      }
      const body = parseBody(OverspendBody, req, res);
      if (!body) return;
      const choice = toChoice(body);
      if (!choice) {
        res.status(400).json({ error: rejectionMessage('not_positive', undefined) });
        return;
      }

      const outcome = await service.resolveOverspend(episode, choice);
      switch (outcome.status) {
        case 'save_failed':
          return saveFailed(res);
        case 'resolved':
          episodes.delete(userId);
          res.json(resolveOutcomeJson(outcome));
          return;
        case 'awaiting_amount':
          episodes.set(userId, outcome.episode);
          res.json(resolveOutcomeJson(outcome));
          return;
        case 'rejected':
          episodes.set(userId, outcome.episode);
          res.status(422).json({
            error: rejectionMessage(outcome.reason, outcome.available),
            ...resolveOutcomeJson(outcome),
          });
          return;
      }
    }),
  );

  app.delete('/users/:userId/overspend', (req, res) => {
    if (!episodes.delete(req.params.userId)) {
      res.status(404).json({ error: NO_OPEN_EPISODE });
      return;
    }
    res.json({ message: 'Operación cancelada.' });
  });

  // --- Incomes, debts, shortcuts ---

  app.post(
    '/users/:userId/incomes',
    route('creating income', async (req, res) => {
      const body = parseBody(IncomeBody, req, res);
      if (!body) return;
      const result = await service.addIncome(req.params.userId, body);
      if (result.status === 'needs_onboarding') return needsOnboarding(res);
      if (result.status !== 'ok') return saveFailed(res);
      res.status(201).json({ id: result.value });
    }),
  );

  app.put(
    '/users/:userId/incomes/:id',
    route('updating income', async (req, res) => {
      const body = parseBody(IncomeBody, req, res);
      if (!body) return;
      const result = await service.updateIncome(req.params.userId, req.params.id, body);
      if (result.status === 'not_found') {
        res.status(404).json({ error: 'Income not found' });
        return;
      }
      if (result.status !== 'ok') return saveFailed(res);
      res.json({ id: result.value });
    }),
  );

  app.delete(
    '/users/:userId/incomes/:id',
    route('deleting income', async (req, res) => {
      const result = await service.deleteIncome(req.params.userId, req.params.id);
      if (result.status !== 'ok') return saveFailed(res);
      if (!result.value) {
        res.status(404).json({ error: 'Income not found' });
        return;
      }
      res.json({ success: true });
    }),
  );

  app.post(
    '/users/:userId/debts',
    route('creating debt', async (req, res) => {
      const body = parseBody(DebtBody, req, res);
      if (!body) return;
      const result = await service.addDebt(req.params.userId, body);
      if (result.status === 'needs_onboarding') return needsOnboarding(res);
      if (result.status !== 'ok') return saveFailed(res);
      res.status(201).json({ id: result.value });
    }),
  );

  app.put(
    '/users/:userId/debts/:id',
    route('updating debt', async (req, res) => {
      const body = parseBody(DebtBody, req, res);
      if (!body) return;
      const result = await service.updateDebt(req.params.userId, req.params.id, body);
      if (result.status === 'not_found') {
        res.status(404).json({ error: 'Debt not found' });
        return;
      }
      if (result.status !== 'ok') return saveFailed(res);
      res.json({ id: result.value });
    }),
  );

  app.delete(
    '/users/:userId/debts/:id',
    route('deleting debt', async (req, res) => {
      const result = await service.deleteDebt(req.params.userId, req.params.id);
      if (result.status !== 'ok') return saveFailed(res);
      if (!result.value) {
        res.status(404).json({ error: 'Debt not found' });
        return;
      }
      res.json({ success: true });
    }),
  );

  app.post(
    '/users/:userId/shortcuts',
    route('creating shortcut', async (req, res) => {
      const body = parseBody(ShortcutBody, req, res);
      if (!body) return;
      const result = await service.addShortcut(req.params.userId, body);
      if (result.status === 'needs_onboarding') return needsOnboarding(res);
      if (result.status !== 'ok') return saveFailed(res);
      res.status(201).json({ id: result.value });
    }),
  );

  app.put(
    '/users/:userId/shortcuts/:id',
    route('updating shortcut', async (req, res) => {
      const body = parseBody(ShortcutBody, req, res);
      if (!body) return;
      const result = await service.updateShortcut(req.params.userId, req.params.id, body);
      if (result.status === 'not_found') {
        res.status(404).json({ error: 'Shortcut not found' });
        return;
      }
      if (result.status !== 'ok') return saveFailed(res);
      res.json({ id: result.value });
    }),
  );

  app.delete(
    '/users/:userId/shortcuts/:id',
    route('deleting shortcut', async (req, res) => {
      const result = await service.deleteShortcut(req.params.userId, req.params.id);
      if (result.status !== 'ok') return saveFailed(res);
      if (!result.value) {
        res.status(404).json({ error: 'Shortcut not found' });
        return;
      }
      res.json({ success: true });
    }),
  );

  // --- Debt plans and tips ---

  app.post(
    '/users/:userId/debt-plans',
    route('computing debt plans', async (req, res) => {
      const body = parseBody(DebtPlanBody, req, res);
      if (!body) return;
      res.json(debtPlansJson(await service.computeDebtPlans(req.params.userId, body.extraMonthly)));
    }),
  );

  app.post(
    '/users/:userId/tips/next',
    route('selecting tip', async (req, res) => {
      const tip = await service.nextTip(req.params.userId);
      res.json({ tip });
    }),
  );

  return app;
}
