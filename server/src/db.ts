import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import {
  defaultPercentages,
  emptyTotals,
  hasLegacyPercentageKey,
  isSpendType,
  normalizePercentages,
  normalizeSpendType,
} from '../../src/domain/computations.js';
import type { Cents } from '../../src/domain/money.js';
import {
  LEGACY_SPEND_TYPE,
  SPEND_TYPES,
  type BudgetPercentages,
  type Debt,
  type Income,
  type Month,
  type PendingOverspend,
  type QuickExpenseShortcut,
  type RecordedSpendType,
  type SpendTotals,
  type SpendType,
  type Tip,
  type Transaction,
  type UserProfile,
} from '../../src/domain/types.js';
import {
  generateId,
  PersistenceError,
  UnknownUserError,
  type PlannerStore,
  type RecordInput,
  type RecordKind,
} from '../../src/db/store.js';
import { TipRecord } from './tips.js';

export type Db = Database.Database;

/** Open (or create) the planner database and bring its schema up to date */
export function openDatabase(dbPath: string): Db {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);

  // Enable WAL mode for better performance
  db.pragma('journal_mode = WAL');
  migrate(db);
  return db;
}

const ColumnInfo = z.array(z.object({ name: z.string() }));

function migrate(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id TEXT PRIMARY KEY,
      display_name TEXT NOT NULL,
      goal TEXT NOT NULL DEFAULT '',
      budget_percentages TEXT NOT NULL,
      pending_overspend TEXT NOT NULL DEFAULT '{}',
      created_at TEXT DEFAULT (datetime('now'))
    )
  `);

  // Add shown_tip_ids to users (safe for existing DBs)
  const userCols = ColumnInfo.parse(db.pragma('table_info(users)'));
  if (!userCols.some((c) => c.name === 'shown_tip_ids')) {
    db.exec(`ALTER TABLE users ADD COLUMN shown_tip_ids TEXT NOT NULL DEFAULT '[]'`);
  }

  db.exec(`
    CREATE TABLE IF NOT EXISTS incomes (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      name TEXT NOT NULL,
      amount INTEGER NOT NULL
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS transactions (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      amount INTEGER NOT NULL,
      category TEXT NOT NULL,
      spend_type TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      date TEXT NOT NULL,
      created_at TEXT NOT NULL
    )
  `);
  db.exec(`CREATE INDEX IF NOT EXISTS idx_transactions_user_date ON transactions(user_id, date)`);

  db.exec(`
    CREATE TABLE IF NOT EXISTS debts (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      name TEXT NOT NULL,
      balance INTEGER NOT NULL,
      annual_rate REAL NOT NULL,
      minimum_payment INTEGER NOT NULL
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS shortcuts (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      name TEXT NOT NULL,
      amount INTEGER NOT NULL,
      category TEXT NOT NULL,
      spend_type TEXT NOT NULL
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS monthly_summary (
      user_id TEXT NOT NULL,
      month TEXT NOT NULL,
      spend_type TEXT NOT NULL,
      total INTEGER NOT NULL DEFAULT 0,
      PRIMARY KEY (user_id, month, spend_type)
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS tips (
      id TEXT PRIMARY KEY,
      title TEXT NOT NULL,
      explanation TEXT NOT NULL,
      income_levels TEXT NOT NULL,
      conditions TEXT NOT NULL
    )
  `);
}

// --- Row schemas ---

const JsonText = z.string().transform((text, ctx) => {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Column is not valid JSON' });
    return z.NEVER;
  }
});

const SpendTypeColumn = z.enum(SPEND_TYPES);
const RecordedSpendTypeColumn = z.union([SpendTypeColumn, z.literal(LEGACY_SPEND_TYPE)]);
const CentsColumn = z.number().int();

const UserRow = z.object({
  id: z.string(),
  display_name: z.string(),
  goal: z.string(),
  budget_percentages: JsonText.pipe(z.record(z.number())),
  pending_overspend: JsonText.pipe(z.record(z.number())),
  shown_tip_ids: JsonText.pipe(z.array(z.string())),
});

const IncomeRow = z.object({ id: z.string(), name: z.string(), amount: CentsColumn });

const TransactionRow = z.object({
  id: z.string(),
  amount: CentsColumn,
  category: z.string(),
  spend_type: RecordedSpendTypeColumn,
  description: z.string(),
  date: z.string(),
  created_at: z.string(),
});

const DebtRow = z.object({
  id: z.string(),
  name: z.string(),
  balance: CentsColumn,
  annual_rate: z.number(),
  minimum_payment: CentsColumn,
});

const ShortcutRow = z.object({
  id: z.string(),
  name: z.string(),
  amount: CentsColumn,
  category: z.string(),
  spend_type: SpendTypeColumn,
});

const SummaryRow = z.object({ spend_type: RecordedSpendTypeColumn, total: CentsColumn });

const TipRow = z.object({
  id: z.string(),
  title: z.string(),
  explanation: z.string(),
  income_levels: JsonText,
  conditions: JsonText,
});

const CountRow = z.object({ count: z.number() });

const TABLES: Record<RecordKind, string> = {
  incomes: 'incomes',
  transactions: 'transactions',
  debts: 'debts',
  shortcuts: 'shortcuts',
};

/** Pending map keyed by current spend types; legacy entries fold into Inversión */
function toPending(raw: Record<string, number>): PendingOverspend {
  const pending: PendingOverspend = {};
  for (const [key, amount] of Object.entries(raw)) {
    if (key === LEGACY_SPEND_TYPE) {
      pending.Inversión = (pending.Inversión ?? 0) + amount;
    } else if (isSpendType(key)) {
      pending[key] = (pending[key] ?? 0) + amount;
    }
  }
  return pending;
}

export class SqlitePlannerStore implements PlannerStore {
  constructor(private readonly db: Db) {}

  async loadUserProfile(userId: string): Promise<UserProfile | null> {
    return this.guard('load user profile', () => {
      const row = this.db.prepare('SELECT * FROM users WHERE id = ?').get(userId);
      if (row === undefined) return null;

      const user = UserRow.parse(row);
      const percentages = normalizePercentages(user.budget_percentages) ?? defaultPercentages();
      if (hasLegacyPercentageKey(user.budget_percentages)) {
        this.db
          .prepare('UPDATE users SET budget_percentages = ? WHERE id = ?')
          .run(JSON.stringify(percentages), userId);
      }

      return {
        userId: user.id,
        displayName: user.display_name,
        goal: user.goal,
        budgetPercentages: percentages,
        pendingOverspend: toPending(user.pending_overspend),
        shownTipIds: user.shown_tip_ids,
      };
    });
  }

  async saveUserProfile(profile: UserProfile): Promise<void> {
    this.guard('save user profile', () => {
      this.db
        .prepare(
          `INSERT INTO users (id, display_name, goal, budget_percentages, pending_overspend, shown_tip_ids)
           VALUES (?, ?, ?, ?, ?, ?)
           ON CONFLICT(id) DO UPDATE SET
             display_name = excluded.display_name,
             goal = excluded.goal,
             budget_percentages = excluded.budget_percentages,
             pending_overspend = excluded.pending_overspend,
             shown_tip_ids = excluded.shown_tip_ids`,
        )
        .run(
          profile.userId,
          profile.displayName,
          profile.goal,
          JSON.stringify(profile.budgetPercentages),
          JSON.stringify(profile.pendingOverspend),
          JSON.stringify(profile.shownTipIds),
        );
    });
  }

  async listIncomes(userId: string): Promise<Income[]> {
    return this.guard('list incomes', () =>
      this.db
        .prepare('SELECT id, name, amount FROM incomes WHERE user_id = ? ORDER BY rowid')
        .all(userId)
        .map((row) => IncomeRow.parse(row)),
    );
  }

  async listTransactions(userId: string, month: Month): Promise<Transaction[]> {
    return this.guard('list transactions', () =>
      this.db
        .prepare(
          `SELECT * FROM transactions
           WHERE user_id = ? AND date LIKE ? || '-%'
           ORDER BY date ASC, created_at ASC`,
        )
        .all(userId, month)
        .map((row) => {
          const t = TransactionRow.parse(row);
          return {
            id: t.id,
            amount: t.amount,
            category: t.category,
            spendType: t.spend_type,
            description: t.description,
            date: t.date,
            createdAt: t.created_at,
          };
        }),
    );
  }

  async listDebts(userId: string): Promise<Debt[]> {
    return this.guard('list debts', () =>
      this.db
        .prepare('SELECT * FROM debts WHERE user_id = ? ORDER BY rowid')
        .all(userId)
        .map((row) => {
          const d = DebtRow.parse(row);
          return {
            id: d.id,
            name: d.name,
            balance: d.balance,
            annualRate: d.annual_rate,
            minimumPayment: d.minimum_payment,
          };
        }),
    );
  }

  async listShortcuts(userId: string): Promise<QuickExpenseShortcut[]> {
    return this.guard('list shortcuts', () =>
      this.db
        .prepare('SELECT * FROM shortcuts WHERE user_id = ? ORDER BY rowid')
        .all(userId)
        .map((row) => {
          const s = ShortcutRow.parse(row);
          return { id: s.id, name: s.name, amount: s.amount, category: s.category, spendType: s.spend_type };
        }),
    );
  }

  async saveRecord(userId: string, record: RecordInput, id?: string): Promise<string> {
    return this.guard(`save ${record.kind}`, () => {
      const recordId = id ?? generateId();
      switch (record.kind) {
        case 'incomes': {
          const { name, amount } = record.fields;
          this.db
            .prepare(
              `INSERT INTO incomes (id, user_id, name, amount) VALUES (?, ?, ?, ?)
               ON CONFLICT(id) DO UPDATE SET name = excluded.name, amount = excluded.amount
               WHERE incomes.user_id = excluded.user_id`,
            )
            .run(recordId, userId, name, amount);
          break;
        }
        case 'transactions': {
          const { amount, category, spendType, description, date } = record.fields;
          this.db
            .prepare(
              `INSERT INTO transactions (id, user_id, amount, category, spend_type, description, date, created_at)
               VALUES (?, ?, ?, ?, ?, ?, ?, ?)
               ON CONFLICT(id) DO UPDATE SET
                 amount = excluded.amount,
                 category = excluded.category,
                 spend_type = excluded.spend_type,
                 description = excluded.description,
                 date = excluded.date
               WHERE transactions.user_id = excluded.user_id`,
            )
            .run(recordId, userId, amount, category, spendType, description, date, new Date().toISOString());
          break;
        }
        case 'debts': {
          const { name, balance, annualRate, minimumPayment } = record.fields;
          this.db
            .prepare(
              `INSERT INTO debts (id, user_id, name, balance, annual_rate, minimum_payment)
               VALUES (?, ?, ?, ?, ?, ?)
               ON CONFLICT(id) DO UPDATE SET
                 name = excluded.name,
                 balance = excluded.balance,
                 annual_rate = excluded.annual_rate,
                 minimum_payment = excluded.minimum_payment
               WHERE debts.user_id = excluded.user_id`,
            )
            .run(recordId, userId, name, balance, annualRate, minimumPayment);
          break;
        }
        case 'shortcuts': {
          const { name, amount, category, spendType } = record.fields;
          this.db
            .prepare(
              `INSERT INTO shortcuts (id, user_id, name, amount, category, spend_type)
               VALUES (?, ?, ?, ?, ?, ?)
               ON CONFLICT(id) DO UPDATE SET
                 name = excluded.name,
                 amount = excluded.amount,
                 category = excluded.category,
                 spend_type = excluded.spend_type
               WHERE shortcuts.user_id = excluded.user_id`,
            )
            .run(recordId, userId, name, amount, category, spendType);
          break;
        }
      }
      return recordId;
    });
  }

  async deleteRecord(userId: string, kind: RecordKind, id: string): Promise<boolean> {
    return this.guard(`delete ${kind}`, () => {
      const result = this.db.prepare(`DELETE FROM ${TABLES[kind]} WHERE id = ? AND user_id = ?`).run(id, userId);
      return result.changes > 0;
    });
  }

  async incrementMonthlySummaryField(
    userId: string,
    month: Month,
    spendType: RecordedSpendType,
    delta: Cents,
  ): Promise<void> {
    this.guard('update monthly summary', () => {
      this.db
        .prepare(
          `INSERT INTO monthly_summary (user_id, month, spend_type, total) VALUES (?, ?, ?, ?)
           ON CONFLICT(user_id, month, spend_type) DO UPDATE SET total = monthly_summary.total + excluded.total`,
        )
        .run(userId, month, normalizeSpendType(spendType), delta);
    });
  }

  async getMonthlySummary(userId: string, month: Month): Promise<SpendTotals> {
    return this.guard('read monthly summary', () => {
      const totals = emptyTotals();
      const rows = this.db
        .prepare('SELECT spend_type, total FROM monthly_summary WHERE user_id = ? AND month = ?')
        .all(userId, month);
      for (const row of rows) {
        const { spend_type, total } = SummaryRow.parse(row);
        totals[normalizeSpendType(spend_type)] += total;
      }
      return totals;
    });
  }

  async updateBudgetPercentages(userId: string, percentages: BudgetPercentages): Promise<void> {
    this.guard('update budget percentages', () => {
      this.writePercentages(userId, percentages);
    });
  }

  async setPendingOverspend(userId: string, spendType: SpendType, amount: Cents): Promise<void> {
    this.guard('record pending overspend', () => {
      this.updatePending(userId, (pending) => {
        pending[spendType] = amount;
      });
    });
  }

  async clearPendingOverspend(userId: string, spendType: SpendType): Promise<void> {
    this.guard('clear pending overspend', () => {
      this.updatePending(userId, (pending) => {
        delete pending[spendType];
      });
    });
  }

  async applyOverspendMove(
    userId: string,
    percentages: BudgetPercentages,
    exceeded: SpendType,
    pending: Cents | null,
  ): Promise<void> {
    this.guard('apply overspend move', () => {
      const move = this.db.transaction(() => {
        this.writePercentages(userId, percentages);
        this.updatePending(userId, (current) => {
          if (pending === null) {
            delete current[exceeded];
          } else {
            current[exceeded] = pending;
          }
        });
      });
      move();
    });
  }

  async updateShownTipIds(userId: string, ids: string[]): Promise<void> {
    this.guard('update shown tips', () => {
      const result = this.db.prepare('UPDATE users SET shown_tip_ids = ? WHERE id = ?').run(JSON.stringify(ids), userId);
      if (result.changes === 0) throw new UnknownUserError(userId);
    });
  }

  async listTips(): Promise<Tip[]> {
    return this.guard('list tips', () =>
      this.db
        .prepare('SELECT * FROM tips ORDER BY rowid')
        .all()
        .map((row) => {
          const t = TipRow.parse(row);
          return TipRecord.parse({
            id: t.id,
            title: t.title,
            explanation: t.explanation,
            incomeLevels: t.income_levels,
            conditions: t.conditions,
          });
        }),
    );
  }

  /** Load the tip corpus into an empty tips table. Returns the number inserted. */
  seedTips(tips: Tip[]): number {
    return this.guard('seed tips', () => {
      const { count } = CountRow.parse(this.db.prepare('SELECT COUNT(*) AS count FROM tips').get());
      if (count > 0) return 0;

      const insertStmt = this.db.prepare(
        'INSERT INTO tips (id, title, explanation, income_levels, conditions) VALUES (?, ?, ?, ?, ?)',
      );
      const insertMany = this.db.transaction((items: Tip[]) => {
        for (const tip of items) {
          insertStmt.run(
            tip.id,
            tip.title,
            tip.explanation,
            JSON.stringify(tip.incomeLevels),
            JSON.stringify(tip.conditions),
          );
        }
      });
      insertMany(tips);
      return tips.length;
    });
  }

  close(): void {
    this.db.close();
  }

  private writePercentages(userId: string, percentages: BudgetPercentages): void {
    const result = this.db
      .prepare('UPDATE users SET budget_percentages = ? WHERE id = ?')
      .run(JSON.stringify(percentages), userId);
    if (result.changes === 0) throw new UnknownUserError(userId);
  }

  private updatePending(userId: string, change: (pending: PendingOverspend) => void): void {
    const readModifyWrite = this.db.transaction(() => {
      const row = this.db.prepare('SELECT pending_overspend FROM users WHERE id = ?').get(userId);
      if (row === undefined) throw new UnknownUserError(userId);

      const { pending_overspend } = UserRow.pick({ pending_overspend: true }).parse(row);
      const pending = toPending(pending_overspend);
      change(pending);
      this.db
        .prepare('UPDATE users SET pending_overspend = ? WHERE id = ?')
        .run(JSON.stringify(pending), userId);
    });
    readModifyWrite();
  }

  private guard<T>(label: string, work: () => T): T {
    try {
      return work();
    } catch (error) {
      if (error instanceof PersistenceError) throw error;
      throw new PersistenceError(`Failed to ${label}`, { cause: error });
    }
  }
}
