import fs from 'fs';
import { z } from 'zod';
import { ALL_LEVELS, DEBT_CONDITIONS, INCOME_LEVELS, type Tip } from '../../src/domain/types.js';

export const TipRecord = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  explanation: z.string().min(1),
  incomeLevels: z.array(z.union([z.enum(INCOME_LEVELS), z.literal(ALL_LEVELS)])).min(1),
  conditions: z.array(z.enum(DEBT_CONDITIONS)).min(1),
});
export type TipRecord = z.infer<typeof TipRecord>;

export const TipCorpus = z
  .array(TipRecord)
  .refine((tips) => new Set(tips.map((t) => t.id)).size === tips.length, {
    message: 'Tip ids must be unique',
  });

/** Validates parsed JSON; throws a ZodError on any malformed entry */
export function parseTipCorpus(data: unknown): Tip[] {
  return TipCorpus.parse(data);
}

export function loadTipCorpus(filePath: string): Tip[] {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  return parseTipCorpus(raw);
}
