import path from 'path';
import { z } from 'zod';

// Resolved against the working directory (the project root under npm scripts)
const dataDir = path.resolve('server/data');

export const ServerConfig = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  PLANNER_DB_PATH: z.string().min(1).default(path.join(dataDir, 'planner.db')),
  PLANNER_TIPS_PATH: z.string().min(1).default(path.join(dataDir, 'tips.json')),
  // Residual overage, in cents, treated as fully covered after a move
  PLANNER_OVERAGE_EPSILON_CENTS: z.coerce.number().int().min(0).default(1),
});
export type ServerConfig = z.infer<typeof ServerConfig>;

export interface Config {
  port: number;
  dbPath: string;
  tipsPath: string;
  overageEpsilon: number;
}

/** Throws a ZodError naming the offending variables */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = ServerConfig.parse({
    PORT: emptyToUndefined(env.PORT),
    PLANNER_DB_PATH: emptyToUndefined(env.PLANNER_DB_PATH),
    PLANNER_TIPS_PATH: emptyToUndefined(env.PLANNER_TIPS_PATH),
    PLANNER_OVERAGE_EPSILON_CENTS: emptyToUndefined(env.PLANNER_OVERAGE_EPSILON_CENTS),
  });
  return {
    port: parsed.PORT,
    dbPath: parsed.PLANNER_DB_PATH,
    tipsPath: parsed.PLANNER_TIPS_PATH,
    overageEpsilon: parsed.PLANNER_OVERAGE_EPSILON_CENTS,
  };
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}
