/**
 * Overspend reconciliation episode.
 *
 *   RECORDED → OK | OVER_BUDGET → CHOOSING_SOURCE → ENTERING_AMOUNT → RESOLVED
 *
 * The episode object holds only what the in-progress exchange needs. The
 * presentation layer keeps it between turns and drops it once resolved.
 */
import type { Cents } from '../domain/money.js';
import type { MoveOption } from '../domain/overspend.js';
import type { SpendType } from '../domain/types.js';

interface EpisodeBase {
  userId: string;
  exceeded: SpendType;
  overage: Cents;
  /** Description of the transaction that caused the overage */
  cause: string;
  options: MoveOption[];
}

export interface ChoosingSource extends EpisodeBase {
  step: 'choosing_source';
}

export interface EnteringAmount extends EpisodeBase {
  step: 'entering_amount';
  source: SpendType;
  available: Cents;
  suggested: Cents;
}

export type ReconciliationEpisode = ChoosingSource | EnteringAmount;

export type OverspendChoice =
  | { kind: 'leave' }
  | { kind: 'move_from'; source: SpendType }
  | { kind: 'amount'; amount: Cents };

export function beginEpisode(
  userId: string,
  exceeded: SpendType,
  overage: Cents,
  options: MoveOption[],
  cause: string,
): ChoosingSource {
  return { step: 'choosing_source', userId, exceeded, overage, cause, options };
}

export function isOfferedSource(episode: ReconciliationEpisode, source: SpendType): boolean {
  return episode.options.some((o) => o.source === source);
}

export function toEnteringAmount(
  episode: ReconciliationEpisode,
  source: SpendType,
  available: Cents,
  suggested: Cents,
): EnteringAmount {
  const { userId, exceeded, overage, cause, options } = episode;
  return { step: 'entering_amount', userId, exceeded, overage, cause, options, source, available, suggested };
}
