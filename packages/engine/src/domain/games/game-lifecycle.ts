/**
 * Game status rules
 *
 * scheduled   → in_progress | cancelled
 * in_progress → completed | cancelled
 * completed and cancelled are terminal.
 *
 * Completing a game additionally requires balanced books, which the
 * settlement session checks before calling `transitionGame`.
 */

import type { Game, GameStatus, Result } from '@chipledger/shared';

const ALLOWED_TRANSITIONS: Record<GameStatus, readonly GameStatus[]> = {
  scheduled: ['in_progress', 'cancelled'],
  in_progress: ['completed', 'cancelled'],
  completed: [],
  cancelled: [],
};

export function canTransitionGame(from: GameStatus, to: GameStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Return a copy of the game in its new status
 */
export function transitionGame(game: Game, to: GameStatus, now: number = Date.now()): Result<Game> {
  if (!canTransitionGame(game.status, to)) {
    return {
      ok: false,
      error: {
        type: 'validation',
        message: `Cannot move game from ${game.status} to ${to}`,
      },
    };
  }

  const next: Game = { ...game, status: to };
  if (to === 'completed') {
    next.completedAt = now;
  }
  return { ok: true, data: next };
}

export function isGameEditable(game: Game): boolean {
  return game.status === 'scheduled' || game.status === 'in_progress';
}
