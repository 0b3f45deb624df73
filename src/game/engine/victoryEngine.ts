import type { GameState, PlayerId, VictoryOutcome } from '../game';
import { getLivingPlayers } from './playerEngine';

/**
 * Check the terminal conditions. A score win takes precedence and ties go to
 * the first qualifying player in seat order.
 */
export function checkVictory(game: GameState): VictoryOutcome | null {
  const living = getLivingPlayers(game);

  const scoreWinner = living.find((player) => player.score >= game.settings.maxScore);
  if (scoreWinner) {
    return { type: 'score', playerId: scoreWinner.id };
  }

  if (living.length === 1) {
    return { type: 'lastStanding', playerId: living[0].id };
  }

  if (living.length === 0) {
    return { type: 'draw' };
  }

  return null;
}

export function isGameOver(game: GameState): boolean {
  return checkVictory(game) !== null;
}

export function getWinnerIds(outcome: VictoryOutcome | null): PlayerId[] {
  if (!outcome || outcome.type === 'draw') {
    return [];
  }
  return [outcome.playerId];
}
