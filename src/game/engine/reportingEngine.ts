import type { GameState, VictoryOutcome } from '../game';
import type { PlayerEndStateSummary } from '../reporting';
import { getPlayerName, getPlayersInOrder, isEliminated } from './playerEngine';
import { isInZone } from './zoneEngine';

export function getPlayerEndStateSummaries(game: GameState): PlayerEndStateSummary[] {
  return getPlayersInOrder(game).map((player) => ({
    playerId: player.id,
    playerName: player.name,
    score: player.score,
    health: player.health,
    currency: player.currency,
    eliminated: isEliminated(player),
    inZone: isInZone(game, player.id),
  }));
}

export function describeVictory(outcome: VictoryOutcome, game: GameState): string {
  switch (outcome.type) {
    case 'score':
      return `${getPlayerName(game, outcome.playerId)} reached ${game.settings.maxScore} points!`;
    case 'lastStanding':
      return `${getPlayerName(game, outcome.playerId)} is the last monster standing!`;
    case 'draw':
      return 'All players were eliminated simultaneously!';
  }
}
