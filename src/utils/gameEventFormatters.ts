import type { DecisionRequest, GameState, PlayerState, TurnEvent } from '@/game';
import { getFaceLabel, getPlayerName } from '@/game/engine';

function describeDecision(request: DecisionRequest, game: GameState): string {
  const zone = game.settings.zoneName;
  switch (request.kind) {
    case 'concedeAfterAttack':
      return `Concede ${zone} after attacking`;
    case 'concedeToChallenge':
      return `Concede ${zone} to ${getPlayerName(game, request.activePlayerId)}`;
    case 'enterZone':
      return `Enter ${zone}`;
  }
}

export function formatTurnEvent(event: TurnEvent, game: GameState): string {
  const zone = game.settings.zoneName;
  switch (event.type) {
    case 'rolled':
      return `Rolled ${event.roll.map((face) => getFaceLabel(face, game.settings)).join(' ')}`;
    case 'scoredNumbers':
      return `Matched numbers for +${event.points} points (score ${event.score})`;
    case 'gainedCurrency':
      return `Gains +${event.amount} energy (energy ${event.currency})`;
    case 'healed':
      return `Heals +${event.amount} (health ${event.health})`;
    case 'healingSuppressed':
      return `Heal ignored inside ${zone}`;
    case 'damaged':
      return `Deals ${event.damage} damage to ${getPlayerName(game, event.targetId)} (health ${event.health})`;
    case 'decision':
      return `${describeDecision(event.request, game)}: ${event.answer ? 'yes' : 'no'}`;
    case 'leftZone':
      return `Leaves ${zone}`;
    case 'heldZone':
      return `Holds ${zone} against ${getPlayerName(game, event.challengerId)}`;
    case 'enteredZone':
      return `Enters ${zone} for +${event.points} points (score ${event.score})`;
    case 'declinedZone':
      return `Declines to enter ${zone}`;
    case 'passiveReward':
      return `Holds ${zone} for +${event.points} points (score ${event.score})`;
  }
}

/**
 * Action log line attributed to the acting player.
 */
export function formatActionLogLine(event: TurnEvent, game: GameState): string {
  return `[${getPlayerName(game, event.playerId)}] ${formatTurnEvent(event, game)}`;
}

export function formatDecisionPrompt(request: DecisionRequest, game: GameState): string {
  const zone = game.settings.zoneName;
  const responder = getPlayerName(game, request.responderId);
  const suffix = request.defaultAnswer ? '(Y/n)' : '(y/N)';
  switch (request.kind) {
    case 'concedeAfterAttack':
      return `${responder} has finished attacking. Concede ${zone}? ${suffix} `;
    case 'concedeToChallenge':
      return `${getPlayerName(game, request.activePlayerId)} challenges ${responder} with ${request.attackCount} claw(s). Should ${responder} concede ${zone}? ${suffix} `;
    case 'enterZone':
      return `${zone} is vacant. ${responder} rolled ${request.attackCount} claw(s). Enter ${zone}? ${suffix} `;
  }
}

export function formatPlayerStatus(player: PlayerState): string {
  return `${player.name}: ${player.score} points, ${player.health} health, ${player.currency} energy`;
}
