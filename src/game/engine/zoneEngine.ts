import type { GameState, PlayerId } from '../game';
import type { ResolutionResult } from '../reporting';
import { addScore, getPlayer, updatePlayer } from './playerEngine';

export function getZoneOccupantId(game: GameState): PlayerId | null {
  return game.zone.occupantId;
}

export function isInZone(game: GameState, playerId: PlayerId): boolean {
  return game.zone.occupantId === playerId;
}

export function isZoneVacant(game: GameState): boolean {
  return game.zone.occupantId === null;
}

/**
 * Put a player into the zone. The zone holds one occupant, so it must be vacant first.
 */
export function occupyZone(game: GameState, playerId: PlayerId): GameState {
  getPlayer(game, playerId);
  if (game.zone.occupantId !== null && game.zone.occupantId !== playerId) {
    throw new Error(
      `Cannot place ${playerId} in the zone while ${game.zone.occupantId} occupies it.`,
    );
  }
  return { ...game, zone: { occupantId: playerId } };
}

export function vacateZone(game: GameState): GameState {
  if (game.zone.occupantId === null) {
    return game;
  }
  return { ...game, zone: { occupantId: null } };
}

/**
 * Award the occupant for holding the zone at the start of their own turn.
 * Eliminated occupants keep the zone until it is conceded; they simply never get a turn.
 */
export function applyPassiveReward(game: GameState, activePlayerId: PlayerId): ResolutionResult {
  const occupantId = game.zone.occupantId;
  if (occupantId === null || occupantId !== activePlayerId) {
    return { game, events: [] };
  }

  const points = game.settings.passiveZoneReward;
  const next = updatePlayer(game, occupantId, (player) => addScore(player, points, game.settings));
  return {
    game: next,
    events: [
      {
        type: 'passiveReward',
        playerId: occupantId,
        points,
        score: getPlayer(next, occupantId).score,
      },
    ],
  };
}
