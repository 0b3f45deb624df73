import type { GameState, PlayerConfig, PlayerId } from '../game';
import {
  CreateGameSettings,
  CreatePlayerState,
  MAX_PLAYERS,
  MIN_PLAYERS,
} from '../gameDefinitionConsts';
import { getPlayer, isEliminated } from './playerEngine';

/**
 * Clamp a requested player count into the supported range.
 */
export function clampPlayerCount(count: number): number {
  if (!Number.isFinite(count)) {
    return MIN_PLAYERS;
  }
  return Math.min(MAX_PLAYERS, Math.max(MIN_PLAYERS, Math.trunc(count)));
}

/**
 * Parse a typed player count. Anything that is not a whole number becomes the minimum.
 */
export function parsePlayerCount(input: string): number {
  const trimmed = input.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return MIN_PLAYERS;
  }
  return clampPlayerCount(Number(trimmed));
}

export function getDefaultPlayerName(seatIndex: number): string {
  return `Player ${seatIndex + 1}`;
}

/**
 * Fit a list of names to the supported player count, filling blanks with seat names.
 */
export function normalizePlayerNames(names: string[]): string[] {
  const count = clampPlayerCount(names.length);
  return Array.from({ length: count }, (_, index) => {
    const name = names[index]?.trim() ?? '';
    return name.length > 0 ? name : getDefaultPlayerName(index);
  });
}

export function createPlayerConfigs(names: string[]): PlayerConfig[] {
  return normalizePlayerNames(names).map((name, index) => ({
    id: `p${index + 1}`,
    name,
  }));
}

/**
 * Create initial game state for a new game.
 */
export function createGame(playerNames: string[]): GameState {
  const settings = CreateGameSettings(createPlayerConfigs(playerNames));
  const players = new Map(
    settings.players.map((config) => [
      config.id,
      CreatePlayerState(config.id, config.name, settings),
    ]),
  );

  return {
    settings,
    players,
    zone: { occupantId: null },
  };
}

export const newGame = createGame;

/**
 * Find the next living player after `currentPlayerId` in seat order, wrapping
 * around. With no current player the search starts at the first seat.
 */
export function getNextActivePlayerId(
  game: GameState,
  currentPlayerId: PlayerId | null,
): PlayerId | null {
  const seats = game.settings.players;
  const currentIndex =
    currentPlayerId === null ? -1 : seats.findIndex((config) => config.id === currentPlayerId);

  for (let offset = 1; offset <= seats.length; offset += 1) {
    const candidate = seats[(currentIndex + offset + seats.length) % seats.length];
    if (!isEliminated(getPlayer(game, candidate.id))) {
      return candidate.id;
    }
  }

  return null;
}
