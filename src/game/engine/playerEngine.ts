import type { GameSettings, GameState, PlayerId, PlayerState } from '../game';

/**
 * Add a non-negative amount, stopping at `cap`.
 */
export function saturatingAdd(
  value: number,
  amount: number,
  cap: number = Number.MAX_SAFE_INTEGER,
): number {
  return Math.min(cap, Math.max(0, value + Math.max(0, amount)));
}

/**
 * Subtract a non-negative amount, stopping at zero.
 */
export function saturatingSubtract(value: number, amount: number): number {
  return Math.max(0, value - Math.max(0, amount));
}

export function findPlayer(game: GameState, playerId: PlayerId): PlayerState | undefined {
  return game.players.get(playerId);
}

/**
 * Look up a player record. Ids are never removed during a game, so a miss is a bug.
 */
export function getPlayer(game: GameState, playerId: PlayerId): PlayerState {
  const player = game.players.get(playerId);
  if (!player) {
    throw new Error(`Unknown player id: ${playerId}`);
  }
  return player;
}

/**
 * All players in seat order.
 */
export function getPlayersInOrder(game: GameState): PlayerState[] {
  return game.settings.players.map((config) => getPlayer(game, config.id));
}

export function isEliminated(player: PlayerState): boolean {
  return player.health <= 0;
}

export function getLivingPlayers(game: GameState): PlayerState[] {
  return getPlayersInOrder(game).filter((player) => !isEliminated(player));
}

export function getPlayerName(game: GameState, playerId: PlayerId): string {
  return findPlayer(game, playerId)?.name ?? playerId;
}

/**
 * Replace one player record, returning a new game state.
 */
export function updatePlayer(
  game: GameState,
  playerId: PlayerId,
  updater: (player: PlayerState) => PlayerState,
): GameState {
  const players = new Map(game.players);
  players.set(playerId, updater(getPlayer(game, playerId)));
  return { ...game, players };
}

export function addHealth(
  player: PlayerState,
  amount: number,
  settings: GameSettings,
): PlayerState {
  return { ...player, health: saturatingAdd(player.health, amount, settings.maxHealth) };
}

export function subtractHealth(player: PlayerState, amount: number): PlayerState {
  return { ...player, health: saturatingSubtract(player.health, amount) };
}

export function addScore(
  player: PlayerState,
  amount: number,
  settings: GameSettings,
): PlayerState {
  return { ...player, score: saturatingAdd(player.score, amount, settings.maxScore) };
}

export function addCurrency(player: PlayerState, amount: number): PlayerState {
  return { ...player, currency: saturatingAdd(player.currency, amount) };
}
