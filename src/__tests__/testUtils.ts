import { DieFace, type GameState, type PlayerId, type PlayerState, type RollOutcome } from '../game';
import { createRoll } from '../game/engine/diceEngine';
import { createGame } from '../game/engine/gameEngine';
import { updatePlayer } from '../game/engine/playerEngine';

const FACE_ORDER: DieFace[] = [
  DieFace.One,
  DieFace.Two,
  DieFace.Three,
  DieFace.Currency,
  DieFace.Attack,
  DieFace.Heal,
];

/**
 * Create a game with players named "Player 1".."Player N" (ids p1..pN).
 */
export function createTestGame(playerCount: number = 2): GameState {
  return createGame(Array.from({ length: playerCount }, (_, i) => `Player ${i + 1}`));
}

/**
 * Overwrite stats on one player.
 */
export function setPlayerStats(
  game: GameState,
  playerId: PlayerId,
  overrides: Partial<Omit<PlayerState, 'id'>>,
): GameState {
  return updatePlayer(game, playerId, (player) => ({ ...player, ...overrides }));
}

export function setZoneOccupant(game: GameState, occupantId: PlayerId | null): GameState {
  return { ...game, zone: { occupantId } };
}

export function rollOf(...faces: DieFace[]): RollOutcome {
  return createRoll(faces);
}

/**
 * Math.random value that makes rollSingleDie return the given face.
 */
export function randomValueForFace(face: DieFace): number {
  return (FACE_ORDER.indexOf(face) + 0.5) / FACE_ORDER.length;
}

/**
 * Tiny deterministic generator for property-style tests.
 */
export function createSeededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

export function randomRoll(next: () => number): RollOutcome {
  const faces = Array.from(
    { length: 6 },
    () => FACE_ORDER[Math.floor(next() * FACE_ORDER.length)],
  );
  return createRoll(faces);
}
