import { describe, it, expect } from 'vitest';
import {
  clampPlayerCount,
  createGame,
  getNextActivePlayerId,
  normalizePlayerNames,
  parsePlayerCount,
} from '../../game/engine/gameEngine';
import { getPlayersInOrder } from '../../game/engine/playerEngine';
import { STARTING_HEALTH } from '../../game/gameDefinitionConsts';
import { createTestGame, setPlayerStats } from '../testUtils';

describe('gameEngine', () => {
  describe('createGame', () => {
    it('seats players in order with starting stats and an empty zone', () => {
      const game = createGame(['Alice', 'Bob', 'Cara']);

      expect(game.settings.players).toEqual([
        { id: 'p1', name: 'Alice' },
        { id: 'p2', name: 'Bob' },
        { id: 'p3', name: 'Cara' },
      ]);
      expect(getPlayersInOrder(game)).toEqual([
        { id: 'p1', name: 'Alice', health: STARTING_HEALTH, score: 0, currency: 0 },
        { id: 'p2', name: 'Bob', health: STARTING_HEALTH, score: 0, currency: 0 },
        { id: 'p3', name: 'Cara', health: STARTING_HEALTH, score: 0, currency: 0 },
      ]);
      expect(game.zone.occupantId).toBeNull();
    });

    it('fills blank names and pads to the minimum player count', () => {
      const game = createGame(['  ']);

      expect(game.settings.players.map((config) => config.name)).toEqual([
        'Player 1',
        'Player 2',
      ]);
    });
  });

  describe('player counts', () => {
    it('clamps into the supported range', () => {
      expect(clampPlayerCount(1)).toBe(2);
      expect(clampPlayerCount(4)).toBe(4);
      expect(clampPlayerCount(9)).toBe(6);
      expect(clampPlayerCount(Number.NaN)).toBe(2);
    });

    it('parses typed counts', () => {
      expect(parsePlayerCount(' 5 ')).toBe(5);
      expect(parsePlayerCount('0')).toBe(2);
      expect(parsePlayerCount('12')).toBe(6);
      expect(parsePlayerCount('three')).toBe(2);
      expect(parsePlayerCount('')).toBe(2);
      expect(parsePlayerCount('4.5')).toBe(2);
    });

    it('truncates extra names', () => {
      expect(normalizePlayerNames(['a', 'b', 'c', 'd', 'e', 'f', 'g'])).toEqual([
        'a',
        'b',
        'c',
        'd',
        'e',
        'f',
      ]);
    });
  });

  describe('getNextActivePlayerId', () => {
    it('starts at the first seat', () => {
      expect(getNextActivePlayerId(createTestGame(3), null)).toBe('p1');
    });

    it('wraps around the table', () => {
      expect(getNextActivePlayerId(createTestGame(3), 'p3')).toBe('p1');
    });

    it('skips eliminated players', () => {
      const game = setPlayerStats(createTestGame(3), 'p2', { health: 0 });

      expect(getNextActivePlayerId(game, 'p1')).toBe('p3');
    });

    it('returns the current player when it is the only one alive', () => {
      let game = setPlayerStats(createTestGame(3), 'p1', { health: 0 });
      game = setPlayerStats(game, 'p3', { health: 0 });

      expect(getNextActivePlayerId(game, 'p2')).toBe('p2');
    });

    it('returns null when nobody is alive', () => {
      let game = setPlayerStats(createTestGame(2), 'p1', { health: 0 });
      game = setPlayerStats(game, 'p2', { health: 0 });

      expect(getNextActivePlayerId(game, 'p1')).toBeNull();
    });
  });
});
