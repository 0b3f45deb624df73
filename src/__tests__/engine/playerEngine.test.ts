import { describe, it, expect } from 'vitest';
import {
  addCurrency,
  addHealth,
  addScore,
  findPlayer,
  getLivingPlayers,
  getPlayer,
  getPlayerName,
  getPlayersInOrder,
  isEliminated,
  saturatingAdd,
  saturatingSubtract,
  subtractHealth,
  updatePlayer,
} from '../../game/engine/playerEngine';
import { createTestGame, setPlayerStats } from '../testUtils';

describe('playerEngine', () => {
  const game = createTestGame(3);
  const { settings } = game;

  describe('saturating arithmetic', () => {
    it('stops additions at the cap', () => {
      expect(saturatingAdd(10, 5, 12)).toBe(12);
      expect(saturatingAdd(10, 1, 12)).toBe(11);
    });

    it('saturates unbounded values at the largest safe integer', () => {
      expect(saturatingAdd(Number.MAX_SAFE_INTEGER - 1, 5)).toBe(Number.MAX_SAFE_INTEGER);
    });

    it('stops subtraction at zero', () => {
      expect(saturatingSubtract(3, 5)).toBe(0);
      expect(saturatingSubtract(7, 2)).toBe(5);
    });

    it('ignores negative amounts', () => {
      expect(saturatingAdd(4, -3, 12)).toBe(4);
      expect(saturatingSubtract(4, -3)).toBe(4);
    });
  });

  describe('lookup', () => {
    it('returns players by id', () => {
      expect(getPlayer(game, 'p2').name).toBe('Player 2');
      expect(findPlayer(game, 'p3')?.health).toBe(10);
    });

    it('throws on a stale id', () => {
      expect(() => getPlayer(game, 'p7')).toThrow('Unknown player id: p7');
      expect(findPlayer(game, 'p7')).toBeUndefined();
    });

    it('falls back to the id for unknown names', () => {
      expect(getPlayerName(game, 'p1')).toBe('Player 1');
      expect(getPlayerName(game, 'ghost')).toBe('ghost');
    });

    it('lists players in seat order', () => {
      expect(getPlayersInOrder(game).map((player) => player.id)).toEqual(['p1', 'p2', 'p3']);
    });

    it('keeps eliminated players in the registry', () => {
      const next = setPlayerStats(game, 'p2', { health: 0 });
      expect(isEliminated(getPlayer(next, 'p2'))).toBe(true);
      expect(getPlayersInOrder(next)).toHaveLength(3);
      expect(getLivingPlayers(next).map((player) => player.id)).toEqual(['p1', 'p3']);
    });
  });

  describe('updatePlayer', () => {
    it('returns a new state without touching the input', () => {
      const next = updatePlayer(game, 'p1', (player) => addScore(player, 4, settings));
      expect(getPlayer(next, 'p1').score).toBe(4);
      expect(getPlayer(game, 'p1').score).toBe(0);
      expect(next.players).not.toBe(game.players);
    });

    it('throws for a stale id', () => {
      expect(() => updatePlayer(game, 'p9', (player) => player)).toThrow(/p9/);
    });
  });

  describe('stat mutations', () => {
    const player = getPlayer(game, 'p1');

    it('caps health at the maximum', () => {
      expect(addHealth(player, 5, settings).health).toBe(12);
    });

    it('floors health at zero', () => {
      expect(subtractHealth(player, 15).health).toBe(0);
    });

    it('caps score at the maximum', () => {
      expect(addScore({ ...player, score: 19 }, 3, settings).score).toBe(20);
    });

    it('accumulates currency without a cap', () => {
      expect(addCurrency({ ...player, currency: 1000 }, 5).currency).toBe(1005);
    });
  });
});
