import { describe, expect, it, vi } from 'vitest';
import { DieFace } from '@/game';
import { runTurn } from '@/game/automation/runner';
import { defaultDecisionProvider } from '@/game/automation';
import { getPlayer } from '@/game/engine';
import {
  createTestGame,
  randomValueForFace,
  rollOf,
  setPlayerStats,
  setZoneOccupant,
} from '../testUtils';

const { One, Two, Three, Currency, Attack, Heal } = DieFace;

describe('runTurn', () => {
  it('ends the game on the passive reward without rolling', () => {
    let game = setZoneOccupant(createTestGame(2), 'p1');
    game = setPlayerStats(game, 'p1', { score: 18 });
    const rollDice = vi.fn(() => rollOf(One, One, One, Two, Two, Two));

    const result = runTurn(game, 'p1', defaultDecisionProvider, { rollDice });

    expect(rollDice).not.toHaveBeenCalled();
    expect(result.roll).toBeNull();
    expect(result.outcome).toEqual({ type: 'score', playerId: 'p1' });
    expect(getPlayer(result.game, 'p1').score).toBe(20);
    expect(result.events).toEqual([
      { type: 'passiveReward', playerId: 'p1', points: 2, score: 20 },
    ]);
  });

  it('grants the passive reward before resolving the roll', () => {
    const game = setZoneOccupant(createTestGame(2), 'p1');

    const result = runTurn(game, 'p1', defaultDecisionProvider, {
      rollDice: () => rollOf(Three, Three, Three, Currency, Heal, Two),
    });

    expect(getPlayer(result.game, 'p1').score).toBe(5);
    expect(result.events.map((event) => event.type)).toEqual([
      'passiveReward',
      'rolled',
      'scoredNumbers',
      'gainedCurrency',
      'healingSuppressed',
    ]);
    expect(result.outcome).toBeNull();
  });

  it('gives no passive reward on another player turn', () => {
    const game = setZoneOccupant(createTestGame(2), 'p1');

    const result = runTurn(game, 'p2', defaultDecisionProvider, {
      rollDice: () => rollOf(One, Two, Three, Currency, Heal, Two),
    });

    expect(getPlayer(result.game, 'p1').score).toBe(0);
    expect(result.events[0].type).toBe('rolled');
  });

  it('reports the victory produced by the roll', () => {
    const game = setPlayerStats(createTestGame(2), 'p2', { score: 18 });

    const result = runTurn(game, 'p2', defaultDecisionProvider, {
      rollDice: () => rollOf(Three, Three, Three, One, Two, Heal),
    });

    expect(result.outcome).toEqual({ type: 'score', playerId: 'p2' });
    expect(result.roll).toEqual([Three, Three, Three, One, Two, Heal]);
  });

  it('rolls with Math.random by default', () => {
    const randomSpy = vi.spyOn(Math, 'random').mockReturnValue(randomValueForFace(Attack));

    const result = runTurn(createTestGame(2), 'p1', defaultDecisionProvider);

    expect(result.roll).toEqual([Attack, Attack, Attack, Attack, Attack, Attack]);
    expect(result.game.zone.occupantId).toBe('p1');
    randomSpy.mockRestore();
  });
});
