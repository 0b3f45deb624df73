import type { DecisionProvider } from '../decisions';
import type { RollOutcome } from '../dice';
import type { GameState, PlayerId, VictoryOutcome } from '../game';
import type { TurnEvent } from '../reporting';
import { checkVictory, resolveTurn, rollSix, applyPassiveReward } from '../engine';

export type RunTurnOptions = {
  rollDice?: () => RollOutcome;
};

export type RunTurnResult = {
  game: GameState;
  /**
   * Null when the game ended on the passive reward, before dice were rolled.
   */
  roll: RollOutcome | null;
  events: TurnEvent[];
  outcome: VictoryOutcome | null;
};

/**
 * Play one full turn: passive zone reward, victory check, roll, resolution,
 * victory check.
 */
export function runTurn(
  game: GameState,
  activePlayerId: PlayerId,
  decisions: DecisionProvider,
  options: RunTurnOptions = {},
): RunTurnResult {
  const rollDice = options.rollDice ?? rollSix;

  const passive = applyPassiveReward(game, activePlayerId);
  const earlyOutcome = checkVictory(passive.game);
  if (earlyOutcome) {
    return { game: passive.game, roll: null, events: passive.events, outcome: earlyOutcome };
  }

  const roll = rollDice();
  const resolved = resolveTurn(passive.game, activePlayerId, roll, decisions);

  return {
    game: resolved.game,
    roll,
    events: [...passive.events, ...resolved.events],
    outcome: checkVictory(resolved.game),
  };
}
