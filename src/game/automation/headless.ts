import type { DecisionProvider } from '../decisions';
import type { RollOutcome } from '../dice';
import type { GameState, PlayerId, VictoryOutcome } from '../game';
import { MAX_TURNS } from '../gameDefinitionConsts';
import {
  createGame,
  describeVictory,
  getNextActivePlayerId,
  getPlayerName,
  getWinnerIds,
} from '../engine';
import { formatActionLogLine } from '@/utils/gameEventFormatters';
import { defaultDecisionProvider, routeDecisionsByPlayer } from './decisionProviders';
import { runTurn } from './runner';

export type HeadlessGameResult = {
  completed: boolean;
  turnsPlayed: number;
  finalGame: GameState;
  outcome: VictoryOutcome | null;
  winners: string[];
  stallReason: string | null;
  actionLog: string[];
};

export type HeadlessGameOptions = {
  maxTurns?: number;
  /**
   * Answers decisions owned by a specific player; others use `defaultDecisions`.
   */
  decisionsByPlayerId?: Record<PlayerId, DecisionProvider>;
  defaultDecisions?: DecisionProvider;
  rollDice?: () => RollOutcome;
};

export function runHeadlessGame(
  initialGame: GameState,
  options: HeadlessGameOptions = {},
): HeadlessGameResult {
  const maxTurns = options.maxTurns ?? MAX_TURNS;
  const decisions = routeDecisionsByPlayer(
    options.decisionsByPlayerId ?? {},
    options.defaultDecisions ?? defaultDecisionProvider,
  );

  let game = initialGame;
  let turnsPlayed = 0;
  let outcome: VictoryOutcome | null = null;
  let stallReason: string | null = null;
  const actionLog: string[] = [];
  let activePlayerId = getNextActivePlayerId(game, null);

  while (turnsPlayed < maxTurns) {
    if (activePlayerId === null) {
      stallReason = 'No living player can take a turn.';
      break;
    }

    const turn = runTurn(game, activePlayerId, decisions, { rollDice: options.rollDice });
    for (const event of turn.events) {
      actionLog.push(formatActionLogLine(event, turn.game));
    }
    game = turn.game;
    turnsPlayed += 1;

    if (turn.outcome) {
      outcome = turn.outcome;
      break;
    }
    activePlayerId = getNextActivePlayerId(game, activePlayerId);
  }

  const completed = outcome !== null;
  const winners = getWinnerIds(outcome).map((winnerId) => getPlayerName(game, winnerId));
  if (outcome) {
    actionLog.push(
      `[System] Game complete in ${turnsPlayed} turns. ${describeVictory(outcome, game)}`,
    );
  } else {
    stallReason = stallReason ?? 'Reached turn cap before game over.';
    actionLog.push(`[System] Simulation stopped: ${stallReason}`);
  }

  return {
    completed,
    turnsPlayed,
    finalGame: game,
    outcome,
    winners,
    stallReason: completed ? null : stallReason,
    actionLog,
  };
}

export function runHeadlessMatch(
  playerNames: string[],
  options: HeadlessGameOptions = {},
): HeadlessGameResult {
  return runHeadlessGame(createGame(playerNames), options);
}
