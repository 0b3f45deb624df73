import { createSlice, type PayloadAction } from '@reduxjs/toolkit';
import { enableMapSet } from 'immer';
import {
  DICE_PER_ROLL,
  type GameState,
  type RollOutcome,
  type TurnEvent,
  type VictoryOutcome,
} from '@/game';
import {
  applyPassiveReward,
  checkVictory,
  createGame,
  describeVictory,
  getNextActivePlayerId,
  getPlayerName,
  isRollOutcome,
  resolveTurn,
  rollSix,
} from '@/game/engine';
import { createAnswerSheetProvider } from '@/game/automation';
import { formatActionLogLine } from '@/utils/gameEventFormatters';
import {
  type GameActionErrorCode,
  type GameSliceState,
  type ResolveRollPayload,
  type StartGamePayload,
  type TurnCursor,
  TurnPhase,
} from './gameState';

enableMapSet();

const initialState: GameSliceState = {
  game: null,
  turn: null,
  lastRoll: null,
  outcome: null,
  lastError: null,
  actionLog: [],
};

function appendLog(state: GameSliceState, line: string): void {
  state.actionLog = [...state.actionLog, line];
}

function setError(state: GameSliceState, code: GameActionErrorCode, message: string): void {
  state.lastError = { code, message };
  appendLog(state, `[System] Error [${code}]: ${message}`);
}

function appendEvents(state: GameSliceState, events: TurnEvent[], game: GameState): void {
  state.actionLog = [
    ...state.actionLog,
    ...events.map((event) => formatActionLogLine(event, game)),
  ];
}

function finishGame(
  state: GameSliceState,
  game: GameState,
  turn: TurnCursor,
  outcome: VictoryOutcome,
): void {
  state.outcome = outcome;
  turn.phase = TurnPhase.GameOver;
  appendLog(state, `[System] Game over. ${describeVictory(outcome, game)}`);
}

/**
 * Resolve the active game and turn cursor, or record why the action cannot run.
 */
function requirePhase(
  state: GameSliceState,
  phase: TurnPhase,
  actionName: string,
): { game: GameState; turn: TurnCursor } | null {
  if (!state.game || !state.turn) {
    setError(state, 'NO_GAME', `Start a game before you ${actionName}.`);
    return null;
  }
  if (state.turn.phase === TurnPhase.GameOver) {
    setError(state, 'GAME_OVER', `The game is over; cannot ${actionName}.`);
    return null;
  }
  if (state.turn.phase !== phase) {
    setError(
      state,
      'INVALID_PHASE',
      `Cannot ${actionName} during the ${state.turn.phase} phase.`,
    );
    return null;
  }
  return { game: state.game, turn: state.turn };
}

const gameSlice = createSlice({
  name: 'game',
  initialState,
  reducers: {
    returnToSetup: () => initialState,
    startGame: (state, action: PayloadAction<StartGamePayload>) => {
      const game = createGame(action.payload.playerNames);
      state.game = game;
      state.turn = {
        activePlayerId: game.settings.players[0].id,
        turnNumber: 1,
        phase: TurnPhase.StartTurn,
      };
      state.lastRoll = null;
      state.outcome = null;
      state.lastError = null;
      state.actionLog = [
        `[System] Game started with ${game.settings.players.length} players: ${game.settings.players
          .map((player) => player.name)
          .join(', ')}.`,
      ];
    },
    beginTurn: (state) => {
      const active = requirePhase(state, TurnPhase.StartTurn, 'begin a turn');
      if (!active) {
        return;
      }

      const { turn } = active;
      const passive = applyPassiveReward(active.game, turn.activePlayerId);
      state.game = passive.game;
      state.lastError = null;
      appendLog(
        state,
        `[System] Turn ${turn.turnNumber}: ${getPlayerName(passive.game, turn.activePlayerId)}.`,
      );
      appendEvents(state, passive.events, passive.game);

      const outcome = checkVictory(passive.game);
      if (outcome) {
        finishGame(state, passive.game, turn, outcome);
        return;
      }
      turn.phase = TurnPhase.Roll;
    },
    resolveRoll: (state, action: PayloadAction<ResolveRollPayload | undefined>) => {
      const active = requirePhase(state, TurnPhase.Roll, 'resolve a roll');
      if (!active) {
        return;
      }

      const requestedRoll = action.payload?.roll;
      let roll: RollOutcome;
      if (requestedRoll === undefined) {
        roll = rollSix();
      } else if (isRollOutcome(requestedRoll)) {
        roll = requestedRoll;
      } else {
        setError(
          state,
          'INVALID_ROLL',
          `A roll needs exactly ${DICE_PER_ROLL} known faces, got ${requestedRoll.length}.`,
        );
        return;
      }

      const { turn } = active;
      const resolved = resolveTurn(
        active.game,
        turn.activePlayerId,
        roll,
        createAnswerSheetProvider(action.payload?.answers),
      );
      state.game = resolved.game;
      state.lastRoll = [...roll];
      state.lastError = null;
      appendEvents(state, resolved.events, resolved.game);

      const outcome = checkVictory(resolved.game);
      if (outcome) {
        finishGame(state, resolved.game, turn, outcome);
        return;
      }
      turn.phase = TurnPhase.EndTurn;
    },
    endTurn: (state) => {
      const active = requirePhase(state, TurnPhase.EndTurn, 'end the turn');
      if (!active) {
        return;
      }

      const { game, turn } = active;
      const nextPlayerId = getNextActivePlayerId(game, turn.activePlayerId);
      if (nextPlayerId === null) {
        finishGame(state, game, turn, checkVictory(game) ?? { type: 'draw' });
        return;
      }

      turn.activePlayerId = nextPlayerId;
      turn.turnNumber += 1;
      turn.phase = TurnPhase.StartTurn;
      state.lastRoll = null;
      state.lastError = null;
    },
  },
});

export const { returnToSetup, startGame, beginTurn, resolveRoll, endTurn } = gameSlice.actions;

export const gameReducer = gameSlice.reducer;
