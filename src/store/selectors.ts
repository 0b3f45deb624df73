import { createSelector } from '@reduxjs/toolkit';
import {
  describeVictory,
  getPlayerEndStateSummaries,
  getPlayerName,
  getZoneOccupantId,
} from '@/game/engine';
import type { RootState } from './store';

const selectGameSlice = (state: RootState) => state.game;

export const selectGame = createSelector(selectGameSlice, (slice) => slice.game);

export const selectTurn = createSelector(selectGameSlice, (slice) => slice.turn);

export const selectOutcome = createSelector(selectGameSlice, (slice) => slice.outcome);

export const selectLastError = createSelector(
  selectGameSlice,
  (slice) => slice.lastError,
);

export const selectActionLog = createSelector(
  selectGameSlice,
  (slice) => slice.actionLog,
);

export const selectLastRoll = createSelector(selectGameSlice, (slice) => slice.lastRoll);

export const selectTurnStatus = createSelector(
  [selectGame, selectTurn, selectLastError],
  (game, turn, lastError) => {
    if (!game || !turn) {
      return {
        isGameActive: false,
        turnNumber: 0,
        phase: null,
        activePlayerId: null,
        activePlayerName: null,
        zoneOccupantName: null,
        errorMessage: lastError?.message ?? null,
      };
    }

    const occupantId = getZoneOccupantId(game);
    return {
      isGameActive: true,
      turnNumber: turn.turnNumber,
      phase: turn.phase,
      activePlayerId: turn.activePlayerId,
      activePlayerName: getPlayerName(game, turn.activePlayerId),
      zoneOccupantName: occupantId === null ? null : getPlayerName(game, occupantId),
      errorMessage: lastError?.message ?? null,
    };
  },
);

export const selectScoreboard = createSelector(selectGame, (game) =>
  game ? getPlayerEndStateSummaries(game) : [],
);

export const selectGameOverMessage = createSelector(
  [selectGame, selectOutcome],
  (game, outcome) => (game && outcome ? describeVictory(outcome, game) : null),
);
