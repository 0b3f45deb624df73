import type { DieFace, GameState, PlayerId, VictoryOutcome } from '@/game';
import type { DecisionAnswerSheet } from '@/game/automation';

export enum TurnPhase {
  StartTurn = 'startTurn',
  Roll = 'roll',
  EndTurn = 'endTurn',
  GameOver = 'gameOver',
}

export interface GameActionError {
  code: GameActionErrorCode;
  message: string;
}

export type GameActionErrorCode =
  | 'NO_GAME'
  | 'GAME_OVER'
  | 'INVALID_PHASE'
  | 'INVALID_ROLL';

/**
 * Turn order bookkeeping. The engine itself keeps no turn counters.
 */
export interface TurnCursor {
  activePlayerId: PlayerId;
  turnNumber: number;
  phase: TurnPhase;
}

export interface GameSliceState {
  game: GameState | null;
  turn: TurnCursor | null;
  lastRoll: DieFace[] | null;
  outcome: VictoryOutcome | null;
  lastError: GameActionError | null;
  actionLog: string[];
}

export interface StartGamePayload {
  playerNames: string[];
}

export interface ResolveRollPayload {
  /**
   * Explicit faces for the roll; omitted means roll randomly.
   */
  roll?: DieFace[];
  answers?: DecisionAnswerSheet;
}
