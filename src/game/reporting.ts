import type { DecisionRequest } from './decisions';
import type { DieFace } from './dice';
import type { GameState, PlayerId } from './game';

export type TurnEvent =
  | { type: 'rolled'; playerId: PlayerId; roll: DieFace[] }
  | { type: 'scoredNumbers'; playerId: PlayerId; points: number; score: number }
  | { type: 'gainedCurrency'; playerId: PlayerId; amount: number; currency: number }
  | { type: 'healed'; playerId: PlayerId; amount: number; health: number }
  | { type: 'healingSuppressed'; playerId: PlayerId; amount: number }
  | { type: 'damaged'; playerId: PlayerId; targetId: PlayerId; damage: number; health: number }
  | { type: 'decision'; playerId: PlayerId; request: DecisionRequest; answer: boolean }
  | { type: 'leftZone'; playerId: PlayerId }
  | { type: 'heldZone'; playerId: PlayerId; challengerId: PlayerId }
  | { type: 'enteredZone'; playerId: PlayerId; points: number; score: number }
  | { type: 'declinedZone'; playerId: PlayerId }
  | { type: 'passiveReward'; playerId: PlayerId; points: number; score: number };

export type TurnEventType = TurnEvent['type'];

export type PlayerEndStateSummary = {
  playerId: string;
  playerName: string;
  score: number;
  health: number;
  currency: number;
  eliminated: boolean;
  inZone: boolean;
};

/**
 * New game state plus the events that produced it.
 */
export type ResolutionResult = {
  game: GameState;
  events: TurnEvent[];
};
