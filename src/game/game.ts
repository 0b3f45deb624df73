import type { DiceFaceDefinition } from './dice';

export type PlayerId = string;

export interface PlayerConfig {
  id: PlayerId;
  name: string;
}

export type PlayerState = {
  id: PlayerId;
  name: string;

  health: number;
  score: number;
  currency: number;
};

export interface ControlZoneState {
  occupantId: PlayerId | null;
}

export interface GameSettings {
  players: PlayerConfig[];

  diceFaces: DiceFaceDefinition[];

  maxHealth: number;
  maxScore: number;
  startingHealth: number;
  minPlayers: number;
  maxPlayers: number;
  dicePerRoll: number;
  matchThreshold: number;
  passiveZoneReward: number;
  zoneEntryReward: number;
  zoneName: string;
}

export interface GameState {
  settings: GameSettings;

  /**
   * Registry of every player record, keyed by id. Scan order is `settings.players`.
   */
  players: Map<PlayerId, PlayerState>;
  zone: ControlZoneState;
}

export type VictoryOutcome =
  | { type: 'score'; playerId: PlayerId }
  | { type: 'lastStanding'; playerId: PlayerId }
  | { type: 'draw' };
