import type { DecisionKind } from './decisions';
import { type DiceFaceDefinition, DieFace } from './dice';
import type { GameSettings, PlayerConfig, PlayerId, PlayerState } from './game';

export const MAX_HEALTH = 12;
export const MAX_SCORE = 20;
export const STARTING_HEALTH = 10;
export const MIN_PLAYERS = 2;
export const MAX_PLAYERS = 6;
export const DICE_PER_ROLL = 6;
export const MATCH_THRESHOLD = 3;
export const PASSIVE_ZONE_REWARD = 2;
export const ZONE_ENTRY_REWARD = 1;
export const ZONE_NAME = 'Tokyo';

/**
 * Turn cap for unattended games.
 */
export const MAX_TURNS = 1000;

/**
 * Ordered by the d6 pip that selects each face: 1-3, then energy, claw, heart.
 */
export const DICE_FACES: DiceFaceDefinition[] = [
  { face: DieFace.One, label: '1', matchPoints: 1 },
  { face: DieFace.Two, label: '2', matchPoints: 2 },
  { face: DieFace.Three, label: '3', matchPoints: 3 },
  { face: DieFace.Currency, label: 'Energy', matchPoints: 0 },
  { face: DieFace.Attack, label: 'Claw', matchPoints: 0 },
  { face: DieFace.Heal, label: 'Heart', matchPoints: 0 },
];

export const DECISION_DEFAULTS: Record<DecisionKind, boolean> = {
  concedeAfterAttack: false,
  concedeToChallenge: false,
  enterZone: true,
};

export const CreateGameSettings = (players: PlayerConfig[]): GameSettings => ({
  players: players,
  diceFaces: DICE_FACES,

  maxHealth: MAX_HEALTH,
  maxScore: MAX_SCORE,
  startingHealth: STARTING_HEALTH,
  minPlayers: MIN_PLAYERS,
  maxPlayers: MAX_PLAYERS,
  dicePerRoll: DICE_PER_ROLL,
  matchThreshold: MATCH_THRESHOLD,
  passiveZoneReward: PASSIVE_ZONE_REWARD,
  zoneEntryReward: ZONE_ENTRY_REWARD,
  zoneName: ZONE_NAME,
});

export const CreatePlayerState = (
  id: PlayerId,
  name: string,
  settings: GameSettings,
): PlayerState => ({
  id,
  name,
  health: settings.startingHealth,
  score: 0,
  currency: 0,
});
