import { DieFace, type FaceTally, type RollOutcome } from '../dice';
import type { GameSettings } from '../game';
import { DICE_FACES, DICE_PER_ROLL } from '../gameDefinitionConsts';

const KNOWN_FACES = new Set<string>(Object.values(DieFace));

/**
 * Roll a single die - returns a face drawn uniformly from the six faces.
 */
export function rollSingleDie(): DieFace {
  return DICE_FACES[Math.floor(Math.random() * DICE_FACES.length)].face;
}

/**
 * Roll all six dice for a turn.
 */
export function rollSix(): RollOutcome {
  return [
    rollSingleDie(),
    rollSingleDie(),
    rollSingleDie(),
    rollSingleDie(),
    rollSingleDie(),
    rollSingleDie(),
  ];
}

export function isDieFace(value: unknown): value is DieFace {
  return typeof value === 'string' && KNOWN_FACES.has(value);
}

/**
 * Check that a list of faces forms a complete roll.
 */
export function isRollOutcome(faces: readonly unknown[]): faces is RollOutcome {
  return faces.length === DICE_PER_ROLL && faces.every(isDieFace);
}

/**
 * Build a roll from explicit faces. Throws unless exactly six known faces are given.
 */
export function createRoll(faces: readonly unknown[]): RollOutcome {
  if (!isRollOutcome(faces)) {
    throw new Error(
      `A roll needs exactly ${DICE_PER_ROLL} known faces, got [${faces.join(', ')}].`,
    );
  }
  return faces;
}

export function emptyTally(): FaceTally {
  return {
    [DieFace.One]: 0,
    [DieFace.Two]: 0,
    [DieFace.Three]: 0,
    [DieFace.Currency]: 0,
    [DieFace.Attack]: 0,
    [DieFace.Heal]: 0,
  };
}

/**
 * Count each face in a roll.
 */
export function tallyRoll(roll: RollOutcome): FaceTally {
  const tally = emptyTally();
  for (const face of roll) {
    tally[face] += 1;
  }
  return tally;
}

/**
 * Points from number matches: each face with at least `matchThreshold` dice
 * scores its own value once, regardless of extra matching dice.
 */
export function calculateNumberScore(tally: FaceTally, settings: GameSettings): number {
  return settings.diceFaces.reduce((sum, definition) => {
    if (definition.matchPoints > 0 && tally[definition.face] >= settings.matchThreshold) {
      return sum + definition.matchPoints;
    }
    return sum;
  }, 0);
}

export function getFaceLabel(face: DieFace, settings: GameSettings): string {
  return settings.diceFaces.find((definition) => definition.face === face)?.label ?? face;
}
