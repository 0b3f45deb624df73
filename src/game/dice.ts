export enum DieFace {
  One = 'one',
  Two = 'two',
  Three = 'three',
  Currency = 'currency',
  Attack = 'attack',
  Heal = 'heal',
}

/**
 * Exactly six faces, produced fresh each turn.
 */
export type RollOutcome = readonly [DieFace, DieFace, DieFace, DieFace, DieFace, DieFace];

export type FaceTally = Record<DieFace, number>;

export type DiceFaceDefinition = {
  face: DieFace;
  label: string;
  /**
   * Points awarded when at least `matchThreshold` dice show this face.
   */
  matchPoints: number;
};
