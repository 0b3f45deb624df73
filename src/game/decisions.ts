import type { PlayerId } from './game';

export type DecisionKind = 'concedeAfterAttack' | 'concedeToChallenge' | 'enterZone';

type DecisionRequestBase = {
  /**
   * The player whose answer is requested.
   */
  responderId: PlayerId;
  activePlayerId: PlayerId;
  attackCount: number;
  /**
   * Answer to use when the driver's input is empty or ambiguous.
   */
  defaultAnswer: boolean;
};

export type DecisionRequest =
  | (DecisionRequestBase & { kind: 'concedeAfterAttack' })
  | (DecisionRequestBase & { kind: 'concedeToChallenge' })
  | (DecisionRequestBase & { kind: 'enterZone' });

export interface DecisionProvider {
  askYesNo(request: DecisionRequest): boolean;
}
