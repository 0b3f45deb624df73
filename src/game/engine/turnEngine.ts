import type { DecisionKind, DecisionProvider, DecisionRequest } from '../decisions';
import { DieFace, type RollOutcome } from '../dice';
import type { GameState, PlayerId } from '../game';
import { DECISION_DEFAULTS } from '../gameDefinitionConsts';
import type { ResolutionResult, TurnEvent } from '../reporting';
import { calculateNumberScore, tallyRoll } from './diceEngine';
import {
  addCurrency,
  addHealth,
  addScore,
  getPlayer,
  getPlayersInOrder,
  subtractHealth,
  updatePlayer,
} from './playerEngine';
import { getZoneOccupantId, isInZone, occupyZone, vacateZone } from './zoneEngine';

export type TurnEventListener = (event: TurnEvent, game: GameState) => void;

type ResolutionContext = {
  game: GameState;
  events: TurnEvent[];
  activePlayerId: PlayerId;
  attackCount: number;
  decisions: DecisionProvider;
  onEvent?: TurnEventListener;
};

export type ResolveTurnOptions = {
  /**
   * Called for each event as it happens, before any later decision is requested.
   */
  onEvent?: TurnEventListener;
};

function record(context: ResolutionContext, event: TurnEvent): void {
  context.events.push(event);
  context.onEvent?.(event, context.game);
}

function ask(context: ResolutionContext, kind: DecisionKind, responderId: PlayerId): boolean {
  const request: DecisionRequest = {
    kind,
    responderId,
    activePlayerId: context.activePlayerId,
    attackCount: context.attackCount,
    defaultAnswer: DECISION_DEFAULTS[kind],
  };
  const answer = context.decisions.askYesNo(request);
  record(context, { type: 'decision', playerId: responderId, request, answer });
  return answer;
}

/**
 * Occupant attacks every player outside the zone, then may concede.
 */
function resolveAttackFromZone(context: ResolutionContext): void {
  const { activePlayerId, attackCount } = context;

  for (const target of getPlayersInOrder(context.game)) {
    if (target.id === activePlayerId || isInZone(context.game, target.id)) {
      continue;
    }
    context.game = updatePlayer(context.game, target.id, (player) =>
      subtractHealth(player, attackCount),
    );
    record(context, {
      type: 'damaged',
      playerId: activePlayerId,
      targetId: target.id,
      damage: attackCount,
      health: getPlayer(context.game, target.id).health,
    });
  }

  if (ask(context, 'concedeAfterAttack', activePlayerId)) {
    context.game = vacateZone(context.game);
    record(context, { type: 'leftZone', playerId: activePlayerId });
  }
}

function resolveZoneEntry(context: ResolutionContext): void {
  const { activePlayerId } = context;
  if (!ask(context, 'enterZone', activePlayerId)) {
    record(context, { type: 'declinedZone', playerId: activePlayerId });
    return;
  }

  const points = context.game.settings.zoneEntryReward;
  context.game = occupyZone(context.game, activePlayerId);
  context.game = updatePlayer(context.game, activePlayerId, (player) =>
    addScore(player, points, context.game.settings),
  );
  record(context, {
    type: 'enteredZone',
    playerId: activePlayerId,
    points,
    score: getPlayer(context.game, activePlayerId).score,
  });
}

/**
 * Challenger's claws never deal damage; they only ask the occupant to leave.
 */
function resolveAttackFromOutside(context: ResolutionContext): void {
  const occupantId = getZoneOccupantId(context.game);

  if (occupantId !== null) {
    if (!ask(context, 'concedeToChallenge', occupantId)) {
      record(context, {
        type: 'heldZone',
        playerId: occupantId,
        challengerId: context.activePlayerId,
      });
      return;
    }
    context.game = vacateZone(context.game);
    record(context, { type: 'leftZone', playerId: occupantId });
  }

  resolveZoneEntry(context);
}

/**
 * Apply one roll for the active player: number matches, currency, healing,
 * then attack and zone contention. Decisions are requested synchronously
 * from the provider.
 */
export function resolveTurn(
  game: GameState,
  activePlayerId: PlayerId,
  roll: RollOutcome,
  decisions: DecisionProvider,
  options: ResolveTurnOptions = {},
): ResolutionResult {
  const { settings } = game;
  getPlayer(game, activePlayerId);

  const tally = tallyRoll(roll);
  const context: ResolutionContext = {
    game,
    events: [],
    activePlayerId,
    attackCount: tally[DieFace.Attack],
    decisions,
    onEvent: options.onEvent,
  };
  record(context, { type: 'rolled', playerId: activePlayerId, roll: [...roll] });
  const inZone = isInZone(game, activePlayerId);

  const points = calculateNumberScore(tally, settings);
  if (points > 0) {
    context.game = updatePlayer(context.game, activePlayerId, (player) =>
      addScore(player, points, settings),
    );
    record(context, {
      type: 'scoredNumbers',
      playerId: activePlayerId,
      points,
      score: getPlayer(context.game, activePlayerId).score,
    });
  }

  const currency = tally[DieFace.Currency];
  if (currency > 0) {
    context.game = updatePlayer(context.game, activePlayerId, (player) =>
      addCurrency(player, currency),
    );
    record(context, {
      type: 'gainedCurrency',
      playerId: activePlayerId,
      amount: currency,
      currency: getPlayer(context.game, activePlayerId).currency,
    });
  }

  const hearts = tally[DieFace.Heal];
  if (hearts > 0) {
    if (inZone) {
      record(context, { type: 'healingSuppressed', playerId: activePlayerId, amount: hearts });
    } else {
      context.game = updatePlayer(context.game, activePlayerId, (player) =>
        addHealth(player, hearts, settings),
      );
      record(context, {
        type: 'healed',
        playerId: activePlayerId,
        amount: hearts,
        health: getPlayer(context.game, activePlayerId).health,
      });
    }
  }

  if (context.attackCount > 0) {
    if (inZone) {
      resolveAttackFromZone(context);
    } else {
      resolveAttackFromOutside(context);
    }
  }

  return { game: context.game, events: context.events };
}
