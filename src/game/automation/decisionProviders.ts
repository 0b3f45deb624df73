import type { DecisionKind, DecisionProvider, DecisionRequest } from '../decisions';
import type { PlayerId } from '../game';

export type DecisionAnswerSheet = Partial<Record<DecisionKind, boolean>>;

/**
 * Accept the caller-specified default for every decision.
 */
export const defaultDecisionProvider: DecisionProvider = {
  askYesNo: (request) => request.defaultAnswer,
};

/**
 * Answer from a fixed queue in request order; defaults once the queue runs out.
 */
export function createScriptedDecisionProvider(answers: boolean[]): DecisionProvider & {
  asked: DecisionRequest[];
} {
  const queue = [...answers];
  const asked: DecisionRequest[] = [];
  return {
    asked,
    askYesNo: (request) => {
      asked.push(request);
      return queue.shift() ?? request.defaultAnswer;
    },
  };
}

export function createAnswerSheetProvider(sheet: DecisionAnswerSheet = {}): DecisionProvider {
  return {
    askYesNo: (request) => sheet[request.kind] ?? request.defaultAnswer,
  };
}

/**
 * Send each request to the provider of the player who must answer it.
 */
export function routeDecisionsByPlayer(
  providersByPlayerId: Record<PlayerId, DecisionProvider>,
  fallback: DecisionProvider = defaultDecisionProvider,
): DecisionProvider {
  return {
    askYesNo: (request) =>
      (providersByPlayerId[request.responderId] ?? fallback).askYesNo(request),
  };
}

/**
 * Read a typed y/n answer. Empty or unrecognised input yields the default.
 */
export function interpretYesNoAnswer(input: string, defaultAnswer: boolean): boolean {
  const normalized = input.trim().toLowerCase();
  if (normalized === 'y' || normalized === 'yes') {
    return true;
  }
  if (normalized === 'n' || normalized === 'no') {
    return false;
  }
  return defaultAnswer;
}
