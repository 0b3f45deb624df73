import {
  MAX_PLAYERS,
  MAX_TURNS,
  MIN_PLAYERS,
  type DecisionProvider,
  type GameState,
  type TurnEvent,
  type VictoryOutcome,
} from '../src/game/index.ts';
import {
  applyPassiveReward,
  checkVictory,
  createGame,
  describeVictory,
  getNextActivePlayerId,
  getPlayer,
  getPlayersInOrder,
  parsePlayerCount,
  resolveTurn,
  rollSix,
} from '../src/game/engine/index.ts';
import { interpretYesNoAnswer } from '../src/game/automation/index.ts';
import {
  formatDecisionPrompt,
  formatPlayerStatus,
  formatTurnEvent,
} from '../src/utils/gameEventFormatters.ts';
import { readLineSync } from './helpers.ts';

function createConsoleDecisionProvider(getGame: () => GameState): DecisionProvider {
  return {
    askYesNo: (request) =>
      interpretYesNoAnswer(
        readLineSync(`    ${formatDecisionPrompt(request, getGame())}`),
        request.defaultAnswer,
      ),
  };
}

function printEvent(event: TurnEvent, game: GameState): void {
  if (event.type !== 'decision') {
    console.log(`    ${formatTurnEvent(event, game)}`);
  }
}

/**
 * Events print as they happen, so scoring lines appear before any prompt.
 */
function playTurn(
  game: GameState,
  activePlayerId: string,
  decisions: DecisionProvider,
): { game: GameState; outcome: VictoryOutcome | null } {
  const passive = applyPassiveReward(game, activePlayerId);
  for (const event of passive.events) {
    printEvent(event, passive.game);
  }
  const earlyOutcome = checkVictory(passive.game);
  if (earlyOutcome) {
    return { game: passive.game, outcome: earlyOutcome };
  }

  const resolved = resolveTurn(passive.game, activePlayerId, rollSix(), decisions, {
    onEvent: printEvent,
  });
  return { game: resolved.game, outcome: checkVictory(resolved.game) };
}

function printFinalScores(game: GameState): void {
  console.log('');
  console.log('--- Final Scores ---');
  for (const player of getPlayersInOrder(game)) {
    console.log(`- ${formatPlayerStatus(player)}`);
  }
}

function main(): void {
  console.log('# King of the Zone (Simplified) #');

  const playerCount = parsePlayerCount(
    readLineSync(`How many players (${MIN_PLAYERS}-${MAX_PLAYERS})? `),
  );
  const names = Array.from({ length: playerCount }, (_, index) =>
    readLineSync(`Enter name for Player ${index + 1}: `),
  );

  let game = createGame(names);
  const decisions = createConsoleDecisionProvider(() => game);
  console.log('');
  console.log(`--- Game start with ${game.settings.players.length} players ---`);

  let activePlayerId = getNextActivePlayerId(game, null);
  let turnNumber = 1;
  while (activePlayerId !== null && turnNumber <= MAX_TURNS) {
    const player = getPlayer(game, activePlayerId);
    console.log('');
    console.log(
      `--- Turn ${turnNumber} - ${player.name} (health ${player.health}, score ${player.score}) ---`,
    );

    const turn = playTurn(game, activePlayerId, decisions);
    game = turn.game;

    if (turn.outcome) {
      console.log('');
      console.log('### GAME OVER ###');
      console.log(describeVictory(turn.outcome, game));
      printFinalScores(game);
      return;
    }

    activePlayerId = getNextActivePlayerId(game, activePlayerId);
    turnNumber += 1;
  }

  console.log('');
  console.log(`Game stopped after ${MAX_TURNS} turns.`);
  printFinalScores(game);
}

main();
