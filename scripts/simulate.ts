import {
  MAX_PLAYERS,
  MAX_TURNS,
  MIN_PLAYERS,
} from '../src/game/index.ts';
import { runHeadlessMatch, type HeadlessGameResult } from '../src/game/automation/index.ts';
import { average, formatNum, formatPercent, parseNumber } from './helpers.ts';

type CliOptions = {
  games: number;
  players: number;
  maxTurns: number;
  printLog: boolean;
};

function printUsage(): void {
  console.log('Usage: npx tsx scripts/simulate.ts [options]');
  console.log('');
  console.log('Options:');
  console.log('  --games <n>       Number of games to simulate (default: 100)');
  console.log(`  --players <n>     Player count, ${MIN_PLAYERS}-${MAX_PLAYERS} (default: 4)`);
  console.log(`  --max-turns <n>   Max turns per game (default: ${MAX_TURNS})`);
  console.log('  --log             Print the action log of the first game');
  console.log('  --help            Show this help');
  console.log('');
  console.log('Every decision takes its default: occupants never concede, vacant zones are entered.');
}

function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = {
    games: 100,
    players: 4,
    maxTurns: MAX_TURNS,
    printLog: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === '--help' || arg === '-h') {
      printUsage();
      process.exit(0);
    }
    if (arg === '--log') {
      options.printLog = true;
      continue;
    }

    const next = argv[i + 1];
    if (!next && arg.startsWith('--')) {
      throw new Error(`Missing value for ${arg}`);
    }

    switch (arg) {
      case '--games':
        options.games = parseNumber(next, '--games');
        i += 1;
        break;
      case '--players':
        options.players = parseNumber(next, '--players');
        i += 1;
        break;
      case '--max-turns':
        options.maxTurns = parseNumber(next, '--max-turns');
        i += 1;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  if (
    !Number.isInteger(options.players) ||
    options.players < MIN_PLAYERS ||
    options.players > MAX_PLAYERS
  ) {
    throw new Error(`--players must be an integer from ${MIN_PLAYERS} to ${MAX_PLAYERS}.`);
  }
  if (!Number.isInteger(options.games) || options.games <= 0) {
    throw new Error('--games must be a positive integer.');
  }
  if (!Number.isInteger(options.maxTurns) || options.maxTurns <= 0) {
    throw new Error('--max-turns must be a positive integer.');
  }

  return options;
}

function main(): void {
  const options = parseArgs(process.argv.slice(2));
  const names = Array.from({ length: options.players }, (_, index) => `Monster ${index + 1}`);
  const results: HeadlessGameResult[] = [];

  for (let game = 0; game < options.games; game += 1) {
    results.push(runHeadlessMatch(names, { maxTurns: options.maxTurns }));
  }

  if (options.printLog && results.length > 0) {
    for (const line of results[0].actionLog) {
      console.log(line);
    }
    console.log('');
  }

  const scoreWins = results.filter((result) => result.outcome?.type === 'score').length;
  const lastStanding = results.filter((result) => result.outcome?.type === 'lastStanding').length;
  const draws = results.filter((result) => result.outcome?.type === 'draw').length;
  const stalled = results.filter((result) => !result.completed).length;
  const winsBySeat = new Map<string, number>();
  for (const result of results) {
    for (const winner of result.winners) {
      winsBySeat.set(winner, (winsBySeat.get(winner) ?? 0) + 1);
    }
  }

  console.log(`Games: ${results.length} (${options.players} players)`);
  console.log(`Average turns: ${formatNum(average(results.map((result) => result.turnsPlayed)))}`);
  console.log(`Score victories: ${scoreWins} (${formatPercent(scoreWins / results.length)})`);
  console.log(`Last standing: ${lastStanding} (${formatPercent(lastStanding / results.length)})`);
  console.log(`Draws: ${draws} (${formatPercent(draws / results.length)})`);
  console.log(`Stalled: ${stalled}`);
  console.log('');
  console.log('Wins by seat:');
  for (const name of names) {
    const wins = winsBySeat.get(name) ?? 0;
    console.log(`  ${name}: ${wins} (${formatPercent(wins / results.length)})`);
  }
}

main();
