#!/usr/bin/env node
/**
 * Simulation Tool -- plays Pikomino games between built-in strategies
 * and prints the results.
 *
 * Usage:
 *   npm run simulate -- [--games <n>] [--player <Name:strategy>]... [--seed <n>]
 *   npm run simulate -- --config <tournament.json>
 *
 * With one game, every turn is printed as it resolves and the history
 * can be written out with --transcript. With more, per-player figures
 * are printed at the end.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { TournamentConfig } from '../games/pikomino/PikominoConfig';
import {
  ConfigError,
  STRATEGY_NAMES,
  createSeededRng,
  createStrategy,
  parsePlayerSpec,
  parseTournamentConfig,
} from '../games/pikomino/PikominoConfig';
import { createSession } from '../games/pikomino/createPikominoSession';
import { runTournament } from '../games/pikomino/Tournament';

// ── Constants ───────────────────────────────────────────────

const DEFAULT_PLAYERS = ['Conservative:conservative', 'Aggressive:aggressive', 'Optimal:optimal'];
const DEFAULT_GAMES = 10;

// ── CLI Arg Parsing ─────────────────────────────────────────

interface CliArgs {
  config: TournamentConfig;
  transcriptPath: string;
}

function printUsage(): void {
  console.log(`
Usage: npm run simulate -- [options]

Options:
  --games <n>            Number of games (default: ${DEFAULT_GAMES})
  --player <Name:kind>   Add a player; repeat for each seat
                         (default: ${DEFAULT_PLAYERS.join(' ')})
  --seed <n>             Seed for reproducible runs
  --max-turns <n>        Per-game turn limit
  --config <file.json>   Read the whole tournament configuration from a file
  --transcript <file>    With --games 1, write the game history as JSON

Strategies: ${STRATEGY_NAMES.join(', ')}

Examples:
  npm run simulate -- --games 100 --seed 7
  npm run simulate -- --games 1 --player Alice:optimal --player Bob:random --transcript out.json
`);
}

function parseNumber(flag: string, raw: string | undefined): number {
  const value = Number(raw);
  if (raw === undefined || raw === '' || Number.isNaN(value)) {
    throw new ConfigError([`${flag}: expected a number, got ${raw ?? 'nothing'}`]);
  }
  return value;
}

function parseArgs(): CliArgs {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  let configPath = '';
  let transcriptPath = '';
  const playerSpecs: string[] = [];
  const raw: Record<string, number> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--config') {
      configPath = args[++i] || '';
    } else if (arg === '--transcript') {
      transcriptPath = args[++i] || '';
    } else if (arg === '--player' || arg === '-p') {
      playerSpecs.push(args[++i] || '');
    } else if (arg === '--games' || arg === '-n') {
      raw.games = parseNumber(arg, args[++i]);
    } else if (arg === '--seed') {
      raw.seed = parseNumber(arg, args[++i]);
    } else if (arg === '--max-turns') {
      raw.maxTurns = parseNumber(arg, args[++i]);
    } else {
      throw new ConfigError([`Unknown argument: ${arg}`]);
    }
  }

  if (configPath) {
    const text = fs.readFileSync(path.resolve(configPath), 'utf-8');
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      const msg = err instanceof Error ? err.message : 'invalid JSON';
      throw new ConfigError([`${configPath}: ${msg}`]);
    }
    return { config: parseTournamentConfig(json), transcriptPath };
  }

  const specs = playerSpecs.length > 0 ? playerSpecs : DEFAULT_PLAYERS;
  const config = parseTournamentConfig({
    players: specs.map(parsePlayerSpec),
    games: raw.games ?? DEFAULT_GAMES,
    seed: raw.seed,
    maxTurns: raw.maxTurns,
  });
  return { config, transcriptPath };
}

// ── Modes ───────────────────────────────────────────────────

function playSingleGame(config: TournamentConfig, transcriptPath: string): void {
  const rng = config.seed !== undefined ? createSeededRng(config.seed) : Math.random;
  const game = createSession(
    config.players.map((p) => p.name),
    config.players.map((p) => createStrategy(p.strategy, rng)),
    { rng, maxTurns: config.maxTurns },
  );

  game.events.on('dice-rolled', (e) => {
    console.log(`  rolled ${e.dice.join(' ')}`);
  });
  game.events.on('dice-reserved', (e) => {
    console.log(`  kept ${e.count} x ${e.face} (score ${e.score}, ${e.remainingDice} dice left)`);
  });
  game.events.on('turn-started', (e) => {
    console.log(`Turn ${e.turnNumber}: ${e.playerName} (${e.strategyName})`);
  });
  game.events.on('turn-completed', (e) => {
    const tile = e.tile ? ` -> tile ${e.tile.value} (${e.tile.worms} worms)` : '';
    console.log(`  ${e.outcome}${tile}`);
  });
  game.events.on('game-ended', (e) => {
    console.log(`\nGame over after ${e.finalTurnNumber} turns. Winner: ${e.winnerName}`);
    for (const [name, worms] of Object.entries(e.scores)) {
      console.log(`  ${name}: ${worms} worms`);
    }
  });

  game.playToEnd();

  if (transcriptPath) {
    const outPath = path.resolve(transcriptPath);
    fs.mkdirSync(path.dirname(outPath), { recursive: true });
    fs.writeFileSync(outPath, JSON.stringify(game.history.toJSON(), null, 2));
    console.log(`\nTranscript written to ${outPath}`);
  }
}

function percent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

function playTournament(config: TournamentConfig): void {
  console.log(`Simulating ${config.games} games`);
  const result = runTournament({
    players: config.players,
    games: config.games,
    seed: config.seed,
    maxTurns: config.maxTurns,
  });

  console.log(`\nAverage turns per game: ${result.averageTurnsPerGame.toFixed(1)}`);
  for (const p of result.players) {
    console.log(`\n${p.name} (${p.strategyName}):`);
    console.log(`  Wins: ${p.wins}/${result.games} (${percent(p.winRate)})`);
    console.log(`  Average worms: ${p.averageWorms.toFixed(1)}`);
    console.log(`  Average tiles: ${p.averageTiles.toFixed(1)}`);
    console.log(`  Turn success rate: ${percent(p.turnSuccessRate)}`);
  }
}

// ── Main ────────────────────────────────────────────────────

function main(): void {
  const { config, transcriptPath } = parseArgs();
  if (config.games === 1) {
    playSingleGame(config, transcriptPath);
  } else {
    if (transcriptPath) {
      console.warn('[simulate] --transcript is only used with --games 1');
    }
    playTournament(config);
  }
}

try {
  main();
} catch (err) {
  if (err instanceof ConfigError) {
    console.error(err.message);
    process.exit(1);
  }
  throw err;
}
