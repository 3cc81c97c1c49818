#!/usr/bin/env node
/**
 * Simulate a War game and write its transcript.
 *
 * Plays one seeded game to completion (or to the turn cap) and writes the
 * transcript JSON, printing a short summary.
 *
 * Usage:
 *   npm run simulate -- [--seed <n>] [--max-hands <n>] [--mode <fifo|filo|shuffled>]
 *                       [--randomize] [--output <path>]
 */

import { writeFileSync, mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { createWarGame } from '../games/war/createWarGame';
import { TranscriptRecorder } from '../games/war/GameTranscript';
import { ConfigurationError } from '../src/core-engine/errors';

interface SimulateArgs {
  config: Record<string, unknown>;
  outputPath: string;
}

function parseArgs(): SimulateArgs {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    console.log(`
Usage: npm run simulate -- [options]

Options:
  --seed <n>        Seed for the deal and any shuffling (default: 42)
  --max-hands <n>   Turn cap (default: 5000)
  --mode <mode>     Discard recycle mode: fifo, filo or shuffled (default: fifo)
  --randomize       Randomize the order won cards enter the discard pile
  --output <path>   Transcript path (default: data/transcripts/war/seed-<n>.json)
`);
    process.exit(0);
  }

  const valueOf = (flag: string): string | undefined => {
    const index = args.indexOf(flag);
    return index === -1 ? undefined : args[index + 1];
  };

  const seed = Number(valueOf('--seed') ?? 42);
  const config: Record<string, unknown> = {
    seed,
    randomizeWinnings: args.includes('--randomize'),
  };

  const maxHands = valueOf('--max-hands');
  if (maxHands !== undefined) config.maxHands = Number(maxHands);

  const mode = valueOf('--mode');
  if (mode !== undefined) config.recycleMode = mode;

  const outputPath = resolve(
    valueOf('--output') ?? `data/transcripts/war/seed-${seed}.json`,
  );

  return { config, outputPath };
}

function main(): void {
  const { config, outputPath } = parseArgs();

  const game = createWarGame(config);
  const recorder = new TranscriptRecorder(game);
  const summary = game.playGame();
  const transcript = recorder.finalize();

  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, JSON.stringify(transcript, null, 2) + '\n');

  console.log(`Transcript written to ${outputPath}`);
  console.log(`  Turns: ${summary.handsPlayed}`);
  console.log(`  Finished: ${summary.finished}`);
  if (transcript.results) {
    console.log(`  Result: ${transcript.results.reason}`);
    console.log(`  Leader: ${transcript.results.winnerName ?? 'none (even counts)'}`);
  }
}

try {
  main();
} catch (err) {
  if (err instanceof ConfigurationError) {
    console.error(`[simulate] ${err.message}`);
    process.exit(1);
  }
  throw err;
}
