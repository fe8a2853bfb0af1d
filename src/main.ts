/**
 * @file main.ts
 * @description Entry point for Blob Volley.
 *
 * Runs a headless single-player match: player 1 stands still, the AI plays
 * the right half.  Events are logged as they happen and the final score is
 * printed when the match ends or the time limit runs out.
 *
 * Usage:  node dist/main.js [seed] [seconds]
 */

import { Game } from './game.js';
import { GameLoop } from './loop.js';
import { InputState } from './input.js';
import { createSeededRandom, mathRandom } from './random.js';
import { formatMatchTime } from './state.js';
import { parseDemoArgs } from './args.js';
import type { GameEvent } from './types.js';

function describe(event: GameEvent): string | null
{
  switch (event.type)
  {
    case 'SCORE':     return `point ${event.scorer.toLowerCase()}  ${event.score1} - ${event.score2}`;
    case 'GAME_OVER': return `game over, ${event.winner.toLowerCase()} wins`;
    case 'EXIT':      return 'exit';
    default:          return null;
  }
}

function main(): void
{
  const parsed = parseDemoArgs(process.argv.slice(2));
  if (!parsed.ok)
  {
    console.error(parsed.error);
    process.exitCode = 1;
    return;
  }

  const { seed, timeLimitS } = parsed.args;
  const random = seed === null ? mathRandom : createSeededRandom(seed);

  const input = new InputState();
  let limitTimer: ReturnType<typeof setTimeout> | null = null;

  const finish = (): void =>
  {
    loop.stop();
    if (limitTimer !== null) clearTimeout(limitTimer);

    const { player1, player2, matchTimer } = game.snapshot();
    console.log(`final  ${player1.score} - ${player2.score}  (${formatMatchTime(matchTimer)})`);
  };

  const game = new Game({
    random,
    onEvent: (event) =>
    {
      const line = describe(event);
      if (line !== null) console.log(`[${formatMatchTime(game.snapshot().matchTimer)}] ${line}`);
      if (event.type === 'GAME_OVER') finish();
    },
  });
  const loop = new GameLoop(game, input);

  /* The menu opens on SINGLE_PLAYER; one CONFIRM starts the match. */
  input.press('CONFIRM');
  input.release('CONFIRM');

  console.log(seed === null ? 'blob volley: unseeded' : `blob volley: seed ${seed}`);
  loop.start();

  limitTimer = setTimeout(() =>
  {
    console.log('time limit reached');
    finish();
  }, timeLimitS * 1000);
}

main();
