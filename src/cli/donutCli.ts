#!/usr/bin/env node
import process from 'node:process';

import { selectPalette } from '../palette/palettes.js';
import { runAnimation, type AnimationSummary } from '../runtime/animation.js';
import { FrameStats, formatFrameStats } from '../runtime/frameStats.js';
import { frameIntervalMs } from '../runtime/pacing.js';
import { StdinKeySource } from '../terminal/keyboard.js';
import { TerminalSession } from '../terminal/session.js';
import { composeFrame } from '../torus/compositor.js';
import { rasterizeTorus } from '../torus/rasterizer.js';
import { createRotationState } from '../torus/rotation.js';
import { USAGE, parseCliArgs } from './utils/args.js';

const exitWithError = (message: string): never => {
  console.error(message);
  process.exit(1);
};

const main = async () => {
  const [, , ...argv] = process.argv;
  const { options, warnings } = parseCliArgs(argv);
  if (options.help) {
    console.log(USAGE);
    return;
  }
  warnings.forEach((warning) => console.warn(`[donut] ${warning}`));

  const selection = selectPalette(options.color);
  if (selection.warning) {
    console.warn(`[donut] ${selection.warning}`);
  }

  if (options.once) {
    const buffers = rasterizeTorus(createRotationState());
    process.stdout.write(`${composeFrame(buffers, selection.palette)}\n`);
    return;
  }

  const interval = frameIntervalMs(options.speed);
  const session = TerminalSession.open(process.stdin, process.stdout);
  const keys = new StdinKeySource(process.stdin);
  const shutdown = () => {
    keys.close();
    session.restore();
  };
  process.once('exit', shutdown);
  process.once('SIGTERM', () => {
    shutdown();
    process.exit(143);
  });

  const stats = new FrameStats({ budgetMs: interval });
  let summary: AnimationSummary;
  try {
    summary = await runAnimation({
      palette: selection.palette,
      frameIntervalMs: interval,
      keys,
      output: process.stdout,
      maxFrames: options.maxFrames,
      stats,
    });
  } finally {
    shutdown();
  }
  process.stdout.write('\n');
  if (options.stats) {
    console.error(`[donut] ${formatFrameStats(summary.stats)}`);
  }
};

main().catch((error) => {
  exitWithError(error instanceof Error ? error.message : String(error));
});
