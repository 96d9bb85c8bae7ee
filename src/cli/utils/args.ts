import { DEFAULT_PALETTE } from '../../palette/palettes.js';
import { DEFAULT_SPEED, parseSpeedFactor } from '../../runtime/pacing.js';

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export type CliOptions = {
  help: boolean;
  color: string;
  speed: number;
  once: boolean;
  stats: boolean;
  maxFrames?: number;
};

export type ParsedCli = {
  options: CliOptions;
  warnings: string[];
};

const parseFrameCount = (raw: string | undefined): number => {
  const value = Number(raw);
  if (raw === undefined || !Number.isInteger(value) || value < 1) {
    throw new CliUsageError(`--frames expects a positive integer, got "${raw ?? ''}".`);
  }
  return value;
};

export const parseCliArgs = (args: readonly string[]): ParsedCli => {
  const options: CliOptions = {
    help: false,
    color: DEFAULT_PALETTE,
    speed: DEFAULT_SPEED,
    once: false,
    stats: false,
  };
  const warnings: string[] = [];
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (!arg.startsWith('-') || arg === '-') {
      positional.push(arg);
      continue;
    }
    switch (arg) {
      case '--help':
      case '-h':
        options.help = true;
        break;
      case '--once':
        options.once = true;
        break;
      case '--stats':
        options.stats = true;
        break;
      case '--frames':
        options.maxFrames = parseFrameCount(args[++i]);
        break;
      default:
        // Negative numbers still reach the speed parser and get its warning.
        if (Number.isFinite(Number(arg))) {
          positional.push(arg);
          break;
        }
        throw new CliUsageError(`Unknown flag "${arg}".`);
    }
  }

  const [color, speed, ...extra] = positional;
  if (color !== undefined) {
    options.color = color;
  }
  if (speed !== undefined) {
    const parsed = parseSpeedFactor(speed);
    options.speed = parsed.speed;
    if (parsed.warning) warnings.push(parsed.warning);
  }
  if (extra.length > 0) {
    warnings.push('Too many arguments. Use "donut --help" for help.');
  }

  return { options, warnings };
};

export const USAGE = `donut – spinning ASCII torus for the terminal

Usage:
  donut [color] [speed] [--once] [--frames <n>] [--stats]

Press "q" or ESC to quit.

Arguments:
  color          Color name (default: green).
                 Available: green, red, blue, cyan, magenta, yellow, white
  speed          Positive speed factor (default: 1.0).
                 > 1.0: faster, < 1.0: slower.

Flags:
  --once         Print a single frame and exit (no keyboard, works in pipes)
  --frames <n>   Stop after n frames
  --stats        Print frame timing on exit
  -h, --help     Show this help
`;
