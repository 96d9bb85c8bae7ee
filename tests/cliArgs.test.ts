import test from 'node:test';
import assert from 'node:assert/strict';

import { CliUsageError, parseCliArgs } from '../src/cli/utils/args.js';

test('no arguments selects green at speed 1', () => {
  assert.deepEqual(parseCliArgs([]), {
    options: { help: false, color: 'green', speed: 1, once: false, stats: false },
    warnings: [],
  });
});

test('positional color and speed', () => {
  const { options, warnings } = parseCliArgs(['rot', '2.5']);
  assert.equal(options.color, 'rot');
  assert.equal(options.speed, 2.5);
  assert.deepEqual(warnings, []);
});

test('bad speed values fall back with a warning', () => {
  const { options, warnings } = parseCliArgs(['blue', '-2']);
  assert.equal(options.speed, 1);
  assert.deepEqual(warnings, [
    'Invalid speed factor "-2". Must be a positive number. Using default 1.0.',
  ]);
});

test('extra positionals are reported but not fatal', () => {
  const { options, warnings } = parseCliArgs(['cyan', '1', 'extra']);
  assert.equal(options.color, 'cyan');
  assert.deepEqual(warnings, ['Too many arguments. Use "donut --help" for help.']);
});

test('flags', () => {
  const { options } = parseCliArgs(['--frames', '5', 'white', '--stats', '--once']);
  assert.equal(options.maxFrames, 5);
  assert.equal(options.color, 'white');
  assert.equal(options.stats, true);
  assert.equal(options.once, true);
  assert.equal(parseCliArgs(['-h']).options.help, true);
  assert.equal(parseCliArgs(['--help']).options.help, true);
});

test('usage errors', () => {
  assert.throws(() => parseCliArgs(['--frames', '0']), CliUsageError);
  assert.throws(() => parseCliArgs(['--frames']), CliUsageError);
  assert.throws(() => parseCliArgs(['--frames', '2.5']), CliUsageError);
  assert.throws(() => parseCliArgs(['--bogus']), /Unknown flag "--bogus"/);
});
