import { describe, it, expect } from 'vitest';
import { InvalidInputError } from '@holdem-equity/core';
import { parseArgs } from '../src/args.js';

describe('parseArgs', () => {
  it('defaults to help', () => {
    expect(parseArgs([])).toEqual({ command: 'help', opponents: 1, workers: 1, time: false });
  });

  it('parses an equity run', () => {
    expect(parseArgs(['eq', '-c', 'Ah As', '-o', '2', '-t', '5000', '-s', '42', '--time'])).toEqual({
      command: 'equity',
      cards: 'Ah As',
      opponents: 2,
      trials: 5000,
      seed: 42,
      workers: 1,
      time: true
    });
  });

  it('parses a range run', () => {
    const options = parseArgs(['range', '-c', 'Ah Kd', '-b', 'Ac 7s 2d', '-r', 'QQ+, AKs', '-w', '4']);
    expect(options.command).toBe('range');
    expect(options.board).toBe('Ac 7s 2d');
    expect(options.range).toBe('QQ+, AKs');
    expect(options.workers).toBe(4);
  });

  it('parses decide amounts', () => {
    const options = parseArgs(['decide', '-c', '9h 8h', '--pot', '100', '--call', '25.5']);
    expect(options.command).toBe('decide');
    expect(options.pot).toBe(100);
    expect(options.call).toBe(25.5);
  });

  it('recognises aliases', () => {
    expect(parseArgs(['eval']).command).toBe('evaluate');
    expect(parseArgs(['-v']).command).toBe('version');
    expect(parseArgs(['equity', '--help']).command).toBe('help');
  });

  it('rejects malformed arguments', () => {
    expect(() => parseArgs(['--bogus'])).toThrow('Unknown argument: --bogus');
    expect(() => parseArgs(['-t', 'abc'])).toThrow('-t expects an integer, got abc');
    expect(() => parseArgs(['equity', '-c'])).toThrow('-c needs a value');
    expect(() => parseArgs(['--pot', '-5'])).toThrow(InvalidInputError);
  });
});
