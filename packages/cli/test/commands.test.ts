import { afterEach, beforeEach, describe, it, expect, vi, type MockInstance } from 'vitest';
import { InvalidInputError } from '@holdem-equity/core';
import type { CLIOptions } from '../src/args.js';
import { printVersion, runDecide, runEquity, runEvaluate, runRange } from '../src/commands.js';

function options(overrides: Partial<CLIOptions>): CLIOptions {
  return { command: 'help', opponents: 1, workers: 1, time: false, ...overrides };
}

describe('commands', () => {
  let log: MockInstance;

  beforeEach(() => {
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    log.mockRestore();
  });

  it('prints the version', () => {
    printVersion();
    expect(log).toHaveBeenCalledWith("Hold'em Equity CLI v1.0.0");
  });

  it('evaluates a hand', () => {
    runEvaluate(options({ command: 'evaluate', cards: 'Kh Kd', board: 'Ks 2c 2d 2h 7s' }));
    expect(log).toHaveBeenCalledWith('\nKh Kd Ks 2c 2d 2h 7s');
    expect(log).toHaveBeenCalledWith('  Hand:        Full House, Kings full of Twos');
    expect(log).toHaveBeenCalledWith('  Category:    Full House (FH)');
    expect(log).toHaveBeenCalledWith('  Tiebreakers: [13, 2]');
    expect(log).toHaveBeenCalledWith('  Best five:   Kh Kd Ks 2c 2d');
  });

  it('rejects a repeated card when evaluating', () => {
    expect(() => runEvaluate(options({ command: 'evaluate', cards: 'Ah Ah Ah Ah Kd' })))
      .toThrow('Duplicate card in cards: Ah Ah Ah Ah Kd');
  });

  it('runs equity in process', async () => {
    const result = await runEquity(options({
      command: 'equity',
      cards: 'As Ks',
      board: 'Qs Js Ts 2d 3c',
      trials: 100,
      seed: 1
    }));
    expect(result).toEqual({ win: 1, tie: 0, loss: 0, trials: 100 });
    expect(log).toHaveBeenCalledWith('  Win  | 100.0%');
  });

  it('needs hole cards for equity', async () => {
    await expect(runEquity(options({ command: 'equity' }))).rejects.toThrow('--cards is required');
  });

  it('reports a range that conflicts entirely', () => {
    const result = runRange(options({ command: 'range', cards: 'As Ah', range: 'AsKd', trials: 10 }));
    expect(result.trials).toBe(0);
    expect(log).toHaveBeenCalledWith('\n  Every combo in the range conflicts with the known cards.');
  });

  it('needs a range for the range command', () => {
    expect(() => runRange(options({ command: 'range', cards: 'As Ah' }))).toThrow(InvalidInputError);
  });

  it('recommends a call with the nuts', () => {
    runDecide(options({
      command: 'decide',
      cards: 'As Ks',
      board: 'Qs Js Ts 2d 3c',
      pot: 100,
      call: 50,
      trials: 100,
      seed: 1
    }));
    expect(log).toHaveBeenCalledWith('  Equity:   100.0%');
    expect(log).toHaveBeenCalledWith('  Pot odds: 33.3%');
    expect(log).toHaveBeenCalledWith('  EV:       150.00');
    expect(log).toHaveBeenCalledWith('  Action:   CALL');
  });

  it('needs pot and call for decide', () => {
    expect(() => runDecide(options({ command: 'decide', cards: 'As Ks', pot: 100 })))
      .toThrow('--pot and --call are required for decide command');
  });
});
