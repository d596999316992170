import { InvalidInputError } from '@holdem-equity/core';

export type Command = 'equity' | 'range' | 'evaluate' | 'decide' | 'help' | 'version';

export interface CLIOptions {
  command: Command;
  cards?: string;
  board?: string;
  range?: string;
  opponents: number;
  /** Trials for `equity`/`decide`, trials per hand for `range`; command default when unset */
  trials?: number;
  seed?: number;
  workers: number;
  pot?: number;
  call?: number;
  time: boolean;
}

export const DEFAULT_EQUITY_TRIALS = 10000;
export const DEFAULT_TRIALS_PER_HAND = 1000;

export function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {
    command: 'help',
    opponents: 1,
    workers: 1,
    time: false
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    switch (arg) {
      case 'equity':
      case 'eq':
        options.command = 'equity';
        break;

      case 'range':
        options.command = 'range';
        break;

      case 'evaluate':
      case 'eval':
        options.command = 'evaluate';
        break;

      case 'decide':
        options.command = 'decide';
        break;

      case 'help':
      case '--help':
      case '-h':
        options.command = 'help';
        break;

      case '--version':
      case '-v':
        options.command = 'version';
        break;

      case '--cards':
      case '-c':
        options.cards = valueOf(args, ++i, arg);
        break;

      case '--board':
      case '-b':
        options.board = valueOf(args, ++i, arg);
        break;

      case '--range':
      case '-r':
        options.range = valueOf(args, ++i, arg);
        break;

      case '--opponents':
      case '-o':
        options.opponents = integerOf(args, ++i, arg);
        break;

      case '--trials':
      case '-t':
        options.trials = integerOf(args, ++i, arg);
        break;

      case '--seed':
      case '-s':
        options.seed = integerOf(args, ++i, arg);
        break;

      case '--workers':
      case '-w':
        options.workers = integerOf(args, ++i, arg);
        break;

      case '--pot':
        options.pot = amountOf(args, ++i, arg);
        break;

      case '--call':
        options.call = amountOf(args, ++i, arg);
        break;

      case '--time':
        options.time = true;
        break;

      default:
        throw new InvalidInputError(`Unknown argument: ${arg}`);
    }

    i++;
  }

  return options;
}

function valueOf(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined) {
    throw new InvalidInputError(`${flag} needs a value`);
  }
  return value;
}

function integerOf(args: string[], index: number, flag: string): number {
  const raw = valueOf(args, index, flag);
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new InvalidInputError(`${flag} expects an integer, got ${raw}`);
  }
  return value;
}

function amountOf(args: string[], index: number, flag: string): number {
  const raw = valueOf(args, index, flag);
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidInputError(`${flag} expects a non-negative amount, got ${raw}`);
  }
  return value;
}
