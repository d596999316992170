import { z } from 'zod';
import { Card, InvalidInputError } from '@holdem-equity/core';

/** "As", "Td", "7c" parsed into a Card */
export const CardSchema = z.string().transform((value, ctx) => {
  try {
    return Card.parse(value);
  } catch (error) {
    if (!(error instanceof InvalidInputError)) {
      throw error;
    }
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid card: ${value}` });
    return z.NEVER;
  }
});

const HoleCardsSchema = z.array(CardSchema).length(2, 'holeCards must be exactly 2 cards');
const BoardSchema = z.array(CardSchema).max(5, 'board holds at most 5 cards').default([]);
const TrialsSchema = z.number().int().positive().optional();
const SeedSchema = z.number().int().optional();

export const EvaluateBody = z.object({
  cards: z.array(CardSchema).min(5, 'cards must hold 5 to 7 cards').max(7, 'cards must hold 5 to 7 cards')
});

export const EquityBody = z.object({
  holeCards: HoleCardsSchema,
  board: BoardSchema,
  opponents: z.number().int().min(1).max(9).default(1),
  trials: TrialsSchema,
  seed: SeedSchema
});

export const RangeEquityBody = z.object({
  holeCards: HoleCardsSchema,
  range: z.string().min(1, 'range is required'),
  board: BoardSchema,
  trialsPerHand: TrialsSchema,
  seed: SeedSchema
});

export const AdviseBody = z.object({
  holeCards: HoleCardsSchema,
  board: BoardSchema,
  potSize: z.number().nonnegative(),
  toCall: z.number().nonnegative(),
  opponents: z.number().int().min(1).max(9).default(1),
  trials: TrialsSchema,
  seed: SeedSchema
});

/** One message naming every failing field, e.g. "holeCards: Required" */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
    .join('; ');
}
