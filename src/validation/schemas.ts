import { z } from 'zod';
import { BET_STATUSES } from '../types/bet';
import { TRANSACTION_TYPES } from '../types/transaction';

// Enum tokens are accepted in any case ("deposit", "DEPOSIT")
const upperCased = z.string().trim().transform((value) => value.toUpperCase());

// Single amounts are capped at $10bn
export const MAX_AMOUNT_CENTS = 1_000_000_000_000;

const cents = z.number().int().min(-MAX_AMOUNT_CENTS).max(MAX_AMOUNT_CENTS);

const personName = z.string().trim().min(1, 'Name cannot be empty').max(100);

// Inclusive date bound; a bare date means midnight UTC
const dateBound = z.string()
  .refine((value) => !isNaN(new Date(value).getTime()), { message: 'Invalid date' })
  .transform((value) => new Date(value).toISOString());

// Person schemas
export const createPersonSchema = z.object({
  name: personName,
});

export const renamePersonSchema = z.object({
  name: personName,
});

// Transaction schemas
export const createTransactionSchema = z.object({
  person_id: z.string().uuid(),
  type: upperCased.pipe(z.enum(TRANSACTION_TYPES)),
  amount_cents: cents,
  note: z.string().max(500).optional(),
});

export const transactionQuerySchema = z.object({
  person_id: z.string().uuid().optional(),
});

// Bet schemas. Emptiness, stakes and odds are checked by the bet service
// so they surface with their own reason codes.
export const betLegSchema = z.object({
  matchup: z.string().trim().min(1).max(200),
  bet_description: z.string().trim().min(1).max(200),
  american_odds: z.number().int(),
});

export const betParticipantSchema = z.object({
  person_id: z.string().uuid(),
  stake_cents: cents,
});

export const createBetSchema = z.object({
  legs: z.array(betLegSchema),
  participants: z.array(betParticipantSchema),
  placed_at: z.string().datetime({ offset: true }).optional(),
});

export const previewBetSchema = z.object({
  legs: z.array(z.object({ american_odds: z.number().int() })),
  total_stake_cents: cents.min(0),
});

// Settlement schema. Result tokens stay free-form: unknown ones are ignored.
export const settleBetSchema = z.object({
  results: z.array(z.object({
    leg_id: z.string().min(1),
    result: z.string(),
  })).default([]),
});

export const historyQuerySchema = z.object({
  person_id: z.string().uuid().optional(),
  status: upperCased.pipe(z.enum(BET_STATUSES)).optional(),
  date_from: dateBound.optional(),
  date_to: dateBound.optional(),
});

// Type exports for validated data
export type CreatePersonBody = z.infer<typeof createPersonSchema>;
export type RenamePersonBody = z.infer<typeof renamePersonSchema>;
export type CreateTransactionBody = z.infer<typeof createTransactionSchema>;
export type CreateBetBody = z.infer<typeof createBetSchema>;
export type PreviewBetBody = z.infer<typeof previewBetSchema>;
export type SettleBetBody = z.infer<typeof settleBetSchema>;
export type HistoryQuery = z.infer<typeof historyQuerySchema>;
