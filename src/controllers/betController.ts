import { Request, Response, NextFunction } from 'express';
import { betService } from '../services/betService';
import { createBetSchema, historyQuerySchema, previewBetSchema, type HistoryQuery } from '../validation/schemas';
import type { BetHistoryFilters } from '../types/bet';
import { fromServiceError } from '../middleware/errorHandler';

/**
 * POST /bets - Place a bet with its legs and participants
 */
export async function createBet(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const validated = createBetSchema.parse(req.body);

    const result = await betService.createBet({
      legs: validated.legs.map((leg) => ({
        matchup: leg.matchup,
        betDescription: leg.bet_description,
        americanOdds: leg.american_odds,
      })),
      participants: validated.participants.map((p) => ({
        personId: p.person_id,
        stakeCents: p.stake_cents,
      })),
      placedAt: validated.placed_at ? new Date(validated.placed_at).toISOString() : undefined,
    });

    if (!result.success || !result.data) {
      throw fromServiceError(result.error, 'Failed to create bet');
    }

    res.status(201).json(result.data);
  } catch (error) {
    next(error);
  }
}

/**
 * POST /bets/preview - Price a parlay without recording it
 */
export function previewBet(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  try {
    const validated = previewBetSchema.parse(req.body);

    const result = betService.previewBet({
      legsAmericanOdds: validated.legs.map((leg) => leg.american_odds),
      totalStakeCents: validated.total_stake_cents,
    });

    if (!result.success || !result.data) {
      throw fromServiceError(result.error, 'Failed to preview bet');
    }

    res.json(result.data);
  } catch (error) {
    next(error);
  }
}

/**
 * GET /bets/:id - Bet detail with legs, participants and settlements
 */
export async function getBet(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const result = await betService.getBet(req.params.id);

    if (!result.success || !result.data) {
      throw fromServiceError(result.error, 'Bet not found');
    }

    res.json(result.data);
  } catch (error) {
    next(error);
  }
}

/**
 * GET /bets/history - Bet history, newest first
 */
export async function listHistory(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const query = historyQuerySchema.parse(req.query);

    const result = await betService.listHistory(toFilters(query));

    if (!result.success || !result.data) {
      throw fromServiceError(result.error, 'Failed to load bet history');
    }

    res.json({
      bets: result.data,
      count: result.data.length,
    });
  } catch (error) {
    next(error);
  }
}

/**
 * GET /bets/history.csv - Bet history as a CSV download
 */
export async function exportHistoryCsv(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const query = historyQuerySchema.parse(req.query);

    const result = await betService.exportHistoryCsv(toFilters(query));

    if (!result.success || result.data === undefined) {
      throw fromServiceError(result.error, 'Failed to export bet history');
    }

    res
      .status(200)
      .type('text/csv')
      .attachment('bet_history.csv')
      .send(result.data);
  } catch (error) {
    next(error);
  }
}

function toFilters(query: HistoryQuery): BetHistoryFilters {
  return {
    personId: query.person_id,
    status: query.status,
    dateFrom: query.date_from,
    dateTo: query.date_to,
  };
}
