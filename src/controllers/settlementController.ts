import { Request, Response, NextFunction } from 'express';
import { settlementService } from '../services/settlementService';
import { settleBetSchema } from '../validation/schemas';
import { toDTO } from '../types/settlement';
import { fromServiceError } from '../middleware/errorHandler';

/**
 * POST /bets/:id/settle - Submit leg results and settle the bet if decided
 */
export async function settleBet(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const validated = settleBetSchema.parse(req.body);

    const result = await settlementService.settleBet({
      betId: req.params.id,
      results: validated.results.map((r) => ({
        legId: r.leg_id,
        result: r.result,
      })),
    });

    if (!result.success || !result.data) {
      throw fromServiceError(result.error, 'Failed to settle bet');
    }

    res.json(result.data);
  } catch (error) {
    next(error);
  }
}

/**
 * GET /bets/:id/settlements - Settlement rows recorded for a bet
 */
export async function getSettlements(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const { id } = req.params;

    const result = await settlementService.getSettlementsForBet(id);

    if (!result.success || !result.data) {
      throw fromServiceError(result.error, 'Failed to load settlements');
    }

    res.json({
      settlements: result.data.map(toDTO),
      count: result.data.length,
    });
  } catch (error) {
    next(error);
  }
}
