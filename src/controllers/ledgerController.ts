import { Request, Response, NextFunction } from 'express';
import { ledgerService } from '../services/ledgerService';
import { fromServiceError } from '../middleware/errorHandler';

/**
 * GET /dashboard - Ownership per person, open bets and total exposure
 */
export async function getDashboard(
  _req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const result = await ledgerService.getDashboard();

    if (!result.success || !result.data) {
      throw fromServiceError(result.error, 'Failed to build dashboard');
    }

    res.json(result.data);
  } catch (error) {
    next(error);
  }
}
