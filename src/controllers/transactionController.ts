import { Request, Response, NextFunction } from 'express';
import { transactionService } from '../services/transactionService';
import { createTransactionSchema, transactionQuerySchema } from '../validation/schemas';
import { toDTO } from '../types/transaction';
import { fromServiceError } from '../middleware/errorHandler';

/**
 * POST /transactions - Record a deposit, withdrawal or adjustment
 */
export async function recordTransaction(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const validated = createTransactionSchema.parse(req.body);

    const result = await transactionService.recordTransaction({
      personId: validated.person_id,
      type: validated.type,
      amountCents: validated.amount_cents,
      note: validated.note,
    });

    if (!result.success || !result.data) {
      throw fromServiceError(result.error, 'Failed to record transaction');
    }

    res.status(201).json(toDTO(result.data));
  } catch (error) {
    next(error);
  }
}

/**
 * GET /transactions - List transactions, optionally for one person
 */
export async function listTransactions(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const query = transactionQuerySchema.parse(req.query);

    const result = await transactionService.listTransactions(query.person_id);

    if (!result.success || !result.data) {
      throw fromServiceError(result.error, 'Failed to list transactions');
    }

    res.json({
      transactions: result.data.map(toDTO),
      count: result.data.length,
    });
  } catch (error) {
    next(error);
  }
}
