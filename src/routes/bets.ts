import { Router } from 'express';
import {
  createBet,
  previewBet,
  getBet,
  listHistory,
  exportHistoryCsv,
} from '../controllers/betController';
import { settleBet, getSettlements } from '../controllers/settlementController';

const router = Router();

/**
 * POST /bets
 * Place a bet (legs start PENDING, bet starts OPEN)
 */
router.post('/', createBet);

/**
 * POST /bets/preview
 * Combined odds and potential payout for a prospective parlay
 */
router.post('/preview', previewBet);

/**
 * GET /bets/history, GET /bets/history.csv
 * Filters: person_id, status, date_from, date_to
 */
router.get('/history', listHistory);
router.get('/history.csv', exportHistoryCsv);

/**
 * GET /bets/:id
 * Bet detail
 */
router.get('/:id', getBet);

/**
 * POST /bets/:id/settle
 * Apply leg results; settles the bet once its outcome is decided
 */
router.post('/:id/settle', settleBet);

/**
 * GET /bets/:id/settlements
 */
router.get('/:id/settlements', getSettlements);

export default router;
