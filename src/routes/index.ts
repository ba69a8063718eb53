import { Router } from 'express';
import peopleRouter from './people';
import transactionsRouter from './transactions';
import betsRouter from './bets';
import { getDashboard } from '../controllers/ledgerController';

const router = Router();

router.get('/dashboard', getDashboard);
router.use('/people', peopleRouter);
router.use('/transactions', transactionsRouter);
router.use('/bets', betsRouter);

export default router;
