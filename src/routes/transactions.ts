import { Router } from 'express';
import { listTransactions, recordTransaction } from '../controllers/transactionController';

const router = Router();

router.get('/', listTransactions);
router.post('/', recordTransaction);

export default router;
