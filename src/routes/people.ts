import { Router } from 'express';
import {
  listPeople,
  createPerson,
  getPerson,
  renamePerson,
  getPersonLedger,
} from '../controllers/personController';

const router = Router();

/**
 * GET /people
 * List everyone in the pool
 */
router.get('/', listPeople);

/**
 * POST /people
 * Add a person
 */
router.post('/', createPerson);

/**
 * GET /people/:id/ledger
 * Ownership, exposure and live money for one person
 */
router.get('/:id/ledger', getPersonLedger);

router.get('/:id', getPerson);
router.patch('/:id', renamePerson);

export default router;
