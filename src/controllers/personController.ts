import { Request, Response, NextFunction } from 'express';
import { personService } from '../services/personService';
import { ledgerService } from '../services/ledgerService';
import { createPersonSchema, renamePersonSchema } from '../validation/schemas';
import { toDTO } from '../types/person';
import { fromServiceError } from '../middleware/errorHandler';

/**
 * GET /people - List everyone in the pool
 */
export async function listPeople(
  _req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const result = await personService.listPersons();

    if (!result.success || !result.data) {
      throw fromServiceError(result.error, 'Failed to list people');
    }

    res.json({
      people: result.data.map(toDTO),
      count: result.data.length,
    });
  } catch (error) {
    next(error);
  }
}

/**
 * POST /people - Add a person
 */
export async function createPerson(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const validated = createPersonSchema.parse(req.body);

    const result = await personService.createPerson(validated.name);

    if (!result.success || !result.data) {
      throw fromServiceError(result.error, 'Failed to create person');
    }

    res.status(201).json(toDTO(result.data));
  } catch (error) {
    next(error);
  }
}

/**
 * GET /people/:id - Get a person by ID
 */
export async function getPerson(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const result = await personService.getPerson(req.params.id);

    if (!result.success || !result.data) {
      throw fromServiceError(result.error, 'Person not found');
    }

    res.json(toDTO(result.data));
  } catch (error) {
    next(error);
  }
}

/**
 * PATCH /people/:id - Rename a person
 */
export async function renamePerson(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const validated = renamePersonSchema.parse(req.body);

    const result = await personService.renamePerson(req.params.id, validated.name);

    if (!result.success || !result.data) {
      throw fromServiceError(result.error, 'Failed to rename person');
    }

    res.json(toDTO(result.data));
  } catch (error) {
    next(error);
  }
}

/**
 * GET /people/:id/ledger - Ownership, exposure and live money for one person
 */
export async function getPersonLedger(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const result = await ledgerService.getPersonLedger(req.params.id);

    if (!result.success || !result.data) {
      throw fromServiceError(result.error, 'Failed to load ledger');
    }

    res.json(result.data);
  } catch (error) {
    next(error);
  }
}
