import { personRepository } from '../db/repositories/personRepository';
import { auditLogRepository } from '../db/repositories/auditLogRepository';
import { inTransaction } from '../db/unitOfWork';
import type { Person } from '../types/person';
import { ReasonCode } from '../types/reasonCodes';
import { fail, ok, type ServiceResult } from '../types/serviceResult';

export async function createPerson(name: string): Promise<ServiceResult<Person>> {
  const person = await inTransaction(async (trx) => {
    const created = await personRepository.create(name, trx);
    await auditLogRepository.append({
      entityType: 'person',
      entityId: created.id,
      action: 'CREATE',
      payload: { name },
    }, trx);
    return created;
  });

  return ok(person);
}

export async function listPersons(): Promise<ServiceResult<Person[]>> {
  return ok(await personRepository.findAll());
}

export async function getPerson(id: string): Promise<ServiceResult<Person>> {
  const person = await personRepository.findById(id);
  if (!person) {
    return fail(ReasonCode.PERSON_NOT_FOUND, `Person with ID ${id} not found`);
  }
  return ok(person);
}

/**
 * Renames a person. People are never deleted, so this is the only change
 * a person record ever sees.
 */
export async function renamePerson(id: string, name: string): Promise<ServiceResult<Person>> {
  const existing = await personRepository.findById(id);
  if (!existing) {
    return fail(ReasonCode.PERSON_NOT_FOUND, `Person with ID ${id} not found`);
  }

  const renamed = await inTransaction(async (trx) => {
    const updated = await personRepository.rename(id, name, trx);
    await auditLogRepository.append({
      entityType: 'person',
      entityId: id,
      action: 'RENAME',
      payload: { from: existing.name, to: name },
    }, trx);
    return updated;
  });

  if (!renamed) {
    return fail(ReasonCode.PERSON_NOT_FOUND, `Person with ID ${id} not found`);
  }
  return ok(renamed);
}

export const personService = {
  createPerson,
  listPersons,
  getPerson,
  renamePerson,
};
