import { personRepository } from '../db/repositories/personRepository';
import { transactionRepository } from '../db/repositories/transactionRepository';
import { auditLogRepository } from '../db/repositories/auditLogRepository';
import { inTransaction } from '../db/unitOfWork';
import { signedTransactionAmount } from '../computations';
import type { Transaction, TransactionType } from '../types/transaction';
import { ReasonCode } from '../types/reasonCodes';
import { fail, ok, type ServiceResult } from '../types/serviceResult';

export interface RecordTransactionInput {
  personId: string;
  type: TransactionType;
  amountCents: number;
  note?: string;
}

/**
 * Records money a person moved into or out of the pool. Transactions are
 * immutable once written.
 */
export async function recordTransaction(
  input: RecordTransactionInput
): Promise<ServiceResult<Transaction>> {
  if (!Number.isInteger(input.amountCents) || input.amountCents === 0) {
    return fail(
      ReasonCode.INVALID_TRANSACTION_AMOUNT,
      `Amount must be a nonzero whole number of cents, got ${input.amountCents}`
    );
  }

  const person = await personRepository.findById(input.personId);
  if (!person) {
    return fail(ReasonCode.PERSON_NOT_FOUND, `Person with ID ${input.personId} not found`);
  }

  const amountCents = signedTransactionAmount(input.type, input.amountCents);

  const transaction = await inTransaction(async (trx) => {
    const created = await transactionRepository.create({
      personId: input.personId,
      type: input.type,
      amountCents,
      note: input.note ?? null,
    }, trx);

    await auditLogRepository.append({
      entityType: 'transaction',
      entityId: created.id,
      action: 'CREATE',
      payload: { personId: input.personId, type: input.type, amountCents },
    }, trx);

    return created;
  });

  return ok(transaction);
}

export async function listTransactions(personId?: string): Promise<ServiceResult<Transaction[]>> {
  if (personId) {
    const person = await personRepository.findById(personId);
    if (!person) {
      return fail(ReasonCode.PERSON_NOT_FOUND, `Person with ID ${personId} not found`);
    }
  }
  return ok(await transactionRepository.findAll(personId));
}

export const transactionService = {
  recordTransaction,
  listTransactions,
};
