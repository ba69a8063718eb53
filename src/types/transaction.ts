export const TRANSACTION_TYPES = ['DEPOSIT', 'WITHDRAW', 'ADJUSTMENT'] as const;

export type TransactionType = typeof TRANSACTION_TYPES[number];

export function isTransactionType(value: string): value is TransactionType {
  return (TRANSACTION_TYPES as readonly string[]).includes(value);
}

export interface Transaction {
  id: string;
  personId: string;
  type: TransactionType;
  amountCents: number;
  note: string | null;
  timestamp: string;
}

export interface CreateTransactionInput {
  personId: string;
  type: TransactionType;
  amountCents: number;
  note?: string | null;
}

export interface TransactionDTO {
  id: string;
  person_id: string;
  type: TransactionType;
  amount_cents: number;
  note: string | null;
  ts: string;
}

export function toDTO(tx: Transaction): TransactionDTO {
  return {
    id: tx.id,
    person_id: tx.personId,
    type: tx.type,
    amount_cents: tx.amountCents,
    note: tx.note,
    ts: tx.timestamp,
  };
}
