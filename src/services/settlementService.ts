import type { Knex } from 'knex';
import { betRepository } from '../db/repositories/betRepository';
import { settlementRepository } from '../db/repositories/settlementRepository';
import { auditLogRepository } from '../db/repositories/auditLogRepository';
import { inTransaction } from '../db/unitOfWork';
import { applyLegResults, decideSettlement, roundOdds } from '../computations';
import { isTerminalStatus } from '../types/bet';
import type { SettleBetInput, Settlement, SettlementResponse } from '../types/settlement';
import { toDTO } from '../types/settlement';
import { DomainError, PersistenceError, isDomainError } from '../types/errors';
import { ReasonCode } from '../types/reasonCodes';
import { fail, failFromError, ok, type ServiceResult } from '../types/serviceResult';
import { toLegDTO } from './betService';

/**
 * Applies submitted leg results to a bet and settles it once its outcome is
 * known. Everything runs in a single transaction: leg results, the bet's
 * status change and the settlement rows are committed together or not at all.
 *
 * A bet that has already reached WON, LOST or VOID is rejected with
 * BET_ALREADY_SETTLED rather than settled a second time.
 */
export async function settleBet(
  input: SettleBetInput
): Promise<ServiceResult<SettlementResponse>> {
  try {
    const result = await inTransaction((trx) =>
      settleBetInTransaction(trx, input, new Date().toISOString())
    );

    console.log(
      `[settlement] bet ${result.bet_id} -> ${result.status}`,
      { settlements: result.settlements.length, totalPayoutCents: result.total_payout_cents }
    );

    return ok(result);
  } catch (err) {
    if (err instanceof PersistenceError) {
      console.error(`[settlement] bet ${input.betId} rolled back:`, err.cause);
    }
    if (isDomainError(err)) {
      return failFromError(err);
    }
    throw err;
  }
}

/**
 * The settlement unit of work. Every read and write goes through `trx`;
 * throwing from here rolls the whole transaction back.
 */
export async function settleBetInTransaction(
  trx: Knex.Transaction,
  input: SettleBetInput,
  now: string
): Promise<SettlementResponse> {
  const bet = await betRepository.findById(input.betId, trx);
  if (!bet) {
    throw new DomainError(ReasonCode.BET_NOT_FOUND, `Bet with ID ${input.betId} not found`);
  }
  if (isTerminalStatus(bet.status)) {
    throw new DomainError(
      ReasonCode.BET_ALREADY_SETTLED,
      `Bet ${bet.id} is already settled as ${bet.status}`,
      { status: bet.status, settled_at: bet.settledAt }
    );
  }

  const storedLegs = await betRepository.findLegsByBetId(bet.id, trx);
  const participants = await betRepository.findParticipantsByBetId(bet.id, trx);

  const { legs, changed } = applyLegResults(storedLegs, input.results);
  const decision = decideSettlement(legs, participants);

  if (changed.length === 0 && decision.status === 'OPEN') {
    return {
      bet_id: bet.id,
      status: bet.status,
      settled_at: null,
      combined_decimal_odds: null,
      total_payout_cents: null,
      legs: legs.map(toLegDTO),
      settlements: [],
    };
  }

  for (const leg of changed) {
    await betRepository.updateLegResult(leg.id, leg.result, trx);
  }

  const settledAt = decision.status === 'OPEN' ? null : now;
  const advanced = await betRepository.advanceOpenBet(
    bet.id,
    bet.version,
    decision.status,
    settledAt,
    trx
  );
  if (!advanced) {
    throw new DomainError(
      ReasonCode.CONCURRENT_MODIFICATION,
      `Bet ${bet.id} was changed by another request; reload and try again`
    );
  }

  const settlements: Settlement[] = await settlementRepository.createMany(
    decision.settlements.map((s) => ({
      betId: bet.id,
      personId: s.personId,
      netCents: s.netCents,
    })),
    now,
    trx
  );

  await auditLogRepository.append({
    entityType: 'bet',
    entityId: bet.id,
    action: decision.status === 'OPEN' ? 'UPDATE_LEGS' : 'SETTLE',
    payload: {
      status: decision.status,
      legResults: changed.map((leg) => ({ id: leg.id, result: leg.result })),
      combinedOdds: decision.combinedOdds,
      totalPayoutCents: decision.totalPayoutCents,
      settlements: decision.settlements,
    },
  }, trx);

  return {
    bet_id: bet.id,
    status: decision.status,
    settled_at: settledAt,
    combined_decimal_odds: decision.combinedOdds === null ? null : roundOdds(decision.combinedOdds),
    total_payout_cents: decision.totalPayoutCents,
    legs: legs.map(toLegDTO),
    settlements: settlements.map(toDTO),
  };
}

export async function getSettlementsForBet(
  betId: string
): Promise<ServiceResult<Settlement[]>> {
  const bet = await betRepository.findById(betId);
  if (!bet) {
    return fail(ReasonCode.BET_NOT_FOUND, `Bet with ID ${betId} not found`);
  }
  return ok(await settlementRepository.findByBetId(betId));
}

export const settlementService = {
  settleBet,
  settleBetInTransaction,
  getSettlementsForBet,
};
