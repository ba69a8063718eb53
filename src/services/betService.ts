import { betRepository } from '../db/repositories/betRepository';
import { personRepository } from '../db/repositories/personRepository';
import { settlementRepository } from '../db/repositories/settlementRepository';
import { auditLogRepository } from '../db/repositories/auditLogRepository';
import { inTransaction } from '../db/unitOfWork';
import {
  americanToDecimal,
  buildHistoryCsv,
  calculateCombinedOdds,
  calculateParlayPayout,
  calculatePotentialOdds,
  decimalToAmerican,
  roundOdds,
  validateBetShape,
} from '../computations';
import type {
  Bet,
  BetDTO,
  BetDetailResponse,
  BetHistoryEntry,
  BetHistoryFilters,
  BetLeg,
  BetLegDTO,
  BetParticipantDTO,
  BetPreviewResponse,
  CreateBetInput,
} from '../types/bet';
import { toDTO, toParticipantDTO } from '../types/bet';
import { DomainError, isDomainError } from '../types/errors';
import { ReasonCode } from '../types/reasonCodes';
import { fail, failFromError, ok, type ServiceResult } from '../types/serviceResult';

export interface PlaceBetInput extends CreateBetInput {
  placedAt?: string;
}

export interface PreviewBetInput {
  legsAmericanOdds: number[];
  totalStakeCents: number;
}

export interface BetHistoryItem extends BetDTO {
  participants: BetParticipantDTO[];
}

/**
 * Records a new OPEN bet with its legs (all PENDING) and the people staking
 * it. Bet, legs and participants are written in one transaction.
 */
export async function createBet(input: PlaceBetInput): Promise<ServiceResult<BetDetailResponse>> {
  try {
    validateBetSubmission(input);
  } catch (err) {
    if (isDomainError(err)) {
      return failFromError(err);
    }
    throw err;
  }

  const personIds = input.participants.map((p) => p.personId);
  const persons = await personRepository.findByIds(personIds);
  const known = new Set(persons.map((p) => p.id));
  const missing = personIds.filter((id) => !known.has(id));
  if (missing.length > 0) {
    return fail(
      ReasonCode.PERSON_NOT_FOUND,
      `Unknown participant: ${missing.join(', ')}`,
      { person_ids: missing }
    );
  }

  const totalStakeCents = input.participants.reduce((sum, p) => sum + p.stakeCents, 0);

  const bet = await inTransaction(async (trx) => {
    const created = await betRepository.create({
      totalStakeCents,
      placedAt: input.placedAt ?? new Date().toISOString(),
    }, trx);
    await betRepository.createParticipants(created.id, input.participants, trx);
    const legs = await betRepository.createLegs(created.id, input.legs, trx);

    await auditLogRepository.append({
      entityType: 'bet',
      entityId: created.id,
      action: 'CREATE',
      payload: {
        totalStakeCents,
        legs: legs.map((leg) => ({ id: leg.id, americanOdds: leg.americanOdds })),
        participants: input.participants,
      },
    }, trx);

    return created;
  });

  return getBet(bet.id);
}

/**
 * Bet with its legs, participants and any settlement rows, plus what it
 * would pay if every leg still in play won.
 */
export async function getBet(id: string): Promise<ServiceResult<BetDetailResponse>> {
  const bet = await betRepository.findById(id);
  if (!bet) {
    return fail(ReasonCode.BET_NOT_FOUND, `Bet with ID ${id} not found`);
  }

  const [legs, participants, settlements] = await Promise.all([
    betRepository.findLegsByBetId(id),
    betRepository.findParticipantsByBetId(id),
    settlementRepository.findByBetId(id),
  ]);

  const potentialOdds = calculatePotentialOdds(legs);

  return ok({
    ...toDTO(bet),
    legs: legs.map(toLegDTO),
    participants: participants.map(toParticipantDTO),
    potential_decimal_odds: roundOdds(potentialOdds),
    potential_payout_cents: calculateParlayPayout(bet.totalStakeCents, potentialOdds),
    settlements: settlements.map((s) => ({
      person_id: s.personId,
      net_cents: s.netCents,
      ts: s.timestamp,
    })),
  });
}

/**
 * Prices a prospective parlay without writing anything.
 */
export function previewBet(input: PreviewBetInput): ServiceResult<BetPreviewResponse> {
  try {
    const combined = calculateCombinedOdds(
      input.legsAmericanOdds.map((americanOdds) => ({ americanOdds }))
    );

    return ok({
      total_stake_cents: input.totalStakeCents,
      combined_decimal_odds: roundOdds(combined),
      combined_american_odds: combined > 1 ? decimalToAmerican(combined) : null,
      potential_payout_cents: calculateParlayPayout(input.totalStakeCents, combined),
    });
  } catch (err) {
    if (isDomainError(err)) {
      return failFromError(err);
    }
    throw err;
  }
}

export async function listHistory(
  filters: BetHistoryFilters
): Promise<ServiceResult<BetHistoryItem[]>> {
  const entries = await loadHistory(filters);
  return ok(entries.map(({ bet, participants }) => ({
    ...toDTO(bet),
    participants: participants.map(toParticipantDTO),
  })));
}

export async function exportHistoryCsv(filters: BetHistoryFilters = {}): Promise<ServiceResult<string>> {
  const entries = await loadHistory(filters);
  return ok(buildHistoryCsv(entries));
}

async function loadHistory(filters: BetHistoryFilters): Promise<BetHistoryEntry[]> {
  const bets: Bet[] = await betRepository.findHistory(filters);
  const participants = await betRepository.findParticipantsByBetIds(bets.map((b) => b.id));
  return bets.map((bet) => ({
    bet,
    participants: participants.get(bet.id) ?? [],
  }));
}

export function toLegDTO(leg: BetLeg): BetLegDTO {
  return {
    id: leg.id,
    matchup: leg.matchup,
    bet_description: leg.betDescription,
    american_odds: leg.americanOdds,
    decimal_odds: roundOdds(americanToDecimal(leg.americanOdds)),
    result: leg.result,
  };
}

function validateBetSubmission(input: CreateBetInput): void {
  validateBetShape(input.legs.length, input.participants);

  // Settled odds never exceed the product of all legs, so a bet that can pay
  // out in full here can always be settled later.
  const totalStakeCents = input.participants.reduce((sum, p) => sum + p.stakeCents, 0);
  calculateParlayPayout(totalStakeCents, calculateCombinedOdds(input.legs));

  const seen = new Set<string>();
  for (const participant of input.participants) {
    if (seen.has(participant.personId)) {
      throw new DomainError(
        ReasonCode.DUPLICATE_PARTICIPANT,
        `Person ${participant.personId} is listed more than once`
      );
    }
    seen.add(participant.personId);
  }
}

export const betService = {
  createBet,
  getBet,
  previewBet,
  listHistory,
  exportHistoryCsv,
};
