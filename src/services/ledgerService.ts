import { personRepository } from '../db/repositories/personRepository';
import { transactionRepository } from '../db/repositories/transactionRepository';
import { settlementRepository } from '../db/repositories/settlementRepository';
import { betRepository } from '../db/repositories/betRepository';
import {
  calculateParlayPayout,
  calculatePotentialOdds,
  computePersonBalance,
  roundOdds,
} from '../computations';
import type { Person } from '../types/person';
import type {
  DashboardResponse,
  OpenBetSummaryDTO,
  OwnershipSummaryDTO,
  PersonBalanceInputs,
} from '../types/ledger';
import { toDTO, toParticipantDTO } from '../types/bet';
import { ReasonCode } from '../types/reasonCodes';
import { fail, ok, type ServiceResult } from '../types/serviceResult';
import { toLegDTO } from './betService';

/**
 * Ownership, exposure and live money for everyone, plus the open bets and
 * what each would pay out. Nothing here is stored; it is all derived from
 * transactions, settlements and open stakes.
 */
export async function getDashboard(): Promise<ServiceResult<DashboardResponse>> {
  const [persons, transactionTotals, settlementTotals, openStakes, openBets] = await Promise.all([
    personRepository.findAll(),
    transactionRepository.sumByPerson(),
    settlementRepository.sumByPerson(),
    betRepository.sumOpenStakeByPerson(),
    betRepository.findByStatus('OPEN'),
  ]);

  const ownership = persons.map((person) =>
    toOwnershipSummary(person, {
      transactionCents: transactionTotals.get(person.id) ?? 0,
      settlementCents: settlementTotals.get(person.id) ?? 0,
      openStakeCents: openStakes.get(person.id) ?? 0,
    })
  );

  const betIds = openBets.map((bet) => bet.id);
  const [legsByBet, participantsByBet] = await Promise.all([
    betRepository.findLegsByBetIds(betIds),
    betRepository.findParticipantsByBetIds(betIds),
  ]);

  const openBetSummaries: OpenBetSummaryDTO[] = openBets.map((bet) => {
    const legs = legsByBet.get(bet.id) ?? [];
    const potentialOdds = calculatePotentialOdds(legs);
    return {
      ...toDTO(bet),
      legs: legs.map(toLegDTO),
      participants: (participantsByBet.get(bet.id) ?? []).map(toParticipantDTO),
      potential_decimal_odds: roundOdds(potentialOdds),
      potential_payout_cents: calculateParlayPayout(bet.totalStakeCents, potentialOdds),
    };
  });

  const totalExposureCents = openBets.reduce((sum, bet) => sum + bet.totalStakeCents, 0);

  return ok({
    ownership,
    open_bets: openBetSummaries,
    total_exposure_cents: totalExposureCents,
  });
}

export async function getPersonLedger(personId: string): Promise<ServiceResult<OwnershipSummaryDTO>> {
  const person = await personRepository.findById(personId);
  if (!person) {
    return fail(ReasonCode.PERSON_NOT_FOUND, `Person with ID ${personId} not found`);
  }

  const [transactionCents, settlementCents, openStakeCents] = await Promise.all([
    transactionRepository.sumForPerson(personId),
    settlementRepository.sumForPerson(personId),
    betRepository.sumOpenStakeForPerson(personId),
  ]);

  return ok(toOwnershipSummary(person, { transactionCents, settlementCents, openStakeCents }));
}

function toOwnershipSummary(
  person: Person,
  totals: PersonBalanceInputs
): OwnershipSummaryDTO {
  const balance = computePersonBalance(totals);
  return {
    person_id: person.id,
    person_name: person.name,
    ownership_cents: balance.ownershipCents,
    exposure_cents: balance.exposureCents,
    live_money_cents: balance.liveMoneyCents,
  };
}

export const ledgerService = {
  getDashboard,
  getPersonLedger,
};
