import type { BetStatus, LegResult } from '../types/bet';
import { isLegResult } from '../types/bet';
import type { LegResultUpdate } from '../types/settlement';
import { DomainError } from '../types/errors';
import { ReasonCode } from '../types/reasonCodes';
import { calculateSettledOdds } from './combinedOddsCalculator';
import { calculateParlayPayout, roundHalfAwayFromZero } from './oddsConverter';

export type SettlementStatus = Exclude<BetStatus, 'CASHED_OUT'>;

export interface SettlementLeg {
  id: string;
  americanOdds: number;
  result: LegResult;
}

export interface SettlementParticipant {
  personId: string;
  stakeCents: number;
}

export interface ParticipantSettlement {
  personId: string;
  stakeCents: number;
  payoutShareCents: number;
  netCents: number;
}

export interface SettlementDecision {
  status: SettlementStatus;
  combinedOdds: number | null;
  totalPayoutCents: number | null;
  settlements: ParticipantSettlement[];
}

export interface AppliedLegResults<T extends SettlementLeg> {
  legs: T[];
  changed: T[];
}

/**
 * Reads a submitted leg result. Case-insensitive; anything that is not a
 * known result yields null.
 */
export function parseLegResultToken(token: string): LegResult | null {
  const normalized = token.trim().toUpperCase();
  return isLegResult(normalized) ? normalized : null;
}

/**
 * Applies submitted results to the legs that are still PENDING. Resolved
 * legs keep their result; "pending", blank and unknown tokens are no-ops,
 * as are updates for legs that are not in the list.
 */
export function applyLegResults<T extends SettlementLeg>(
  legs: T[],
  updates: LegResultUpdate[]
): AppliedLegResults<T> {
  const submitted = new Map<string, string>();
  for (const update of updates) {
    submitted.set(update.legId, update.result);
  }

  const changed: T[] = [];
  const next = legs.map((leg) => {
    const token = submitted.get(leg.id);
    if (leg.result !== 'PENDING' || token === undefined) {
      return leg;
    }

    const result = parseLegResultToken(token);
    if (result === null || result === 'PENDING') {
      return leg;
    }

    const updated = { ...leg, result };
    changed.push(updated);
    return updated;
  });

  return { legs: next, changed };
}

export function validateBetShape(
  legCount: number,
  participants: SettlementParticipant[]
): void {
  if (legCount === 0) {
    throw new DomainError(ReasonCode.EMPTY_BET_SUBMISSION, 'A bet needs at least one leg');
  }
  if (participants.length === 0) {
    throw new DomainError(ReasonCode.EMPTY_BET_SUBMISSION, 'A bet needs at least one participant');
  }

  const badStake = participants.find(
    (p) => !Number.isInteger(p.stakeCents) || p.stakeCents <= 0
  );
  if (badStake) {
    throw new DomainError(
      ReasonCode.NON_POSITIVE_STAKE,
      `Stake must be a positive whole number of cents, got ${badStake.stakeCents}`,
      { person_id: badStake.personId }
    );
  }
}

/**
 * Decides the status of a bet from the current results of its legs and,
 * when the outcome moves money, what each participant nets.
 *
 * - any LOST leg: LOST, everyone loses their stake
 * - any PENDING leg: still OPEN
 * - all VOID: VOID, no money moves
 * - otherwise WON at the product of the WON legs' odds
 */
export function decideSettlement(
  legs: SettlementLeg[],
  participants: SettlementParticipant[]
): SettlementDecision {
  validateBetShape(legs.length, participants);

  if (legs.some((leg) => leg.result === 'LOST')) {
    return {
      status: 'LOST',
      combinedOdds: null,
      totalPayoutCents: 0,
      settlements: participants.map((p) => ({
        personId: p.personId,
        stakeCents: p.stakeCents,
        payoutShareCents: 0,
        netCents: -p.stakeCents,
      })),
    };
  }

  if (legs.some((leg) => leg.result === 'PENDING')) {
    return { status: 'OPEN', combinedOdds: null, totalPayoutCents: null, settlements: [] };
  }

  if (legs.every((leg) => leg.result === 'VOID')) {
    return { status: 'VOID', combinedOdds: null, totalPayoutCents: null, settlements: [] };
  }

  const combinedOdds = calculateSettledOdds(legs);
  const totalStakeCents = sumStakes(participants);
  const totalPayoutCents = calculateParlayPayout(totalStakeCents, combinedOdds);
  const shares = allocatePayout(participants, totalPayoutCents);

  return {
    status: 'WON',
    combinedOdds,
    totalPayoutCents,
    settlements: participants.map((p, i) => ({
      personId: p.personId,
      stakeCents: p.stakeCents,
      payoutShareCents: shares[i],
      netCents: shares[i] - p.stakeCents,
    })),
  };
}

/**
 * Splits a payout in proportion to stakes. Each share is rounded on its
 * own; whatever cents that leaves over (or short) go to the largest
 * stake, the first one listed on a tie, so the shares always add up to
 * the payout.
 */
export function allocatePayout(
  participants: SettlementParticipant[],
  totalPayoutCents: number
): number[] {
  const totalStakeCents = sumStakes(participants);
  if (totalStakeCents === 0) {
    return participants.map(() => 0);
  }

  const shares = participants.map((p) =>
    roundHalfAwayFromZero((p.stakeCents * totalPayoutCents) / totalStakeCents)
  );

  const residual = totalPayoutCents - shares.reduce((sum, share) => sum + share, 0);
  if (residual !== 0) {
    shares[indexOfLargestStake(participants)] += residual;
  }

  return shares;
}

function indexOfLargestStake(participants: SettlementParticipant[]): number {
  let best = 0;
  participants.forEach((p, i) => {
    if (p.stakeCents > participants[best].stakeCents) {
      best = i;
    }
  });
  return best;
}

function sumStakes(participants: SettlementParticipant[]): number {
  return participants.reduce((sum, p) => sum + p.stakeCents, 0);
}
