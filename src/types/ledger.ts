import type { BetDTO, BetLegDTO, BetParticipantDTO } from './bet';

export interface PersonBalanceInputs {
  transactionCents: number;
  settlementCents: number;
  openStakeCents: number;
}

export interface PersonBalance {
  ownershipCents: number;
  exposureCents: number;
  liveMoneyCents: number;
}

export interface OwnershipSummaryDTO {
  person_id: string;
  person_name: string;
  ownership_cents: number;
  exposure_cents: number;
  live_money_cents: number;
}

export interface OpenBetSummaryDTO extends BetDTO {
  legs: BetLegDTO[];
  participants: BetParticipantDTO[];
  potential_decimal_odds: number;
  potential_payout_cents: number;
}

export interface DashboardResponse {
  ownership: OwnershipSummaryDTO[];
  open_bets: OpenBetSummaryDTO[];
  total_exposure_cents: number;
}
