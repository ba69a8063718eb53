export const BET_STATUSES = ['OPEN', 'WON', 'LOST', 'VOID', 'CASHED_OUT'] as const;
export const LEG_RESULTS = ['PENDING', 'WON', 'LOST', 'VOID'] as const;

export type BetStatus = typeof BET_STATUSES[number];
export type LegResult = typeof LEG_RESULTS[number];

/** Statuses a bet can never leave. */
export type TerminalBetStatus = Exclude<BetStatus, 'OPEN'>;

export function isBetStatus(value: string): value is BetStatus {
  return (BET_STATUSES as readonly string[]).includes(value);
}

export function isLegResult(value: string): value is LegResult {
  return (LEG_RESULTS as readonly string[]).includes(value);
}

export function isTerminalStatus(status: BetStatus): status is TerminalBetStatus {
  return status !== 'OPEN';
}

export interface Bet {
  id: string;
  totalStakeCents: number;
  status: BetStatus;
  version: number;
  placedAt: string;
  settledAt: string | null;
}

export interface BetLeg {
  id: string;
  betId: string;
  position: number;
  matchup: string;
  betDescription: string;
  americanOdds: number;
  result: LegResult;
}

export interface BetParticipant {
  id: string;
  betId: string;
  personId: string;
  position: number;
  stakeCents: number;
}

export interface BetParticipantWithName extends BetParticipant {
  personName: string;
}

export interface CreateBetLegInput {
  matchup: string;
  betDescription: string;
  americanOdds: number;
}

export interface CreateBetParticipantInput {
  personId: string;
  stakeCents: number;
}

export interface CreateBetInput {
  legs: CreateBetLegInput[];
  participants: CreateBetParticipantInput[];
}

export interface BetLegDTO {
  id: string;
  matchup: string;
  bet_description: string;
  american_odds: number;
  decimal_odds: number;
  result: LegResult;
}

export interface BetParticipantDTO {
  person_id: string;
  person_name: string;
  stake_cents: number;
}

export interface BetDTO {
  id: string;
  total_stake_cents: number;
  status: BetStatus;
  placed_at: string;
  settled_at: string | null;
}

export interface BetDetailResponse extends BetDTO {
  legs: BetLegDTO[];
  participants: BetParticipantDTO[];
  potential_decimal_odds: number;
  potential_payout_cents: number;
  settlements: {
    person_id: string;
    net_cents: number;
    ts: string;
  }[];
}

export interface BetPreviewResponse {
  total_stake_cents: number;
  combined_decimal_odds: number;
  combined_american_odds: number | null;
  potential_payout_cents: number;
}

export interface BetHistoryFilters {
  personId?: string;
  status?: BetStatus;
  dateFrom?: string;
  dateTo?: string;
}

export interface BetHistoryEntry {
  bet: Bet;
  participants: BetParticipantWithName[];
}

export function toDTO(bet: Bet): BetDTO {
  return {
    id: bet.id,
    total_stake_cents: bet.totalStakeCents,
    status: bet.status,
    placed_at: bet.placedAt,
    settled_at: bet.settledAt,
  };
}

export function toParticipantDTO(participant: BetParticipantWithName): BetParticipantDTO {
  return {
    person_id: participant.personId,
    person_name: participant.personName,
    stake_cents: participant.stakeCents,
  };
}
