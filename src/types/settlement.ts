import type { BetLegDTO, BetStatus } from './bet';

export interface Settlement {
  id: string;
  betId: string;
  personId: string;
  netCents: number;
  timestamp: string;
}

export interface CreateSettlementInput {
  betId: string;
  personId: string;
  netCents: number;
}

export interface LegResultUpdate {
  legId: string;
  result: string;
}

export interface SettleBetInput {
  betId: string;
  results: LegResultUpdate[];
}

export interface SettlementDTO {
  id: string;
  bet_id: string;
  person_id: string;
  net_cents: number;
  ts: string;
}

export interface SettlementResponse {
  bet_id: string;
  status: BetStatus;
  settled_at: string | null;
  combined_decimal_odds: number | null;
  total_payout_cents: number | null;
  legs: BetLegDTO[];
  settlements: SettlementDTO[];
}

export function toDTO(settlement: Settlement): SettlementDTO {
  return {
    id: settlement.id,
    bet_id: settlement.betId,
    person_id: settlement.personId,
    net_cents: settlement.netCents,
    ts: settlement.timestamp,
  };
}
