export {
  americanToDecimal,
  decimalToAmerican,
  calculateParlayPayout,
  roundHalfAwayFromZero,
} from './oddsConverter';

export {
  calculateCombinedOdds,
  calculateSettledOdds,
  calculatePotentialOdds,
  roundOdds,
  type OddsLeg,
} from './combinedOddsCalculator';

export {
  parseLegResultToken,
  applyLegResults,
  validateBetShape,
  decideSettlement,
  allocatePayout,
  type SettlementStatus,
  type SettlementLeg,
  type SettlementParticipant,
  type ParticipantSettlement,
  type SettlementDecision,
  type AppliedLegResults,
} from './settlementCalculator';

export {
  computePersonBalance,
  signedTransactionAmount,
} from './ledgerCalculator';

export {
  buildHistoryCsv,
  formatCents,
  formatTimestamp,
  escapeCsvField,
  toCsvLine,
  HISTORY_CSV_HEADER,
} from './historyCsvFormatter';
