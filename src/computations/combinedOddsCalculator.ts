import type { LegResult } from '../types/bet';
import { americanToDecimal } from './oddsConverter';

export interface OddsLeg {
  americanOdds: number;
  result: LegResult;
}

/**
 * Multiplies the decimal odds of every given leg. An empty list gives 1.0,
 * the odds of a bet that simply returns its stake.
 */
export function calculateCombinedOdds(legs: Pick<OddsLeg, 'americanOdds'>[]): number {
  return legs.reduce((product, leg) => product * americanToDecimal(leg.americanOdds), 1);
}

/**
 * Odds a fully resolved parlay pays at: only WON legs count, VOID legs
 * drop out with a factor of 1.
 */
export function calculateSettledOdds(legs: OddsLeg[]): number {
  return calculateCombinedOdds(legs.filter((leg) => leg.result === 'WON'));
}

/**
 * Odds an open parlay would pay if every leg still in play wins.
 */
export function calculatePotentialOdds(legs: OddsLeg[]): number {
  return calculateCombinedOdds(legs.filter((leg) => leg.result !== 'VOID'));
}

/**
 * Rounds combined odds to a specified number of decimal places for display.
 */
export function roundOdds(odds: number, decimals = 4): number {
  const factor = Math.pow(10, decimals);
  return Math.round(odds * factor) / factor;
}
