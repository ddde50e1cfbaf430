/**
 * Fare Table
 *
 * Flattens per-line zone fare rules into a lookup keyed by (line, zone) and checks that
 * every zone served by an active line is priced. Passenger types and the group bracket
 * schedule are validated and frozen alongside.
 */

import type {
  FarePricing,
  FareRuleSet,
  FareTable,
  GroupDiscountBracket,
  PassengerType,
  ZoneFare,
} from '../types/fare.js';
import { PASSENGER_CATEGORIES } from '../types/fare.js';
import type { NetworkSnapshot } from '../types/network.js';
import { IntegrityError } from './errors.js';

export const DEFAULT_CURRENCY = 'THB';

export interface FareTableInput {
  fareRules: readonly FareRuleSet[];
  passengerTypes: readonly PassengerType[];
  groupDiscounts: readonly GroupDiscountBracket[];
  currency?: string;
}

export function fareRuleKey(lineId: string, zone: number): string {
  return `${lineId}:${zone}`;
}

function isPercent(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 100;
}

function isMoney(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

function collectRules(
  network: NetworkSnapshot,
  fareRules: readonly FareRuleSet[],
  issues: string[]
): { pricingByLine: Map<string, FarePricing>; rules: Map<string, Readonly<ZoneFare>> } {
  const pricingByLine = new Map<string, FarePricing>();
  const rules = new Map<string, Readonly<ZoneFare>>();

  for (const ruleSet of fareRules) {
    if (!network.lines.has(ruleSet.lineId)) {
      issues.push(`fare rules reference unknown line ${ruleSet.lineId}`);
      continue;
    }
    if (pricingByLine.has(ruleSet.lineId)) {
      issues.push(`duplicate fare rule set for line ${ruleSet.lineId}`);
      continue;
    }
    pricingByLine.set(ruleSet.lineId, ruleSet.pricing);

    for (const zoneFare of ruleSet.zones) {
      const key = fareRuleKey(ruleSet.lineId, zoneFare.zone);
      if (rules.has(key)) {
        issues.push(`duplicate fare rule for line ${ruleSet.lineId} zone ${zoneFare.zone}`);
        continue;
      }
      if (!isMoney(zoneFare.baseFare) || !isMoney(zoneFare.incrementalFare)) {
        issues.push(`fare rule for line ${ruleSet.lineId} zone ${zoneFare.zone} has an invalid amount`);
        continue;
      }
      rules.set(key, Object.freeze({ ...zoneFare }));
    }
  }

  for (const line of network.lines.values()) {
    if (line.status !== 'active') {
      continue;
    }
    if (!pricingByLine.has(line.id)) {
      issues.push(`active line ${line.id} has no fare rules`);
      continue;
    }
    const zones = new Set(
      line.stationIds.flatMap((stationId) => {
        const station = network.stations.get(stationId);
        return station ? [station.zone] : [];
      })
    );
    for (const zone of [...zones].sort((a, b) => a - b)) {
      if (!rules.has(fareRuleKey(line.id, zone))) {
        issues.push(`line ${line.id} has no fare rule for zone ${zone}`);
      }
    }
  }

  return { pricingByLine, rules };
}

function collectPassengerTypes(
  passengerTypes: readonly PassengerType[],
  issues: string[]
): Map<string, Readonly<PassengerType>> {
  const byCategory = new Map<string, Readonly<PassengerType>>();
  const known: readonly string[] = PASSENGER_CATEGORIES;

  for (const passengerType of passengerTypes) {
    if (!known.includes(passengerType.category)) {
      issues.push(`unknown passenger category ${passengerType.category}`);
    } else if (byCategory.has(passengerType.category)) {
      issues.push(`duplicate passenger type ${passengerType.category}`);
    } else if (!isPercent(passengerType.discountPercent)) {
      issues.push(`passenger type ${passengerType.category} has invalid discount ${passengerType.discountPercent}`);
    } else {
      byCategory.set(passengerType.category, Object.freeze({ ...passengerType }));
    }
  }

  return byCategory;
}

function collectGroupDiscounts(
  brackets: readonly GroupDiscountBracket[],
  issues: string[]
): Readonly<GroupDiscountBracket>[] {
  const sorted = [...brackets].sort((a, b) => a.minSize - b.minSize);

  sorted.forEach((bracket, i) => {
    if (!Number.isInteger(bracket.minSize) || bracket.minSize < 1) {
      issues.push(`group discount bracket has invalid minimum size ${bracket.minSize}`);
    }
    if (!isPercent(bracket.discountPercent)) {
      issues.push(`group discount bracket ${bracket.minSize} has invalid discount ${bracket.discountPercent}`);
    }
    const previous = sorted[i - 1];
    if (previous && previous.minSize === bracket.minSize) {
      issues.push(`duplicate group discount bracket ${bracket.minSize}`);
    }
    if (previous && bracket.discountPercent < previous.discountPercent) {
      // Larger groups never pay more per passenger than smaller ones
      issues.push(`group discount for size ${bracket.minSize} is lower than for size ${previous.minSize}`);
    }
  });

  return sorted.map((bracket) => Object.freeze({ ...bracket }));
}

/**
 * Build the frozen fare table for a network snapshot
 *
 * @throws IntegrityError listing every problem found in the fare data
 */
export function buildFareTable(network: NetworkSnapshot, input: FareTableInput): FareTable {
  const issues: string[] = [];

  const { pricingByLine, rules } = collectRules(network, input.fareRules, issues);
  const passengerTypes = collectPassengerTypes(input.passengerTypes, issues);
  const groupDiscounts = collectGroupDiscounts(input.groupDiscounts, issues);

  if (issues.length > 0) {
    throw new IntegrityError(issues);
  }

  return Object.freeze({
    currency: input.currency ?? DEFAULT_CURRENCY,
    pricingByLine,
    rules,
    passengerTypes,
    groupDiscounts: Object.freeze(groupDiscounts),
  });
}
