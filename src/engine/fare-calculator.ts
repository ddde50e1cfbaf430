/**
 * Fare Calculator
 *
 * Pricing layers, in order:
 * 1. Each ride segment priced by its line's rule for the zone it departs from:
 *    baseFare + incrementalFare × units, where units are the zones crossed (zone pricing)
 *    or 1 for the one station travelled (station pricing)
 * 2. Passenger discount on the ride subtotal only
 * 3. Transfer fees, never discounted
 * 4. Group bracket discount on the post-passenger-discount total
 */

import type {
  FareBreakdown,
  FareItem,
  FareTable,
  GroupDiscountBracket,
  RideFareItem,
} from '../types/fare.js';
import type { Itinerary, RideSegment } from '../types/itinerary.js';
import { roundCurrency } from '../utils/rounding.js';
import { FareRuleMissingError, InvalidPassengerTypeError, InvalidRequestError } from './errors.js';
import { fareRuleKey } from './fare-table.js';

function priceRideSegment(fares: FareTable, segment: RideSegment): RideFareItem {
  const pricing = fares.pricingByLine.get(segment.lineId);
  const rule = fares.rules.get(fareRuleKey(segment.lineId, segment.fromZone));
  if (!pricing || !rule) {
    throw new FareRuleMissingError(segment.lineId, segment.fromZone);
  }

  const units = pricing === 'zone' ? Math.abs(segment.toZone - segment.fromZone) : 1;

  return {
    kind: 'ride',
    segmentIndex: segment.index,
    lineId: segment.lineId,
    fromStationId: segment.fromStationId,
    toStationId: segment.toStationId,
    pricing,
    zone: segment.fromZone,
    units,
    baseFare: rule.baseFare,
    incrementalFare: rule.incrementalFare,
    amount: roundCurrency(rule.baseFare + rule.incrementalFare * units),
  };
}

function itemize(fares: FareTable, itinerary: Itinerary): FareItem[] {
  return itinerary.segments.map((segment): FareItem => {
    if (segment.kind === 'ride') {
      return priceRideSegment(fares, segment);
    }
    return {
      kind: 'transfer',
      segmentIndex: segment.index,
      transferLinkId: segment.transferLinkId,
      fromStationId: segment.fromStationId,
      toStationId: segment.toStationId,
      amount: roundCurrency(segment.cost),
    };
  });
}

/**
 * Discount of the highest bracket whose minimum size the group reaches, 0 below the first bracket
 */
export function groupDiscountFor(brackets: readonly GroupDiscountBracket[], groupSize: number): number {
  let percent = 0;
  for (const bracket of brackets) {
    if (groupSize >= bracket.minSize) {
      percent = bracket.discountPercent;
    }
  }
  return percent;
}

/**
 * Price an itinerary for one passenger category
 *
 * @throws InvalidPassengerTypeError if the category has no passenger type in the fare table
 * @throws FareRuleMissingError if a ride segment departs a zone its line has no rule for
 */
export function price(
  fares: FareTable,
  itinerary: Itinerary,
  passengerType: string,
  isGroup: boolean,
  groupSize: number
): FareBreakdown {
  const passenger = fares.passengerTypes.get(passengerType);
  if (!passenger) {
    throw new InvalidPassengerTypeError(passengerType);
  }
  if (isGroup && (!Number.isInteger(groupSize) || groupSize < 1)) {
    throw new InvalidRequestError('groupSize must be a positive integer', 'groupSize');
  }

  const items = itemize(fares, itinerary);

  let rides = 0;
  let transfers = 0;
  for (const item of items) {
    if (item.kind === 'ride') {
      rides += item.amount;
    } else {
      transfers += item.amount;
    }
  }

  const rideSubtotal = roundCurrency(rides);
  const transferFees = roundCurrency(transfers);
  const passengerDiscount = roundCurrency((rideSubtotal * passenger.discountPercent) / 100);
  const afterPassengerDiscount = roundCurrency(rideSubtotal - passengerDiscount + transferFees);

  const size = isGroup ? groupSize : 1;
  const groupDiscountPercent = isGroup ? groupDiscountFor(fares.groupDiscounts, size) : 0;
  const groupDiscount = roundCurrency((afterPassengerDiscount * groupDiscountPercent) / 100);
  const total = roundCurrency(afterPassengerDiscount - groupDiscount);

  return {
    passengerType: passenger.category,
    currency: fares.currency,
    items,
    rideSubtotal,
    passengerDiscountPercent: passenger.discountPercent,
    passengerDiscount,
    transferFees,
    groupSize: size,
    groupDiscountPercent,
    groupDiscount,
    total,
    partyTotal: roundCurrency(total * size),
  };
}
