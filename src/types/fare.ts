/**
 * Fare table and fare breakdown types
 */

export const PASSENGER_CATEGORIES = ['adult', 'child', 'senior', 'student'] as const;

export type PassengerCategory = (typeof PASSENGER_CATEGORIES)[number];

export type FarePricing = 'zone' | 'station';

export interface ZoneFare {
  zone: number;
  baseFare: number;
  incrementalFare: number; // Per zone crossed (zone pricing) or per station travelled (station pricing)
}

export interface FareRuleSet {
  lineId: string;
  pricing: FarePricing;
  zones: ZoneFare[];
}

export interface PassengerType {
  category: PassengerCategory;
  discountPercent: number;
  ageMin?: number | null; // Eligibility is checked by the caller, never by the engine
  ageMax?: number | null;
}

export interface GroupDiscountBracket {
  minSize: number;
  discountPercent: number;
}

export interface FareTable {
  readonly currency: string;
  readonly pricingByLine: ReadonlyMap<string, FarePricing>;
  readonly rules: ReadonlyMap<string, Readonly<ZoneFare>>; // Keyed by fareRuleKey(lineId, zone)
  readonly passengerTypes: ReadonlyMap<string, Readonly<PassengerType>>;
  readonly groupDiscounts: readonly Readonly<GroupDiscountBracket>[]; // Sorted by minSize
}

export interface RideFareItem {
  kind: 'ride';
  segmentIndex: number;
  lineId: string;
  fromStationId: string;
  toStationId: string;
  pricing: FarePricing;
  zone: number; // Boarding zone whose rule priced the segment
  units: number;
  baseFare: number;
  incrementalFare: number;
  amount: number;
}

export interface TransferFareItem {
  kind: 'transfer';
  segmentIndex: number;
  transferLinkId: string;
  fromStationId: string;
  toStationId: string;
  amount: number;
}

export type FareItem = RideFareItem | TransferFareItem;

export interface FareBreakdown {
  passengerType: PassengerCategory;
  currency: string;
  items: FareItem[];
  rideSubtotal: number;
  passengerDiscountPercent: number;
  passengerDiscount: number;
  transferFees: number;
  groupSize: number;
  groupDiscountPercent: number;
  groupDiscount: number;
  total: number; // Per passenger
  partyTotal: number; // total × groupSize
}
