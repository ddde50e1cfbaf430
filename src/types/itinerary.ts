/**
 * Itinerary and planning request types
 */

import type { FareBreakdown } from './fare.js';
import type { ServiceOverlay } from './network.js';

export const ROUTE_PREFERENCES = ['fastest', 'cheapest', 'fewest-transfers'] as const;

export type RoutePreference = (typeof ROUTE_PREFERENCES)[number];

/**
 * Edge score = time × travelTimeMinutes + cost × monetary cost + transfer × (1 for transfer edges)
 */
export interface ObjectiveWeights {
  time: number;
  cost: number;
  transfer: number;
}

export interface Objective {
  preference: RoutePreference;
  weights: ObjectiveWeights;
}

interface SegmentBase {
  index: number;
  edgeId: string;
  fromStationId: string;
  fromStationName: string;
  fromZone: number;
  toStationId: string;
  toStationName: string;
  toZone: number;
  travelTimeMinutes: number;
  distanceKm: number;
  cost: number;
  instruction: string;
  departAt?: string;
  arriveAt?: string;
}

export interface RideSegment extends SegmentBase {
  kind: 'ride';
  lineId: string;
  lineName: string;
  lineColor: string | null;
}

export interface TransferSegment extends SegmentBase {
  kind: 'transfer';
  transferLinkId: string;
}

export type ItinerarySegment = RideSegment | TransferSegment;

export interface Itinerary {
  id: string; // Derived from the edge sequence
  origin: string;
  destination: string;
  preference: RoutePreference;
  segments: ItinerarySegment[];
  travelTimeMinutes: number;
  distanceKm: number;
  transfers: number;
  walkingMinutes: number;
  baseCost: number;
  linesUsed: string[];
  score: number;
  departAt?: string;
  arriveAt?: string;
}

export interface PricedItinerary {
  rank: number;
  itinerary: Itinerary;
  fares: FareBreakdown[];
}

export interface PlanRequest {
  origin: string;
  destination: string;
  preference: RoutePreference;
  passengerTypes: string[];
  alternatives?: number;
  group?: { size: number };
  overlay?: ServiceOverlay;
  avoidLineIds?: string[];
  /** Itineraries riding any of these lines rank ahead of the rest */
  preferLineIds?: string[];
  maxTransfers?: number;
  maxWalkingMinutes?: number;
  departureTime?: Date;
}

export interface QuoteRequest {
  stationIds: string[];
  passengerTypes: string[];
  group?: { size: number };
}

export interface FareQuote {
  itinerary: Itinerary;
  fares: FareBreakdown[];
}
